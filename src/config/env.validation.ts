import { z } from 'zod';
import {
  DEFAULT_EFFICIENCY_THRESHOLD,
  DEFAULT_PR_THRESHOLD,
  DEFAULT_PV_CAPACITY_MWP,
} from '../analysis/core';
import { DEFAULT_SHEET_NAME } from '../analysis/strategies/xlsx.strategy';

/**
 * Environment schema, applied once at startup by ConfigModule.
 * Numeric values arrive as strings from process.env and are coerced.
 */
export const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  CORS_ORIGIN: z.string().min(1).default('http://localhost:5173'),
  // Plant defaults, overridable per request
  PV_CAPACITY_MWP: z.coerce
    .number()
    .positive()
    .finite()
    .default(DEFAULT_PV_CAPACITY_MWP),
  PR_THRESHOLD: z.coerce
    .number()
    .positive()
    .finite()
    .default(DEFAULT_PR_THRESHOLD),
  INVERTER_EFF_THRESHOLD: z.coerce
    .number()
    .positive()
    .finite()
    .default(DEFAULT_EFFICIENCY_THRESHOLD),
  SOURCE_SHEET_NAME: z.string().min(1).default(DEFAULT_SHEET_NAME),
});

export type EnvConfig = z.infer<typeof EnvSchema>;

export function validateEnv(config: Record<string, unknown>): EnvConfig {
  const result = EnvSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${issues}`);
  }
  return result.data;
}

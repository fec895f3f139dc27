import { z } from 'zod';

/**
 * Optional per-request plant parameters.
 *
 * Sent as multipart text fields alongside the files, hence the coercion.
 * Anything omitted falls back to the configured defaults.
 */
export const AnalysisOverridesSchema = z
  .object({
    pvCapacityMwp: z.coerce.number().positive().finite().optional(),
    prThreshold: z.coerce.number().positive().finite().optional(),
    efficiencyThreshold: z.coerce.number().positive().finite().optional(),
  })
  .strict();

export type AnalysisOverrides = z.infer<typeof AnalysisOverridesSchema>;

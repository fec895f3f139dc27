import {
  BadRequestException,
  Body,
  Controller,
  Get,
  Logger,
  Post,
  UploadedFiles,
  UseInterceptors,
} from '@nestjs/common';
import { FileFieldsInterceptor } from '@nestjs/platform-express';
import {
  AnalysisInputError,
  AnalysisReport,
  AnalysisService,
  UploadedSource,
} from './analysis.service';
import { AnalysisOverridesSchema } from './dto/analysis-overrides.dto';
import { AnalysisParameters } from './core';

/** Maximum inverter files per request */
export const MAX_INVERTER_FILES = 20;

/**
 * Multipart fields accepted by POST /analysis
 */
export interface AnalysisUploads {
  em?: Express.Multer.File[];
  rm?: Express.Multer.File[];
  inverters?: Express.Multer.File[];
}

/**
 * AnalysisController
 *
 * Exposes the plant performance analysis over HTTP.
 *
 * Usage:
 *   POST /analysis
 *   Content-Type: multipart/form-data
 *   Body: em=<file>&rm=<file>&inverters=<file1>&inverters=<file2>...
 *         [&pvCapacityMwp=2.06&prThreshold=0.75&efficiencyThreshold=0.9]
 *
 *   GET /analysis/defaults
 */
@Controller('analysis')
export class AnalysisController {
  private readonly logger = new Logger(AnalysisController.name);

  constructor(private readonly analysisService: AnalysisService) {}

  /**
   * Run an analysis over one EM file, one RM file and optional inverter files
   *
   * A failed EM/RM file rejects the request with 400. A failed inverter file
   * is reported in its summary's `error` and the rest of the run proceeds.
   *
   * @example
   * curl -X POST http://localhost:3000/analysis \
   *   -F "em=@EM_2024-05-01.xlsx" \
   *   -F "rm=@RM_2024-05-01.xlsx" \
   *   -F "inverters=@INV01_2024-05-01.xlsx" \
   *   -F "prThreshold=0.8"
   */
  @Post()
  @UseInterceptors(
    FileFieldsInterceptor([
      { name: 'em', maxCount: 1 },
      { name: 'rm', maxCount: 1 },
      { name: 'inverters', maxCount: MAX_INVERTER_FILES },
    ]),
  )
  async analyze(
    @UploadedFiles() files: AnalysisUploads | undefined,
    @Body() body: unknown,
  ): Promise<AnalysisReport> {
    const em = files?.em?.[0];
    const rm = files?.rm?.[0];
    if (!em || !rm) {
      throw new BadRequestException(
        'Both an EM file (field "em") and an RM file (field "rm") are required.',
      );
    }

    const overrides = AnalysisOverridesSchema.safeParse(body ?? {});
    if (!overrides.success) {
      throw new BadRequestException(
        `Invalid analysis parameters: ${overrides.error.issues
          .map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`)
          .join('; ')}`,
      );
    }

    const inverters = files?.inverters ?? [];
    this.logger.log(
      `Analysis request: em=${em.originalname}, rm=${rm.originalname}, inverterCount=${inverters.length}`,
    );

    try {
      return await this.analysisService.analyze(
        {
          em: this.toSource(em),
          rm: this.toSource(rm),
          inverters: inverters.map((file) => this.toSource(file)),
        },
        overrides.data,
      );
    } catch (error) {
      if (error instanceof AnalysisInputError) {
        throw new BadRequestException(error.message);
      }
      throw error;
    }
  }

  /**
   * Effective default parameters and accepted upload formats
   *
   * @example
   * GET /analysis/defaults
   * -> { parameters: { pvCapacityMwp: 2.06, ... }, formats: [{ name: 'xlsx', ... }] }
   */
  @Get('defaults')
  getDefaults(): {
    parameters: AnalysisParameters;
    formats: { name: string; description: string }[];
  } {
    return {
      parameters: this.analysisService.resolveParameters(),
      formats: this.analysisService.getSupportedFormats(),
    };
  }

  private toSource(file: Express.Multer.File): UploadedSource {
    return { filename: file.originalname, buffer: file.buffer };
  }
}

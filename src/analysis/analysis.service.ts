import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  AnalysisParameters,
  DEFAULT_EFFICIENCY_THRESHOLD,
  DEFAULT_PR_THRESHOLD,
  DEFAULT_PV_CAPACITY_MWP,
  InverterSet,
  InverterSummary,
  LoadStats,
  MalformedInputError,
  PerformanceStatus,
  PrDescription,
  PRRow,
  ProblemIssue,
  SourceRole,
  TimeSeriesRow,
  analyzeInverters,
  computePr,
  countByStatus,
  countIssues,
  describePr,
  loadWithStats,
  prTimeline,
} from './core';
import { ITableReader } from './interfaces/table-reader.interface';
import { AnalysisOverrides } from './dto/analysis-overrides.dto';
import { XlsxTableReader } from './strategies/xlsx.strategy';
import { CsvTableReader } from './strategies/csv.strategy';

/**
 * An uploaded file as handed over by the controller (or any other caller)
 */
export interface UploadedSource {
  filename: string;
  buffer: Buffer;
}

export interface AnalysisInput {
  em: UploadedSource;
  rm: UploadedSource;
  inverters: UploadedSource[];
}

/**
 * Outcome of loading one file
 */
export interface SourceLoadReport {
  filename: string;
  role: SourceRole;
  readerUsed: string;
  stats: LoadStats | null;
  error: string | null;
}

export interface AnalysisReport {
  parameters: AnalysisParameters;
  sources: SourceLoadReport[];
  prRows: PRRow[];
  prStatistics: PrDescription;
  statusCounts: Record<PerformanceStatus, number>;
  issueCounts: Record<ProblemIssue, number>;
  /** Chronological PR series for charting */
  prTimeline: Array<Pick<PRRow, 'timestamp' | 'pr'>>;
  inverterSummaries: InverterSummary[];
  durationMs: number;
}

/**
 * Raised when the EM or RM file cannot be loaded. Without both series
 * there is nothing to analyze, so the whole run stops.
 */
export class AnalysisInputError extends Error {
  constructor(
    public readonly filename: string,
    public readonly role: SourceRole,
    message: string,
  ) {
    super(message);
    this.name = 'AnalysisInputError';
  }
}

interface LoadedSource {
  report: SourceLoadReport;
  rows: TimeSeriesRow[];
}

/**
 * AnalysisService - Runs one plant performance analysis
 *
 * Responsibilities:
 * 1. Reader Selection: pick a table reader per file (xlsx or csv)
 * 2. Loading: decode each file and sanitize it for its role
 * 3. Analysis: PR, issue labels, statistics, inverter summaries
 * 4. Error Isolation: EM/RM failures abort the run, a failing inverter
 *    file only marks its own summary
 */
@Injectable()
export class AnalysisService {
  private readonly logger = new Logger(AnalysisService.name);
  private readonly readers: ITableReader[];

  constructor(
    private readonly configService: ConfigService,
    private readonly xlsxReader: XlsxTableReader,
    private readonly csvReader: CsvTableReader,
  ) {
    // Binary formats first: the csv reader accepts any text with separators
    this.readers = [this.xlsxReader, this.csvReader];

    this.logger.log(
      `Initialized with ${this.readers.length} reader(s): ${this.readers.map((r) => r.name).join(', ')}`,
    );
  }

  /**
   * Analyze one EM file, one RM file and any number of inverter files
   *
   * @throws AnalysisInputError if the EM or RM file cannot be loaded
   */
  async analyze(
    input: AnalysisInput,
    overrides: AnalysisOverrides = {},
  ): Promise<AnalysisReport> {
    const startTime = Date.now();
    const parameters = this.resolveParameters(overrides);

    this.logger.log(
      `Analysis started: em=${input.em.filename}, rm=${input.rm.filename}, inverters=${input.inverters.length}, ` +
        `capacity=${parameters.pvCapacityMwp} MWp, prThreshold=${parameters.prThreshold}`,
    );

    const [em, rm, ...inverters] = await Promise.all([
      this.loadSource(input.em, 'irradiance'),
      this.loadSource(input.rm, 'revenue_meter'),
      ...input.inverters.map((file) => this.loadSource(file, 'inverter')),
    ]);

    for (const required of [em, rm]) {
      if (required.report.error !== null) {
        this.logger.error(`Analysis aborted: ${required.report.error}`);
        throw new AnalysisInputError(
          required.report.filename,
          required.report.role,
          required.report.error,
        );
      }
    }

    const prRows = computePr(
      em.rows,
      rm.rows,
      parameters.pvCapacityMwp,
      parameters.prThreshold,
    );

    const inverterSets: InverterSet[] = inverters.map(({ report, rows }) =>
      report.error === null
        ? { sourceId: report.filename, rows }
        : { sourceId: report.filename, error: report.error },
    );

    const inverterSummaries = analyzeInverters(
      prRows,
      inverterSets,
      parameters.pvCapacityMwp,
      parameters.efficiencyThreshold,
    );

    const statusCounts = countByStatus(prRows);
    this.logger.log(
      `Analysis complete: ${prRows.length} PR rows (${statusCounts[PerformanceStatus.NEEDS_ATTENTION]} need attention), ` +
        `${inverterSummaries.length} inverter summaries`,
    );

    return {
      parameters,
      sources: [em, rm, ...inverters].map((s) => s.report),
      prRows,
      prStatistics: describePr(prRows),
      statusCounts,
      issueCounts: countIssues(prRows),
      prTimeline: prTimeline(prRows).map(({ timestamp, pr }) => ({
        timestamp,
        pr,
      })),
      inverterSummaries,
      durationMs: Date.now() - startTime,
    };
  }

  /**
   * Configured defaults, with request overrides applied on top
   */
  resolveParameters(overrides: AnalysisOverrides = {}): AnalysisParameters {
    return {
      pvCapacityMwp:
        overrides.pvCapacityMwp ??
        this.configService.get<number>(
          'PV_CAPACITY_MWP',
          DEFAULT_PV_CAPACITY_MWP,
        ),
      prThreshold:
        overrides.prThreshold ??
        this.configService.get<number>('PR_THRESHOLD', DEFAULT_PR_THRESHOLD),
      efficiencyThreshold:
        overrides.efficiencyThreshold ??
        this.configService.get<number>(
          'INVERTER_EFF_THRESHOLD',
          DEFAULT_EFFICIENCY_THRESHOLD,
        ),
    };
  }

  /**
   * Get list of supported upload formats
   */
  getSupportedFormats(): { name: string; description: string }[] {
    return this.readers.map((r) => ({
      name: r.name,
      description: r.description,
    }));
  }

  /**
   * Decode and sanitize one file. Never throws: failures are recorded in
   * the report so the caller decides whether they are fatal.
   */
  private async loadSource(
    file: UploadedSource,
    role: SourceRole,
  ): Promise<LoadedSource> {
    const report: SourceLoadReport = {
      filename: file.filename,
      role,
      readerUsed: 'none',
      stats: null,
      error: null,
    };

    try {
      const snippet = file.buffer.toString('latin1', 0, 2048);
      const reader = this.findReader(file.filename, snippet);
      if (!reader) {
        throw new MalformedInputError(
          `Unsupported file format. Supported formats: ${this.readers.map((r) => r.name).join(', ')}`,
        );
      }
      report.readerUsed = reader.name;

      const table = await reader.read(file.buffer);
      const { rows, stats } = loadWithStats(table, role);
      report.stats = stats;

      if (stats.skippedRows > 0) {
        this.logger.warn(
          `${file.filename}: skipped ${stats.skippedRows}/${stats.dataRows} rows with missing timestamp or invalid ${stats.valueLabel}`,
        );
      }
      this.logger.log(
        `Loaded ${file.filename} as ${role} via '${reader.name}': ${stats.keptRows} rows`,
      );

      return { report, rows };
    } catch (error) {
      report.error = this.formatErrorMessage(error, file.filename, role);
      this.logger.warn(`Failed to load ${file.filename}: ${report.error}`);
      return { report, rows: [] };
    }
  }

  private findReader(filename: string, snippet: string): ITableReader | null {
    for (const reader of this.readers) {
      if (reader.canHandle(filename, snippet)) {
        return reader;
      }
    }
    return null;
  }

  /**
   * Format error message from unknown error type
   */
  private formatErrorMessage(
    error: unknown,
    filename: string,
    role: SourceRole,
  ): string {
    if (error instanceof MalformedInputError) {
      return error.withSource(filename, role).message;
    }
    if (error instanceof Error) {
      return `[${filename}, ${role}] ${error.message}`;
    }
    return `[${filename}, ${role}] ${String(error)}`;
  }
}

// Re-export public API
export { AnalysisModule } from './analysis.module';
export { AnalysisService, AnalysisInputError } from './analysis.service';
export type {
  AnalysisInput,
  AnalysisReport,
  SourceLoadReport,
  UploadedSource,
} from './analysis.service';
export type { ITableReader } from './interfaces/table-reader.interface';
export * from './core';

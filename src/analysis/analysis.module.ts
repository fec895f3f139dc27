import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { AnalysisController } from './analysis.controller';
import { AnalysisService } from './analysis.service';
import { XlsxTableReader } from './strategies/xlsx.strategy';
import { CsvTableReader } from './strategies/csv.strategy';

/**
 * AnalysisModule
 *
 * Plant performance analysis over uploaded portal exports.
 *
 * Components:
 * - AnalysisController: REST API for multipart uploads
 * - AnalysisService: loads files, runs the analysis core, builds the report
 * - XlsxTableReader: Strategy for .xlsx workbooks ("5 minutes" sheet)
 * - CsvTableReader: Strategy for CSV exports of the same layout
 */
@Module({
  imports: [ConfigModule],
  controllers: [AnalysisController],
  providers: [AnalysisService, XlsxTableReader, CsvTableReader],
  exports: [AnalysisService],
})
export class AnalysisModule {}

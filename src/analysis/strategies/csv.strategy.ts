import { Injectable, Logger } from '@nestjs/common';
import { Readable } from 'node:stream';
import csvParser from 'csv-parser';
import { ITableReader } from '../interfaces/table-reader.interface';
import { MalformedInputError } from '../core/errors';
import { RawTable } from '../core/types';

/**
 * CSV Export Reader Strategy
 *
 * Handles the CSV flavour of the portal exports: same physical layout as
 * the workbook sheet (two metadata rows, header row, data), saved as text.
 * European exports use ';' as separator, the rest ','.
 *
 * Cells are returned as trimmed strings; numeric coercion happens in the
 * loader so both readers share one sanitization rule.
 */
@Injectable()
export class CsvTableReader implements ITableReader {
  private readonly logger = new Logger(CsvTableReader.name);

  readonly name = 'csv';
  readonly description = 'CSV export (comma or semicolon separated)';

  canHandle(filename: string, snippet: string): boolean {
    if (/\.csv$/i.test(filename)) return true;
    // Plain text with a separator on the first line
    const firstLine = snippet.split(/\r?\n/, 1)[0] ?? '';
    return (
      !snippet.startsWith('PK') && (firstLine.includes(';') || firstLine.includes(','))
    );
  }

  async read(fileBuffer: Buffer): Promise<RawTable> {
    const content = fileBuffer.toString('utf-8');
    if (content.trim() === '') {
      throw new MalformedInputError('File is empty');
    }

    const separator = this.detectSeparator(content.slice(0, 2048));
    const stream = Readable.from(fileBuffer).pipe(
      csvParser({
        headers: false,
        separator,
      }),
    );

    const table: RawTable = [];
    for await (const row of stream) {
      table.push(this.toCells(row as Record<string, string>));
    }

    this.logger.debug(
      `Read ${table.length} rows (separator '${separator}')`,
    );
    return table;
  }

  /**
   * Pick whichever of ';' and ',' appears more often in the first lines.
   * Ties go to ',' since semicolon exports rarely contain commas at all.
   */
  private detectSeparator(snippet: string): ';' | ',' {
    const sample = snippet.split(/\r?\n/).slice(0, 5).join('\n');
    const semicolons = sample.split(';').length - 1;
    const commas = sample.split(',').length - 1;
    return semicolons > commas ? ';' : ',';
  }

  /**
   * Headerless rows come back keyed by column index ('0', '1', ...)
   */
  private toCells(row: Record<string, string>): string[] {
    const indexes = Object.keys(row)
      .map((key) => Number.parseInt(key, 10))
      .filter((index) => !Number.isNaN(index));
    const width = indexes.length > 0 ? Math.max(...indexes) + 1 : 0;

    const cells: string[] = [];
    for (let i = 0; i < width; i++) {
      cells.push((row[String(i)] ?? '').trim());
    }
    return cells;
  }
}

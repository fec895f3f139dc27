import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Readable } from 'node:stream';
import { CellValue, Workbook } from 'exceljs';
import { ITableReader } from '../interfaces/table-reader.interface';
import { MalformedInputError } from '../core/errors';
import { RawCell, RawTable } from '../core/types';

export const DEFAULT_SHEET_NAME = '5 minutes';

/**
 * Excel Workbook Reader Strategy
 *
 * Handles the .xlsx exports of the plant's monitoring portal. Every
 * export (EM, revenue meter, inverter) carries its 5-minute data on a
 * sheet named "5 minutes"; other sheets are ignored.
 *
 * Cell Normalization (exceljs -> RawCell):
 * - number, string, boolean, Date -> unchanged
 * - formula / shared formula -> cached result
 * - rich text -> concatenated text runs
 * - hyperlink -> link text
 * - error values (#N/A, #DIV/0!, ...) and empty cells -> null
 */
@Injectable()
export class XlsxTableReader implements ITableReader {
  private readonly logger = new Logger(XlsxTableReader.name);

  readonly name = 'xlsx';
  readonly description = 'Excel workbook export (sheet "5 minutes")';

  private readonly sheetName: string;

  constructor(private readonly configService: ConfigService) {
    this.sheetName = this.configService.get<string>(
      'SOURCE_SHEET_NAME',
      DEFAULT_SHEET_NAME,
    );
  }

  /**
   * .xlsx extension, or a ZIP local file header at the start of the file
   */
  canHandle(filename: string, snippet: string): boolean {
    return /\.xlsx$/i.test(filename) || snippet.startsWith('PK\u0003\u0004');
  }

  async read(fileBuffer: Buffer): Promise<RawTable> {
    const workbook = new Workbook();

    try {
      await workbook.xlsx.read(Readable.from(fileBuffer));
    } catch (error) {
      throw new MalformedInputError(
        `Unable to decode workbook: ${error instanceof Error ? error.message : String(error)}`,
      );
    }

    const sheet = workbook.getWorksheet(this.sheetName);
    if (!sheet) {
      const available = workbook.worksheets.map((ws) => ws.name).join(', ');
      throw new MalformedInputError(
        `Sheet "${this.sheetName}" not found (available: ${available || 'none'})`,
      );
    }

    const table: RawTable = [];
    for (let r = 1; r <= sheet.rowCount; r++) {
      const row = sheet.getRow(r);
      const cells: RawCell[] = [];
      for (let c = 1; c <= row.cellCount; c++) {
        cells.push(this.toRawCell(row.getCell(c).value));
      }
      table.push(cells);
    }

    this.logger.debug(
      `Read ${table.length} rows from sheet "${this.sheetName}"`,
    );
    return table;
  }

  private toRawCell(value: CellValue): RawCell {
    if (value === null || value === undefined) return null;
    if (
      typeof value === 'number' ||
      typeof value === 'string' ||
      typeof value === 'boolean' ||
      value instanceof Date
    ) {
      return value;
    }
    if ('error' in value) return null;
    if ('richText' in value) {
      return value.richText.map((run) => run.text).join('');
    }
    if ('hyperlink' in value) return value.text;
    return this.toRawCell(value.result ?? null);
  }
}

import { ConfigService } from '@nestjs/config';
import { XlsxTableReader } from './xlsx.strategy';
import { MalformedInputError } from '../core/errors';
import { load } from '../core/tabular-loader';
import { createWorkbookBuffer } from '../../../test/utils/xlsx-builder';
import { EM_HEADER, METADATA_ROWS } from '../../../test/utils/export-builder';

describe('XlsxTableReader', () => {
  let reader: XlsxTableReader;

  const START = new Date(Date.UTC(2024, 4, 1, 10, 0, 0));

  beforeEach(() => {
    reader = new XlsxTableReader(new ConfigService());
  });

  describe('canHandle', () => {
    it('should return true for .xlsx filenames', () => {
      expect(reader.canHandle('EM_2024-05-01.xlsx', '')).toBe(true);
      expect(reader.canHandle('RM.XLSX', '')).toBe(true);
    });

    it('should return true for ZIP content regardless of filename', () => {
      expect(reader.canHandle('upload', 'PK\u0003\u0004\u0014\u0000')).toBe(
        true,
      );
    });

    it('should return false for CSV files', () => {
      expect(reader.canHandle('EM.csv', 'Plant,Test Plant')).toBe(false);
    });
  });

  describe('read', () => {
    it('should read all physical rows of the "5 minutes" sheet', async () => {
      const buffer = await createWorkbookBuffer({
        Summary: [['ignored']],
        '5 minutes': [
          ...METADATA_ROWS,
          EM_HEADER,
          ['Plant A', 'EM-1', '5 min', START, 500],
        ],
      });

      const table = await reader.read(buffer);

      expect(table).toHaveLength(4);
      expect(table[0]).toEqual(['Plant', 'Test Plant']);
      expect(table[2]).toEqual(EM_HEADER);
      expect(table[3]).toEqual(['Plant A', 'EM-1', '5 min', START, 500]);
    });

    it('should key date cells through the loader as ISO strings', async () => {
      const buffer = await createWorkbookBuffer({
        '5 minutes': [
          ...METADATA_ROWS,
          EM_HEADER,
          ['Plant A', 'EM-1', '5 min', START, 500],
        ],
      });

      const rows = load(await reader.read(buffer), 'irradiance');

      expect(rows).toEqual([
        { timestamp: '2024-05-01T10:00:00.000Z', value: 500 },
      ]);
    });

    it('should unwrap formula results, rich text and error values', async () => {
      const buffer = await createWorkbookBuffer({
        '5 minutes': [
          ['formula', { formula: '1+1', result: 2, date1904: false }],
          ['rich', { richText: [{ text: '61' }, { text: '2.5' }] }],
          ['error', { error: '#N/A' }],
          ['link', { text: 'portal', hyperlink: 'https://example.com' }],
        ],
      });

      const table = await reader.read(buffer);

      expect(table).toEqual([
        ['formula', 2],
        ['rich', '612.5'],
        ['error', null],
        ['link', 'portal'],
      ]);
    });

    it('should return null for empty cells inside a row', async () => {
      const buffer = await createWorkbookBuffer({
        '5 minutes': [['a', null, 'c']],
      });

      const table = await reader.read(buffer);

      expect(table).toEqual([['a', null, 'c']]);
    });

    it('should throw MalformedInputError when the sheet is missing', async () => {
      const buffer = await createWorkbookBuffer({ Daily: [['x']] });

      await expect(reader.read(buffer)).rejects.toThrow(
        'Sheet "5 minutes" not found (available: Daily)',
      );
    });

    it('should throw MalformedInputError for bytes that are not a workbook', async () => {
      await expect(
        reader.read(Buffer.from('definitely not a zip archive')),
      ).rejects.toThrow(MalformedInputError);
    });

    it('should read the sheet name from configuration', async () => {
      reader = new XlsxTableReader(
        new ConfigService({ SOURCE_SHEET_NAME: '15 minutes' }),
      );
      const buffer = await createWorkbookBuffer({
        '15 minutes': [['configured']],
      });

      await expect(reader.read(buffer)).resolves.toEqual([['configured']]);
    });
  });
});

import { RawTable } from '../core/types';

/**
 * ITableReader Interface - Strategy Pattern for Spreadsheet Decoding
 *
 * Each supported upload format implements this interface to turn the
 * uploaded bytes into a RawTable (all physical rows, untouched). Column
 * selection and numeric sanitization are left to the analysis core.
 *
 * Usage:
 * ```typescript
 * const reader = readers.find(r => r.canHandle(filename, snippet));
 * if (reader) {
 *   const table = await reader.read(buffer);
 *   const rows = load(table, 'irradiance');
 * }
 * ```
 */
export interface ITableReader {
  /**
   * Unique identifier, used in logs and load reports.
   * Examples: 'xlsx', 'csv'
   */
  readonly name: string;

  /** Human-readable description of the accepted format */
  readonly description: string;

  /**
   * Determine if this reader can decode the given file.
   *
   * @param filename - Original upload name (e.g., 'EM_2024-05-01.xlsx')
   * @param snippet - First 2KB of the file, decoded as latin1
   */
  canHandle(filename: string, snippet: string): boolean;

  /**
   * Decode the file into a RawTable.
   *
   * @throws MalformedInputError if the file cannot be decoded or lacks
   *   the expected sheet
   */
  read(fileBuffer: Buffer): Promise<RawTable>;
}

import type { SheetReader } from '../services/sheets.js';
import type { Sheet } from './schema.js';
import { formatColumns } from './format.js';

export type LineWriter = (line: string) => void;

/**
 * Fetch a sheet and write its column listing.
 * Lines are rendered before any is written, so a failed fetch writes nothing.
 */
export async function listColumns(
  reader: SheetReader,
  sheetId: string,
  write: LineWriter
): Promise<Sheet> {
  const sheet = await reader.fetchSheet(sheetId);

  for (const line of formatColumns(sheet)) {
    write(line);
  }

  return sheet;
}

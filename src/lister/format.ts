import type { Column, Sheet } from './schema.js';

export function formatHeader(name: string): string {
  return `Columns for sheet '${name}':`;
}

export function formatColumn(column: Column): string {
  return `- ${column.title} (ID: ${column.id}, Type: ${column.type})`;
}

/**
 * Header line followed by one line per column, in service order.
 */
export function formatColumns(sheet: Sheet): string[] {
  return [formatHeader(sheet.name), ...sheet.columns.map(formatColumn)];
}

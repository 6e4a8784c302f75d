/**
 * CSV output shared by the master table and change log exports
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { stringify } from 'csv-stringify/sync';

export interface CsvWriteOptions {
  /**
   * Mitigate CSV/Excel formula injection by prefixing strings that start
   * with =, +, -, or @ (after optional whitespace). Default: true.
   */
  sanitizeFormulas?: boolean;
  /** Prefix used when sanitizeFormulas is enabled (default: "'"). */
  formulaEscapePrefix?: string;
}

export function sanitizeFormulaValue(value: string, prefix = "'"): string {
  if (value.startsWith(prefix)) return value;
  return /^[\t\r\n ]*[=+\-@]/.test(value) ? `${prefix}${value}` : value;
}

/**
 * Serialize rows of text cells under a fixed header
 */
export function toCsv(
  rows: ReadonlyArray<Readonly<Record<string, string>>>,
  columns: readonly string[],
  options: CsvWriteOptions = {}
): string {
  const sanitize = options.sanitizeFormulas !== false;
  const prefix = options.formulaEscapePrefix ?? "'";

  const cells = rows.map((row) =>
    columns.map((column) => {
      const value = row[column] ?? '';
      return sanitize ? sanitizeFormulaValue(value, prefix) : value;
    })
  );

  return stringify([[...columns], ...cells]);
}

/**
 * Write a file, creating its parent directory if missing
 */
export async function writeFileEnsuringDir(filePath: string, content: string): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });
  await writeFile(filePath, content, 'utf-8');
}

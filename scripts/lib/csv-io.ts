/**
 * CSV reading and writing for MATT extracts and reference tables
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { format } from 'date-fns';
import { isDateOnly } from '../transforms/date-parsing';
import { Cell, DataTable, Row } from '../transforms/types';

/**
 * Parse CSV text with a header row. Header names are trimmed (the portal
 * export pads some of them), empty cells become null.
 */
export function parseCsvTable(content: string): DataTable {
  let columns: string[] = [];

  const records: unknown[] = parse(content, {
    bom: true,
    columns: (header: unknown) => {
      const names = Array.isArray(header) ? header : [];
      columns = names.map((col, i) => String(col).trim() || `Column${i}`);
      return columns;
    },
    skip_empty_lines: true,
    relax_column_count: true,
  });

  const rows = records.filter(isRecord).map(record => {
    const row: Row = {};
    for (const col of columns) {
      const value = record[col];
      row[col] = typeof value === 'string' && value !== '' ? value : null;
    }
    return row;
  });

  return { columns, rows };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export async function readCsvTable(filePath: string): Promise<DataTable> {
  const content = await fs.readFile(filePath, 'utf-8');
  return parseCsvTable(content);
}

export function formatCell(value: Cell): string {
  if (value === null) return '';
  if (value instanceof Date) {
    return isDateOnly(value) ? format(value, 'yyyy-MM-dd') : format(value, "yyyy-MM-dd'T'HH:mm:ss");
  }
  return String(value);
}

export function stringifyCsvTable(table: DataTable): string {
  const records = table.rows.map(row => table.columns.map(col => formatCell(row[col] ?? null)));
  return stringify(records, { header: true, columns: table.columns });
}

/**
 * Write a table as CSV, creating the parent directory if needed
 */
export async function writeCsvTable(filePath: string, table: DataTable): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, stringifyCsvTable(table), 'utf-8');
}

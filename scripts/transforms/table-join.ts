/**
 * Relational left join over in-memory tables
 */

import { groupBy } from 'lodash';
import { Cell, DataTable, Row } from './types';

export type JoinKey = string | number;

export type KeySelector = (row: Row) => JoinKey | null;

export interface LeftJoinOptions {
  leftKey: KeySelector;
  rightKey: KeySelector;
  /** Right-hand columns that are not copied into the result (e.g. the join column itself when redundant) */
  dropRight?: string[];
  suffixes?: [string, string];
}

/**
 * Keep every left row; attach the matching right rows. Right keys are
 * grouped, so a key that appears twice on the right yields two output rows
 * for each matching left row. Unmatched left rows get null in every right
 * column. Columns present on both sides are suffixed (`_x` left, `_y` right).
 */
export function leftJoin(left: DataTable, right: DataTable, options: LeftJoinOptions): DataTable {
  const [leftSuffix, rightSuffix] = options.suffixes ?? ['_x', '_y'];
  const dropped = new Set(options.dropRight ?? []);
  const rightColumns = right.columns.filter(col => !dropped.has(col));
  const overlap = new Set(rightColumns.filter(col => left.columns.includes(col)));

  const leftNames = new Map(left.columns.map(col => [col, overlap.has(col) ? col + leftSuffix : col]));
  const rightNames = new Map(rightColumns.map(col => [col, overlap.has(col) ? col + rightSuffix : col]));

  const index = groupBy(
    right.rows.filter(row => options.rightKey(row) !== null),
    row => keyString(options.rightKey(row))
  );

  const rows: Row[] = [];
  for (const leftRow of left.rows) {
    const base: Row = {};
    for (const [col, name] of leftNames) {
      base[name] = leftRow[col] ?? null;
    }

    const key = options.leftKey(leftRow);
    const matches = key === null ? undefined : index[keyString(key)];

    if (!matches || matches.length === 0) {
      const row: Row = { ...base };
      for (const name of rightNames.values()) {
        row[name] = null;
      }
      rows.push(row);
      continue;
    }

    for (const match of matches) {
      const row: Row = { ...base };
      for (const [col, name] of rightNames) {
        row[name] = match[col] ?? null;
      }
      rows.push(row);
    }
  }

  return {
    columns: [...leftNames.values(), ...rightNames.values()],
    rows
  };
}

/**
 * Keys that occur more than once in a reference table. A left join against
 * such a table multiplies the matching rows.
 */
export function findDuplicateKeys(table: DataTable, key: KeySelector): JoinKey[] {
  const groups = groupBy(
    table.rows.filter(row => key(row) !== null),
    row => keyString(key(row))
  );

  const duplicates: JoinKey[] = [];
  for (const rows of Object.values(groups)) {
    const first = rows[0];
    if (rows.length > 1 && first) {
      const value = key(first);
      if (value !== null) duplicates.push(value);
    }
  }
  return duplicates;
}

// 55501 and "55501" are distinct keys; selectors normalize the type.
function keyString(key: JoinKey | null): string {
  return typeof key === 'number' ? `n:${key}` : `s:${key}`;
}

export function cellToText(value: Cell | undefined): string {
  if (value === null || value === undefined) return '';
  if (value instanceof Date) return value.toISOString();
  return String(value);
}

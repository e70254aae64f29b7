/**
 * MATT Sales Enrichment
 *
 * Joins the raw MATT homesite/sales extract against the hub (community) and
 * plan reference tables and derives the reporting columns used downstream:
 * day of week, weekday group, investor/retail, realtor/direct and homesite
 * status labels.
 *
 * Pure and synchronous: inputs are never mutated and every output row is a
 * new object.
 */

import { InvalidCommunityError, MissingColumnsError } from '../lib/error-handler';
import { parseReportDate, weekdayName } from './date-parsing';
import { DEFAULT_INVESTOR_NAMES, classifyInvestor } from './investor-classifier';
import { cellToText, leftJoin } from './table-join';
import {
  Cell,
  DataTable,
  InvalidCommunityPolicy,
  RealtorDirect,
  Row,
  RowIssue,
  WeekdayGroup
} from './types';

export type InputTableName = 'sales' | 'hub' | 'plan';

const INPUT_TABLES: InputTableName[] = ['sales', 'hub', 'plan'];

export const REQUIRED_COLUMNS: Record<InputTableName, readonly string[]> = {
  sales: ['COMMUNITY', 'PLAN_CODE', 'SALE_DATE', 'SALES_CANCELLATION_DATE', 'NHC_NAME'],
  hub: ['Community Number', 'Community Name', 'Hub'],
  plan: ['Plan Code', 'Plan Name', 'Collection', 'Core', 'Textbox4']
};

const COMMUNITY_NUMBER = 'Comm_#';

const COLUMN_RENAMES = new Map<string, string>([
  ['Textbox4', 'HS_TYPE'],
  ['Textbox22', 'Net_Sales_Price']
]);

const TRIMMED_COLUMNS = ['Hub', 'Community Name', 'Plan Name'];

const HOMESITE_STATUS = new Map<string, string>([
  ['B', 'Backlog'],
  ['S', 'Unsold'],
  ['Z', 'Closed'],
  ['M', 'Model']
]);

export const DERIVED_COLUMNS = [
  'DOW_Sale',
  'Weekday_Group',
  'Investor Sale',
  'SALES_CANCELLATION_DATE_PARSED',
  'Realtor/Direct',
  'HS_TYPE_LABEL'
] as const;

export interface TransformOptions {
  investorNames?: ReadonlySet<string>;
  /** 'fail' aborts on the first malformed COMMUNITY; 'null' blanks Comm_# and reports the row */
  invalidCommunity?: InvalidCommunityPolicy;
}

export interface TransformResult {
  table: DataTable;
  issues: RowIssue[];
}

type CommunityNumberResult =
  | { ok: true; value: number }
  | { ok: false; reason: string };

/**
 * First five characters of the community identifier as an integer
 */
export function parseCommunityNumber(value: Cell | undefined): CommunityNumberResult {
  const text = cellToText(value);
  if (text.length < 5) {
    return { ok: false, reason: 'fewer than 5 characters' };
  }

  const prefix = text.slice(0, 5);
  if (!/^\d{5}$/.test(prefix)) {
    return { ok: false, reason: `prefix "${prefix}" is not numeric` };
  }

  return { ok: true, value: parseInt(prefix, 10) };
}

/**
 * Integer value of a reference key cell; accepts "55501" and "55501.0"
 */
export function toIntegerKey(value: Cell | undefined): number | null {
  if (typeof value === 'number') {
    return Number.isInteger(value) ? value : null;
  }
  if (typeof value === 'string') {
    const text = value.trim();
    return /^-?\d+(\.0+)?$/.test(text) ? parseInt(text, 10) : null;
  }
  return null;
}

/**
 * Plan codes arrive as text or as numbers that went through a float
 * ("1203.0"); both sides of the plan join are compared in this form.
 */
export function normalizePlanCode(value: Cell | undefined): string | null {
  const code = cellToText(value).trim().replace(/\.0$/, '');
  return code === '' ? null : code;
}

export function weekdayGroup(dayName: string | null): WeekdayGroup {
  return dayName === 'Saturday' || dayName === 'Sunday' ? 'Sat-Sun' : 'M-F';
}

export function realtorOrDirect(cobroke: Cell | undefined): RealtorDirect {
  return typeof cobroke === 'string' && cobroke.trim() === 'Y' ? 'Realtor' : 'Direct';
}

/** B/S/Z/M status codes to labels; other values pass through */
export function homesiteStatusLabel(hsType: Cell): Cell {
  if (typeof hsType === 'string') {
    return HOMESITE_STATUS.get(hsType) ?? hsType;
  }
  return hsType;
}

/**
 * Throws MissingColumnsError for the first input lacking a required column
 */
export function validateInputs(inputs: Record<InputTableName, DataTable>): void {
  for (const name of INPUT_TABLES) {
    const present = new Set(inputs[name].columns);
    const missing = REQUIRED_COLUMNS[name].filter(col => !present.has(col));
    if (missing.length > 0) {
      throw new MissingColumnsError(name, missing);
    }
  }
}

function appendColumns(columns: string[], added: readonly string[]): string[] {
  return [...columns, ...added.filter(col => !columns.includes(col))];
}

function renameColumns(table: DataTable): DataTable {
  const renames = new Map<string, string>();
  for (const col of table.columns) {
    const target = COLUMN_RENAMES.get(col);
    if (target && !table.columns.includes(target)) {
      renames.set(col, target);
    }
  }
  if (renames.size === 0) return table;

  const rows = table.rows.map(row => {
    const renamed: Row = {};
    for (const [col, value] of Object.entries(row)) {
      renamed[renames.get(col) ?? col] = value;
    }
    return renamed;
  });

  return { columns: table.columns.map(col => renames.get(col) ?? col), rows };
}

/**
 * Enrich MATT sales rows and report rows whose community key was blanked
 */
export function transformWithReport(
  sales: DataTable,
  hub: DataTable,
  plan: DataTable,
  options: TransformOptions = {}
): TransformResult {
  const investorNames = options.investorNames ?? DEFAULT_INVESTOR_NAMES;
  const policy = options.invalidCommunity ?? 'fail';
  const issues: RowIssue[] = [];

  validateInputs({ sales, hub, plan });

  // The extract's own Textbox4/Textbox22 are renamed before joining so a
  // plan table that also carries Textbox4 cannot collide with them.
  const salesRenamed = renameColumns(sales);

  // Step 1: community join key
  const keyed: DataTable = {
    columns: appendColumns(salesRenamed.columns, [COMMUNITY_NUMBER]),
    rows: salesRenamed.rows.map((row, index) => {
      const parsed = parseCommunityNumber(row['COMMUNITY']);
      if (parsed.ok) {
        return { ...row, [COMMUNITY_NUMBER]: parsed.value };
      }
      if (policy === 'fail') {
        throw new InvalidCommunityError(index, row['COMMUNITY'] ?? null, parsed.reason);
      }
      issues.push({
        row: index,
        column: 'COMMUNITY',
        value: row['COMMUNITY'] ?? null,
        message: parsed.reason
      });
      return { ...row, [COMMUNITY_NUMBER]: null };
    })
  };

  // Steps 2-3: reference lookups
  const withHub = leftJoin(keyed, hub, {
    leftKey: row => toIntegerKey(row[COMMUNITY_NUMBER]),
    rightKey: row => toIntegerKey(row['Community Number'])
  });
  const withPlan = leftJoin(withHub, plan, {
    leftKey: row => normalizePlanCode(row['PLAN_CODE']),
    rightKey: row => normalizePlanCode(row['Plan Code'])
  });

  // Step 4: reference-side renames (skipped when the extract already supplied HS_TYPE)
  const renamed = renameColumns(withPlan);
  const hasEstimatedClose = renamed.columns.includes('EST_COE_DATE');

  // Steps 5-11: derived columns
  const rows = renamed.rows.map(source => {
    const row: Row = { ...source };

    for (const col of TRIMMED_COLUMNS) {
      const value = row[col];
      if (typeof value === 'string') row[col] = value.trim();
    }

    const saleDate = parseReportDate(source['SALE_DATE']);
    row['SALE_DATE'] = saleDate;
    if (hasEstimatedClose) {
      row['EST_COE_DATE'] = parseReportDate(source['EST_COE_DATE']);
    }

    const dayName = weekdayName(saleDate);
    row['DOW_Sale'] = dayName;
    row['Weekday_Group'] = weekdayGroup(dayName);

    row['Investor Sale'] = classifyInvestor(source['NHC_NAME'], investorNames);

    const cancellation = cellToText(source['SALES_CANCELLATION_DATE']).trim();
    row['SALES_CANCELLATION_DATE'] = cancellation;
    row['SALES_CANCELLATION_DATE_PARSED'] = parseReportDate(cancellation);

    row['Realtor/Direct'] = realtorOrDirect(source['COBROKE_Y_N']);
    row['HS_TYPE_LABEL'] = homesiteStatusLabel(source['HS_TYPE'] ?? null);

    return row;
  });

  return {
    table: { columns: appendColumns(renamed.columns, DERIVED_COLUMNS), rows },
    issues
  };
}

/**
 * Enrich MATT sales rows with hub and plan attributes and derived columns
 */
export function transform(
  sales: DataTable,
  hub: DataTable,
  plan: DataTable,
  options: TransformOptions = {}
): DataTable {
  return transformWithReport(sales, hub, plan, options).table;
}

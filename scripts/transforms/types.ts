export type Cell = string | number | Date | null;

export type Row = Record<string, Cell>;

/**
 * In-memory table. Columns are tracked separately from rows so an empty
 * table still carries its header.
 */
export interface DataTable {
  columns: string[];
  rows: Row[];
}

export type InvestorTag = 'Investor' | 'Retail';

export type WeekdayGroup = 'Sat-Sun' | 'M-F';

export type RealtorDirect = 'Realtor' | 'Direct';

/** What to do with a COMMUNITY value that has no 5-digit prefix */
export type InvalidCommunityPolicy = 'fail' | 'null';

export interface RowIssue {
  row: number;
  column: string;
  value: Cell;
  message: string;
}

import * as sql from 'mssql';
import { ETLConfig, getSqlConfig } from './config-loader';
import { formatCell } from './csv-io';
import { retryWithBackoff } from './error-handler';
import { DataTable } from '../transforms/types';

export interface SqlExportResult {
  tableName: string;
  rowsInserted: number;
  duration: number; // seconds
}

/**
 * Build an mssql bulk table from an enriched table. Every column is loaded
 * as nullable NVARCHAR(MAX); dates use the same text form as the CSV output.
 */
export function buildBulkTable(tableName: string, data: DataTable): sql.Table {
  const table = new sql.Table(tableName);
  table.create = true;

  for (const col of data.columns) {
    table.columns.add(col, sql.NVarChar(sql.MAX), { nullable: true });
  }

  for (const row of data.rows) {
    table.rows.add(...data.columns.map(col => {
      const value = row[col] ?? null;
      return value === null ? null : formatCell(value);
    }));
  }

  return table;
}

/**
 * Bulk insert the enriched table into SQL Server (output.sqlTable)
 */
export async function exportToSqlServer(config: ETLConfig, data: DataTable): Promise<SqlExportResult> {
  const tableName = config.output.sqlTable;
  if (!tableName) {
    throw new Error('output.sqlTable is not configured');
  }

  const startTime = Date.now();
  const pool = await retryWithBackoff(() => new sql.ConnectionPool(getSqlConfig(config)).connect());

  try {
    const rowsInserted = await bulkInsertInTransaction(pool, buildBulkTable(tableName, data));

    return {
      tableName,
      rowsInserted,
      duration: (Date.now() - startTime) / 1000
    };
  } finally {
    await pool.close();
  }
}

/**
 * Run one bulk load inside a transaction. The load is not retried: a timeout
 * after the server committed would insert every row twice.
 */
export async function bulkInsertInTransaction(pool: sql.ConnectionPool, bulkTable: sql.Table): Promise<number> {
  const transaction = new sql.Transaction(pool);
  await transaction.begin();

  try {
    const result = await new sql.Request(transaction).bulk(bulkTable);
    await transaction.commit();
    return result.rowsAffected;
  } catch (error) {
    await transaction.rollback();
    throw error;
  }
}

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { formatCell, parseCsvTable, readCsvTable, stringifyCsvTable, writeCsvTable } from '../csv-io';

describe('CSV IO', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'matt-csv-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  test('parses a header row, strips the BOM and trims header names', () => {
    const content = '\uFEFFCOMMUNITY, NHC_NAME \n55501AB,"PEREZ, LARRY"\n\n55502,\n';

    const table = parseCsvTable(content);

    expect(table.columns).toEqual(['COMMUNITY', 'NHC_NAME']);
    expect(table.rows).toEqual([
      { COMMUNITY: '55501AB', NHC_NAME: 'PEREZ, LARRY' },
      { COMMUNITY: '55502', NHC_NAME: null }
    ]);
  });

  test('keeps padding inside values', () => {
    const table = parseCsvTable('NHC_NAME\n"Krueger, Cole      (HOU)"\n');

    expect(table.rows[0]['NHC_NAME']).toBe('Krueger, Cole      (HOU)');
  });

  test('keeps the header of a file without data rows', () => {
    expect(parseCsvTable('Plan Code,Plan Name\n')).toEqual({ columns: ['Plan Code', 'Plan Name'], rows: [] });
  });

  test('formats cells for output', () => {
    expect(formatCell(null)).toBe('');
    expect(formatCell(55501)).toBe('55501');
    expect(formatCell('North')).toBe('North');
    expect(formatCell(new Date(2023, 6, 8))).toBe('2023-07-08');
    expect(formatCell(new Date(2023, 6, 8, 13, 5))).toBe('2023-07-08T13:05:00');
  });

  test('writes the header and quotes values that need it', () => {
    const csv = stringifyCsvTable({
      columns: ['Comm_#', 'SALE_DATE', 'Hub', 'NHC_NAME'],
      rows: [{ 'Comm_#': 55501, SALE_DATE: new Date(2023, 6, 8), Hub: null, NHC_NAME: 'PEREZ, LARRY' }]
    });

    expect(csv).toBe('Comm_#,SALE_DATE,Hub,NHC_NAME\n55501,2023-07-08,,"PEREZ, LARRY"\n');
  });

  test('writes into a new directory and reads the file back', async () => {
    const file = path.join(tmpDir, 'nested', 'enriched.csv');

    await writeCsvTable(file, {
      columns: ['Comm_#', 'Hub'],
      rows: [{ 'Comm_#': 55501, Hub: 'North' }, { 'Comm_#': 55502, Hub: null }]
    });
    const table = await readCsvTable(file);

    expect(table).toEqual({
      columns: ['Comm_#', 'Hub'],
      rows: [{ 'Comm_#': '55501', Hub: 'North' }, { 'Comm_#': '55502', Hub: null }]
    });
  });
});

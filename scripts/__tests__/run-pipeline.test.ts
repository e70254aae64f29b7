/**
 * End-to-end run over CSV files in a temp directory
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { DEFAULT_CONFIG, ETLConfig } from '../lib/config-loader';
import { InvalidCommunityError } from '../lib/error-handler';
import { parseArgs, runPipeline } from '../run-pipeline';

const MATT_CSV = [
  'COMMUNITY,PLAN_CODE,SALE_DATE,SALES_CANCELLATION_DATE,NHC_NAME,COBROKE_Y_N',
  '55501AB,P9,2023-07-08, ,"PEREZ, LARRY",Y',
  '55502XY,P10,7/10/2023,,"Smith, Jo",',
  ''
].join('\n');

const HUB_CSV = [
  'Community Number,Community Name,Hub',
  '55501,Lakeside,North',
  ''
].join('\n');

const PLAN_CSV = [
  'Plan Code,Plan Name,Collection,Core,Textbox4',
  'P9,Classic,Signature,Yes,B',
  ''
].join('\n');

describe('MATT pipeline', () => {
  let tmpDir: string;
  let config: ETLConfig;

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'matt-pipeline-'));
    fs.writeFileSync(path.join(tmpDir, 'matt.csv'), MATT_CSV);
    fs.writeFileSync(path.join(tmpDir, 'hub.csv'), HUB_CSV);
    fs.writeFileSync(path.join(tmpDir, 'plan.csv'), PLAN_CSV);

    config = {
      ...DEFAULT_CONFIG,
      inputFiles: {
        matt: path.join(tmpDir, 'matt.csv'),
        hub: path.join(tmpDir, 'hub.csv'),
        plan: path.join(tmpDir, 'plan.csv'),
      },
      output: {
        csvPath: path.join(tmpDir, 'out', 'matt-enriched.csv'),
        sqlTable: null,
      },
    };
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
    jest.restoreAllMocks();
  });

  test('writes the enriched CSV', async () => {
    const summary = await runPipeline(config, { dryRun: false });

    expect(summary.inputRows).toBe(2);
    expect(summary.outputRows).toBe(2);
    expect(summary.investorSales).toBe(1);
    expect(summary.issues).toEqual([]);
    expect(summary.outputPath).toBe(config.output.csvPath);
    expect(summary.sqlRowsInserted).toBeNull();

    const lines = fs.readFileSync(config.output.csvPath, 'utf-8').split('\n');
    expect(lines).toEqual([
      'COMMUNITY,PLAN_CODE,SALE_DATE,SALES_CANCELLATION_DATE,NHC_NAME,COBROKE_Y_N,Comm_#,Community Number,Community Name,Hub,Plan Code,Plan Name,Collection,Core,HS_TYPE,DOW_Sale,Weekday_Group,Investor Sale,SALES_CANCELLATION_DATE_PARSED,Realtor/Direct,HS_TYPE_LABEL',
      '55501AB,P9,2023-07-08,,"PEREZ, LARRY",Y,55501,55501,Lakeside,North,P9,Classic,Signature,Yes,B,Saturday,Sat-Sun,Investor,,Realtor,Backlog',
      '55502XY,P10,2023-07-10,,"Smith, Jo",,55502,,,,,,,,,Monday,M-F,Retail,,Direct,',
      ''
    ]);
  });

  test('dry run writes nothing', async () => {
    const summary = await runPipeline(config, { dryRun: true });

    expect(summary.outputPath).toBeNull();
    expect(fs.existsSync(config.output.csvPath)).toBe(false);
  });

  test('uses an investor list file from config', async () => {
    const namesFile = path.join(tmpDir, 'names.json');
    fs.writeFileSync(namesFile, JSON.stringify(['Smith, Jo']));

    const summary = await runPipeline(
      { ...config, transform: { ...config.transform, investorNamesFile: namesFile } },
      { dryRun: true }
    );

    expect(summary.table.rows.map(row => row['Investor Sale'])).toEqual(['Retail', 'Investor']);
  });

  test('fails on a malformed COMMUNITY by default and collects it under the null policy', async () => {
    fs.appendFileSync(path.join(tmpDir, 'matt.csv'), '12,P9,2023-07-09,,"Roe, Sam",\n');

    await expect(runPipeline(config, { dryRun: true })).rejects.toThrow(InvalidCommunityError);

    const summary = await runPipeline(
      { ...config, transform: { ...config.transform, invalidCommunity: 'null' } },
      { dryRun: true }
    );
    expect(summary.outputRows).toBe(3);
    expect(summary.issues).toEqual([
      { row: 2, column: 'COMMUNITY', value: '12', message: 'fewer than 5 characters' }
    ]);
  });
});

describe('parseArgs', () => {
  test('maps flags to config overrides', () => {
    const { overrides, dryRun } = parseArgs([
      '--matt', 'matt.csv',
      '--output', 'out.csv',
      '--invalid-community', 'null',
      '--sql-table', 'dbo.MattEnriched',
      '--dry-run',
      '--debug'
    ]);

    expect(dryRun).toBe(true);
    expect(overrides.inputFiles?.matt).toBe('matt.csv');
    expect(overrides.inputFiles?.hub).toBeUndefined();
    expect(overrides.output?.csvPath).toBe('out.csv');
    expect(overrides.output?.sqlTable).toBe('dbo.MattEnriched');
    expect(overrides.transform?.invalidCommunity).toBe('null');
    expect(overrides.debugMode).toBe(true);
  });

  test('rejects a flag without a value', () => {
    expect(() => parseArgs(['--matt', '--dry-run'])).toThrow('--matt requires a value');
  });

  test('rejects an unknown policy', () => {
    expect(() => parseArgs(['--invalid-community', 'skip'])).toThrow('invalidCommunity must be "fail" or "null", got "skip"');
  });
});

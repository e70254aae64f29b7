import * as fs from 'fs';
import * as path from 'path';
import * as sql from 'mssql';
import { isUndefined, omitBy } from 'lodash';
import { ConfigError } from './error-handler';
import { InvalidCommunityPolicy } from '../transforms/types';

export interface ETLConfig {
  database: {
    connectionString: string;
  };
  inputFiles: {
    matt: string;
    hub: string;
    plan: string;
  };
  output: {
    csvPath: string;
    sqlTable: string | null; // null = no SQL Server export
  };
  transform: {
    investorNamesFile: string | null; // null = embedded default list
    invalidCommunity: InvalidCommunityPolicy;
  };
  debugMode: boolean;
}

export interface ConfigOverrides {
  database?: Partial<ETLConfig['database']>;
  inputFiles?: Partial<ETLConfig['inputFiles']>;
  output?: Partial<ETLConfig['output']>;
  transform?: Partial<ETLConfig['transform']>;
  debugMode?: boolean;
}

export const DEFAULT_CONFIG: ETLConfig = {
  database: {
    connectionString: ''
  },
  inputFiles: {
    matt: path.join('data', 'Homesite Detail Data (MATT).csv'),
    hub: path.join('data', 'Hub.csv'),
    plan: path.join('data', 'Plan.csv')
  },
  output: {
    csvPath: path.join('output', 'matt-enriched.csv'),
    sqlTable: null
  },
  transform: {
    investorNamesFile: null,
    invalidCommunity: 'fail'
  },
  debugMode: false
};

/**
 * Parse a SQL Server connection string into mssql config
 * Format: Server=...;Database=...;User Id=...;Password=...;TrustServerCertificate=...;Encrypt=...;
 */
function parseConnectionString(connStr: string): Partial<sql.config> {
  const parts: Record<string, string> = {};
  connStr.split(';').forEach(part => {
    const [key, ...valueParts] = part.split('=');
    if (key && valueParts.length > 0) {
      parts[key.trim().toLowerCase()] = valueParts.join('=').trim();
    }
  });

  return {
    server: parts['server'] || parts['data source'],
    database: parts['database'] || parts['initial catalog'],
    user: parts['user id'] || parts['uid'] || parts['user'],
    password: parts['password'] || parts['pwd'],
    options: {
      encrypt: parts['encrypt']?.toLowerCase() !== 'false',
      trustServerCertificate: parts['trustservercertificate']?.toLowerCase() === 'true',
    }
  };
}

export function parseInvalidCommunityPolicy(value: string): InvalidCommunityPolicy {
  if (value === 'fail' || value === 'null') {
    return value;
  }
  throw new ConfigError([`invalidCommunity must be "fail" or "null", got "${value}"`]);
}

/**
 * Load ETL configuration from appsettings.json and environment variables
 *
 * Priority:
 * 1. Command-line overrides (passed as parameter)
 * 2. Environment variables (.env is loaded into these by the caller)
 * 3. appsettings.json in the working directory
 * 4. Default values
 */
export function loadConfig(
  overrides?: ConfigOverrides,
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): ETLConfig {
  const configPath = path.join(cwd, 'appsettings.json');
  let fileConfig: ConfigOverrides = {};

  if (fs.existsSync(configPath)) {
    try {
      fileConfig = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
    } catch (error) {
      console.warn(`⚠️  Warning: Failed to parse appsettings.json: ${error}`);
    }
  }

  const invalidCommunity =
    overrides?.transform?.invalidCommunity ??
    env.INVALID_COMMUNITY ??
    fileConfig.transform?.invalidCommunity ??
    DEFAULT_CONFIG.transform.invalidCommunity;

  const config: ETLConfig = {
    database: {
      connectionString: env.SQLSERVER || fileConfig.database?.connectionString || DEFAULT_CONFIG.database.connectionString
    },
    inputFiles: {
      matt: env.INPUT_MATT || fileConfig.inputFiles?.matt || DEFAULT_CONFIG.inputFiles.matt,
      hub: env.INPUT_HUB || fileConfig.inputFiles?.hub || DEFAULT_CONFIG.inputFiles.hub,
      plan: env.INPUT_PLAN || fileConfig.inputFiles?.plan || DEFAULT_CONFIG.inputFiles.plan,
    },
    output: {
      csvPath: env.OUTPUT_CSV || fileConfig.output?.csvPath || DEFAULT_CONFIG.output.csvPath,
      sqlTable: env.OUTPUT_SQL_TABLE || fileConfig.output?.sqlTable || DEFAULT_CONFIG.output.sqlTable,
    },
    transform: {
      investorNamesFile: env.INVESTOR_NAMES_FILE || fileConfig.transform?.investorNamesFile || DEFAULT_CONFIG.transform.investorNamesFile,
      invalidCommunity: parseInvalidCommunityPolicy(invalidCommunity),
    },
    debugMode: env.DEBUG_MODE === 'true' || fileConfig.debugMode || DEFAULT_CONFIG.debugMode
  };

  if (overrides) {
    if (overrides.database?.connectionString) {
      config.database.connectionString = overrides.database.connectionString;
    }
    if (overrides.inputFiles) {
      Object.assign(config.inputFiles, omitBy(overrides.inputFiles, isUndefined));
    }
    if (overrides.output) {
      Object.assign(config.output, omitBy(overrides.output, isUndefined));
    }
    if (overrides.transform?.investorNamesFile !== undefined) {
      config.transform.investorNamesFile = overrides.transform.investorNamesFile;
    }
    config.debugMode = overrides.debugMode ?? config.debugMode;
  }

  return config;
}

/**
 * Convert ETL config to mssql config
 */
export function getSqlConfig(config: ETLConfig): sql.config {
  if (!config.database.connectionString) {
    throw new ConfigError(['Database connection string is required']);
  }

  const parsed = parseConnectionString(config.database.connectionString);

  if (!parsed.server || !parsed.database || !parsed.user || !parsed.password) {
    throw new ConfigError(['Invalid connection string. Expected format: Server=...;Database=...;User Id=...;Password=...;TrustServerCertificate=True;Encrypt=True;']);
  }

  return {
    server: parsed.server,
    database: parsed.database,
    user: parsed.user,
    password: parsed.password,
    options: {
      encrypt: parsed.options?.encrypt ?? true,
      trustServerCertificate: parsed.options?.trustServerCertificate ?? true,
    },
    requestTimeout: 300000,
    connectionTimeout: 30000,
  };
}

/**
 * Validate configuration
 */
export function validateConfig(config: ETLConfig): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  if (!config.inputFiles.matt) errors.push('MATT input file is required');
  if (!config.inputFiles.hub) errors.push('Hub input file is required');
  if (!config.inputFiles.plan) errors.push('Plan input file is required');
  if (!config.output.csvPath) errors.push('Output CSV path is required');

  if (config.output.sqlTable && !config.database.connectionString) {
    errors.push('Database connection string is required when output.sqlTable is set');
  }

  return {
    valid: errors.length === 0,
    errors
  };
}

/**
 * Print configuration (for debugging, masks sensitive data)
 */
export function printConfig(config: ETLConfig): void {
  const masked: ETLConfig = {
    ...config,
    database: {
      connectionString: config.database.connectionString.replace(/Password=[^;]+/i, 'Password=***')
    }
  };

  console.log('\n📋 ETL Configuration:');
  console.log('════════════════════════════════════════════════════════════════');
  console.log(JSON.stringify(masked, null, 2));
  console.log('════════════════════════════════════════════════════════════════\n');
}

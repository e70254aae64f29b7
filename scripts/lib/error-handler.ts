/**
 * Error Handler for the MATT ETL
 * Typed pipeline errors, classification, and retry logic for transient failures
 */

export type ErrorCategory =
  | 'schema'
  | 'data'
  | 'config'
  | 'io'
  | 'connection'
  | 'timeout'
  | 'deadlock'
  | 'unknown';

export interface ErrorClassification {
  isTransient: boolean;
  isRecoverable: boolean;
  category: ErrorCategory;
  message: string;
  suggestion: string;
}

/**
 * Base class for errors raised by the pipeline itself
 */
export class EtlError extends Error {
  readonly category: ErrorCategory;

  constructor(message: string, category: ErrorCategory) {
    super(message);
    this.name = new.target.name;
    this.category = category;
  }
}

export class MissingColumnsError extends EtlError {
  readonly table: string;
  readonly missingColumns: string[];

  constructor(table: string, missingColumns: string[]) {
    super(`Input table "${table}" is missing required columns: ${missingColumns.join(', ')}`, 'schema');
    this.table = table;
    this.missingColumns = missingColumns;
  }
}

export class InvalidCommunityError extends EtlError {
  readonly row: number;
  readonly value: unknown;

  constructor(row: number, value: unknown, reason: string) {
    super(`Row ${row}: cannot derive Comm_# from COMMUNITY ${JSON.stringify(value)} (${reason})`, 'data');
    this.row = row;
    this.value = value;
  }
}

export class ConfigError extends EtlError {
  readonly errors: string[];

  constructor(errors: string[]) {
    super(`Invalid configuration: ${errors.join('; ')}`, 'config');
    this.errors = errors;
  }
}

interface ErrorDetails {
  message: string;
  code?: string | number;
  stack?: string;
}

function errorDetails(error: unknown): ErrorDetails {
  if (error instanceof Error) {
    const details: ErrorDetails = { message: error.message, stack: error.stack };
    const code = 'code' in error ? error.code : 'number' in error ? error.number : undefined;
    if (typeof code === 'string' || typeof code === 'number') {
      details.code = code;
    }
    return details;
  }
  return { message: String(error) };
}

/**
 * Classify an error to determine if it's transient and recoverable
 */
export function classifyError(error: unknown): ErrorClassification {
  if (error instanceof EtlError) {
    switch (error.category) {
      case 'schema':
        return {
          isTransient: false,
          isRecoverable: false,
          category: 'schema',
          message: error.message,
          suggestion: 'Check that the export is a MATT report and the reference files have the expected headers'
        };
      case 'data':
        return {
          isTransient: false,
          isRecoverable: true,
          category: 'data',
          message: error.message,
          suggestion: 'Fix the source row, or rerun with --invalid-community null to skip the hub lookup for it'
        };
      case 'config':
        return {
          isTransient: false,
          isRecoverable: true,
          category: 'config',
          message: error.message,
          suggestion: 'Review appsettings.json, .env and command-line options'
        };
      default:
        break;
    }
  }

  const { message, code } = errorDetails(error);

  if (
    code === 'ENOENT' ||
    code === 'EACCES' ||
    code === 'EISDIR'
  ) {
    return {
      isTransient: false,
      isRecoverable: true,
      category: 'io',
      message: 'File could not be read or written',
      suggestion: 'Check the input and output paths'
    };
  }

  // SQL Server connection errors (transient)
  if (
    code === 'ECONNRESET' ||
    code === 'ETIMEDOUT' ||
    code === 'ENOTFOUND' ||
    code === 'ECONNREFUSED' ||
    code === 'ESOCKET' ||
    message.includes('Connection lost') ||
    message.includes('socket hang up')
  ) {
    return {
      isTransient: true,
      isRecoverable: true,
      category: 'connection',
      message: 'Database connection error',
      suggestion: 'Retrying with exponential backoff'
    };
  }

  // SQL Server timeout errors (transient)
  if (
    code === -2 ||
    code === 'ETIMEOUT' ||
    message.includes('Timeout') ||
    message.includes('timeout')
  ) {
    return {
      isTransient: true,
      isRecoverable: true,
      category: 'timeout',
      message: 'Query timeout',
      suggestion: 'Consider increasing requestTimeout'
    };
  }

  if (
    code === 1205 || // Deadlock victim
    message.includes('deadlock')
  ) {
    return {
      isTransient: true,
      isRecoverable: true,
      category: 'deadlock',
      message: 'Transaction deadlock detected',
      suggestion: 'Retrying transaction'
    };
  }

  return {
    isTransient: false,
    isRecoverable: true,
    category: 'unknown',
    message,
    suggestion: 'Review error details and logs'
  };
}

/**
 * Retry a function with exponential backoff
 */
export async function retryWithBackoff<T>(
  fn: () => Promise<T>,
  options: {
    maxRetries?: number;
    baseDelay?: number; // milliseconds
    maxDelay?: number; // milliseconds
    onRetry?: (attempt: number, error: unknown) => void;
  } = {}
): Promise<T> {
  const {
    maxRetries = 3,
    baseDelay = 1000,
    maxDelay = 30000,
    onRetry
  } = options;

  let lastError: unknown;

  for (let attempt = 1; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      const classification = classifyError(error);

      if (!classification.isTransient || attempt === maxRetries) {
        throw error;
      }

      const exponentialDelay = Math.min(baseDelay * Math.pow(2, attempt - 1), maxDelay);
      const jitter = Math.random() * 0.3 * exponentialDelay;
      const delay = exponentialDelay + jitter;

      if (onRetry) {
        onRetry(attempt, error);
      }

      console.log(`  ⚠️  ${classification.message} (attempt ${attempt}/${maxRetries})`);
      console.log(`     ${classification.suggestion}`);
      console.log(`     Retrying in ${(delay / 1000).toFixed(1)}s...`);

      await sleep(delay);
    }
  }

  throw lastError;
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Format error for logging
 */
export function formatError(error: unknown): string {
  const classification = classifyError(error);
  const { code, stack } = errorDetails(error);

  let formatted = `\n╔════════════════════════════════════════════════════════════════╗\n`;
  formatted += `║  ERROR DETAILS                                                 ║\n`;
  formatted += `╚════════════════════════════════════════════════════════════════╝\n`;
  formatted += `  Category:    ${classification.category}\n`;
  formatted += `  Transient:   ${classification.isTransient ? 'Yes' : 'No'}\n`;
  formatted += `  Recoverable: ${classification.isRecoverable ? 'Yes' : 'No'}\n`;
  formatted += `  Message:     ${classification.message}\n`;
  formatted += `  Suggestion:  ${classification.suggestion}\n`;

  if (error instanceof MissingColumnsError) {
    formatted += `  Table:       ${error.table}\n`;
    formatted += `  Missing:     ${error.missingColumns.join(', ')}\n`;
  }

  if (error instanceof InvalidCommunityError) {
    formatted += `  Row:         ${error.row}\n`;
  }

  if (code !== undefined) {
    formatted += `  Error Code:  ${code}\n`;
  }

  if (stack) {
    formatted += `\n  Stack Trace:\n`;
    formatted += `  ${stack.split('\n').join('\n  ')}\n`;
  }

  return formatted;
}

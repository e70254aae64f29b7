import {
  ConfigError,
  InvalidCommunityError,
  MissingColumnsError,
  classifyError,
  formatError,
  retryWithBackoff
} from '../error-handler';

function codedError(message: string, code: string): Error {
  return Object.assign(new Error(message), { code });
}

describe('Error handler', () => {
  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('classifyError', () => {
    test('missing columns are fatal schema errors', () => {
      const classification = classifyError(new MissingColumnsError('hub', ['Hub']));

      expect(classification.category).toBe('schema');
      expect(classification.isTransient).toBe(false);
      expect(classification.isRecoverable).toBe(false);
      expect(classification.message).toBe('Input table "hub" is missing required columns: Hub');
    });

    test('malformed community rows are data errors', () => {
      const classification = classifyError(new InvalidCommunityError(4, '12', 'fewer than 5 characters'));

      expect(classification.category).toBe('data');
      expect(classification.isTransient).toBe(false);
      expect(classification.isRecoverable).toBe(true);
    });

    test('config errors', () => {
      expect(classifyError(new ConfigError(['bad'])).category).toBe('config');
    });

    test('connection resets are transient', () => {
      const classification = classifyError(codedError('read ECONNRESET', 'ECONNRESET'));

      expect(classification.category).toBe('connection');
      expect(classification.isTransient).toBe(true);
    });

    test('missing files are io errors', () => {
      expect(classifyError(codedError('no such file', 'ENOENT')).category).toBe('io');
    });

    test('anything else is unknown', () => {
      const classification = classifyError('boom');

      expect(classification.category).toBe('unknown');
      expect(classification.message).toBe('boom');
    });
  });

  describe('retryWithBackoff', () => {
    test('retries transient failures', async () => {
      const onRetry = jest.fn();
      let calls = 0;

      const result = await retryWithBackoff(async () => {
        calls++;
        if (calls === 1) throw codedError('socket hang up', 'ECONNRESET');
        return 'done';
      }, { baseDelay: 1, onRetry });

      expect(result).toBe('done');
      expect(calls).toBe(2);
      expect(onRetry).toHaveBeenCalledTimes(1);
    });

    test('does not retry non-transient failures', async () => {
      const fn = jest.fn(async () => {
        throw new MissingColumnsError('sales', ['NHC_NAME']);
      });

      await expect(retryWithBackoff(fn, { baseDelay: 1 })).rejects.toThrow(MissingColumnsError);
      expect(fn).toHaveBeenCalledTimes(1);
    });

    test('gives up after maxRetries', async () => {
      const fn = jest.fn(async () => {
        throw codedError('Connection lost', 'ESOCKET');
      });

      await expect(retryWithBackoff(fn, { baseDelay: 1, maxRetries: 2 })).rejects.toThrow('Connection lost');
      expect(fn).toHaveBeenCalledTimes(2);
    });
  });

  describe('formatError', () => {
    test('includes the table and missing columns', () => {
      const formatted = formatError(new MissingColumnsError('sales', ['NHC_NAME', 'SALE_DATE']));

      expect(formatted).toContain('  Category:    schema\n');
      expect(formatted).toContain('  Table:       sales\n');
      expect(formatted).toContain('  Missing:     NHC_NAME, SALE_DATE\n');
    });

    test('includes the row of a malformed community', () => {
      const formatted = formatError(new InvalidCommunityError(7, 'AB', 'fewer than 5 characters'));

      expect(formatted).toContain('  Row:         7\n');
    });

    test('includes error codes', () => {
      expect(formatError(codedError('read ECONNRESET', 'ECONNRESET'))).toContain('  Error Code:  ECONNRESET\n');
    });
  });
});

import { describe, it, expect } from 'vitest';
import {
  ConfigurationError,
  describeError,
  isTransientSinkError,
  SinkUnavailableError,
  SourceUnavailableError,
} from '../src/core/errors';

const withCode = (code: string, message = 'sink error') => Object.assign(new Error(message), { code });

describe('isTransientSinkError', () => {
  it.each(['ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT', '08006', '08001', '53300', '57P01', '40001', '40P01'])(
    'treats %s as transient',
    (code) => {
      expect(isTransientSinkError(withCode(code))).toBe(true);
    }
  );

  it.each(['23505', '23514', '22P02', '42P01', 'XX000'])('treats %s as permanent', (code) => {
    expect(isTransientSinkError(withCode(code))).toBe(false);
  });

  it('recognises dropped connections by message', () => {
    expect(isTransientSinkError(new Error('Connection terminated unexpectedly'))).toBe(true);
    expect(isTransientSinkError(new Error('timeout exceeded when trying to connect'))).toBe(true);
    expect(isTransientSinkError(new Error('relation "trips" does not exist'))).toBe(false);
  });

  it('ignores values that are not errors', () => {
    expect(isTransientSinkError('ECONNRESET')).toBe(false);
    expect(isTransientSinkError(null)).toBe(false);
  });
});

describe('describeError', () => {
  it('uses the ETL error code', () => {
    expect(describeError(new SourceUnavailableError('/data/trips.csv'))).toEqual({
      code: 'SourceUnavailable',
      message: 'Input source cannot be opened: /data/trips.csv',
    });
  });

  it('falls back to the driver code or error name', () => {
    expect(describeError(withCode('23505', 'duplicate key'))).toEqual({ code: '23505', message: 'duplicate key' });
    expect(describeError(new TypeError('bad'))).toEqual({ code: 'TypeError', message: 'bad' });
    expect(describeError(42)).toEqual({ code: 'Unknown', message: '42' });
  });
});

describe('ETL errors', () => {
  it('lists every configuration issue in the message', () => {
    const error = new ConfigurationError(['--input (ETL_INPUT) is required', '--table (ETL_TABLE) is required']);

    expect(error.code).toBe('ConfigurationError');
    expect(error.name).toBe('ConfigurationError');
    expect(error.message).toBe(
      'Invalid ETL configuration:\n  - --input (ETL_INPUT) is required\n  - --table (ETL_TABLE) is required'
    );
  });

  it('carries the partial load result and cause', () => {
    const cause = withCode('08006');
    const partial = { inserted: 4, batches: 1, fallbackBatches: 1, failed: [] };
    const error = new SinkUnavailableError('Sink unreachable', partial, cause);

    expect(error.partial).toBe(partial);
    expect(error.cause).toBe(cause);
    expect(error).toBeInstanceOf(Error);
  });
});

import { describe, expect, it } from 'vitest';
import { ConnectorError, wrapError } from '../src/index.js';

function errnoError(code: string, message: string): Error {
  return Object.assign(new Error(message), { code });
}

describe('ConnectorError', () => {
  it('prints code, source, message and hint', () => {
    const error = new ConnectorError({
      code: 'SCHEMA_MISMATCH',
      message: 'Unsafe CSV header name: __proto__',
      source: 'bookings.csv',
      suggestion: 'Rename the column.',
    });

    expect(error.toActionableMessage()).toBe(
      '[SCHEMA_MISMATCH] bookings.csv: Unsafe CSV header name: __proto__\nHint: Rename the column.'
    );
  });

  it('falls back to the default hint for the code', () => {
    const error = new ConnectorError({ code: 'UNSUPPORTED_FORMAT', message: 'Unsupported booking file' });

    expect(error.suggestion).toBe('Use a .csv, .json or .xlsx booking file.');
    expect(error.toActionableMessage()).toBe(
      '[UNSUPPORTED_FORMAT] Unsupported booking file\nHint: Use a .csv, .json or .xlsx booking file.'
    );
  });

  it('prints a single line without a hint', () => {
    const error = new ConnectorError({ code: 'VALIDATION_ERROR', message: 'bad', source: 'ts.json' });

    expect(error.toActionableMessage()).toBe('[VALIDATION_ERROR] ts.json: bad');
  });

  it('serializes only the fields that are set', () => {
    const error = new ConnectorError({ code: 'READ_FAILED', message: 'x', context: { row: 2 } });

    expect(error.toJSON()).toEqual({
      name: 'ConnectorError',
      code: 'READ_FAILED',
      message: 'x',
      context: { row: 2 },
    });
  });
});

describe('wrapError', () => {
  it('passes ConnectorErrors through', () => {
    const original = new ConnectorError({ code: 'READ_FAILED', message: 'x' });

    expect(wrapError(original)).toBe(original);
  });

  it('maps ENOENT to NOT_FOUND', () => {
    const error = wrapError(errnoError('ENOENT', 'no such file'), 'ts.json');

    expect(error).toMatchObject({
      code: 'NOT_FOUND',
      message: 'File not found: ts.json',
      source: 'ts.json',
      suggestion: 'Check that the file path is correct and the file exists.',
    });
  });

  it('maps EACCES to PERMISSION_DENIED', () => {
    const error = wrapError(errnoError('EACCES', 'permission denied'), 'bookings.csv');

    expect(error).toMatchObject({
      code: 'PERMISSION_DENIED',
      message: 'Cannot read file: bookings.csv',
    });
  });

  it('uses the fallback code for anything else', () => {
    expect(wrapError('boom', 'src')).toMatchObject({
      code: 'READ_FAILED',
      message: 'boom',
      source: 'src',
    });
    expect(wrapError(new Error('odd'), undefined, 'UNKNOWN')).toMatchObject({
      code: 'UNKNOWN',
      message: 'odd',
    });
  });
});

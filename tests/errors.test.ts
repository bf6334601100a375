import { describe, it, expect } from 'vitest';
import { inspect } from 'util';
import { TranslatorError, TranslatorErrorCode, toError } from '../src/errors.js';

describe('TranslatorError', () => {
  it('should carry its code, message and cause', () => {
    const cause = new Error('EACCES');
    const error = new TranslatorError(TranslatorErrorCode.SOURCE_READ_FAILED, 'Failed to read', cause);

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('TranslatorError');
    expect(error.code).toBe('TRANSLATOR_SOURCE_READ_FAILED');
    expect(error.message).toBe('Failed to read');
    expect(error.cause).toBe(cause);
  });

  it('should recognise its own instances', () => {
    expect(TranslatorError.isTranslatorError(new TranslatorError(TranslatorErrorCode.INVALID_CONFIG, 'x'))).toBe(true);
    expect(TranslatorError.isTranslatorError(new Error('x'))).toBe(false);
    expect(TranslatorError.isTranslatorError('x')).toBe(false);
  });

  it('should serialize without the cause', () => {
    const error = new TranslatorError(TranslatorErrorCode.INVALID_SOURCE_DATA, 'bad', new Error('inner'));
    expect(error.toJSON()).toEqual({
      name: 'TranslatorError',
      code: 'TRANSLATOR_INVALID_SOURCE_DATA',
      message: 'bad',
    });
  });

  it('should show the cause when inspected', () => {
    const error = new TranslatorError(TranslatorErrorCode.INVALID_SOURCE_DATA, 'bad', new Error('inner'));
    expect(inspect(error)).toBe('TranslatorError [TRANSLATOR_INVALID_SOURCE_DATA]: bad\n  Caused by: inner');
  });
});

describe('toError', () => {
  it('should keep errors and wrap everything else', () => {
    const original = new Error('kept');
    expect(toError(original)).toBe(original);
    expect(toError('text').message).toBe('text');
  });
});

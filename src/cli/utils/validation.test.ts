import { describe, it, expect } from 'vitest';
import { formatValidationError, validateExtensions, validateOutputFormat } from './validation';
import { ConfigurationError, ValidationError } from '../../utils/errors';

describe('validateOutputFormat', () => {
  it('accepts the known formats', () => {
    expect(validateOutputFormat('table')).toBe('table');
    expect(validateOutputFormat('json')).toBe('json');
  });
});

describe('validateExtensions', () => {
  it('accepts extensions with or without a leading dot', () => {
    expect(() => validateExtensions(['pdf', '.ai', 'tar.gz'])).not.toThrow();
  });

  it('rejects empty extensions and path separators', () => {
    expect(() => validateExtensions(['.'])).toThrow('File extension cannot be empty');
    expect(() => validateExtensions(['a/b'])).toThrow('Invalid file extension "a/b"');
  });
});

describe('formatValidationError', () => {
  it('labels errors by kind', () => {
    expect(formatValidationError(new ValidationError('bad'))).toBe('❌ Validation Error: bad');
    expect(formatValidationError(new ConfigurationError('missing'))).toBe('❌ Configuration Error: missing');
    expect(formatValidationError(new Error('boom'))).toBe('❌ Error: boom');
    expect(formatValidationError('odd')).toBe('❌ Unknown error: odd');
  });
});

import { ValidationError, ConfigurationError } from '../../utils/errors';
import { MAX_MEMBER_TIMEOUT_MS } from '../../types/config';

export type OutputFormat = 'table' | 'json';

const OUTPUT_FORMATS: OutputFormat[] = ['table', 'json'];

export function validateOutputFormat(format: string): OutputFormat {
  const match = OUTPUT_FORMATS.find(candidate => candidate === format);
  if (!match) {
    throw new ValidationError(`Invalid output format. Must be one of: ${OUTPUT_FORMATS.join(', ')}`);
  }
  return match;
}

export function validateExtensions(extensions: string[]): void {
  for (const ext of extensions) {
    const trimmed = ext.trim().replace(/^\.+/, '');
    if (trimmed.length === 0) {
      throw new ValidationError('File extension cannot be empty');
    }
    if (/[\\/\s]/.test(trimmed)) {
      throw new ValidationError(`Invalid file extension "${ext}"`);
    }
  }
}

export function validateSearchOptions(options: {
  concurrency?: number;
  timeoutSeconds?: number;
}): void {
  if (options.concurrency !== undefined) {
    if (!Number.isInteger(options.concurrency) || options.concurrency <= 0) {
      throw new ValidationError('Concurrency must be a positive integer');
    }
    if (options.concurrency > 20) {
      throw new ValidationError('Concurrency is too large (max: 20)');
    }
  }

  if (options.timeoutSeconds !== undefined) {
    if (!Number.isFinite(options.timeoutSeconds) || options.timeoutSeconds <= 0) {
      throw new ValidationError('Timeout must be a positive number of seconds');
    }
    const timeoutMs = Math.round(options.timeoutSeconds * 1000);
    if (timeoutMs < 1) {
      throw new ValidationError('Timeout must be at least one millisecond');
    }
    if (timeoutMs > MAX_MEMBER_TIMEOUT_MS) {
      throw new ValidationError(`Timeout is too large (max: ${Math.floor(MAX_MEMBER_TIMEOUT_MS / 1000)} seconds)`);
    }
  }
}

export function formatValidationError(error: unknown): string {
  if (error instanceof ValidationError) {
    return `❌ Validation Error: ${error.message}`;
  }

  if (error instanceof ConfigurationError) {
    return `❌ Configuration Error: ${error.message}`;
  }

  if (error instanceof Error) {
    return `❌ Error: ${error.message}`;
  }

  return `❌ Unknown error: ${String(error)}`;
}

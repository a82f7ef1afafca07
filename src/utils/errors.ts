export class TeamSearchError extends Error {
  constructor(message: string, public code?: string) {
    super(message);
    this.name = 'TeamSearchError';
  }
}

export class ConfigurationError extends TeamSearchError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigurationError';
  }
}

export class ApiError extends TeamSearchError {
  constructor(
    message: string,
    public provider?: string,
    public status?: number,
    public retryable: boolean = true
  ) {
    super(message, 'API_ERROR');
    this.name = 'ApiError';
  }
}

export class ValidationError extends TeamSearchError {
  constructor(message: string) {
    super(message, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

export class FileError extends TeamSearchError {
  constructor(message: string) {
    super(message, 'FILE_ERROR');
    this.name = 'FileError';
  }
}

export class TimeoutError extends TeamSearchError {
  constructor(message: string, public timeoutMs?: number) {
    super(message, 'TIMEOUT');
    this.name = 'TimeoutError';
  }
}

export class AbortError extends TeamSearchError {
  constructor(message: string = 'Operation aborted') {
    super(message, 'ABORTED');
    this.name = 'AbortError';
  }
}

/**
 * Reads the reason an AbortSignal was aborted with, falling back to a generic AbortError
 */
export function abortReason(signal: AbortSignal): Error {
  return signal.reason instanceof Error ? signal.reason : new AbortError();
}

import { Member } from '../types/search';
import { ImpersonationOptions, MemberStorage, TeamStorageProvider } from '../types/provider';
import { ApiError } from '../utils/errors';

export abstract class BaseStorageProvider implements TeamStorageProvider {
  abstract name: string;
  protected accessToken: string;

  constructor(accessToken: string) {
    this.accessToken = accessToken;
  }

  abstract listMembers(): Promise<Member[]>;
  abstract asMember(memberId: string, options?: ImpersonationOptions): MemberStorage;

  /**
   * Wrap a provider failure in an ApiError, deciding whether it is worth retrying
   */
  protected toApiError(error: unknown, operation: string, status?: number): ApiError {
    if (error instanceof ApiError) {
      return error;
    }

    const message = `${operation} failed: ${this.describeError(error)}`;
    const retryable = !this.isAuthError(error, status) && this.isTransientError(error, status);
    return new ApiError(message, this.name, status, retryable);
  }

  protected describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }

  /**
   * Check if error is authentication related
   */
  protected isAuthError(error: unknown, status?: number): boolean {
    if (status === 401 || status === 403) {
      return true;
    }
    const errorMessage = String(error).toLowerCase();
    return errorMessage.includes('unauthorized') ||
           errorMessage.includes('invalid_access_token') ||
           errorMessage.includes('authentication');
  }

  /**
   * Check if error is rate limit related
   */
  protected isRateLimitError(error: unknown, status?: number): boolean {
    if (status === 429) {
      return true;
    }
    const errorMessage = String(error).toLowerCase();
    return errorMessage.includes('rate limit') ||
           errorMessage.includes('too_many_requests') ||
           errorMessage.includes('too many requests');
  }

  /**
   * Rate limits, server errors and failures without an HTTP status (network) are transient
   */
  protected isTransientError(error: unknown, status?: number): boolean {
    if (error instanceof Error && error.name === 'AbortError') {
      return false;
    }
    if (this.isRateLimitError(error, status)) {
      return true;
    }
    return status === undefined || status >= 500;
  }
}

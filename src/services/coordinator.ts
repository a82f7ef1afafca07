import { FileMatch, FilterCriteria, Member, MemberSearchOptions } from '../types/search';
import { AccountFileEnumerator } from './enumerator';
import { Logger, consoleLogger } from '../utils/logger';
import { TimeoutError, abortReason } from '../utils/errors';
import { errorMessage } from '../utils/retry';

export type MemberEnumerator = Pick<AccountFileEnumerator, 'enumerate'>;

export interface CoordinatorOptions {
  concurrency: number;
  memberTimeoutMs: number;
}

/**
 * Runs one enumeration per member on a fixed-size worker pool and merges the results
 * in completion order.
 */
export class FanOutCoordinator {
  private options: CoordinatorOptions;

  constructor(
    private enumerator: MemberEnumerator,
    options: Partial<CoordinatorOptions> = {},
    private logger: Logger = consoleLogger
  ) {
    this.options = {
      concurrency: 3,
      memberTimeoutMs: 600_000,
      ...options,
    };
  }

  async searchAll(members: Member[], criteria: FilterCriteria, options: MemberSearchOptions = {}): Promise<FileMatch[]> {
    const { signal } = options;
    const results: FileMatch[] = [];

    this.logger.info('Searching through accounts:');
    for (const member of members) {
      this.logger.info(`- ${member.name} (${member.email})`);
    }
    this.logger.info('\nStarting search...\n');

    const queue = [...members];
    const worker = async (): Promise<void> => {
      while (!signal?.aborted) {
        const member = queue.shift();
        if (!member) {
          return;
        }
        results.push(...(await this.searchMember(member, criteria, signal)));
      }
    };

    const workerCount = Math.max(1, Math.min(this.options.concurrency, members.length));
    await Promise.all(Array.from({ length: workerCount }, () => worker()));

    return results;
  }

  /**
   * Search a single member under its own deadline. A timeout aborts the member's in-flight
   * calls and drops its matches; other failures count as zero matches.
   */
  private async searchMember(member: Member, criteria: FilterCriteria, outerSignal?: AbortSignal): Promise<FileMatch[]> {
    const controller = new AbortController();
    const onOuterAbort = () => {
      if (outerSignal) {
        controller.abort(abortReason(outerSignal));
      }
    };
    outerSignal?.addEventListener('abort', onOuterAbort, { once: true });

    const { memberTimeoutMs } = this.options;
    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        const error = new TimeoutError(`Search of ${member.name}'s account exceeded ${memberTimeoutMs}ms`, memberTimeoutMs);
        controller.abort(error);
        reject(error);
      }, memberTimeoutMs);
    });

    try {
      return await Promise.race([
        this.enumerator.enumerate(member, criteria, { signal: controller.signal }),
        deadline,
      ]);
    } catch (error) {
      if (error instanceof TimeoutError) {
        this.logger.warn(`Search timeout for ${member.name}'s account`);
      } else {
        this.logger.error(`Error searching ${member.name}'s account: ${errorMessage(error)}`);
      }
      return [];
    } finally {
      clearTimeout(timer);
      outerSignal?.removeEventListener('abort', onOuterAbort);
    }
  }
}

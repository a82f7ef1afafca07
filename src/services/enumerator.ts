import { FileMatch, FilterCriteria, Member, MemberSearchOptions } from '../types/search';
import { ListingPage, MemberStorage, SharedFolder, TeamStorageProvider } from '../types/provider';
import { matchPage } from '../utils/filters';
import { withRetry, errorMessage } from '../utils/retry';
import { Logger, consoleLogger } from '../utils/logger';

export interface EnumeratorOptions {
  includeSharedFolders: boolean;
  maxAttempts: number;
  baseDelayMs: number;
  progressInterval: number;
  verbose: boolean;
}

interface Accumulator {
  matches: FileMatch[];
  seen: Set<string>;
  filesChecked: number;
}

/**
 * Walks one member's personal storage and mounted shared folders, collecting file matches.
 */
export class AccountFileEnumerator {
  private options: EnumeratorOptions;

  constructor(
    private provider: TeamStorageProvider,
    options: Partial<EnumeratorOptions> = {},
    private logger: Logger = consoleLogger
  ) {
    this.options = {
      includeSharedFolders: true,
      maxAttempts: 5,
      baseDelayMs: 2000,
      progressInterval: 100,
      verbose: false,
      ...options,
    };
  }

  /**
   * Enumerate a member's files. Never rejects: on failure the matches gathered so far are returned.
   */
  async enumerate(member: Member, criteria: FilterCriteria, options: MemberSearchOptions = {}): Promise<FileMatch[]> {
    const { signal } = options;
    let accumulator: Accumulator = { matches: [], seen: new Set(), filesChecked: 0 };

    this.logger.info(`Starting search in ${member.name}'s account...`);

    try {
      const storage = this.provider.asMember(member.id, { signal });
      const sharedFolders = this.options.includeSharedFolders
        ? await this.listSharedFolders(storage, member, signal)
        : [];

      for await (const root of this.roots(storage, sharedFolders, member, signal)) {
        for await (const page of this.listPages(storage, root, member, signal)) {
          accumulator = this.foldPage(accumulator, page.entries.length, matchPage(page.entries, criteria, member), member);
        }
      }
    } catch (error) {
      if (signal?.aborted) {
        this.logger.warn(`Search in ${member.name}'s account stopped early: ${errorMessage(error)}`);
      } else {
        this.logger.error(`Error during file listing for ${member.name}: ${errorMessage(error)}`);
      }
    }

    this.logger.info(
      `Completed search in ${member.name}'s account. Checked ${accumulator.filesChecked} files, found ${accumulator.matches.length} matches.`
    );
    return accumulator.matches;
  }

  /**
   * Fold one page's matches into the accumulator. A path already seen through another root is skipped.
   */
  private foldPage(accumulator: Accumulator, entryCount: number, pageMatches: FileMatch[], member: Member): Accumulator {
    const { progressInterval } = this.options;
    const before = accumulator.filesChecked;
    const filesChecked = before + entryCount;

    if (Math.floor(filesChecked / progressInterval) > Math.floor(before / progressInterval)) {
      this.logger.info(`Checked ${filesChecked} files in ${member.name}'s account...`);
    }

    for (const match of pageMatches) {
      if (accumulator.seen.has(match.pathLower)) {
        continue;
      }
      accumulator.seen.add(match.pathLower);
      accumulator.matches.push(match);
      this.logger.info(`Found matching file: ${match.name} in ${member.name}'s account`);
    }

    return { ...accumulator, filesChecked };
  }

  /**
   * Personal root first, then every shared folder that resolves to a mount path
   */
  private async *roots(
    storage: MemberStorage,
    sharedFolders: SharedFolder[],
    member: Member,
    signal?: AbortSignal
  ): AsyncGenerator<string> {
    yield '';

    for (const folder of sharedFolders) {
      let path: string | undefined;
      try {
        path = await this.retry(() => storage.getSharedFolderPath(folder.id), member, signal);
      } catch (error) {
        if (signal?.aborted) {
          throw error;
        }
        this.logger.warn(`Could not resolve shared folder "${folder.name}" for ${member.name}: ${errorMessage(error)}`);
        continue;
      }

      if (!path) {
        if (this.options.verbose) {
          this.logger.info(`  Skipping unmounted shared folder "${folder.name}" in ${member.name}'s account`);
        }
        continue;
      }
      yield path;
    }
  }

  /**
   * Recursive listing of one root, following continuation cursors until the provider reports no more entries
   */
  private async *listPages(
    storage: MemberStorage,
    root: string,
    member: Member,
    signal?: AbortSignal
  ): AsyncGenerator<ListingPage> {
    let page = await this.retry(() => storage.listFolder(root, { recursive: true }), member, signal);
    yield page;

    while (page.hasMore) {
      const cursor = page.cursor;
      page = await this.retry(() => storage.listFolderContinue(cursor), member, signal);
      yield page;
    }
  }

  /**
   * List all shared folders. A failure counts as having none, so personal storage is still searched.
   */
  private async listSharedFolders(storage: MemberStorage, member: Member, signal?: AbortSignal): Promise<SharedFolder[]> {
    const folders: SharedFolder[] = [];

    try {
      let page = await this.retry(() => storage.listSharedFolders(), member, signal);
      folders.push(...page.folders);

      while (page.cursor) {
        const cursor = page.cursor;
        page = await this.retry(() => storage.listSharedFoldersContinue(cursor), member, signal);
        folders.push(...page.folders);
      }
    } catch (error) {
      if (signal?.aborted) {
        throw error;
      }
      this.logger.warn(`Could not list shared folders for ${member.name}: ${errorMessage(error)}`);
      return [];
    }

    if (this.options.verbose) {
      this.logger.info(`  ${member.name} has ${folders.length} shared folders`);
    }
    return folders;
  }

  private retry<T>(operation: () => Promise<T>, member: Member, signal?: AbortSignal): Promise<T> {
    const { maxAttempts, baseDelayMs } = this.options;
    return withRetry(operation, {
      maxAttempts,
      baseDelayMs,
      signal,
      onRetry: (error: unknown, attempt: number, waitMs: number) => {
        this.logger.warn(
          `API error in ${member.name}'s account: ${errorMessage(error)} (attempt ${attempt}/${maxAttempts}, retrying in ${waitMs}ms)`
        );
      },
    });
  }
}

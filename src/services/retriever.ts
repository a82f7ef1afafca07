import { promises as fs } from 'fs';
import path from 'path';
import { DownloadSummary, FileMatch, MemberSearchOptions } from '../types/search';
import { TeamStorageProvider } from '../types/provider';
import { Logger, consoleLogger } from '../utils/logger';
import { errorMessage } from '../utils/retry';

export class Retriever {
  constructor(
    private provider: TeamStorageProvider,
    private logger: Logger = consoleLogger
  ) {}

  /**
   * Download one match to `localPath`, creating parent directories and overwriting an existing file.
   * Failures are logged and reported as `false`; there is no retry.
   */
  async download(match: FileMatch, localPath: string): Promise<boolean> {
    try {
      const storage = this.provider.asMember(match.owner.id);
      await fs.mkdir(path.dirname(localPath), { recursive: true });
      const content = await storage.download(match.path);
      await fs.writeFile(localPath, content);
      return true;
    } catch (error) {
      this.logger.error(`Error downloading file: ${errorMessage(error)}`);
      return false;
    }
  }

  /**
   * Download matches one after another into `<directory>/<owner>/<file name>`
   */
  async downloadAll(matches: FileMatch[], directory: string, options: MemberSearchOptions = {}): Promise<DownloadSummary> {
    const summary: DownloadSummary = { downloaded: 0, failed: 0 };

    for (const match of matches) {
      if (options.signal?.aborted) {
        break;
      }

      const localPath = localPathFor(match, directory);
      if (await this.download(match, localPath)) {
        summary.downloaded++;
        this.logger.info(`Successfully downloaded to ${localPath}`);
      } else {
        summary.failed++;
        this.logger.info(`Failed to download ${match.name}`);
      }
    }

    return summary;
  }
}

export function localPathFor(match: FileMatch, directory: string): string {
  const sanitized = match.owner.name.replace(/[\\/]/g, '_');
  const ownerDir = sanitized === '' || sanitized === '.' || sanitized === '..' ? '_' : sanitized;
  return path.join(directory, ownerDir, match.name);
}

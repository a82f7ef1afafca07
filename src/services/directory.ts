import { Member } from '../types/search';
import { TeamStorageProvider } from '../types/provider';
import { Logger, consoleLogger } from '../utils/logger';
import { errorMessage } from '../utils/retry';

export class MemberDirectory {
  constructor(
    private provider: TeamStorageProvider,
    private logger: Logger = consoleLogger
  ) {}

  /**
   * List team members visible to the credential. Failures are reported and yield an empty list.
   */
  async listMembers(): Promise<Member[]> {
    try {
      return await this.provider.listMembers();
    } catch (error) {
      this.logger.error(`Error listing team members: ${errorMessage(error)}`);
      return [];
    }
  }
}

import { Command } from 'commander';
import { ConfigManager } from '../../utils/config';
import { ProviderFactory } from '../../providers/factory';
import { MemberDirectory } from '../../services/directory';
import { ConfigurationError } from '../../utils/errors';
import { ProgressIndicator } from '../utils/progress';
import { formatValidationError, validateOutputFormat } from '../utils/validation';

export function createMembersCommand(): Command {
  return new Command('members')
    .description('List the team members whose accounts would be searched')
    .option('--format <format>', 'Output format (table|json)', 'table')
    .option('--config-path <path>', 'Path to configuration file')
    .action(async (options: { format: string; configPath?: string }) => {
      try {
        await listMembers(options);
      } catch (error) {
        console.error(formatValidationError(error));
        process.exit(1);
      }
    });
}

async function listMembers(options: { format: string; configPath?: string }): Promise<void> {
  const format = validateOutputFormat(options.format);
  const configManager = new ConfigManager(options.configPath);

  let accessToken: string;
  try {
    accessToken = configManager.resolveAccessToken();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.log(`Error: ${error.message}`);
      return;
    }
    throw error;
  }

  const directory = new MemberDirectory(ProviderFactory.createProvider('dropbox', accessToken));

  const progress = new ProgressIndicator('Listing team members...');
  progress.start();
  const members = await directory.listMembers();
  progress.stop();

  if (format === 'json') {
    console.log(JSON.stringify(members, null, 2));
    return;
  }

  if (members.length === 0) {
    console.log('No team members found. Please check your access token and permissions.');
    return;
  }

  console.log(`👥 ${members.length} team members:\n`);
  members.forEach((member, index) => {
    console.log(`${index + 1}. ${member.name} <${member.email}>`);
    console.log(`   ID: ${member.id}`);
  });
}

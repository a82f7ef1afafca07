import { Command } from 'commander';
import { ConfigManager, ACCESS_TOKEN_ENV } from '../../utils/config';
import { TeamSearchConfig, TeamSearchConfigSchema } from '../../types/config';
import { ProgressIndicator } from '../utils/progress';
import { promptConfirm, promptList, promptNumber, promptUser } from '../utils/input';
import { formatValidationError, validateExtensions } from '../utils/validation';

export function createInitCommand(): Command {
  return new Command('init')
    .description('Write default search settings with an interactive setup')
    .option('--config-path <path>', 'Path to configuration file')
    .option('--force', 'Overwrite existing configuration')
    .action(async (options: { configPath?: string; force?: boolean }) => {
      try {
        await initializeConfiguration(options);
      } catch (error) {
        console.error(formatValidationError(error));
        process.exit(1);
      }
    });
}

async function initializeConfiguration(options: { configPath?: string; force?: boolean }): Promise<void> {
  console.log('🚀 Team Search Configuration Setup');
  console.log('');

  const configManager = new ConfigManager(options.configPath);

  if (await configManager.exists() && !options.force) {
    const overwrite = await promptConfirm(
      'Configuration already exists. Do you want to overwrite it?',
      false
    );

    if (!overwrite) {
      console.log('Configuration setup cancelled.');
      return;
    }
  }

  const current = await loadExisting(configManager);

  console.log('📋 Search Defaults');
  const keywords = await promptList('Keywords to match in file paths (comma separated)', current.search.keywords);
  const extensions = await promptList('File extensions to include (comma separated)', current.search.extensions);
  validateExtensions(extensions);
  const concurrency = Math.round(await promptNumber('Accounts searched at once', current.search.concurrency));
  const timeoutMinutes = await promptNumber('Per-account timeout in minutes', current.search.memberTimeoutMs / 60_000);
  const includeSharedFolders = await promptConfirm('Search shared folders too?', current.search.includeSharedFolders);
  console.log('');

  console.log('📋 Downloads');
  const directory = (await promptUser(`Download directory [${current.download.directory}]: `)) || current.download.directory;
  console.log('');

  const config: TeamSearchConfig = {
    ...current,
    search: {
      keywords,
      extensions,
      concurrency,
      memberTimeoutMs: Math.round(timeoutMinutes * 60_000),
      includeSharedFolders,
    },
    download: { directory },
  };

  const progress = new ProgressIndicator('Saving configuration...');
  progress.start();

  try {
    await configManager.save(config);
    progress.stop(`Configuration saved to ${configManager.getConfigPath()}`);
  } catch (error) {
    progress.fail('Failed to save configuration');
    throw error;
  }

  console.log('');
  console.log('Next steps:');
  console.log(`  1. Put your team access token in .env as ${ACCESS_TOKEN_ENV}=...`);
  console.log('  2. Check which accounts are visible: dbx-team-search members');
  console.log('  3. Search: dbx-team-search search <keywords...> --ext pdf');
  console.log('');
}

/**
 * Start from the saved configuration when it is readable, defaults otherwise
 */
async function loadExisting(configManager: ConfigManager): Promise<TeamSearchConfig> {
  try {
    return await configManager.load();
  } catch (error) {
    console.log(`⚠️  Ignoring unreadable configuration: ${error instanceof Error ? error.message : String(error)}`);
    return TeamSearchConfigSchema.parse({});
  }
}

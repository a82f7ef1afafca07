import { Command } from 'commander';
import { ConfigManager } from '../../utils/config';
import { ProviderFactory } from '../../providers/factory';
import { MemberDirectory } from '../../services/directory';
import { AccountFileEnumerator } from '../../services/enumerator';
import { FanOutCoordinator } from '../../services/coordinator';
import { Retriever } from '../../services/retriever';
import { TeamSearchConfig } from '../../types/config';
import { FileMatch, FilterCriteria } from '../../types/search';
import { createCriteria } from '../../utils/filters';
import { AbortError, ConfigurationError } from '../../utils/errors';
import { ProgressIndicator, formatDuration, formatFileSize } from '../utils/progress';
import {
  OutputFormat,
  formatValidationError,
  validateExtensions,
  validateOutputFormat,
  validateSearchOptions,
} from '../utils/validation';

export interface SearchCommandOptions {
  ext?: string[];
  concurrency?: number;
  timeout?: number;
  shared: boolean;
  download?: boolean;
  downloadDir?: string;
  format: string;
  configPath?: string;
  verbose?: boolean;
}

export interface SearchSettings {
  criteria: FilterCriteria;
  concurrency: number;
  memberTimeoutMs: number;
  includeSharedFolders: boolean;
  maxAttempts: number;
  baseDelayMs: number;
  download: boolean;
  downloadDir: string;
  format: OutputFormat;
  verbose: boolean;
}

export function createSearchCommand(): Command {
  return new Command('search')
    .description('Search every team member\'s files by path keyword and extension')
    .argument('[keywords...]', 'Keywords to look for in file paths (case-insensitive)')
    .option('-e, --ext <extensions...>', 'File extensions to include, e.g. pdf png')
    .option('-c, --concurrency <number>', 'Number of member accounts searched at once', (value) => parseInt(value, 10))
    .option('--timeout <seconds>', 'Per-member search timeout in seconds', (value) => parseFloat(value))
    .option('--no-shared', 'Skip shared folders mounted in member accounts')
    .option('-d, --download', 'Download every matching file')
    .option('--download-dir <dir>', 'Directory downloads are written to')
    .option('--format <format>', 'Output format (table|json)', 'table')
    .option('--config-path <path>', 'Path to configuration file')
    .option('--verbose', 'Show detailed listing logs')
    .action(async (keywords: string[], options: SearchCommandOptions) => {
      try {
        await runSearch(keywords, options);
      } catch (error) {
        console.error(formatValidationError(error));
        process.exit(1);
      }
    });
}

/**
 * Combine config file values with command-line flags; flags win
 */
export function resolveSearchSettings(
  config: TeamSearchConfig,
  keywords: string[],
  options: SearchCommandOptions
): SearchSettings {
  const extensions = options.ext ?? config.search.extensions;
  validateExtensions(extensions);
  validateSearchOptions({ concurrency: options.concurrency, timeoutSeconds: options.timeout });

  return {
    criteria: createCriteria(keywords.length > 0 ? keywords : config.search.keywords, extensions),
    concurrency: options.concurrency ?? config.search.concurrency,
    memberTimeoutMs: options.timeout !== undefined ? Math.round(options.timeout * 1000) : config.search.memberTimeoutMs,
    includeSharedFolders: options.shared && config.search.includeSharedFolders,
    maxAttempts: config.retry.maxAttempts,
    baseDelayMs: config.retry.baseDelayMs,
    download: options.download ?? false,
    downloadDir: options.downloadDir ?? config.download.directory,
    format: validateOutputFormat(options.format),
    verbose: options.verbose ?? false,
  };
}

async function runSearch(keywords: string[], options: SearchCommandOptions): Promise<void> {
  const configManager = new ConfigManager(options.configPath);
  const config = await configManager.load();
  const settings = resolveSearchSettings(config, keywords, options);

  let accessToken: string;
  try {
    accessToken = configManager.resolveAccessToken();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.log(`Error: ${error.message}`);
      console.log('Please set it with your Dropbox access token in the .env file or environment');
      return;
    }
    throw error;
  }

  const provider = ProviderFactory.createProvider('dropbox', accessToken);
  const directory = new MemberDirectory(provider);

  const progress = new ProgressIndicator('Listing team members...');
  progress.start();
  const members = await directory.listMembers();
  progress.stop();

  if (members.length === 0) {
    console.log('No team members found. Please check your access token and permissions.');
    return;
  }

  console.log(`Found ${members.length} team members`);
  console.log('');
  console.log(`🔍 Searching for files with extensions: ${describeList(settings.criteria.extensions)}`);
  console.log(`📝 And containing keywords: ${describeList(settings.criteria.keywords)}`);
  console.log('This may take a while as we search through all team members\' accounts...');
  console.log('');

  const controller = new AbortController();
  const onInterrupt = () => {
    console.log('\nSearch interrupted by user. Processing any results found so far...');
    controller.abort(new AbortError('Search interrupted by user'));
  };
  process.once('SIGINT', onInterrupt);

  const startTime = Date.now();

  try {
    const enumerator = new AccountFileEnumerator(provider, {
      includeSharedFolders: settings.includeSharedFolders,
      maxAttempts: settings.maxAttempts,
      baseDelayMs: settings.baseDelayMs,
      verbose: settings.verbose,
    });
    const coordinator = new FanOutCoordinator(enumerator, {
      concurrency: settings.concurrency,
      memberTimeoutMs: settings.memberTimeoutMs,
    });

    const results = await coordinator.searchAll(members, settings.criteria, { signal: controller.signal });

    if (results.length === 0) {
      console.log('\nNo files found matching the criteria');
      return;
    }

    if (settings.format === 'json') {
      console.log(JSON.stringify(results, null, 2));
    } else {
      displayTableResults(results);
    }

    if (settings.download && !controller.signal.aborted) {
      const retriever = new Retriever(provider);
      console.log(`\n📥 Downloading ${results.length} files to ${settings.downloadDir}/`);
      const summary = await retriever.downloadAll(results, settings.downloadDir, { signal: controller.signal });
      console.log(`\n✅ Downloaded ${summary.downloaded} files, ${summary.failed} failed`);
    }

    console.log(`\n⏱️  Completed in ${formatDuration(Date.now() - startTime)}`);
  } finally {
    process.removeListener('SIGINT', onInterrupt);
  }
}

function displayTableResults(results: FileMatch[]): void {
  console.log(`\nFound ${results.length} total matching files:`);

  for (const result of results) {
    console.log(`\n📄 File: ${result.name}`);
    console.log(`   Owner: ${result.owner.name} (${result.owner.email})`);
    console.log(`   Path: ${result.path}`);
    console.log(`   Size: ${result.size} bytes (${formatFileSize(result.size)})`);
    console.log(`   Last modified: ${result.lastModified}`);
  }
}

function describeList(values: string[]): string {
  return values.length > 0 ? values.join(', ') : '(any)';
}

import { promises as fs } from 'fs';
import path from 'path';
import os from 'os';
import {
  TeamSearchConfig,
  TeamSearchConfigSchema,
  PLACEHOLDER_ACCESS_TOKEN,
} from '../types/config';
import { ConfigurationError, FileError, ValidationError } from './errors';

export const ACCESS_TOKEN_ENV = 'DROPBOX_ACCESS_TOKEN';
export const CONFIG_PATH_ENV = 'DBX_SEARCH_CONFIG_PATH';

export class ConfigManager {
  private configPath: string;
  private configDir: string;

  constructor(customPath?: string, private env: NodeJS.ProcessEnv = process.env) {
    const resolved = customPath ?? env[CONFIG_PATH_ENV];
    if (resolved) {
      this.configPath = path.resolve(resolved);
      this.configDir = path.dirname(this.configPath);
    } else {
      this.configDir = path.join(os.homedir(), '.dbx-team-search');
      this.configPath = path.join(this.configDir, 'config.json');
    }
  }

  getConfigPath(): string {
    return this.configPath;
  }

  async exists(): Promise<boolean> {
    try {
      await fs.access(this.configPath);
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Load configuration from file, falling back to defaults when no file exists
   */
  async load(): Promise<TeamSearchConfig> {
    let content: string;
    try {
      content = await fs.readFile(this.configPath, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        return TeamSearchConfigSchema.parse({});
      }
      throw new FileError(`Failed to load configuration: ${String(error)}`);
    }

    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch {
      throw new ValidationError('Configuration file contains invalid JSON');
    }

    const result = TeamSearchConfigSchema.safeParse(data);
    if (!result.success) {
      throw new ValidationError(`Invalid configuration: ${result.error.message}`);
    }
    return result.data;
  }

  async save(config: TeamSearchConfig): Promise<void> {
    const result = TeamSearchConfigSchema.safeParse(config);
    if (!result.success) {
      throw new ValidationError(`Invalid configuration: ${result.error.message}`);
    }

    try {
      await fs.mkdir(this.configDir, { recursive: true });
      await fs.writeFile(this.configPath, JSON.stringify(result.data, null, 2), 'utf-8');
    } catch (error) {
      throw new FileError(`Failed to save configuration: ${String(error)}`);
    }
  }

  /**
   * Read the team access token. Placeholder and empty values count as missing.
   */
  resolveAccessToken(): string {
    return validateAccessToken(this.env[ACCESS_TOKEN_ENV]);
  }
}

export function validateAccessToken(token: string | undefined): string {
  const trimmed = token?.trim();
  if (!trimmed || trimmed === PLACEHOLDER_ACCESS_TOKEN) {
    throw new ConfigurationError(`${ACCESS_TOKEN_ENV} environment variable not set correctly`);
  }
  return trimmed;
}

function isNotFound(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

import { TeamStorageProvider } from '../types/provider';
import { DropboxProvider } from './dropbox';
import { ConfigurationError } from '../utils/errors';

export type ProviderName = 'dropbox';

export class ProviderFactory {
  /**
   * Create a team storage provider instance
   */
  static createProvider(name: ProviderName, accessToken: string): TeamStorageProvider {
    if (!accessToken || accessToken.trim().length === 0) {
      throw new ConfigurationError(`Access token is required for ${name} provider`);
    }

    switch (name) {
      case 'dropbox':
        return new DropboxProvider(accessToken);
      default:
        throw new ConfigurationError(`Unsupported provider: ${String(name)}`);
    }
  }
}

import { describe, it, expect } from 'vitest';
import { resolveSearchSettings, SearchCommandOptions } from './search';
import { TeamSearchConfigSchema } from '../../types/config';
import { ValidationError } from '../../utils/errors';

const baseOptions: SearchCommandOptions = { shared: true, format: 'table' };

describe('resolveSearchSettings', () => {
  it('uses config file values when no flags are given', () => {
    const config = TeamSearchConfigSchema.parse({
      search: { keywords: ['Floorplan', 'architecture'], extensions: ['PDF', '.png'], concurrency: 4 },
      download: { directory: 'out' },
    });

    const settings = resolveSearchSettings(config, [], baseOptions);

    expect(settings).toEqual({
      criteria: { keywords: ['floorplan', 'architecture'], extensions: ['pdf', 'png'] },
      concurrency: 4,
      memberTimeoutMs: 600_000,
      includeSharedFolders: true,
      maxAttempts: 5,
      baseDelayMs: 2000,
      download: false,
      downloadDir: 'out',
      format: 'table',
      verbose: false,
    });
  });

  it('lets flags override the config file', () => {
    const config = TeamSearchConfigSchema.parse({ search: { keywords: ['floorplan'], extensions: ['pdf'] } });

    const settings = resolveSearchSettings(config, ['invoice'], {
      ...baseOptions,
      ext: ['txt'],
      concurrency: 1,
      timeout: 1.5,
      shared: false,
      download: true,
      downloadDir: '/tmp/out',
      format: 'json',
    });

    expect(settings.criteria).toEqual({ keywords: ['invoice'], extensions: ['txt'] });
    expect(settings.concurrency).toBe(1);
    expect(settings.memberTimeoutMs).toBe(1500);
    expect(settings.includeSharedFolders).toBe(false);
    expect(settings.download).toBe(true);
    expect(settings.downloadDir).toBe('/tmp/out');
    expect(settings.format).toBe('json');
  });

  it('rejects invalid flags', () => {
    const config = TeamSearchConfigSchema.parse({});

    expect(() => resolveSearchSettings(config, [], { ...baseOptions, concurrency: 0 })).toThrow(ValidationError);
    expect(() => resolveSearchSettings(config, [], { ...baseOptions, timeout: -1 })).toThrow(ValidationError);
    expect(() => resolveSearchSettings(config, [], { ...baseOptions, format: 'xml' })).toThrow(
      'Invalid output format. Must be one of: table, json'
    );
    expect(() => resolveSearchSettings(config, [], { ...baseOptions, ext: ['p df'] })).toThrow('Invalid file extension "p df"');
  });

  it('keeps the per-member timeout within what a timer can wait', () => {
    const config = TeamSearchConfigSchema.parse({});

    expect(resolveSearchSettings(config, [], { ...baseOptions, timeout: 2_147_483 }).memberTimeoutMs).toBe(2_147_483_000);
    expect(() => resolveSearchSettings(config, [], { ...baseOptions, timeout: 2_200_000 })).toThrow(
      'Timeout is too large (max: 2147483 seconds)'
    );
    expect(() => resolveSearchSettings(config, [], { ...baseOptions, timeout: 0.0001 })).toThrow(
      'Timeout must be at least one millisecond'
    );
  });
});

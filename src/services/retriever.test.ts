import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { Retriever, localPathFor } from './retriever';
import { toFileMatch } from '../utils/filters';
import { FakeTeamProvider, RecordingLogger, file, member } from '../testing/fakes';

const alice = member('dbmid:alice', 'Alice Smith');
const report = toFileMatch(file('/Reports/q1.pdf'), alice);

describe('Retriever', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'dbx-team-search-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('creates missing parent directories and writes the content', async () => {
    const provider = new FakeTeamProvider({
      [alice.id]: { files: { '/Reports/q1.pdf': Buffer.from('first version') } },
    });
    const retriever = new Retriever(provider, new RecordingLogger());
    const target = path.join(tempDir, 'nested', 'deeper', 'q1.pdf');

    await expect(retriever.download(report, target)).resolves.toBe(true);
    await expect(fs.readFile(target, 'utf-8')).resolves.toBe('first version');
    expect(provider.sessions[0]?.memberId).toBe('dbmid:alice');
  });

  it('overwrites an existing local file', async () => {
    const files: Record<string, Uint8Array> = { '/Reports/q1.pdf': Buffer.from('a much longer first version') };
    const provider = new FakeTeamProvider({ [alice.id]: { files } });
    const retriever = new Retriever(provider, new RecordingLogger());
    const target = path.join(tempDir, 'q1.pdf');

    await retriever.download(report, target);
    files['/Reports/q1.pdf'] = Buffer.from('v2');
    await expect(retriever.download(report, target)).resolves.toBe(true);

    await expect(fs.readFile(target, 'utf-8')).resolves.toBe('v2');
  });

  it('reports a provider failure as false without throwing', async () => {
    const logger = new RecordingLogger();
    const retriever = new Retriever(new FakeTeamProvider({ [alice.id]: {} }), logger);

    await expect(retriever.download(report, path.join(tempDir, 'q1.pdf'))).resolves.toBe(false);
    expect(logger.lines).toEqual(['ERROR Error downloading file: path/not_found/ /Reports/q1.pdf']);
  });

  it('downloads matches one by one into per-owner directories', async () => {
    const bob = member('dbmid:bob', 'Bob');
    const provider = new FakeTeamProvider({
      [alice.id]: { files: { '/Reports/q1.pdf': Buffer.from('alice') } },
      [bob.id]: {},
    });
    const logger = new RecordingLogger();
    const retriever = new Retriever(provider, logger);
    const missing = toFileMatch(file('/gone.pdf'), bob);

    const summary = await retriever.downloadAll([report, missing], tempDir);

    expect(summary).toEqual({ downloaded: 1, failed: 1 });
    await expect(fs.readFile(path.join(tempDir, 'Alice Smith', 'q1.pdf'), 'utf-8')).resolves.toBe('alice');
    expect(logger.lines).toContain('Failed to download gone.pdf');
  });
});

describe('localPathFor', () => {
  it('places files under the owner name', () => {
    expect(localPathFor(report, 'downloads')).toBe(path.join('downloads', 'Alice Smith', 'q1.pdf'));
  });

  it('keeps separators in owner names from creating extra directories', () => {
    const match = toFileMatch(file('/a.txt'), member('dbmid:x', 'Sales/EMEA'));
    expect(localPathFor(match, 'downloads')).toBe(path.join('downloads', 'Sales_EMEA', 'a.txt'));
  });

  it('keeps dot-only owner names inside the download directory', () => {
    const parent = toFileMatch(file('/a.txt'), member('dbmid:p', '..'));
    const current = toFileMatch(file('/b.txt'), member('dbmid:c', '.'));

    expect(localPathFor(parent, 'downloads')).toBe(path.join('downloads', '_', 'a.txt'));
    expect(localPathFor(current, 'downloads')).toBe(path.join('downloads', '_', 'b.txt'));
  });
});

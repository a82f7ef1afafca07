import { describe, it, expect } from 'vitest';
import { MemberDirectory } from './directory';
import { ApiError } from '../utils/errors';
import { FakeTeamProvider, RecordingLogger, member } from '../testing/fakes';

describe('MemberDirectory', () => {
  it('returns the members the provider lists', async () => {
    const members = [member('dbmid:1', 'Ada'), member('dbmid:2', 'Grace')];
    const directory = new MemberDirectory(new FakeTeamProvider({}, members), new RecordingLogger());

    await expect(directory.listMembers()).resolves.toEqual(members);
  });

  it('reports a provider failure and returns an empty list', async () => {
    const logger = new RecordingLogger();
    const provider = new FakeTeamProvider({}, [], new ApiError('List team members failed: 401 invalid_access_token', 'dropbox', 401, false));
    const directory = new MemberDirectory(provider, logger);

    await expect(directory.listMembers()).resolves.toEqual([]);
    expect(logger.lines).toEqual(['ERROR Error listing team members: List team members failed: 401 invalid_access_token']);
  });
});

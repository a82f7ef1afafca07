import { Dropbox, DropboxResponseError } from 'dropbox';
import type { files, sharing, team } from 'dropbox';
import fetch, { RequestInfo, RequestInit } from 'node-fetch';
import { BaseStorageProvider } from './base';
import { Member } from '../types/search';
import {
  ImpersonationOptions,
  ListedEntry,
  ListingPage,
  MemberStorage,
  SharedFolder,
  SharedFolderPage,
} from '../types/provider';
import { ApiError } from '../utils/errors';

type ListFolderEntry = files.ListFolderResult['entries'][number];

const PAGE_LIMIT = 1000;

/**
 * Team storage backed by the Dropbox Business API. Member calls are made with the
 * team token plus a `Dropbox-API-Select-User` header.
 */
export class DropboxProvider extends BaseStorageProvider {
  name = 'dropbox';
  private client: Dropbox;

  constructor(accessToken: string) {
    super(accessToken);
    this.client = new Dropbox({ accessToken, fetch });
  }

  async listMembers(): Promise<Member[]> {
    const members: Member[] = [];

    try {
      let response = await this.client.teamMembersList({ limit: PAGE_LIMIT });
      members.push(...response.result.members.map(toMember));

      while (response.result.has_more) {
        response = await this.client.teamMembersListContinue({ cursor: response.result.cursor });
        members.push(...response.result.members.map(toMember));
      }
    } catch (error) {
      throw this.toApiError(error, 'List team members', statusOf(error));
    }

    return members;
  }

  asMember(memberId: string, options: ImpersonationOptions = {}): MemberStorage {
    const { signal } = options;
    const client = new Dropbox({
      accessToken: this.accessToken,
      selectUser: memberId,
      fetch: (url: RequestInfo, init: RequestInit = {}) => fetch(url, signal ? { ...init, signal } : init),
    });

    return new DropboxMemberStorage(memberId, client, (error, operation) =>
      this.toApiError(error, operation, statusOf(error))
    );
  }

  protected describeError(error: unknown): string {
    if (error instanceof DropboxResponseError) {
      const summary = errorSummary(error.error);
      return summary ? `${error.status} ${summary}` : `HTTP ${error.status}`;
    }
    return super.describeError(error);
  }
}

class DropboxMemberStorage implements MemberStorage {
  constructor(
    public memberId: string,
    private client: Dropbox,
    private wrapError: (error: unknown, operation: string) => ApiError
  ) {}

  async listFolder(path: string, options: { recursive?: boolean } = {}): Promise<ListingPage> {
    return this.call(`List folder "${path || '/'}"`, async () => {
      const response = await this.client.filesListFolder({
        path,
        recursive: options.recursive ?? false,
        limit: PAGE_LIMIT,
      });
      return toListingPage(response.result);
    });
  }

  async listFolderContinue(cursor: string): Promise<ListingPage> {
    return this.call('Continue folder listing', async () => {
      const response = await this.client.filesListFolderContinue({ cursor });
      return toListingPage(response.result);
    });
  }

  async listSharedFolders(): Promise<SharedFolderPage> {
    return this.call('List shared folders', async () => {
      const response = await this.client.sharingListFolders({ limit: PAGE_LIMIT });
      return toSharedFolderPage(response.result);
    });
  }

  async listSharedFoldersContinue(cursor: string): Promise<SharedFolderPage> {
    return this.call('Continue shared folder listing', async () => {
      const response = await this.client.sharingListFoldersContinue({ cursor });
      return toSharedFolderPage(response.result);
    });
  }

  async getSharedFolderPath(sharedFolderId: string): Promise<string | undefined> {
    return this.call(`Get shared folder metadata ${sharedFolderId}`, async () => {
      const response = await this.client.sharingGetFolderMetadata({ shared_folder_id: sharedFolderId });
      return response.result.path_lower;
    });
  }

  async download(path: string): Promise<Uint8Array> {
    return this.call(`Download "${path}"`, async () => {
      const response = await this.client.filesDownload({ path });
      const result: object = response.result;

      // The SDK attaches the file body to the metadata under Node
      if ('fileBinary' in result && Buffer.isBuffer(result.fileBinary)) {
        return result.fileBinary;
      }
      throw new ApiError(`Download of "${path}" returned no content`, 'dropbox', response.status, false);
    });
  }

  private async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw this.wrapError(error, operation);
    }
  }
}

export function toMember(info: team.TeamMemberInfo): Member {
  return {
    id: info.profile.team_member_id,
    email: info.profile.email,
    name: info.profile.name.display_name,
  };
}

export function toListedEntry(entry: ListFolderEntry): ListedEntry {
  const pathLower = entry.path_lower ?? (entry.path_display ?? entry.name).toLowerCase();
  const pathDisplay = entry.path_display ?? entry.name;

  switch (entry['.tag']) {
    case 'file':
      return {
        kind: 'file',
        name: entry.name,
        pathLower,
        pathDisplay,
        size: entry.size,
        clientModified: entry.client_modified,
      };
    case 'folder':
      return { kind: 'folder', name: entry.name, pathLower, pathDisplay };
    default:
      return { kind: 'deleted', name: entry.name, pathLower };
  }
}

export function toListingPage(result: files.ListFolderResult): ListingPage {
  return {
    entries: result.entries.map(toListedEntry),
    cursor: result.cursor,
    hasMore: result.has_more,
  };
}

export function toSharedFolder(metadata: sharing.SharedFolderMetadata): SharedFolder {
  const folder: SharedFolder = {
    id: metadata.shared_folder_id,
    name: metadata.name,
  };
  if (metadata.path_lower !== undefined) {
    folder.pathLower = metadata.path_lower;
  }
  return folder;
}

function toSharedFolderPage(result: sharing.ListFoldersResult): SharedFolderPage {
  const page: SharedFolderPage = { folders: result.entries.map(toSharedFolder) };
  if (result.cursor) {
    page.cursor = result.cursor;
  }
  return page;
}

function statusOf(error: unknown): number | undefined {
  return error instanceof DropboxResponseError ? error.status : undefined;
}

function errorSummary(body: unknown): string | undefined {
  if (typeof body === 'object' && body !== null && 'error_summary' in body && typeof body.error_summary === 'string') {
    return body.error_summary;
  }
  return typeof body === 'string' ? body : undefined;
}

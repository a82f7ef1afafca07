import { Member } from './search';

export interface ListedFile {
  kind: 'file';
  name: string;
  pathLower: string;
  pathDisplay: string;
  size: number;
  clientModified: string;
}

export interface ListedFolder {
  kind: 'folder';
  name: string;
  pathLower: string;
  pathDisplay: string;
}

export interface ListedDeletion {
  kind: 'deleted';
  name: string;
  pathLower: string;
}

export type ListedEntry = ListedFile | ListedFolder | ListedDeletion;

export interface ListingPage {
  entries: ListedEntry[];
  cursor: string;
  hasMore: boolean;
}

export interface SharedFolder {
  id: string;
  name: string;
  pathLower?: string;
}

export interface SharedFolderPage {
  folders: SharedFolder[];
  cursor?: string;
}

export interface ImpersonationOptions {
  signal?: AbortSignal;
}

/**
 * Storage operations performed with a single team member's permissions
 */
export interface MemberStorage {
  memberId: string;

  // Folder listing
  listFolder(path: string, options?: { recursive?: boolean }): Promise<ListingPage>;
  listFolderContinue(cursor: string): Promise<ListingPage>;

  // Shared folders
  listSharedFolders(): Promise<SharedFolderPage>;
  listSharedFoldersContinue(cursor: string): Promise<SharedFolderPage>;
  getSharedFolderPath(sharedFolderId: string): Promise<string | undefined>;

  // Content
  download(path: string): Promise<Uint8Array>;
}

export interface TeamStorageProvider {
  name: string;

  listMembers(): Promise<Member[]>;
  asMember(memberId: string, options?: ImpersonationOptions): MemberStorage;
}

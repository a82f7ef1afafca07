export interface Member {
  id: string;
  email: string;
  name: string;
}

export interface FilterCriteria {
  keywords: string[];
  extensions: string[];
}

export interface FileMatch {
  name: string;
  path: string;
  pathLower: string;
  size: number;
  lastModified: string;
  owner: Member;
}

export interface MemberSearchOptions {
  signal?: AbortSignal;
}

export interface DownloadSummary {
  downloaded: number;
  failed: number;
}

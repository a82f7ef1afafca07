import { FileMatch, FilterCriteria, Member } from '../types/search';
import { ListedEntry, ListedFile } from '../types/provider';

/**
 * Normalise raw keyword and extension lists: trimmed, lowercased, blanks dropped,
 * leading dots stripped from extensions and duplicates removed.
 */
export function createCriteria(keywords: string[] = [], extensions: string[] = []): FilterCriteria {
  return {
    keywords: unique(keywords.map(keyword => keyword.trim().toLowerCase())),
    extensions: unique(extensions.map(ext => ext.trim().toLowerCase().replace(/^\.+/, ''))),
  };
}

export function matchesExtension(pathLower: string, extensions: string[]): boolean {
  if (extensions.length === 0) {
    return true;
  }
  return extensions.some(ext => pathLower.endsWith(`.${ext.toLowerCase()}`));
}

export function matchesKeyword(pathLower: string, keywords: string[]): boolean {
  if (keywords.length === 0) {
    return true;
  }
  return keywords.some(keyword => pathLower.includes(keyword.toLowerCase()));
}

export function matchesCriteria(path: string, criteria: FilterCriteria): boolean {
  const pathLower = path.toLowerCase();
  return matchesExtension(pathLower, criteria.extensions) && matchesKeyword(pathLower, criteria.keywords);
}

export function toFileMatch(entry: ListedFile, owner: Member): FileMatch {
  return {
    name: entry.name,
    path: entry.pathDisplay,
    pathLower: entry.pathLower,
    size: entry.size,
    lastModified: entry.clientModified,
    owner,
  };
}

/**
 * Filter one listing page into matches. Folders and deletions are skipped.
 */
export function matchPage(entries: ListedEntry[], criteria: FilterCriteria, owner: Member): FileMatch[] {
  const matches: FileMatch[] = [];
  for (const entry of entries) {
    if (entry.kind === 'file' && matchesCriteria(entry.pathLower, criteria)) {
      matches.push(toFileMatch(entry, owner));
    }
  }
  return matches;
}

function unique(values: string[]): string[] {
  return [...new Set(values.filter(value => value.length > 0))];
}

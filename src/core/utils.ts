import type { Uid, Year } from './types.js';
import { DependencyError } from './errors.js';

export const ARCHIVE_ROOT = 'Archives';

/** Comma-joined UID set, e.g. `5,9,12`. Empty input gives an empty string. */
export function createUidSet(uids: readonly Uid[]): string {
  return uids.map(String).join(',');
}

export function yearToFolder(year: Year): string {
  return `${ARCHIVE_ROOT}/${year}`;
}

export async function tryImport<T>(pkg: string, feature: string): Promise<T> {
  try {
    return await import(pkg);
  } catch {
    throw new DependencyError(pkg, feature);
  }
}

// source/handler/listing.ts
// Reads the entries of a served directory and renders them.

import { promisify } from 'node:util';
import path from 'node:path';
import { lstat, readdir, stat } from 'node:fs';
import { minimatch } from 'minimatch';
import { IOFailure, errorCode } from '../errors.js';
import { directoryTemplate } from './templates.js';
import type { Stats } from 'node:fs';
import type {
  DirectoryEntity,
  DirectoryListing,
  HandlerConfig,
  ListingEntry,
} from '../types.js';

const lstatAsync = promisify(lstat);
const statAsync = promisify(stat);
const readdirAsync = promisify(readdir);

const alwaysUnlisted = ['.DS_Store', '.git'];

const canBeListed = (excluded: string[], name: string): boolean =>
  !excluded.some((pattern) => minimatch(name, pattern, { dot: true }));

interface Described {
  entry: ListingEntry;
  mtimeMs: number;
}

// Entries that vanish between `readdir` and `lstat` are skipped.
const describe = async (
  absolutePath: string,
  name: string,
  config: HandlerConfig,
): Promise<Described | null> => {
  let own: Stats;
  let target: Stats;

  try {
    own = await lstatAsync(absolutePath);
    target = own;

    if (own.isSymbolicLink()) {
      if (!config.symlinks) {
        return null;
      }
      target = await statAsync(absolutePath);
    }
  } catch (err: unknown) {
    const code = errorCode(err);
    if (code === 'ENOENT' || code === 'ENOTDIR' || code === 'ELOOP') {
      return null;
    }
    throw new IOFailure('Could not inspect a directory entry', err);
  }

  return {
    entry: { name, isDirectory: target.isDirectory() },
    mtimeMs: own.mtimeMs,
  };
};

/**
 * Directories first, then by name in UTF-16 code unit order. Names within one
 * directory are unique, so the order is total.
 */
export const compareEntries = (a: ListingEntry, b: ListingEntry): number => {
  if (a.isDirectory && !b.isDirectory) return -1;
  if (b.isDirectory && !a.isDirectory) return 1;
  if (a.name > b.name) return 1;
  if (a.name < b.name) return -1;
  return 0;
};

export const readListing = async (
  directory: DirectoryEntity,
  config: HandlerConfig,
): Promise<DirectoryListing> => {
  const excluded = [...alwaysUnlisted, ...(config.unlisted ?? [])];

  let names: string[];
  try {
    names = await readdirAsync(directory.absolutePath);
  } catch (err: unknown) {
    throw new IOFailure('Could not read the requested directory', err);
  }

  const described = await Promise.all(
    names
      .filter((name) => canBeListed(excluded, name))
      .map((name) =>
        describe(path.join(directory.absolutePath, name), name, config),
      ),
  );

  const entries: ListingEntry[] = [];
  let newestMtimeMs = 0;

  for (const item of described) {
    if (!item) continue;
    entries.push(item.entry);
    newestMtimeMs = Math.max(newestMtimeMs, item.mtimeMs);
  }

  return { entries: entries.sort(compareEntries), newestMtimeMs };
};

export const renderListing = (
  listing: DirectoryListing,
  requestPath: string,
): Buffer => Buffer.from(directoryTemplate(listing, { requestPath }), 'utf8');

// source/handler/validators.ts
// Entity tags and modification dates for resolved files and directories.
//
// Files get a weak tag built from size and mtime, W/"<size hex>-<mtime ms hex>",
// unless `etag` is enabled, in which case the tag is the strong SHA-1 of the
// extension, a dash and the content. Directories always get a weak tag: the
// SHA-1 of the directory mtime followed by one "\n<name>" per listed entry,
// directories suffixed with "/", in listing order.

import path from 'node:path';
import { createHash } from 'node:crypto';
import { createReadStream } from 'node:fs';
import { IOFailure } from '../errors.js';
import { readListing } from './listing.js';
import type {
  DirectoryEntity,
  DirectoryListing,
  FileEntity,
  HandlerConfig,
  Validators,
} from '../types.js';

export const truncateToSeconds = (ms: number): Date =>
  new Date(Math.floor(ms / 1000) * 1000);

const calculateSha = (absolutePath: string): Promise<string> =>
  new Promise((resolve, reject) => {
    const hash = createHash('sha1');
    hash.update(path.extname(absolutePath));
    hash.update('-');
    const rs = createReadStream(absolutePath);
    rs.on('error', reject);
    rs.on('data', (buf) => hash.update(buf));
    rs.on('end', () => {
      resolve(hash.digest('hex'));
    });
  });

export const weakFileTag = (size: number, mtimeMs: number): string =>
  `W/"${size.toString(16)}-${Math.floor(mtimeMs).toString(16)}"`;

export const directoryTag = (
  mtimeMs: number,
  listing: DirectoryListing,
): string => {
  const hash = createHash('sha1');
  hash.update(String(Math.floor(mtimeMs)));
  for (const { name, isDirectory } of listing.entries) {
    hash.update(`\n${name}${isDirectory ? '/' : ''}`);
  }
  return `W/"${hash.digest('hex')}"`;
};

/**
 * Computes the validators for `entity`. A directory listing that the caller
 * already read can be passed in so that tag and body describe the same
 * entries; otherwise it is read here.
 */
export const computeValidators = async (
  entity: FileEntity | DirectoryEntity,
  config: HandlerConfig,
  listing?: DirectoryListing,
): Promise<Validators> => {
  const { mtimeMs } = entity.stats;

  if (entity.kind === 'file') {
    if (!config.etag) {
      return {
        etag: weakFileTag(entity.stats.size, mtimeMs),
        lastModified: truncateToSeconds(mtimeMs),
      };
    }

    let sha: string;
    try {
      sha = await calculateSha(entity.absolutePath);
    } catch (err: unknown) {
      throw new IOFailure('Could not read the requested file', err);
    }

    return { etag: `"${sha}"`, lastModified: truncateToSeconds(mtimeMs) };
  }

  const entries = listing ?? (await readListing(entity, config));

  return {
    etag: directoryTag(mtimeMs, entries),
    lastModified: truncateToSeconds(Math.max(mtimeMs, entries.newestMtimeMs)),
  };
};

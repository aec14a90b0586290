// source/handler/resolve.ts
// Maps a request target onto the served directory.

import { promisify } from 'node:util';
import path from 'node:path';
import { access, constants, lstat, realpath } from 'node:fs';
import isPathInside from 'path-is-inside';
import { IOFailure, errorCode } from '../errors.js';
import type { Stats } from 'node:fs';
import type { AbsentEntity, HandlerConfig, Resolution } from '../types.js';

const lstatAsync = promisify(lstat);
const realpathAsync = promisify(realpath);
const accessAsync = promisify(access);

const ABSENT: AbsentEntity = Object.freeze({ kind: 'absent' });

// Errors that mean "there is nothing here the client may see".
const absentCodes = new Set([
  'ENOENT',
  'ENOTDIR',
  'ENAMETOOLONG',
  'ELOOP',
  'EACCES',
  'EPERM',
]);

const isAbsent = (err: unknown): boolean =>
  absentCodes.has(errorCode(err) ?? '');

/**
 * Strips query and fragment and percent-decodes the remainder. Returns `null`
 * for targets that cannot be decoded or that smuggle a NUL byte.
 */
export const decodeRequestPath = (target: string): string | null => {
  const [pathname = ''] = target.split(/[?#]/, 1);

  let decoded: string;
  try {
    decoded = decodeURIComponent(pathname);
  } catch {
    return null;
  }

  return decoded.includes('\0') ? null : decoded;
};

/** `/`-rooted, dot-free form of a decoded path; keeps a trailing slash. */
export const normalizeRequestPath = (decoded: string): string =>
  path.posix.normalize(path.posix.join('/', decoded));

/** True when the `..` segments of `decoded` step above its first segment. */
export const climbsAboveRoot = (decoded: string): boolean => {
  let depth = 0;

  for (const segment of decoded.split('/')) {
    if (segment === '..') {
      depth -= 1;
      if (depth < 0) return true;
    } else if (segment !== '' && segment !== '.') {
      depth += 1;
    }
  }

  return false;
};

const canAccess = async (target: string, mode: number): Promise<boolean> => {
  try {
    await accessAsync(target, mode);
    return true;
  } catch (err: unknown) {
    if (isAbsent(err)) {
      return false;
    }
    throw new IOFailure('Could not check access to the requested path', err);
  }
};

/**
 * Resolves `requestPath` against `config.public`.
 *
 * Paths that climb above the root at any point, even to come back in, yield
 * `invalid-path`; missing, unreadable and special entries yield `absent`. The root itself, however it
 * is spelled (`''`, `/`, `/a/..`), is always a directory.
 */
export const resolve = async (
  config: HandlerConfig,
  requestPath: string,
): Promise<Resolution> => {
  const root = config.public;
  const decoded = decodeRequestPath(requestPath);

  if (decoded === null || climbsAboveRoot(decoded)) {
    return { kind: 'invalid-path' };
  }

  const absolutePath = path.join(root, decoded);

  if (!isPathInside(absolutePath, root)) {
    return { kind: 'invalid-path' };
  }

  let realPath: string;
  let stats: Stats;

  try {
    realPath = await realpathAsync(absolutePath);
    stats = await lstatAsync(realPath);
  } catch (err: unknown) {
    if (isAbsent(err)) {
      return ABSENT;
    }
    throw new IOFailure('Could not inspect the requested path', err);
  }

  // Any link along the way makes the real path differ from the lexical one.
  if (realPath !== path.resolve(absolutePath)) {
    if (!config.symlinks || !isPathInside(realPath, root)) {
      return ABSENT;
    }
  }

  if (stats.isFile()) {
    if (!(await canAccess(realPath, constants.R_OK))) {
      return ABSENT;
    }
    return { kind: 'file', absolutePath: realPath, stats };
  }

  if (stats.isDirectory()) {
    if (!(await canAccess(realPath, constants.R_OK | constants.X_OK))) {
      return ABSENT;
    }
    return {
      kind: 'directory',
      absolutePath: realPath,
      stats,
      requestPath: normalizeRequestPath(decoded),
    };
  }

  return ABSENT;
};

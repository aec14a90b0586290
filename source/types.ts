// source/types.ts
// Types shared between the request pipeline and the transport around it.

import type { Stats } from 'node:fs';

export interface HandlerConfig {
  /** Absolute, real path of the directory being served. */
  public: string;
  /** Hash file contents into a strong ETag instead of the weak size/mtime tag. */
  etag?: boolean;
  symlinks?: boolean;
  /** Globs for entry names hidden from directory listings. */
  unlisted?: readonly string[];
}

export type RequestMethod = 'GET' | 'HEAD';

export type RequestHeaders = Record<string, string | string[] | undefined>;

export interface ServeRequest {
  method: RequestMethod;
  /** Raw request target, possibly percent-encoded and carrying a query string. */
  path: string;
  /** Looked up case-insensitively; `node:http` delivers them in lower case. */
  headers: RequestHeaders;
}

export interface FileEntity {
  kind: 'file';
  absolutePath: string;
  stats: Stats;
}

export interface DirectoryEntity {
  kind: 'directory';
  absolutePath: string;
  stats: Stats;
  /** Decoded request path, used for titles and relative links. */
  requestPath: string;
}

export interface AbsentEntity {
  kind: 'absent';
}

export type ResolvedEntity = FileEntity | DirectoryEntity | AbsentEntity;

export interface InvalidPath {
  kind: 'invalid-path';
}

export type Resolution = ResolvedEntity | InvalidPath;

export interface Validators {
  etag: string;
  /** Whole seconds; the milliseconds are always zero. */
  lastModified: Date;
}

export type ConditionalOutcome = 'full' | 'not-modified' | 'precondition-failed';

export interface ListingEntry {
  name: string;
  isDirectory: boolean;
}

export interface DirectoryListing {
  entries: ListingEntry[];
  /** Newest modification time among the listed entries, in milliseconds. */
  newestMtimeMs: number;
}

export type BodySource =
  | { kind: 'empty' }
  | { kind: 'buffer'; data: Buffer }
  | { kind: 'file'; absolutePath: string };

export interface ResponseDescription {
  status: number;
  headers: Record<string, string | number>;
  body: BodySource;
}

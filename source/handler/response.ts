// source/handler/response.ts
// Turns a resolution and its conditional outcome into status, headers and a
// body source.

import path from 'node:path';
import mime from 'mime-types';
import contentDisposition from 'content-disposition';
import type {
  BodySource,
  ConditionalOutcome,
  RequestMethod,
  Resolution,
  ResponseDescription,
  Validators,
} from '../types.js';

export const DIRECTORY_CONTENT_TYPE = 'text/html; charset=utf-8';
export const FALLBACK_CONTENT_TYPE = 'application/octet-stream';

export interface Evaluated {
  outcome: ConditionalOutcome;
  validators: Validators;
}

const EMPTY: BodySource = Object.freeze({ kind: 'empty' });

export const emptyResponse = (status: number): ResponseDescription => ({
  status,
  headers: { 'Content-Length': 0 },
  body: EMPTY,
});

const validatorHeaders = (
  validators: Validators,
): Record<string, string> => ({
  ETag: validators.etag,
  'Last-Modified': validators.lastModified.toUTCString(),
});

/** Looks up the extension only; a bare `json` is not a JSON file. */
export const contentTypeFor = (fileName: string): string => {
  const extension = path.extname(fileName);
  return (extension && mime.contentType(extension)) || FALLBACK_CONTENT_TYPE;
};

const describe = (
  entity: Resolution,
  evaluated: Evaluated | undefined,
  listing: Buffer | undefined,
): ResponseDescription => {
  if (entity.kind === 'invalid-path') {
    return emptyResponse(400);
  }

  if (entity.kind === 'absent') {
    return emptyResponse(404);
  }

  if (!evaluated) {
    throw new TypeError(`Cannot build a response for a ${entity.kind} without validators`);
  }

  const { outcome, validators } = evaluated;

  if (outcome === 'precondition-failed') {
    return {
      status: 412,
      headers: { ...validatorHeaders(validators), 'Content-Length': 0 },
      body: EMPTY,
    };
  }

  if (outcome === 'not-modified') {
    return { status: 304, headers: validatorHeaders(validators), body: EMPTY };
  }

  if (entity.kind === 'directory') {
    if (!listing) {
      throw new TypeError('Cannot build a directory response without a listing');
    }

    return {
      status: 200,
      headers: {
        'Content-Type': DIRECTORY_CONTENT_TYPE,
        'Content-Length': listing.byteLength,
        ...validatorHeaders(validators),
      },
      body: { kind: 'buffer', data: listing },
    };
  }

  const { base } = path.parse(entity.absolutePath);

  return {
    status: 200,
    headers: {
      'Content-Type': contentTypeFor(base),
      'Content-Length': entity.stats.size,
      'Content-Disposition': contentDisposition(base, { type: 'inline' }),
      ...validatorHeaders(validators),
    },
    body: { kind: 'file', absolutePath: entity.absolutePath },
  };
};

/**
 * Builds the response for `method`. HEAD gets exactly the headers GET would,
 * `Content-Length` included, and never a body.
 */
export const build = (
  method: RequestMethod,
  entity: Resolution,
  evaluated?: Evaluated,
  listing?: Buffer,
): ResponseDescription => {
  const description = describe(entity, evaluated, listing);

  if (method === 'HEAD') {
    return { ...description, body: EMPTY };
  }

  return description;
};

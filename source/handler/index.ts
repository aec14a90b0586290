// source/handler/index.ts
// Static file server handler: directory listings and conditional requests.

import { createReadStream } from 'node:fs';
import { IOFailure } from '../errors.js';
import { logger } from '../utilities/logger.js';
import { evaluate } from './conditional.js';
import { readListing, renderListing } from './listing.js';
import { resolve } from './resolve.js';
import { build, emptyResponse } from './response.js';
import { computeValidators } from './validators.js';
import type { IncomingMessage, ServerResponse } from 'node:http';
import type {
  HandlerConfig,
  RequestMethod,
  ResponseDescription,
  ServeRequest,
} from '../types.js';

/**
 * Resolves, validates, evaluates and builds, in that order. Filesystem
 * failures after resolution surface as {@link IOFailure}.
 */
export const serve = async (
  request: ServeRequest,
  config: HandlerConfig,
): Promise<ResponseDescription> => {
  const entity = await resolve(config, request.path);

  if (entity.kind === 'invalid-path' || entity.kind === 'absent') {
    return build(request.method, entity);
  }

  // Read once so that the tag and the rendered body agree.
  const listing =
    entity.kind === 'directory' ? await readListing(entity, config) : undefined;
  const validators = await computeValidators(entity, config, listing);
  const outcome = evaluate(request.headers, validators);

  let body: Buffer | undefined;
  if (entity.kind === 'directory' && listing && outcome === 'full') {
    body = renderListing(listing, entity.requestPath);
  }

  return build(request.method, entity, { outcome, validators }, body);
};

const describeError = (err: unknown): string => {
  if (err instanceof IOFailure) {
    const cause = err.cause instanceof Error ? `: ${err.cause.message}` : '';
    return `${err.message}${cause}`;
  }
  if (err instanceof Error) {
    return err.stack ?? err.message;
  }
  return String(err);
};

const internalError = (response: ServerResponse, err: unknown): void => {
  if (process.env.NODE_ENV !== 'test') {
    logger.error(describeError(err));
  }

  if (response.headersSent) {
    response.destroy();
    return;
  }

  const { status, headers } = emptyResponse(500);
  response.writeHead(status, headers);
  response.end();
};

// The head goes out only once the file is open, so a file that disappears
// after resolution still gets a clean 500.
const sendFile = (
  response: ServerResponse,
  description: ResponseDescription,
  absolutePath: string,
): void => {
  const stream = createReadStream(absolutePath);

  stream.on('error', (err) => {
    internalError(response, new IOFailure('Could not stream the requested file', err));
  });
  stream.once('open', () => {
    response.writeHead(description.status, description.headers);
    stream.pipe(response);
  });
  response.on('close', () => {
    stream.destroy();
  });
};

export const send = (
  response: ServerResponse,
  description: ResponseDescription,
): void => {
  const { body } = description;

  if (body.kind === 'file') {
    sendFile(response, description, body.absolutePath);
    return;
  }

  response.writeHead(description.status, description.headers);

  if (body.kind === 'buffer') {
    response.end(body.data);
    return;
  }

  response.end();
};

const isSupportedMethod = (method: string): method is RequestMethod =>
  method === 'GET' || method === 'HEAD';

export const handler = async (
  request: IncomingMessage,
  response: ServerResponse,
  config: HandlerConfig,
): Promise<void> => {
  const method = request.method ?? 'GET';

  if (!isSupportedMethod(method)) {
    response.writeHead(405, { Allow: 'GET, HEAD', 'Content-Length': 0 });
    response.end();
    return;
  }

  let description: ResponseDescription;

  try {
    description = await serve(
      { method, path: request.url ?? '/', headers: request.headers },
      config,
    );
  } catch (err: unknown) {
    internalError(response, err);
    return;
  }

  send(response, description);
};

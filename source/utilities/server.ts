// source/utilities/server.ts
// Binds the handler to a `node:http` server.

import http from 'node:http';
import { handler } from '../handler/index.js';
import { logger } from './logger.js';
import type { HandlerConfig } from '../types.js';

export interface ServerOptions {
  port: number;
  host: string;
  requestLogging?: boolean;
}

export interface RunningServer {
  url: string;
  server: http.Server;
  close: () => Promise<void>;
}

const formatHost = (host: string): string =>
  host.includes(':') ? `[${host}]` : host;

export const startServer = (
  config: Readonly<HandlerConfig>,
  options: ServerOptions,
): Promise<RunningServer> =>
  new Promise((resolve, reject) => {
    const server = http.createServer((request, response) => {
      const started = Date.now();

      if (options.requestLogging) {
        response.on('finish', () => {
          logger.http(
            `${request.method ?? '-'} ${request.url ?? '-'}`,
            `${response.statusCode} in ${Date.now() - started} ms`,
          );
        });
      }

      handler(request, response, config).catch((err: unknown) => {
        logger.error(String(err));
      });
    });

    const close = (): Promise<void> =>
      new Promise((done, fail) => {
        server.close((err) => {
          if (err) {
            fail(err);
            return;
          }
          done();
        });
        server.closeAllConnections();
      });

    server.once('error', reject);
    server.listen(options.port, options.host, () => {
      server.off('error', reject);

      const address = server.address();
      if (address === null || typeof address === 'string') {
        reject(new Error('Server is not listening on a TCP port'));
        return;
      }

      resolve({
        url: `http://${formatHost(options.host)}:${address.port}`,
        server,
        close,
      });
    });
  });

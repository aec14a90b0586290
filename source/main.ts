#!/usr/bin/env node
// source/main.ts
// Command-line entry point: `dirserve [directory]`.

import { Command, InvalidArgumentError } from 'commander';
import { ConfigurationError, errorCode } from './errors.js';
import { loadConfiguration } from './utilities/config.js';
import { logger } from './utilities/logger.js';
import { startServer } from './utilities/server.js';
import type { HandlerConfig } from './types.js';
import type { RunningServer } from './utilities/server.js';

type CliOptions = {
  listen: number;
  host: string;
  config?: string;
  etag?: boolean;
  symlinks?: boolean;
  requestLogging: boolean;
};

const parsePort = (value: string): number => {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new InvalidArgumentError('Not a valid port number.');
  }
  return port;
};

const program = new Command();

program
  .name('dirserve')
  .description('Serve a directory over HTTP, with listings and cache validation')
  .version('0.1.0')
  .argument('[directory]', 'Directory to serve (default: current directory)')
  .option('-l, --listen <port>', 'Port to listen on', parsePort, 3000)
  .option('-H, --host <host>', 'Host to bind to', 'localhost')
  .option('-c, --config <path>', 'Path to a serve.json configuration file')
  .option('--etag', 'Send strong ETags hashed from file contents')
  .option('--symlinks', 'Follow symbolic links that stay inside the directory')
  .option('-L, --no-request-logging', 'Do not log each request')
  .action(async (directory: string | undefined) => {
    const options = program.opts<CliOptions>();

    let config: Readonly<HandlerConfig>;
    try {
      config = await loadConfiguration(process.cwd(), directory, {
        config: options.config,
        etag: options.etag,
        symlinks: options.symlinks,
      });
    } catch (err: unknown) {
      if (err instanceof ConfigurationError) {
        logger.error(err.message);
        process.exit(1);
      }
      throw err;
    }

    let running: RunningServer;
    try {
      running = await startServer(config, {
        port: options.listen,
        host: options.host,
        requestLogging: options.requestLogging,
      });
    } catch (err: unknown) {
      const reason = errorCode(err) === 'EADDRINUSE' ? 'is already in use' : 'is unavailable';
      logger.error(`Port ${options.listen} on ${options.host} ${reason}.`);
      process.exit(1);
    }

    logger.info(`Serving ${config.public}`);
    logger.log(running.url);

    if (options.host === '0.0.0.0' || options.host === '::') {
      logger.warn('Listening on all interfaces; other machines can read these files.');
    }

    const shutdown = (): void => {
      logger.info('Gracefully shutting down. Please wait...');
      running.close().then(
        () => process.exit(0),
        (err: unknown) => {
          logger.error(String(err));
          process.exit(1);
        },
      );
    };

    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
  });

await program.parseAsync(process.argv);

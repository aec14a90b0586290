// source/utilities/config.ts
// Builds the handler configuration from `serve.json` and command-line flags.

import { promisify } from 'node:util';
import path from 'node:path';
import { access, constants, readFile, realpath, stat } from 'node:fs';
import { z } from 'zod';
import { ConfigurationError, errorCode } from '../errors.js';
import type { Stats } from 'node:fs';
import type { HandlerConfig } from '../types.js';

const readFileAsync = promisify(readFile);
const realpathAsync = promisify(realpath);
const statAsync = promisify(stat);
const accessAsync = promisify(access);

export const CONFIG_FILE_NAME = 'serve.json';

export const ConfigFileSchema = z
  .object({
    public: z.string().min(1).optional(),
    etag: z.boolean().optional(),
    symlinks: z.boolean().optional(),
    unlisted: z.array(z.string().min(1)).optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

export interface ConfigFlags {
  /** Explicit configuration file; unlike the default one it must exist. */
  config?: string;
  etag?: boolean;
  symlinks?: boolean;
}

const readConfigFile = async (
  file: string,
  required: boolean,
): Promise<ConfigFile> => {
  let content: string;

  try {
    content = await readFileAsync(file, 'utf8');
  } catch (err: unknown) {
    if (!required && errorCode(err) === 'ENOENT') {
      return {};
    }
    throw new ConfigurationError(`Could not read ${file}`, err);
  }

  let json: unknown;
  try {
    json = JSON.parse(content);
  } catch (err: unknown) {
    throw new ConfigurationError(`${file} is not valid JSON`, err);
  }

  const result = ConfigFileSchema.safeParse(json);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid configuration in ${file}: ${issues}`);
  }

  return result.data;
};

/** Real path of `directory`, which must be a listable directory. */
export const checkRoot = async (directory: string): Promise<string> => {
  let root: string;

  try {
    root = await realpathAsync(directory);
  } catch (err: unknown) {
    throw new ConfigurationError(`Directory ${directory} does not exist`, err);
  }

  let stats: Stats;
  try {
    stats = await statAsync(root);
  } catch (err: unknown) {
    throw new ConfigurationError(`Could not inspect ${directory}`, err);
  }

  if (!stats.isDirectory()) {
    throw new ConfigurationError(`${directory} is not a directory`);
  }

  try {
    await accessAsync(root, constants.R_OK | constants.X_OK);
  } catch (err: unknown) {
    throw new ConfigurationError(`Directory ${directory} is not readable`, err);
  }

  return root;
};

/**
 * Loads the configuration once at startup. The served directory is `entry`
 * (relative to `cwd`), optionally redirected by `public` in the
 * configuration file; flags win over the file.
 */
export const loadConfiguration = async (
  cwd: string,
  entry: string | undefined,
  flags: ConfigFlags = {},
): Promise<Readonly<HandlerConfig>> => {
  const entryDirectory = path.resolve(cwd, entry ?? '.');
  const file = flags.config
    ? path.resolve(cwd, flags.config)
    : path.join(entryDirectory, CONFIG_FILE_NAME);
  const fromFile = await readConfigFile(file, Boolean(flags.config));

  const root = await checkRoot(
    path.resolve(entryDirectory, fromFile.public ?? '.'),
  );

  return Object.freeze({
    public: root,
    etag: flags.etag ?? fromFile.etag ?? false,
    symlinks: flags.symlinks ?? fromFile.symlinks ?? false,
    unlisted: Object.freeze([...(fromFile.unlisted ?? [])]),
  });
};

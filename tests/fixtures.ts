// tests/fixtures.ts
// Temporary directory trees for the tests.

import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import type { HandlerConfig } from '../source/types.js';

export interface Fixture {
  root: string;
  config: HandlerConfig;
  write: (relative: string, content: string) => Promise<string>;
  mkdir: (relative: string) => Promise<string>;
  setMtime: (relative: string, date: Date) => Promise<void>;
  cleanup: () => Promise<void>;
}

/** A real path under the OS temp directory, so links compare cleanly. */
export const createFixture = async (
  options: Omit<HandlerConfig, 'public'> = {},
): Promise<Fixture> => {
  const created = await fs.mkdtemp(path.join(os.tmpdir(), 'dirserve-'));
  const root = await fs.realpath(created);

  const write = async (relative: string, content: string): Promise<string> => {
    const target = path.join(root, relative);
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, content);
    return target;
  };

  const mkdir = async (relative: string): Promise<string> => {
    const target = path.join(root, relative);
    await fs.mkdir(target, { recursive: true });
    return target;
  };

  const setMtime = async (relative: string, date: Date): Promise<void> => {
    await fs.utimes(path.join(root, relative), date, date);
  };

  const cleanup = async (): Promise<void> => {
    await fs.rm(root, { recursive: true, force: true });
  };

  return {
    root,
    config: { public: root, ...options },
    write,
    mkdir,
    setMtime,
    cleanup,
  };
};

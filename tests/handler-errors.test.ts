import { afterAll, beforeAll, describe, expect, it, vi } from 'vitest';
import { serve } from '../source/handler/index.js';
import { IOFailure } from '../source/errors.js';
import { startServer } from '../source/utilities/server.js';
import { createFixture } from './fixtures.js';
import { rawRequest } from './http.js';
import type { Fixture } from './fixtures.js';
import type { RunningServer } from '../source/utilities/server.js';

vi.mock('../source/handler/validators.js', async (importOriginal) => {
  const original =
    await importOriginal<typeof import('../source/handler/validators.js')>();
  const errors = await import('../source/errors.js');

  return {
    ...original,
    computeValidators: vi.fn(async () => {
      const cause = Object.assign(new Error('EIO: i/o error, read'), {
        code: 'EIO',
      });
      throw new errors.IOFailure('Could not read the requested file', cause);
    }),
  };
});

describe('filesystem failures after resolution', () => {
  let fixture: Fixture;
  let server: RunningServer;

  beforeAll(async () => {
    fixture = await createFixture();
    await fixture.write('example.txt', 'hello');
    server = await startServer(fixture.config, { port: 0, host: '127.0.0.1' });
  });

  afterAll(async () => {
    await server.close();
    await fixture.cleanup();
  });

  it('surface from the pipeline as IOFailure', async () => {
    const pending = serve(
      { method: 'GET', path: '/example.txt', headers: {} },
      fixture.config,
    );

    await expect(pending).rejects.toBeInstanceOf(IOFailure);
    await expect(pending).rejects.toMatchObject({ code: 'EIO' });
  });

  it('become an empty 500 without internal details', async () => {
    const response = await rawRequest(server.url, '/example.txt');

    expect(response.status).toBe(500);
    expect(response.headers['content-length']).toBe('0');
    expect(response.body).toBe('');
  });

  it('do not affect paths that never reach validation', async () => {
    const response = await rawRequest(server.url, '/missing.txt');

    expect(response.status).toBe(404);
  });
});

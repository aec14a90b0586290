import fs from 'node:fs/promises';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { IOFailure } from '../source/errors.js';
import { resolve } from '../source/handler/resolve.js';
import {
  computeValidators,
  truncateToSeconds,
  weakFileTag,
} from '../source/handler/validators.js';
import { createFixture } from './fixtures.js';
import type { Fixture } from './fixtures.js';
import type {
  DirectoryEntity,
  FileEntity,
  HandlerConfig,
} from '../source/types.js';

const JAN_2 = new Date('2024-01-02T03:04:05Z');
const MAR_1 = new Date('2024-03-01T00:00:00Z');

const resolveFile = async (
  config: HandlerConfig,
  requestPath: string,
): Promise<FileEntity> => {
  const entity = await resolve(config, requestPath);
  if (entity.kind !== 'file') {
    throw new Error(`expected a file at ${requestPath}, got ${entity.kind}`);
  }
  return entity;
};

const resolveDirectory = async (
  config: HandlerConfig,
  requestPath: string,
): Promise<DirectoryEntity> => {
  const entity = await resolve(config, requestPath);
  if (entity.kind !== 'directory') {
    throw new Error(`expected a directory at ${requestPath}, got ${entity.kind}`);
  }
  return entity;
};

describe('truncateToSeconds', () => {
  it('drops milliseconds', () => {
    expect(truncateToSeconds(1704164645999).toISOString()).toBe(
      '2024-01-02T03:04:05.000Z',
    );
  });
});

describe('weakFileTag', () => {
  it('joins size and whole-millisecond mtime in hex', () => {
    expect(weakFileTag(5, 1704164645000.75)).toBe('W/"5-18cc820d888"');
  });
});

describe('computeValidators', () => {
  let fixture: Fixture;

  beforeEach(async () => {
    fixture = await createFixture();
    await fixture.write('example.txt', 'hello');
    await fixture.setMtime('example.txt', JAN_2);
  });

  afterEach(async () => {
    await fixture.cleanup();
  });

  describe('files', () => {
    it('derives a weak tag from size and mtime', async () => {
      const entity = await resolveFile(fixture.config, '/example.txt');
      const validators = await computeValidators(entity, fixture.config);

      expect(validators).toEqual({
        etag: 'W/"5-18cc820d888"',
        lastModified: JAN_2,
      });
    });

    it('hashes extension and content into a strong tag when enabled', async () => {
      const config = { ...fixture.config, etag: true };
      const entity = await resolveFile(config, '/example.txt');
      const validators = await computeValidators(entity, config);

      expect(validators.etag).toBe('"c6b23ca9965d702db2d561b08a077d2297db75d5"');
      expect(validators.lastModified).toEqual(JAN_2);
    });

    it('is stable while the file is unchanged', async () => {
      const first = await computeValidators(
        await resolveFile(fixture.config, '/example.txt'),
        fixture.config,
      );
      const second = await computeValidators(
        await resolveFile(fixture.config, '/example.txt'),
        fixture.config,
      );

      expect(second).toEqual(first);
    });

    it('changes when the content changes', async () => {
      const before = await computeValidators(
        await resolveFile(fixture.config, '/example.txt'),
        fixture.config,
      );
      await fixture.write('example.txt', 'hello, world');
      await fixture.setMtime('example.txt', MAR_1);
      const after = await computeValidators(
        await resolveFile(fixture.config, '/example.txt'),
        fixture.config,
      );

      expect(after.etag).not.toBe(before.etag);
      expect(after.lastModified).toEqual(MAR_1);
    });

    it('raises IOFailure when the file cannot be read for hashing', async () => {
      const config = { ...fixture.config, etag: true };
      const entity = await resolveFile(config, '/example.txt');
      await fs.rm(entity.absolutePath);

      await expect(computeValidators(entity, config)).rejects.toBeInstanceOf(
        IOFailure,
      );
    });
  });

  describe('directories', () => {
    beforeEach(async () => {
      await fixture.write('docs/b.txt', 'b');
      await fixture.write('docs/a.txt', 'a');
      await fixture.mkdir('docs/sub');
      await fixture.setMtime('docs/a.txt', JAN_2);
      await fixture.setMtime('docs/b.txt', MAR_1);
      await fixture.setMtime('docs/sub', JAN_2);
      await fixture.setMtime('docs', JAN_2);
    });

    it('hashes the directory mtime and the listed names', async () => {
      const entity = await resolveDirectory(fixture.config, '/docs/');
      const validators = await computeValidators(entity, fixture.config);

      expect(validators).toEqual({
        etag: 'W/"e5a47d3c5ad1ff3f4d6439177b3bb2707c45bda3"',
        lastModified: MAR_1,
      });
    });

    it('changes the tag when an entry is added', async () => {
      const before = await computeValidators(
        await resolveDirectory(fixture.config, '/docs/'),
        fixture.config,
      );
      await fixture.write('docs/c.txt', 'c');
      await fixture.setMtime('docs', JAN_2);
      const after = await computeValidators(
        await resolveDirectory(fixture.config, '/docs/'),
        fixture.config,
      );

      expect(after.etag).not.toBe(before.etag);
    });

    it('changes the tag when an entry is renamed', async () => {
      const before = await computeValidators(
        await resolveDirectory(fixture.config, '/docs/'),
        fixture.config,
      );
      await fs.rename(
        `${fixture.root}/docs/a.txt`,
        `${fixture.root}/docs/z.txt`,
      );
      await fixture.setMtime('docs', JAN_2);
      const after = await computeValidators(
        await resolveDirectory(fixture.config, '/docs/'),
        fixture.config,
      );

      expect(after.etag).not.toBe(before.etag);
    });

    it('ignores unlisted entries', async () => {
      const config = { ...fixture.config, unlisted: ['b.*'] };
      const withB = await computeValidators(
        await resolveDirectory(fixture.config, '/docs/'),
        fixture.config,
      );
      const withoutB = await computeValidators(
        await resolveDirectory(config, '/docs/'),
        config,
      );

      expect(withoutB.etag).not.toBe(withB.etag);
      expect(withoutB.lastModified).toEqual(JAN_2);
    });

    it('raises IOFailure when the directory vanished', async () => {
      const entity = await resolveDirectory(fixture.config, '/docs/');
      await fs.rm(entity.absolutePath, { recursive: true });

      await expect(
        computeValidators(entity, fixture.config),
      ).rejects.toBeInstanceOf(IOFailure);
    });
  });
});

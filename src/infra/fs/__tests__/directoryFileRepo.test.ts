import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, readdir, readFile, rm, writeFile, mkdir } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { DirectoryFileRepo } from '../directoryFileRepo.js';
import { PersistenceError } from '../../../domain/directory/errors.js';
import type { DirectoryRecord } from '../../../domain/directory/record.js';

describe('DirectoryFileRepo', () => {
  let dir: string;
  let filePath: string;
  let repo: DirectoryFileRepo;

  const record: DirectoryRecord = {
    users: [
      {
        username: 'john.doe',
        password_hash: 'hash-1',
        email: 'john@example.com',
        groups: ['IT'],
      },
    ],
    groups: [{ name: 'IT', members: ['john.doe'] }],
  };

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'directory-repo-'));
    filePath = join(dir, 'directory.json');
    repo = new DirectoryFileRepo(filePath);
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  describe('read', () => {
    it('should return null when the file does not exist', async () => {
      expect(await repo.read()).toBeNull();
    });

    it('should return the record written before', async () => {
      await repo.write(record);

      expect(await repo.read()).toEqual(record);
    });

    it('should accept group records without members', async () => {
      await writeFile(
        filePath,
        JSON.stringify({ users: [], groups: [{ name: 'IT' }] }),
        'utf8'
      );

      expect(await repo.read()).toEqual({ users: [], groups: [{ name: 'IT' }] });
    });

    it('should throw PersistenceError for invalid JSON', async () => {
      await writeFile(filePath, '{"users": [', 'utf8');

      await expect(repo.read()).rejects.toBeInstanceOf(PersistenceError);
    });

    it('should throw PersistenceError naming the bad field for a wrong shape', async () => {
      await writeFile(
        filePath,
        JSON.stringify({
          users: [{ username: 'a', password_hash: 1, email: 'a@example.com', groups: [] }],
          groups: [],
        }),
        'utf8'
      );

      await expect(repo.read()).rejects.toThrow(
        `Directory file has an invalid shape: users.0.password_hash: Expected string, received number (${filePath})`
      );
    });

    it('should throw PersistenceError when the path cannot be read as a file', async () => {
      await mkdir(filePath);

      const error = await repo.read().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(PersistenceError);
      expect(error).toHaveProperty('filePath', filePath);
    });
  });

  describe('write', () => {
    it('should write indented JSON with the file field names', async () => {
      await repo.write(record);

      const raw = await readFile(filePath, 'utf8');
      expect(raw).toBe(JSON.stringify(record, null, 2) + '\n');
    });

    it('should replace the whole file and leave no temporary files', async () => {
      await repo.write(record);
      await repo.write({ users: [], groups: [] });

      expect(await repo.read()).toEqual({ users: [], groups: [] });
      expect(await readdir(dir)).toEqual(['directory.json']);
    });

    it('should create missing parent directories', async () => {
      const nested = new DirectoryFileRepo(join(dir, 'a', 'b', 'directory.json'));

      await nested.write(record);

      expect(await nested.read()).toEqual(record);
    });

    it('should throw PersistenceError when the target cannot be replaced', async () => {
      await mkdir(join(filePath, 'occupied'), { recursive: true });

      await expect(repo.write(record)).rejects.toBeInstanceOf(PersistenceError);
      expect((await readdir(dir)).sort()).toEqual(['directory.json']);
    });
  });
});

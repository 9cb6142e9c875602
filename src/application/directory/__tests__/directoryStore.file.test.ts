import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { DirectoryStore } from '../directoryStore.js';
import { DirectoryFileRepo, directoryRecordSchema } from '../../../infra/fs/directoryFileRepo.js';
import { createPasswordHasher, Password } from '../../../domain/auth/password.js';
import { PersistenceError } from '../../../domain/directory/errors.js';

describe('DirectoryStore with DirectoryFileRepo', () => {
  let dir: string;
  let filePath: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'directory-store-'));
    filePath = join(dir, 'directory.json');
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it('should persist after each mutation and reload in a new store', async () => {
    const store = new DirectoryStore(new DirectoryFileRepo(filePath), createPasswordHasher('argon2'));
    await store.load();
    await store.addUser('john.doe', 'Secret1!', 'john@example.com');
    await store.createGroup('IT');
    await store.addUserToGroup('john.doe', 'IT');

    const stored = directoryRecordSchema.parse(JSON.parse(await readFile(filePath, 'utf8')));
    expect(stored.groups).toEqual([{ name: 'IT', members: ['john.doe'] }]);
    expect(stored.users[0].password_hash.startsWith('$argon2id$')).toBe(true);

    const reloaded = new DirectoryStore(new DirectoryFileRepo(filePath), createPasswordHasher('argon2'));
    await reloaded.load();

    expect(reloaded.listUsers()).toEqual([
      { username: 'john.doe', email: 'john@example.com', groups: ['IT'] },
    ]);
    expect(reloaded.listGroups()).toEqual([{ name: 'IT', members: ['john.doe'] }]);
    expect(await reloaded.authenticate('john.doe', 'Secret1!')).toBe('authenticated');
    expect(await reloaded.authenticate('john.doe', 'Secret1!x')).toBe('failed');
  });

  it('should load a file written without group members', async () => {
    await writeFile(
      filePath,
      JSON.stringify({
        users: [
          {
            username: 'john.doe',
            password_hash: Password.sha256('Secret1!'),
            email: 'john@example.com',
            groups: ['IT'],
          },
        ],
        groups: [{ name: 'IT' }],
      }),
      'utf8'
    );

    const store = new DirectoryStore(new DirectoryFileRepo(filePath), createPasswordHasher('argon2'));
    await store.load();

    expect(store.listGroups()).toEqual([{ name: 'IT', members: ['john.doe'] }]);
    expect(await store.authenticate('john.doe', 'Secret1!')).toBe('authenticated');
  });

  it('should refuse to start from a corrupt file', async () => {
    await writeFile(filePath, 'not json', 'utf8');

    const store = new DirectoryStore(new DirectoryFileRepo(filePath), createPasswordHasher('sha256'));

    await expect(store.load()).rejects.toBeInstanceOf(PersistenceError);
    expect(await readFile(filePath, 'utf8')).toBe('not json');
  });
});

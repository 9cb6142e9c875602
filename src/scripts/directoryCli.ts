#!/usr/bin/env node
import { createInterface } from 'readline';
import { realpathSync } from 'fs';
import { stdin, stdout } from 'process';
import type { Readable, Writable } from 'stream';
import { fileURLToPath } from 'url';
import { z, ZodError } from 'zod';
import { DirectoryStore } from '../application/directory/directoryStore.js';
import { DirectoryFileRepo } from '../infra/fs/directoryFileRepo.js';
import { createPasswordHasher } from '../domain/auth/password.js';
import { loadConfig } from '../config.js';

/**
 * Line-based console. `ask` resolves to null once input is closed.
 */
export interface MenuIO {
  ask(question: string): Promise<string | null>;
  print(line: string): void;
}

export const MENU = [
  '1. Add user',
  '2. List users',
  '3. Delete user',
  '4. Create group',
  '5. Add user to group',
  '6. List groups',
  '7. Authenticate',
  '8. Exit',
];

const nameSchema = z.string().trim().min(1, 'Must not be empty');

const addUserSchema = z.object({
  username: nameSchema,
  password: z.string().min(1, 'Must not be empty'),
  email: z.string().trim().email(),
});

const credentialsSchema = z.object({
  username: nameSchema,
  password: z.string(),
});

const membershipSchema = z.object({
  username: nameSchema,
  group: nameSchema,
});

class InputClosed extends Error {
  constructor() {
    super('Input closed');
    this.name = 'InputClosed';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

async function prompt(io: MenuIO, question: string): Promise<string> {
  const answer = await io.ask(question);
  if (answer === null) {
    throw new InputClosed();
  }
  return answer;
}

function formatIssues(error: ZodError): string {
  return error.errors
    .map((e) => (e.path.length > 0 ? `${e.path.join('.')}: ${e.message}` : e.message))
    .join('; ');
}

async function handleChoice(
  choice: string,
  store: DirectoryStore,
  io: MenuIO
): Promise<void> {
  switch (choice) {
    case '1': {
      const input = addUserSchema.parse({
        username: await prompt(io, 'Username: '),
        password: await prompt(io, 'Password: '),
        email: await prompt(io, 'Email: '),
      });
      const result = await store.addUser(input.username, input.password, input.email);
      io.print(
        result === 'created'
          ? `User '${input.username}' added.`
          : `User '${input.username}' already exists.`
      );
      return;
    }
    case '2': {
      const users = store.listUsers();
      if (users.length === 0) {
        io.print('No users found.');
        return;
      }
      for (const user of users) {
        const groups = user.groups.length > 0 ? user.groups.join(', ') : '-';
        io.print(`${user.username} <${user.email}> groups: ${groups}`);
      }
      return;
    }
    case '3': {
      const username = nameSchema.parse(await prompt(io, 'Username: '));
      const result = await store.deleteUser(username);
      io.print(
        result === 'deleted' ? `User '${username}' deleted.` : `User '${username}' not found.`
      );
      return;
    }
    case '4': {
      const name = nameSchema.parse(await prompt(io, 'Group name: '));
      const result = await store.createGroup(name);
      io.print(
        result === 'created' ? `Group '${name}' created.` : `Group '${name}' already exists.`
      );
      return;
    }
    case '5': {
      const input = membershipSchema.parse({
        username: await prompt(io, 'Username: '),
        group: await prompt(io, 'Group name: '),
      });
      const result = await store.addUserToGroup(input.username, input.group);
      io.print(
        result === 'added'
          ? `User '${input.username}' added to group '${input.group}'.`
          : 'User or group not found.'
      );
      return;
    }
    case '6': {
      const groups = store.listGroups();
      if (groups.length === 0) {
        io.print('No groups found.');
        return;
      }
      for (const group of groups) {
        const members = group.members.length > 0 ? group.members.join(', ') : '-';
        io.print(`${group.name}: ${members}`);
      }
      return;
    }
    case '7': {
      const input = credentialsSchema.parse({
        username: await prompt(io, 'Username: '),
        password: await prompt(io, 'Password: '),
      });
      const result = await store.authenticate(input.username, input.password);
      io.print(result === 'authenticated' ? 'Authentication successful.' : 'Authentication failed.');
      return;
    }
    default:
      io.print('Invalid choice.');
  }
}

/**
 * Run the menu until the user exits or input closes. Either way the
 * directory is saved before returning.
 */
export async function runMenu(store: DirectoryStore, io: MenuIO): Promise<void> {
  try {
    for (;;) {
      for (const line of MENU) {
        io.print(line);
      }
      const choice = (await prompt(io, 'Choice: ')).trim();
      if (choice === '8') {
        break;
      }

      try {
        await handleChoice(choice, store, io);
      } catch (error) {
        if (!(error instanceof ZodError)) {
          throw error;
        }
        io.print(`Invalid input: ${formatIssues(error)}`);
      }
    }
  } catch (error) {
    if (!(error instanceof InputClosed)) {
      throw error;
    }
  }

  await store.save();
  io.print('Goodbye.');
}

/**
 * Console over a pair of streams. Lines are read through one iterator, so
 * lines that arrive before the next question are queued, not dropped.
 */
export function createConsoleIO(
  input: Readable = stdin,
  output: Writable = stdout
): MenuIO & { close(): void } {
  const rl = createInterface({ input, crlfDelay: Infinity, terminal: false });
  const lines = rl[Symbol.asyncIterator]();
  let ended = false;

  return {
    ask: async (question) => {
      if (ended) {
        return null;
      }
      output.write(question);
      const next = await lines.next();
      if (next.done) {
        ended = true;
        return null;
      }
      return next.value;
    },
    print: (line) => {
      output.write(`${line}\n`);
    },
    close: () => rl.close(),
  };
}

/**
 * True when `scriptPath` (process.argv[1]) is this module. Both sides are
 * resolved through symlinks, as npm installs bins as links.
 */
export function isEntryPoint(scriptPath: string | undefined, moduleUrl: string): boolean {
  if (!scriptPath) {
    return false;
  }
  try {
    return realpathSync(scriptPath) === realpathSync(fileURLToPath(moduleUrl));
  } catch {
    return false;
  }
}

export async function main(): Promise<void> {
  const config = loadConfig();
  const repo = new DirectoryFileRepo(config.directoryFile);
  const store = new DirectoryStore(repo, createPasswordHasher(config.passwordHashMode));

  await store.load();
  console.log(
    `Loaded ${store.listUsers().length} users and ${store.listGroups().length} groups from ${repo.filePath}`
  );

  const io = createConsoleIO();
  try {
    await runMenu(store, io);
  } finally {
    io.close();
  }
}

// Run if called directly
if (isEntryPoint(process.argv[1], import.meta.url)) {
  main()
    .then(() => {
      process.exit(0);
    })
    .catch((error) => {
      console.error('Fatal error:', error);
      process.exit(1);
    });
}

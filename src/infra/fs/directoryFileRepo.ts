import { mkdir, readFile, rename, rm, writeFile } from 'fs/promises';
import { dirname, resolve } from 'path';
import { randomUUID } from 'crypto';
import { z, ZodError } from 'zod';
import type { DirectoryRecord, DirectoryRepo } from '../../domain/directory/record.js';
import { PersistenceError } from '../../domain/directory/errors.js';

const userRecordSchema = z.object({
  username: z.string(),
  password_hash: z.string(),
  email: z.string(),
  groups: z.array(z.string()),
});

const groupRecordSchema = z.object({
  name: z.string(),
  members: z.array(z.string()).optional(),
});

export const directoryRecordSchema = z.object({
  users: z.array(userRecordSchema),
  groups: z.array(groupRecordSchema),
});

function hasErrorCode(error: unknown, code: string): boolean {
  return (
    error !== null &&
    typeof error === 'object' &&
    'code' in error &&
    error.code === code
  );
}

function describeError(error: unknown): string {
  if (error instanceof ZodError) {
    return error.errors
      .map((e) => `${e.path.join('.') || '<root>'}: ${e.message}`)
      .join('; ');
  }
  return error instanceof Error ? error.message : String(error);
}

/**
 * Directory snapshot stored as one JSON file.
 * Writes go to a temporary sibling file which is then renamed over the target.
 */
export class DirectoryFileRepo implements DirectoryRepo {
  readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = resolve(filePath);
  }

  async read(): Promise<DirectoryRecord | null> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf8');
    } catch (error: unknown) {
      if (hasErrorCode(error, 'ENOENT')) {
        console.log(`No directory file at ${this.filePath}, starting empty`);
        return null;
      }
      throw new PersistenceError(
        this.filePath,
        `Failed to read directory file: ${describeError(error)}`,
        error
      );
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error: unknown) {
      throw new PersistenceError(
        this.filePath,
        `Directory file is not valid JSON: ${describeError(error)}`,
        error
      );
    }

    const result = directoryRecordSchema.safeParse(parsed);
    if (!result.success) {
      throw new PersistenceError(
        this.filePath,
        `Directory file has an invalid shape: ${describeError(result.error)}`,
        result.error
      );
    }

    return result.data;
  }

  async write(record: DirectoryRecord): Promise<void> {
    const tempPath = `${this.filePath}.${randomUUID()}.tmp`;
    const json = JSON.stringify(record, null, 2) + '\n';

    try {
      await mkdir(dirname(this.filePath), { recursive: true });
      await writeFile(tempPath, json, 'utf8');
      await rename(tempPath, this.filePath);
    } catch (error: unknown) {
      try {
        await rm(tempPath, { force: true });
      } catch (cleanupError: unknown) {
        console.warn(`Failed to remove temporary file ${tempPath}:`, cleanupError);
      }
      throw new PersistenceError(
        this.filePath,
        `Failed to write directory file: ${describeError(error)}`,
        error
      );
    }
  }
}

import dotenv from 'dotenv';
import { z } from 'zod';
import { PASSWORD_HASH_MODES, type PasswordHashMode } from './domain/auth/password.js';

const envSchema = z.object({
  DIRECTORY_FILE: z.string().min(1).default('directory.json'),
  PASSWORD_HASH: z.enum(PASSWORD_HASH_MODES).default('argon2'),
});

export interface DirectoryConfig {
  directoryFile: string;
  passwordHashMode: PasswordHashMode;
}

/**
 * Read configuration from the environment (and .env when called without
 * an explicit env). Throws ZodError on invalid values.
 */
export function loadConfig(env?: NodeJS.ProcessEnv): DirectoryConfig {
  if (!env) {
    dotenv.config();
  }

  const parsed = envSchema.parse(env ?? process.env);
  return {
    directoryFile: parsed.DIRECTORY_FILE,
    passwordHashMode: parsed.PASSWORD_HASH,
  };
}

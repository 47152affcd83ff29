// src/config/env.ts
import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const optionalString = z
  .string()
  .trim()
  .transform((value) => (value === '' ? undefined : value))
  .optional();

export const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().positive().default(8000),
  DATABASE_URL: optionalString,
  DATABASE_NAME: optionalString,
});

export interface AppConfig {
  env: 'development' | 'test' | 'production';
  port: number;
  databaseUrl?: string;
  databaseName?: string;
}

/**
 * Parses environment variables into the typed application config.
 * Throws when a variable is present but invalid (e.g. a non-numeric PORT).
 */
export const loadConfig = (source: NodeJS.ProcessEnv = process.env): AppConfig => {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const invalid = parsed.error.issues.map((issue) => issue.path.join('.')).join(', ');
    throw new Error(`Invalid environment configuration: ${invalid}`);
  }

  return {
    env: parsed.data.NODE_ENV,
    port: parsed.data.PORT,
    databaseUrl: parsed.data.DATABASE_URL,
    databaseName: parsed.data.DATABASE_NAME,
  };
};

export const config = loadConfig();

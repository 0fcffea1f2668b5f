/**
 * Configuration
 * Environment-derived settings, validated once at startup
 */

import { z } from 'zod';
import { ConfigError } from './errors.js';

export interface AppConfig {
  port: number;
  host: string;
  databasePath: string;
  corsOrigins: string[];
}

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(5100),
  HOST: z.string().min(1).default('localhost'),
  DATABASE_PATH: z.string().min(1).default('data/catalog.db'),
  CORS_ORIGINS: z
    .string()
    .default('http://localhost:4321')
    .transform(value => value.split(',').map(origin => origin.trim()).filter(Boolean)),
});

/**
 * Read configuration from environment variables (PORT, HOST, DATABASE_PATH, CORS_ORIGINS)
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  return {
    port: parsed.data.PORT,
    host: parsed.data.HOST,
    databasePath: parsed.data.DATABASE_PATH,
    corsOrigins: parsed.data.CORS_ORIGINS,
  };
}

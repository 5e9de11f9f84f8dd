/**
 * Runtime configuration
 *
 * Validates the environment before the stores or the server are built
 * from it. Entry points call loadEnvironmentConfig, which reads .env first;
 * importing this module has no side effects.
 */

import dotenv from 'dotenv';
import path from 'path';
import { z } from 'zod';
import { DocumentNames } from '../types';

const documentName = z
  .string()
  .min(1)
  .regex(/\.json$/, 'Document names must end in .json');

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  DATA_DIR: z.string().min(1).default('data'),
  HOTELS_DOCUMENT: documentName.default('hotels.json'),
  CUSTOMERS_DOCUMENT: documentName.default('customers.json'),
  RESERVATIONS_DOCUMENT: documentName.default('reservations.json'),
  PORT: z.coerce.number().int().min(1).max(65535).default(3080),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).optional()
});

export type LogLevel = NonNullable<z.infer<typeof envSchema>['LOG_LEVEL']>;

export interface AppConfig {
  env: 'development' | 'production' | 'test';
  dataDir: string;
  documents: DocumentNames;
  port: number;
  logLevel: LogLevel;
}

/**
 * Builds the application config from an environment map
 * @throws Error listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const problems = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${problems}`);
  }

  const values = parsed.data;
  return {
    env: values.NODE_ENV,
    dataDir: path.resolve(values.DATA_DIR),
    documents: {
      hotels: values.HOTELS_DOCUMENT,
      customers: values.CUSTOMERS_DOCUMENT,
      reservations: values.RESERVATIONS_DOCUMENT
    },
    port: values.PORT,
    logLevel: values.LOG_LEVEL ?? (values.NODE_ENV === 'production' ? 'info' : 'debug')
  };
}

/** Loads .env into process.env, then builds the config from it */
export function loadEnvironmentConfig(): AppConfig {
  dotenv.config();
  return loadConfig(process.env);
}

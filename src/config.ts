import { z } from 'zod';

import { ConfigError } from './errors.js';

/**
 * Zod schema for all supported environment variables.
 * Uses .coerce for numbers/booleans, provides defaults, and enforces required fields.
 */
export const EnvSchema = z.object({
  // Mutation gate
  ADMIN_SECRET: z.string().min(1, { message: 'ADMIN_SECRET must not be empty' }),

  BACKUPS_DIR: z.string().default('./data/backups'),

  CATALOG_DATA_DIR: z.string().default('./data/catalog'),

  CORS_ORIGIN: z.string().optional(),

  EXAMPLES_FILE: z.string().default('./data/examples/prompts.json'),

  HOST: z.string().default('localhost'),

  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),

  NAME: z.string().default('prompt-catalog'),

  NODE_ENV: z.string().optional(),

  PORT: z.coerce.number().int().positive().default(3003),

  POSTGRES_DATABASE: z.string().optional(),

  // Postgres
  POSTGRES_HOST: z.string().optional(),

  // Writers hold one connection for the advisory lock while reading and committing on another.
  POSTGRES_MAX_CONNECTIONS: z.coerce
    .number()
    .int()
    .min(2, { message: 'Must be at least 2: the catalog lock holds one connection.' })
    .optional(),

  POSTGRES_PASSWORD: z.string().optional(),

  POSTGRES_PORT: z.coerce.number().int().positive().optional(),

  POSTGRES_SCHEMA_FILE: z.string().default('./sql/schema.sql'),

  POSTGRES_SSL: z
    .enum(['true', 'false'])
    .default('false')
    .transform(value => value === 'true'),

  POSTGRES_USER: z.string().optional(),

  STORAGE_TYPE: z.enum(['file', 'memory', 'postgres']).default('file'),

  VERSION: z.string().default('1.0.0'),
});

export type EnvVars = z.infer<typeof EnvSchema>;

export type StorageType = EnvVars['STORAGE_TYPE'];

export interface StorageConfig {
  type: StorageType;
  dataDir: string;
  postgres: {
    database?: string;
    host?: string;
    maxConnections?: number;
    password?: string;
    port?: number;
    schemaFile: string;
    ssl: boolean;
    user?: string;
  };
}

export interface CatalogConfig {
  name: string;
  version: string;
  adminSecret: string;
  backupsDir: string;
  examplesFile: string;
  logLevel: EnvVars['LOG_LEVEL'];
  prettyLogs: boolean;
  http: {
    host: string;
    port: number;
    corsOrigin?: string;
  };
  storage: StorageConfig;
}

/**
 * Validates an environment record and shapes it into the catalog configuration.
 * Throws ConfigError listing every offending variable.
 */
export function parseConfig(env: NodeJS.ProcessEnv): CatalogConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(result.error.errors.map(e => `- ${e.path.join('.')}: ${e.message}`));
  }
  const vars = result.data;

  return {
    adminSecret: vars.ADMIN_SECRET,
    backupsDir: vars.BACKUPS_DIR,
    examplesFile: vars.EXAMPLES_FILE,
    http: {
      corsOrigin: vars.CORS_ORIGIN,
      host: vars.HOST,
      port: vars.PORT,
    },
    logLevel: vars.LOG_LEVEL,
    name: vars.NAME,
    prettyLogs: vars.NODE_ENV !== 'production',
    storage: {
      dataDir: vars.CATALOG_DATA_DIR,
      postgres: {
        database: vars.POSTGRES_DATABASE,
        host: vars.POSTGRES_HOST,
        maxConnections: vars.POSTGRES_MAX_CONNECTIONS,
        password: vars.POSTGRES_PASSWORD,
        port: vars.POSTGRES_PORT,
        schemaFile: vars.POSTGRES_SCHEMA_FILE,
        ssl: vars.POSTGRES_SSL,
        user: vars.POSTGRES_USER,
      },
      type: vars.STORAGE_TYPE,
    },
    version: vars.VERSION,
  };
}

/**
 * Loads and validates the configuration from process.env.
 * Prints a clear error and exits if validation fails.
 */
export function loadConfig(): CatalogConfig {
  try {
    return parseConfig(process.env);
  } catch (error: unknown) {
    if (error instanceof ConfigError) {
      console.error(`\nInvalid or missing environment variables:\n${error.issues.join('\n')}`);
      process.exit(1);
    }
    throw error;
  }
}

import { z } from 'zod';

const envSchema = z.object({
  NODE_ENV: z
    .enum(['development', 'production', 'test'])
    .default('development'),
  DATABASE_URL: z.string().url().optional(),
  DB_HOST: z.string().default('localhost'),
  DB_PORT: z.coerce.number().int().min(1).max(65535).default(5432),
  DB_USER: z.string().default('postgres'),
  DB_PASSWORD: z.string().optional(),
  DB_NAME: z.string().min(1).default('dwca_taxons'),
  ADMIN_DB_NAME: z.string().min(1).default('postgres'),
  DB_POOL_MAX: z.coerce.number().int().positive().default(10),
  DB_IDLE_TIMEOUT: z.coerce.number().default(20),
  DB_CONNECT_TIMEOUT: z.coerce.number().default(30),
  IMPORT_BATCH_SIZE: z.coerce.number().int().positive().default(100),
  NOMENCLATURES: z.string().default('NCBI,COL,GBIF'),
  TAXON_TABLE_PREFIX: z.string().min(1).default('taxon_'),
  DEBUG: z.string().optional(),
});

export type Env = z.infer<typeof envSchema>;

export let env: Env = envSchema.parse(process.env);

export const refreshEnv = (): Env => {
  env = envSchema.parse(process.env);
  return env;
};

export const parseEnv = (source: Record<string, string | undefined>): Env =>
  envSchema.parse(source);

export const getNomenclatures = (config: Env = env): string[] =>
  config.NOMENCLATURES.split(',')
    .map((name) => name.trim())
    .filter((name) => name.length > 0);

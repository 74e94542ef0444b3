import dotenv from 'dotenv';
import path from 'path';
import { z } from 'zod';

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(4000),
  DB_TYPE: z.enum(['sqljs', 'postgres']).default('sqljs'),
  DB_PATH: z.string().min(1).default('payroll.db'),
  // an empty `DATABASE_URL=` line in .env counts as unset
  DATABASE_URL: z.preprocess((v) => (v === '' ? undefined : v), z.string().url().optional()),
  DB_LOGGING: z.enum(['true', 'false']).default('false'),
  EXPORT_FILE: z.string().min(1).default('payroll_export.xlsx'),
  FRONTEND_URL: z.string().default('http://localhost:3000'),
});

export type DatabaseConfig =
  | { type: 'sqljs'; location?: string; logging: boolean }
  | { type: 'postgres'; url: string; logging: boolean };

export type AppConfig = {
  port: number;
  database: DatabaseConfig;
  exportFile: string;
  corsOrigin: string;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new Error(`Invalid configuration (${problems.join('; ')})`);
  }
  const vars = parsed.data;
  const logging = vars.DB_LOGGING === 'true';

  let database: DatabaseConfig;
  if (vars.DB_TYPE === 'postgres') {
    if (!vars.DATABASE_URL) {
      throw new Error('Invalid configuration (DATABASE_URL: required when DB_TYPE is postgres)');
    }
    database = { type: 'postgres', url: vars.DATABASE_URL, logging };
  } else {
    database = { type: 'sqljs', location: vars.DB_PATH, logging };
  }

  return {
    port: vars.PORT,
    database,
    exportFile: path.resolve(process.cwd(), vars.EXPORT_FILE),
    corsOrigin: vars.FRONTEND_URL,
  };
}

export function loadEnvFile() {
  dotenv.config({ path: path.resolve(process.cwd(), './.env') });
}

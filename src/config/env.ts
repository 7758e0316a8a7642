import z from 'zod';
import dotenv from 'dotenv';

if (process.env.NODE_ENV === 'development') {
  dotenv.config({ path: '.env.local' });
} else {
  dotenv.config();
}

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

  // SQLite file backing the catalog and quotations (":memory:" for throwaway runs)
  BC3_DB_PATH: z.string().min(1).default('./bc3_import.db'),

  // Used when the upload carries no filename
  BC3_DEFAULT_ORDER_TITLE: z.string().min(1).default('Imported BC3'),
  BC3_DEFAULT_VERSION_NAME: z.string().min(1).default('BC3 Import'),
});

export type AppConfig = z.infer<typeof envSchema>;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigError(`Invalid environment variables: ${issues}`);
  }
  return parsed.data;
}

export const config = loadConfig();

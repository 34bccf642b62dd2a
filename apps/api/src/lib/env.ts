import dotenv from 'dotenv';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import {
  DEFAULT_MAX_LOS_DAYS,
} from '@snfadmit/shared/constants/admission.constants.js';
import { DEFAULT_PDPM_TABLES_VERSION } from '@snfadmit/shared/constants/pdpm.constants.js';

// Load .env from monorepo root
dotenv.config({ path: fileURLToPath(new URL('../../../../.env', import.meta.url)) });

const envSchema = z.object({
  DATABASE_URL: z.string().min(1),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  API_PORT: z.coerce.number().default(3001),
  API_HOST: z.string().default('0.0.0.0'),
  CORS_ORIGIN: z.string().default('http://localhost:3000'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).default('info'),
  PDPM_TABLES_VERSION: z.string().min(1).default(DEFAULT_PDPM_TABLES_VERSION),
  MAX_LOS_DAYS: z.coerce.number().int().min(1).max(365).default(DEFAULT_MAX_LOS_DAYS),
  RATE_LIMIT_MAX: z.coerce.number().int().min(1).default(100),
});

export type Env = z.infer<typeof envSchema>;

let _env: Env | undefined;

export function getEnv(): Env {
  if (!_env) {
    const result = envSchema.safeParse(process.env);
    if (!result.success) {
      console.error('Invalid environment variables:', result.error.flatten().fieldErrors);
      throw new Error('Invalid environment variables');
    }
    _env = result.data;
  }
  return _env;
}

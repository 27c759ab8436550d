import dotenv from 'dotenv';
import path from 'path';
import { z } from 'zod';

dotenv.config();

export const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('production'),
  PORT: z.coerce.number().int().positive().default(8000),
  HOST: z.string().min(1).default('0.0.0.0'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
  REFERENCE_DATA_DIR: z.string().min(1).default('data'),
  BODY_LIMIT: z.coerce.number().int().positive().default(10485760),
});

const env = envSchema.parse(process.env);

export const config = {
  nodeEnv: env.NODE_ENV,
  port: env.PORT,
  host: env.HOST,
  logLevel: env.LOG_LEVEL ?? (env.NODE_ENV === 'test' ? 'silent' : 'info'),
  referenceDataDir: path.resolve(process.cwd(), env.REFERENCE_DATA_DIR),
  bodyLimit: env.BODY_LIMIT,
} as const;

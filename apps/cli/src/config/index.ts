/**
 * CLI Configuration
 */

import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';
import { DEFAULT_CONCURRENCY } from '@docbinder/core';

// Load .env from the working directory
dotenvConfig();

// Environment schema
const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  DOCBINDER_OUTPUT: z.string().min(1).default('./doc'),
  DOCBINDER_CONCURRENCY: z.string().regex(/^\d+$/).transform(Number).optional(),
  DOCBINDER_DEBUG: z.string().optional(),
});

export type CliEnv = z.infer<typeof envSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): CliEnv {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new Error(`Invalid environment configuration: ${issue ? `${issue.path.join('.')} ${issue.message}` : 'unknown error'}`);
  }
  return result.data;
}

const env = loadEnv();

export const config = {
  nodeEnv: env.NODE_ENV,
  logLevel: env.LOG_LEVEL,
  output: env.DOCBINDER_OUTPUT,
  concurrency: env.DOCBINDER_CONCURRENCY ?? DEFAULT_CONCURRENCY,
  debug: env.DOCBINDER_DEBUG === 'true',
} as const;

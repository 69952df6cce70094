import { z } from 'zod';
import dotenv from 'dotenv';
import os from 'os';
import path from 'path';
import { ConfigurationError } from '../core/errors.js';
import { BandwidthPolicy } from '../types/dto.js';
import { parseBandwidthPolicy } from '../core/selector/variant.selector.js';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Logging
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  // Source / destination
  SOURCE_URL: z.string().url().optional(),
  OUTPUT_PATH: z.string().min(1).default('output.ts'),

  // Variant selection
  BANDWIDTH: z.string().default('max'),

  // Keys
  DECRYPTION_KEY: z.string().regex(/^[0-9a-fA-F]+$/, 'must be a hex string').optional(),
  KEY_CACHE_FILE: z.string().min(1).optional(),

  // Scratch storage
  SCRATCH_DIR: z.string().min(1).default(os.tmpdir()),

  // HTTP
  USER_AGENT: z.string().default('Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/119.0.0.0 Safari/537.36'),
  REFERER: z.string().url().optional(),
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
});

export type EnvConfig = z.infer<typeof envSchema>;

export interface AppConfig extends EnvConfig {
  bandwidthPolicy: BandwidthPolicy;
}

/**
 * Valida el entorno recibido. Lanza un ConfigurationError con la lista de
 * variables inválidas.
 */
export function parseConfig(env: Record<string, string | undefined>): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const details = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid environment configuration (${details.join('; ')})`, 'environment');
  }

  return {
    ...result.data,
    bandwidthPolicy: parseBandwidthPolicy(result.data.BANDWIDTH),
  };
}

/**
 * Carga `.env.development` o `.env.production` y valida el resultado.
 */
export function loadConfig(): AppConfig {
  const envFile = process.env.NODE_ENV === 'production'
    ? '.env.production'
    : '.env.development';

  // Forzar que las variables del archivo .env sobrescriban las del sistema
  dotenv.config({ path: path.resolve(process.cwd(), envFile), override: true });

  return parseConfig(process.env);
}

export function isDevelopment(config: Pick<EnvConfig, 'NODE_ENV'>): boolean {
  return config.NODE_ENV === 'development';
}

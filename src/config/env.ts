/**
 * 環境変数バリデーション
 */

import { z } from 'zod';
import dotenv from 'dotenv';
import { REROUTE_DEFAULTS } from './constants.js';

dotenv.config();

const envSchema = z.object({
  NODE_ENV: z
    .enum(['development', 'production', 'test'])
    .default('development'),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .optional(),
  // リルート設定の初期値
  REROUTE_PROACTIVELY: z
    .enum(['true', 'false'])
    .default(REROUTE_DEFAULTS.REROUTES_PROACTIVELY ? 'true' : 'false')
    .transform((value) => value === 'true'),
  MANEUVER_AVOIDANCE_RADIUS: z
    .string()
    .default(String(REROUTE_DEFAULTS.MANEUVER_AVOIDANCE_RADIUS))
    .transform(Number)
    .pipe(z.number().nonnegative()),
  // Directions API
  DIRECTIONS_API_URL: z.string().url().default('https://api.mapbox.com'),
  DIRECTIONS_ACCESS_TOKEN: z.string().min(1).optional(),
});

export type Env = z.infer<typeof envSchema>;

export function loadEnv(source: Record<string, string | undefined>): Env {
  const parsed = envSchema.safeParse(source);

  if (!parsed.success) {
    console.error('❌ Invalid environment variables:');
    console.error(parsed.error.format());
    throw new Error('Invalid environment variables');
  }

  return parsed.data;
}

export const env = loadEnv(process.env);

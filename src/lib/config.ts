import { z } from 'zod';
import { enableDebugLogging, warn } from './logging';

const flag = z
  .enum(['0', '1', 'true', 'false'])
  .default('0')
  .transform((value) => value === '1' || value === 'true');

const localeSchema = z.string().trim().min(2).default('en-US');
const rateSchema = z.coerce.number().positive().max(2).default(0.8);

export interface AppConfig {
  speechLocale: string;
  speechRate: number;
  debugRewards: boolean;
}

export const DEFAULT_CONFIG: AppConfig = {
  speechLocale: 'en-US',
  speechRate: 0.8,
  debugRewards: false
};

// Each variable falls back on its own, so one bad value keeps the others.
const readField = <T>(
  env: Record<string, unknown>,
  key: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  fallback: T
): T => {
  const parsed = schema.safeParse(env[key]);
  if (parsed.success) return parsed.data;
  warn(`invalid ${key}, using default`, parsed.error.issues.map((issue) => issue.message));
  return fallback;
};

export const readConfig = (env: Record<string, unknown>): AppConfig => ({
  speechLocale: readField(env, 'VITE_SPEECH_LOCALE', localeSchema, DEFAULT_CONFIG.speechLocale),
  speechRate: readField(env, 'VITE_SPEECH_RATE', rateSchema, DEFAULT_CONFIG.speechRate),
  debugRewards: readField(env, 'VITE_DEBUG_REWARDS', flag, DEFAULT_CONFIG.debugRewards)
});

export const loadAppConfig = (): AppConfig => {
  const config = readConfig(import.meta.env);
  enableDebugLogging(config.debugRewards);
  return config;
};

import dotenv from 'dotenv';
import { ConfigError } from '../core/errors.js';
import { configSchema } from './schema.js';
import type { AppConfig } from './types.js';

export const loadDotenv = (): void => {
  dotenv.config({ path: process.env.DOTENV_CONFIG_PATH || '.env' });
};

/** Validates the environment once at startup. Every problem is reported, not just the first. */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const parsed = configSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new ConfigError(`Config validation failed: ${issues.join('; ')}`, { issues });
  }
  return parsed.data;
};

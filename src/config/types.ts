import type { z } from 'zod';
import type { configSchema } from './schema.js';

export type AppConfig = z.infer<typeof configSchema>;
export type AlpacaConfig = AppConfig['alpaca'];
export type NewsConfig = AppConfig['news'];
export type AgentConfig = AppConfig['agent'];
export type DiscordConfig = AppConfig['alerts']['discord'];

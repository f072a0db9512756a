import { z } from 'zod';
import dotenv from 'dotenv';

dotenv.config();

const ConfigSchema = z.object({
  // Server
  PORT: z.coerce.number().int().min(0).max(65535).default(5000),
  LISTEN_HOST: z.string().default('0.0.0.0'),

  // Service identity (reported by /health)
  SERVICE_NAME: z.string().min(1).default('devops-project-api'),
  SERVICE_VERSION: z.string().min(1).default('1.0.0'),

  // Logging
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  // Accepts "true"/"True"/"TRUE"; anything else is off
  DEBUG: z
    .string()
    .default('false')
    .transform((value) => value.toLowerCase() === 'true'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Comma-separated allow-list; empty allows any origin
  CORS_ALLOWED_ORIGINS: z.string().default(''),
});

export type Config = z.infer<typeof ConfigSchema>;

export function parseConfig(env: NodeJS.ProcessEnv): Config {
  return ConfigSchema.parse(env);
}

export const config = parseConfig(process.env);

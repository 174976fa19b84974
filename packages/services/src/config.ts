import { z } from 'zod';

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(4000),
  HOST: z.string().min(1).default('0.0.0.0'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  GRID_SIZE: z.coerce.number().int().min(2).max(200).default(30),
  MAX_SESSIONS: z.coerce.number().int().positive().default(64)
});

export interface ServiceConfig {
  port: number;
  host: string;
  logLevel: z.infer<typeof envSchema>['LOG_LEVEL'];
  gridSize: number;
  maxSessions: number;
}

export function loadConfig(env: Record<string, string | undefined> = process.env): ServiceConfig {
  const parsed = envSchema.parse(env);
  return {
    port: parsed.PORT,
    host: parsed.HOST,
    logLevel: parsed.LOG_LEVEL,
    gridSize: parsed.GRID_SIZE,
    maxSessions: parsed.MAX_SESSIONS
  };
}

import { z } from 'zod';

const environmentSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().positive().default(5000),
  MONGODB_URI: z.string().min(1).default('mongodb://localhost:27017/academic-records?replicaSet=rs0'),
  STORE_DRIVER: z.enum(['mongo', 'memory']).default('mongo'),
  CORS_ORIGIN: z.string().default('http://localhost:3000'),
  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(300),
  TRANSACTION_MAX_RETRIES: z.coerce.number().int().min(0).max(10).default(3),
  SLOW_OPERATION_MS: z.coerce.number().int().positive().default(500),
  LOG_LEVEL: z.enum(['silent', 'error', 'warn', 'info']).default('info')
});

export type Environment = z.infer<typeof environmentSchema>;
export type LogLevel = Environment['LOG_LEVEL'];

/**
 * Parse process configuration. Unknown variables are ignored; a present but
 * malformed variable fails start-up with the offending keys listed.
 */
export const loadEnvironment = (source: NodeJS.ProcessEnv = process.env): Environment => {
  const parsed = environmentSchema.safeParse(source);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration - ${problems}`);
  }
  return parsed.data;
};

const LOG_LEVEL_RANK: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3
};

export const shouldLog = (configured: LogLevel, level: Exclude<LogLevel, 'silent'>): boolean =>
  LOG_LEVEL_RANK[configured] >= LOG_LEVEL_RANK[level];

import { parseArgs } from 'node:util';
import { z } from 'zod';
import {
  DEFAULT_HEARTBEAT_INTERVAL_MS,
  DEFAULT_HOST,
  DEFAULT_MAX_SESSIONS,
  DEFAULT_PORT,
} from './constants/index.js';
import { LOG_LEVELS } from './utils/logger.js';
import { ConfigError } from './utils/errors.js';

const intFromEnv = (fallback: number) =>
  z
    .string()
    .default(String(fallback))
    .transform(Number)
    .pipe(z.number().int().positive());

const envSchema = z.object({
  HOST: z.string().min(1).default(DEFAULT_HOST),
  PORT: intFromEnv(DEFAULT_PORT).pipe(z.number().max(65535)),
  MAX_SESSIONS: intFromEnv(DEFAULT_MAX_SESSIONS),
  HEARTBEAT_INTERVAL_MS: intFromEnv(DEFAULT_HEARTBEAT_INTERVAL_MS),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

export interface Config {
  host: string;
  port: number;
  maxSessions: number;
  heartbeatIntervalMs: number;
  logLevel: z.infer<typeof envSchema>['LOG_LEVEL'];
}

/**
 * Build configuration from environment variables, with --host and --port
 * command line flags taking precedence.
 */
export function loadConfig(
  argv: string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env
): Config {
  let flags: { host?: string; port?: string };
  try {
    ({ values: flags } = parseArgs({
      args: argv,
      options: {
        host: { type: 'string' },
        port: { type: 'string' },
      },
      strict: true,
    }));
  } catch (error) {
    throw new ConfigError(`Invalid arguments: ${error instanceof Error ? error.message : String(error)}`);
  }

  const result = envSchema.safeParse({
    HOST: flags.host ?? env.HOST,
    PORT: flags.port ?? env.PORT,
    MAX_SESSIONS: env.MAX_SESSIONS,
    HEARTBEAT_INTERVAL_MS: env.HEARTBEAT_INTERVAL_MS,
    LOG_LEVEL: env.LOG_LEVEL,
  });
  if (!result.success) {
    const problems = result.error.issues
      .map((i) => `  ${i.path.join('.')}: ${i.message}`)
      .join('\n');
    throw new ConfigError(`Invalid configuration:\n${problems}`);
  }

  const data = result.data;
  return {
    host: data.HOST,
    port: data.PORT,
    maxSessions: data.MAX_SESSIONS,
    heartbeatIntervalMs: data.HEARTBEAT_INTERVAL_MS,
    logLevel: data.LOG_LEVEL,
  };
}

/**
 * Application logger based on pino.
 *
 * JSON lines in production and test, pino-pretty in development.
 * Components take an optional AppLogger and fall back to `logger`;
 * per-agent and per-endpoint loggers are pino children.
 */
import pino, { type Logger as PinoLogger, type LevelWithSilent } from 'pino';
import { config, type AppEnv } from '../config/Config';

export type AppLogger = PinoLogger;

export type LoggerOptions = {
  level?: string;
  env?: AppEnv;
  service?: { name: string; version: string };
};

const LEVELS: readonly LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function isLevel(value: string): value is LevelWithSilent {
  return LEVELS.some((level) => level === value);
}

/**
 * LOG_LEVEL wins when it names a pino level; otherwise info in production, debug elsewhere.
 */
export function resolveLogLevel(raw: string | undefined, env: AppEnv): LevelWithSilent {
  const candidate = raw?.trim().toLowerCase();
  if (candidate && isLevel(candidate)) return candidate;
  return env === 'production' ? 'info' : 'debug';
}

export function createLogger(options: LoggerOptions = {}): AppLogger {
  const env = options.env ?? config.env;
  const service = options.service ?? { name: config.serviceName, version: config.serviceVersion };

  return pino({
    level: resolveLogLevel(options.level, env),
    base: {
      service: service.name,
      version: service.version,
      env,
    },
    serializers: { err: pino.stdSerializers.err },
    transport:
      env === 'development'
        ? {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'SYS:standard',
              ignore: 'pid,hostname',
            },
          }
        : undefined,
  });
}

export const logger: AppLogger = createLogger({ level: process.env.LOG_LEVEL });

import pino from 'pino';

import { readEnv } from './env';

export type Logger = pino.Logger;

const loggerCache = new Map<string, Logger>();

let rootLogger: Logger | undefined;

function isTestRun(): boolean {
  return process.env['NODE_ENV'] === 'test' || process.env['VITEST'] === 'true';
}

function createRootLogger(): Logger {
  const env = readEnv();
  return pino({
    base: { service: 'deepbook-intents' },
    level: isTestRun() ? 'silent' : env.LOG_LEVEL,
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}

/**
 * Category logger, created once per category on first use.
 */
export function getLogger(category: string): Logger {
  const cached = loggerCache.get(category);
  if (cached) return cached;

  rootLogger ??= createRootLogger();
  const logger = rootLogger.child({ category });
  loggerCache.set(category, logger);
  return logger;
}

import pino, { type Logger } from 'pino';

import { getConfig } from './config';

type ChildLoggerBindings = Record<string, unknown>;

let rootLogger: Logger | null = null;

function buildRootLogger(): Logger {
  const config = getConfig();
  if (!rootLogger) {
    rootLogger = pino({
      level: config.runtime.logLevel,
      base: {
        service: config.runtime.serviceName
      },
      timestamp: () => `,"timestamp":"${new Date().toISOString()}"`
    });
  }

  return rootLogger;
}

export function getLogger(bindings?: ChildLoggerBindings): Logger {
  const logger = buildRootLogger();
  return bindings ? logger.child(bindings) : logger;
}

export function resetLoggerForTesting(): void {
  rootLogger = null;
}

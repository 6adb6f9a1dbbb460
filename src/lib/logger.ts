import pino from 'pino';

const isProduction = process.env.NODE_ENV === 'production';
const isTest = process.env.NODE_ENV === 'test' || process.env.VITEST !== undefined;

function defaultLevel(): string {
  if (isTest) return 'silent';
  return isProduction ? 'info' : 'debug';
}

const logger = pino({
  name: 'resume-scan',
  level: process.env.LOG_LEVEL ?? defaultLevel(),
  ...(isProduction || isTest
    ? {}
    : {
        transport: {
          target: 'pino-pretty',
          options: { colorize: true, destination: 2 },
        },
      }),
});

export type Logger = pino.Logger;

/**
 * Creates a child logger scoped to a single analysis run.
 */
export function createAnalysisLogger(
  analysisId: string,
  extra?: Record<string, unknown>,
): Logger {
  return logger.child({ analysisId, ...extra });
}

export default logger;

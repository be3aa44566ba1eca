import pino from 'pino';

const isDev = process.env.NODE_ENV !== 'production';
const isTest = process.env.NODE_ENV === 'test';

// Stage logs stay below the default so they do not interleave with the CLI spinner.
export const resolveLogLevel = (env: NodeJS.ProcessEnv): string =>
  env.LOG_LEVEL || (env.NODE_ENV === 'test' ? 'silent' : 'warn');

const level = resolveLogLevel(process.env);
const base = { service: 'app-resolver' };

// Logs go to stderr; stdout belongs to the CLI.
export const logger = isDev && !isTest
  ? pino({
      level,
      base,
      transport: { target: 'pino-pretty', options: { colorize: true, destination: 2 } },
    })
  : pino({ level, base }, pino.destination(2));

export type Stage = 'catalog' | 'resolver' | 'enricher' | 'pipeline' | 'snapshot';

export const createStageLogger = (stage: Stage) => logger.child({ stage });

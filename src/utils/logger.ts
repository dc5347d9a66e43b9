/**
 * Logger utility using Pino
 */
import pino from 'pino';

const level = process.env.LOG_LEVEL || 'info';

// Pretty output only for an interactive terminal; pipes and CI get JSON lines
const usePretty = level !== 'silent' && process.stdout.isTTY === true && process.env.NODE_ENV !== 'production';

const rootLogger = usePretty
  ? pino(
      { level },
      pino.transport({
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      }),
    )
  : pino({ level });

export type Logger = pino.Logger;

export function createLogger(name: string): Logger {
  return rootLogger.child({ name });
}

export { rootLogger as logger };

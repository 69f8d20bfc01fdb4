/**
 * Logger utility using Pino
 *
 * Logs go to stderr so CLI output on stdout stays machine-readable.
 */
import pino from 'pino';

const level = process.env.LOG_LEVEL || 'info';
const pretty = process.stderr.isTTY === true && process.env.LOG_PRETTY !== 'false';

const transport: pino.DestinationStream | undefined = pretty
  ? pino.transport({
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'SYS:standard',
      ignore: 'pid,hostname',
      destination: 2,
    },
  })
  : undefined;

const rootLogger = pino({ level }, transport ?? pino.destination(2));

export type Logger = pino.Logger;

export function createLogger(name: string): Logger {
  return rootLogger.child({ name });
}

export { rootLogger as logger };

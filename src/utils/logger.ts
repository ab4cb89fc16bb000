/**
 * Logger utility using Pino
 *
 * Diagnostics go to stderr so the import report printed on stdout stays clean.
 * Set LOG_PRETTY=0 for raw JSON lines.
 */
import pino from 'pino';
import pretty from 'pino-pretty';

const level = process.env.LOG_LEVEL || 'info';

function createDestination(): pino.DestinationStream {
  if (process.env.LOG_PRETTY === '0') {
    return pino.destination({ dest: 2, sync: true });
  }
  return pretty({
    colorize: true,
    translateTime: 'SYS:standard',
    ignore: 'pid,hostname',
    destination: 2,
    sync: true,
  });
}

const rootLogger = pino({ level }, createDestination());

export type Logger = pino.Logger;

const children = new Set<Logger>();

export function createLogger(name: string): Logger {
  const child = rootLogger.child({ name });
  children.add(child);
  return child;
}

/** Change the level of the root logger and every named logger */
export function setLogLevel(next: string): void {
  rootLogger.level = next;
  for (const child of children) child.level = next;
}

export { rootLogger as logger };

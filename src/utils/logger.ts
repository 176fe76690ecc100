/**
 * Logger utility using Pino
 */
import pino from 'pino';

const underTest = Boolean(process.env.VITEST);
const level = process.env.LOG_LEVEL || (underTest ? 'silent' : 'info');

let transport: pino.DestinationStream | undefined;
if (!underTest) {
  try {
    transport = pino.transport({
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
      },
    });
  } catch {
    // pino-pretty not available, use default
  }
}

const rootLogger = transport ? pino({ level }, transport) : pino({ level });

export type Logger = pino.Logger;

const children = new Set<Logger>();

export function createLogger(name: string): Logger {
  const child = rootLogger.child({ name });
  children.add(child);
  return child;
}

/** Children copy the level at creation, so apply a late level to each of them */
export function setLogLevel(next: string): void {
  if (underTest && !process.env.LOG_LEVEL) return;
  rootLogger.level = next;
  for (const child of children) child.level = next;
}

export { rootLogger as logger };

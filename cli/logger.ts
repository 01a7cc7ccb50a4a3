import pino, { type Logger } from 'pino';

// Records and catalogs go to files or stdout, so diagnostics stay on stderr.
const pretty = process.env.NODE_ENV !== 'production' && process.stderr.isTTY === true;

const logger: Logger = pretty
  ? pino({
      level: process.env.LOG_LEVEL || 'info',
      transport: { target: 'pino-pretty', options: { colorize: true, destination: 2 } },
      timestamp: pino.stdTimeFunctions.isoTime,
    })
  : pino(
      {
        level: process.env.LOG_LEVEL || 'info',
        timestamp: pino.stdTimeFunctions.isoTime,
      },
      pino.destination({ dest: 2, sync: true }),
    );

export function createLogger(module: string): Logger {
  return logger.child({ module });
}

/** Child logger bound to a single stream and, when present, its partition or parent context. */
export function createStreamLogger(module: string, stream: string, context?: Record<string, string>): Logger {
  return logger.child({ module, stream, ...context });
}

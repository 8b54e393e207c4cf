/**
 * Logging for the checker
 */
import pino from 'pino';
import type { Logger } from 'pino';

export type { Logger };

/**
 * Create the checker's logger.
 *
 * LOG_LEVEL sets the level (default: info); LOG_PRETTY switches to
 * pino-pretty output for local runs.
 */
export function createLogger(env: NodeJS.ProcessEnv = process.env): Logger {
  const level = env.LOG_LEVEL ?? 'info';
  if (env.LOG_PRETTY) {
    return pino({
      name: 'http-conformance',
      level,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
        },
      },
    });
  }
  return pino({ name: 'http-conformance', level });
}

export const logger = createLogger();

/**
 * Mask credentials in request headers before they are logged
 */
export function maskHeaders(
  headers: ReadonlyArray<{ readonly name: string; readonly value: string }>
): Array<{ name: string; value: string }> {
  return headers.map(({ name, value }) => {
    const key = name.toLowerCase();
    if (key !== 'authorization' && key !== 'cookie' && key !== 'proxy-authorization') {
      return { name, value };
    }
    const masked =
      value.length > 10 ? value.slice(0, 10) + '*'.repeat(value.length - 10) : '*'.repeat(value.length);
    return { name, value: masked };
  });
}

export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
}

const PREFIX = '[opensearch-commerce]';

function format(message: string, meta?: LogMeta): string {
  return meta && Object.keys(meta).length ? `${PREFIX} ${message} ${JSON.stringify(meta)}` : `${PREFIX} ${message}`;
}

/* eslint-disable no-console */
export const consoleLogger: Logger = {
  debug: (message, meta) => console.debug(format(message, meta)),
  info: (message, meta) => console.info(format(message, meta)),
  warn: (message, meta) => console.warn(format(message, meta)),
  error: (message, meta) => console.error(format(message, meta)),
};
/* eslint-enable no-console */

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

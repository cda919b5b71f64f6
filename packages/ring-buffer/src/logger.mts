import { type BaseLogger, loggerFactory } from '@ringbuf/logger';

let defaultLogger: BaseLogger | undefined;

/**
 * Logger used by buffers constructed without one, created on first use
 */
export const getDefaultLogger = (): BaseLogger => {
  defaultLogger ??= loggerFactory({ name: 'ring-buffer' }).logger;
  return defaultLogger;
};

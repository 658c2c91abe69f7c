import type { StalewiseConfig, StalewiseLogger } from './types';

const PREFIX = '[Stalewise]';

export function createLogger(config: Pick<StalewiseConfig, 'debug'>): StalewiseLogger {
  function log(message: string, data?: unknown): void {
    if (!config.debug) return;
    if (data !== undefined) {
      console.log(PREFIX, message, data);
    } else {
      console.log(PREFIX, message);
    }
  }

  function warn(message: string, data?: unknown): void {
    if (!config.debug) return;
    if (data !== undefined) {
      console.warn(PREFIX, message, data);
    } else {
      console.warn(PREFIX, message);
    }
  }

  // Printed regardless of `debug`
  function error(message: string, data?: unknown): void {
    if (data !== undefined) {
      console.error(PREFIX, message, data);
    } else {
      console.error(PREFIX, message);
    }
  }

  return { log, warn, error };
}

import { Logger, logger as defaultLogger } from './logger';

export interface ErrorEmitter {
  on(event: 'error', listener: (err: Error) => void): unknown;
}

/**
 * Hooks the report stream's 'error' event so a closed reader stops polling
 * instead of crashing the process. EPIPE is the normal end of
 * `cpumap-stats | head` and only logs at debug.
 */
export function watchOutput(stream: ErrorEmitter, onClosed: () => void, logger: Logger = defaultLogger): void {
  stream.on('error', (err) => {
    if ('code' in err && err.code === 'EPIPE') {
      logger.debug('Output closed by reader, stopping');
    } else {
      logger.error('Output stream error', err);
    }
    onClosed();
  });
}

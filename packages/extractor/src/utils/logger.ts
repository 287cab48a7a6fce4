/**
 * Debug tracing for the library. Extraction and validation report problems
 * through their results; these lines follow selector evaluation and are only
 * written with LOG_LEVEL=debug (never under NODE_ENV=test).
 */
export interface DebugLogger {
  debug(message: string): void;
}

export function createLogger(scope: string): DebugLogger {
  return {
    debug(message: string): void {
      if (!isDebugEnabled()) {
        return;
      }
      console.debug(`${new Date().toISOString()} ${scope} [DEBUG] ${message}`);
    },
  };
}

export function isDebugEnabled(): boolean {
  return process.env.NODE_ENV !== 'test' && process.env.LOG_LEVEL === 'debug';
}

export const logger = createLogger('[Extractor]');
export const validationLogger = createLogger('[Validator]');

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

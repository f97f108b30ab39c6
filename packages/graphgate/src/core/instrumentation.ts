/**
 * Development mode flag - computed once at module load.
 */
export const __DEV__ = process.env.NODE_ENV === "development";

export type LogContext = Record<string, unknown>;

/**
 * Minimal logger contract. Anything with console-like `warn`/`debug` fits.
 */
export interface Logger {
  warn: (message: string, context?: LogContext) => void;
  debug: (message: string, context?: LogContext) => void;
}

export const consoleLogger: Logger = {
  warn: (message, context) => {
    console.warn(`[graphgate] ${message}`, context ?? {});
  },
  debug: (message, context) => {
    if (__DEV__) {
      console.debug(`[graphgate] ${message}`, context ?? {});
    }
  },
};

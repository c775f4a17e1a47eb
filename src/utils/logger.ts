/**
 * Console-backed logger. Everything goes to stderr so stdout only carries results.
 */
export interface Logger {
  debug(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LoggerOptions {
  debug?: boolean;
  sink?: (message: string) => void;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const sink = options.sink ?? ((message: string) => console.error(message));
  return {
    debug: (message) => {
      if (options.debug) {
        sink(message);
      }
    },
    warn: (message) => sink(`Warning: ${message}`),
    error: (message) => sink(message),
  };
}

export const silentLogger: Logger = {
  debug: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

export interface Logger {
  warn(message: string): void;
  debug(message: string): void;
}

export function createConsoleLogger(verbose = false): Logger {
  return {
    warn: (message) => console.warn(message),
    debug: (message) => {
      if (verbose) console.error(message);
    }
  };
}

export const silentLogger: Logger = {
  warn: () => undefined,
  debug: () => undefined
};

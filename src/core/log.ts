export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  debug(message: string): void;
}

const PREFIX = "[bench]";

export function createConsoleLogger(options: { verbose?: boolean } = {}): Logger {
  const verbose = options.verbose ?? false;
  return {
    info(message) {
      console.error(`${PREFIX} ${message}`);
    },
    warn(message) {
      console.error(`${PREFIX} warning: ${message}`);
    },
    error(message) {
      console.error(`${PREFIX} error: ${message}`);
    },
    debug(message) {
      if (verbose) {
        console.error(`${PREFIX} debug: ${message}`);
      }
    }
  };
}

export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  debug: () => undefined
};

/**
 * Console logging gated by verbosity.
 * Warnings and errors always print; info needs -v, debug needs -vv.
 */

export interface Logger {
  debug(msg: string): void;
  info(msg: string): void;
  warn(msg: string): void;
  error(msg: string): void;
}

export function createLogger(verbosity = 0): Logger {
  return {
    debug: (msg) => {
      if (verbosity >= 2) console.log(msg);
    },
    info: (msg) => {
      if (verbosity >= 1) console.log(msg);
    },
    warn: (msg) => console.warn(msg),
    error: (msg) => console.error(msg),
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

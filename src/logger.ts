export interface Logger {
  /** Progress and informational output, shown in verbose mode only. */
  info(message: string): void;
  debug(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LoggerOptions {
  verbose?: boolean;
}

/**
 * Console logger. Everything goes to stderr so that records written to
 * stdout are never interleaved with diagnostics.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const verbose = options.verbose ?? false;

  return {
    info(message: string) {
      if (verbose) {
        console.error(message);
      }
    },
    debug(message: string) {
      if (verbose) {
        console.error(`  ${message}`);
      }
    },
    warn(message: string) {
      console.warn(`Warning: ${message}`);
    },
    error(message: string) {
      console.error(`Error: ${message}`);
    }
  };
}

export const silentLogger: Logger = {
  info() {},
  debug() {},
  warn() {},
  error() {}
};

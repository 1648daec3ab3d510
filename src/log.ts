// ANSI colors (disabled if not TTY)
const isTTY = process.stdout.isTTY === true;
const c = {
  red: (s: string) => (isTTY ? `\x1b[31m${s}\x1b[0m` : s),
  yellow: (s: string) => (isTTY ? `\x1b[33m${s}\x1b[0m` : s),
  dim: (s: string) => (isTTY ? `\x1b[2m${s}\x1b[0m` : s),
};

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LoggerOptions {
  /** Silence info and warn; errors are always written */
  quiet?: boolean;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const quiet = options.quiet ?? false;
  return {
    info(message) {
      if (!quiet) console.log(c.dim(message));
    },
    warn(message) {
      if (!quiet) console.warn(c.yellow(`⚠ ${message}`));
    },
    error(message) {
      console.error(c.red(`✗ ${message}`));
    },
  };
}

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  debug(message: string): void;
}

export interface ConsoleLoggerOptions {
  debug: boolean;
  /** Keeps stdout free for document bytes. */
  infoToStderr?: boolean;
}

export function createConsoleLogger(options: ConsoleLoggerOptions): Logger {
  return {
    info: (message) => (options.infoToStderr ? console.error(message) : console.log(message)),
    warn: (message) => console.warn(`  [warn] ${message}`),
    error: (message) => console.error(message),
    debug: (message) => {
      if (options.debug) console.error(`  [debug] ${message}`);
    },
  };
}

export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
  debug: () => {},
};

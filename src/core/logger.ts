import { Logger } from "../types.js";

export function silentLogger(): Logger {
  return {
    debug: () => {},
    info: () => {},
    warn: () => {},
    error: () => {}
  };
}

export interface ConsoleLoggerOptions {
  debug?: boolean;
  write?: (line: string) => void;
}

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const write = options.write ?? ((line: string) => process.stderr.write(`${line}\n`));
  return {
    debug: (msg) => {
      if (options.debug) {
        write(`[debug] ${msg}`);
      }
    },
    info: (msg) => write(`[info] ${msg}`),
    warn: (msg) => write(`[warn] ${msg}`),
    error: (msg) => write(`[error] ${msg}`)
  };
}

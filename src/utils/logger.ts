/**
 * Console logger. Progress goes to stderr so stdout carries only the report.
 */

import type { Logger } from '../types.js';

export interface LoggerOptions {
  verbose?: boolean;
  write?: (line: string) => void;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const write = options.write ?? ((line: string) => console.error(line));

  return {
    info: message => write(message),
    debug: message => {
      if (options.verbose) {
        write(message);
      }
    },
  };
}

export const silentLogger: Logger = {
  info: () => {},
  debug: () => {},
};

import chalk from "chalk";

export interface Logger {
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  step(message: string): void;
  debug(message: string): void;
}

export interface ConsoleLoggerOptions {
  verbose?: boolean;
}

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  return {
    info: (message) => console.log(`${chalk.blue("[INFO]")} ${message}`),
    success: (message) => console.log(`${chalk.green("[SUCCESS]")} ${message}`),
    warn: (message) => console.warn(`${chalk.yellow("[WARNING]")} ${message}`),
    error: (message) => console.error(`${chalk.red("[ERROR]")} ${message}`),
    step: (message) => console.log(`${chalk.cyan("[STEP]")} ${message}`),
    debug: (message) => {
      if (options.verbose) {
        console.log(chalk.dim(`[DEBUG] ${message}`));
      }
    }
  };
}

export const silentLogger: Logger = {
  info: () => undefined,
  success: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  step: () => undefined,
  debug: () => undefined
};

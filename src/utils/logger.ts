import chalk from "chalk";

export interface Logger {
  /** Phase headline, prefixed with a local timestamp. */
  step(message: string): void;
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  dim(message: string): void;
}

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

export function timestamp(date: Date = new Date()): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

export const consoleLogger: Logger = {
  step(message) {
    console.log(`\n${chalk.dim(`[${timestamp()}]`)} ${chalk.bold(message)}`);
  },
  info(message) {
    console.log(message);
  },
  success(message) {
    console.log(chalk.green(message));
  },
  warn(message) {
    console.warn(chalk.yellow(`Warning: ${message}`));
  },
  error(message) {
    console.error(chalk.red(message));
  },
  dim(message) {
    console.log(chalk.dim(message));
  },
};

export const silentLogger: Logger = {
  step() {},
  info() {},
  success() {},
  warn() {},
  error() {},
  dim() {},
};

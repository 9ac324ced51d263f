import chalk from 'chalk';

let verbose = Boolean(process.env.TASK_HEADER_DEBUG);

export function setVerbose(value: boolean): void {
  verbose = value;
}

export function isVerbose(): boolean {
  return verbose;
}

export const logger = {
  info(message: string): void {
    console.log(message);
  },
  success(message: string): void {
    console.log(chalk.green(message));
  },
  warn(message: string): void {
    console.warn(chalk.yellow(message));
  },
  error(message: string): void {
    console.error(chalk.red(message));
  },
  debug(message: string): void {
    if (verbose) {
      console.log(chalk.gray(`[debug] ${message}`));
    }
  },
  dim(message: string): void {
    console.log(chalk.dim(message));
  },
};

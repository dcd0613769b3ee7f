import chalk from "chalk";

class Logger {
  private debugEnabled = false;

  /** Enable or disable debug logging */
  setDebug(enabled: boolean): void {
    this.debugEnabled = enabled;
  }

  debug(message: string): void {
    if (this.debugEnabled) {
      console.log(chalk.gray(`[DEBUG] ${message}`));
    }
  }

  /** Plain report line, no prefix */
  info(message: string): void {
    console.log(message);
  }

  warn(message: string): void {
    console.warn(chalk.yellow(`⚠️  ${message}`));
  }

  error(message: string): void {
    console.error(chalk.red(message));
  }
}

/** Global logger instance */
export const logger = new Logger();

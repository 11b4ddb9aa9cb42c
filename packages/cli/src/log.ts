import chalk from "chalk";
import type { Ora } from "ora";
import type { LogLevel, ProviderLogCallback } from "@skyform/adapters-common";

const LEVEL_STYLE: Record<LogLevel, (text: string) => string> = {
  debug: chalk.gray,
  info: chalk.white,
  warn: chalk.yellow,
  error: chalk.red,
};

const LEVEL_TAG: Record<LogLevel, string> = {
  debug: "[DEBUG]",
  info: "[INFO]",
  warn: "[WARN]",
  error: "[ERR]",
};

export interface ConsoleLogOptions {
  /** Print debug lines */
  verbose?: boolean;
  /** Spinner to keep intact while printing; info lines become its text */
  spinner?: Ora;
  write?: (line: string) => void;
}

export function createConsoleLog(options: ConsoleLogOptions = {}): ProviderLogCallback {
  const write = options.write ?? ((line: string) => console.error(line));

  return (message, level) => {
    if (level === "debug" && !options.verbose) return;

    const { spinner } = options;
    if (spinner?.isSpinning) {
      if (level === "info" && !options.verbose) {
        spinner.text = message.trim();
        return;
      }
      spinner.clear();
      write(LEVEL_STYLE[level](`${LEVEL_TAG[level]} ${message}`));
      spinner.render();
      return;
    }

    write(LEVEL_STYLE[level](`${LEVEL_TAG[level]} ${message}`));
  };
}

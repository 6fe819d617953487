import chalk from "chalk";
import type { CallGraphLogger } from "./CallGraphLogger.js";

const PREFIX = chalk.dim("[call-graph]");

/**
 * Terminal logger with coloured status glyphs. Writes to stderr only.
 */
export const createConsoleCallGraphLogger = (): CallGraphLogger => {
  const writeLine = (text: string): void => {
    console.error(text);
  };

  return {
    success(message: string): void {
      writeLine(`${PREFIX} ${chalk.green("✓")} ${message}`);
    },

    info(message: string): void {
      writeLine(`${PREFIX} ${message}`);
    },

    warn(message: string): void {
      writeLine(`${PREFIX} ${chalk.yellow("⚠")} ${message}`);
    },

    error(message: string): void {
      writeLine(`${PREFIX} ${chalk.red("✗")} ${message}`);
    },
  };
};

/**
 * Default console logger instance.
 */
export const consoleLogger = createConsoleCallGraphLogger();

/**
 * CLI output formatting utilities
 */

/* eslint-disable no-console */

const isTTY = process.stdout.isTTY ?? false;

// ANSI color codes (only used when TTY is available)
const colors = {
  reset: isTTY ? '\x1b[0m' : '',
  dim: isTTY ? '\x1b[2m' : '',
  red: isTTY ? '\x1b[31m' : '',
};

export const output = {
  /**
   * Print an error message with optional details
   */
  error(message: string, details?: string): void {
    console.error(`${colors.red}✗${colors.reset} ${message}`);
    if (details) {
      console.error(`  ${colors.dim}${details}${colors.reset}`);
    }
  },

  /**
   * Print each item on its own line
   */
  list(items: readonly string[]): void {
    for (const item of items) {
      console.log(item);
    }
  },
};

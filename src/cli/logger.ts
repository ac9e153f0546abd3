/**
 * Console logger for packplan
 *
 * Diagnostics go to stderr so that stdout only ever carries the
 * line-oriented data consumed by installers (see `raw`).
 */

const COLORS = {
  red: "\x1b[0;31m",
  green: "\x1b[0;32m",
  yellow: "\x1b[0;33m",
  blue: "\x1b[0;34m",
  reset: "\x1b[0m",
} as const;

let silentMode = false;

/**
 * Enable or disable silent mode
 * In silent mode only errors and raw data are written.
 * @param args - Configuration arguments
 * @param args.silent - Whether to suppress diagnostics
 */
export const setSilentMode = (args: { silent: boolean }): void => {
  silentMode = args.silent;
};

const colorize = (args: { color: keyof typeof COLORS; text: string }): string => {
  const { color, text } = args;
  if (!process.stderr.isTTY) {
    return text;
  }
  return `${COLORS[color]}${text}${COLORS.reset}`;
};

/**
 * Print an error message
 * @param args - Configuration arguments
 * @param args.message - Message to print
 */
export const error = (args: { message: string }): void => {
  console.error(colorize({ color: "red", text: `Error: ${args.message}` }));
};

/**
 * Print a warning message
 * @param args - Configuration arguments
 * @param args.message - Message to print
 */
export const warn = (args: { message: string }): void => {
  if (silentMode) {
    return;
  }
  console.error(colorize({ color: "yellow", text: `Warning: ${args.message}` }));
};

/**
 * Print an informational message
 * @param args - Configuration arguments
 * @param args.message - Message to print
 */
export const info = (args: { message: string }): void => {
  if (silentMode) {
    return;
  }
  console.error(colorize({ color: "blue", text: args.message }));
};

/**
 * Print a success message
 * @param args - Configuration arguments
 * @param args.message - Message to print
 */
export const success = (args: { message: string }): void => {
  if (silentMode) {
    return;
  }
  console.error(colorize({ color: "green", text: args.message }));
};

export const newline = (): void => {
  if (silentMode) {
    return;
  }
  console.error("");
};

/**
 * Write a data line to stdout, unformatted
 * Never silenced: this is the output installers read.
 * @param args - Configuration arguments
 * @param args.message - Line to print
 */
export const raw = (args: { message: string }): void => {
  console.log(args.message);
};

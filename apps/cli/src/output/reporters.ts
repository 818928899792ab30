import chalk from "chalk";
import ora, { type Ora } from "ora";

// Output configuration for JSON mode
// When set, every non-report line goes to stderr so stdout carries only the
// JSON document
let jsonMode = false;

export function setJsonMode(enabled: boolean): void {
  jsonMode = enabled;
}

export function isJsonMode(): boolean {
  return jsonMode;
}

function output(message: string): void {
  (jsonMode ? console.error : console.log)(message);
}

// Spinner on stderr, which never carries report output
export function spinner(text: string): Ora {
  return ora({
    text,
    color: "cyan",
    stream: process.stderr,
  }).start();
}

// Error message, always on stderr
export function error(message: string): void {
  console.error(chalk.red("✗") + " " + message);
}

// Info message
export function info(message: string): void {
  output(chalk.blue("i") + " " + message);
}

// Debug message (only in verbose mode)
export function debug(message: string, verbose: boolean = false): void {
  if (verbose) {
    output(chalk.dim("  " + message));
  }
}

/**
 * Shorten text to fit a terminal line, keeping the end (the most specific
 * part of a path).
 */
export function truncateStart(text: string, width: number): string {
  if (width <= 0) return "";
  if (text.length <= width) return text;
  if (width === 1) return "…";
  return "…" + text.slice(text.length - (width - 1));
}

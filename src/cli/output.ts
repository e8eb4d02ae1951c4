/**
 * CLI Output Utilities
 *
 * Intentional user output goes to stdout; diagnostics go through the logger
 * on stderr.
 */

export function print(message: string): void {
  process.stdout.write(message + '\n');
}

export function printError(message: string): void {
  process.stderr.write(message + '\n');
}

/**
 * Configuration error reporting
 *
 * Formats a ConfigError for the terminal; used by every command that loads
 * configuration.
 */

import { CONFIG_FILE_NAME, ENV_VARS } from '@ghscope/config';
import chalk from 'chalk';

export interface ConfigErrorDetails {
  source: string;
  errors: string[];
}

/**
 * Format configuration validation errors for display
 *
 * @param maxErrors - Maximum number of errors to show (default: 5)
 */
export function formatConfigErrors(details: ConfigErrorDetails, maxErrors: number = 5): string[] {
  const messages: string[] = [chalk.red(`❌ Invalid configuration (${details.source})`)];

  for (const err of details.errors.slice(0, maxErrors)) {
    messages.push(chalk.gray(`  • ${err}`));
  }

  if (details.errors.length > maxErrors) {
    messages.push(chalk.gray(`  ... and ${details.errors.length - maxErrors} more`));
  }

  return messages;
}

/**
 * Hints for fixing configuration errors
 */
export function formatConfigSuggestions(): string[] {
  return [
    chalk.blue('💡 Suggestions:'),
    chalk.gray(`  • Check ${CONFIG_FILE_NAME} (indentation, colons, quotes)`),
    chalk.gray(`  • Check ${ENV_VARS.TIMEOUT_MS} is a positive integer and ${ENV_VARS.API_BASE} is a URL`),
    chalk.gray('  • Run with GHSCOPE_DEBUG=1 to see where each value came from'),
  ];
}

/**
 * Print configuration errors with suggestions to stderr
 */
export function displayConfigErrors(details: ConfigErrorDetails): void {
  for (const line of [...formatConfigErrors(details), '', ...formatConfigSuggestions()]) {
    console.error(line);
  }
}

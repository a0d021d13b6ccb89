/**
 * CLI output formatting utilities
 */

import chalk from 'chalk';
import type { PageLanguageOutcome } from '@pagelang/core';

/** Shown when the API does not report a previous language */
export const NOT_PREVIOUSLY_SET = '[not previously set]';

const OUTCOME_INDENT = '    ';

/**
 * Format the result line for one page
 */
export function formatOutcome(outcome: PageLanguageOutcome): string {
  switch (outcome.status) {
    case 'success':
      return `${OUTCOME_INDENT}${chalk.green('✓')} Language set to '${outcome.to}' (previous: ${outcome.from ?? NOT_PREVIOUSLY_SET})`;
    case 'api-error':
      return `${OUTCOME_INDENT}${chalk.red('✗')} API error: ${outcome.error.message}`;
    case 'transport-error':
      return `${OUTCOME_INDENT}${chalk.red('✗')} HTTP request error: ${outcome.error.message}`;
    case 'unrecognized':
      return `${OUTCOME_INDENT}${chalk.yellow('!')} ${outcome.error.message}`;
  }
}

/**
 * Format the dry-run listing, one numbered line per title
 */
export function formatTitleList(titles: string[], language: string): string[] {
  const width = String(titles.length).length;
  return titles.map((title, i) => `  ${chalk.dim(String(i + 1).padStart(width))}  ${title} ${chalk.dim(`-> ${language}`)}`);
}

/**
 * Print a section header
 */
export function printSection(title: string): void {
  console.log();
  console.log(chalk.bold(title));
}

/**
 * Print success message
 */
export function printSuccess(message: string): void {
  console.log(chalk.green('✓'), message);
}

/**
 * Print error message
 */
export function printError(message: string): void {
  console.log(chalk.red('✗'), message);
}

/**
 * Print info message
 */
export function printInfo(message: string): void {
  console.log(chalk.blue('i'), message);
}

/**
 * set-language command - Set the content language of every page in a title list
 *
 * Requires authentication (WIKI_BOT_USER and WIKI_BOT_PASS environment variables),
 * except with --dry-run, which never contacts the wiki.
 */

import chalk from 'chalk';
import ora from 'ora';
import {
  ConfigError,
  InputFileMissingError,
  authenticate,
  formatError,
  loadRunConfig,
  readTitleList,
  setLanguageForTitles,
  withSession,
  type FetchLike,
  type RunConfig,
} from '@pagelang/core';
import {
  formatOutcome,
  formatTitleList,
  printError,
  printInfo,
  printSection,
  printSuccess,
} from '../utils/format.js';

export interface SetLanguageOptions {
  file?: string;
  lang?: string;
  apiUrl?: string;
  reason?: string;
  dryRun?: boolean;
}

/** Seams for tests; production uses process.env and global fetch */
export interface SetLanguageDeps {
  env?: Record<string, string | undefined>;
  fetch?: FetchLike;
}

export async function setLanguageCommand(options: SetLanguageOptions): Promise<void> {
  process.exitCode = await runSetLanguage(options);
}

/**
 * Run the whole pipeline and return the process exit code
 */
export async function runSetLanguage(
  options: SetLanguageOptions,
  deps: SetLanguageDeps = {}
): Promise<number> {
  let config: RunConfig;
  try {
    config = loadRunConfig(
      {
        apiUrl: options.apiUrl,
        targetLanguage: options.lang,
        pagesFile: options.file,
        reason: options.reason,
        dryRun: options.dryRun,
      },
      deps.env
    );
  } catch (error) {
    if (error instanceof ConfigError) {
      printError(error.message);
      return 1;
    }
    throw error;
  }

  const mode = options.dryRun ? 'DRY RUN' : 'Set language';
  console.log(chalk.bold(`${mode}: '${config.targetLanguage}' on ${config.apiUrl}`));

  let titles: string[];
  try {
    titles = await readTitleList(config.pagesFile);
  } catch (error) {
    if (error instanceof InputFileMissingError) {
      printError(`Error: ${error.message}`);
      printInfo('Please create this file and add one page title per line.');
      return 1;
    }
    throw error;
  }
  printInfo(`Found ${titles.length} page titles in '${config.pagesFile}'.`);

  if (options.dryRun) {
    if (titles.length > 0) {
      printSection(`Would set ${titles.length} pages to '${config.targetLanguage}'`);
      for (const line of formatTitleList(titles, config.targetLanguage)) {
        console.log(line);
      }
    }
    console.log();
    printInfo('To execute, run without --dry-run');
    return 0;
  }

  return withSession(config, async (client) => {
    const spinner = ora('Logging in...').start();

    let token: string;
    try {
      token = await authenticate(client, { username: config.username, password: config.password });
      spinner.stop();
      printSuccess('Successfully logged in and obtained CSRF token.');
    } catch (error) {
      spinner.fail('Login failed');
      printError(`Error during login: ${formatError(error)}`);
      return 1;
    }

    await setLanguageForTitles(client, token, titles, {
      language: config.targetLanguage,
      reason: config.reason,
      onStart: (title) => {
        console.log();
        console.log(`Processing page: '${title}'...`);
      },
      onOutcome: (outcome) => {
        console.log(formatOutcome(outcome));
      },
    });

    console.log();
    printSuccess('Finished.');
    return 0;
  }, { fetch: deps.fetch });
}

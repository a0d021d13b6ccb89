#!/usr/bin/env node
/**
 * @pagelang/cli - Command-line interface for pagelang
 *
 * Sets the content language of MediaWiki pages listed in a text file.
 */

import { resolve } from 'node:path';
import { existsSync } from 'node:fs';
import { config as dotenvConfig } from 'dotenv';
import { Command } from 'commander';
import { VERSION, DEFAULT_PAGES_FILE } from '@pagelang/core';
import { setLanguageCommand } from './commands/set-language.js';

// Load .env from the working directory (where user credentials live)
const envPath = resolve(process.cwd(), '.env');
if (existsSync(envPath)) {
  dotenvConfig({ path: envPath });
}

const program = new Command();

program
  .name('pagelang')
  .description('Set the content language of MediaWiki pages from a title list')
  .version(VERSION);

program
  .command('set-language')
  .description('Set the page language of every title in the list')
  .option('-f, --file <path>', `File with one page title per line (default: WIKI_PAGES_FILE or ${DEFAULT_PAGES_FILE})`)
  .option('-l, --lang <code>', 'Target language code (default: WIKI_TARGET_LANG)')
  .option('--api-url <url>', 'api.php endpoint (default: WIKI_API_URL)')
  .option('-r, --reason <text>', 'Reason recorded in the page language log')
  .option('--dry-run', 'List the pages without contacting the wiki')
  .action(setLanguageCommand);

program.parseAsync().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});

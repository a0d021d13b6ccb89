/**
 * Run configuration
 *
 * Built once at startup from CLI flags and WIKI_* environment variables, then passed
 * explicitly to every stage.
 */

import { ConfigError } from '../errors.js';
import { VERSION } from '../version.js';

export interface RunConfig {
  /** api.php endpoint of the wiki */
  readonly apiUrl: string;
  /** Language code applied to every page */
  readonly targetLanguage: string;
  /** File holding one page title per line */
  readonly pagesFile: string;
  /** Bot username from Special:BotPasswords (e.g. "Admin@langbot") */
  readonly username: string;
  readonly password: string;
  /** Log reason sent with each change */
  readonly reason: string | undefined;
  readonly userAgent: string;
  readonly timeoutMs: number;
  /** Minimum spacing between write requests */
  readonly rateLimitWriteMs: number;
}

/** Values given on the command line; these win over the environment */
export interface RunConfigOverrides {
  apiUrl?: string;
  targetLanguage?: string;
  pagesFile?: string;
  reason?: string;
  /** Credentials are not needed when nothing is sent */
  dryRun?: boolean;
}

export const DEFAULT_PAGES_FILE = 'pages.txt';

/** Credentials the original script shipped with */
const PLACEHOLDER_USERNAME = 'bot_user_name';
const PLACEHOLDER_PASSWORD = 'bot_password';

type Env = Record<string, string | undefined>;

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function requireValue(value: string | undefined, variable: string, flag?: string): string {
  if (value === undefined) {
    const hint = flag ? ` (or pass ${flag})` : '';
    throw new ConfigError(`${variable} environment variable required${hint}`, variable);
  }
  return value;
}

function parseApiUrl(value: string, variable: string): string {
  let url: URL;
  try {
    url = new URL(value);
  } catch {
    throw new ConfigError(`${variable} is not a valid URL: ${value}`, variable);
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new ConfigError(`${variable} must be an http(s) URL: ${value}`, variable);
  }
  return url.toString();
}

function parseNonNegativeInt(value: string | undefined, variable: string, fallback: number): number {
  if (value === undefined) return fallback;
  if (!/^\d+$/.test(value)) {
    throw new ConfigError(`${variable} must be a non-negative integer, got "${value}"`, variable);
  }
  return parseInt(value, 10);
}

function parsePositiveInt(value: string | undefined, variable: string, fallback: number): number {
  const parsed = parseNonNegativeInt(value, variable, fallback);
  if (parsed === 0) {
    throw new ConfigError(`${variable} must be greater than 0, got "${value}"`, variable);
  }
  return parsed;
}

/**
 * Build the run configuration
 *
 * @throws ConfigError naming the offending variable
 */
export function loadRunConfig(overrides: RunConfigOverrides = {}, env: Env = process.env): RunConfig {
  const apiUrl = parseApiUrl(
    requireValue(nonEmpty(overrides.apiUrl) ?? nonEmpty(env.WIKI_API_URL), 'WIKI_API_URL', '--api-url'),
    'WIKI_API_URL'
  );
  const targetLanguage = requireValue(
    nonEmpty(overrides.targetLanguage) ?? nonEmpty(env.WIKI_TARGET_LANG),
    'WIKI_TARGET_LANG',
    '--lang'
  );

  let username = nonEmpty(env.WIKI_BOT_USER) ?? '';
  let password = env.WIKI_BOT_PASS ?? '';

  if (!overrides.dryRun) {
    username = requireValue(nonEmpty(username), 'WIKI_BOT_USER');
    password = requireValue(password === '' ? undefined : password, 'WIKI_BOT_PASS');

    if (username === PLACEHOLDER_USERNAME || password === PLACEHOLDER_PASSWORD) {
      throw new ConfigError(
        'Bot credentials are still the placeholders; create real ones at Special:BotPasswords',
        username === PLACEHOLDER_USERNAME ? 'WIKI_BOT_USER' : 'WIKI_BOT_PASS'
      );
    }
  }

  return {
    apiUrl,
    targetLanguage,
    pagesFile: nonEmpty(overrides.pagesFile) ?? nonEmpty(env.WIKI_PAGES_FILE) ?? DEFAULT_PAGES_FILE,
    username,
    password,
    reason: nonEmpty(overrides.reason) ?? nonEmpty(env.WIKI_LANG_REASON),
    userAgent: nonEmpty(env.WIKI_USER_AGENT) ?? `Pagelang/${VERSION}`,
    timeoutMs: parsePositiveInt(nonEmpty(env.WIKI_HTTP_TIMEOUT_MS), 'WIKI_HTTP_TIMEOUT_MS', 30000),
    rateLimitWriteMs: parseNonNegativeInt(nonEmpty(env.WIKI_RATE_LIMIT_WRITE), 'WIKI_RATE_LIMIT_WRITE', 0),
  };
}

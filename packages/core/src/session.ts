/**
 * Session lifecycle
 *
 * A session is one MediaWikiClient: created at the start of a run, logged in once,
 * and closed when the run ends, whatever happened in between.
 */

import { createClient, type FetchLike, type MediaWikiClient } from './api/client.js';
import type { RunConfig } from './config/run.js';

export interface Credentials {
  username: string;
  password: string;
}

/**
 * Log in and fetch the CSRF token used for every write in the run
 */
export async function authenticate(client: MediaWikiClient, credentials: Credentials): Promise<string> {
  await client.login(credentials.username, credentials.password);
  return client.getCsrfToken();
}

/**
 * Run fn with a fresh client, closing it afterwards
 */
export async function withSession<T>(
  config: RunConfig,
  fn: (client: MediaWikiClient) => Promise<T>,
  options: { fetch?: FetchLike } = {}
): Promise<T> {
  const client = createClient(config, options.fetch);
  try {
    return await fn(client);
  } finally {
    client.close();
  }
}

/**
 * Page language updater
 *
 * Calls action=setpagelanguage for one title at a time and turns each response into
 * a PageLanguageOutcome. Nothing here throws for a per-page failure; the caller gets
 * an outcome for every title it asked about.
 */

import type { MediaWikiClient } from '../api/client.js';
import {
  RemoteApiError,
  TransportError,
  UnrecognizedResponseError,
} from '../errors.js';

/** Language change applied */
export interface PageLanguageSuccess {
  status: 'success';
  title: string;
  /** Previous language; undefined when the page had none set */
  from?: string;
  to: string;
}

/** The API answered with an error payload */
export interface PageLanguageApiError {
  status: 'api-error';
  title: string;
  error: RemoteApiError;
}

/** The request never produced a usable response */
export interface PageLanguageTransportError {
  status: 'transport-error';
  title: string;
  error: TransportError;
}

/** The response matched no known shape */
export interface PageLanguageUnrecognized {
  status: 'unrecognized';
  title: string;
  error: UnrecognizedResponseError;
}

export type PageLanguageOutcome =
  | PageLanguageSuccess
  | PageLanguageApiError
  | PageLanguageTransportError
  | PageLanguageUnrecognized;

export interface PageLanguageRequest {
  title: string;
  token: string;
  language: string;
  reason?: string;
}

export interface SetLanguageOptions {
  language: string;
  reason?: string;
  /** Called before the request for a title goes out */
  onStart?: (title: string, index: number, total: number) => void;
  /** Called once a title is done, before the next one starts */
  onOutcome?: (outcome: PageLanguageOutcome, index: number, total: number) => void;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Classify a setpagelanguage response body
 */
export function classifyPageLanguageResponse(
  title: string,
  language: string,
  body: unknown
): PageLanguageOutcome {
  if (isRecord(body) && 'error' in body) {
    const payload = body.error;
    const error: Record<string, unknown> = isRecord(payload) ? payload : {};
    const code = typeof error.code === 'string' ? error.code : 'unknown';
    const info = typeof error.info === 'string' ? error.info : JSON.stringify(payload);
    return { status: 'api-error', title, error: new RemoteApiError(code, info) };
  }

  const result = isRecord(body) ? body.setpagelanguage : undefined;
  if (isRecord(result)) {
    return {
      status: 'success',
      title,
      from: typeof result.from === 'string' ? result.from : undefined,
      to: typeof result.to === 'string' ? result.to : language,
    };
  }

  return { status: 'unrecognized', title, error: new UnrecognizedResponseError(body) };
}

/**
 * Set the language of a single page
 */
export async function updatePageLanguage(
  client: MediaWikiClient,
  request: PageLanguageRequest
): Promise<PageLanguageOutcome> {
  let body: unknown;
  try {
    body = await client.setPageLanguage(request);
  } catch (error) {
    if (error instanceof TransportError) {
      return { status: 'transport-error', title: request.title, error };
    }
    throw error;
  }

  return classifyPageLanguageResponse(request.title, request.language, body);
}

/**
 * Set the language of every title, sequentially and in order
 */
export async function setLanguageForTitles(
  client: MediaWikiClient,
  token: string,
  titles: string[],
  options: SetLanguageOptions
): Promise<PageLanguageOutcome[]> {
  const outcomes: PageLanguageOutcome[] = [];

  for (let i = 0; i < titles.length; i++) {
    options.onStart?.(titles[i], i, titles.length);
    const outcome = await updatePageLanguage(client, {
      title: titles[i],
      token,
      language: options.language,
      reason: options.reason,
    });
    outcomes.push(outcome);
    options.onOutcome?.(outcome, i, titles.length);
  }

  return outcomes;
}

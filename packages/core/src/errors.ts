/**
 * Error types
 *
 * Every failure the tool reports is one of these. Authentication, configuration and
 * input errors abort the run; per-page errors are reported and the batch moves on.
 */

/** Base error for pagelang */
export class PagelangError extends Error {
  readonly code: string;

  constructor(message: string, code: string) {
    super(message);
    this.name = 'PagelangError';
    this.code = code;
  }
}

/** Network or HTTP-level failure talking to the wiki */
export class TransportError extends PagelangError {
  readonly status?: number;

  constructor(message: string, status?: number) {
    super(message, 'TRANSPORT_ERROR');
    this.name = 'TransportError';
    this.status = status;
  }
}

/** The wiki answered, but the body was not JSON */
export class MalformedResponseError extends TransportError {
  constructor(status: number) {
    super(`Invalid JSON in API response (HTTP ${status})`, status);
    this.name = 'MalformedResponseError';
  }
}

/** Token response did not carry the expected token */
export class TokenFetchError extends PagelangError {
  readonly tokenType: string;

  constructor(tokenType: string, detail?: string) {
    super(`Failed to get ${tokenType} token${detail ? `: ${detail}` : ''}`, 'TOKEN_FETCH_ERROR');
    this.name = 'TokenFetchError';
    this.tokenType = tokenType;
  }
}

/** action=login returned anything but Success */
export class AuthenticationError extends PagelangError {
  readonly reason: string;

  constructor(reason: string) {
    super(`Login failed: ${reason}`, 'AUTHENTICATION_ERROR');
    this.name = 'AuthenticationError';
    this.reason = reason;
  }
}

export class InputFileMissingError extends PagelangError {
  readonly path: string;

  constructor(path: string) {
    super(`The file '${path}' was not found.`, 'INPUT_FILE_MISSING');
    this.name = 'InputFileMissingError';
    this.path = path;
  }
}

/** Error payload returned by the API for a write action */
export class RemoteApiError extends PagelangError {
  readonly apiCode: string;

  constructor(apiCode: string, info: string) {
    super(info, 'REMOTE_API_ERROR');
    this.name = 'RemoteApiError';
    this.apiCode = apiCode;
  }
}

/** Response matched neither the success nor the error shape */
export class UnrecognizedResponseError extends PagelangError {
  readonly raw: unknown;

  constructor(raw: unknown) {
    super(`Unknown response format: ${JSON.stringify(raw) ?? String(raw)}`, 'UNRECOGNIZED_RESPONSE');
    this.name = 'UnrecognizedResponseError';
    this.raw = raw;
  }
}

export class ConfigError extends PagelangError {
  readonly variable?: string;

  constructor(message: string, variable?: string) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigError';
    this.variable = variable;
  }
}

/**
 * Render any thrown value as a message
 */
export function formatError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

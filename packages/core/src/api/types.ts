/**
 * MediaWiki API type definitions
 */

/** API response wrapper */
export interface ApiResponse {
  error?: ApiError;
  warnings?: Record<string, { '*'?: string; warnings?: string }>;
}

/** API error */
export interface ApiError {
  code: string;
  info: string;
  docref?: string;
}

/** Query response (meta=tokens) */
export interface QueryResponse extends ApiResponse {
  query?: {
    tokens?: Partial<Record<`${TokenType}token`, string>>;
  };
  batchcomplete?: boolean;
}

/** Login response */
export interface LoginResponse extends ApiResponse {
  login?: {
    result: 'Success' | 'NeedToken' | 'Failed' | 'Aborted' | 'WrongToken';
    lguserid?: number;
    lgusername?: string;
    reason?: string;
  };
}

/** Token types */
export type TokenType = 'login' | 'csrf';

/** Parameters for a language change */
export interface SetPageLanguageParams {
  title: string;
  language: string;
  token: string;
  reason?: string;
}

export type Command =
  | { type: 'usage' }
  | { type: 'invalid_language'; code: string }
  | { type: 'translate'; targetLang: string };

export enum ErrorCode {
  NETWORK_ERROR = 'NETWORK_ERROR',
  API_ERROR = 'API_ERROR',
  RATE_LIMIT = 'RATE_LIMIT',
  AUTH_ERROR = 'AUTH_ERROR',
  INVALID_INPUT = 'INVALID_INPUT',
}

import { TranslationError } from '../utils/errors';
import { ErrorCode } from '../types';

/**
 * HTTPステータスコードに応じたErrorCodeを決定
 */
export function errorCodeForStatus(statusCode: number): ErrorCode {
  if (statusCode === 401 || statusCode === 403) {
    return ErrorCode.AUTH_ERROR;
  } else if (statusCode === 400) {
    return ErrorCode.INVALID_INPUT;
  } else if (statusCode === 429) {
    return ErrorCode.RATE_LIMIT;
  } else if (statusCode >= 500) {
    return ErrorCode.NETWORK_ERROR;
  }
  return ErrorCode.API_ERROR;
}

/**
 * 翻訳プロバイダーへGETリクエストを送り、JSONボディを返す
 * @throws {TranslationError} HTTPエラー、ネットワークエラー、JSONでないレスポンスの場合
 */
export async function fetchJson(
  providerName: string,
  url: URL
): Promise<unknown> {
  let response: Response;
  try {
    response = await fetch(url, {
      method: 'GET',
      headers: { Accept: 'application/json' },
    });
  } catch (error) {
    // ネットワークエラーなど
    throw new TranslationError(
      `Network error during ${providerName} request`,
      ErrorCode.NETWORK_ERROR,
      error instanceof Error ? error : undefined
    );
  }

  if (!response.ok) {
    const errorText = await response.text();
    throw new TranslationError(
      `${providerName} error: ${response.status} ${response.statusText} - ${errorText}`,
      errorCodeForStatus(response.status)
    );
  }

  try {
    return await response.json();
  } catch (error) {
    throw new TranslationError(
      `${providerName} returned a non-JSON response`,
      ErrorCode.API_ERROR,
      error instanceof Error ? error : undefined
    );
  }
}

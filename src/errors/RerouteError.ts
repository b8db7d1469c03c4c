/**
 * リルートエラークラス
 */

export type RerouteErrorCode =
  | 'INVALID_RESPONSE'
  | 'CANCELLED'
  | 'NO_PROVIDER'
  | 'PROVIDER_ERROR'
  | 'PROVIDER_EMPTY_RESULT'
  | 'INVALID_CONFIGURATION';

/**
 * エンジンとのコールバックでやり取りする失敗種別
 */
export type RerouteFailureType =
  | 'cancelled'
  | 'no-provider'
  | 'invalid-request'
  | 'router-error'
  | 'empty-result'
  | 'unknown';

export class RerouteError extends Error {
  public readonly code: RerouteErrorCode;
  public readonly details?: unknown;

  constructor(message: string, code: RerouteErrorCode, details?: unknown) {
    super(message);
    this.name = 'RerouteError';
    this.code = code;
    this.details = details;

    Error.captureStackTrace(this, this.constructor);
  }

  static invalidResponse(message: string, details?: unknown): RerouteError {
    return new RerouteError(message, 'INVALID_RESPONSE', details);
  }

  static cancelled(message: string = 'Reroute was cancelled.'): RerouteError {
    return new RerouteError(message, 'CANCELLED');
  }

  static noProvider(message: string = 'No routing provider is configured.'): RerouteError {
    return new RerouteError(message, 'NO_PROVIDER');
  }

  static providerError(message: string, details?: unknown): RerouteError {
    return new RerouteError(message, 'PROVIDER_ERROR', details);
  }

  static providerEmptyResult(
    message: string = 'Routing provider returned a result without an identifier.'
  ): RerouteError {
    return new RerouteError(message, 'PROVIDER_EMPTY_RESULT');
  }

  static invalidConfiguration(message: string, details?: unknown): RerouteError {
    return new RerouteError(message, 'INVALID_CONFIGURATION', details);
  }

  /**
   * エンジンから通知された失敗種別を型付きエラーに変換
   */
  static fromFailureType(type: RerouteFailureType, message: string): RerouteError {
    switch (type) {
      case 'cancelled':
        return RerouteError.cancelled(message);
      case 'no-provider':
        return RerouteError.noProvider(message);
      case 'invalid-request':
        return RerouteError.invalidResponse(message);
      case 'empty-result':
        return RerouteError.providerEmptyResult(message);
      case 'router-error':
      case 'unknown':
        return RerouteError.providerError(message, { type });
    }
  }
}

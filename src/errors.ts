/**
 * Surge SDK error handling
 */

export enum ErrorCodes {
  // Request errors (1xx)
  API_REQUEST_FAILED = 100,
  NETWORK_ERROR = 101,
  INVALID_RESPONSE = 102,

  // Ledger errors (2xx)
  UNKNOWN_NETWORK = 200,
  PREVIEW_FAILED = 201,
  TRANSACTION_FAILED = 202,
  TRANSACTION_TIMEOUT = 203,
  TRANSACTION_BUILD_FAILED = 204,

  // Protocol errors (3xx)
  VARIABLES_NOT_LOADED = 300,
  PRICE_UNAVAILABLE = 301,
  INVALID_AMOUNT = 302,
  INVALID_REQUEST = 303,

  // Configuration errors (4xx)
  INVALID_CONFIG = 400,
  ACCOUNT_STORE_FAILED = 401,
}

export class SurgeError extends Error {
  readonly code: ErrorCodes;
  readonly details?: Record<string, unknown>;

  constructor(code: ErrorCodes, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'SurgeError';
    this.code = code;
    this.details = details;
  }

  static apiRequestFailed(method: string, url: string, status: number, body: unknown): SurgeError {
    return new SurgeError(
      ErrorCodes.API_REQUEST_FAILED,
      `API request failed with status ${status}: ${method} ${url}`,
      { method, url, status, body }
    );
  }

  static networkError(method: string, url: string, cause: string): SurgeError {
    return new SurgeError(
      ErrorCodes.NETWORK_ERROR,
      `No response from ${method} ${url}: ${cause}`,
      { method, url, cause }
    );
  }

  static invalidResponse(context: string, reason: string): SurgeError {
    return new SurgeError(
      ErrorCodes.INVALID_RESPONSE,
      `Invalid response for ${context}: ${reason}`,
      { context, reason }
    );
  }

  static unknownNetwork(network: string): SurgeError {
    return new SurgeError(
      ErrorCodes.UNKNOWN_NETWORK,
      `Unknown network: ${network}`,
      { network }
    );
  }

  static previewFailed(status: string, errorMessage?: string | null): SurgeError {
    return new SurgeError(
      ErrorCodes.PREVIEW_FAILED,
      `Transaction preview ${status.toLowerCase()}${errorMessage ? `: ${errorMessage}` : ''}`,
      { status, errorMessage: errorMessage ?? undefined }
    );
  }

  static transactionFailed(intent: string, status: string): SurgeError {
    return new SurgeError(
      ErrorCodes.TRANSACTION_FAILED,
      `Transaction ${intent} finished with status ${status}`,
      { intent, status }
    );
  }

  static transactionTimeout(intent: string, attempts: number): SurgeError {
    return new SurgeError(
      ErrorCodes.TRANSACTION_TIMEOUT,
      `Transaction ${intent} not committed after ${attempts} attempts`,
      { intent, attempts }
    );
  }

  static transactionBuildFailed(reason: string): SurgeError {
    return new SurgeError(
      ErrorCodes.TRANSACTION_BUILD_FAILED,
      `Could not build transaction: ${reason}`,
      { reason }
    );
  }

  static variablesNotLoaded(): SurgeError {
    return new SurgeError(
      ErrorCodes.VARIABLES_NOT_LOADED,
      'Protocol variables not loaded: call loadVariables() first'
    );
  }

  static priceUnavailable(pair: string): SurgeError {
    return new SurgeError(
      ErrorCodes.PRICE_UNAVAILABLE,
      `No oracle price for pair ${pair}`,
      { pair }
    );
  }

  static invalidAmount(name: string, value: string, reason: string): SurgeError {
    return new SurgeError(
      ErrorCodes.INVALID_AMOUNT,
      `Invalid ${name} ${value}: ${reason}`,
      { name, value, reason }
    );
  }

  static invalidRequest(reason: string): SurgeError {
    return new SurgeError(ErrorCodes.INVALID_REQUEST, `Invalid request: ${reason}`, { reason });
  }

  static invalidConfig(key: string, reason: string): SurgeError {
    return new SurgeError(
      ErrorCodes.INVALID_CONFIG,
      `Invalid configuration ${key}: ${reason}`,
      { key, reason }
    );
  }

  static accountStoreFailed(path: string, reason: string): SurgeError {
    return new SurgeError(
      ErrorCodes.ACCOUNT_STORE_FAILED,
      `Account store ${path}: ${reason}`,
      { path, reason }
    );
  }
}

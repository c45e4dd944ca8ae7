/**
 * Error classification.
 *
 * Turns whatever the client library throws into an ExchangeError with an
 * explicit retriable / non-retriable decision, before any retry happens.
 */

import type { ExchangeError, ExchangeErrorKind } from './types.js';

/** Exchange codes meaning "not processed, try again" */
const RETRIABLE_CODES: Record<number, ExchangeErrorKind> = {
  [-1000]: 'EXCHANGE_UNAVAILABLE', // UNKNOWN
  [-1001]: 'NETWORK', // DISCONNECTED
  [-1003]: 'RATE_LIMITED', // TOO_MANY_REQUESTS
  [-1006]: 'EXCHANGE_UNAVAILABLE', // UNEXPECTED_RESP
  [-1007]: 'TIMEOUT', // TIMEOUT
  [-1008]: 'EXCHANGE_UNAVAILABLE', // SERVER_BUSY
  [-1015]: 'RATE_LIMITED', // TOO_MANY_ORDERS
};

/** Codes where the order may have been executed regardless of the error */
const AMBIGUOUS_CODES = [-1006, -1007];

const NON_RETRIABLE_CODES: Record<number, ExchangeErrorKind> = {
  [-1121]: 'UNKNOWN_SYMBOL', // BAD_SYMBOL
  [-1022]: 'PERMISSION_DENIED', // INVALID_SIGNATURE
  [-2014]: 'PERMISSION_DENIED', // BAD_API_KEY_FMT
  [-2015]: 'PERMISSION_DENIED', // REJECTED_MBX_KEY
  [-2011]: 'UNKNOWN_ORDER', // CANCEL_REJECTED
  [-2013]: 'UNKNOWN_ORDER', // NO_SUCH_ORDER
  [-2018]: 'INSUFFICIENT_MARGIN', // BALANCE_NOT_SUFFICIENT
  [-2019]: 'INSUFFICIENT_MARGIN', // MARGIN_NOT_SUFFICIENT
};

const TIMEOUT_SOCKET_CODES = ['ECONNABORTED', 'ETIMEDOUT', 'ESOCKETTIMEDOUT'];
const UNREACHED_SOCKET_CODES = ['ECONNREFUSED', 'ENOTFOUND', 'EAI_AGAIN'];
const NETWORK_SOCKET_CODES = ['ECONNRESET', 'EPIPE', 'ENETUNREACH', 'EHOSTUNREACH'];

/**
 * Classify a thrown value from the client library
 */
export function classifyError(error: unknown): ExchangeError {
  const message = normalizeErrorMessage(error);

  if (typeof error !== 'object' || error === null) {
    return { kind: 'UNKNOWN', message, retriable: false, ambiguous: false };
  }

  const exchangeError = readExchangeError(error);
  if (exchangeError) {
    return classifyExchangeCode(exchangeError.code, message);
  }

  const code = 'code' in error ? error.code : undefined;

  if (typeof code === 'string') {
    if (TIMEOUT_SOCKET_CODES.includes(code)) {
      return { kind: 'TIMEOUT', code, message, retriable: true, ambiguous: true };
    }
    if (UNREACHED_SOCKET_CODES.includes(code)) {
      return { kind: 'NETWORK', code, message, retriable: true, ambiguous: false };
    }
    if (NETWORK_SOCKET_CODES.includes(code)) {
      return { kind: 'NETWORK', code, message, retriable: true, ambiguous: true };
    }
  }

  const status = readHttpStatus(error);
  if (status === 429 || status === 418) {
    return { kind: 'RATE_LIMITED', code: status, message, retriable: true, ambiguous: false };
  }
  if (status !== undefined && status >= 500) {
    // Binance documents 5xx as "execution status unknown"
    return { kind: 'EXCHANGE_UNAVAILABLE', code: status, message, retriable: true, ambiguous: true };
  }

  // The library's parsed rejection drops the status; a response without an
  // exchange code is a gateway or server error page
  if (status === undefined && 'requestUrl' in error) {
    return { kind: 'EXCHANGE_UNAVAILABLE', message, retriable: true, ambiguous: true };
  }

  return { kind: 'UNKNOWN', message, retriable: false, ambiguous: false };
}

/**
 * Classify a numeric exchange error code
 */
export function classifyExchangeCode(code: number, message: string): ExchangeError {
  const retriableKind = RETRIABLE_CODES[code];
  if (retriableKind) {
    return {
      kind: retriableKind,
      code,
      message,
      retriable: true,
      ambiguous: AMBIGUOUS_CODES.includes(code),
    };
  }

  const kind: ExchangeErrorKind =
    NON_RETRIABLE_CODES[code] ?? (isParameterError(code) ? 'INVALID_REQUEST' : 'UNKNOWN');

  return { kind, code, message, retriable: false, ambiguous: false };
}

/**
 * Request-shape errors: -11xx, -20xx order rejections and -4xxx filters
 */
function isParameterError(code: number): boolean {
  return (
    (code <= -1100 && code > -1200) ||
    (code <= -2000 && code > -2100) ||
    (code <= -4000 && code > -5000)
  );
}

interface ExchangeErrorBody {
  code: number;
  msg?: string;
}

/**
 * Binance error body, either on the error itself or on an HTTP response
 */
function readExchangeError(error: object): ExchangeErrorBody | undefined {
  if ('code' in error && typeof error.code === 'number') {
    const msg =
      'msg' in error && typeof error.msg === 'string'
        ? error.msg
        : 'message' in error && typeof error.message === 'string'
          ? error.message
          : undefined;
    return { code: error.code, msg };
  }
  if ('response' in error && typeof error.response === 'object' && error.response !== null) {
    const response = error.response;
    if ('data' in response && typeof response.data === 'object' && response.data !== null) {
      const data = response.data;
      if ('code' in data && typeof data.code === 'number') {
        const msg = 'msg' in data && typeof data.msg === 'string' ? data.msg : undefined;
        return { code: data.code, msg };
      }
    }
  }
  return undefined;
}

function readHttpStatus(error: object): number | undefined {
  if ('status' in error && typeof error.status === 'number') {
    return error.status;
  }
  if ('response' in error && typeof error.response === 'object' && error.response !== null) {
    const response = error.response;
    if ('status' in response && typeof response.status === 'number') {
      return response.status;
    }
  }
  return undefined;
}

/**
 * Normalize various error types to string message
 */
export function normalizeErrorMessage(error: unknown): string {
  if (error && typeof error === 'object') {
    // Binance API error
    const exchangeError = readExchangeError(error);
    if (exchangeError) {
      return `Binance Error ${exchangeError.code}: ${exchangeError.msg ?? 'Unknown error'}`;
    }
    // Standard Error object
    if (error instanceof Error) {
      return error.message;
    }
    if ('message' in error && typeof error.message === 'string') {
      return error.message;
    }
    // Axios error with response
    const status = readHttpStatus(error);
    if (status !== undefined) {
      return `HTTP ${status}`;
    }
    if ('requestUrl' in error && typeof error.requestUrl === 'string') {
      return `Unexpected response from ${error.requestUrl}`;
    }
  }
  return String(error);
}

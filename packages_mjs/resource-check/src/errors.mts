/**
 * Errors raised while checking a resource
 *
 * Only ConfigurationError reaches callers; transport failures are turned
 * into notes on a failed Diagnosis.
 */

export type TransportErrorCode = 'timeout' | 'dns' | 'connect' | 'tls' | 'reset' | 'aborted' | 'protocol';

/**
 * The exchange could not be completed at the network level
 */
export class TransportError extends Error {
  constructor(
    readonly code: TransportErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'TransportError';
  }
}

/**
 * An option value was rejected when the checker was created
 */
export class ConfigurationError extends Error {
  readonly code = 'CONFIGURATION_ERROR';

  /**
   * @param issues - One entry per rejected option, e.g. "maxRedirects: Number must be less than or equal to 20"
   */
  constructor(
    message: string,
    readonly issues: readonly string[] = []
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

const SYSTEM_ERROR_CODES: Record<string, TransportErrorCode> = {
  ENOTFOUND: 'dns',
  EAI_AGAIN: 'dns',
  EAI_FAIL: 'dns',
  ECONNREFUSED: 'connect',
  EHOSTUNREACH: 'connect',
  ENETUNREACH: 'connect',
  EADDRNOTAVAIL: 'connect',
  ECONNRESET: 'reset',
  EPIPE: 'reset',
  UND_ERR_SOCKET: 'reset',
  ETIMEDOUT: 'timeout',
  UND_ERR_CONNECT_TIMEOUT: 'timeout',
  ABORT_ERR: 'aborted',
};

function errorCode(error: Error): string | undefined {
  return 'code' in error && typeof error.code === 'string' ? error.code : undefined;
}

/**
 * Classify anything a fetcher threw as a TransportError
 */
export function toTransportError(error: unknown): TransportError {
  if (error instanceof TransportError) {
    return error;
  }
  if (!(error instanceof Error)) {
    return new TransportError('connect', String(error));
  }

  const code = errorCode(error);
  if (code !== undefined && code in SYSTEM_ERROR_CODES) {
    return new TransportError(SYSTEM_ERROR_CODES[code], error.message, { cause: error });
  }
  if (code?.startsWith('ERR_TLS') || code?.startsWith('ERR_SSL') || code?.includes('CERT')) {
    return new TransportError('tls', error.message, { cause: error });
  }
  if (error.name === 'AbortError') {
    return new TransportError('aborted', error.message, { cause: error });
  }
  return new TransportError('connect', error.message, { cause: error });
}

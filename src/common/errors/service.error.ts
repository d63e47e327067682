export enum ServiceErrorKind {
  NETWORK = 'NETWORK',
  AUTHENTICATION = 'AUTHENTICATION',
  RATE_LIMITED = 'RATE_LIMITED',
  HTTP = 'HTTP',
  MALFORMED_RESPONSE = 'MALFORMED_RESPONSE',
}

/**
 * Failure of a single completion call. Caught per company by the enrichment
 * engine and recorded on that company's row.
 */
export class ServiceError extends Error {
  constructor(
    message: string,
    readonly kind: ServiceErrorKind = ServiceErrorKind.HTTP,
    readonly statusCode?: number,
  ) {
    super(message);
    this.name = 'ServiceError';
  }

  static fromStatus(statusCode: number): ServiceError {
    if (statusCode === 429) {
      return new ServiceError(
        'rate limited',
        ServiceErrorKind.RATE_LIMITED,
        statusCode,
      );
    }
    if (statusCode === 401 || statusCode === 403) {
      return new ServiceError(
        'authentication failed',
        ServiceErrorKind.AUTHENTICATION,
        statusCode,
      );
    }
    return new ServiceError(
      `completion service responded with HTTP ${statusCode}`,
      ServiceErrorKind.HTTP,
      statusCode,
    );
  }

  static malformed(detail: string): ServiceError {
    return new ServiceError(
      `malformed response: ${detail}`,
      ServiceErrorKind.MALFORMED_RESPONSE,
    );
  }

  static network(detail: string): ServiceError {
    return new ServiceError(
      `network error: ${detail}`,
      ServiceErrorKind.NETWORK,
    );
  }

  static missingApiKey(variable: string): ServiceError {
    return new ServiceError(
      `${variable} is not configured`,
      ServiceErrorKind.AUTHENTICATION,
    );
  }
}

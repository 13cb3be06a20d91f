/**
 * Base error class for all multi-node provider errors
 * Provides structured error information with context and retry guidance
 */
export class IntegrationError extends Error {
  /**
   * Unique error code for categorization
   * Format: CATEGORY_SPECIFIC_ERROR (e.g., ENDPOINT_UNSUPPORTED_SCHEME, PROVIDER_NONE_ACTIVE)
   */
  readonly code: string;

  /**
   * Indicates if another endpoint may answer the same request
   */
  readonly retriable: boolean;

  /**
   * Additional context for debugging and logging
   * Should include relevant data without exposing endpoint credentials
   */
  readonly context: Record<string, unknown>;

  /**
   * Original error that caused this error (if applicable)
   */
  readonly cause?: Error;

  /**
   * Timestamp when the error occurred
   */
  readonly timestamp: Date;

  constructor(
    message: string,
    code: string,
    retriable: boolean,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.retriable = retriable;
    this.context = context || {};
    this.cause = cause;
    this.timestamp = new Date();

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Converts error to JSON for logging/serialization
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      retriable: this.retriable,
      context: ErrorUtils.sanitizeContext(this.context),
      timestamp: this.timestamp.toISOString(),
      cause: this.cause
        ? {
            name: this.cause.name,
            message: this.cause.message,
          }
        : undefined,
    };
  }
}

/**
 * A single endpoint failed to answer: connection failure, timeout or an
 * HTTP error status. Always retriable on the next candidate.
 */
export class EndpointRequestError extends IntegrationError {
  /**
   * Normalized provider identity (never the full URL)
   */
  readonly provider: string;

  /**
   * HTTP status when a response was received
   */
  readonly status?: number;

  constructor(
    message: string,
    provider: string,
    status?: number,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message, status === undefined ? 'ENDPOINT_UNREACHABLE' : 'ENDPOINT_HTTP_ERROR', true, context, cause);
    this.provider = provider;
    this.status = status;
  }

  static httpStatus(provider: string, status: number, cause?: Error): EndpointRequestError {
    return new EndpointRequestError(
      `Endpoint responded with HTTP ${status}`,
      provider,
      status,
      { status },
      cause
    );
  }

  static unreachable(provider: string, cause?: Error): EndpointRequestError {
    return new EndpointRequestError(
      cause ? `Endpoint request failed: ${cause.message}` : 'Endpoint request failed',
      provider,
      undefined,
      {},
      cause
    );
  }
}

/**
 * Input validation error
 * Not retriable - indicates client-side error
 */
export class ValidationError extends IntegrationError {
  /**
   * Field or parameter that failed validation
   */
  readonly field: string;

  /**
   * Expected format or constraint
   */
  readonly expected: string;

  /**
   * Actual value received (sanitized)
   */
  readonly received: string;

  constructor(
    message: string,
    field: string,
    expected: string,
    received: string,
    context?: Record<string, unknown>,
    code: string = `VALIDATION_${field.toUpperCase()}_INVALID`
  ) {
    super(message, code, false, context);
    this.field = field;
    this.expected = expected;
    this.received = received;
  }

  static invalidParameter(
    paramName: string,
    expected: string,
    received: unknown
  ): ValidationError {
    return new ValidationError(
      `Invalid parameter ${paramName}`,
      paramName,
      expected,
      String(received)
    );
  }
}

/**
 * The caller built a request that no endpoint could accept (empty method,
 * unserializable params, relative path without a leading slash).
 * Never triggers failover.
 */
export class MalformedRequestError extends ValidationError {
  constructor(message: string, field: string, expected: string, received: string, cause?: Error) {
    super(message, field, expected, received, cause ? { cause: cause.message } : {}, 'REQUEST_MALFORMED');
  }

  static emptyMethod(): MalformedRequestError {
    return new MalformedRequestError(
      'JSON-RPC method must be a non-empty string',
      'method',
      'non-empty string',
      ''
    );
  }

  static unserializable(field: string, cause: Error): MalformedRequestError {
    return new MalformedRequestError(
      `Request ${field} cannot be serialized to JSON: ${cause.message}`,
      field,
      'JSON-serializable value',
      cause.name,
      cause
    );
  }

  static invalidPath(path: string): MalformedRequestError {
    return new MalformedRequestError(
      `Request path must start with "/": ${path}`,
      'path',
      'absolute path',
      path
    );
  }

  static emptyBatch(): MalformedRequestError {
    return new MalformedRequestError(
      'Batch must contain at least one request',
      'batch',
      'non-empty array',
      '[]'
    );
  }
}

/**
 * Data format error from an endpoint: the body could not be decoded.
 * Retriable - another endpoint may answer correctly.
 */
export class DataError extends IntegrationError {
  /**
   * Type of payload that was invalid
   */
  readonly dataType: 'JSON_RPC_RESPONSE' | 'BEACON_RESPONSE';

  /**
   * Reason for data invalidity
   */
  readonly reason: string;

  constructor(
    message: string,
    dataType: DataError['dataType'],
    reason: string,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message, `DATA_${dataType}_INVALID`, true, context, cause);
    this.dataType = dataType;
    this.reason = reason;
  }

  static undecodable(dataType: DataError['dataType'], cause?: Error): DataError {
    return new DataError(
      'Endpoint returned a body that is not valid JSON',
      dataType,
      'JSON decoding failed',
      {},
      cause
    );
  }

  static schemaViolation(dataType: DataError['dataType'], expected: string): DataError {
    return new DataError(
      'Data does not match expected schema',
      dataType,
      'Schema validation failed',
      { expected }
    );
  }
}

/**
 * Endpoint address uses a scheme outside the allow-list
 */
export class UnsupportedSchemeError extends IntegrationError {
  readonly scheme: string;

  constructor(scheme: string, allowed: readonly string[]) {
    super(
      `Protocol "${scheme}" is not supported. Supported protocols: ${allowed.join(', ')}`,
      'ENDPOINT_UNSUPPORTED_SCHEME',
      false,
      { scheme, allowed: [...allowed] }
    );
    this.scheme = scheme;
  }
}

/**
 * Endpoint address cannot be parsed or normalized into a provider label
 */
export class InvalidEndpointError extends IntegrationError {
  constructor(reason: string, cause?: Error) {
    super(`Invalid endpoint address: ${reason}`, 'ENDPOINT_INVALID', false, { reason }, cause);
  }

  static unhandledHostname(hostname: string): InvalidEndpointError {
    return new InvalidEndpointError(
      `unhandled hostname format "${hostname}". Hostname must be either an IP address or a valid provider address.`
    );
  }
}

/**
 * Identity probe failed while building a pool member
 */
export class ProviderInitializationError extends IntegrationError {
  readonly provider: string;

  constructor(provider: string, cause?: Error) {
    super(
      `Failed to initialize provider ${provider}`,
      'PROVIDER_INITIALIZATION_FAILED',
      false,
      { provider },
      cause
    );
    this.provider = provider;
  }
}

/**
 * Every candidate in the pool failed for one logical call
 */
export class NoActiveProviderError extends IntegrationError {
  /**
   * One error per attempted endpoint, in attempt order
   */
  readonly errors: readonly Error[];

  constructor(errors: readonly Error[]) {
    super(
      'No active provider available.',
      'PROVIDER_NONE_ACTIVE',
      true,
      { attempts: errors.length },
      errors[errors.length - 1]
    );
    this.errors = errors;
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      errors: this.errors.map((e) => ({ name: e.name, message: e.message })),
    };
  }
}

/**
 * Pool was built without any endpoint
 */
export class NoProvidersConfiguredError extends IntegrationError {
  constructor() {
    super('No providers configured.', 'PROVIDER_NONE_CONFIGURED', false);
  }
}

/**
 * Utility functions for error handling
 */
export class ErrorUtils {
  private static readonly SENSITIVE_KEYS = [
    'apiKey',
    'api_key',
    'secret',
    'password',
    'token',
    'url',
    'uri',
  ];

  /**
   * Placeholder written over endpoint URLs in log output
   */
  static readonly REDACTED = '****';

  /**
   * Whether the failure is the caller's fault and must bypass failover
   */
  static isCallerError(error: unknown): boolean {
    return error instanceof MalformedRequestError;
  }

  /**
   * Extracts error code from any error type
   */
  static getErrorCode(error: Error): string {
    if (error instanceof IntegrationError) {
      return error.code;
    }

    if ('code' in error && typeof error.code === 'string') {
      return error.code;
    }

    return 'UNKNOWN';
  }

  /**
   * Safely converts any thrown value to an Error instance
   */
  static toError(error: unknown): Error {
    if (error instanceof Error) return error;
    return new Error(typeof error === 'string' ? error : String(error));
  }

  /**
   * Replaces every occurrence of the given secrets in a message
   */
  static redact(message: string, secrets: readonly string[]): string {
    let out = message;
    for (const secret of secrets) {
      if (secret) out = out.split(secret).join(ErrorUtils.REDACTED);
    }
    return out;
  }

  /**
   * Sanitizes error context to remove sensitive data
   */
  static sanitizeContext(context: object): Record<string, unknown> {
    const sanitized: Record<string, unknown> = {};

    for (const [key, value] of Object.entries(context)) {
      const lowerKey = key.toLowerCase();

      const isSensitive = this.SENSITIVE_KEYS.some((sensitive) => {
        const lowerSensitive = sensitive.toLowerCase();
        return lowerKey === lowerSensitive || lowerKey.includes(lowerSensitive);
      });

      if (isSensitive) {
        sanitized[key] = '[REDACTED]';
        continue;
      }

      if (value && typeof value === 'object' && !Array.isArray(value)) {
        sanitized[key] = this.sanitizeContext(value);
      } else {
        sanitized[key] = value;
      }
    }

    return sanitized;
  }
}

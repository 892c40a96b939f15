export interface PropertyTaxApiErrorOptions {
  cause?: unknown;
  statusCode?: number | null;
  endpoint?: string | null;
}

/** Base class for every failure raised by a PropertyTaxApi implementation. */
export class PropertyTaxApiError extends Error {
  readonly statusCode: number | null;
  readonly endpoint: string | null;

  constructor(message: string, options: PropertyTaxApiErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = "PropertyTaxApiError";
    this.statusCode = options.statusCode ?? null;
    this.endpoint = options.endpoint ?? null;
  }
}

/** Credentials rejected by the remote service. Not retryable from the conversation. */
export class AuthenticationError extends PropertyTaxApiError {
  constructor(message: string, options?: PropertyTaxApiErrorOptions) {
    super(message, options);
    this.name = "AuthenticationError";
  }
}

/** Timeout, 5xx or network failure. The next user turn is the retry. */
export class ServiceUnavailableError extends PropertyTaxApiError {
  constructor(message: string, options?: PropertyTaxApiErrorOptions) {
    super(message, options);
    this.name = "ServiceUnavailableError";
  }
}

/** Raised inside clients for 404 responses; public methods return null instead. */
export class DataNotFoundError extends PropertyTaxApiError {
  constructor(message: string, options?: PropertyTaxApiErrorOptions) {
    super(message, options);
    this.name = "DataNotFoundError";
  }
}

/** The property registry rejected the id itself (remote code 033). */
export class InvalidPropertyIdError extends PropertyTaxApiError {
  constructor(message: string, options?: PropertyTaxApiErrorOptions) {
    super(message, options);
    this.name = "InvalidPropertyIdError";
  }
}

/**
 * Exception classes for inkframe.
 */

export class InkframeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InkframeError';
  }
}

/**
 * Bad display type, orientation, album URL, target size or missing driver.
 * Fatal to the current operation.
 */
export class ConfigurationError extends InkframeError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Network failure or non-success HTTP status. The caller may retry the
 * whole cycle.
 */
export class TransportError extends InkframeError {
  readonly status?: number;
  readonly retryable: boolean;

  constructor(message: string, options: { status?: number; retryable?: boolean } = {}) {
    super(message);
    this.name = 'TransportError';
    this.status = options.status;
    this.retryable = options.retryable ?? true;
  }
}

export class TransportTimeoutError extends TransportError {
  constructor(message: string) {
    super(message, { retryable: true });
    this.name = 'TransportTimeoutError';
  }
}

/**
 * Downloaded bytes are not a decodable image.
 */
export class DecodeError extends InkframeError {
  constructor(message: string) {
    super(message);
    this.name = 'DecodeError';
  }
}

/**
 * Nothing to show: empty catalog, no derivatives, no checksum match.
 */
export class DataError extends InkframeError {
  constructor(message: string) {
    super(message);
    this.name = 'DataError';
  }
}

export class Base62DecodeError extends InkframeError {
  constructor(message: string) {
    super(message);
    this.name = 'Base62DecodeError';
  }
}

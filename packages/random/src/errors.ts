export class RandomError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'RandomError';
  }
}

export class InvalidRangeError extends RandomError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidRangeError';
  }
}

export class InvalidLengthError extends RandomError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidLengthError';
  }
}

export class InvalidCharsetError extends RandomError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidCharsetError';
  }
}

export class EmptySequenceError extends RandomError {
  constructor(message: string) {
    super(message);
    this.name = 'EmptySequenceError';
  }
}

/**
 * The secure byte provider failed. `cause` holds the provider's error.
 */
export class EntropyUnavailableError extends RandomError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'EntropyUnavailableError';
  }
}

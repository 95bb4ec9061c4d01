/**
 * Base class for every error thrown while building perp instructions
 */
export class PerpSdkError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PerpSdkError';
  }
}

/**
 * The requested instance does not exist in the market context
 */
export class InvalidInstanceIndexError extends PerpSdkError {
  constructor(
    public readonly instanceIndex: number,
    public readonly instanceCount: number
  ) {
    super(
      `Invalid instance index ${instanceIndex}: market has ${instanceCount} instance(s)`
    );
    this.name = 'InvalidInstanceIndexError';
  }
}

/**
 * A value cannot be represented in (or read back from) the instruction layout
 */
export class EncodingError extends PerpSdkError {
  constructor(message: string, public readonly field?: string) {
    super(field ? `${field}: ${message}` : message);
    this.name = 'EncodingError';
  }
}

/**
 * An optional account segment is incomplete or out of order
 */
export class MissingOptionalAccountError extends PerpSdkError {
  constructor(message: string) {
    super(message);
    this.name = 'MissingOptionalAccountError';
  }
}

/**
 * The market configuration could not be turned into a MarketContext
 */
export class MarketConfigError extends PerpSdkError {
  constructor(message: string, public readonly issues: string[] = []) {
    super(issues.length > 0 ? `${message}\n  ${issues.join('\n  ')}` : message);
    this.name = 'MarketConfigError';
  }
}

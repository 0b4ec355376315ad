/**
 * Domain errors. Each carries a stable code the API layer maps to an
 * error envelope.
 */

export class DomainError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * The subject property price is exactly zero, so ratios against it are
 * undefined.
 */
export class ZeroPriceError extends DomainError {
  static readonly CODE = 'INVALID_INPUT_ZERO_PRICE';

  constructor(message = 'Invalid input: property price is zero') {
    super(ZeroPriceError.CODE, message);
  }
}

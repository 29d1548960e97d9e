export type ErrorKind =
  | 'NotFound'
  | 'UnresolvableLocation'
  | 'InvalidYear'
  | 'MalformedInput'
  | 'Dataset';

export class AppError extends Error {
  public readonly kind: ErrorKind;
  public readonly isOperational: boolean;

  constructor(message: string, kind: ErrorKind, isOperational = true) {
    super(message);
    this.name = new.target.name;
    this.kind = kind;
    this.isOperational = isOperational;

    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, this.constructor);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 'NotFound');
  }
}

export class UnresolvableLocationError extends AppError {
  public readonly postalCode: string;

  constructor(postalCode: string, reason: string) {
    super(`Cannot locate postal code "${postalCode}": ${reason}`, 'UnresolvableLocation');
    this.postalCode = postalCode;
  }
}

export class InvalidYearError extends AppError {
  public readonly year: number;
  public readonly supportedYears: readonly number[];

  constructor(year: number, supportedYears: readonly number[]) {
    super(
      `No archive for ${year}. Supported years: ${supportedYears.join(', ')}`,
      'InvalidYear'
    );
    this.year = year;
    this.supportedYears = supportedYears;
  }
}

export class MalformedInputError extends AppError {
  constructor(message: string) {
    super(message, 'MalformedInput');
  }
}

export class DatasetError extends AppError {
  constructor(message: string) {
    super(message, 'Dataset', false);
  }
}

export function isOperationalError(error: unknown): error is AppError {
  return error instanceof AppError && error.isOperational;
}

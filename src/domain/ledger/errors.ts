export class DomainError extends Error {
  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * User-correctable input problem. Rendered inline on the originating form;
 * nothing is written when one is thrown.
 */
export class ValidationError extends DomainError {}

export class InvalidAmountError extends ValidationError {
  constructor(message = 'Amount must be a positive number.') {
    super(message);
  }
}

export class InvalidTypeError extends ValidationError {
  constructor(message = 'Type must be Income or Expense.') {
    super(message);
  }
}

export class InvalidDateError extends ValidationError {
  constructor(message = 'Date must be a valid calendar date (YYYY-MM-DD).') {
    super(message);
  }
}

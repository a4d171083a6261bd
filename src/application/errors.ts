/**
 * Application-level errors for HTTP layer mapping.
 * These extend Error and are used for consistent error handling.
 */
export class AuthenticationError extends Error {
  constructor(message = 'Invalid username or password. Please try again.') {
    super(message);
    this.name = 'AuthenticationError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * No usable session on a protected route. Handlers redirect to the login page.
 */
export class AuthorizationError extends Error {
  constructor(message = 'Login required') {
    super(message);
    this.name = 'AuthorizationError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class DuplicateResourceError extends Error {
  constructor(message = 'Resource already exists') {
    super(message);
    this.name = 'DuplicateResourceError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class DuplicateUsernameError extends DuplicateResourceError {
  constructor(public readonly username: string) {
    super(`User '${username}' already exists`);
    this.name = 'DuplicateUsernameError';
  }
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

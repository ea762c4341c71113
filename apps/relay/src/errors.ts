import { ValidationError } from '@notirelay/db';

export { ValidationError };

/** Missing or wrong shared token, on any entry point. */
export class AuthError extends Error {
  readonly status = 401 as const;

  constructor(message = 'unauthorized') {
    super(message);
    this.name = 'AuthError';
  }
}

/** Subscription attempted while the subscriber cap is already reached. */
export class CapacityError extends Error {
  readonly status = 503 as const;

  constructor(readonly capacity: number) {
    super('too many connections');
    this.name = 'CapacityError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

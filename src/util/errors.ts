/** Errors the player can see; the message is safe to print as-is. */
export class UserError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UserError';
  }
}

export class InvalidInputError extends UserError {
  readonly raw: string;
  constructor(message: string, raw: string) {
    super(message);
    this.name = 'InvalidInputError';
    this.raw = raw;
  }
}

export class InsufficientChipsError extends UserError {
  readonly requested: number;
  readonly available: number;
  constructor(requested: number, available: number) {
    super(`Your chips cannot cover $${requested} exactly (you hold $${available}).`);
    this.name = 'InsufficientChipsError';
    this.requested = requested;
    this.available = available;
  }
}

export class EmptyShoeError extends Error {
  constructor() {
    super('cannot dispense from an empty shoe');
    this.name = 'EmptyShoeError';
  }
}

// Input stream ended (Ctrl-D, closed pipe)
export class InputClosedError extends Error {
  constructor() {
    super('input closed');
    this.name = 'InputClosedError';
  }
}

export class ConfigError extends Error {
  readonly issues: string[];
  constructor(issues: string[]) {
    super(`invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export function normalizeError(err: unknown) {
  if (err instanceof Error) {
    return {
      name: err.name || 'Error',
      message: err.message || 'unknown',
      stack: err.stack || '',
    };
  }
  return {
    name: typeof err,
    message: String(err),
    stack: '',
  };
}

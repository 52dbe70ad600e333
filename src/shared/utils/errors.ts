/**
 * Error taxonomy surfaced by the analysis boundary.
 * Acquisition failures are never thrown; they degrade to source defaults.
 */

/**
 * Custom validation error class
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class FieldNotFoundError extends ValidationError {
  constructor(public readonly fieldId: string) {
    super(`Field not found: ${fieldId}`);
    this.name = 'FieldNotFoundError';
  }
}

/**
 * The field exists but has no geometry yet
 */
export class IncompleteFieldError extends ValidationError {
  constructor(public readonly fieldId: string, missing: string[]) {
    super(`Field ${fieldId} is missing ${missing.join(', ')}`);
    this.name = 'IncompleteFieldError';
  }
}

export class PersistenceError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PersistenceError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

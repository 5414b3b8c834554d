/**
 * Error categories for scoring and overrides.
 *
 * Guardrail findings are deliberately absent here: they travel as strings on
 * a successful OverrideResult and are never thrown.
 */

/**
 * Malformed override request. Raised before any computation happens and
 * carries every violated rule, not just the first one.
 */
export class ValidationError extends Error {
  public readonly code = 'E_OVERRIDE_INVALID';

  constructor(
    public readonly entityId: string,
    public readonly violations: readonly string[]
  ) {
    super(`Override validation failed for ${entityId}: ${violations.join('; ')}`);
    this.name = 'ValidationError';
  }
}

/** Entity-local scoring failure; the entity is left out of the run. */
export class ComputationError extends Error {
  public readonly code = 'E_COMPUTATION';

  constructor(
    message: string,
    public readonly entityId: string | null = null
  ) {
    super(message);
    this.name = 'ComputationError';
  }
}

/** Storage failure inside the audit log. */
export class PersistenceError extends Error {
  public readonly code = 'E_PERSISTENCE';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PersistenceError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Rollout error utilities.
 *
 * Provides a single error type for every public controller surface and
 * helpers to convert collaborator failures into RolloutError instances
 * that callers can reason about.
 */

import type { ZodError } from 'zod';

/**
 * Error kinds surfaced to controller consumers.
 */
export type RolloutErrorKind =
  | 'InvalidSpec'
  | 'ApplyFailure'
  | 'ProviderUnavailable'
  | 'InvalidTransition'
  | 'NotFound'
  | 'StateCorrupted';

const RETRYABLE_KINDS: ReadonlySet<RolloutErrorKind> = new Set<RolloutErrorKind>([
  'ApplyFailure',
  'ProviderUnavailable',
]);

/**
 * Error raised by the rollout controller and its collaborators.
 */
export class RolloutError extends Error {
  public readonly kind: RolloutErrorKind;
  public readonly details?: Record<string, unknown>;
  public readonly retryable: boolean;
  public readonly timestamp: number;

  constructor(
    kind: RolloutErrorKind,
    message: string,
    details?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message);
    this.name = 'RolloutError';
    this.kind = kind;
    this.details = details;
    this.retryable = RETRYABLE_KINDS.has(kind);
    this.timestamp = Date.now();
    if (cause) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }

  /**
   * Convert to JSON for logging/API responses
   */
  toJSON(): Record<string, unknown> {
    return {
      error: {
        kind: this.kind,
        message: this.message,
        details: this.details,
        retryable: this.retryable,
        timestamp: this.timestamp,
      },
    };
  }
}

export function isRolloutError(error: unknown, kind?: RolloutErrorKind): error is RolloutError {
  return error instanceof RolloutError && (kind === undefined || error.kind === kind);
}

/**
 * Map unknown errors into RolloutError instances.
 *
 * @param error - Error thrown by a collaborator
 * @param fallbackKind - Kind to use when the error is not already a RolloutError
 */
export function toRolloutError(
  error: unknown,
  fallbackKind: RolloutErrorKind,
  details?: Record<string, unknown>
): RolloutError {
  if (error instanceof RolloutError) {
    return error;
  }

  if (error instanceof Error) {
    return new RolloutError(fallbackKind, error.message, details, error);
  }

  return new RolloutError(fallbackKind, String(error), details);
}

/**
 * Convert a Zod validation error into an InvalidSpec error
 *
 * @example
 * ```typescript
 * const result = RolloutSpecInputSchema.safeParse({ strategy: 'linear' });
 * if (!result.success) {
 *   throw zodErrorToRolloutError(result.error);
 * }
 * // Throws: "Invalid rollout spec at 'strategy': ..."
 * ```
 */
export function zodErrorToRolloutError(error: ZodError, kind: RolloutErrorKind = 'InvalidSpec'): RolloutError {
  const firstIssue = error.issues[0];
  const field = firstIssue && firstIssue.path.length > 0 ? firstIssue.path.join('.') : 'root';
  const message = `Invalid rollout spec at '${field}': ${firstIssue?.message ?? 'unknown issue'}`;

  return new RolloutError(kind, message, {
    field,
    issues: error.issues.map((issue) => ({
      path: issue.path,
      message: issue.message,
      code: issue.code,
    })),
  });
}

/**
 * Dock engine errors.
 *
 * Contract violations (a caller bug, not user state) throw a DockError with a
 * code so callers and tests can tell failure modes apart.
 */

export type DockErrorCode =
  | 'invalid_fraction'
  | 'not_a_leaf'
  | 'invalid_node'
  | 'invalid_state'
  | 'invalid_tab_state';

export class DockError extends Error {
  readonly code: DockErrorCode;
  readonly details?: unknown;

  constructor(code: DockErrorCode, message: string, details?: unknown) {
    super(message);
    this.name = 'DockError';
    this.code = code;
    this.details = details;
  }
}

export function isDockError(error: unknown): error is DockError {
  return error instanceof DockError;
}

/**
 * Throw a DockError unless the condition holds.
 */
export function assertDock(
  condition: boolean,
  code: DockErrorCode,
  message: string,
  details?: unknown,
): asserts condition {
  if (!condition) {
    throw new DockError(code, message, details);
  }
}

/** Normalize a caught value to an Error for logging */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

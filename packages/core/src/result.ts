/**
 * Result pattern for explicit error handling.
 * Error types live with the component that produces them (coordinator, registry, access).
 */

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

/** Render an unknown thrown value as a message. */
export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/**
 * Outcome of an operation that reports failure as a value instead of throwing
 */
export type Result<T, E extends Error> =
  | { success: true; data: T }
  | { success: false; error: E };

export const ok = <T>(data: T): { success: true; data: T } => ({
  success: true,
  data,
});

export const fail = <E extends Error>(error: E): { success: false; error: E } => ({
  success: false,
  error,
});

/**
 * Returns the data of a successful result or throws its error
 */
export function unwrap<T, E extends Error>(result: Result<T, E>): T {
  if (!result.success) {
    throw result.error;
  }
  return result.data;
}

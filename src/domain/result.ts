export type Result<T, E = Error> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

/**
 * Run an async operation and capture a rejection as a failed Result
 */
export async function attempt<T>(operation: () => Promise<T>): Promise<Result<T, unknown>> {
  try {
    return ok(await operation());
  } catch (error) {
    return err(error);
  }
}

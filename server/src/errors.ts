export type FastingErrorKind = "precondition" | "validation" | "notFound" | "persistence" | "calendar";

export class FastingError extends Error {
  readonly kind: FastingErrorKind;

  constructor(kind: FastingErrorKind, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "FastingError";
    this.kind = kind;
  }
}

export const preconditionError = (message: string) => new FastingError("precondition", message);
export const validationError = (message: string) => new FastingError("validation", message);
export const notFoundError = (message: string) => new FastingError("notFound", message);
export const persistenceError = (message: string, cause: unknown) => new FastingError("persistence", message, cause);
export const calendarError = (message: string) => new FastingError("calendar", message);

export const isFastingError = (error: unknown): error is FastingError => error instanceof FastingError;

export type Result<T, E = FastingError> = { ok: true; value: T } | { ok: false; error: E };

export const ok = <T>(value: T): Result<T, never> => ({ ok: true, value });
export const fail = <E>(error: E): Result<never, E> => ({ ok: false, error });

export function unwrap<T>(result: Result<T>): T {
  if (!result.ok) throw result.error;
  return result.value;
}

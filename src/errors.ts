export type ErrorKind =
  | 'capability_unavailable'
  | 'validation'
  | 'storage'
  | 'transform'
  | 'not_found';

export interface OperationError {
  kind: ErrorKind;
  message: string;
}

export type Failure = { ok: false; error: OperationError };
export type Result<T> = { ok: true; value: T } | Failure;

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail(kind: ErrorKind, message: string): Failure {
  return { ok: false, error: { kind, message } };
}

// Every pipeline failure is a client-facing 4xx; transport errors are handled in app.ts.
export const STATUS_BY_KIND: Record<ErrorKind, number> = {
  capability_unavailable: 400,
  validation: 400,
  storage: 400,
  transform: 400,
  not_found: 400,
};

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

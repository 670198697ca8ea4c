export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export const ok = <T>(value: T): { ok: true; value: T } => ({ ok: true, value });

export const err = <E>(error: E): { ok: false; error: E } => ({ ok: false, error });

export interface BatchFailure<I, E> {
  item: I;
  error: E;
}

export interface BatchResult<T, I, E> {
  succeeded: T[];
  failed: BatchFailure<I, E>[];
}

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

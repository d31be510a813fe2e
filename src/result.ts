export type Ok<T> = { t: "ok"; v: T };
export type Err<E> = { t: "err"; e: E };
export type Result<T, E> = Ok<T> | Err<E>;

export const ok = <T>(v: T): Ok<T> => ({ t: "ok", v });
export const fail = <E>(e: E): Err<E> => ({ t: "err", e });

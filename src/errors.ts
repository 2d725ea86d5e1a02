export enum NetworkError {
  // base address is not aligned to the block size, or the prefix is out of range
  InvalidNetwork = 'InvalidNetwork',
  // networks of different families were compared
  CidrMismatch = 'CidrMismatch',
  NetworkParseError = 'NetworkParseError',
}

export type Ok<T> = { ok: true; value: T };
export type Err<E> = { ok: false; error: E };
export type Result<T, E = NetworkError> = Ok<T> | Err<E>;

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function err<E>(error: E): Err<E> {
  return { ok: false, error };
}

export class NetworkException extends Error {
  public readonly kind: NetworkError;
  constructor(kind: NetworkError, message?: string) {
    super(message ?? kind);
    this.name = 'NetworkException';
    this.kind = kind;
  }
}

export function unwrap<T>(result: Result<T>): T {
  if (!result.ok) {
    throw new NetworkException(result.error);
  }
  return result.value;
}

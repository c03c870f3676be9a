/**
 * Holds the first error reported during a session. Later reports are dropped,
 * so the error printed at exit is the one that started the trouble.
 */
export class ErrorSlot<E extends Error = Error> {
  private _error: E | undefined;

  /** Store `error` unless one is already held. Returns whether it was stored. */
  record(error: E): boolean {
    if (this._error !== undefined) {
      return false;
    }
    this._error = error;
    return true;
  }

  get value(): E | undefined {
    return this._error;
  }

  get isSet(): boolean {
    return this._error !== undefined;
  }
}

/**
 * One-shot promise whose resolve/reject live outside the executor.
 *
 * Only the first call to resolve() or reject() takes effect; later calls
 * return false so the caller can tell it lost the race.
 */
export class Deferred<T> {
  readonly promise: Promise<T>;
  private readonly _resolve: (value: T) => void;
  private readonly _reject: (reason: Error) => void;
  private _settled = false;

  constructor() {
    let resolveFn: (value: T) => void = () => undefined;
    let rejectFn: (reason: Error) => void = () => undefined;
    // the executor runs synchronously, so both are bound before we return
    this.promise = new Promise<T>((resolve, reject) => {
      resolveFn = resolve;
      rejectFn = reject;
    });
    this._resolve = resolveFn;
    this._reject = rejectFn;
  }

  get settled(): boolean {
    return this._settled;
  }

  resolve(value: T): boolean {
    if (this._settled) return false;
    this._settled = true;
    this._resolve(value);
    return true;
  }

  reject(reason: Error): boolean {
    if (this._settled) return false;
    this._settled = true;
    this._reject(reason);
    return true;
  }
}

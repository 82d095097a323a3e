/**
 * A promise that can be completed from the outside, at most once.
 *
 * Used for one-shot conditions such as "table recovery completed" or "this
 * node was asked to stop". Later calls to `resolveOnce()` are ignored.
 */
export class CompletionSignal<T = void> {
  public readonly promise: Promise<T>;

  public get hasResolved(): boolean {
    return this._hasResolved;
  }

  private _hasResolved = false;
  private resolveHandler: ((value: T) => void) | undefined;

  constructor() {
    this.promise = new Promise<T>((resolve) => {
      this.resolveHandler = resolve;
    });
  }

  public resolveOnce(value: T): void {
    if (this._hasResolved || !this.resolveHandler) {
      return;
    }

    this._hasResolved = true;
    this.resolveHandler(value);
  }
}

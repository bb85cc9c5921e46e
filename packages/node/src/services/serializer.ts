/**
 * Serializer: a single-lane queue for mutating requests.
 *
 * The vault rejects overlapping operations outright. Requests from
 * independent clients are queued here so they take turns instead of
 * colliding with the vault's guard. A failed task does not block the
 * tasks queued behind it.
 */

function noop(): void {}

export class Serializer {
  private tail: Promise<void> = Promise.resolve();
  private _pending = 0;

  /**
   * Run `task` after every previously queued task has settled.
   */
  run<T>(task: () => Promise<T> | T): Promise<T> {
    this._pending++;
    const result = this.tail.then(task).finally(() => {
      this._pending--;
    });
    this.tail = result.then(noop, noop);
    return result;
  }

  /** Tasks queued or running. */
  get pending(): number {
    return this._pending;
  }
}

/**
 * Re-entrancy guard.
 *
 * One flag per vault. A second entry while the flag is held fails at
 * once with REENTRANT_CALL; nothing waits or queues. The flag is
 * released on every exit path.
 */

import { VaultError } from "./errors.js";

export class ReentrancyGuard {
  private _entered = false;

  get entered(): boolean {
    return this._entered;
  }

  async run<T>(fn: () => Promise<T>): Promise<T> {
    if (this._entered) {
      throw new VaultError("REENTRANT_CALL", "Vault operation already in progress");
    }

    this._entered = true;
    try {
      return await fn();
    } finally {
      this._entered = false;
    }
  }
}

/**
 * @stakewell/ledger — Reentrancy guard.
 *
 * One guard per ledger. It is held for the whole of a mutating
 * operation, asset-port calls included, and released on every exit
 * path. A second mutating call that arrives while it is held (an asset
 * implementation or event subscriber calling back into the ledger)
 * fails with REENTRANT_CALL before touching any state.
 */

import { StakeLedgerError } from "./types.js";

export class ReentrancyGuard {
  private _active: string | undefined;

  /** Name of the operation currently holding the guard. */
  get active(): string | undefined {
    return this._active;
  }

  run<T>(operation: string, body: () => T): T {
    if (this._active !== undefined) {
      throw new StakeLedgerError(
        "REENTRANT_CALL",
        `Cannot enter ${operation} while ${this._active} is in progress`,
      );
    }

    this._active = operation;
    try {
      return body();
    } finally {
      this._active = undefined;
    }
  }
}

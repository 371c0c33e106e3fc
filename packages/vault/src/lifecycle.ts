/**
 * Operation lifecycle — the state machine every upload and download
 * walks through.
 *
 *   upload:    created → encrypted → stored
 *   download:  stored → retrieved → decrypted → verified
 *                                             ↘ verification_failed
 *
 * Any non-terminal step may end in `failed`, except `decrypted`, which
 * always ends in one of the two verification outcomes.
 *
 * Rules:
 * - Only transitions in the table are allowed
 * - Every transition is recorded with its time, in order
 */

import { VaultError } from "./errors.js";
import type { VaultState, VaultTransition } from "./types.js";

const VALID_TRANSITIONS: Record<VaultState, readonly VaultState[]> = {
  created: ["encrypted", "failed"],
  encrypted: ["stored", "failed"],
  stored: ["retrieved", "failed"],
  retrieved: ["decrypted", "failed"],
  decrypted: ["verified", "verification_failed"],
  verified: [],
  verification_failed: [],
  failed: [],
};

export function canTransition(from: VaultState, to: VaultState): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

export function isTerminal(state: VaultState): boolean {
  return VALID_TRANSITIONS[state].length === 0;
}

export class OperationLifecycle {
  private _state: VaultState;
  private readonly _trace: VaultTransition[] = [];
  private readonly clock: () => Date;

  constructor(initial: VaultState, clock: () => Date) {
    this._state = initial;
    this.clock = clock;
  }

  get state(): VaultState {
    return this._state;
  }

  get trace(): readonly VaultTransition[] {
    return [...this._trace];
  }

  /**
   * @throws VaultError (INVALID_TRANSITION) for a move outside the table
   */
  transition(target: VaultState): void {
    if (!canTransition(this._state, target)) {
      throw new VaultError(
        "INVALID_TRANSITION",
        `Cannot transition from '${this._state}' to '${target}'`,
      );
    }
    this._trace.push({
      from: this._state,
      to: target,
      at: this.clock().toISOString(),
    });
    this._state = target;
  }

  /**
   * Move to `failed` if the current state allows it.
   *
   * @returns The state the operation failed in
   */
  fail(): VaultState {
    const failedAt = this._state;
    if (canTransition(this._state, "failed")) {
      this.transition("failed");
    }
    return failedAt;
  }
}

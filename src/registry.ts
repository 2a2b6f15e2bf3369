// ---------------------------------------------------------------------------
// Barte SDK – Active-Client Registry
// ---------------------------------------------------------------------------
// One process-wide slot holding the charge operations of the most recently
// constructed client. Only entities decoded without a client consult it;
// resources never do. Last writer wins, no locking.
// ---------------------------------------------------------------------------

import { UninitializedClientError } from "./errors";
import type { ChargeOperations } from "./entities";

let active: ChargeOperations | undefined;

/** Make `operations` the active client, replacing any previous one. */
export function registerActiveClient(operations: ChargeOperations): void {
  active = operations;
}

/**
 * @throws {UninitializedClientError} when no client has been registered.
 */
export function getActiveClient(): ChargeOperations {
  if (active === undefined) {
    throw new UninitializedClientError();
  }
  return active;
}

export function hasActiveClient(): boolean {
  return active !== undefined;
}

/** Empty the slot. Entities decoded without a client stop working until the next registration. */
export function clearActiveClient(): void {
  active = undefined;
}

/**
 * Persistence Types - Common interfaces for snapshot storage
 *
 * A snapshot store holds exactly one document (the full state of a
 * component) and replaces it wholesale on every save.
 */

// ============================================================================
// Store Types
// ============================================================================

/** Turns a parsed JSON value into a typed document, throwing when it does not fit */
export type Decoder<T> = (raw: unknown) => T;

/** Base interface for all snapshot stores */
export interface SnapshotStore<T> {
  /** Read the stored document, or null when nothing has been stored yet */
  load(): T | null;

  /** Replace the stored document */
  save(value: T): void;

  /** Human-readable location (for logging) */
  describe(): string;
}

/**
 * What a ledger component does when a save fails:
 * - "throw": propagate the PersistenceError to the caller
 * - "warn": log it and keep it as the component's last persistence error
 */
export type PersistenceErrorPolicy = "throw" | "warn";

export const PERSISTENCE_ERROR_POLICIES: readonly PersistenceErrorPolicy[] = [
  "throw",
  "warn",
];

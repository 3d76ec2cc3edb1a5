/**
 * Persistence Module Index
 *
 * Snapshot storage for the paper-trading ledger:
 * - JsonFileStore: one JSON document per file, atomic replace on save
 * - MemorySnapshotStore: in-process store with the same round-trip semantics
 *
 * Usage:
 *   import { JsonFileStore } from '../infra/persistence';
 *
 *   const store = new JsonFileStore("data/portfolio.json", decodePortfolioSnapshot);
 *   const snapshot = store.load();
 */

export type {
  Decoder,
  SnapshotStore,
  PersistenceErrorPolicy,
} from "./types";

export { PERSISTENCE_ERROR_POLICIES } from "./types";

export { JsonFileStore } from "./json-file-store";

export { MemorySnapshotStore } from "./memory-store";

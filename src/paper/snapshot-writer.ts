import { PersistenceError, toError } from "../errors/app.errors";
import type { Logger } from "../infra/logging";
import type { PersistenceErrorPolicy, SnapshotStore } from "../infra/persistence";

/**
 * Write-through helper shared by Portfolio and TradeLog.
 *
 * Applies the persistence error policy and remembers the most recent
 * failure so callers can see that memory and storage have diverged.
 */
export class SnapshotWriter<T> {
  private lastError: PersistenceError | null = null;

  constructor(
    private readonly store: SnapshotStore<T>,
    private readonly policy: PersistenceErrorPolicy,
    private readonly logger: Logger,
    private readonly label: string,
  ) {}

  write(value: T): void {
    try {
      this.store.save(value);
      this.lastError = null;
    } catch (err) {
      const error =
        err instanceof PersistenceError
          ? err
          : new PersistenceError("save", this.store.describe(), toError(err));
      this.lastError = error;

      switch (this.policy) {
        case "throw":
          throw error;
        case "warn":
          this.logger.warn(`[${this.label}] ${error.message} (in-memory state kept)`);
          return;
      }
    }
  }

  getLastError(): PersistenceError | null {
    return this.lastError;
  }

  describe(): string {
    return this.store.describe();
  }
}

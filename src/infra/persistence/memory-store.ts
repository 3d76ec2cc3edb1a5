import { PersistenceError, toError } from "../../errors/app.errors";
import type { Decoder, SnapshotStore } from "./types";

/**
 * In-process snapshot store.
 *
 * Documents are kept as serialized JSON and decoded on load, so a round trip
 * behaves exactly like the file store (no shared references, same decoding).
 */
export class MemorySnapshotStore<T> implements SnapshotStore<T> {
  private content: string | null;
  private saves = 0;

  constructor(
    private readonly decode: Decoder<T>,
    private readonly name = "memory",
    initial?: T,
  ) {
    this.content = initial === undefined ? null : JSON.stringify(initial);
  }

  describe(): string {
    return this.name;
  }

  load(): T | null {
    if (this.content === null) return null;

    try {
      return this.decode(JSON.parse(this.content));
    } catch (err) {
      throw new PersistenceError("load", this.name, toError(err));
    }
  }

  save(value: T): void {
    this.content = JSON.stringify(value);
    this.saves++;
  }

  /** Number of completed saves */
  getSaveCount(): number {
    return this.saves;
  }

  /** Replace the stored text verbatim (e.g. to simulate a corrupt snapshot) */
  setRaw(content: string | null): void {
    this.content = content;
  }
}

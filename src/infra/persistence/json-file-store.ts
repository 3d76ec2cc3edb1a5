/**
 * JsonFileStore - one pretty-printed JSON document on disk
 *
 * Saves go through a sibling temp file that is renamed over the target, so a
 * crash mid-write leaves either the previous document or the new one.
 */

import * as fs from "fs";
import * as path from "path";
import { PersistenceError, toError } from "../../errors/app.errors";
import type { Decoder, SnapshotStore } from "./types";

export class JsonFileStore<T> implements SnapshotStore<T> {
  private writeSeq = 0;

  constructor(
    private readonly filePath: string,
    private readonly decode: Decoder<T>,
  ) {}

  describe(): string {
    return this.filePath;
  }

  load(): T | null {
    if (!fs.existsSync(this.filePath)) {
      return null;
    }

    try {
      const content = fs.readFileSync(this.filePath, "utf-8");
      return this.decode(JSON.parse(content));
    } catch (err) {
      throw new PersistenceError("load", this.filePath, toError(err));
    }
  }

  save(value: T): void {
    const tmpPath = `${this.filePath}.${process.pid}.${++this.writeSeq}.tmp`;

    try {
      const dir = path.dirname(this.filePath);
      if (dir && dir !== "." && !fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }

      fs.writeFileSync(tmpPath, JSON.stringify(value, null, 2), "utf-8");
      fs.renameSync(tmpPath, this.filePath);
    } catch (err) {
      this.removeTemp(tmpPath);
      throw new PersistenceError("save", this.filePath, toError(err));
    }
  }

  private removeTemp(tmpPath: string): void {
    if (fs.existsSync(tmpPath)) {
      fs.rmSync(tmpPath, { force: true });
    }
  }
}

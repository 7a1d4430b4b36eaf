import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname } from "node:path";

import { z } from "zod";
import { SlotWatchError, createLogger } from "@slotwatch/core";
import type { Logger, SubscriberStore } from "@slotwatch/core";

/** Ids are stored as numbers; numeric strings from hand-edited files are accepted. */
const IdListSchema = z.array(
  z.union([z.number().int(), z.string().regex(/^-?\d+$/).transform(Number)]),
);

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

function serialize(ids: Iterable<number>): string {
  return JSON.stringify([...ids].sort((a, b) => a - b));
}

/**
 * Subscriber set persisted as a sorted JSON array of chat ids.
 *
 * The file is read once by open(); afterwards the in-memory set is the
 * source of truth and every change rewrites the file. Writes are queued so
 * two concurrent commands never interleave on disk, and a change whose
 * write fails is rolled back.
 *
 * @example
 * ```typescript
 * const store = await FileSubscriberStore.open("data/subscribers.json");
 * await store.add(42);
 * store.all(); // [42]
 * ```
 */
export class FileSubscriberStore implements SubscriberStore {
  private readonly path: string;
  private readonly ids: Set<number>;
  private readonly log: Logger;
  private writes: Promise<void> = Promise.resolve();

  private constructor(path: string, ids: Iterable<number>, logger: Logger) {
    this.path = path;
    this.ids = new Set(ids);
    this.log = logger;
  }

  /**
   * Load the store, creating the file (and its directory) holding `[]`
   * when it does not exist yet.
   */
  static async open(path: string, logger?: Logger): Promise<FileSubscriberStore> {
    const log = logger ?? createLogger("subscribers");
    await mkdir(dirname(path), { recursive: true });

    let raw: string;
    try {
      raw = await readFile(path, "utf8");
    } catch (err) {
      if (!isMissingFile(err)) throw err;
      await writeFile(path, serialize([]), "utf8");
      log.info("created subscriber file", { path });
      return new FileSubscriberStore(path, [], log);
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (err) {
      throw new SlotWatchError(`Subscriber file ${path} is not valid JSON`, { cause: err });
    }
    const parsed = IdListSchema.safeParse(data);
    if (!parsed.success) {
      throw new SlotWatchError(`Subscriber file ${path} must hold an array of integer ids`, {
        cause: parsed.error,
      });
    }

    log.debug("loaded subscribers", { path, count: parsed.data.length });
    return new FileSubscriberStore(path, parsed.data, log);
  }

  all(): readonly number[] {
    return [...this.ids].sort((a, b) => a - b);
  }

  count(): number {
    return this.ids.size;
  }

  has(recipientId: number): boolean {
    return this.ids.has(recipientId);
  }

  async add(recipientId: number): Promise<boolean> {
    if (this.ids.has(recipientId)) return false;

    this.ids.add(recipientId);
    try {
      await this.persist();
    } catch (err) {
      this.ids.delete(recipientId);
      throw err;
    }
    return true;
  }

  async remove(recipientId: number): Promise<boolean> {
    if (!this.ids.has(recipientId)) return false;

    this.ids.delete(recipientId);
    try {
      await this.persist();
    } catch (err) {
      this.ids.add(recipientId);
      throw err;
    }
    return true;
  }

  /** Resolves once every queued write has finished. */
  async flush(): Promise<void> {
    await this.writes;
  }

  private persist(): Promise<void> {
    const content = serialize(this.ids);
    const tmp = `${this.path}.tmp`;
    const write = this.writes.then(async () => {
      await writeFile(tmp, content, "utf8");
      await rename(tmp, this.path);
    });
    // keep the queue alive after a failed write; the caller still sees the rejection
    this.writes = write.catch((err: unknown) => {
      this.log.error("subscriber file write failed", { path: this.path }, err);
    });
    return write;
  }
}

import { mkdtemp, readFile, rm, writeFile, mkdir } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { describe, it, expect, beforeEach, afterEach } from "vitest";

import { SlotWatchError } from "@slotwatch/core";
import { captureLogs } from "@slotwatch/test-utils";

import { FileSubscriberStore } from "../subscribers/file-store.js";
import { MemorySubscriberStore } from "../subscribers/memory-store.js";
import { LogNotifier } from "../log-notifier.js";

describe("FileSubscriberStore", () => {
  let dir: string;
  let path: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "subscribers-test-"));
    path = join(dir, "data", "subscribers.json");
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("creates a missing file and its directory with an empty list", async () => {
    const store = await FileSubscriberStore.open(path, captureLogs().logger);

    expect(store.count()).toBe(0);
    expect(await readFile(path, "utf8")).toBe("[]");
  });

  it("loads existing ids, accepting numeric strings", async () => {
    await mkdir(join(dir, "data"));
    await writeFile(path, '[30, "10", -20]');

    const store = await FileSubscriberStore.open(path, captureLogs().logger);

    expect(store.all()).toEqual([-20, 10, 30]);
    expect(store.has(10)).toBe(true);
  });

  it("rejects a file that is not a list of ids", async () => {
    await mkdir(join(dir, "data"));
    await writeFile(path, '{"ids": [1]}');

    await expect(FileSubscriberStore.open(path, captureLogs().logger)).rejects.toThrow(
      `Subscriber file ${path} must hold an array of integer ids`,
    );
  });

  it("rejects a file that is not JSON", async () => {
    await mkdir(join(dir, "data"));
    await writeFile(path, "1, 2, 3]");

    await expect(FileSubscriberStore.open(path, captureLogs().logger)).rejects.toBeInstanceOf(SlotWatchError);
  });

  it("adds and removes ids, reporting whether anything changed", async () => {
    const store = await FileSubscriberStore.open(path, captureLogs().logger);

    expect(await store.add(5)).toBe(true);
    expect(await store.add(5)).toBe(false);
    expect(await store.add(3)).toBe(true);
    expect(await readFile(path, "utf8")).toBe("[3,5]");

    expect(await store.remove(5)).toBe(true);
    expect(await store.remove(5)).toBe(false);
    expect(await readFile(path, "utf8")).toBe("[3]");
  });

  it("persists across reopen", async () => {
    const first = await FileSubscriberStore.open(path, captureLogs().logger);
    await first.add(42);

    const second = await FileSubscriberStore.open(path, captureLogs().logger);

    expect(second.all()).toEqual([42]);
  });

  it("serializes concurrent writes", async () => {
    const store = await FileSubscriberStore.open(path, captureLogs().logger);

    await Promise.all([store.add(1), store.add(2), store.add(3), store.remove(2)]);
    await store.flush();

    expect(JSON.parse(await readFile(path, "utf8"))).toEqual([1, 3]);
  });

  it("rolls back a change whose write fails", async () => {
    const logs = captureLogs();
    const store = await FileSubscriberStore.open(path, logs.logger);
    await rm(join(dir, "data"), { recursive: true });

    await expect(store.add(9)).rejects.toThrow(/ENOENT/);

    expect(store.has(9)).toBe(false);
    expect(logs.withMessage("subscriber file write failed")).toHaveLength(1);
  });
});

describe("MemorySubscriberStore", () => {
  it("tracks a set of ids", async () => {
    const store = new MemorySubscriberStore([2]);

    expect(await store.add(1)).toBe(true);
    expect(await store.add(2)).toBe(false);
    expect(store.all()).toEqual([1, 2]);
    expect(await store.remove(2)).toBe(true);
    expect(await store.remove(2)).toBe(false);
    expect(store.count()).toBe(1);
    expect(store.has(1)).toBe(true);
  });

  it("hands out copies", async () => {
    const store = new MemorySubscriberStore([1]);
    const snapshot = store.all();

    await store.add(2);

    expect(snapshot).toEqual([1]);
  });
});

describe("LogNotifier", () => {
  it("logs each message with its recipient", async () => {
    const logs = captureLogs("offline");

    await new LogNotifier(logs.logger).send(7, "hello");

    expect(logs.withMessage("notification")).toEqual([
      expect.objectContaining({ level: "info", recipientId: 7, text: "hello" }),
    ]);
  });
});

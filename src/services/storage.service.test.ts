import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { PersistenceError } from "@/shared/utils/errors";
import { createFlakyStorage } from "@/test/fakes";
import { clearRecord, createFileStorage, createMemoryStorage, loadRecord, saveRecord } from "./storage.service";

type Example = { schemaVersion: 1; value: string };

describe("loadRecord", () => {
  it("returns null for a missing key", async () => {
    expect(await loadRecord<Example>(createMemoryStorage(), "missing", 1)).toBeNull();
  });

  it("discards malformed JSON and foreign schema versions", async () => {
    const storage = createMemoryStorage({
      broken: "{not json",
      old: JSON.stringify({ schemaVersion: 0, value: "x" }),
      bare: JSON.stringify(["x"]),
    });
    expect(await loadRecord<Example>(storage, "broken", 1)).toBeNull();
    expect(await loadRecord<Example>(storage, "old", 1)).toBeNull();
    expect(await loadRecord<Example>(storage, "bare", 1)).toBeNull();
  });

  it("round-trips a saved record", async () => {
    const storage = createMemoryStorage();
    await saveRecord<Example>(storage, "k", { schemaVersion: 1, value: "hello" });
    expect(await loadRecord<Example>(storage, "k", 1)).toEqual({ schemaVersion: 1, value: "hello" });
  });

  it("wraps driver failures", async () => {
    const storage = createFlakyStorage();
    storage.failReads = true;
    storage.failWrites = true;

    await expect(loadRecord<Example>(storage, "k", 1)).rejects.toBeInstanceOf(PersistenceError);
    await expect(saveRecord<Example>(storage, "k", { schemaVersion: 1, value: "x" })).rejects.toThrow(
      'Storage write failed for "k": disk full',
    );
    await expect(clearRecord(storage, "k")).rejects.toThrow('Storage remove failed for "k": disk full');
  });
});

describe("createFileStorage", () => {
  let dir = "";

  afterEach(async () => {
    if (dir) await rm(dir, { recursive: true, force: true });
  });

  it("writes one JSON file per key", async () => {
    dir = await mkdtemp(path.join(tmpdir(), "party-storage-"));
    const storage = createFileStorage(path.join(dir, "nested"));

    expect(await storage.getItem("party.sessions.v1")).toBeNull();

    await saveRecord<Example>(storage, "party.sessions.v1", { schemaVersion: 1, value: "v" });
    const raw = await readFile(path.join(dir, "nested", "party.sessions.v1.json"), "utf8");
    expect(JSON.parse(raw)).toEqual({ schemaVersion: 1, value: "v" });

    await clearRecord(storage, "party.sessions.v1");
    expect(await storage.getItem("party.sessions.v1")).toBeNull();
  });
});

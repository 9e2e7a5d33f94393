/**
 * Tests for the key-value stores, typed JSON helpers and backend selection.
 */

import { describe, it, expect, beforeEach, afterEach, afterAll, vi } from "vitest";
import { writeFileSync } from "node:fs";
import path from "node:path";
import { z } from "zod";
import { Db } from "../../src/store/db.js";
import {
  KVDecodeError,
  KVEncodeError,
  KVNotFoundError,
  type KVStore,
  MemoryKVStore,
  SqliteKVStore,
  getJSON,
  openKVStore,
  setJSON,
} from "../../src/store/kv.js";
import { createTempDir, getTempDbPath, cleanupTempDir } from "../helpers.js";

type StoreFactory = () => { store: KVStore; cleanup: () => void };

const backends: [string, StoreFactory][] = [
  [
    "memory",
    () => {
      const store = new MemoryKVStore();
      return { store, cleanup: () => store.close() };
    },
  ],
  [
    "sqlite",
    () => {
      const db = new Db(":memory:");
      db.connect();
      const store = new SqliteKVStore(db);
      return { store, cleanup: () => db.close() };
    },
  ],
];

describe.each(backends)("%s store", (_name, factory) => {
  let store: KVStore;
  let cleanup: () => void;

  beforeEach(() => {
    ({ store, cleanup } = factory());
  });

  afterEach(() => {
    vi.restoreAllMocks();
    cleanup();
  });

  it("returns exactly the bytes that were set", () => {
    const bytes = Buffer.from([0, 255, 10, 13, 128, 0]);
    store.set("bin", bytes);
    expect(store.get("bin")).toEqual(bytes);
  });

  it("stores strings as UTF-8", () => {
    store.set("greeting", "héllo");
    expect(store.get("greeting").toString("utf-8")).toBe("héllo");
  });

  it("returns the latest value after an overwrite", () => {
    store.set("k", "v1");
    store.set("k", "v2");
    expect(store.get("k").toString()).toBe("v2");
  });

  it("raises KVNotFoundError for a key never written", () => {
    expect(() => store.get("missing")).toThrow(KVNotFoundError);
    expect(() => store.get("missing")).toThrow('kv: key not found: "missing"');
  });

  it("raises KVNotFoundError after a delete", () => {
    store.set("a", "1");
    store.delete("a");
    expect(() => store.get("a")).toThrow(KVNotFoundError);
  });

  it("tells an empty stored value apart from a missing key", () => {
    store.set("empty", new Uint8Array(0));
    expect(store.get("empty").length).toBe(0);
  });

  it("ignores deletes of absent keys", () => {
    expect(() => store.delete("never-set")).not.toThrow();
  });

  it("keeps stored bytes independent of the caller's buffer", () => {
    const input = Buffer.from("abc");
    store.set("copy", input);
    input[0] = 0x7a;
    const out = store.get("copy");
    out[1] = 0x7a;
    expect(store.get("copy").toString()).toBe("abc");
  });

  it("never moves updatedAt backwards", () => {
    const now = vi.spyOn(Date, "now").mockReturnValue(5_000);
    store.set("clock", "1");
    expect(store.entry("clock").updatedAt).toBe(5_000);

    now.mockReturnValue(4_000);
    store.set("clock", "2");
    expect(store.entry("clock")).toEqual({
      key: "clock",
      value: Buffer.from("2"),
      updatedAt: 5_000,
    });

    now.mockReturnValue(6_000);
    store.set("clock", "3");
    expect(store.entry("clock").updatedAt).toBe(6_000);
  });

  describe("typed JSON helpers", () => {
    const StateSchema = z.object({ counter: z.number() });

    it("round-trips a structured value", () => {
      setJSON(store, "state", { counter: 5 });
      expect(getJSON(store, "state", StateSchema)).toEqual({ counter: 5 });
    });

    it("reports a missing key as not found, not as a decode failure", () => {
      expect(() => getJSON(store, "state", StateSchema)).toThrow(KVNotFoundError);
    });

    it("raises KVDecodeError for malformed JSON", () => {
      store.set("state", "{not json");
      expect(() => getJSON(store, "state", StateSchema)).toThrow(KVDecodeError);
    });

    it("raises KVDecodeError when the data does not match the schema", () => {
      store.set("state", '{"counter":"five"}');
      try {
        getJSON(store, "state", StateSchema);
        expect.unreachable("expected getJSON to throw");
      } catch (error) {
        expect(error).toBeInstanceOf(KVDecodeError);
        expect((error as KVDecodeError).key).toBe("state");
        expect((error as KVDecodeError).cause).toBeInstanceOf(z.ZodError);
      }
    });

    it("raises KVEncodeError for values JSON cannot represent", () => {
      expect(() => setJSON(store, "bad", undefined)).toThrow(KVEncodeError);
      expect(() => setJSON(store, "bad", { n: 1n })).toThrow(KVEncodeError);
      expect(() => store.get("bad")).toThrow(KVNotFoundError);
    });
  });
});

describe("MemoryKVStore", () => {
  it("drops every entry on close", () => {
    const store = new MemoryKVStore();
    store.set("a", "1");
    store.close();
    expect(() => store.get("a")).toThrow(KVNotFoundError);
  });
});

describe("SqliteKVStore", () => {
  afterAll(() => cleanupTempDir());

  it("persists values across reopen", () => {
    const dbPath = getTempDbPath();
    const first = SqliteKVStore.open(dbPath);
    first.set("session:last", "abc123");
    first.close();

    const second = SqliteKVStore.open(dbPath);
    try {
      expect(second.get("session:last").toString()).toBe("abc123");
    } finally {
      second.close();
    }
  });

  it("leaves a borrowed connection open on close", () => {
    const db = new Db(":memory:");
    db.connect();
    const store = new SqliteKVStore(db);
    store.close();
    expect(db.isOpen).toBe(true);
    expect(
      db.fetchOne("SELECT name FROM sqlite_master WHERE type = 'table' AND name = 'kv_store'")
        ?.name,
    ).toBe("kv_store");
    db.close();
  });

  it("reads values stored as text", () => {
    const db = new Db(":memory:");
    db.connect();
    const store = new SqliteKVStore(db);
    db.run("INSERT INTO kv_store (key, value, updated_at) VALUES (?, ?, ?)", [
      "legacy",
      "plain text",
      1,
    ]);
    expect(store.get("legacy")).toEqual(Buffer.from("plain text"));
    db.close();
  });
});

describe("openKVStore", () => {
  beforeEach(() => {
    vi.spyOn(process.stderr, "write").mockImplementation(() => true);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    cleanupTempDir();
  });

  function unusablePath(): string {
    // A regular file where a directory is expected makes mkdir fail.
    const blocker = path.join(createTempDir(), "blocker");
    writeFileSync(blocker, "");
    return path.join(blocker, "nested", "kv.db");
  }

  it("returns a memory store without touching disk", () => {
    const store = openKVStore({ backend: "memory", path: unusablePath() });
    expect(store).toBeInstanceOf(MemoryKVStore);
    expect(process.stderr.write).not.toHaveBeenCalled();
  });

  it("returns a durable store when the database opens", () => {
    const store = openKVStore({ backend: "auto", path: getTempDbPath() });
    try {
      expect(store).toBeInstanceOf(SqliteKVStore);
    } finally {
      store.close();
    }
  });

  it("falls back to memory and warns when the database cannot open", () => {
    const store = openKVStore({ path: unusablePath() });

    expect(store).toBeInstanceOf(MemoryKVStore);
    expect(process.stderr.write).toHaveBeenCalledTimes(1);
    expect(process.stderr.write).toHaveBeenCalledWith(
      expect.stringContaining("[gantry] warning: durable kv store unavailable"),
    );
    store.set("fallback:key", "ok");
    expect(store.get("fallback:key").toString()).toBe("ok");
  });

  it("propagates the failure when sqlite is required", () => {
    expect(() => openKVStore({ backend: "sqlite", path: unusablePath() })).toThrow();
    expect(process.stderr.write).not.toHaveBeenCalled();
  });
});

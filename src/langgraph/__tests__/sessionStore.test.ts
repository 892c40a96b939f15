import { mkdtemp, readFile, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import {
  createSessionStore,
  InMemorySessionStore,
  JsonFileSessionStore,
} from "../session/store.js";
import type { PersistedSession } from "../state.js";

const session: PersistedSession = {
  status: "progress",
  data: { property_id: "01234567890123", fiscal_year: 2025 },
  internal: { guides_consulted: true, failed_year_attempts: { "12345678": 1 } },
};

describe("InMemorySessionStore", () => {
  it("returns null for unknown sessions", async () => {
    await expect(new InMemorySessionStore().load("missing")).resolves.toBeNull();
  });

  it("returns copies of what was saved", async () => {
    const store = new InMemorySessionStore();
    const saved: PersistedSession = { ...session, data: { ...session.data } };
    await store.save("s1", saved);
    saved.data.fiscal_year = 2020;
    await expect(store.load("s1")).resolves.toEqual(session);
  });

  it("deletes sessions", async () => {
    const store = new InMemorySessionStore();
    await store.save("s1", session);
    await store.delete("s1");
    await expect(store.load("s1")).resolves.toBeNull();
  });
});

describe("JsonFileSessionStore", () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(path.join(os.tmpdir(), "iptu-sessions-"));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it("writes one JSON file per session", async () => {
    const store = new JsonFileSessionStore(path.join(directory, "nested"));
    await store.save("session_1", session);
    const raw = await readFile(path.join(directory, "nested", "session_1.json"), "utf-8");
    expect(JSON.parse(raw)).toEqual(session);
    await expect(store.load("session_1")).resolves.toEqual(session);
  });

  it("returns null for sessions without a file and ignores deleting them", async () => {
    const store = new JsonFileSessionStore(directory);
    await expect(store.load("unknown")).resolves.toBeNull();
    await expect(store.delete("unknown")).resolves.toBeUndefined();
  });

  it("refuses ids that could escape the directory", async () => {
    const store = new JsonFileSessionStore(directory);
    await expect(store.load("../etc/passwd")).rejects.toThrow("Invalid session id: ../etc/passwd");
  });
});

describe("createSessionStore", () => {
  it("picks the store from configuration", () => {
    expect(createSessionStore({ sessionStore: { kind: "memory", directory: "/unused" } })).toBeInstanceOf(
      InMemorySessionStore
    );
    expect(createSessionStore({ sessionStore: { kind: "file", directory: "/tmp/iptu" } })).toBeInstanceOf(
      JsonFileSessionStore
    );
  });
});

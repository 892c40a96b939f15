import { mkdir, readFile, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import type { AppConfig } from "../../config/appConfig.js";
import { PersistedSessionSchema, type PersistedSession } from "../state.js";

/** Keeps the durable part of each session between turns. */
export interface SessionStore {
  load(sessionId: string): Promise<PersistedSession | null>;
  save(sessionId: string, session: PersistedSession): Promise<void>;
  delete(sessionId: string): Promise<void>;
}

export class InMemorySessionStore implements SessionStore {
  private readonly sessions = new Map<string, string>();

  async load(sessionId: string): Promise<PersistedSession | null> {
    const raw = this.sessions.get(sessionId);
    return raw === undefined ? null : PersistedSessionSchema.parse(JSON.parse(raw));
  }

  // Stored as JSON text so callers never share references with the store.
  async save(sessionId: string, session: PersistedSession): Promise<void> {
    this.sessions.set(sessionId, JSON.stringify(session));
  }

  async delete(sessionId: string): Promise<void> {
    this.sessions.delete(sessionId);
  }
}

const SESSION_ID_PATTERN = /^[A-Za-z0-9_-]{1,128}$/;

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/** One `<sessionId>.json` file per session under a directory. */
export class JsonFileSessionStore implements SessionStore {
  constructor(private readonly directory: string) {}

  private fileFor(sessionId: string): string {
    if (!SESSION_ID_PATTERN.test(sessionId)) throw new Error(`Invalid session id: ${sessionId}`);
    return path.join(this.directory, `${sessionId}.json`);
  }

  async load(sessionId: string): Promise<PersistedSession | null> {
    try {
      const raw = await readFile(this.fileFor(sessionId), "utf-8");
      return PersistedSessionSchema.parse(JSON.parse(raw));
    } catch (error) {
      if (isMissingFile(error)) return null;
      throw error;
    }
  }

  async save(sessionId: string, session: PersistedSession): Promise<void> {
    await mkdir(this.directory, { recursive: true });
    await writeFile(this.fileFor(sessionId), JSON.stringify(session, null, 2), "utf-8");
  }

  async delete(sessionId: string): Promise<void> {
    await rm(this.fileFor(sessionId), { force: true });
  }
}

export function createSessionStore(config: Pick<AppConfig, "sessionStore">): SessionStore {
  return config.sessionStore.kind === "file"
    ? new JsonFileSessionStore(config.sessionStore.directory)
    : new InMemorySessionStore();
}

import type { Session, SessionsState } from "@/types/app.types";
import { clearRecord, loadRecord, saveRecord, type StorageDriver } from "@/services/storage.service";

const STORAGE_KEY = "party.sessions.v1";

export type SessionRepository = {
  /** Newest first (by start time). */
  getAll: () => Promise<Session[]>;
  get: (id: string) => Promise<Session | null>;
  save: (session: Session) => Promise<void>;
  remove: (id: string) => Promise<void>;
  clear: () => Promise<void>;
  findMostRecentActive: () => Promise<Session | null>;
  findRecent: (limit: number) => Promise<Session[]>;
  findByCategory: (categoryId: string, limit: number) => Promise<Session[]>;
};

function byStartDesc(a: Session, b: Session): number {
  return Date.parse(b.startedAt) - Date.parse(a.startedAt);
}

export function createSessionRepository(storage: StorageDriver): SessionRepository {
  async function readAll(): Promise<Session[]> {
    const state = await loadRecord<SessionsState>(storage, STORAGE_KEY, 1);
    return state ? [...state.sessions].sort(byStartDesc) : [];
  }

  async function writeAll(sessions: Session[]): Promise<void> {
    await saveRecord<SessionsState>(storage, STORAGE_KEY, { schemaVersion: 1, sessions });
  }

  return {
    getAll: readAll,

    async get(id) {
      const sessions = await readAll();
      return sessions.find((s) => s.id === id) ?? null;
    },

    async save(session) {
      const sessions = await readAll();
      const next = sessions.filter((s) => s.id !== session.id);
      next.push(session);
      await writeAll(next.sort(byStartDesc));
    },

    async remove(id) {
      const sessions = await readAll();
      await writeAll(sessions.filter((s) => s.id !== id));
    },

    async clear() {
      await clearRecord(storage, STORAGE_KEY);
    },

    async findMostRecentActive() {
      const sessions = await readAll();
      return sessions.find((s) => s.status.kind === "active") ?? null;
    },

    async findRecent(limit) {
      const sessions = await readAll();
      return sessions.slice(0, limit);
    },

    async findByCategory(categoryId, limit) {
      const sessions = await readAll();
      return sessions.filter((s) => s.categoryId === categoryId).slice(0, limit);
    },
  };
}

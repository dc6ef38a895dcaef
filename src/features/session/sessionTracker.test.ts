import { describe, expect, it } from "vitest";
import type { Category } from "@/types/app.types";
import { createCatalogService, type CardDataset } from "@/services/catalog.service";
import { createSessionRepository } from "@/services/sessions.service";
import { EmptyCategoryError } from "@/shared/utils/errors";
import { createFlakyStorage, type FlakyStorage } from "@/test/fakes";
import { createSessionTracker } from "./sessionTracker";

const START = new Date("2025-03-01T20:00:00.000Z");

const DATASET: CardDataset = {
  version: 1,
  cards: [
    { game: "Solo", number: 2, prompt: "Second solo prompt" },
    { game: "Solo", number: 1, prompt: "First solo prompt" },
    { game: "Solo", number: 3, prompt: "Third solo prompt" },
    { game: "Duo", number: 1, prompt: "First duo prompt" },
    { game: "Duo", number: 2, prompt: "Second duo prompt" },
  ],
};

function found<T>(value: T | null): T {
  if (value === null) throw new Error("expected a value");
  return value;
}

async function setup(storage: FlakyStorage = createFlakyStorage()) {
  let clock = START;
  let ids = 0;
  const now = () => clock;
  const sessions = createSessionRepository(storage);
  const catalog = createCatalogService({ storage, sessions, now });
  await catalog.importCatalog(DATASET);

  const makeTracker = () =>
    createSessionTracker({
      catalog,
      sessions,
      now,
      random: () => 0,
      createId: () => `session-${++ids}`,
    });

  return {
    storage,
    sessions,
    catalog,
    tracker: makeTracker(),
    makeTracker,
    solo: found(catalog.getCategoryByName("Solo")),
    duo: found(catalog.getCategoryByName("Duo")),
    tick: (seconds: number) => {
      clock = new Date(clock.getTime() + seconds * 1000);
    },
    nowIso: () => clock.toISOString(),
  };
}

describe("SessionTracker", () => {
  describe("navigation", () => {
    it("advances to the last card, stays there, and keeps a partial session active", async () => {
      const { tracker, solo } = await setup();
      const t = tracker.getState();

      await t.startSession(solo);
      expect(tracker.getState().currentSession?.currentIndex).toBe(0);
      expect(t.getCurrentCard()?.prompt).toBe("First solo prompt");

      await t.advance();
      await t.advance();
      expect(tracker.getState().currentSession?.currentIndex).toBe(2);

      expect(await t.advance()).toBe(false);
      expect(tracker.getState().currentSession?.currentIndex).toBe(2);

      expect(await t.markCurrentComplete()).toBe(false);
      expect(tracker.getState().currentSession?.completedCardIds).toHaveLength(1);
      expect(tracker.getState().currentSession?.status).toEqual({ kind: "active" });
    });

    it("clamps retreat at the first card and jumps within bounds", async () => {
      const { tracker, solo } = await setup();
      const t = tracker.getState();
      await t.startSession(solo);

      await t.retreat();
      expect(tracker.getState().currentSession?.currentIndex).toBe(0);
      expect(t.canGoPrevious()).toBe(false);

      await t.jumpTo(10);
      expect(tracker.getState().currentSession?.currentIndex).toBe(2);
      expect(t.canGoNext()).toBe(false);

      await t.jumpTo(-4);
      expect(tracker.getState().currentSession?.currentIndex).toBe(0);
    });

    it("keeps the position inside the deck when given a non-numeric index", async () => {
      const { tracker, sessions, solo } = await setup();
      const t = tracker.getState();
      const session = await t.startSession(solo, Number.NaN);
      expect(session.playerCount).toBe(1);

      await t.advance();
      await t.jumpTo(Number.NaN);
      expect(tracker.getState().currentSession?.currentIndex).toBe(0);

      expect(await t.advance()).toBe(false);
      expect(tracker.getState().currentSession?.currentIndex).toBe(1);
      expect(t.getCurrentCard()?.prompt).toBe("Second solo prompt");
      expect(await t.markCurrentComplete()).toBe(false);
      expect(tracker.getState().currentSession?.completedCardIds).toHaveLength(1);
      expect((await sessions.get(session.id))?.currentIndex).toBe(1);
    });

    it("is a no-op without a current session", async () => {
      const { tracker } = await setup();
      const t = tracker.getState();

      expect(await t.advance()).toBe(false);
      expect(await t.markCurrentComplete()).toBe(false);
      await t.retreat();
      await t.shuffle();
      await t.pause();

      expect(tracker.getState().currentSession).toBeNull();
      expect(t.getProgress()).toBe(0);
      expect(t.getStats()).toBeNull();
      expect(t.getFormattedDuration()).toBe("0:00");
    });
  });

  describe("completion", () => {
    it("ends the session once every card is complete", async () => {
      const { tracker, sessions, solo, tick, nowIso } = await setup();
      const t = tracker.getState();
      const session = await t.startSession(solo);
      tick(75);

      const results: boolean[] = [];
      for (const index of [0, 1, 2]) {
        await t.jumpTo(index);
        results.push(await t.markCurrentComplete());
      }

      expect(results).toEqual([false, false, true]);
      const current = tracker.getState().currentSession;
      expect(current?.status).toEqual({ kind: "completed", at: nowIso() });
      expect(current?.durationSeconds).toBe(75);
      expect(t.isSessionCompleted()).toBe(true);
      expect((await sessions.get(session.id))?.status.kind).toBe("completed");
    });

    it("ends the session from advance when the deck was covered while paused", async () => {
      const { tracker, sessions, solo, tick, nowIso } = await setup();
      const t = tracker.getState();
      const session = await t.startSession(solo);
      tick(30);
      await t.pause();

      for (const index of [0, 1, 2]) {
        await t.jumpTo(index);
        expect(await t.markCurrentComplete()).toBe(false);
      }
      expect(tracker.getState().currentSession?.status.kind).toBe("paused");

      await t.resume();
      tick(10);

      expect(await t.advance()).toBe(true);
      expect(tracker.getState().currentSession?.status).toEqual({ kind: "completed", at: nowIso() });
      expect(tracker.getState().currentSession?.currentIndex).toBe(2);
      expect((await sessions.get(session.id))?.status.kind).toBe("completed");
      expect(await t.advance()).toBe(false);
    });

    it("counts a card once however often it is marked", async () => {
      const { tracker, catalog, solo } = await setup();
      const t = tracker.getState();
      await t.startSession(solo);

      await t.markCurrentComplete();
      await t.markCurrentComplete();

      expect(tracker.getState().currentSession?.completedCardIds).toHaveLength(1);
      const first = catalog.getCards(solo.id)[0];
      expect(first.usageCount).toBe(1);
      expect(first.isCompleted).toBe(true);
      expect(first.lastUsedAt).toBe(START.toISOString());
      expect(t.isCurrentCardCompleted()).toBe(true);
    });

    it("reports progress through the derived accessors", async () => {
      const { tracker, solo } = await setup();
      const t = tracker.getState();
      await t.startSession(solo, 4);
      await t.markCurrentComplete();

      expect(t.getProgress()).toBeCloseTo(1 / 3);
      expect(t.getRemainingCount()).toBe(2);
      expect(t.getCompletedCards().map((c) => c.number)).toEqual([1]);
      expect(t.getRemainingCards().map((c) => c.number)).toEqual([2, 3]);
      expect(t.getStats()).toMatchObject({
        totalCards: 3,
        completedCards: 1,
        playerCount: 4,
        progressPercentage: "33%",
        statusDescription: "In Progress",
      });
    });
  });

  describe("shuffle", () => {
    it("keeps the completed set and restarts from the first logical card", async () => {
      const { tracker, solo } = await setup();
      const t = tracker.getState();
      await t.startSession(solo);
      await t.markCurrentComplete();
      await t.advance();
      const before = tracker.getState().currentSession?.completedCardIds;

      await t.shuffle();

      const current = tracker.getState().currentSession;
      expect(current?.completedCardIds).toEqual(before);
      expect(current?.currentIndex).toBe(0);
      expect(current?.shuffledOrder).toEqual([1, 2, 0]);
      expect(t.getCurrentCard()?.number).toBe(2);
    });

    it("looks ahead through the shuffled order", async () => {
      const { tracker, solo } = await setup();
      const t = tracker.getState();
      await t.startSession(solo, 2, { shuffle: true });

      expect(t.getLookahead().map((c) => c.number)).toEqual([2, 3, 1]);

      await t.resetShuffle();
      expect(tracker.getState().currentSession?.shuffledOrder).toBeNull();
      expect(t.getLookahead().map((c) => c.number)).toEqual([1, 2, 3]);
    });
  });

  describe("lifecycle", () => {
    it("rejects an empty category without touching the current session", async () => {
      const { tracker, solo } = await setup();
      const t = tracker.getState();
      const session = await t.startSession(solo);

      const empty: Category = { ...solo, id: "no-such-category", name: "Empty", cardIds: [] };
      await expect(t.startSession(empty)).rejects.toBeInstanceOf(EmptyCategoryError);

      expect(tracker.getState().currentSession?.id).toBe(session.id);
      expect(tracker.getState().currentSession?.status).toEqual({ kind: "active" });
    });

    it("closes the open session as abandoned when another starts", async () => {
      const { tracker, sessions, solo, duo, tick, nowIso } = await setup();
      const t = tracker.getState();
      const first = await t.startSession(solo);
      await t.markCurrentComplete();
      tick(20);

      const second = await t.startSession(duo);

      expect((await sessions.get(first.id))?.status).toEqual({ kind: "abandoned", at: nowIso() });
      expect(tracker.getState().currentSession?.id).toBe(second.id);
      expect(tracker.getState().cards.map((c) => c.prompt)).toEqual(["First duo prompt", "Second duo prompt"]);
      expect(tracker.getState().isLoading).toBe(false);
    });

    it("resets card flags when a session starts", async () => {
      const { tracker, catalog, solo } = await setup();
      const t = tracker.getState();
      await t.startSession(solo);
      await t.markCurrentComplete();

      await t.startSession(solo);

      expect(catalog.getCards(solo.id).map((c) => c.isCompleted)).toEqual([false, false, false]);
      expect(catalog.getCards(solo.id)[0].usageCount).toBe(1);
    });

    it("names sessions after the category unless a name is given", async () => {
      const { tracker, solo } = await setup();
      const t = tracker.getState();

      expect((await t.startSession(solo)).name.startsWith("Solo - ")).toBe(true);
      expect((await t.startSession(solo, 3, { name: "Friday night" })).name).toBe("Friday night");
    });

    it("freezes the duration while paused", async () => {
      const { tracker, solo, tick, nowIso } = await setup();
      const t = tracker.getState();
      await t.startSession(solo);
      tick(30);

      await t.pause();
      expect(tracker.getState().currentSession?.status).toEqual({ kind: "paused", at: nowIso() });
      tick(100);
      expect(t.getFormattedDuration()).toBe("0:30");
      expect(t.getStats()?.statusDescription).toBe("Paused");

      await t.resume();
      expect(tracker.getState().currentSession?.status).toEqual({ kind: "active" });
    });

    it("ends a partial session as abandoned", async () => {
      const { tracker, solo, nowIso } = await setup();
      const t = tracker.getState();
      await t.startSession(solo);

      await t.endSession();

      expect(tracker.getState().currentSession?.status).toEqual({ kind: "abandoned", at: nowIso() });
    });

    it("restarts a completed session from scratch", async () => {
      const { tracker, catalog, solo } = await setup();
      const t = tracker.getState();
      await t.startSession(solo);
      for (const index of [0, 1, 2]) {
        await t.jumpTo(index);
        await t.markCurrentComplete();
      }

      await t.restartSession();

      const current = tracker.getState().currentSession;
      expect(current?.status).toEqual({ kind: "active" });
      expect(current?.completedCardIds).toEqual([]);
      expect(current?.currentIndex).toBe(0);
      expect(catalog.getCards(solo.id).some((c) => c.isCompleted)).toBe(false);
    });
  });

  describe("persistence", () => {
    it("keeps the in-memory change and reports a failed save", async () => {
      const { tracker, storage, solo } = await setup();
      const t = tracker.getState();
      await t.startSession(solo);

      storage.failWrites = true;
      await t.advance();

      expect(tracker.getState().currentSession?.currentIndex).toBe(1);
      expect(tracker.getState().errorMessage).toBe(
        'Failed to move to next card: Storage write failed for "party.sessions.v1": disk full',
      );

      t.clearError();
      expect(tracker.getState().errorMessage).toBeNull();
    });

    it("restores the most recent active session into a new tracker", async () => {
      const { tracker, makeTracker, solo } = await setup();
      const session = await tracker.getState().startSession(solo);
      await tracker.getState().advance();

      const next = makeTracker();
      const restored = await next.getState().restoreMostRecentActive();

      expect(restored?.id).toBe(session.id);
      expect(restored?.currentIndex).toBe(1);
      expect(next.getState().cards).toHaveLength(3);
      expect(next.getState().getCurrentCard()?.number).toBe(2);
    });

    it("does not restore a paused session", async () => {
      const { tracker, makeTracker, solo } = await setup();
      await tracker.getState().startSession(solo);
      await tracker.getState().pause();

      expect(await makeTracker().getState().restoreMostRecentActive()).toBeNull();
    });

    it("clamps a stored position beyond the deck", async () => {
      const { tracker, sessions, makeTracker, solo } = await setup();
      const session = await tracker.getState().startSession(solo);
      await sessions.save({ ...session, currentIndex: 10 });

      expect((await makeTracker().getState().restoreMostRecentActive())?.currentIndex).toBe(2);
    });

    it("returns null when the store cannot be read", async () => {
      const { storage, makeTracker } = await setup();
      storage.failReads = true;

      expect(await makeTracker().getState().restoreMostRecentActive()).toBeNull();
    });
  });

  describe("history", () => {
    it("lists sessions newest first and per category", async () => {
      const { tracker, solo, duo, tick } = await setup();
      const t = tracker.getState();
      const a = await t.startSession(solo);
      tick(60);
      const b = await t.startSession(duo);
      tick(60);
      const c = await t.startSession(solo);

      expect((await t.getRecentSessions()).map((s) => s.id)).toEqual([c.id, b.id, a.id]);
      expect((await t.getSessionsForCategory(solo.id)).map((s) => s.id)).toEqual([c.id, a.id]);
      expect((await t.getRecentSessions(1)).map((s) => s.id)).toEqual([c.id]);
    });

    it("clears the current session when it is deleted", async () => {
      const { tracker, sessions, solo } = await setup();
      const t = tracker.getState();
      const session = await t.startSession(solo);

      await t.deleteSession(session.id);

      expect(tracker.getState().currentSession).toBeNull();
      expect(await sessions.get(session.id)).toBeNull();
    });

    it("toggles the favorite flag of the current card", async () => {
      const { tracker, solo } = await setup();
      const t = tracker.getState();
      await t.startSession(solo);

      await t.toggleCurrentFavorite();
      expect(t.getCurrentCard()?.isFavorite).toBe(true);
      await t.toggleCurrentFavorite();
      expect(t.getCurrentCard()?.isFavorite).toBe(false);
    });
  });
});

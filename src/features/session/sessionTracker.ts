import { v4 as uuidv4 } from "uuid";
import { createStore, type StoreApi } from "zustand/vanilla";
import type {
  Card,
  Category,
  DifficultyLevel,
  Session,
  SessionStatistics,
} from "@/types/app.types";
import type { CatalogService } from "@/services/catalog.service";
import type { SessionRepository } from "@/services/sessions.service";
import i18n from "@/i18n/config";
import { EmptyCategoryError, getErrorMessage } from "@/shared/utils/errors";
import { logger } from "@/shared/utils/logger";
import {
  buildSessionStatistics,
  cardAt,
  clampIndex,
  createSession,
  elapsedSeconds,
  formatDuration,
  generateSessionName,
  isSessionCovered,
  lookaheadCards,
  reactivateSession,
  remainingCardCount,
  sessionProgress,
  shufflePermutation,
  stopSession,
  type RandomSource,
} from "./session.model";

type SessionAction =
  | "start"
  | "end"
  | "pause"
  | "resume"
  | "restart"
  | "advance"
  | "retreat"
  | "jump"
  | "markComplete"
  | "shuffle"
  | "resetShuffle"
  | "favorite"
  | "delete";

export type StartSessionOptions = {
  shuffle?: boolean;
  name?: string;
  preferredDifficulty?: DifficultyLevel;
};

export type SessionTrackerState = {
  currentSession: Session | null;
  category: Category | null;
  cards: Card[];                  // current category, canonical order
  isLoading: boolean;
  errorMessage: string | null;

  // Lifecycle
  startSession: (category: Category, playerCount?: number, options?: StartSessionOptions) => Promise<Session>;
  endSession: () => Promise<void>;
  pause: () => Promise<void>;
  resume: () => Promise<void>;
  restartSession: () => Promise<void>;
  restoreMostRecentActive: () => Promise<Session | null>;

  // Navigation; `advance` and `markCurrentComplete` resolve true when the call completed the session
  advance: () => Promise<boolean>;
  retreat: () => Promise<void>;
  jumpTo: (index: number) => Promise<void>;
  markCurrentComplete: () => Promise<boolean>;
  shuffle: () => Promise<void>;
  resetShuffle: () => Promise<void>;
  toggleCurrentFavorite: () => Promise<void>;

  // History
  getRecentSessions: (limit?: number) => Promise<Session[]>;
  getSessionsForCategory: (categoryId: string, limit?: number) => Promise<Session[]>;
  deleteSession: (id: string) => Promise<void>;
  clearError: () => void;

  // Derived
  getCurrentCard: () => Card | null;
  getProgress: () => number;
  getRemainingCount: () => number;
  getFormattedDuration: () => string;
  getLookahead: () => Card[];
  getCompletedCards: () => Card[];
  getRemainingCards: () => Card[];
  canGoNext: () => boolean;
  canGoPrevious: () => boolean;
  isCurrentCardCompleted: () => boolean;
  isSessionCompleted: () => boolean;
  getStats: () => SessionStatistics | null;
};

export type SessionTracker = StoreApi<SessionTrackerState>;

export type SessionTrackerDeps = {
  catalog: CatalogService;
  sessions: SessionRepository;
  now?: () => Date;
  random?: RandomSource;
  createId?: () => string;
};

export function createSessionTracker({
  catalog,
  sessions,
  now = () => new Date(),
  random = Math.random,
  createId = () => uuidv4(),
}: SessionTrackerDeps): SessionTracker {
  return createStore<SessionTrackerState>((set, get) => {
    function failureMessage(action: SessionAction, err: unknown): string {
      return i18n.t("session:errors.actionFailed", {
        action: i18n.t(`session:actions.${action}`),
        reason: getErrorMessage(err),
      });
    }

    /**
     * Applies the new session in memory, then persists it with any card
     * updates. A failed save is reported through `errorMessage`; memory is
     * not rolled back.
     */
    async function commit(action: SessionAction, session: Session, cardUpdates: Card[] = []) {
      set({ currentSession: session });

      let failure: unknown = null;
      if (cardUpdates.length > 0) {
        try {
          await catalog.saveCards(cardUpdates);
        } catch (err) {
          failure = err;
        }
        set({ cards: catalog.getCards(session.categoryId) });
      }
      try {
        await sessions.save(session);
      } catch (err) {
        failure ??= err;
      }

      if (failure) {
        logger.error("Session", `Failed to ${action}:`, failure);
        set({ errorMessage: failureMessage(action, failure) });
      }
    }

    function completeIfCovered(session: Session): Session {
      if (session.status.kind !== "active") return session;
      if (!isSessionCovered(session, get().cards.length)) return session;
      logger.info("Session", `All cards completed, ending session: ${session.name}`);
      return stopSession(session, "completed", now());
    }

    function closed(session: Session, cardCount: number): Session {
      const kind = isSessionCovered(session, cardCount) ? "completed" : "abandoned";
      if (session.status.kind === "active") return stopSession(session, kind, now());
      if (session.status.kind === "paused") {
        return { ...session, status: { kind, at: session.status.at } };
      }
      return session;
    }

    function resetCardFlags(cards: Card[]): Card[] {
      return cards.filter((c) => c.isCompleted).map((c) => ({ ...c, isCompleted: false }));
    }

    return {
      currentSession: null,
      category: null,
      cards: [],
      isLoading: false,
      errorMessage: null,

      // ===== LIFECYCLE =====
      startSession: async (category, playerCount = 2, options = {}) => {
        const cards = catalog.getCards(category.id);
        if (cards.length === 0) {
          throw new EmptyCategoryError(category.id, category.name);
        }

        set({ isLoading: true, errorMessage: null });

        // A session that is still open is closed before the new one begins.
        const previous = get().currentSession;
        if (previous && (previous.status.kind === "active" || previous.status.kind === "paused")) {
          await commit("end", closed(previous, get().cards.length));
          logger.info("Session", `Closed previous session: ${previous.name}`);
        }

        const startedAt = now();
        const session = createSession({
          id: createId(),
          categoryId: category.id,
          name: options.name ?? generateSessionName(category.name, startedAt),
          playerCount,
          preferredDifficulty: options.preferredDifficulty ?? 1,
          shuffledOrder: options.shuffle ? shufflePermutation(cards.length, random) : null,
          now: startedAt,
        });

        set({ category, cards });
        await commit("start", session, resetCardFlags(cards));
        set({ isLoading: false });

        logger.info("Session", `Started new session: ${session.name} for category: ${category.name}`);
        return session;
      },

      endSession: async () => {
        const session = get().currentSession;
        if (!session || (session.status.kind !== "active" && session.status.kind !== "paused")) return;
        await commit("end", closed(session, get().cards.length));
        logger.info("Session", `Ended session: ${session.name}`);
      },

      pause: async () => {
        const session = get().currentSession;
        if (!session || session.status.kind !== "active") return;
        await commit("pause", stopSession(session, "paused", now()));
        logger.info("Session", `Paused session: ${session.name}`);
      },

      resume: async () => {
        const session = get().currentSession;
        if (!session || session.status.kind !== "paused") return;
        await commit("resume", reactivateSession(session));
        logger.info("Session", `Resumed session: ${session.name}`);
      },

      restartSession: async () => {
        const session = get().currentSession;
        if (!session) return;
        const next = reactivateSession({ ...session, currentIndex: 0, completedCardIds: [] });
        await commit("restart", next, resetCardFlags(get().cards));
        logger.info("Session", `Restarted session: ${session.name}`);
      },

      restoreMostRecentActive: async () => {
        try {
          const session = await sessions.findMostRecentActive();
          if (!session) return null;

          const category = catalog.getCategory(session.categoryId);
          if (!category) {
            logger.warn("Session", `Active session ${session.id} references a missing category`);
            return null;
          }

          const cards = catalog.getCards(category.id);
          const restored = { ...session, currentIndex: clampIndex(session.currentIndex, cards.length) };
          set({ currentSession: restored, category, cards });
          logger.info("Session", `Restored active session: ${restored.name}`);
          return restored;
        } catch (err) {
          // Background restoration: never surfaced to the caller.
          logger.error("Session", "Error restoring session:", err);
          return null;
        }
      },

      // ===== NAVIGATION =====
      advance: async () => {
        const session = get().currentSession;
        if (!session) return false;

        const currentIndex = clampIndex(session.currentIndex + 1, get().cards.length);
        const next = completeIfCovered({ ...session, currentIndex });
        if (currentIndex === session.currentIndex && next.status === session.status) return false;

        await commit("advance", next);
        return session.status.kind === "active" && next.status.kind === "completed";
      },

      retreat: async () => {
        const session = get().currentSession;
        if (!session || session.currentIndex === 0) return;
        await commit("retreat", { ...session, currentIndex: clampIndex(session.currentIndex - 1, get().cards.length) });
      },

      jumpTo: async (index) => {
        const session = get().currentSession;
        if (!session) return;
        const currentIndex = clampIndex(index, get().cards.length);
        if (currentIndex === session.currentIndex) return;
        await commit("jump", { ...session, currentIndex });
      },

      markCurrentComplete: async () => {
        const session = get().currentSession;
        if (!session) return false;

        const card = cardAt(session, get().cards, session.currentIndex);
        if (!card || session.completedCardIds.includes(card.id)) return false;

        const used: Card = {
          ...card,
          isCompleted: true,
          usageCount: card.usageCount + 1,
          lastUsedAt: now().toISOString(),
        };
        const next = completeIfCovered({
          ...session,
          completedCardIds: [...session.completedCardIds, card.id],
        });

        await commit("markComplete", next, [used]);
        logger.debug("Session", `Marked card ${card.number} as completed`);
        return session.status.kind === "active" && next.status.kind === "completed";
      },

      shuffle: async () => {
        const session = get().currentSession;
        if (!session) return;
        const order = shufflePermutation(get().cards.length, random);
        await commit("shuffle", { ...session, shuffledOrder: order, currentIndex: 0 });
        logger.info("Session", `Shuffled cards for session: ${session.name}`);
      },

      resetShuffle: async () => {
        const session = get().currentSession;
        if (!session) return;
        await commit("resetShuffle", { ...session, shuffledOrder: null, currentIndex: 0 });
      },

      toggleCurrentFavorite: async () => {
        const card = get().getCurrentCard();
        if (!card) return;
        try {
          await catalog.toggleFavorite(card.id);
        } catch (err) {
          logger.error("Session", "Failed to update favorite:", err);
          set({ errorMessage: failureMessage("favorite", err) });
        }
        set({ cards: catalog.getCards(card.categoryId) });
      },

      // ===== HISTORY =====
      getRecentSessions: async (limit = 10) => {
        try {
          return await sessions.findRecent(limit);
        } catch (err) {
          logger.error("Session", "Error fetching recent sessions:", err);
          return [];
        }
      },

      getSessionsForCategory: async (categoryId, limit = 5) => {
        try {
          return await sessions.findByCategory(categoryId, limit);
        } catch (err) {
          logger.error("Session", "Error fetching sessions for category:", err);
          return [];
        }
      },

      deleteSession: async (id) => {
        if (get().currentSession?.id === id) {
          set({ currentSession: null, category: null, cards: [] });
        }
        try {
          await sessions.remove(id);
          logger.info("Session", `Deleted session: ${id}`);
        } catch (err) {
          logger.error("Session", "Failed to delete session:", err);
          set({ errorMessage: failureMessage("delete", err) });
        }
      },

      clearError: () => set({ errorMessage: null }),

      // ===== DERIVED =====
      getCurrentCard: () => {
        const { currentSession, cards } = get();
        return currentSession ? cardAt(currentSession, cards, currentSession.currentIndex) : null;
      },

      getProgress: () => {
        const { currentSession, cards } = get();
        return currentSession ? sessionProgress(currentSession, cards.length) : 0;
      },

      getRemainingCount: () => {
        const { currentSession, cards } = get();
        return currentSession ? remainingCardCount(currentSession, cards.length) : 0;
      },

      getFormattedDuration: () => {
        const { currentSession } = get();
        return formatDuration(currentSession ? elapsedSeconds(currentSession, now()) : 0);
      },

      getLookahead: () => {
        const { currentSession, cards } = get();
        return currentSession ? lookaheadCards(currentSession, cards) : [];
      },

      getCompletedCards: () => {
        const { currentSession, cards } = get();
        if (!currentSession) return [];
        const done = new Set(currentSession.completedCardIds);
        return cards.filter((c) => done.has(c.id));
      },

      getRemainingCards: () => {
        const { currentSession, cards } = get();
        if (!currentSession) return [];
        const done = new Set(currentSession.completedCardIds);
        return cards.filter((c) => !done.has(c.id));
      },

      canGoNext: () => {
        const { currentSession, cards } = get();
        return !!currentSession && currentSession.currentIndex < cards.length - 1;
      },

      canGoPrevious: () => {
        const { currentSession } = get();
        return !!currentSession && currentSession.currentIndex > 0;
      },

      isCurrentCardCompleted: () => {
        const { currentSession } = get();
        const card = get().getCurrentCard();
        return !!currentSession && !!card && currentSession.completedCardIds.includes(card.id);
      },

      isSessionCompleted: () => {
        const { currentSession, cards } = get();
        return !!currentSession && isSessionCovered(currentSession, cards.length);
      },

      getStats: () => {
        const { currentSession, cards } = get();
        return currentSession ? buildSessionStatistics(currentSession, cards.length, now()) : null;
      },
    };
  });
}

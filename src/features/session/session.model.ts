import type {
  Card,
  DifficultyLevel,
  Session,
  SessionStatistics,
  SessionStatus,
} from "@/types/app.types";

export type RandomSource = () => number;

// ==================== STATUS ====================

/** End timestamp: present for every status except active. */
export function sessionEndedAt(session: Session): string | null {
  return session.status.kind === "active" ? null : session.status.at;
}

export function isSessionCovered(session: Session, cardCount: number): boolean {
  return cardCount > 0 && session.completedCardIds.length >= cardCount;
}

function secondsBetween(fromIso: string, to: Date): number {
  return Math.max(0, (to.getTime() - Date.parse(fromIso)) / 1000);
}

/**
 * Moves the session out of `active`. The duration is frozen at the moment
 * of the transition.
 */
export function stopSession(
  session: Session,
  kind: Exclude<SessionStatus["kind"], "active">,
  now: Date,
): Session {
  if (session.status.kind !== "active") return session;
  return {
    ...session,
    status: { kind, at: now.toISOString() },
    durationSeconds: secondsBetween(session.startedAt, now),
  };
}

export function reactivateSession(session: Session): Session {
  if (session.status.kind === "active") return session;
  return { ...session, status: { kind: "active" } };
}

// ==================== ORDER ====================

export function clampIndex(index: number, cardCount: number): number {
  if (cardCount <= 0 || !Number.isFinite(index)) return 0;
  return Math.max(0, Math.min(Math.trunc(index), cardCount - 1));
}

/** Fisher–Yates permutation of [0, count). */
export function shufflePermutation(count: number, random: RandomSource): number[] {
  const order = Array.from({ length: count }, (_, i) => i);
  for (let i = count - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [order[i], order[j]] = [order[j], order[i]];
  }
  return order;
}

/** Logical (user-visible) position -> underlying card slot. */
export function underlyingIndex(session: Session, logical: number): number {
  const order = session.shuffledOrder;
  if (order && logical < order.length) return order[logical];
  return logical;
}

export function cardAt(session: Session, cards: readonly Card[], logical: number): Card | null {
  if (logical < 0 || logical >= cards.length) return null;
  return cards[underlyingIndex(session, logical)] ?? null;
}

export const LOOKAHEAD_SIZE = 4;

/** Cards at logical positions [current, current + 4), clipped to bounds. */
export function lookaheadCards(session: Session, cards: readonly Card[]): Card[] {
  const end = Math.min(session.currentIndex + LOOKAHEAD_SIZE, cards.length);
  const result: Card[] = [];
  for (let logical = session.currentIndex; logical < end; logical++) {
    const card = cardAt(session, cards, logical);
    if (card) result.push(card);
  }
  return result;
}

// ==================== PROGRESS ====================

export function sessionProgress(session: Session, cardCount: number): number {
  if (cardCount <= 0) return 0;
  return session.completedCardIds.length / cardCount;
}

export function remainingCardCount(session: Session, cardCount: number): number {
  return Math.max(0, cardCount - session.completedCardIds.length);
}

export function elapsedSeconds(session: Session, now: Date): number {
  return session.status.kind === "active"
    ? secondsBetween(session.startedAt, now)
    : session.durationSeconds;
}

export function formatDuration(totalSeconds: number): string {
  const whole = Math.max(0, Math.floor(totalSeconds));
  const hours = Math.floor(whole / 3600);
  const minutes = Math.floor((whole % 3600) / 60);
  const seconds = whole % 60;
  const ss = String(seconds).padStart(2, "0");

  if (hours > 0) {
    return `${hours}:${String(minutes).padStart(2, "0")}:${ss}`;
  }
  return `${minutes}:${ss}`;
}

function statusDescription(
  session: Session,
  cardCount: number,
): SessionStatistics["statusDescription"] {
  switch (session.status.kind) {
    case "completed":
      return "Completed";
    case "abandoned":
      return "Abandoned";
    case "paused":
      return "Paused";
    case "active":
      return cardCount > 0 && session.completedCardIds.length === 0 ? "Not Started" : "In Progress";
  }
}

export function buildSessionStatistics(session: Session, cardCount: number, now: Date): SessionStatistics {
  const pct = cardCount > 0 ? Math.round((session.completedCardIds.length / cardCount) * 100) : 0;
  return {
    totalCards: cardCount,
    completedCards: session.completedCardIds.length,
    remainingCards: remainingCardCount(session, cardCount),
    sessionDuration: formatDuration(elapsedSeconds(session, now)),
    playerCount: session.playerCount,
    isShuffled: session.shuffledOrder !== null,
    startedAt: session.startedAt,
    endedAt: sessionEndedAt(session),
    progressPercentage: `${pct}%`,
    statusDescription: statusDescription(session, cardCount),
  };
}

// ==================== CREATION ====================

const NAME_FORMAT = new Intl.DateTimeFormat("en-US", {
  month: "short",
  day: "numeric",
  hour: "2-digit",
  minute: "2-digit",
  hourCycle: "h23",
});

export function generateSessionName(categoryName: string, at: Date): string {
  return `${categoryName} - ${NAME_FORMAT.format(at)}`;
}

export type NewSessionInput = {
  id: string;
  categoryId: string;
  name: string;
  playerCount: number;
  preferredDifficulty: DifficultyLevel;
  shuffledOrder: number[] | null;
  now: Date;
};

export function createSession(input: NewSessionInput): Session {
  return {
    id: input.id,
    name: input.name,
    categoryId: input.categoryId,
    currentIndex: 0,
    completedCardIds: [],
    shuffledOrder: input.shuffledOrder,
    startedAt: input.now.toISOString(),
    status: { kind: "active" },
    durationSeconds: 0,
    playerCount: Number.isFinite(input.playerCount) ? Math.max(1, Math.trunc(input.playerCount)) : 1,
    preferredDifficulty: input.preferredDifficulty,
  };
}

// ==================== VALIDATION ====================

export function validateSession(session: Session, cardCount: number): string[] {
  const errors: string[] = [];

  if (!session.name) errors.push("Session name cannot be empty");
  if (session.currentIndex < 0) errors.push("Current card index cannot be negative");
  if (cardCount > 0 && session.currentIndex >= cardCount) {
    errors.push("Current card index exceeds available cards");
  }
  if (session.playerCount < 1) errors.push("Player count must be at least 1");
  if (session.preferredDifficulty < 1 || session.preferredDifficulty > 5) {
    errors.push("Preferred difficulty must be between 1 and 5");
  }
  const endedAt = sessionEndedAt(session);
  if (endedAt && Date.parse(endedAt) < Date.parse(session.startedAt)) {
    errors.push("End date cannot be before start date");
  }
  if (session.shuffledOrder) {
    const sorted = [...session.shuffledOrder].sort((a, b) => a - b);
    if (sorted.length !== cardCount || sorted.some((v, i) => v !== i)) {
      errors.push("Shuffle order is not a permutation of the category's cards");
    }
  }

  return errors;
}

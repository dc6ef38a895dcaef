// ==================== CATALOG ====================

export type DifficultyLevel = 1 | 2 | 3 | 4 | 5;

export type Card = {
  id: string;
  categoryId: string;
  number: number;               // 1-based, contiguous within the category
  prompt: string;
  isCompleted: boolean;         // current session only
  usageCount: number;
  lastUsedAt: string | null;    // ISO 8601
  isFavorite: boolean;
  difficultyLevel: DifficultyLevel;
  createdAt: string;            // ISO 8601
};

export type Category = {
  id: string;
  name: string;
  iconName: string;
  cardIds: string[];            // canonical order (by card number)
  isPremium: boolean;
  isRatingUnlockable: boolean;
  isActive: boolean;
  createdAt: string;            // ISO 8601
};

export type CatalogState = {
  schemaVersion: 1;
  datasetVersion: number;
  categories: Category[];
  cards: Card[];
};

export type CategoryStatistics = {
  name: string;
  cardCount: number;
  activeSessionsCount: number;
  isActive: boolean;
  createdAt: string;
  validationErrorCount: number;
};

export type CatalogStatistics = {
  totalCategories: number;
  activeCategories: number;
  totalCards: number;
  isInitialized: boolean;
  hasErrors: boolean;
  errorCount: number;
};

// ==================== SESSION ====================

export type SessionStatus =
  | { kind: 'active' }
  | { kind: 'paused'; at: string }
  | { kind: 'completed'; at: string }
  | { kind: 'abandoned'; at: string };

export type Session = {
  id: string;
  name: string;
  categoryId: string;
  currentIndex: number;
  completedCardIds: string[];   // membership only
  shuffledOrder: number[] | null;
  startedAt: string;            // ISO 8601
  status: SessionStatus;
  durationSeconds: number;      // frozen whenever the session is not active
  playerCount: number;
  preferredDifficulty: DifficultyLevel;
};

export type SessionsState = {
  schemaVersion: 1;
  sessions: Session[];
};

export type SessionStatistics = {
  totalCards: number;
  completedCards: number;
  remainingCards: number;
  sessionDuration: string;
  playerCount: number;
  isShuffled: boolean;
  startedAt: string | null;
  endedAt: string | null;
  progressPercentage: string;
  statusDescription: 'Not Started' | 'In Progress' | 'Paused' | 'Completed' | 'Abandoned';
};

// ==================== ENTITLEMENT ====================

export type SubscriptionKind = 'weekly' | 'lifetime';

export type EntitlementState = {
  schemaVersion: 1;
  hasPremiumAccess: boolean;
  subscriptionKind: SubscriptionKind | null;
  grantedAt: string | null;     // ISO 8601
  expiresAt: string | null;     // ISO 8601, weekly only
  updatedAt: string;            // ISO 8601
};

export type ResolverStatus =
  | { kind: 'uninitialized' }
  | { kind: 'loading' }
  | { kind: 'ready'; catalogEmpty: boolean }
  | { kind: 'failed'; reason: string; offline: boolean };

export type AccessDecisionSource = 'remote' | 'remote-empty' | 'cache';

export type AccessDecision = {
  hasPremiumAccess: boolean;
  source: AccessDecisionSource;
};

// ==================== GATING ====================

export type GateKind = 'none' | 'requiresPurchase' | 'requiresRatingAction';

// ==================== STATE ====================

export type AppState = {
  schemaVersion: 1;
  // Onboarding flags
  hasSeenOnboarding?: boolean;
  // Rating prompt
  hasRatedApp?: boolean;
  hasSeenRatingPrompt?: boolean;
};

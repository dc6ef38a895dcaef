import { v4 as uuidv4 } from "uuid";
import type {
  Card,
  CatalogState,
  CatalogStatistics,
  Category,
  CategoryStatistics,
  DifficultyLevel,
} from "@/types/app.types";
import { defaultIconName } from "@/constants/categories";
import { loadRecord, saveRecord, type StorageDriver } from "@/services/storage.service";
import type { SessionRepository } from "@/services/sessions.service";
import { logger } from "@/shared/utils/logger";

const STORAGE_KEY = "party.catalog.v1";

// ==================== DATASET ====================

export type CardData = {
  game: string;
  number: number;
  prompt: string;
};

export type CardDataset = {
  version: number;
  cards: CardData[];
};

function isCardData(value: unknown): value is CardData {
  return (
    !!value &&
    typeof value === "object" &&
    "game" in value &&
    typeof value.game === "string" &&
    "number" in value &&
    typeof value.number === "number" &&
    "prompt" in value &&
    typeof value.prompt === "string"
  );
}

/** Validates the bundled JSON before it is imported. */
export function parseCardDataset(value: unknown): CardDataset {
  if (!value || typeof value !== "object") {
    throw new Error("Invalid card dataset: expected an object");
  }
  const version = "version" in value ? value.version : undefined;
  const cards = "cards" in value ? value.cards : undefined;
  if (typeof version !== "number" || !Array.isArray(cards)) {
    throw new Error("Invalid card dataset: missing version or cards");
  }
  const parsed: CardData[] = [];
  for (const [i, entry] of cards.entries()) {
    if (!isCardData(entry)) {
      throw new Error(`Invalid card dataset: entry ${i} is malformed`);
    }
    parsed.push(entry);
  }
  return { version, cards: parsed };
}

// ==================== DIFFICULTY ====================

export function clampDifficulty(level: number): DifficultyLevel {
  const n = Math.round(level);
  if (n <= 1) return 1;
  if (n === 2) return 2;
  if (n === 3) return 3;
  if (n === 4) return 4;
  return 5;
}

/** Heuristic from prompt length, long words and number of questions. */
export function estimateDifficulty(prompt: string): DifficultyLevel {
  const wordCount = prompt.trim().split(/\s+/).filter(Boolean).length;
  const hasComplexWords = /\b\w{10,}\b/.test(prompt);
  const hasMultipleQuestions = prompt.split("?").length > 2;

  let difficulty = 1;
  if (wordCount > 20) difficulty += 1;
  if (wordCount > 35) difficulty += 1;
  if (hasComplexWords) difficulty += 1;
  if (hasMultipleQuestions) difficulty += 1;

  return clampDifficulty(difficulty);
}

export function buildCatalog(dataset: CardDataset, now: Date): CatalogState {
  const createdAt = now.toISOString();
  const grouped = new Map<string, CardData[]>();
  for (const entry of dataset.cards) {
    const list = grouped.get(entry.game) ?? [];
    list.push(entry);
    grouped.set(entry.game, list);
  }

  const categories: Category[] = [];
  const cards: Card[] = [];

  for (const [name, entries] of grouped) {
    const categoryId = uuidv4();
    const sorted = [...entries].sort((a, b) => a.number - b.number);
    const categoryCards = sorted.map<Card>((entry) => ({
      id: uuidv4(),
      categoryId,
      number: entry.number,
      prompt: entry.prompt,
      isCompleted: false,
      usageCount: 0,
      lastUsedAt: null,
      isFavorite: false,
      difficultyLevel: estimateDifficulty(entry.prompt),
      createdAt,
    }));

    categories.push({
      id: categoryId,
      name,
      iconName: defaultIconName(name),
      cardIds: categoryCards.map((c) => c.id),
      isPremium: false,
      isRatingUnlockable: false,
      isActive: true,
      createdAt,
    });
    cards.push(...categoryCards);
  }

  return { schemaVersion: 1, datasetVersion: dataset.version, categories, cards };
}

// ==================== SERVICE ====================

export type CategoryAccessTable = {
  premium: Readonly<Record<string, boolean>>;
  ratingUnlockable: ReadonlySet<string>;
};

export type CatalogService = {
  load: () => Promise<CatalogState | null>;
  ensureCatalog: (dataset: CardDataset) => Promise<{ imported: boolean }>;
  importCatalog: (dataset: CardDataset) => Promise<void>;
  applyCategoryAccess: (table: CategoryAccessTable) => Promise<number>;

  getAllCategories: () => Category[];
  getCategory: (id: string) => Category | null;
  getCategoryByName: (name: string) => Category | null;
  searchCategories: (text: string) => Category[];
  getCards: (categoryId: string) => Card[];
  getCard: (id: string) => Card | null;
  totalCardCount: () => number;

  saveCards: (cards: Card[]) => Promise<void>;
  toggleFavorite: (cardId: string) => Promise<Card | null>;
  validateCatalog: () => string[];
  getCategoryStatistics: (categoryId: string) => Promise<CategoryStatistics | null>;
  getCatalogStatistics: () => CatalogStatistics;
  getPopularCategories: (limit?: number) => Category[];
  getRecentCategories: (limit?: number) => Category[];
};

type CatalogDeps = {
  storage: StorageDriver;
  sessions?: SessionRepository;
  now?: () => Date;
};

export function createCatalogService({ storage, sessions, now = () => new Date() }: CatalogDeps): CatalogService {
  let state: CatalogState | null = null;
  let cardsById = new Map<string, Card>();

  function adopt(next: CatalogState | null) {
    state = next;
    cardsById = new Map((next?.cards ?? []).map((c) => [c.id, c]));
  }

  async function persist() {
    if (!state) return;
    await saveRecord<CatalogState>(storage, STORAGE_KEY, state);
  }

  function validateCategory(category: Category): string[] {
    const errors: string[] = [];
    const cards = service.getCards(category.id);
    if (!category.name) errors.push(`Category ${category.id}: name cannot be empty`);
    if (cards.length !== category.cardIds.length) {
      errors.push(
        `Category '${category.name}': card count mismatch: expected ${category.cardIds.length}, actual ${cards.length}`,
      );
    }
    cards.forEach((card, i) => {
      if (card.number !== i + 1) {
        errors.push(`Category '${category.name}': card numbers are not contiguous at ${card.number}`);
      }
      if (!card.prompt.trim()) {
        errors.push(`Category '${category.name}': card ${card.number} prompt cannot be empty`);
      }
      if (card.categoryId !== category.id) {
        errors.push(`Category '${category.name}': card ${card.number} belongs to another category`);
      }
    });
    return errors;
  }

  const service: CatalogService = {
    async load() {
      adopt(await loadRecord<CatalogState>(storage, STORAGE_KEY, 1));
      return state;
    },

    async ensureCatalog(dataset) {
      const existing = await service.load();
      if (existing && existing.categories.length > 0 && existing.datasetVersion === dataset.version) {
        return { imported: false };
      }
      if (existing) {
        logger.warn(
          "Catalog",
          `Dataset version changed (${existing.datasetVersion} -> ${dataset.version}), re-importing`,
        );
      }
      await service.importCatalog(dataset);
      return { imported: true };
    },

    async importCatalog(dataset) {
      // Full replace: previous categories, cards and sessions are dropped.
      if (sessions) await sessions.clear();
      adopt(buildCatalog(dataset, now()));
      await persist();
      logger.info(
        "Catalog",
        `Imported ${state?.categories.length ?? 0} categories, ${state?.cards.length ?? 0} cards`,
      );
    },

    async applyCategoryAccess(table) {
      if (!state) return 0;
      let changed = 0;
      const categories = state.categories.map((category) => {
        const isPremium = table.premium[category.name] ?? false;
        const isRatingUnlockable = table.ratingUnlockable.has(category.name);
        if (category.isPremium === isPremium && category.isRatingUnlockable === isRatingUnlockable) {
          return category;
        }
        changed += 1;
        return { ...category, isPremium, isRatingUnlockable };
      });
      if (changed === 0) return 0;

      adopt({ ...state, categories });
      await persist();
      logger.info("Catalog", `Updated access flags on ${changed} categories`);
      return changed;
    },

    getAllCategories() {
      return [...(state?.categories ?? [])].sort((a, b) => a.name.localeCompare(b.name));
    },

    getCategory(id) {
      return state?.categories.find((c) => c.id === id) ?? null;
    },

    getCategoryByName(name) {
      const wanted = name.toLowerCase();
      return state?.categories.find((c) => c.name.toLowerCase() === wanted) ?? null;
    },

    searchCategories(text) {
      const active = service.getAllCategories().filter((c) => c.isActive);
      const query = text.trim().toLowerCase();
      if (!query) return active;
      return active.filter((c) => c.name.toLowerCase().includes(query));
    },

    getCards(categoryId) {
      const category = service.getCategory(categoryId);
      if (!category) return [];
      return category.cardIds
        .map((id) => cardsById.get(id))
        .filter((c): c is Card => !!c)
        .sort((a, b) => a.number - b.number);
    },

    getCard(id) {
      return cardsById.get(id) ?? null;
    },

    totalCardCount() {
      return state?.cards.length ?? 0;
    },

    async saveCards(updated) {
      if (!state || updated.length === 0) return;
      const patch = new Map(updated.map((c) => [c.id, c]));
      adopt({ ...state, cards: state.cards.map((c) => patch.get(c.id) ?? c) });
      await persist();
    },

    async toggleFavorite(cardId) {
      const card = cardsById.get(cardId);
      if (!card) return null;
      const next = { ...card, isFavorite: !card.isFavorite };
      await service.saveCards([next]);
      return next;
    },

    validateCatalog() {
      return (state?.categories ?? []).flatMap(validateCategory);
    },

    async getCategoryStatistics(categoryId) {
      const category = service.getCategory(categoryId);
      if (!category) return null;
      const stored = sessions ? await sessions.getAll() : [];
      return {
        name: category.name,
        cardCount: service.getCards(category.id).length,
        activeSessionsCount: stored.filter((s) => s.categoryId === category.id && s.status.kind === "active").length,
        isActive: category.isActive,
        createdAt: category.createdAt,
        validationErrorCount: validateCategory(category).length,
      };
    },

    getCatalogStatistics() {
      const categories = state?.categories ?? [];
      const errorCount = service.validateCatalog().length;
      return {
        totalCategories: categories.length,
        activeCategories: categories.filter((c) => c.isActive).length,
        totalCards: service.totalCardCount(),
        isInitialized: state !== null,
        hasErrors: errorCount > 0,
        errorCount,
      };
    },

    // Ties keep the alphabetical order of `searchCategories`.
    getPopularCategories(limit = 5) {
      return service
        .searchCategories("")
        .sort((a, b) => b.cardIds.length - a.cardIds.length)
        .slice(0, limit);
    },

    getRecentCategories(limit = 3) {
      return service
        .searchCategories("")
        .sort((a, b) => Date.parse(b.createdAt) - Date.parse(a.createdAt))
        .slice(0, limit);
    },
  };

  return service;
}

import type { Category, GateKind } from "@/types/app.types";

export type GateContext = {
  hasPremiumAccess: boolean;
  hasRatedApp: boolean;
};

/** Premium outranks rating: a premium category never asks for a rating. */
export function getCategoryGate(category: Category, { hasPremiumAccess, hasRatedApp }: GateContext): GateKind {
  if (category.isPremium && !hasPremiumAccess) return "requiresPurchase";
  if (category.isRatingUnlockable && !hasRatedApp) return "requiresRatingAction";
  return "none";
}

/** Free first, then premium; alphabetical within each group. */
export function sortCategoriesForDisplay(categories: readonly Category[]): Category[] {
  return [...categories].sort((a, b) => {
    if (a.isPremium !== b.isPremium) return a.isPremium ? 1 : -1;
    return a.name.localeCompare(b.name);
  });
}

export type GatedCategory = {
  category: Category;
  gate: GateKind;
};

export function buildCategoryGrid(categories: readonly Category[], context: GateContext): GatedCategory[] {
  return sortCategoriesForDisplay(categories.filter((c) => c.isActive)).map((category) => ({
    category,
    gate: getCategoryGate(category, context),
  }));
}

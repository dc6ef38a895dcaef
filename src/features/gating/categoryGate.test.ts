import { describe, expect, it } from "vitest";
import type { Category } from "@/types/app.types";
import { buildCategoryGrid, getCategoryGate, sortCategoriesForDisplay } from "./categoryGate";

function category(name: string, overrides: Partial<Category> = {}): Category {
  return {
    id: name.toLowerCase().replace(/\s+/g, "-"),
    name,
    iconName: "questionmark.circle",
    cardIds: ["a"],
    isPremium: false,
    isRatingUnlockable: false,
    isActive: true,
    createdAt: "2025-03-01T00:00:00.000Z",
    ...overrides,
  };
}

const premium = category("Truth or Dare", { isPremium: true });
const rated = category("Memory Match", { isRatingUnlockable: true });
const free = category("Story Time");

describe("getCategoryGate", () => {
  it("asks for a purchase on premium categories without access", () => {
    expect(getCategoryGate(premium, { hasPremiumAccess: false, hasRatedApp: true })).toBe("requiresPurchase");
    expect(getCategoryGate(premium, { hasPremiumAccess: true, hasRatedApp: false })).toBe("none");
  });

  it("asks for a rating on rating-unlockable categories until the app is rated", () => {
    expect(getCategoryGate(rated, { hasPremiumAccess: true, hasRatedApp: false })).toBe("requiresRatingAction");
    expect(getCategoryGate(rated, { hasPremiumAccess: false, hasRatedApp: true })).toBe("none");
  });

  it("never gates free categories", () => {
    expect(getCategoryGate(free, { hasPremiumAccess: false, hasRatedApp: false })).toBe("none");
  });
});

describe("sortCategoriesForDisplay", () => {
  it("puts free categories first, alphabetical within each group", () => {
    const sorted = sortCategoriesForDisplay([
      premium,
      category("Bucket List", { isPremium: true }),
      free,
      rated,
    ]);
    expect(sorted.map((c) => c.name)).toEqual(["Memory Match", "Story Time", "Bucket List", "Truth or Dare"]);
  });
});

describe("buildCategoryGrid", () => {
  it("hides inactive categories and attaches each gate", () => {
    const grid = buildCategoryGrid([premium, free, rated, category("Retired", { isActive: false })], {
      hasPremiumAccess: false,
      hasRatedApp: false,
    });
    expect(grid.map(({ category: c, gate }) => [c.name, gate])).toEqual([
      ["Memory Match", "requiresRatingAction"],
      ["Story Time", "none"],
      ["Truth or Dare", "requiresPurchase"],
    ]);
  });
});

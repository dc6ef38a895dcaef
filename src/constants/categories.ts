/**
 * Category access table, re-applied to the stored catalog on every launch.
 * Names absent from `PREMIUM_CATEGORIES` are free.
 */
export const PREMIUM_CATEGORIES: Readonly<Record<string, boolean>> = {
  "Would You Rather": false,
  "Never Have I Ever": false,
  "How Well Do You Know Me": false,
  "Memory Match": false,
  "Story Time": false,
  "Truth or Dare": true,
  "This or That": true,
  "Who's Most Likely To": true,
  "Impersonation": true,
  "Bucket List": true,
};

// Free categories unlocked by leaving an app rating.
export const RATING_UNLOCKABLE_CATEGORIES: ReadonlySet<string> = new Set([
  "How Well Do You Know Me",
  "Memory Match",
]);

const ICONS: Readonly<Record<string, string>> = {
  "would you rather": "would_you_rather",
  "truth or dare": "truth_or_dare",
  "this or that": "this_or_that",
  "never have i ever": "never_have_i_ever",
  "who's most likely to": "most_likely_to",
  "how well do you know me": "how_well_do_you_know_me",
  "impersonation": "impersonation",
  "memory match": "memory_match",
  "story time": "story_time",
  "bucket list": "bucket_list",
};

const DEFAULT_ICON = "questionmark.circle";

export function defaultIconName(categoryName: string): string {
  return ICONS[categoryName.toLowerCase()] ?? DEFAULT_ICON;
}

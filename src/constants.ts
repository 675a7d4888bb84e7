/**
 * Constants for pi-nixpkgs
 */

export const SEARCH_URL = "https://search.nixos.org/backend/latest-42-nixos-unstable/_search";
export const SEARCH_RESULT_LIMIT = 50;

/**
 * Timeout values for various operations (in milliseconds)
 */
export const TIMEOUTS = {
	search: 10000,
	toolProbe: 5000,
	nixInstall: 180000,
	clipboard: 5000,
	confirm: 30000,
} as const;

export type TimeoutKey = keyof typeof TIMEOUTS;

/**
 * Projection limits for result rows and the detail panel
 */
export const PROJECTION = {
	summaryDescriptionMax: 60,
	programsShown: 5,
	platformsShown: 5,
	licensesShown: 3,
	snippetDescriptionMax: 50,
	installErrorMax: 200,
} as const;

export const CATEGORIES = ["development", "productivity", "media", "utilities", "custom"] as const;

export type Category = (typeof CATEGORIES)[number];

export const DEFAULT_CATEGORY: Category = "custom";

export const CATEGORY_LABELS: Record<Category, string> = {
	development: "💻 Development",
	productivity: "📊 Productivity",
	media: "🎨 Media",
	utilities: "🔧 Utilities",
	custom: "⭐ Custom",
};

/**
 * UI Constants
 */
export const UI = {
	maxListHeight: 12,
	statusKey: "nixpkgs",
} as const;

export type UIKey = keyof typeof UI;

export function isCategory(value: string): value is Category {
	return (CATEGORIES as readonly string[]).includes(value);
}

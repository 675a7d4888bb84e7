/**
 * Common UI helper patterns
 */
import type { ExtensionCommandContext } from "@mariozechner/pi-coding-agent";
import { notify } from "./notify.js";
import { CATEGORIES, CATEGORY_LABELS, TIMEOUTS, type Category } from "../constants.js";

/**
 * Confirm action with timeout
 */
export async function confirmAction(
  ctx: ExtensionCommandContext,
  title: string,
  message: string,
  timeoutMs: number = TIMEOUTS.confirm
): Promise<boolean> {
  if (!ctx.hasUI) {
    // Print mode runs with explicit arguments; treat them as consent
    return true;
  }

  return ctx.ui.confirm(title, message, { timeout: timeoutMs });
}

/**
 * Show progress notification that works in both modes
 */
export function showProgress(ctx: ExtensionCommandContext, action: string, target: string): void {
  notify(ctx, `${action} ${target}...`, "info");
}

/**
 * Ask for a category, listing `preferred` first. Without a UI the preferred
 * category is used as-is.
 */
export async function promptCategory(
  ctx: ExtensionCommandContext,
  preferred: Category
): Promise<Category | undefined> {
  if (!ctx.hasUI) return preferred;

  const ordered = [preferred, ...CATEGORIES.filter((category) => category !== preferred)];
  const choice = await ctx.ui.select(
    "Add to category",
    ordered.map((category) => CATEGORY_LABELS[category])
  );

  return ordered.find((category) => CATEGORY_LABELS[category] === choice);
}

/**
 * Format list output for display
 */
export function formatListOutput(ctx: ExtensionCommandContext, title: string, items: string[]): void {
  if (items.length === 0) {
    notify(ctx, `No ${title.toLowerCase()} found.`, "info");
    return;
  }

  const output = items.join("\n");

  if (ctx.hasUI) {
    ctx.ui.notify(`${title}\n${output}`, "info");
  } else {
    console.log(`${title}:`);
    console.log(output);
  }
}

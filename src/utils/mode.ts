/**
 * UI vs non-UI mode abstractions and action guards
 */
import type { ExtensionCommandContext } from "@mariozechner/pi-coding-agent";
import { notify } from "./notify.js";

export type ActionKey = "search" | "install" | "managed" | "clipboard";

const inFlight = new Set<ActionKey>();

/**
 * Execute operation, turning a thrown error into an error notification
 */
export async function tryOperation<T>(
  ctx: ExtensionCommandContext,
  operation: () => Promise<T>,
  errorPrefix?: string
): Promise<T | undefined> {
  try {
    return await operation();
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    notify(ctx, errorPrefix ? `${errorPrefix}: ${detail}` : detail, "error");
    return undefined;
  }
}

/**
 * Run at most one operation per action key. A second trigger while the first
 * is still running is rejected with a warning instead of being queued.
 */
export async function runExclusive<T>(
  ctx: ExtensionCommandContext,
  key: ActionKey,
  operation: () => Promise<T>
): Promise<T | undefined> {
  if (inFlight.has(key)) {
    notify(ctx, `A ${key} action is already running; wait for it to finish.`, "warning");
    return undefined;
  }

  inFlight.add(key);
  try {
    return await operation();
  } finally {
    inFlight.delete(key);
  }
}

export function isActionRunning(key: ActionKey): boolean {
  return inFlight.has(key);
}

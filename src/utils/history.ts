/**
 * Change history tracking using pi.appendEntry()
 * Each install / managed add / snippet copy is recorded in the session.
 */
import type { ExtensionAPI, ExtensionCommandContext } from "@mariozechner/pi-coding-agent";
import type { Category } from "../constants.js";

export type ChangeAction = "package_install" | "managed_add" | "snippet_copy";

export const CHANGE_ACTIONS: readonly ChangeAction[] = ["package_install", "managed_add", "snippet_copy"];

export interface NixChangeEntry {
  action: ChangeAction;
  timestamp: number;
  packageName: string;
  category?: Category | undefined;
  tool?: string | undefined;
  success: boolean;
  error?: string | undefined;
}

export interface HistoryFilters {
  limit?: number;
  action?: ChangeAction;
  success?: boolean;
  packageQuery?: string;
}

export const NIX_CHANGE_CUSTOM_TYPE = "nixpkgs-change";

export function logChange(pi: ExtensionAPI, change: Omit<NixChangeEntry, "timestamp">): void {
  const entry: NixChangeEntry = {
    ...change,
    timestamp: Date.now(),
  };

  pi.appendEntry(NIX_CHANGE_CUSTOM_TYPE, entry);
}

export function logPackageInstall(pi: ExtensionAPI, packageName: string, success: boolean, error?: string): void {
  logChange(pi, { action: "package_install", packageName, success, error });
}

export function logManagedAdd(
  pi: ExtensionAPI,
  packageName: string,
  category: Category,
  success: boolean,
  error?: string
): void {
  logChange(pi, { action: "managed_add", packageName, category, success, error });
}

export function logSnippetCopy(pi: ExtensionAPI, packageName: string, tool: string | undefined, success: boolean): void {
  logChange(pi, { action: "snippet_copy", packageName, tool, success });
}

function isChangeAction(value: unknown): value is ChangeAction {
  return typeof value === "string" && (CHANGE_ACTIONS as readonly string[]).includes(value);
}

function asChangeEntry(data: unknown): NixChangeEntry | undefined {
  if (!data || typeof data !== "object") return undefined;

  const maybe = data as Partial<NixChangeEntry>;
  if (!isChangeAction(maybe.action)) return undefined;
  if (typeof maybe.timestamp !== "number") return undefined;
  if (typeof maybe.success !== "boolean") return undefined;
  if (typeof maybe.packageName !== "string") return undefined;

  return {
    action: maybe.action,
    timestamp: maybe.timestamp,
    packageName: maybe.packageName,
    category: maybe.category,
    tool: maybe.tool,
    success: maybe.success,
    error: maybe.error,
  };
}

function matchesHistoryFilters(change: NixChangeEntry, filters: HistoryFilters): boolean {
  const packageQuery = filters.packageQuery?.toLowerCase().trim();

  if (filters.action && change.action !== filters.action) return false;
  if (typeof filters.success === "boolean" && change.success !== filters.success) return false;
  if (packageQuery && !change.packageName.toLowerCase().includes(packageQuery)) return false;

  return true;
}

/**
 * Get filtered changes from the current session, oldest first
 */
export function querySessionChanges(ctx: ExtensionCommandContext, filters: HistoryFilters = {}): NixChangeEntry[] {
  const changes: NixChangeEntry[] = [];

  for (const entry of ctx.sessionManager.getEntries()) {
    if (entry?.type !== "custom" || entry.customType !== NIX_CHANGE_CUSTOM_TYPE) continue;

    const change = asChangeEntry(entry.data);
    if (change && matchesHistoryFilters(change, filters)) {
      changes.push(change);
    }
  }

  const limit = filters.limit ?? 20;
  return limit > 0 ? changes.slice(-limit) : changes;
}

export function formatChangeEntry(entry: NixChangeEntry): string {
  const time = new Date(entry.timestamp).toLocaleString();
  const icon = entry.success ? "✓" : "✗";
  const errorSuffix = !entry.success && entry.error ? ` (${entry.error})` : "";

  switch (entry.action) {
    case "package_install":
      return `[${time}] ${icon} Installed ${entry.packageName}${errorSuffix}`;

    case "managed_add":
      return `[${time}] ${icon} Added ${entry.packageName} to ${entry.category ?? "managed"}${errorSuffix}`;

    case "snippet_copy":
      return `[${time}] ${icon} Copied flake entry for ${entry.packageName}${entry.tool ? ` via ${entry.tool}` : ""}`;
  }
}

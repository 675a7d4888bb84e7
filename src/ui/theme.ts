/**
 * Theme utilities for consistent UI styling across dark/light themes
 */
import type { Theme } from "@mariozechner/pi-coding-agent";
import type { SummaryRow } from "../types/index.js";

export type ActionIcon = "install" | "managed" | "copy" | "back" | "refresh" | "search";

/**
 * Navigation/action icons
 */
export function getActionIcon(theme: Theme, action: ActionIcon): string {
  switch (action) {
    case "install":
      return theme.fg("accent", "⚡");
    case "managed":
      return theme.fg("success", "+");
    case "copy":
      return theme.fg("warning", "⧉");
    case "back":
      return theme.fg("muted", "←");
    case "refresh":
      return theme.fg("accent", "↻");
    case "search":
      return theme.fg("accent", "⌕");
  }
}

/**
 * `name  version` label for a result row, version dimmed
 */
export function formatResultLabel(theme: Theme, row: SummaryRow): string {
  return `${row.name} ${theme.fg("dim", row.version)}`;
}

export function formatDetailTitle(theme: Theme, row: SummaryRow): string {
  return theme.fg("accent", theme.bold(`${row.name} ${row.version}`));
}

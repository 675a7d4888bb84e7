/**
 * Status bar helpers for pi-nixpkgs
 */
import type { ExtensionCommandContext, ExtensionContext } from "@mariozechner/pi-coding-agent";
import { UI } from "../constants.js";
import { formatHomePath, pluralize, truncate } from "./format.js";
import { getNixpkgsPaths } from "./settings.js";

export interface StatusInfo {
  query?: string | undefined;
  resultCount?: number | undefined;
}

export function formatStatusText(info: StatusInfo, managedDir: string): string {
  const parts: string[] = [];

  if (info.query) {
    parts.push(`nix: ${truncate(info.query, 24)}`);
  }
  if (info.resultCount !== undefined && info.resultCount > 0) {
    parts.push(pluralize(info.resultCount, "result"));
  }
  parts.push(`managed ${formatHomePath(managedDir)}`);

  return parts.join(" • ");
}

export function updateNixpkgsStatus(ctx: ExtensionCommandContext | ExtensionContext, info: StatusInfo = {}): void {
  if (!ctx.hasUI) return;

  const text = formatStatusText(info, getNixpkgsPaths().managedDir);
  ctx.ui.setStatus(UI.statusKey, ctx.ui.theme.fg("dim", text));
}

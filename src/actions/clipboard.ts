/**
 * Copy a flake entry to the system clipboard (X11 first, then Wayland)
 */
import type { ExtensionAPI, ExtensionCommandContext } from "@mariozechner/pi-coding-agent";
import { TIMEOUTS } from "../constants.js";
import type { PackageRecord, ToolOutcome } from "../types/index.js";
import { formatFlakeEntry, getAttrName } from "../search/projector.js";
import { logSnippetCopy } from "../utils/history.js";
import { runExclusive } from "../utils/mode.js";
import { notify } from "../utils/notify.js";
import { createAvailabilityCheck, runFirstAvailable, runTool, type AvailabilityCheck, type ToolStrategy } from "./tools.js";

export function clipboardStrategies(pi: ExtensionAPI, text: string, cwd: string): ToolStrategy[] {
  const options = { cwd, timeout: TIMEOUTS.clipboard };

  return [
    {
      tool: "xclip",
      // xclip only reads stdin
      run: () =>
        runTool(pi, "sh", ["-c", 'printf "%s" "$1" | xclip -selection clipboard', "sh", text], options),
    },
    {
      tool: "wl-copy",
      run: () => runTool(pi, "wl-copy", ["--", text], options),
    },
  ];
}

export async function copyToClipboard(
  text: string,
  pi: ExtensionAPI,
  cwd: string,
  isAvailable: AvailabilityCheck = createAvailabilityCheck(pi, cwd)
): Promise<ToolOutcome> {
  return runFirstAvailable(clipboardStrategies(pi, text, cwd), isAvailable);
}

export async function copyFlakeEntry(
  record: PackageRecord,
  ctx: ExtensionCommandContext,
  pi: ExtensionAPI
): Promise<void> {
  const name = getAttrName(record);
  if (!name) {
    notify(ctx, "Select or name a package first.", "warning");
    return;
  }

  const entry = formatFlakeEntry(record);

  await runExclusive(ctx, "clipboard", async () => {
    const outcome = await copyToClipboard(entry, pi, ctx.cwd);

    if (outcome.ok) {
      logSnippetCopy(pi, name, outcome.tool, true);
      notify(ctx, `Copied to clipboard:\n${entry}`, "info");
      return;
    }

    logSnippetCopy(pi, name, undefined, false);
    notify(ctx, `Flake entry:\n${entry}\n\nInstall xclip or wl-clipboard for auto-copy`, "info");
  });
}

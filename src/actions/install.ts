/**
 * Installation through `nix profile install`
 */
import type { ExtensionAPI, ExtensionCommandContext } from "@mariozechner/pi-coding-agent";
import { PROJECTION, TIMEOUTS } from "../constants.js";
import type { ToolOutcome } from "../types/index.js";
import { logPackageInstall } from "../utils/history.js";
import { runExclusive } from "../utils/mode.js";
import { notify, error as notifyError, success } from "../utils/notify.js";
import { confirmAction, showProgress } from "../utils/ui-helpers.js";
import { createAvailabilityCheck, runTool, type AvailabilityCheck } from "./tools.js";

export const NIX_MISSING_MESSAGE = "Nix not found. Please ensure Nix is installed.";

export function nixInstallArgs(attrName: string): string[] {
  return ["profile", "install", `nixpkgs#${attrName}`];
}

export async function runNixInstall(
  attrName: string,
  pi: ExtensionAPI,
  cwd: string,
  isAvailable: AvailabilityCheck = createAvailabilityCheck(pi, cwd)
): Promise<ToolOutcome> {
  if (!(await isAvailable("nix"))) {
    return { ok: false, kind: "tool-missing", error: NIX_MISSING_MESSAGE };
  }

  return runTool(pi, "nix", nixInstallArgs(attrName), {
    cwd,
    timeout: TIMEOUTS.nixInstall,
    errorLimit: PROJECTION.installErrorMax,
  });
}

export async function installNixPackage(
  attrName: string,
  ctx: ExtensionCommandContext,
  pi: ExtensionAPI
): Promise<void> {
  const name = attrName.trim();
  if (!name) {
    notify(ctx, "Select or name a package first.", "warning");
    return;
  }

  const confirmed = await confirmAction(ctx, "Install Package", `Install nixpkgs#${name} into your profile?`);
  if (!confirmed) {
    notify(ctx, "Installation cancelled.", "info");
    return;
  }

  await runExclusive(ctx, "install", async () => {
    showProgress(ctx, "Installing", name);
    const outcome = await runNixInstall(name, pi, ctx.cwd);

    if (outcome.ok) {
      logPackageInstall(pi, name, true);
      success(ctx, `Installed ${name}`);
      return;
    }

    logPackageInstall(pi, name, false, outcome.error);
    notifyError(
      ctx,
      outcome.kind === "tool-missing" ? outcome.error : `Installation failed:\n${outcome.error}`
    );
  });
}

/**
 * Add-to-managed orchestration: category choice, manifest edit, reporting
 */
import type { ExtensionAPI, ExtensionCommandContext } from "@mariozechner/pi-coding-agent";
import { CATEGORY_LABELS, type Category } from "../constants.js";
import { addPackageToManaged } from "../manifest/store.js";
import { formatHomePath } from "../utils/format.js";
import { logManagedAdd } from "../utils/history.js";
import { runExclusive, tryOperation } from "../utils/mode.js";
import { notify, error as notifyError } from "../utils/notify.js";
import { getNixpkgsPaths, loadSettings, type NixpkgsPaths } from "../utils/settings.js";
import { promptCategory } from "../utils/ui-helpers.js";

export type ManagedAddStatus = "added" | "duplicate" | "section-not-found" | "failed" | "cancelled";

export async function addToManaged(
  attrName: string,
  ctx: ExtensionCommandContext,
  pi: ExtensionAPI,
  options: { category?: Category | undefined; paths?: NixpkgsPaths } = {}
): Promise<ManagedAddStatus> {
  const name = attrName.trim();
  if (!name) {
    notify(ctx, "Select or name a package first.", "warning");
    return "cancelled";
  }

  const paths = options.paths ?? getNixpkgsPaths();
  const category =
    options.category ?? (await promptCategory(ctx, (await loadSettings(paths)).defaultCategory));
  if (!category) {
    notify(ctx, "Cancelled.", "info");
    return "cancelled";
  }

  const status = await runExclusive(ctx, "managed", async (): Promise<ManagedAddStatus> => {
    const result = await tryOperation(
      ctx,
      () => addPackageToManaged(name, category, paths),
      "Error adding to managed packages"
    );

    if (!result) {
      logManagedAdd(pi, name, category, false, "write failed");
      return "failed";
    }

    if (result.added) {
      logManagedAdd(pi, name, category, true);
      notify(
        ctx,
        `✓ Added ${name} to ${CATEGORY_LABELS[category]}\nLocation: ${formatHomePath(paths.packagesFile)}`,
        "info"
      );
      return "added";
    }

    if (result.reason === "duplicate") {
      logManagedAdd(pi, name, category, false, "already present");
      notify(ctx, `Package ${name} already exists in ${category}`, "warning");
      return "duplicate";
    }

    logManagedAdd(pi, name, category, false, "section not found");
    notifyError(
      ctx,
      `No "${category}" section in ${formatHomePath(paths.packagesFile)}; the file was left unchanged.`
    );
    return "section-not-found";
  });

  return status ?? "cancelled";
}

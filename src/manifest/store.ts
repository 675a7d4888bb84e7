/**
 * On-disk managed flake: packages.nix + flake.nix under the managed directory.
 *
 * No copy of the manifest is kept in memory; every edit re-reads the file so
 * changes made by hand between edits are preserved.
 */
import { mkdir, readFile } from "node:fs/promises";
import type { Category } from "../constants.js";
import type { AddEntryResult } from "../types/index.js";
import { fileExists, writeFileAtomic } from "../utils/fs.js";
import { getNixpkgsPaths, type NixpkgsPaths } from "../utils/settings.js";
import { addEntry, listAllEntries } from "./editor.js";

const PACKAGES_TEMPLATE = new URL("../../templates/packages.nix", import.meta.url);
const FLAKE_TEMPLATE = new URL("../../templates/flake.nix", import.meta.url);

export function readTemplate(name: "packages.nix" | "flake.nix"): Promise<string> {
  return readFile(name === "packages.nix" ? PACKAGES_TEMPLATE : FLAKE_TEMPLATE, "utf8");
}

/**
 * Create the managed directory and any missing template file.
 * Returns the paths that were created.
 */
export async function ensureManagedFlake(paths: NixpkgsPaths = getNixpkgsPaths()): Promise<string[]> {
  await mkdir(paths.managedDir, { recursive: true });

  const created: string[] = [];
  if (!(await fileExists(paths.packagesFile))) {
    await writeFileAtomic(paths.packagesFile, await readTemplate("packages.nix"));
    created.push(paths.packagesFile);
  }
  if (!(await fileExists(paths.flakeFile))) {
    await writeFileAtomic(paths.flakeFile, await readTemplate("flake.nix"));
    created.push(paths.flakeFile);
  }
  return created;
}

export async function readManifest(paths: NixpkgsPaths = getNixpkgsPaths()): Promise<string> {
  await ensureManagedFlake(paths);
  return readFile(paths.packagesFile, "utf8");
}

export async function addPackageToManaged(
  identifier: string,
  category: Category,
  paths: NixpkgsPaths = getNixpkgsPaths()
): Promise<AddEntryResult> {
  const text = await readManifest(paths);
  const result = addEntry(text, category, identifier);

  if (result.added) {
    await writeFileAtomic(paths.packagesFile, result.text);
  }
  return result;
}

export async function readManagedEntries(
  paths: NixpkgsPaths = getNixpkgsPaths()
): Promise<Map<Category, string[] | undefined>> {
  return listAllEntries(await readManifest(paths));
}

import test from "node:test";
import assert from "node:assert/strict";
import { mkdtemp, readdir, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  addPackageToManaged,
  ensureManagedFlake,
  readManagedEntries,
  readTemplate,
} from "../src/manifest/store.js";
import { getNixpkgsPaths, type NixpkgsPaths } from "../src/utils/settings.js";

async function withTempPaths(fn: (paths: NixpkgsPaths) => Promise<void>): Promise<void> {
  const root = await mkdtemp(join(tmpdir(), "pi-nixpkgs-store-"));
  try {
    await fn(getNixpkgsPaths({ PI_NIXPKGS_DIR: root }));
  } finally {
    await rm(root, { recursive: true, force: true });
  }
}

void test("ensureManagedFlake creates both files once", async () => {
  await withTempPaths(async (paths) => {
    const created = await ensureManagedFlake(paths);
    assert.deepEqual(created, [paths.packagesFile, paths.flakeFile]);

    assert.equal(await readFile(paths.packagesFile, "utf8"), await readTemplate("packages.nix"));
    assert.equal(await readFile(paths.flakeFile, "utf8"), await readTemplate("flake.nix"));

    assert.deepEqual(await ensureManagedFlake(paths), []);
  });
});

void test("ensureManagedFlake keeps an existing manifest", async () => {
  await withTempPaths(async (paths) => {
    await ensureManagedFlake(paths);
    await writeFile(paths.packagesFile, "{ custom = with pkgs; [ jq ]; }\n", "utf8");
    await rm(paths.flakeFile);

    const created = await ensureManagedFlake(paths);

    assert.deepEqual(created, [paths.flakeFile]);
    assert.equal(await readFile(paths.packagesFile, "utf8"), "{ custom = with pkgs; [ jq ]; }\n");
  });
});

void test("addPackageToManaged writes the new entry to disk", async () => {
  await withTempPaths(async (paths) => {
    const result = await addPackageToManaged("ripgrep", "utilities", paths);

    assert.equal(result.added, true);
    assert.equal(await readFile(paths.packagesFile, "utf8"), result.text);

    const entries = await readManagedEntries(paths);
    assert.deepEqual(entries.get("utilities"), ["ripgrep"]);
    assert.deepEqual(entries.get("custom"), []);
  });
});

void test("duplicate add leaves the file untouched", async () => {
  await withTempPaths(async (paths) => {
    await addPackageToManaged("htop", "utilities", paths);
    const before = await readFile(paths.packagesFile, "utf8");

    const result = await addPackageToManaged("htop", "utilities", paths);

    assert.equal(result.added, false);
    assert.equal(await readFile(paths.packagesFile, "utf8"), before);
  });
});

void test("missing section leaves the file untouched", async () => {
  await withTempPaths(async (paths) => {
    await ensureManagedFlake(paths);
    const manual = "{ pkgs }:\n{\n  development = with pkgs; [\n    git\n  ];\n}\n";
    await writeFile(paths.packagesFile, manual, "utf8");

    const result = await addPackageToManaged("mpv", "media", paths);

    assert.deepEqual(result, { added: false, text: manual, reason: "section-not-found" });
    assert.equal(await readFile(paths.packagesFile, "utf8"), manual);
  });
});

void test("edits re-read the file and keep hand-made changes", async () => {
  await withTempPaths(async (paths) => {
    await addPackageToManaged("git", "development", paths);
    const edited = (await readFile(paths.packagesFile, "utf8")).replace("    git\n", "    git\n    # pinned\n    gh\n");
    await writeFile(paths.packagesFile, edited, "utf8");

    await addPackageToManaged("jq", "development", paths);

    const entries = await readManagedEntries(paths);
    assert.deepEqual(entries.get("development"), ["git", "gh", "jq"]);
  });
});

void test("atomic writes leave no temp files behind", async () => {
  await withTempPaths(async (paths) => {
    await addPackageToManaged("fd", "custom", paths);
    await addPackageToManaged("bat", "custom", paths);

    const files = (await readdir(paths.managedDir)).sort();
    assert.deepEqual(files, ["flake.nix", "packages.nix"]);
  });
});

/**
 * Paths and persisted settings for pi-nixpkgs.
 *
 * Priority for each value: environment variable, then settings.json, then
 * the built-in default.
 */
import { readFile, rename } from "node:fs/promises";
import { homedir } from "node:os";
import { join } from "node:path";
import { CATEGORIES, DEFAULT_CATEGORY, SEARCH_URL, TIMEOUTS, isCategory, type Category } from "../constants.js";
import { fileExists, writeFileAtomic } from "./fs.js";

export interface NixpkgsSettings {
  defaultCategory: Category;
  searchUrl: string;
  searchTimeoutMs: number;
}

export interface NixpkgsPaths {
  rootDir: string;
  managedDir: string;
  packagesFile: string;
  flakeFile: string;
  settingsFile: string;
}

const DEFAULT_SETTINGS: NixpkgsSettings = {
  defaultCategory: DEFAULT_CATEGORY,
  searchUrl: SEARCH_URL,
  searchTimeoutMs: TIMEOUTS.search,
};

let settingsWriteQueue: Promise<void> = Promise.resolve();

export function getNixpkgsPaths(env: NodeJS.ProcessEnv = process.env): NixpkgsPaths {
  const rootDir = env.PI_NIXPKGS_DIR?.trim() || join(homedir(), ".pi", "agent", "nixpkgs");
  const managedDir = join(rootDir, "managed-packages");

  return {
    rootDir,
    managedDir,
    packagesFile: join(managedDir, "packages.nix"),
    flakeFile: join(managedDir, "flake.nix"),
    settingsFile: join(rootDir, "settings.json"),
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

export function sanitizeSettings(input: unknown): NixpkgsSettings {
  const settings: NixpkgsSettings = { ...DEFAULT_SETTINGS };
  if (!isRecord(input)) return settings;

  if (typeof input.defaultCategory === "string" && isCategory(input.defaultCategory)) {
    settings.defaultCategory = input.defaultCategory;
  }

  if (typeof input.searchUrl === "string" && /^https?:\/\//.test(input.searchUrl.trim())) {
    settings.searchUrl = input.searchUrl.trim();
  }

  const timeout = input.searchTimeoutMs;
  if (typeof timeout === "number" && Number.isFinite(timeout) && timeout > 0) {
    settings.searchTimeoutMs = Math.floor(timeout);
  }

  return settings;
}

async function backupCorruptSettingsFile(path: string): Promise<void> {
  const stamp = new Date().toISOString().replace(/[:.]/g, "-");
  const backupPath = path.replace(/\.json$/, `.invalid-${stamp}.json`);

  try {
    await rename(path, backupPath);
    console.warn(`[nixpkgs] Invalid settings JSON. Backed up to ${backupPath} and reset to defaults.`);
  } catch (error) {
    console.warn("[nixpkgs] Failed to backup invalid settings file:", error);
  }
}

async function readSettingsFromDisk(path: string): Promise<NixpkgsSettings | undefined> {
  try {
    if (!(await fileExists(path))) return undefined;

    const raw = await readFile(path, "utf8");
    if (!raw.trim()) return undefined;

    try {
      return sanitizeSettings(JSON.parse(raw) as unknown);
    } catch {
      await backupCorruptSettingsFile(path);
      return undefined;
    }
  } catch (error) {
    console.warn("[nixpkgs] Failed to read settings:", error);
    return undefined;
  }
}

export async function loadSettings(
  paths: NixpkgsPaths = getNixpkgsPaths(),
  env: NodeJS.ProcessEnv = process.env
): Promise<NixpkgsSettings> {
  const settings = (await readSettingsFromDisk(paths.settingsFile)) ?? { ...DEFAULT_SETTINGS };

  const envUrl = env.PI_NIXPKGS_SEARCH_URL?.trim();
  if (envUrl) {
    settings.searchUrl = envUrl;
  }

  return settings;
}

/**
 * Persist settings. Writes are serialized so overlapping saves land in order.
 */
export function saveSettings(
  update: Partial<NixpkgsSettings>,
  paths: NixpkgsPaths = getNixpkgsPaths()
): Promise<void> {
  settingsWriteQueue = settingsWriteQueue
    .catch(() => undefined)
    .then(async () => {
      const current = (await readSettingsFromDisk(paths.settingsFile)) ?? { ...DEFAULT_SETTINGS };
      const next = sanitizeSettings({ ...current, ...update });
      await writeFileAtomic(paths.settingsFile, `${JSON.stringify(next, null, 2)}\n`);
    });

  return settingsWriteQueue;
}

/**
 * `Authorization` header value for the search backend, from
 * PI_NIXPKGS_SEARCH_AUTH (`user:password`).
 */
export function getSearchAuthHeader(env: NodeJS.ProcessEnv = process.env): string | undefined {
  const raw = env.PI_NIXPKGS_SEARCH_AUTH?.trim();
  if (!raw || !raw.includes(":")) return undefined;
  return `Basic ${Buffer.from(raw, "utf8").toString("base64")}`;
}

export function describeCategories(): string {
  return CATEGORIES.join(", ");
}

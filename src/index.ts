/**
 * Nix Packages - search, inspect and install Nix packages from pi
 *
 * Entry point - exports the main extension function
 */
import type { ExtensionAPI, ExtensionCommandContext } from "@mariozechner/pi-coding-agent";
import type { AutocompleteItem } from "@mariozechner/pi-tui";
import { CATEGORIES, CATEGORY_LABELS, isCategory } from "./constants.js";
import { installNixPackage } from "./actions/install.js";
import { addToManaged } from "./actions/managed.js";
import { copyFlakeEntry } from "./actions/clipboard.js";
import { ensureManagedFlake, readManagedEntries } from "./manifest/store.js";
import { browseNixPackages, printSearchResults, promptSearchQuery } from "./ui/browse.js";
import { showHelp } from "./ui/help.js";
import { parseAddArgs, parseHistoryArgs, tokenizeArgs } from "./utils/command.js";
import { formatHomePath } from "./utils/format.js";
import { formatChangeEntry, querySessionChanges } from "./utils/history.js";
import { tryOperation } from "./utils/mode.js";
import { notify } from "./utils/notify.js";
import { describeCategories, getNixpkgsPaths, loadSettings, saveSettings } from "./utils/settings.js";
import { updateNixpkgsStatus } from "./utils/status.js";
import { formatListOutput } from "./utils/ui-helpers.js";

type CommandId = "search" | "install" | "add" | "copy" | "managed" | "category" | "init" | "history" | "help";

interface CommandDefinition {
  id: CommandId;
  description: string;
  aliases?: string[];
  run: (tokens: string[], ctx: ExtensionCommandContext, pi: ExtensionAPI) => Promise<void> | void;
}

const INSTALL_USAGE = "Usage: /nix install <attr>";
const ADD_USAGE = "Usage: /nix add <attr> [--category <name>]";
const COPY_USAGE = "Usage: /nix copy <attr>";
const SEARCH_USAGE = "Usage: /nix search <query>";

const COMMAND_DEFINITIONS: Record<CommandId, CommandDefinition> = {
  search: {
    id: "search",
    description: "Search Nix packages",
    aliases: ["find", "s"],
    run: (tokens, ctx, pi) => runSearchCommand(tokens.join(" "), ctx, pi),
  },
  install: {
    id: "install",
    description: "Install a package into your Nix profile",
    aliases: ["i"],
    run: (tokens, ctx, pi) =>
      tokens.length === 1 && tokens[0] ? installNixPackage(tokens[0], ctx, pi) : notify(ctx, INSTALL_USAGE, "info"),
  },
  add: {
    id: "add",
    description: "Add a package to the managed package list",
    aliases: ["a"],
    run: (tokens, ctx, pi) => handleAddCommand(tokens, ctx, pi),
  },
  copy: {
    id: "copy",
    description: "Copy a flake entry to the clipboard",
    aliases: ["flake"],
    run: (tokens, ctx, pi) =>
      tokens.length === 1 && tokens[0]
        ? copyFlakeEntry({ package_attr_name: tokens[0] }, ctx, pi)
        : notify(ctx, COPY_USAGE, "info"),
  },
  managed: {
    id: "managed",
    description: "Show managed packages by category",
    aliases: ["list"],
    run: (_tokens, ctx) => showManagedPackages(ctx),
  },
  category: {
    id: "category",
    description: "Show or set the default category",
    run: (tokens, ctx) => handleCategoryCommand(tokens, ctx),
  },
  init: {
    id: "init",
    description: "Create the managed flake if missing",
    run: (_tokens, ctx) => initManagedFlake(ctx),
  },
  history: {
    id: "history",
    description: "View install and managed-list history",
    run: (tokens, ctx) => showHistory(tokens, ctx),
  },
  help: {
    id: "help",
    description: "Show help",
    aliases: ["?"],
    run: (_tokens, ctx) => showHelp(ctx),
  },
};

const COMMAND_ALIAS_TO_ID: Record<string, CommandId> = Object.values(COMMAND_DEFINITIONS).reduce(
  (acc, def) => {
    acc[def.id] = def.id;
    for (const alias of def.aliases ?? []) {
      acc[alias] = def.id;
    }
    return acc;
  },
  {} as Record<string, CommandId>
);

export function resolveCommand(tokens: string[]): { id: CommandId; args: string[] } | undefined {
  const normalized = tokens[0]?.toLowerCase();
  if (!normalized) return undefined;

  const id = COMMAND_ALIAS_TO_ID[normalized];
  if (!id) return undefined;

  return { id, args: tokens.slice(1) };
}

function getAutocompleteItems(prefix: string): AutocompleteItem[] | null {
  const safePrefix = (prefix ?? "").toLowerCase();
  const filtered = Object.values(COMMAND_DEFINITIONS).filter(
    (def) => def.id.startsWith(safePrefix) || def.description.toLowerCase().includes(safePrefix)
  );

  return filtered.length > 0
    ? filtered.map((def) => ({ value: def.id, label: `${def.id} - ${def.description}` }))
    : null;
}

async function runSearchCommand(query: string, ctx: ExtensionCommandContext, pi: ExtensionAPI): Promise<void> {
  const trimmed = query.trim();

  if (!ctx.hasUI) {
    if (!trimmed) {
      notify(ctx, SEARCH_USAGE, "info");
      return;
    }
    await printSearchResults(trimmed, ctx);
    return;
  }

  const effective = trimmed || (await promptSearchQuery(ctx));
  if (!effective) return;
  await browseNixPackages(effective, ctx, pi);
}

async function handleAddCommand(tokens: string[], ctx: ExtensionCommandContext, pi: ExtensionAPI): Promise<void> {
  const parsed = parseAddArgs(tokens);

  if (parsed.errors.length > 0) {
    notify(ctx, parsed.errors.join("\n"), "warning");
    notify(ctx, ADD_USAGE, "info");
    return;
  }

  if (!parsed.identifier) {
    notify(ctx, ADD_USAGE, "info");
    return;
  }

  await addToManaged(parsed.identifier, ctx, pi, { category: parsed.category });
}

async function showManagedPackages(ctx: ExtensionCommandContext): Promise<void> {
  const entries = await tryOperation(ctx, () => readManagedEntries(), "Failed to read managed packages");
  if (!entries) return;

  const lines = CATEGORIES.map((category) => {
    const list = entries.get(category);
    if (list === undefined) return `${CATEGORY_LABELS[category]}: (section missing)`;
    return `${CATEGORY_LABELS[category]}: ${list.length > 0 ? list.join(", ") : "(empty)"}`;
  });

  formatListOutput(ctx, `Managed packages (${formatHomePath(getNixpkgsPaths().packagesFile)})`, lines);
}

async function handleCategoryCommand(tokens: string[], ctx: ExtensionCommandContext): Promise<void> {
  const requested = tokens[0]?.toLowerCase();

  if (!requested) {
    const settings = await loadSettings();
    notify(ctx, `Default category: ${settings.defaultCategory} (available: ${describeCategories()})`, "info");
    return;
  }

  if (!isCategory(requested)) {
    notify(ctx, `Unknown category: ${requested}. Choose one of: ${describeCategories()}`, "warning");
    return;
  }

  const saved = await tryOperation(
    ctx,
    async () => {
      await saveSettings({ defaultCategory: requested });
      return true;
    },
    "Failed to save settings"
  );
  if (saved) {
    notify(ctx, `Default category set to ${CATEGORY_LABELS[requested]}`, "info");
  }
}

async function initManagedFlake(ctx: ExtensionCommandContext): Promise<void> {
  const created = await tryOperation(ctx, () => ensureManagedFlake(), "Failed to create managed flake");
  if (!created) return;

  const location = formatHomePath(getNixpkgsPaths().managedDir);
  notify(
    ctx,
    created.length > 0
      ? `Created ${created.map((path) => formatHomePath(path)).join(", ")}`
      : `Managed flake already present at ${location}`,
    "info"
  );
}

function showHistory(tokens: string[], ctx: ExtensionCommandContext): void {
  const parsed = parseHistoryArgs(tokens);

  if (parsed.errors.length > 0) {
    notify(ctx, parsed.errors.join("\n"), "warning");
    return;
  }

  const changes = querySessionChanges(ctx, parsed.filters);
  if (changes.length === 0) {
    notify(ctx, "No matching Nix package changes in this session.", "info");
    return;
  }

  formatListOutput(ctx, `Nix package history (recent ${changes.length})`, changes.map(formatChangeEntry));
}

export async function executeNixCommand(args: string, ctx: ExtensionCommandContext, pi: ExtensionAPI): Promise<void> {
  const tokens = tokenizeArgs(args);

  if (tokens.length === 0) {
    await runSearchCommand("", ctx, pi);
    return;
  }

  const resolved = resolveCommand(tokens);
  if (resolved) {
    await COMMAND_DEFINITIONS[resolved.id].run(resolved.args, ctx, pi);
    return;
  }

  // Anything else is a search query
  await runSearchCommand(args, ctx, pi);
}

export default function nixPackages(pi: ExtensionAPI) {
  pi.registerCommand("nix", {
    description: "Search Nix packages, install them, or add them to a managed flake",
    getArgumentCompletions: getAutocompleteItems,
    handler: async (args, ctx) => {
      try {
        await executeNixCommand(args, ctx, pi);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        notify(ctx, `Error: ${message}`, "error");
      }
    },
  });

  pi.on("session_start", (_event, ctx) => {
    // Defer file work so it does not interfere with extension loading
    setImmediate(() => {
      ensureManagedFlake()
        .then((created) => {
          if (created.length > 0) {
            notify(ctx, `Created managed flake at ${formatHomePath(getNixpkgsPaths().managedDir)}`, "info");
          }
          updateNixpkgsStatus(ctx);
        })
        .catch((error: unknown) => {
          console.warn("[nixpkgs] Failed to create managed flake:", error);
        });
    });
  });
}

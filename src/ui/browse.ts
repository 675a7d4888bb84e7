/**
 * Search results browser and package detail panel
 */
import type { ExtensionAPI, ExtensionCommandContext } from "@mariozechner/pi-coding-agent";
import { DynamicBorder } from "@mariozechner/pi-coding-agent";
import { Container, SelectList, Text, type SelectItem } from "@mariozechner/pi-tui";
import { UI } from "../constants.js";
import type { BrowseAction, BrowseState, DetailAction, PackageRecord } from "../types/index.js";
import { installNixPackage } from "../actions/install.js";
import { addToManaged } from "../actions/managed.js";
import { copyFlakeEntry } from "../actions/clipboard.js";
import { NixSearchError, searchNixPackages } from "../search/client.js";
import {
  formatDetailText,
  formatSummaryTable,
  getAttrName,
  toDetailFields,
  toSummaryRow,
} from "../search/projector.js";
import { dynamicTruncate, truncate } from "../utils/format.js";
import { runExclusive } from "../utils/mode.js";
import { notify } from "../utils/notify.js";
import { getSearchAuthHeader, loadSettings } from "../utils/settings.js";
import { updateNixpkgsStatus } from "../utils/status.js";
import { formatListOutput } from "../utils/ui-helpers.js";
import { formatDetailTitle, formatResultLabel, getActionIcon } from "./theme.js";

/**
 * Run one search and report the outcome. Returns undefined when the search
 * failed (or another search is still running), [] when nothing matched.
 */
export async function runSearch(
  query: string,
  ctx: ExtensionCommandContext
): Promise<PackageRecord[] | undefined> {
  return runExclusive(ctx, "search", async () => {
    const settings = await loadSettings();
    notify(ctx, `Searching for '${truncate(query, 40)}'...`, "info");

    try {
      const records = await searchNixPackages(query, {
        url: settings.searchUrl,
        timeoutMs: settings.searchTimeoutMs,
        authorization: getSearchAuthHeader(),
      });

      updateNixpkgsStatus(ctx, { query, resultCount: records.length });
      if (records.length === 0) {
        notify(ctx, `No packages found for: ${query}`, "warning");
      } else {
        notify(ctx, `Found ${records.length} packages`, "info");
      }
      return records;
    } catch (error) {
      updateNixpkgsStatus(ctx, { query, resultCount: 0 });
      if (error instanceof NixSearchError) {
        notify(ctx, error.message, "error");
        return undefined;
      }
      throw error;
    }
  });
}

async function selectBrowseAction(
  ctx: ExtensionCommandContext,
  state: BrowseState
): Promise<BrowseAction> {
  const items: SelectItem[] = state.records.map((record, index) => {
    const row = toSummaryRow(record);
    return {
      value: `pkg:${index}`,
      label: formatResultLabel(ctx.ui.theme, row),
      description: dynamicTruncate(row.description || "No description", 40),
    };
  });

  items.push({ value: "nav:refresh", label: `${getActionIcon(ctx.ui.theme, "refresh")} Refresh search` });
  items.push({ value: "nav:search", label: `${getActionIcon(ctx.ui.theme, "search")} New search` });

  const titleText = `Nix packages: ${truncate(state.query, 40)} (${state.records.length})`;

  const action = await ctx.ui.custom<BrowseAction | undefined>((tui, theme, _keybindings, done) => {
    const container = new Container();
    container.addChild(new DynamicBorder((s: string) => theme.fg("accent", s)));
    container.addChild(new Text(theme.fg("accent", theme.bold(titleText)), 1, 0));

    const selectList = new SelectList(items, Math.min(items.length, UI.maxListHeight), {
      selectedPrefix: (t) => theme.fg("accent", t),
      selectedText: (t) => theme.fg("accent", t),
      description: (t) => theme.fg("muted", t),
      scrollInfo: (t) => theme.fg("dim", t),
      noMatch: (t) => theme.fg("warning", t),
    });

    selectList.onSelect = (item) => {
      if (item.value === "nav:refresh") {
        done({ type: "refresh" });
      } else if (item.value === "nav:search") {
        done({ type: "search" });
      } else if (item.value.startsWith("pkg:")) {
        done({ type: "package", index: Number(item.value.slice(4)) });
      } else {
        done(undefined);
      }
    };
    selectList.onCancel = () => done(undefined);

    container.addChild(selectList);
    container.addChild(new Text(theme.fg("dim", "↑↓ navigate • enter details • esc close"), 1, 0));
    container.addChild(new DynamicBorder((s: string) => theme.fg("accent", s)));

    return {
      render: (w: number) => container.render(w),
      invalidate: () => container.invalidate(),
      handleInput: (data: string) => {
        selectList.handleInput(data);
        tui.requestRender();
      },
    };
  });

  return action ?? { type: "cancel" };
}

async function selectDetailAction(ctx: ExtensionCommandContext, record: PackageRecord): Promise<DetailAction> {
  const row = toSummaryRow(record);
  const detailText = formatDetailText(toDetailFields(record));

  const items: SelectItem[] = [
    { value: "install", label: `${getActionIcon(ctx.ui.theme, "install")} Install now` },
    { value: "managed", label: `${getActionIcon(ctx.ui.theme, "managed")} Add to managed` },
    { value: "copy", label: `${getActionIcon(ctx.ui.theme, "copy")} Copy flake entry` },
    { value: "back", label: `${getActionIcon(ctx.ui.theme, "back")} Back to results` },
  ];

  const action = await ctx.ui.custom<DetailAction | undefined>((tui, theme, _keybindings, done) => {
    const container = new Container();
    container.addChild(new DynamicBorder((s: string) => theme.fg("accent", s)));
    container.addChild(new Text(formatDetailTitle(theme, row), 1, 0));
    container.addChild(new Text(detailText, 1, 1));

    const selectList = new SelectList(items, items.length, {
      selectedPrefix: (t) => theme.fg("accent", t),
      selectedText: (t) => theme.fg("accent", t),
      description: (t) => theme.fg("muted", t),
      scrollInfo: (t) => theme.fg("dim", t),
      noMatch: (t) => theme.fg("warning", t),
    });

    selectList.onSelect = (item) => {
      switch (item.value) {
        case "install":
          done({ type: "install" });
          return;
        case "managed":
          done({ type: "managed" });
          return;
        case "copy":
          done({ type: "copy" });
          return;
        case "back":
          done({ type: "back" });
          return;
        default:
          done(undefined);
      }
    };
    selectList.onCancel = () => done({ type: "back" });

    container.addChild(selectList);
    container.addChild(new DynamicBorder((s: string) => theme.fg("accent", s)));

    return {
      render: (w: number) => container.render(w),
      invalidate: () => container.invalidate(),
      handleInput: (data: string) => {
        selectList.handleInput(data);
        tui.requestRender();
      },
    };
  });

  return action ?? { type: "cancel" };
}

/**
 * Detail panel loop: stays on the package after each action until the user
 * goes back. Returns false when the whole browser should close.
 */
async function showPackageDetails(
  record: PackageRecord,
  ctx: ExtensionCommandContext,
  pi: ExtensionAPI
): Promise<boolean> {
  const attrName = getAttrName(record) ?? "";

  for (;;) {
    const action = await selectDetailAction(ctx, record);

    switch (action.type) {
      case "install":
        await installNixPackage(attrName, ctx, pi);
        break;
      case "managed":
        await addToManaged(attrName, ctx, pi);
        break;
      case "copy":
        await copyFlakeEntry(record, ctx, pi);
        break;
      case "back":
        return true;
      case "cancel":
        return false;
    }
  }
}

export async function promptSearchQuery(ctx: ExtensionCommandContext): Promise<string | undefined> {
  const query = await ctx.ui.input("Search Nix packages", "e.g. python, firefox, git, rust");
  return query?.trim() || undefined;
}

export async function browseNixPackages(
  query: string,
  ctx: ExtensionCommandContext,
  pi: ExtensionAPI
): Promise<void> {
  const records = await runSearch(query, ctx);
  if (!records || records.length === 0) return;

  const state: BrowseState = { query, records };

  for (;;) {
    const action = await selectBrowseAction(ctx, state);

    switch (action.type) {
      case "package": {
        const record = state.records[action.index];
        if (!record) break;
        state.selected = record;
        if (!(await showPackageDetails(record, ctx, pi))) return;
        break;
      }
      case "refresh": {
        const refreshed = await runSearch(state.query, ctx);
        if (refreshed && refreshed.length > 0) {
          state.records = refreshed;
          state.selected = undefined;
        }
        break;
      }
      case "search": {
        const next = await promptSearchQuery(ctx);
        if (!next) break;
        const found = await runSearch(next, ctx);
        if (found && found.length > 0) {
          state.query = next;
          state.records = found;
          state.selected = undefined;
        }
        break;
      }
      case "cancel":
        return;
    }
  }
}

/**
 * Print-mode search: aligned table of summary rows
 */
export async function printSearchResults(query: string, ctx: ExtensionCommandContext): Promise<void> {
  const records = await runSearch(query, ctx);
  if (!records || records.length === 0) return;

  formatListOutput(ctx, `Nix packages matching "${query}"`, formatSummaryTable(records.map(toSummaryRow)));
}

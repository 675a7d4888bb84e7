/**
 * Shared command/choice parsing helpers
 */
import { isCategory, type Category } from "../constants.js";
import { CHANGE_ACTIONS, type ChangeAction, type HistoryFilters } from "./history.js";

export function tokenizeArgs(input: string): string[] {
  return input.trim().split(/\s+/).filter(Boolean);
}

export interface ParsedAddArgs {
  identifier: string;
  category?: Category;
  errors: string[];
}

/**
 * `add <attr> [--category <name> | -c <name>]`
 */
export function parseAddArgs(tokens: string[]): ParsedAddArgs {
  const identifiers: string[] = [];
  const errors: string[] = [];
  let category: Category | undefined;

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i] ?? "";

    if (token === "--category" || token === "-c") {
      const value = tokens[i + 1];
      i++;
      if (!value) {
        errors.push(`${token} requires a value`);
      } else if (!isCategory(value)) {
        errors.push(`Unknown category: ${value}`);
      } else {
        category = value;
      }
      continue;
    }

    if (token.startsWith("--category=")) {
      const value = token.slice("--category=".length);
      if (isCategory(value)) {
        category = value;
      } else {
        errors.push(`Unknown category: ${value}`);
      }
      continue;
    }

    identifiers.push(token);
  }

  if (identifiers.length > 1) {
    errors.push(`Expected one package, got: ${identifiers.join(" ")}`);
  }

  return {
    identifier: identifiers[0] ?? "",
    ...(category ? { category } : {}),
    errors,
  };
}

interface HistoryParseState {
  filters: HistoryFilters;
  errors: string[];
}

type HistoryOptionHandler = (tokens: string[], index: number, state: HistoryParseState) => number;

const HISTORY_OPTION_HANDLERS: Record<string, HistoryOptionHandler> = {
  "--limit": (tokens, index, state) => {
    const value = tokens[index + 1];
    if (!value) {
      state.errors.push("--limit requires a number");
      return 0;
    }

    const parsed = Number.parseInt(value, 10);
    if (!Number.isFinite(parsed) || parsed <= 0) {
      state.errors.push(`Invalid --limit value: ${value}`);
    } else {
      state.filters.limit = parsed;
    }
    return 1;
  },
  "--action": (tokens, index, state) => {
    const value = tokens[index + 1];
    if (!value) {
      state.errors.push("--action requires a value");
      return 0;
    }

    const action = CHANGE_ACTIONS.find((candidate: ChangeAction) => candidate === value);
    if (!action) {
      state.errors.push(`Invalid --action value: ${value}`);
    } else {
      state.filters.action = action;
    }
    return 1;
  },
  "--failed": (_tokens, _index, state) => {
    if (state.filters.success === true) {
      state.errors.push("Use either --success or --failed, not both");
    }
    state.filters.success = false;
    return 0;
  },
  "--success": (_tokens, _index, state) => {
    if (state.filters.success === false) {
      state.errors.push("Use either --success or --failed, not both");
    }
    state.filters.success = true;
    return 0;
  },
  "--package": (tokens, index, state) => {
    const value = tokens[index + 1];
    if (!value) {
      state.errors.push("--package requires a value");
      return 0;
    }
    state.filters.packageQuery = value;
    return 1;
  },
};

export function parseHistoryArgs(tokens: string[]): HistoryParseState {
  const state: HistoryParseState = { filters: { limit: 20 }, errors: [] };

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i] ?? "";
    const handler = HISTORY_OPTION_HANDLERS[token];

    if (!handler) {
      state.errors.push(`Unknown history option: ${token}`);
      continue;
    }

    i += handler(tokens, i, state);
  }

  return state;
}

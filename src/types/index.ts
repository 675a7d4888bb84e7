/**
 * Core types and interfaces for pi-nixpkgs
 */

/**
 * One search hit's `_source`. The index schema is not guaranteed, so every
 * field is read through a narrowing accessor.
 */
export type PackageRecord = Record<string, unknown>;

export interface SummaryRow {
  name: string;
  version: string;
  description: string;
}

export interface DetailFields {
  name: string;
  version: string;
  description: string;
  programs: string;
  license: string;
  platforms: string;
  homepage: string;
}

export interface MultiMatchQuery {
  multi_match: {
    query: string;
    fields: string[];
  };
}

export interface TermFilter {
  term: Record<string, { value: string }>;
}

export type SortClause = Record<string, "asc" | "desc">;

export interface SearchQuery {
  from: number;
  size: number;
  query: {
    bool: {
      must: MultiMatchQuery[];
      filter: TermFilter[];
    };
  };
  sort: SortClause[];
}

export type FailureKind =
  | "network"
  | "no-results"
  | "section-not-found"
  | "duplicate"
  | "tool-missing"
  | "tool-failure";

export type ToolOutcome =
  | { ok: true; tool: string }
  | { ok: false; kind: Extract<FailureKind, "tool-missing" | "tool-failure">; error: string };

export type AddEntryResult =
  | { added: true; text: string }
  | { added: false; text: string; reason: Extract<FailureKind, "duplicate" | "section-not-found"> };

/**
 * Explicit browse state owned by the command handler; passed down rather
 * than kept in module-level fields.
 */
export interface BrowseState {
  query: string;
  records: PackageRecord[];
  selected?: PackageRecord | undefined;
}

export type BrowseAction =
  | { type: "package"; index: number }
  | { type: "refresh" }
  | { type: "search" }
  | { type: "cancel" };

export type DetailAction =
  | { type: "install" }
  | { type: "managed" }
  | { type: "copy" }
  | { type: "back" }
  | { type: "cancel" };

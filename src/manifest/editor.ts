/**
 * Text-level editing of the managed packages.nix manifest.
 *
 * A category block looks like `<category> = with pkgs; [ ... ];`. The editor
 * never parses Nix; it finds the block header with a pattern, scans to the
 * first `];` outside a `#` comment, works on the bracket body, and splices
 * the result back so every other byte stays as it was.
 */
import { CATEGORIES, type Category } from "../constants.js";
import type { AddEntryResult } from "../types/index.js";

export class ManifestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ManifestError";
  }
}

interface SectionMatch {
  /** Offset of the first character after `[` */
  bodyStart: number;
  /** Offset of the closing `]` */
  bodyEnd: number;
  body: string;
  /** Leading whitespace of the line holding the category header */
  headerIndent: string;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Offset of the `]` in the first `];` at or after `from`, skipping `#`
 * comments, or -1 when the block is never closed.
 */
function findClosingBracket(text: string, from: number): number {
  for (let i = from; i < text.length; i++) {
    const ch = text[i];
    if (ch === "#") {
      const newline = text.indexOf("\n", i);
      if (newline < 0) return -1;
      i = newline;
    } else if (ch === "]" && text[i + 1] === ";") {
      return i;
    }
  }
  return -1;
}

function findSection(text: string, category: string): SectionMatch | undefined {
  const header = new RegExp(
    `(?<![\\w.-])${escapeRegExp(category)}\\s*=\\s*[^\\[\\];#]*(?:;[^\\[\\];#]*)?\\[`,
    "g"
  );

  for (const match of text.matchAll(header)) {
    const index = match.index ?? 0;
    const lineStart = text.lastIndexOf("\n", index) + 1;
    const linePrefix = text.slice(lineStart, index);
    // Header inside a comment
    if (linePrefix.includes("#")) continue;

    const bodyStart = index + match[0].length;
    const bodyEnd = findClosingBracket(text, bodyStart);
    if (bodyEnd < 0) return undefined;

    const headerIndent = /^[ \t]*/.exec(linePrefix)?.[0] ?? "";
    return { bodyStart, bodyEnd, body: text.slice(bodyStart, bodyEnd), headerIndent };
  }

  return undefined;
}

/**
 * Active identifiers of a block body: `#` comments dropped, remaining text
 * split on whitespace and commas.
 */
export function parseEntries(body: string): string[] {
  return body
    .split("\n")
    .map((line) => line.replace(/#.*$/, ""))
    .flatMap((line) => line.split(/[\s,]+/))
    .filter(Boolean);
}

function entryIndent(section: SectionMatch): string {
  for (const line of section.body.split("\n").slice(1)) {
    if (line.trim()) {
      return /^[ \t]*/.exec(line)?.[0] ?? "";
    }
  }
  return `${closingIndent(section)}  `;
}

function closingIndent(section: SectionMatch): string {
  const lastNewline = section.body.lastIndexOf("\n");
  if (lastNewline < 0) return section.headerIndent;

  const tail = section.body.slice(lastNewline + 1);
  return tail.trim() ? section.headerIndent : tail;
}

/**
 * Append `identifier` to the `category` block.
 *
 * Returns the input unchanged with `reason: "section-not-found"` when the
 * block is missing, or `reason: "duplicate"` when the identifier is already
 * an active entry of that block.
 */
export function addEntry(text: string, category: Category, identifier: string): AddEntryResult {
  const id = identifier.trim();
  if (!id) {
    throw new ManifestError("Package identifier must not be empty");
  }

  const section = findSection(text, category);
  if (!section) {
    return { added: false, text, reason: "section-not-found" };
  }

  if (parseEntries(section.body).includes(id)) {
    return { added: false, text, reason: "duplicate" };
  }

  const indent = entryIndent(section);
  const newBody = `${section.body.trimEnd()}\n${indent}${id}\n${closingIndent(section)}`;

  return {
    added: true,
    text: text.slice(0, section.bodyStart) + newBody + text.slice(section.bodyEnd),
  };
}

/**
 * Active entries of one category, or undefined when the block is missing.
 */
export function listEntries(text: string, category: Category): string[] | undefined {
  const section = findSection(text, category);
  return section ? parseEntries(section.body) : undefined;
}

export function listAllEntries(text: string): Map<Category, string[] | undefined> {
  const result = new Map<Category, string[] | undefined>();
  for (const category of CATEGORIES) {
    result.set(category, listEntries(text, category));
  }
  return result;
}

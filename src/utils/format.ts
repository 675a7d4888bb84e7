/**
 * Formatting utilities
 */
import { homedir } from "node:os";
import { relative, sep } from "node:path";

export function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text;
  return text.slice(0, maxLength - 3) + "...";
}

/**
 * Get the terminal width, with a minimum fallback
 */
export function getTerminalWidth(minWidth = 80): number {
  return Math.max(minWidth, process.stdout.columns || minWidth);
}

/**
 * Dynamic truncate that adapts to available terminal width
 * @param reservedSpace - Space taken by fixed elements (name, version, etc.)
 */
export function dynamicTruncate(text: string, reservedSpace: number, minWidth = 80): string {
  const maxDescWidth = Math.max(20, getTerminalWidth(minWidth) - reservedSpace);
  return truncate(text, maxDescWidth);
}

/**
 * `~/...` form of a path under the home directory; other paths unchanged.
 */
export function formatHomePath(path: string, home: string = homedir()): string {
  const rel = relative(home, path);
  if (!rel || rel.startsWith("..") || rel.startsWith(sep)) return path;
  return `~/${rel.split(sep).join("/")}`;
}

export function pluralize(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? "" : "s"}`;
}

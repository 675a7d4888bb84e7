/**
 * Projection of raw search records into list rows and the detail panel.
 */
import { PROJECTION } from "../constants.js";
import type { DetailFields, PackageRecord, SummaryRow } from "../types/index.js";
import { truncate } from "../utils/format.js";

function readString(record: PackageRecord, key: string): string | undefined {
  const value = record[key];
  return typeof value === "string" ? value : undefined;
}

function readStringList(record: PackageRecord, key: string): string[] {
  const value = record[key];
  if (!Array.isArray(value)) return [];
  return value.filter((item): item is string => typeof item === "string");
}

function readLicenseNames(record: PackageRecord): string[] {
  const value = record.package_license;
  if (!Array.isArray(value)) return [];

  return value.map((license: unknown) => {
    if (license && typeof license === "object" && "fullName" in license) {
      const { fullName } = license;
      if (typeof fullName === "string") return fullName;
    }
    return "Unknown";
  });
}

export function getAttrName(record: PackageRecord): string | undefined {
  const name = readString(record, "package_attr_name")?.trim();
  return name || undefined;
}

/**
 * Join the first `limit` items with ", "; the rest are counted in a
 * ` (+N more)` suffix. Empty input yields `placeholder`.
 */
export function joinWithOverflow(items: readonly string[], limit: number, placeholder: string): string {
  if (items.length === 0) return placeholder;

  const shown = items.slice(0, limit).join(", ");
  return items.length > limit ? `${shown} (+${items.length - limit} more)` : shown;
}

export function toSummaryRow(record: PackageRecord): SummaryRow {
  return {
    name: readString(record, "package_attr_name") ?? "N/A",
    version: readString(record, "package_pversion") ?? "N/A",
    description: truncate(readString(record, "package_description") ?? "", PROJECTION.summaryDescriptionMax),
  };
}

export function toDetailFields(record: PackageRecord): DetailFields {
  return {
    name: readString(record, "package_attr_name") ?? "N/A",
    version: readString(record, "package_pversion") ?? "N/A",
    description: readString(record, "package_description") ?? "No description available",
    programs: joinWithOverflow(readStringList(record, "package_programs"), PROJECTION.programsShown, "None"),
    license: joinWithOverflow(readLicenseNames(record), PROJECTION.licensesShown, "N/A"),
    platforms: joinWithOverflow(
      readStringList(record, "package_platforms"),
      PROJECTION.platformsShown,
      "All platforms"
    ),
    homepage: readStringList(record, "package_homepage")[0] ?? readString(record, "package_homepage") ?? "N/A",
  };
}

export function formatDetailText(fields: DetailFields): string {
  const lines = [
    `Package:     ${fields.name}`,
    `Version:     ${fields.version}`,
    "",
    "Description:",
    `  ${fields.description}`,
    "",
    `Programs:    ${fields.programs}`,
    `License:     ${fields.license}`,
    `Platforms:   ${fields.platforms}`,
    `Homepage:    ${fields.homepage}`,
    "",
    "Direct install:",
    `  $ nix profile install nixpkgs#${fields.name}`,
    "Flake usage:",
    `  environment.systemPackages = [ pkgs.${fields.name} ];`,
    "Shell environment:",
    `  $ nix shell nixpkgs#${fields.name}`,
  ];
  return lines.join("\n");
}

/**
 * One-line `pkgs.<attr>` entry for pasting into a flake's package list, with
 * the description as a trailing comment when there is one.
 */
export function formatFlakeEntry(record: PackageRecord): string {
  const name = getAttrName(record) ?? "";
  const description = (readString(record, "package_description") ?? "")
    .trim()
    .slice(0, PROJECTION.snippetDescriptionMax);
  return description ? `    pkgs.${name}  # ${description}` : `    pkgs.${name}`;
}

export function formatSummaryTable(rows: readonly SummaryRow[]): string[] {
  const header: SummaryRow = { name: "Package", version: "Version", description: "Description" };
  const all = [header, ...rows];
  const nameWidth = Math.max(...all.map((row) => row.name.length));
  const versionWidth = Math.max(...all.map((row) => row.version.length));

  return all.map((row) =>
    `${row.name.padEnd(nameWidth)}  ${row.version.padEnd(versionWidth)}  ${row.description}`.trimEnd()
  );
}

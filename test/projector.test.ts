import test from "node:test";
import assert from "node:assert/strict";
import {
  formatDetailText,
  formatFlakeEntry,
  formatSummaryTable,
  joinWithOverflow,
  toDetailFields,
  toSummaryRow,
} from "../src/search/projector.js";

void test("toSummaryRow reads name and version and defaults the description", () => {
  const row = toSummaryRow({ package_attr_name: "python3Packages.pytest", package_pversion: "7.4.0" });

  assert.deepEqual(row, { name: "python3Packages.pytest", version: "7.4.0", description: "" });
});

void test("toSummaryRow falls back to N/A for missing or mistyped fields", () => {
  assert.deepEqual(toSummaryRow({ package_pversion: 7 }), { name: "N/A", version: "N/A", description: "" });
});

void test("summary descriptions over 60 characters are cut to 57 plus an ellipsis", () => {
  const long = "a".repeat(61);
  const row = toSummaryRow({ package_attr_name: "x", package_description: long });

  assert.equal(row.description, `${"a".repeat(57)}...`);
  assert.equal(row.description.length, 60);
});

void test("summary descriptions of exactly 60 characters are kept", () => {
  const exact = "b".repeat(60);

  assert.equal(toSummaryRow({ package_description: exact }).description, exact);
});

void test("joinWithOverflow counts hidden items", () => {
  assert.equal(joinWithOverflow(["a", "b", "c", "d", "e", "f", "g"], 5, "None"), "a, b, c, d, e (+2 more)");
  assert.equal(joinWithOverflow(["a", "b"], 5, "None"), "a, b");
  assert.equal(joinWithOverflow([], 5, "None"), "None");
});

void test("toDetailFields shows five programs and counts the rest", () => {
  const fields = toDetailFields({
    package_attr_name: "busybox",
    package_programs: ["ls", "cp", "mv", "rm", "cat", "sh", "vi"],
  });

  assert.equal(fields.programs, "ls, cp, mv, rm, cat (+2 more)");
});

void test("toDetailFields fills placeholders for a sparse record", () => {
  assert.deepEqual(toDetailFields({ package_attr_name: "hello" }), {
    name: "hello",
    version: "N/A",
    description: "No description available",
    programs: "None",
    license: "N/A",
    platforms: "All platforms",
    homepage: "N/A",
  });
});

void test("toDetailFields reads licenses, platforms and the first homepage", () => {
  const fields = toDetailFields({
    package_attr_name: "ripgrep",
    package_pversion: "14.1.0",
    package_description: "Line-oriented search tool",
    package_license: [{ fullName: "MIT License" }, { fullName: "The Unlicense" }, { spdxId: "X" }, { fullName: "Z" }],
    package_platforms: ["x86_64-linux", "aarch64-linux"],
    package_homepage: ["https://example.org/rg", "https://example.org/other"],
  });

  assert.equal(fields.license, "MIT License, The Unlicense, Unknown (+1 more)");
  assert.equal(fields.platforms, "x86_64-linux, aarch64-linux");
  assert.equal(fields.homepage, "https://example.org/rg");
  assert.equal(fields.description, "Line-oriented search tool");
});

void test("toDetailFields accepts a single homepage string", () => {
  assert.equal(toDetailFields({ package_homepage: "https://example.org" }).homepage, "https://example.org");
});

void test("formatDetailText includes the install and flake snippets", () => {
  const lines = formatDetailText(toDetailFields({ package_attr_name: "jq", package_pversion: "1.7" })).split("\n");

  assert.equal(lines[0], "Package:     jq");
  assert.equal(lines[1], "Version:     1.7");
  assert.ok(lines.includes("  $ nix profile install nixpkgs#jq"));
  assert.ok(lines.includes("  environment.systemPackages = [ pkgs.jq ];"));
  assert.ok(lines.includes("  $ nix shell nixpkgs#jq"));
});

void test("formatFlakeEntry cuts the description to 50 characters", () => {
  const entry = formatFlakeEntry({ package_attr_name: "python3Packages.pytest", package_description: "c".repeat(70) });

  assert.equal(entry, `    pkgs.python3Packages.pytest  # ${"c".repeat(50)}`);
});

void test("formatFlakeEntry leaves out the comment when there is no description", () => {
  assert.equal(formatFlakeEntry({ package_attr_name: "jq" }), "    pkgs.jq");
  assert.equal(formatFlakeEntry({ package_attr_name: "jq", package_description: "   " }), "    pkgs.jq");
});

void test("formatSummaryTable aligns columns under a header", () => {
  const lines = formatSummaryTable([
    { name: "git", version: "2.44.0", description: "Version control" },
    { name: "gitui", version: "0.26", description: "" },
  ]);

  assert.deepEqual(lines, [
    "Package  Version  Description",
    "git      2.44.0   Version control",
    "gitui    0.26",
  ]);
});

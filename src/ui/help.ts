/**
 * Help display
 */
import type { ExtensionCommandContext } from "@mariozechner/pi-coding-agent";
import { describeCategories } from "../utils/settings.js";

export function showHelp(ctx: ExtensionCommandContext): void {
  const lines = [
    "Nix Packages Help",
    "",
    "Browser:",
    "  ↑↓           Navigate results",
    "  Enter        Open package details",
    "  Esc          Back / close",
    "",
    "Package details actions:",
    "  Install now        nix profile install nixpkgs#<attr>",
    "  Add to managed     Append to the managed packages.nix",
    "  Copy flake entry   pkgs.<attr> line via xclip or wl-copy",
    "",
    "Commands:",
    "  /nix                          Prompt for a search",
    "  /nix search <query>           Search packages",
    "  /nix install <attr>           Install into your Nix profile",
    "  /nix add <attr> [-c <cat>]    Add to the managed package list",
    "  /nix copy <attr>              Copy a flake entry to the clipboard",
    "  /nix managed                  Show managed packages by category",
    "  /nix category [name]          Show or set the default category",
    "  /nix init                     Create the managed flake if missing",
    "  /nix history [opts]           Show changes (--limit n, --failed, --action a)",
    "",
    `Categories: ${describeCategories()}`,
  ];

  const output = lines.join("\n");
  if (ctx.hasUI) {
    ctx.ui.notify(output, "info");
  } else {
    console.log(output);
  }
}

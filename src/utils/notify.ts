/**
 * Notifications that work in both interactive and print mode
 */
import type { ExtensionCommandContext, ExtensionContext } from "@mariozechner/pi-coding-agent";

export type NotifyLevel = "info" | "warning" | "error";

export function notify(
  ctx: ExtensionCommandContext | ExtensionContext,
  message: string,
  level: NotifyLevel = "info"
): void {
  if (ctx.hasUI) {
    ctx.ui.notify(message, level);
    return;
  }

  if (level === "error") {
    console.error(message);
  } else {
    console.log(message);
  }
}

export function success(ctx: ExtensionCommandContext | ExtensionContext, message: string): void {
  notify(ctx, `✓ ${message}`, "info");
}

export function error(ctx: ExtensionCommandContext | ExtensionContext, message: string): void {
  notify(ctx, message, "error");
}

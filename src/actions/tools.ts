/**
 * External tool access through pi.exec
 */
import type { ExtensionAPI } from "@mariozechner/pi-coding-agent";
import { TIMEOUTS } from "../constants.js";
import type { ToolOutcome } from "../types/index.js";

export interface ToolStrategy {
  tool: string;
  run: () => Promise<ToolOutcome>;
}

export type AvailabilityCheck = (tool: string) => Promise<boolean>;

/**
 * `command -v` probe; a failed probe counts as "not installed".
 */
export function createAvailabilityCheck(pi: ExtensionAPI, cwd: string): AvailabilityCheck {
  return async (tool) => {
    try {
      const res = await pi.exec("sh", ["-c", 'command -v "$1"', "sh", tool], {
        timeout: TIMEOUTS.toolProbe,
        cwd,
      });
      return res.code === 0;
    } catch {
      return false;
    }
  };
}

/**
 * Try strategies in order, skipping tools that are not installed, and stop at
 * the first one that succeeds. When every installed tool fails, the last
 * failure is returned; when none is installed, a `tool-missing` outcome.
 */
export async function runFirstAvailable(
  strategies: readonly ToolStrategy[],
  isAvailable: AvailabilityCheck
): Promise<ToolOutcome> {
  let lastFailure: ToolOutcome | undefined;

  for (const strategy of strategies) {
    if (!(await isAvailable(strategy.tool))) continue;

    const outcome = await strategy.run();
    if (outcome.ok) return { ok: true, tool: strategy.tool };
    lastFailure = outcome;
  }

  return (
    lastFailure ?? {
      ok: false,
      kind: "tool-missing",
      error: `None of ${strategies.map((s) => s.tool).join(", ")} is installed`,
    }
  );
}

/**
 * Run one command and map its exit status to a ToolOutcome.
 */
export async function runTool(
  pi: ExtensionAPI,
  command: string,
  args: string[],
  options: { cwd: string; timeout: number; errorLimit?: number }
): Promise<ToolOutcome> {
  try {
    const res = await pi.exec(command, args, { timeout: options.timeout, cwd: options.cwd });
    if (res.code === 0) {
      return { ok: true, tool: command };
    }

    const detail = res.stderr.trim() || res.stdout.trim() || (res.killed ? "Timed out" : "Unknown error");
    return {
      ok: false,
      kind: "tool-failure",
      error: options.errorLimit ? detail.slice(0, options.errorLimit) : detail,
    };
  } catch (error) {
    return {
      ok: false,
      kind: "tool-failure",
      error: error instanceof Error ? error.message : String(error),
    };
  }
}

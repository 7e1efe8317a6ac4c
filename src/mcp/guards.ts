import type { McpConfig } from "./config.ts";
import { McpToolError } from "./errors.ts";

/** Generations spend account credits; pool changes alter which accounts serve traffic. */
const CONFIRM_WORDS = {
  generate: "RUN",
  pool: "APPLY",
} as const;

export type GuardedAction = keyof typeof CONFIRM_WORDS;

export function assertConfirmed(config: McpConfig, action: GuardedAction, confirm?: string): void {
  const word = CONFIRM_WORDS[action];
  if (!config.requireConfirm || confirm === word) return;
  throw new McpToolError("VALIDATION_ERROR", `This tool requires explicit confirmation: set "confirm" to "${word}".`);
}

export function confirmHint(action: GuardedAction): string {
  return `Set to "${CONFIRM_WORDS[action]}" to proceed`;
}

export type LoopOutcome = { status: "stopped" } | { status: "failed"; error: Error };

export const STOPPED: LoopOutcome = { status: "stopped" };

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === "AbortError";
}

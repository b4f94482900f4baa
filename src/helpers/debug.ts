import { appendFileSync } from "node:fs";
import type { PortfolioConfig } from "../config.js";

export type DebugLog = {
  (scope: string, payload: Readonly<Record<string, unknown>>): void;
  /** Message of the write error that switched the log off, if any. */
  failure(): string | null;
};

type DebugLogOptions = Pick<PortfolioConfig, "debug" | "debugLogPath">;

export function createDebugLog(
  options: DebugLogOptions,
  now: () => Date = () => new Date(),
): DebugLog {
  const lastSnapshotByScope = new Map<string, string>();
  let enabled = options.debug;
  let failure: string | null = null;

  const log = (scope: string, payload: Readonly<Record<string, unknown>>): void => {
    if (!enabled) return;

    const serialized = JSON.stringify(payload);
    if (lastSnapshotByScope.get(scope) === serialized) return;
    lastSnapshotByScope.set(scope, serialized);

    try {
      appendFileSync(
        options.debugLogPath,
        `${JSON.stringify({
          ts: now().toISOString(),
          scope,
          ...payload,
        })}\n`,
      );
    } catch (error) {
      enabled = false;
      failure = error instanceof Error ? error.message : String(error);
    }
  };

  return Object.assign(log, { failure: () => failure });
}

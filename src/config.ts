import { tmpdir } from "node:os";
import { join } from "node:path";

export type ExecutionMode = "inline" | "worker";

export type PortfolioConfig = Readonly<{
  tickMs: number;
  fpsCap: number;
  introStepMs: number;
  idleLoopMs: number;
  background: boolean;
  executionMode: ExecutionMode;
  debug: boolean;
  debugLogPath: string;
}>;

type Env = Readonly<Record<string, string | undefined>>;

function readBoundedInt(raw: string | undefined, fallback: number, min: number, max: number): number {
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || !Number.isInteger(value)) return fallback;
  if (value < min) return min;
  if (value > max) return max;
  return value;
}

export function resolveConfig(env: Env = process.env): PortfolioConfig {
  return Object.freeze({
    tickMs: readBoundedInt(env.PORTFOLIO_TICK_MS, 120, 16, 5000),
    fpsCap: readBoundedInt(env.PORTFOLIO_FPS_CAP, 30, 1, 120),
    introStepMs: readBoundedInt(env.PORTFOLIO_INTRO_STEP_MS, 500, 1, 60_000),
    idleLoopMs: readBoundedInt(env.PORTFOLIO_IDLE_LOOP_MS, 2000, 1, 600_000),
    background: env.PORTFOLIO_BACKGROUND !== "0",
    executionMode: env.PORTFOLIO_EXECUTION_MODE === "worker" ? "worker" : "inline",
    debug: env.PORTFOLIO_DEBUG === "1",
    debugLogPath: env.PORTFOLIO_DEBUG_LOG ?? join(tmpdir(), "terminal-portfolio.log"),
  });
}

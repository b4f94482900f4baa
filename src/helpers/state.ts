import type { IntroTiming, PortfolioAction, PortfolioCatalog, PortfolioState } from "../types.js";
import { nextBackground } from "./background.js";
import { advanceIntro, initialPhase, skipIntro } from "./intro.js";
import { applyNavigation } from "./navigation.js";

export const DEFAULT_TIMING: IntroTiming = Object.freeze({ stepMs: 500, idleLoopMs: 2000 });

type Viewport = Readonly<{
  cols: number;
  rows: number;
}>;

export type InitialStateOptions = Readonly<{
  catalog: PortfolioCatalog;
  timing?: IntroTiming;
  viewport?: Viewport;
}>;

function clamp(value: number, min: number, max: number): number {
  if (value < min) return min;
  if (value > max) return max;
  return value;
}

function toPositiveInt(value: number | undefined, fallback: number): number {
  if (
    typeof value !== "number" ||
    !Number.isFinite(value) ||
    !Number.isInteger(value) ||
    value <= 0
  ) {
    return fallback;
  }
  return value;
}

function resolveViewport(cols: number, rows: number): Viewport {
  return Object.freeze({
    cols: clamp(toPositiveInt(cols, 100), 40, 500),
    rows: clamp(toPositiveInt(rows, 30), 12, 200),
  });
}

export function createInitialState(nowMs: number, options: InitialStateOptions): PortfolioState {
  const viewport = resolveViewport(options.viewport?.cols ?? 100, options.viewport?.rows ?? 30);
  return Object.freeze({
    phase: initialPhase(),
    lastTransitionMs: nowMs,
    introFinalized: false,
    selectedIndex: 0,
    lockedIn: false,
    scrollOffset: 0,
    background: "a",
    titleIndex: 0,
    viewportCols: viewport.cols,
    viewportRows: viewport.rows,
    timing: options.timing ?? DEFAULT_TIMING,
    catalog: options.catalog,
  });
}

function applyTick(previous: PortfolioState, nowMs: number): PortfolioState {
  const advanced = advanceIntro(previous, nowMs);
  if (!advanced.introFinalized) return advanced;
  return { ...advanced, background: nextBackground(advanced.background) };
}

function applyViewport(previous: PortfolioState, cols: number, rows: number): PortfolioState {
  const viewport = resolveViewport(cols, rows);
  if (previous.viewportCols === viewport.cols && previous.viewportRows === viewport.rows) {
    return previous;
  }
  return { ...previous, viewportCols: viewport.cols, viewportRows: viewport.rows };
}

export function reducePortfolioState(
  previous: PortfolioState,
  action: PortfolioAction,
): PortfolioState {
  if (action.type === "tick") return applyTick(previous, action.nowMs);
  if (action.type === "skip-intro") return skipIntro(previous, action.nowMs);
  if (action.type === "navigate") return applyNavigation(previous, action.command);
  if (action.type === "apply-viewport") return applyViewport(previous, action.cols, action.rows);
  return previous;
}

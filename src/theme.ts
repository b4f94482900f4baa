import { darkTheme, rgb } from "@rezi-ui/core";
import type { IntroArt, IntroPhase } from "./types.js";

export const PRODUCT_NAME = "terminal-portfolio";
export const APP_THEME = darkTheme;

export const COLORS = Object.freeze({
  cyan: rgb(0, 170, 170),
  lightCyan: rgb(85, 255, 255),
  yellow: rgb(170, 170, 0),
  lightYellow: rgb(255, 255, 85),
  red: rgb(170, 0, 0),
  lightRed: rgb(255, 85, 85),
  green: rgb(0, 170, 0),
  lightGreen: rgb(85, 255, 85),
  magenta: rgb(170, 0, 170),
  white: rgb(255, 255, 255),
  gray: rgb(170, 170, 170),
  darkGray: rgb(85, 85, 85),
  panel: rgb(28, 30, 36),
  link: rgb(95, 175, 255),
});

export const MOSAIC_PALETTE: readonly number[] = Object.freeze([
  rgb(32, 24, 48),
  rgb(18, 36, 44),
  rgb(44, 30, 22),
]);

type IntroFrame = Readonly<{
  lines: readonly string[];
  color: number;
}>;

/** Art block and tint for an intro phase; neighbouring steps alternate dim and bright. */
export function introFrame(phase: IntroPhase, art: IntroArt): IntroFrame {
  if (phase.kind === "intro-start") return { lines: art.first, color: COLORS.cyan };
  if (phase.kind === "intro-idle") return { lines: art.pressAnyKey, color: COLORS.lightGreen };
  if (phase.kind === "introduction") {
    if (phase.step === 0) return { lines: art.first, color: COLORS.lightCyan };
    if (phase.step === 1) return { lines: art.second, color: COLORS.yellow };
    if (phase.step === 2) return { lines: art.second, color: COLORS.lightYellow };
    if (phase.step === 3) return { lines: art.third, color: COLORS.red };
    if (phase.step === 4) return { lines: art.third, color: COLORS.lightRed };
    if (phase.step === 5) return { lines: art.pressAnyKey, color: COLORS.lightGreen };
  }
  return { lines: art.pressAnyKey, color: COLORS.green };
}

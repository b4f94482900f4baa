import type { VNode } from "@rezi-ui/core";
import type { PortfolioState } from "../types.js";
import { renderBrowserScreen } from "./browser-screen.js";
import { renderIntroScreen } from "./intro-screen.js";

export type ScreenOptions = Readonly<{
  showBackground: boolean;
}>;

export function renderPortfolio(state: PortfolioState, options: ScreenOptions): VNode {
  if (state.phase.kind === "active") return renderBrowserScreen(state, options.showBackground);
  return renderIntroScreen(state);
}

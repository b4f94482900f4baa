import type { NavigationCommand, PortfolioState } from "../types.js";
import { lineCount } from "./content.js";

function clamp(value: number, min: number, max: number): number {
  if (value < min) return min;
  if (value > max) return max;
  return value;
}

export function maxScrollOffset(state: PortfolioState): number {
  return Math.max(0, lineCount(state.catalog.entries[state.selectedIndex]) - 1);
}

function selectIndex(state: PortfolioState, index: number): PortfolioState {
  const lastIndex = Math.max(0, state.catalog.entries.length - 1);
  const selectedIndex = clamp(index, 0, lastIndex);
  if (selectedIndex === state.selectedIndex) return state;
  return { ...state, selectedIndex, scrollOffset: 0 };
}

function scrollBy(state: PortfolioState, delta: number): PortfolioState {
  const scrollOffset = clamp(state.scrollOffset + delta, 0, maxScrollOffset(state));
  if (scrollOffset === state.scrollOffset) return state;
  return { ...state, scrollOffset };
}

/** Menu and content navigation; only meaningful once the intro is over. */
export function applyNavigation(state: PortfolioState, command: NavigationCommand): PortfolioState {
  if (state.phase.kind !== "active") return state;

  if (command === "lock-in") {
    return state.lockedIn ? state : { ...state, lockedIn: true };
  }

  if (command === "unlock") {
    return state.lockedIn ? { ...state, lockedIn: false } : state;
  }

  if (command === "move-up") {
    return state.lockedIn ? scrollBy(state, -1) : selectIndex(state, state.selectedIndex - 1);
  }

  if (command === "move-down") {
    return state.lockedIn ? scrollBy(state, 1) : selectIndex(state, state.selectedIndex + 1);
  }

  if (command === "cycle-title") {
    const count = state.catalog.titles.length;
    if (count <= 1) return state;
    return { ...state, titleIndex: (state.titleIndex + 1) % count };
  }

  return state;
}

import { activePhase } from "../helpers/intro.js";
import { createInitialState } from "../helpers/state.js";
import type { PortfolioCatalog, PortfolioEntry, PortfolioState } from "../types.js";

function entryBody(index: number, lines: number): string {
  return Array.from({ length: lines }, (_, line) => `entry ${String(index)} line ${String(line)}`).join(
    "\n",
  );
}

export function makeCatalog(entryCount = 7, linesPerEntry = 12): PortfolioCatalog {
  const entries: PortfolioEntry[] = [];
  for (let index = 0; index < entryCount; index++) {
    entries.push({
      id: `entry-${String(index)}`,
      label: `Entry ${String(index)}`,
      body: entryBody(index, linesPerEntry),
    });
  }
  return {
    titles: ["First Title", "Second Title", "Third Title"],
    entries,
    art: {
      first: ["ART-ONE"],
      second: ["ART-TWO"],
      third: ["ART-THREE"],
      pressAnyKey: ["PRESS ANY KEY"],
    },
  };
}

export function introState(nowMs = 0, catalog = makeCatalog()): PortfolioState {
  return createInitialState(nowMs, { catalog });
}

export function activeState(catalog = makeCatalog()): PortfolioState {
  return { ...introState(0, catalog), phase: activePhase(), introFinalized: true };
}

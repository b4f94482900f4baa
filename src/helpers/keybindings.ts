import type { NavigationCommand } from "../types.js";

export type PortfolioCommand = NavigationCommand | "quit";

export const COMMAND_BY_KEY: Readonly<Record<string, PortfolioCommand>> = Object.freeze({
  up: "move-up",
  k: "move-up",
  down: "move-down",
  j: "move-down",
  enter: "lock-in",
  escape: "unlock",
  t: "cycle-title",
  q: "quit",
  "ctrl+c": "quit",
});

export function resolvePortfolioCommand(key: string): PortfolioCommand | undefined {
  const normalized = key.trim().toLowerCase();
  if (!normalized) return undefined;
  return COMMAND_BY_KEY[normalized];
}

export function isNavigationCommand(
  command: PortfolioCommand | undefined,
): command is NavigationCommand {
  return command !== undefined && command !== "quit";
}

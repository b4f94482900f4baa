export type IntroPhase =
  | Readonly<{ kind: "intro-start" }>
  | Readonly<{ kind: "introduction"; step: number }>
  | Readonly<{ kind: "intro-idle" }>
  | Readonly<{ kind: "active" }>;

export type BackgroundCycle = "a" | "b" | "c";

export type NavigationCommand = "move-up" | "move-down" | "lock-in" | "unlock" | "cycle-title";

export type PortfolioEntry = Readonly<{
  id: string;
  label: string;
  body: string;
}>;

export type IntroArt = Readonly<{
  first: readonly string[];
  second: readonly string[];
  third: readonly string[];
  pressAnyKey: readonly string[];
}>;

export type PortfolioCatalog = Readonly<{
  titles: readonly string[];
  entries: readonly PortfolioEntry[];
  art: IntroArt;
}>;

export type IntroTiming = Readonly<{
  stepMs: number;
  idleLoopMs: number;
}>;

export type PortfolioState = Readonly<{
  phase: IntroPhase;
  lastTransitionMs: number;
  introFinalized: boolean;
  selectedIndex: number;
  lockedIn: boolean;
  scrollOffset: number;
  background: BackgroundCycle;
  titleIndex: number;
  viewportCols: number;
  viewportRows: number;
  timing: IntroTiming;
  catalog: PortfolioCatalog;
}>;

export type PortfolioAction =
  | Readonly<{ type: "tick"; nowMs: number }>
  | Readonly<{ type: "skip-intro"; nowMs: number }>
  | Readonly<{ type: "navigate"; command: NavigationCommand }>
  | Readonly<{ type: "apply-viewport"; cols: number; rows: number }>;

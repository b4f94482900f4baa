import type { IntroPhase, PortfolioState } from "../types.js";

export const INTRO_MAX_STEP = 6;

const INTRO_START: IntroPhase = Object.freeze({ kind: "intro-start" });
const INTRO_IDLE: IntroPhase = Object.freeze({ kind: "intro-idle" });
const ACTIVE: IntroPhase = Object.freeze({ kind: "active" });

export function introductionStep(step: number): IntroPhase {
  return Object.freeze({ kind: "introduction", step });
}

export function initialPhase(): IntroPhase {
  return INTRO_START;
}

export function activePhase(): IntroPhase {
  return ACTIVE;
}

export function samePhase(a: IntroPhase, b: IntroPhase): boolean {
  if (a.kind === "introduction" && b.kind === "introduction") return a.step === b.step;
  return a.kind === b.kind;
}

export function nextPhase(phase: IntroPhase): IntroPhase {
  if (phase.kind === "intro-start") return introductionStep(0);
  if (phase.kind === "introduction") {
    return phase.step < INTRO_MAX_STEP ? introductionStep(phase.step + 1) : INTRO_IDLE;
  }
  return phase;
}

export function describePhase(phase: IntroPhase): string {
  return phase.kind === "introduction" ? `introduction(${String(phase.step)})` : phase.kind;
}

/**
 * Timer-driven half of the intro machine. Steps forward once `stepMs` has
 * elapsed, marks the run finalized when the idle fixed point is reached, and
 * replays the tail of the sequence after `idleLoopMs` of idling.
 */
export function advanceIntro(state: PortfolioState, nowMs: number): PortfolioState {
  let next = state;

  if (!next.introFinalized && nowMs - next.lastTransitionMs >= next.timing.stepMs) {
    const upcoming = nextPhase(next.phase);
    next = {
      ...next,
      phase: upcoming,
      introFinalized: samePhase(upcoming, next.phase),
      lastTransitionMs: nowMs,
    };
  }

  if (
    next.introFinalized &&
    next.phase.kind === "intro-idle" &&
    nowMs - next.lastTransitionMs >= next.timing.idleLoopMs
  ) {
    next = {
      ...next,
      phase: introductionStep(INTRO_MAX_STEP - 1),
      introFinalized: false,
      lastTransitionMs: nowMs,
    };
  }

  return next;
}

export function skipIntro(state: PortfolioState, nowMs: number): PortfolioState {
  if (state.phase.kind === "active") return state;
  return {
    ...state,
    phase: ACTIVE,
    introFinalized: true,
    lastTransitionMs: nowMs,
  };
}

import assert from "node:assert/strict";
import test from "node:test";
import {
  INTRO_MAX_STEP,
  activePhase,
  advanceIntro,
  describePhase,
  initialPhase,
  introductionStep,
  nextPhase,
  samePhase,
  skipIntro,
} from "../helpers/intro.js";
import { reducePortfolioState } from "../helpers/state.js";
import type { IntroPhase, PortfolioState } from "../types.js";
import { introState } from "./fixtures.js";

function tickAt(state: PortfolioState, nowMs: number): PortfolioState {
  return reducePortfolioState(state, { type: "tick", nowMs });
}

test("nextPhase walks the intro and settles on the idle fixed point", () => {
  for (let step = 0; step <= INTRO_MAX_STEP; step++) {
    let phase: IntroPhase = introductionStep(step);
    for (let i = 0; i < INTRO_MAX_STEP + 2; i++) phase = nextPhase(phase);
    assert.equal(phase.kind, "intro-idle");
    assert.ok(samePhase(nextPhase(phase), phase));
  }
});

test("nextPhase order", () => {
  assert.deepEqual(nextPhase(initialPhase()), introductionStep(0));
  assert.deepEqual(nextPhase(introductionStep(3)), introductionStep(4));
  assert.equal(nextPhase(introductionStep(INTRO_MAX_STEP)).kind, "intro-idle");
  assert.equal(nextPhase(activePhase()).kind, "active");
});

test("describePhase names the step", () => {
  assert.equal(describePhase(introductionStep(4)), "introduction(4)");
  assert.equal(describePhase(initialPhase()), "intro-start");
});

test("tick advances only once the step threshold has elapsed", () => {
  const initial = introState(0);
  const early = tickAt(initial, 499);
  assert.equal(early.phase.kind, "intro-start");
  assert.equal(early.lastTransitionMs, 0);

  const onTime = tickAt(early, 500);
  assert.deepEqual(onTime.phase, introductionStep(0));
  assert.equal(onTime.lastTransitionMs, 500);
  assert.equal(onTime.introFinalized, false);
});

test("eight ticks reach idle, the ninth finalizes", () => {
  let state = introState(0);
  for (let k = 1; k <= 8; k++) state = tickAt(state, k * 500);
  assert.equal(state.phase.kind, "intro-idle");
  assert.equal(state.introFinalized, false);

  state = tickAt(state, 9 * 500);
  assert.equal(state.phase.kind, "intro-idle");
  assert.equal(state.introFinalized, true);
  assert.equal(state.lastTransitionMs, 4500);
});

test("idling two seconds replays the tail of the intro", () => {
  let state = introState(0);
  for (let k = 1; k <= 9; k++) state = tickAt(state, k * 500);

  const waiting = tickAt(state, 4500 + 1999);
  assert.equal(waiting.phase.kind, "intro-idle");
  assert.equal(waiting.introFinalized, true);

  const looped = tickAt(waiting, 6500);
  assert.deepEqual(looped.phase, introductionStep(5));
  assert.equal(looped.introFinalized, false);
  assert.equal(looped.lastTransitionMs, 6500);

  const replayed = tickAt(tickAt(tickAt(looped, 7000), 7500), 8000);
  assert.equal(replayed.phase.kind, "intro-idle");
  assert.equal(replayed.introFinalized, true);
});

test("any key before the menu skips straight to it", () => {
  const phases: IntroPhase[] = [
    initialPhase(),
    introductionStep(0),
    introductionStep(INTRO_MAX_STEP),
    nextPhase(introductionStep(INTRO_MAX_STEP)),
  ];
  for (const phase of phases) {
    const skipped = skipIntro({ ...introState(0), phase }, 1234);
    assert.equal(skipped.phase.kind, "active");
    assert.equal(skipped.introFinalized, true);
    assert.equal(skipped.lastTransitionMs, 1234);
  }
});

test("skipping while already active changes nothing", () => {
  const active = skipIntro(introState(0), 10);
  assert.equal(skipIntro(active, 99), active);
});

test("active phase is not driven by the timer", () => {
  const active = skipIntro(introState(0), 0);
  const later = advanceIntro(active, 60_000);
  assert.equal(later.phase.kind, "active");
  assert.equal(later.introFinalized, true);
});

import assert from "node:assert/strict";
import test from "node:test";
import { createInitialState, DEFAULT_TIMING, reducePortfolioState } from "../helpers/state.js";
import type { NavigationCommand, PortfolioState } from "../types.js";
import { activeState, introState, makeCatalog } from "./fixtures.js";

function press(state: PortfolioState, command: NavigationCommand, times = 1): PortfolioState {
  let next = state;
  for (let i = 0; i < times; i++) next = reducePortfolioState(next, { type: "navigate", command });
  return next;
}

test("initial state starts the intro with the first entry selected", () => {
  const state = createInitialState(42, { catalog: makeCatalog() });
  assert.equal(state.phase.kind, "intro-start");
  assert.equal(state.lastTransitionMs, 42);
  assert.equal(state.introFinalized, false);
  assert.equal(state.selectedIndex, 0);
  assert.equal(state.lockedIn, false);
  assert.equal(state.scrollOffset, 0);
  assert.equal(state.background, "a");
  assert.deepEqual(state.timing, DEFAULT_TIMING);
});

test("initial state clamps a nonsensical viewport", () => {
  const state = createInitialState(0, {
    catalog: makeCatalog(),
    viewport: { cols: -5, rows: 3 },
  });
  assert.equal(state.viewportCols, 100);
  assert.equal(state.viewportRows, 12);
});

test("skip-intro action jumps to the menu", () => {
  const skipped = reducePortfolioState(introState(0), { type: "skip-intro", nowMs: 10 });
  assert.equal(skipped.phase.kind, "active");
  assert.equal(skipped.introFinalized, true);
});

test("background rotates once per tick after the intro is finalized", () => {
  const intro = reducePortfolioState(introState(0), { type: "tick", nowMs: 100 });
  assert.equal(intro.background, "a");

  const first = reducePortfolioState(activeState(), { type: "tick", nowMs: 100 });
  const second = reducePortfolioState(first, { type: "tick", nowMs: 200 });
  const third = reducePortfolioState(second, { type: "tick", nowMs: 300 });
  assert.equal(first.background, "b");
  assert.equal(second.background, "c");
  assert.equal(third.background, "a");
});

test("apply-viewport stores the new size and ignores repeats", () => {
  const initial = activeState();
  const resized = reducePortfolioState(initial, { type: "apply-viewport", cols: 80, rows: 24 });
  assert.equal(resized.viewportCols, 80);
  assert.equal(resized.viewportRows, 24);

  const same = reducePortfolioState(resized, { type: "apply-viewport", cols: 80, rows: 24 });
  assert.equal(same, resized);
});

test("menu walk, lock in, scroll, unlock", () => {
  const moved = press(activeState(), "move-down", 3);
  assert.equal(moved.selectedIndex, 3);
  assert.equal(moved.scrollOffset, 0);

  const locked = press(moved, "lock-in");
  assert.equal(locked.lockedIn, true);

  const scrolled = press(locked, "move-down", 3);
  assert.equal(scrolled.scrollOffset, 3);
  assert.equal(scrolled.selectedIndex, 3);

  const unlocked = press(scrolled, "unlock");
  assert.equal(unlocked.lockedIn, false);
  assert.equal(unlocked.selectedIndex, 3);
  assert.equal(unlocked.scrollOffset, 3);

  const reselected = press(unlocked, "move-down");
  assert.equal(reselected.selectedIndex, 4);
  assert.equal(reselected.scrollOffset, 0);
});

test("navigation is ignored while the intro runs", () => {
  const intro = introState(0);
  assert.equal(press(intro, "move-down"), intro);
  assert.equal(press(intro, "lock-in"), intro);
});

import type { BackgroundCycle } from "../types.js";

const ORDER: readonly BackgroundCycle[] = Object.freeze(["a", "b", "c"]);

export const MOSAIC_CELLS = 9;

export function nextBackground(cycle: BackgroundCycle): BackgroundCycle {
  const index = ORDER.indexOf(cycle);
  const next = index < 0 ? 0 : (index + 1) % ORDER.length;
  return ORDER[next] ?? "a";
}

/** Palette index for each of the nine mosaic cells, row-major. */
export function mosaicColors(cycle: BackgroundCycle): readonly number[] {
  const shift = Math.max(0, ORDER.indexOf(cycle));
  const out: number[] = [];
  for (let cell = 0; cell < MOSAIC_CELLS; cell++) {
    out.push((cell + shift) % ORDER.length);
  }
  return Object.freeze(out);
}

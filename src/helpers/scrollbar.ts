export const SCROLLBAR_GLYPHS = Object.freeze({
  begin: "↑",
  end: "↓",
  track: "║",
  thumb: "█",
});

export function thumbRow(contentLength: number, position: number, trackHeight: number): number {
  const inner = trackHeight - 2;
  if (inner <= 0) return -1;
  const lastLine = Math.max(0, contentLength - 1);
  const clamped = Math.min(Math.max(0, position), lastLine);
  return 1 + Math.round((clamped / Math.max(1, lastLine)) * (inner - 1));
}

/** One glyph per row of a vertical scrollbar with arrow caps. */
export function buildScrollbar(
  contentLength: number,
  position: number,
  trackHeight: number,
): readonly string[] {
  const height = Math.max(0, Math.trunc(trackHeight));
  if (height < 3) return Object.freeze(Array.from({ length: height }, () => SCROLLBAR_GLYPHS.track));

  const thumb = thumbRow(contentLength, position, height);
  const glyphs: string[] = [];
  for (let row = 0; row < height; row++) {
    if (row === 0) glyphs.push(SCROLLBAR_GLYPHS.begin);
    else if (row === height - 1) glyphs.push(SCROLLBAR_GLYPHS.end);
    else if (row === thumb) glyphs.push(SCROLLBAR_GLYPHS.thumb);
    else glyphs.push(SCROLLBAR_GLYPHS.track);
  }
  return Object.freeze(glyphs);
}

import type { VNode } from "@rezi-ui/core";
import { ui } from "@rezi-ui/core";
import { describePhase } from "../helpers/intro.js";
import { introFrame } from "../theme.js";
import type { PortfolioState } from "../types.js";

export function renderIntroScreen(state: PortfolioState): VNode {
  const frame = introFrame(state.phase, state.catalog.art);

  return ui.column(
    {
      key: "intro-root",
      width: "full",
      height: "full",
      align: "center",
      justify: "center",
      gap: 0,
    },
    [
      ui.column(
        { key: `intro-art-${describePhase(state.phase)}`, gap: 0 },
        frame.lines.map((line, index) =>
          ui.text(line, {
            key: `intro-line-${String(index)}`,
            style: { fg: frame.color, bold: true },
          }),
        ),
      ),
    ],
  );
}

import type { VNode } from "@rezi-ui/core";
import { ui } from "@rezi-ui/core";
import { mosaicColors } from "../helpers/background.js";
import { isLinkLine, splitContentLines } from "../helpers/content.js";
import { buildScrollbar } from "../helpers/scrollbar.js";
import { COLORS, MOSAIC_PALETTE } from "../theme.js";
import type { PortfolioState } from "../types.js";

const MENU_WIDTH = 30;
const HEADER_HEIGHT = 2;
const FOOTER_HEIGHT = 1;
const PANEL_BORDER_ROWS = 2;

export const FOOTER_LIST_HELP = "Use ↓↑ to move, Enter to lock in";
export const FOOTER_CONTENT_HELP = "Use ↓↑ to scroll, Esc to return to menu";

export function contentTrackHeight(state: PortfolioState): number {
  return Math.max(0, state.viewportRows - HEADER_HEIGHT - FOOTER_HEIGHT - PANEL_BORDER_ROWS);
}

function renderHeader(state: PortfolioState): VNode {
  const titles = state.catalog.titles;
  const title = titles[state.titleIndex % titles.length] ?? "";
  return ui.row({ key: "header", height: HEADER_HEIGHT, width: "full", justify: "center", gap: 0 }, [
    ui.text(title, { key: "header-title", style: { bold: true, fg: COLORS.white } }),
  ]);
}

function renderFooter(state: PortfolioState): VNode {
  return ui.row({ key: "footer", height: FOOTER_HEIGHT, width: "full", justify: "center", gap: 0 }, [
    ui.text(state.lockedIn ? FOOTER_CONTENT_HELP : FOOTER_LIST_HELP, {
      key: "footer-help",
      style: { fg: COLORS.gray },
    }),
  ]);
}

function renderMenu(state: PortfolioState): VNode {
  const items = state.catalog.entries.map((entry, index) => {
    const selected = index === state.selectedIndex;
    return ui.text(`${selected ? ">> " : "   "}${entry.label}`, {
      key: `menu-item-${entry.id}`,
      textOverflow: "ellipsis",
      ...(selected ? { style: { fg: COLORS.magenta, bold: true } } : {}),
    });
  });

  return ui.box(
    {
      key: "menu-panel",
      width: MENU_WIDTH,
      border: state.lockedIn ? "none" : "double",
      // Keeps the inner area stable when the border disappears.
      p: state.lockedIn ? 1 : 0,
      style: { bg: COLORS.darkGray, fg: state.lockedIn ? COLORS.gray : COLORS.white },
    },
    [ui.column({ key: "menu-items", gap: 0 }, items)],
  );
}

function renderContentLine(line: string, index: number): VNode {
  if (isLinkLine(line)) {
    return ui.text(line, {
      key: `content-line-${String(index)}`,
      style: { fg: COLORS.link, blink: true, underline: true },
    });
  }
  return ui.text(line, { key: `content-line-${String(index)}` });
}

function renderContent(state: PortfolioState): VNode {
  const entry = state.catalog.entries[state.selectedIndex];
  const lines = splitContentLines(entry?.body ?? "");
  const trackHeight = contentTrackHeight(state);
  const visible = lines.slice(state.scrollOffset, state.scrollOffset + trackHeight);
  const scrollbar = buildScrollbar(lines.length, state.scrollOffset, trackHeight);

  return ui.box(
    {
      key: "content-panel",
      flex: 1,
      ...(entry ? { title: entry.label } : {}),
      border: state.lockedIn ? "double" : "single",
      style: {
        bg: COLORS.panel,
        fg: state.lockedIn ? COLORS.white : COLORS.gray,
      },
    },
    [
      ui.row({ key: "content-row", gap: 0, height: "full" }, [
        ui.column(
          { key: "content-lines", flex: 1, gap: 0 },
          visible.map((line, offset) => renderContentLine(line, state.scrollOffset + offset)),
        ),
        ui.column(
          { key: "content-scrollbar", width: 1, gap: 0 },
          scrollbar.map((glyph, row) =>
            ui.text(glyph, {
              key: `scrollbar-${String(row)}`,
              style: { fg: state.lockedIn ? COLORS.lightCyan : COLORS.darkGray },
            }),
          ),
        ),
      ]),
    ],
  );
}

function renderMosaic(state: PortfolioState): VNode {
  const colors = mosaicColors(state.background);
  const rows = [0, 1, 2].map((row) =>
    ui.row(
      { key: `mosaic-row-${String(row)}`, flex: 1, width: "full", gap: 0 },
      [0, 1, 2].map((column) => {
        const cell = row * 3 + column;
        return ui.box({
          key: `mosaic-cell-${String(cell)}`,
          border: "none",
          flex: 1,
          height: "full",
          style: { bg: MOSAIC_PALETTE[colors[cell] ?? 0] ?? COLORS.panel },
        });
      }),
    ),
  );
  return ui.column({ key: "mosaic", width: "full", height: "full", gap: 0 }, rows);
}

export function renderBrowserScreen(state: PortfolioState, showBackground: boolean): VNode {
  const browser = ui.column({ key: "browser-root", width: "full", height: "full", gap: 0 }, [
    renderHeader(state),
    ui.row({ key: "browser-main", flex: 1, width: "full", gap: 0 }, [
      renderMenu(state),
      renderContent(state),
    ]),
    renderFooter(state),
  ]);

  if (!showBackground) return browser;
  return ui.layers([renderMosaic(state), browser]);
}

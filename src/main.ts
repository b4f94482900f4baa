import { exit } from "node:process";
import type { KeyContext } from "@rezi-ui/core";
import { createNodeApp } from "@rezi-ui/node";
import { resolveConfig } from "./config.js";
import { loadCatalog } from "./helpers/content.js";
import { createDebugLog } from "./helpers/debug.js";
import { describePhase, samePhase } from "./helpers/intro.js";
import {
  type PortfolioCommand,
  isNavigationCommand,
  resolvePortfolioCommand,
} from "./helpers/keybindings.js";
import { createInitialState, reducePortfolioState } from "./helpers/state.js";
import { renderPortfolio } from "./screens/index.js";
import { APP_THEME, PRODUCT_NAME } from "./theme.js";
import type { PortfolioAction, PortfolioCatalog, PortfolioState } from "./types.js";

function describeThrown(error: unknown): string {
  if (error instanceof Error) return `${error.name}: ${error.message}`;
  return String(error);
}

const config = resolveConfig();
const debugLog = createDebugLog(config);

function failStartup(error: unknown): never {
  console.error(`Failed to start ${PRODUCT_NAME}: ${describeThrown(error)}`);
  return exit(1);
}

let catalog: PortfolioCatalog;
try {
  catalog = loadCatalog();
} catch (error) {
  failStartup(error);
}

const app = createNodeApp<PortfolioState>({
  initialState: createInitialState(Date.now(), {
    catalog,
    timing: { stepMs: config.introStepMs, idleLoopMs: config.idleLoopMs },
    viewport: {
      cols: typeof process.stdout.columns === "number" ? process.stdout.columns : 100,
      rows: typeof process.stdout.rows === "number" ? process.stdout.rows : 30,
    },
  }),
  config: { fpsCap: config.fpsCap, executionMode: config.executionMode },
  theme: APP_THEME,
});

debugLog("runtime.bootstrap", {
  product: PRODUCT_NAME,
  pid: process.pid,
  node: process.version,
  tickMs: config.tickMs,
  entries: catalog.entries.length,
  executionMode: config.executionMode,
});

type Transition = Readonly<{ previous: PortfolioState; next: PortfolioState }>;

// Updaters stay free of I/O; transitions are written on the next dispatch.
const pendingTransitions: Transition[] = [];

function flushTransitions(): void {
  for (const { previous, next } of pendingTransitions.splice(0)) {
    if (!samePhase(previous.phase, next.phase)) {
      debugLog("state.phase", {
        from: describePhase(previous.phase),
        to: describePhase(next.phase),
        finalized: next.introFinalized,
      });
    }
    if (previous.lockedIn !== next.lockedIn || previous.selectedIndex !== next.selectedIndex) {
      debugLog("state.navigation", {
        selectedIndex: next.selectedIndex,
        lockedIn: next.lockedIn,
      });
    }
  }
}

function dispatch(action: PortfolioAction): void {
  flushTransitions();
  app.update((previous) => {
    const next = reducePortfolioState(previous, action);
    if (next !== previous) pendingTransitions.push({ previous, next });
    return next;
  });
}

let stopping = false;
let tickTimer: ReturnType<typeof setInterval> | null = null;

function stopTickTimer(): void {
  if (tickTimer !== null) {
    clearInterval(tickTimer);
    tickTimer = null;
  }
}

function startTickTimer(): void {
  stopTickTimer();
  tickTimer = setInterval(() => {
    dispatch({ type: "tick", nowMs: Date.now() });
  }, config.tickMs);
}

async function shutdown(exitCode = 0): Promise<void> {
  if (stopping) return;
  stopping = true;
  stopTickTimer();

  try {
    await app.stop();
  } catch (error) {
    debugLog("runtime.stop", { error: describeThrown(error) });
  }

  flushTransitions();
  app.dispose();

  const logFailure = debugLog.failure();
  if (logFailure !== null) console.error(`debug log disabled: ${logFailure}`);
  exit(exitCode);
}

function applyCommand(command: PortfolioCommand | undefined): void {
  if (!command) return;

  if (command === "quit") {
    void shutdown(0);
    return;
  }

  if (isNavigationCommand(command)) {
    dispatch({ type: "navigate", command });
  }
}

app.view((state) => renderPortfolio(state, { showBackground: config.background }));

// Bindings only match once the intro is over; before that, any key is
// consumed by the skip handler in onEvent.
function whenActive(key: string) {
  return {
    handler: () => applyCommand(resolvePortfolioCommand(key)),
    when: (ctx: KeyContext<PortfolioState>) => ctx.state.phase.kind === "active",
  };
}

app.keys({
  up: whenActive("up"),
  k: whenActive("k"),
  down: whenActive("down"),
  j: whenActive("j"),
  enter: whenActive("enter"),
  escape: whenActive("escape"),
  t: whenActive("t"),
  q: whenActive("q"),
  "ctrl+c": () => applyCommand(resolvePortfolioCommand("ctrl+c")),
});

app.onEvent((event) => {
  if (event.kind === "engine") {
    const engineEvent = event.event;
    if (engineEvent.kind === "resize") {
      debugLog("runtime.viewport", { cols: engineEvent.cols, rows: engineEvent.rows });
      dispatch({ type: "apply-viewport", cols: engineEvent.cols, rows: engineEvent.rows });
      return;
    }
    if (
      (engineEvent.kind === "key" && engineEvent.action === "down") ||
      engineEvent.kind === "text"
    ) {
      dispatch({ type: "skip-intro", nowMs: Date.now() });
    }
    return;
  }

  if (event.kind !== "fatal") return;
  console.error(`fatal: ${event.code}: ${event.detail}`);
  void shutdown(1);
});

const onSignal = () => {
  void shutdown(0);
};

process.once("SIGINT", onSignal);
process.once("SIGTERM", onSignal);

startTickTimer();

try {
  await app.start();
} catch (error) {
  console.error(`Failed to start ${PRODUCT_NAME}: ${describeThrown(error)}`);
  await shutdown(1);
} finally {
  process.off("SIGINT", onSignal);
  process.off("SIGTERM", onSignal);
}

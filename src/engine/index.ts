import { orderCommands } from "./commands";
import { createEmptyBoard } from "./core/board";
import { createPieceQueue } from "./core/queue";
import { createSevenBagRng } from "./core/rng/seeded";
import { InvariantViolationError } from "./errors";
import { spawnPiece } from "./gameplay/spawn";
import { createScoringState } from "./scoring/scoring";
import { createStats } from "./scoring/stats";
import { advancePhysics } from "./step/advance-physics";
import { applyCommands } from "./step/apply-commands";
import { resolveTransitions } from "./step/resolve-transitions";
import { asTick, incrementTick } from "./utils/tick";
import { isDurationMs, seedAsString } from "../types/brands";

import type { Command } from "./commands";
import type { DomainEvent } from "./events";
import type { EngineConfig, GameState, PieceRandomGenerator } from "./types";

export type StepResult = {
  state: GameState;
  events: ReadonlyArray<DomainEvent>;
};

export type InitOptions = {
  // Replaces the seeded 7-bag, e.g. with a SequenceRng in tests
  rng?: PieceRandomGenerator;
};

/**
 * Builds the starting state and spawns the first piece.
 */
export function init(cfg: EngineConfig, opts: InitOptions = {}): StepResult {
  const rng = opts.rng ?? createSevenBagRng(seedAsString(cfg.seed));
  const state: GameState = {
    board: createEmptyBoard({
      height: cfg.boardHeight,
      hiddenRows: cfg.hiddenRows,
      width: cfg.boardWidth,
    }),
    cfg,
    hold: { piece: null, usedThisTurn: false },
    phase: { tag: "Spawning" },
    playTimeMs: 0,
    queue: createPieceQueue(rng, cfg.previewCount),
    scoring: createScoringState(cfg.startLevel),
    softDropOn: false,
    stats: createStats(),
    tick: asTick(0),
  };
  return spawnPiece(state);
}

function pauseTransition(
  state: GameState,
  cmds: ReadonlyArray<Command>,
): StepResult | null {
  const { phase } = state;
  if (phase.tag === "Paused") {
    if (!cmds.some((c) => c.kind === "Resume")) return { events: [], state };
    return {
      events: [{ kind: "Resumed", tick: state.tick }],
      state: { ...state, phase: phase.resume },
    };
  }
  if (phase.tag !== "GameOver" && cmds.some((c) => c.kind === "Pause")) {
    return {
      events: [{ kind: "Paused", tick: state.tick }],
      state: { ...state, phase: { resume: phase, tag: "Paused" } },
    };
  }
  return null;
}

/**
 * One deterministic frame: applies commands in priority order, advances
 * gravity and timers by elapsedMs, then resolves lock, clear and spawn.
 * Pausing or resuming consumes the whole frame and no time passes while
 * paused.
 */
export function step(
  state: GameState,
  cmds: ReadonlyArray<Command>,
  elapsedMs: number,
): StepResult {
  if (!isDurationMs(elapsedMs)) {
    throw new InvariantViolationError(
      "elapsedMs must be a non-negative finite number",
      { elapsedMs },
    );
  }
  if (state.phase.tag === "GameOver") return { events: [], state };

  const paused = pauseTransition(state, cmds);
  if (paused !== null) return paused;

  const a = applyCommands(state, orderCommands(cmds));
  const b = advancePhysics(a.state, a.sideEffects, elapsedMs);
  const c = resolveTransitions(b.state, b.sideEffects);
  const events = [...a.events, ...b.events, ...c.events];

  return {
    events,
    state: {
      ...c.state,
      playTimeMs: c.state.playTimeMs + elapsedMs,
      tick: incrementTick(c.state.tick),
    },
  };
}

/**
 * Advance multiple frames with per-frame command buckets.
 */
export function stepN(
  state: GameState,
  byFrame: ReadonlyArray<ReadonlyArray<Command>>,
  elapsedMs: number,
): StepResult {
  let s = state;
  const all: Array<DomainEvent> = [];
  for (const cmds of byFrame) {
    const r = step(s, cmds, elapsedMs);
    s = r.state;
    all.push(...r.events);
  }
  return { events: all, state: s };
}

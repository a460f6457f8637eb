import { clearFullRows, lockPiece } from "../core/board";
import { isPieceEntirelyInHiddenRows } from "../core/spawning";
import { spawnPiece } from "../gameplay/spawn";
import { scoreLock } from "../scoring/scoring";
import { classifySpin } from "../scoring/spin";
import { recordLock } from "../scoring/stats";
import { durationMsAsNumber } from "../../types/brands";
import { isPiecePhase } from "../types";

import type { DomainEvent } from "../events";
import type { PhysicsSideEffects } from "./advance-physics";
import type { GameState, PiecePhase } from "../types";

/**
 * Commits the piece, clears rows, scores the lock and picks the next phase:
 * game over (lock out or victory), Clearing while the clear delay runs, or
 * Spawning.
 */
function handleLocking(
  state: GameState,
  phase: PiecePhase,
  physFx: PhysicsSideEffects,
): { state: GameState; events: Array<DomainEvent> } {
  const { cfg, tick } = state;
  const events: Array<DomainEvent> = [];
  const { piece } = phase;

  // Corners are judged on the board as it was just before the lock
  const spin = classifySpin(
    state.board,
    piece,
    phase.spin,
    cfg.spinBonusEnabled,
  );
  events.push({
    kind: "Locked",
    pieceId: piece.id,
    source: physFx.hardDropped ? "hardDrop" : "ground",
    spin,
    tick,
  });

  const cleared = clearFullRows(lockPiece(state.board, piece));
  const rows = cleared.rows.length;
  const award = scoreLock(state.scoring, rows, spin, cfg);
  let s: GameState = {
    ...state,
    board: cleared.board,
    scoring: award.scoring,
    stats: recordLock(state.stats, {
      backToBackApplied: award.backToBackApplied,
      combo: award.scoring.combo,
      rows,
      spin,
    }),
  };

  if (rows === 0 && isPieceEntirelyInHiddenRows(piece)) {
    events.push(
      { kind: "TopOut", reason: "lockOut", tick },
      { kind: "GameOver", reason: "lockOut", tick },
    );
    return {
      events,
      state: { ...s, phase: { reason: "lockOut", tag: "GameOver" } },
    };
  }

  if (rows > 0) {
    events.push({
      kind: "LinesCleared",
      points: award.points,
      rows: cleared.rows,
      spin,
      tetris: rows >= 4,
      tick,
    });
  }
  for (const level of award.levelUps) {
    events.push({ kind: "LevelUp", level, tick });
  }

  if (
    cfg.victoryLevel !== null &&
    award.levelUps.length > 0 &&
    award.scoring.level >= cfg.victoryLevel
  ) {
    events.push(
      { kind: "Victory", level: award.scoring.level, tick },
      { kind: "GameOver", reason: "victory", tick },
    );
    return {
      events,
      state: { ...s, phase: { reason: "victory", tag: "GameOver" } },
    };
  }

  s = {
    ...s,
    phase:
      rows > 0 && durationMsAsNumber(cfg.lineClearDelayMs) > 0
        ? { elapsedMs: 0, rows: cleared.rows, tag: "Clearing" }
        : { tag: "Spawning" },
  };
  return { events, state: s };
}

export function resolveTransitions(
  state: GameState,
  physFx: PhysicsSideEffects,
): { state: GameState; events: ReadonlyArray<DomainEvent> } {
  let s = state;
  const events: Array<DomainEvent> = [];

  // 1) Lock path
  if (physFx.lockNow && isPiecePhase(s.phase)) {
    const locked = handleLocking(s, s.phase, physFx);
    s = locked.state;
    events.push(...locked.events);
  }

  // 2) Spawn path
  if (s.phase.tag === "Spawning") {
    const spawned = spawnPiece(s);
    s = spawned.state;
    events.push(...spawned.events);
  }

  return { events, state: s };
}

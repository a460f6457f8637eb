import { tryMove } from "../core/board";
import { framesPerCell } from "./gravity-table";

import type { Board, EngineConfig, FallingPhase } from "../types";

/** Frames per cell in effect: the level's gravity, or soft drop when faster. */
export function effectiveFramesPerCell(
  cfg: EngineConfig,
  level: number,
  softDropOn: boolean,
): number {
  const gravity = framesPerCell(cfg.gravityTable, level);
  return softDropOn ? Math.min(cfg.softDropFramesPerCell, gravity) : gravity;
}

/**
 * Counts one frame toward the next cell and descends when the count reaches
 * the frames-per-cell in effect. Never moves more than one cell per frame.
 */
export function gravityStep(
  cfg: EngineConfig,
  board: Board,
  phase: FallingPhase,
  level: number,
  softDropOn: boolean,
): { phase: FallingPhase; softDropCells: number } {
  const frames = phase.gravityFrames + 1;
  if (frames < effectiveFramesPerCell(cfg, level, softDropOn)) {
    return { phase: { ...phase, gravityFrames: frames }, softDropCells: 0 };
  }

  const moved = tryMove(board, phase.piece, 0, 1);
  if (!moved) {
    return { phase: { ...phase, gravityFrames: frames }, softDropCells: 0 };
  }

  return {
    phase: { ...phase, gravityFrames: 0, piece: moved, spin: null },
    softDropCells: softDropOn ? 1 : 0,
  };
}

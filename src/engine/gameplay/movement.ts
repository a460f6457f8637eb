import {
  dropToBottom,
  isAtBottom,
  moveToWall,
  tryMove,
} from "../core/board";
import { classifyKick, tryRotateWithKickInfo } from "../core/srs";
import {
  type ActivePiece,
  type Board,
  type PiecePhase,
  type RotateDirection,
  type SpinCandidate,
  gridCoordAsNumber,
} from "../types";

type MoveResult = {
  phase: PiecePhase;
  moved: boolean;
  fromX: number;
  toX: number;
};
type RotateResult = {
  phase: PiecePhase;
  rotated: boolean;
  kick: "none" | "wall" | "floor";
  kickIndex: number;
};

function withPiece(
  phase: PiecePhase,
  piece: ActivePiece,
  spin: SpinCandidate | null,
): PiecePhase {
  return { ...phase, piece, spin };
}

// Any successful translation clears the spin candidate
export function shiftPiece(
  board: Board,
  phase: PiecePhase,
  dx: -1 | 1,
): MoveResult {
  const fromX = gridCoordAsNumber(phase.piece.x);
  const moved = tryMove(board, phase.piece, dx, 0);
  if (!moved) {
    return { fromX, moved: false, phase, toX: fromX };
  }
  return {
    fromX,
    moved: true,
    phase: withPiece(phase, moved, null),
    toX: gridCoordAsNumber(moved.x),
  };
}

export function slidePiece(
  board: Board,
  phase: PiecePhase,
  dx: -1 | 1,
): MoveResult {
  const fromX = gridCoordAsNumber(phase.piece.x);
  const moved = moveToWall(board, phase.piece, dx);
  const toX = gridCoordAsNumber(moved.x);
  if (toX === fromX) {
    return { fromX, moved: false, phase, toX };
  }
  return { fromX, moved: true, phase: withPiece(phase, moved, null), toX };
}

/**
 * A rotation that needed a kick and leaves the piece unable to descend marks
 * a spin candidate; any other successful rotation clears it.
 */
export function rotatePiece(
  board: Board,
  phase: PiecePhase,
  direction: RotateDirection,
  spinBonusEnabled: boolean,
): RotateResult {
  const result = tryRotateWithKickInfo(phase.piece, direction, board);
  if (!result.ok) {
    return { kick: "none", kickIndex: -1, phase, rotated: false };
  }

  const spin =
    spinBonusEnabled && result.kickIndex > 0 && isAtBottom(board, result.piece)
      ? { kickIndex: result.kickIndex }
      : null;

  return {
    kick: classifyKick(result.kickIndex, result.kickOffset),
    kickIndex: result.kickIndex,
    phase: withPiece(phase, result.piece, spin),
    rotated: true,
  };
}

export function hardDropPiece(
  board: Board,
  phase: PiecePhase,
): { phase: PiecePhase; distance: number } {
  const dropped = dropToBottom(board, phase.piece);
  const distance =
    gridCoordAsNumber(dropped.y) - gridCoordAsNumber(phase.piece.y);
  if (distance === 0) return { distance, phase };
  return { distance, phase: withPiece(phase, dropped, null) };
}

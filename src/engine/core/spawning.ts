import { canPlacePiece, pieceCells } from "./board";
import { PIECES } from "./pieces";
import {
  type ActivePiece,
  type Board,
  type PieceId,
  createGridCoord,
} from "./types";

// Spawn row of the bounding box: the piece straddles the top hidden row and
// the first visible row.
export const SPAWN_Y = -1;

/**
 * Create a new active piece at spawn position. The bounding box is centred,
 * rounding toward the left wall.
 */
export function createActivePiece(board: Board, pieceId: PieceId): ActivePiece {
  const { boxSize } = PIECES[pieceId];
  return {
    id: pieceId,
    rot: "spawn",
    x: createGridCoord(Math.floor((board.width - boxSize) / 2)),
    y: createGridCoord(SPAWN_Y),
  };
}

export function canSpawnPiece(board: Board, pieceId: PieceId): boolean {
  return canPlacePiece(board, createActivePiece(board, pieceId));
}

/**
 * Check if a piece is entirely within the hidden rows (all cells y < 0).
 * Used for lock-out detection.
 */
export function isPieceEntirelyInHiddenRows(piece: ActivePiece): boolean {
  return pieceCells(piece).every(([, y]) => y < 0);
}

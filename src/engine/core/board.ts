import { OutOfBoundsError } from "../errors";

import { PIECES } from "./pieces";
import {
  type ActivePiece,
  type Board,
  type BoardDimensions,
  createBoardCells,
  createGridCoord,
  gridCoordAsNumber,
  idx,
  isCellBlocked,
  isInsideBoard,
} from "./types";

export function createEmptyBoard(dims: BoardDimensions): Board {
  return {
    cells: createBoardCells(dims),
    height: dims.height,
    hiddenRows: dims.hiddenRows,
    totalHeight: dims.height + dims.hiddenRows,
    width: dims.width,
  };
}

function assertInside(board: Board, x: number, y: number): void {
  if (!isInsideBoard(board, x, y)) {
    throw new OutOfBoundsError(x, y);
  }
}

/**
 * Occupancy of a single stored cell. Coordinates outside the stored grid
 * (hidden rows included) are a caller defect and throw OutOfBoundsError.
 */
export function isOccupied(board: Board, x: number, y: number): boolean {
  assertInside(board, x, y);
  return board.cells[idx(board, createGridCoord(x), createGridCoord(y))] !== 0;
}

// Absolute board cells covered by a piece
export function pieceCells(
  piece: ActivePiece,
): ReadonlyArray<readonly [number, number]> {
  const px = gridCoordAsNumber(piece.x);
  const py = gridCoordAsNumber(piece.y);
  return PIECES[piece.id].cells[piece.rot].map(
    ([dx, dy]) => [px + dx, py + dy] as const,
  );
}

// Check if a piece can be placed at a given position
export function canPlacePiece(board: Board, piece: ActivePiece): boolean {
  for (const [x, y] of pieceCells(piece)) {
    if (isCellBlocked(board, createGridCoord(x), createGridCoord(y))) {
      return false;
    }
  }
  return true;
}

// Check if a piece can move in a given direction
export function canMove(
  board: Board,
  piece: ActivePiece,
  dx: number,
  dy: number,
): boolean {
  return canPlacePiece(board, translate(piece, dx, dy));
}

function translate(piece: ActivePiece, dx: number, dy: number): ActivePiece {
  return {
    ...piece,
    x: createGridCoord(gridCoordAsNumber(piece.x) + dx),
    y: createGridCoord(gridCoordAsNumber(piece.y) + dy),
  };
}

// Return a new position if valid; otherwise null
export function tryMove(
  board: Board,
  piece: ActivePiece,
  dx: number,
  dy: number,
): ActivePiece | null {
  return canMove(board, piece, dx, dy) ? translate(piece, dx, dy) : null;
}

// Move piece as far as possible in a direction (ARR=0 slide)
export function moveToWall(
  board: Board,
  piece: ActivePiece,
  direction: -1 | 1,
): ActivePiece {
  let current = piece;
  while (canMove(board, current, direction, 0)) {
    current = translate(current, direction, 0);
  }
  return current;
}

// Drop piece to its lowest valid position (hard drop)
export function dropToBottom(board: Board, piece: ActivePiece): ActivePiece {
  let current = piece;
  while (canMove(board, current, 0, 1)) {
    current = translate(current, 0, 1);
  }
  return current;
}

// Ghost projection, never mutates board or piece
export function calculateGhostPosition(
  board: Board,
  piece: ActivePiece,
): ActivePiece {
  return dropToBottom(board, piece);
}

// Check if piece is resting on the floor or the stack
export function isAtBottom(board: Board, piece: ActivePiece): boolean {
  return !canMove(board, piece, 0, 1);
}

/**
 * Writes the piece colour into every cell it covers. The caller has already
 * checked canPlacePiece, so no collision test happens here.
 */
export function lockPiece(board: Board, piece: ActivePiece): Board {
  const cells = board.cells.slice();
  const value = PIECES[piece.id].value;
  for (const [x, y] of pieceCells(piece)) {
    cells[idx(board, createGridCoord(x), createGridCoord(y))] = value;
  }
  return { ...board, cells };
}

export function isRowFull(board: Board, y: number): boolean {
  assertInside(board, 0, y);
  for (let x = 0; x < board.width; x++) {
    if (board.cells[idx(board, createGridCoord(x), createGridCoord(y))] === 0) {
      return false;
    }
  }
  return true;
}

// Rows from the floor up to and including the highest occupied cell
export function columnHeight(board: Board, x: number): number {
  assertInside(board, x, 0);
  for (let y = -board.hiddenRows; y < board.height; y++) {
    if (board.cells[idx(board, createGridCoord(x), createGridCoord(y))] !== 0) {
      return board.height - y;
    }
  }
  return 0;
}

// Full rows, top to bottom, hidden rows included
export function getCompletedLines(board: Board): ReadonlyArray<number> {
  const completed: Array<number> = [];
  for (let y = -board.hiddenRows; y < board.height; y++) {
    if (isRowFull(board, y)) completed.push(y);
  }
  return completed;
}

/**
 * Removes the given rows. Every remaining row moves down by the number of
 * removed rows below it, and the rows exposed at the top are empty.
 */
export function clearLines(
  board: Board,
  toClear: ReadonlyArray<number>,
): Board {
  if (toClear.length === 0) return board;

  const cleared = new Set(toClear);
  const cells = createBoardCells(board);
  let dest = board.height - 1;

  for (let y = board.height - 1; y >= -board.hiddenRows; y--) {
    if (cleared.has(y)) continue;
    const from = idx(board, createGridCoord(0), createGridCoord(y));
    const to = idx(board, createGridCoord(0), createGridCoord(dest));
    cells.set(board.cells.subarray(from, from + board.width), to);
    dest--;
  }

  return { ...board, cells };
}

export function clearFullRows(board: Board): {
  board: Board;
  rows: ReadonlyArray<number>;
} {
  const rows = getCompletedLines(board);
  return { board: clearLines(board, rows), rows };
}

import {
  type CellValue,
  type GridCoord,
  gridCoordAsNumber,
} from "../../types/brands";

export {
  type CellValue,
  type GridCoord,
  createCellValue,
  createGridCoord,
  gridCoordAsNumber,
} from "../../types/brands";

export type BoardDimensions = Readonly<{
  width: number;
  height: number; // visible rows 0..height-1
  hiddenRows: number; // rows -hiddenRows..-1 above the visible field
}>;

// Row-major storage, storage row 0 is y = -hiddenRows.
// Treated as immutable: every mutation copies.
export type BoardCells = Uint8Array;

export type Board = {
  readonly width: number;
  readonly height: number;
  readonly hiddenRows: number;
  readonly totalHeight: number;
  readonly cells: BoardCells;
};

export function createBoardCells(dims: BoardDimensions): BoardCells {
  return new Uint8Array((dims.height + dims.hiddenRows) * dims.width);
}

// Helper for array indexing with hidden-row awareness
export function idx(board: Board, x: GridCoord, y: GridCoord): number {
  const storageRow = gridCoordAsNumber(y) + board.hiddenRows; // y = -hidden → 0
  return storageRow * board.width + gridCoordAsNumber(x);
}

export function isInsideBoard(board: Board, x: number, y: number): boolean {
  return (
    Number.isInteger(x) &&
    Number.isInteger(y) &&
    x >= 0 &&
    x < board.width &&
    y >= -board.hiddenRows &&
    y < board.height
  );
}

// Collision check - walls, floor and the space above the hidden rows block
export function isCellBlocked(
  board: Board,
  x: GridCoord,
  y: GridCoord,
): boolean {
  if (!isInsideBoard(board, x, y)) return true;
  return board.cells[idx(board, x, y)] !== 0;
}

// Pieces and rotation
export type PieceId = "I" | "O" | "T" | "S" | "Z" | "J" | "L";
export type Rot = "spawn" | "right" | "two" | "left";
export type RotateDirection = "CW" | "CCW";

export type KickGroup = "JLSTZ" | "I" | "O";

export type PieceShape = {
  readonly id: PieceId;
  readonly cells: Readonly<Record<Rot, ReadonlyArray<readonly [number, number]>>>;
  readonly value: CellValue;
  // Side of the square bounding box the rotation states are drawn in
  readonly boxSize: 3 | 4;
  readonly kickGroup: KickGroup;
};

export type ActivePiece = {
  readonly id: PieceId;
  readonly rot: Rot;
  readonly x: GridCoord;
  readonly y: GridCoord;
};

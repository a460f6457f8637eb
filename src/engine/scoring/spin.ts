import {
  type ActivePiece,
  type Board,
  type Rot,
  type SpinCandidate,
  type SpinKind,
  createGridCoord,
  gridCoordAsNumber,
  isCellBlocked,
} from "../types";

// Corners diagonal to the T centre, as [dx, dy] from the centre
type Corner = readonly [number, number];
const TOP_LEFT: Corner = [-1, -1];
const TOP_RIGHT: Corner = [1, -1];
const BOTTOM_LEFT: Corner = [-1, 1];
const BOTTOM_RIGHT: Corner = [1, 1];
const ALL_CORNERS: ReadonlyArray<Corner> = [
  TOP_LEFT,
  TOP_RIGHT,
  BOTTOM_LEFT,
  BOTTOM_RIGHT,
];

// The two corners on the side the T points to
const FRONT_CORNERS: Readonly<Record<Rot, readonly [Corner, Corner]>> = {
  left: [TOP_LEFT, BOTTOM_LEFT],
  right: [TOP_RIGHT, BOTTOM_RIGHT],
  spawn: [TOP_LEFT, TOP_RIGHT],
  two: [BOTTOM_LEFT, BOTTOM_RIGHT],
};

// Kick index of the last SRS candidate; reaching a spot through it is always a full spin
const LAST_KICK_INDEX = 4;

function isCornerBlocked(board: Board, piece: ActivePiece, c: Corner): boolean {
  // Every T rotation state has its centre at [1, 1] of the bounding box
  const cx = gridCoordAsNumber(piece.x) + 1;
  const cy = gridCoordAsNumber(piece.y) + 1;
  return isCellBlocked(
    board,
    createGridCoord(cx + c[0]),
    createGridCoord(cy + c[1]),
  );
}

/**
 * Classifies a lock. Only pieces still carrying a spin candidate qualify.
 * Walls and the floor count as occupied corners.
 */
export function classifySpin(
  board: Board,
  piece: ActivePiece,
  candidate: SpinCandidate | null,
  enabled: boolean,
): SpinKind {
  if (!enabled || candidate === null) return "none";
  if (piece.id !== "T") return "mini";
  if (candidate.kickIndex === LAST_KICK_INDEX) return "full";

  const occupied = ALL_CORNERS.filter((c) =>
    isCornerBlocked(board, piece, c),
  ).length;
  const [frontA, frontB] = FRONT_CORNERS[piece.rot];
  const frontBlocked =
    isCornerBlocked(board, piece, frontA) &&
    isCornerBlocked(board, piece, frontB);

  return occupied >= 3 && frontBlocked ? "full" : "mini";
}

// SRS (Super Rotation System) wall kick tables
//
// Only adjacent rotation states are reachable in one step; a half turn is two
// quarter turns. Offsets are listed as on the SRS reference (positive y is up)
// and inverted when applied to the y-down grid.
//
// Rotation states: spawn (0°) → right (90°) → two (180°) → left (270°) → spawn

import { canPlacePiece } from "./board";
import { PIECES } from "./pieces";
import {
  type ActivePiece,
  type Board,
  type KickGroup,
  type RotateDirection,
  type Rot,
  createGridCoord,
  gridCoordAsNumber,
} from "./types";

type KickTable = Readonly<
  Record<string, ReadonlyArray<readonly [number, number]>>
>;

export const KICKS_JLSTZ: KickTable = {
  // L -> 0 / 0 -> L
  "left->spawn": [
    [0, 0],
    [-1, 0],
    [-1, -1],
    [0, 2],
    [-1, 2],
  ],
  "left->two": [
    [0, 0],
    [-1, 0],
    [-1, -1],
    [0, 2],
    [-1, 2],
  ],
  "right->spawn": [
    [0, 0],
    [1, 0],
    [1, -1],
    [0, 2],
    [1, 2],
  ],
  // R -> 2 / 2 -> R
  "right->two": [
    [0, 0],
    [1, 0],
    [1, -1],
    [0, 2],
    [1, 2],
  ],
  "spawn->left": [
    [0, 0],
    [1, 0],
    [1, 1],
    [0, -2],
    [1, -2],
  ],
  // 0 -> R / R -> 0
  "spawn->right": [
    [0, 0],
    [-1, 0],
    [-1, 1],
    [0, -2],
    [-1, -2],
  ],
  // 2 -> L / L -> 2
  "two->left": [
    [0, 0],
    [1, 0],
    [1, 1],
    [0, -2],
    [1, -2],
  ],
  "two->right": [
    [0, 0],
    [-1, 0],
    [-1, 1],
    [0, -2],
    [-1, -2],
  ],
};

export const KICKS_I: KickTable = {
  "left->spawn": [
    [0, 0],
    [1, 0],
    [-2, 0],
    [1, -2],
    [-2, 1],
  ],
  "left->two": [
    [0, 0],
    [-2, 0],
    [1, 0],
    [-2, -1],
    [1, 2],
  ],
  "right->spawn": [
    [0, 0],
    [2, 0],
    [-1, 0],
    [2, 1],
    [-1, -2],
  ],
  "right->two": [
    [0, 0],
    [-1, 0],
    [2, 0],
    [-1, 2],
    [2, -1],
  ],
  "spawn->left": [
    [0, 0],
    [-1, 0],
    [2, 0],
    [-1, 2],
    [2, -1],
  ],
  "spawn->right": [
    [0, 0],
    [-2, 0],
    [1, 0],
    [-2, -1],
    [1, 2],
  ],
  "two->left": [
    [0, 0],
    [2, 0],
    [-1, 0],
    [2, 1],
    [-1, -2],
  ],
  "two->right": [
    [0, 0],
    [1, 0],
    [-2, 0],
    [1, -2],
    [-2, 1],
  ],
};

// O never needs a kick: its shape is identical in every state
export const KICKS_O: KickTable = {
  "left->spawn": [[0, 0]],
  "left->two": [[0, 0]],
  "right->spawn": [[0, 0]],
  "right->two": [[0, 0]],
  "spawn->left": [[0, 0]],
  "spawn->right": [[0, 0]],
  "two->left": [[0, 0]],
  "two->right": [[0, 0]],
};

export const KICK_TABLES: Readonly<Record<KickGroup, KickTable>> = {
  I: KICKS_I,
  JLSTZ: KICKS_JLSTZ,
  O: KICKS_O,
};

const NEXT_ROTATION: Readonly<Record<RotateDirection, Record<Rot, Rot>>> = {
  CCW: { left: "two", right: "spawn", spawn: "left", two: "right" },
  CW: { left: "spawn", right: "two", spawn: "right", two: "left" },
};

export function getNextRotation(currentRot: Rot, direction: RotateDirection): Rot {
  return NEXT_ROTATION[direction][currentRot];
}

export function getKickCandidates(
  piece: ActivePiece,
  targetRot: Rot,
): ReadonlyArray<readonly [number, number]> {
  const table = KICK_TABLES[PIECES[piece.id].kickGroup];
  return table[`${piece.rot}->${targetRot}`] ?? [];
}

export type RotateResult =
  | {
      ok: true;
      piece: ActivePiece;
      kickIndex: number;
      kickOffset: readonly [number, number]; // dx, dy in SRS (positive up)
    }
  | { ok: false; reason: "blocked" };

/**
 * Rotates one quarter turn, trying the transition's kick candidates in table
 * order. The first candidate that fits wins; a rejection leaves the input
 * piece untouched.
 */
export function tryRotateWithKickInfo(
  piece: ActivePiece,
  direction: RotateDirection,
  board: Board,
): RotateResult {
  const targetRot = getNextRotation(piece.rot, direction);
  const kicks = getKickCandidates(piece, targetRot);

  for (let i = 0; i < kicks.length; i++) {
    const kickOffset = kicks[i];
    if (kickOffset === undefined) continue;

    const [dx, dy] = kickOffset;
    // Invert dy to account for y-down coordinate system
    const kicked: ActivePiece = {
      id: piece.id,
      rot: targetRot,
      x: createGridCoord(gridCoordAsNumber(piece.x) + dx),
      y: createGridCoord(gridCoordAsNumber(piece.y) - dy),
    };

    if (canPlacePiece(board, kicked)) {
      return { kickIndex: i, kickOffset, ok: true, piece: kicked };
    }
  }

  return { ok: false, reason: "blocked" };
}

/**
 * Classifies kick type based on kick index from SRS table
 * - Index 0: No kick (basic rotation)
 * - Floor kicks involve upward movement (positive y in SRS offsets)
 */
export function classifyKick(
  kickIndex: number,
  kickOffset: readonly [number, number],
): "none" | "wall" | "floor" {
  if (kickIndex === 0) return "none";
  if (kickOffset[1] > 0) return "floor";
  return "wall";
}

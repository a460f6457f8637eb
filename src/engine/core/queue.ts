import { type PieceRandomGenerator } from "./rng/interface";
import { type PieceId } from "./types";

export const BAG_SIZE = 7;

export type PieceQueue = Readonly<{
  pieces: ReadonlyArray<PieceId>;
  rng: PieceRandomGenerator;
  previewCount: number;
}>;

// Append whole bags until the preview plus the next piece are available
function refill(queue: PieceQueue): PieceQueue {
  let pieces = queue.pieces;
  let rng = queue.rng;
  while (pieces.length < queue.previewCount + 1) {
    const bag = rng.draw(BAG_SIZE);
    pieces = [...pieces, ...bag.pieces];
    rng = bag.rest;
  }
  return pieces === queue.pieces ? queue : { ...queue, pieces, rng };
}

export function createPieceQueue(
  rng: PieceRandomGenerator,
  previewCount: number,
): PieceQueue {
  return refill({ pieces: [], previewCount, rng });
}

/** Pops the front piece and tops the queue back up. */
export function nextPiece(queue: PieceQueue): {
  piece: PieceId;
  queue: PieceQueue;
} {
  const filled = refill(queue);
  const [piece, ...rest] = filled.pieces;
  if (piece === undefined) {
    throw new Error("Piece queue is empty after refill");
  }
  return { piece, queue: refill({ ...filled, pieces: rest }) };
}

/** The next n pieces, without consuming anything. */
export function peekPieces(
  queue: PieceQueue,
  n: number,
): ReadonlyArray<PieceId> {
  return queue.pieces.slice(0, Math.max(0, n));
}

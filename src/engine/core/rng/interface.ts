import { type PieceId } from "../types";

/** Pieces handed out by one draw, and the generator to draw from next. */
export type PieceDraw = Readonly<{
  pieces: ReadonlyArray<PieceId>;
  rest: PieceRandomGenerator;
}>;

/**
 * Immutable piece source behind the queue. A draw never changes the
 * generator it was called on, so replaying a state replays its pieces.
 */
export type PieceRandomGenerator = {
  draw(count: number): PieceDraw;
};

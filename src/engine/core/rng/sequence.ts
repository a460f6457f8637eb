import { type PieceDraw, type PieceRandomGenerator } from "./interface";
import { type PieceId } from "../types";

// Deals a fixed script of pieces, starting over at the end
export class SequenceRng implements PieceRandomGenerator {
  private readonly script: ReadonlyArray<PieceId>;

  constructor(
    script: ReadonlyArray<PieceId>,
    private readonly offset = 0,
  ) {
    if (script.length === 0) {
      throw new Error("SequenceRng needs at least one piece");
    }
    this.script = script;
  }

  draw(count: number): PieceDraw {
    const n = this.script.length;
    const pieces: Array<PieceId> = [];
    for (let i = 0; i < count; i++) {
      const piece = this.script[(this.offset + i) % n];
      if (piece === undefined) throw new Error("SequenceRng lost its place");
      pieces.push(piece);
    }
    return {
      pieces,
      rest: new SequenceRng(this.script, (this.offset + count) % n),
    };
  }
}

import { canPlacePiece } from "../core/board";
import { nextPiece } from "../core/queue";
import { createActivePiece } from "../core/spawning";

import type { DomainEvent } from "../events";
import type { GameState, PieceId } from "../types";

/**
 * Single entry point for every spawn. Without an explicit piece the next one
 * is drawn from the queue and the hold flag is cleared; a piece coming out of
 * hold leaves the flag alone. A blocked spawn position ends the game.
 */
export function spawnPiece(
  state: GameState,
  pieceId?: PieceId,
): { state: GameState; events: ReadonlyArray<DomainEvent> } {
  let id: PieceId;
  let queue = state.queue;
  let hold = state.hold;

  if (pieceId !== undefined) {
    id = pieceId;
  } else {
    const drawn = nextPiece(state.queue);
    id = drawn.piece;
    queue = drawn.queue;
    hold = { ...hold, usedThisTurn: false };
  }

  const piece = createActivePiece(state.board, id);
  if (!canPlacePiece(state.board, piece)) {
    return {
      events: [
        { kind: "TopOut", reason: "blockOut", tick: state.tick },
        { kind: "GameOver", reason: "blockOut", tick: state.tick },
      ],
      state: {
        ...state,
        hold,
        phase: { reason: "blockOut", tag: "GameOver" },
        queue,
      },
    };
  }

  return {
    events: [{ kind: "PieceSpawned", pieceId: id, tick: state.tick }],
    state: {
      ...state,
      hold,
      phase: {
        gravityFrames: 0,
        lockElapsedMs: 0,
        lockFloorY: null,
        lockResets: 0,
        piece,
        spin: null,
        tag: "Falling",
      },
      queue,
    },
  };
}

import { nextPiece } from "../core/queue";
import { spawnPiece } from "./spawn";

import type { DomainEvent } from "../events";
import type { GameState, PieceId } from "../types";

/**
 * Hold is only honoured for a falling piece, once per spawn. An empty slot
 * takes the current piece and the next queued piece spawns; otherwise the two
 * swap. The incoming piece goes through normal spawn placement.
 */
export function tryHold(state: GameState): {
  state: GameState;
  events: ReadonlyArray<DomainEvent>;
  held: boolean;
} {
  const { phase } = state;
  if (
    !state.cfg.holdEnabled ||
    phase.tag !== "Falling" ||
    state.hold.usedThisTurn
  ) {
    return { events: [], held: false, state };
  }

  const current = phase.piece.id;
  let incoming: PieceId;
  let queue = state.queue;
  if (state.hold.piece === null) {
    const drawn = nextPiece(state.queue);
    incoming = drawn.piece;
    queue = drawn.queue;
  } else {
    incoming = state.hold.piece;
  }

  const swapped = state.hold.piece !== null;
  const spawned = spawnPiece(
    {
      ...state,
      hold: { piece: current, usedThisTurn: true },
      queue,
      stats: { ...state.stats, holds: state.stats.holds + 1 },
    },
    incoming,
  );

  return {
    events: [
      { kind: "Held", pieceId: current, swapped, tick: state.tick },
      ...spawned.events,
    ],
    held: true,
    state: spawned.state,
  };
}

import { tryHold } from "../gameplay/hold";
import {
  hardDropPiece,
  rotatePiece,
  shiftPiece,
  slidePiece,
} from "../gameplay/movement";
import { registerLockReset } from "../physics/lock-delay";
import { HARD_DROP_POINTS_PER_CELL } from "../scoring/scoring";
import { assertNever, isPiecePhase } from "../types";

import type { Command } from "../commands";
import type { DomainEvent } from "../events";
import type { GameState, PiecePhase } from "../types";

export type CommandSideEffects = {
  hardDropped: boolean;
  // A lock reset happened this frame; the lock timer does not advance
  lockReset: boolean;
};

type CommandResult = {
  state: GameState;
  events: ReadonlyArray<DomainEvent>;
  hardDropped?: boolean;
  lockReset?: boolean;
};

/**
 * Stores a moved or rotated piece. While locking, the move restarts the lock
 * timer if resets remain.
 */
function commitPieceMove(
  state: GameState,
  phase: PiecePhase,
  reason: "move" | "rotate",
  events: Array<DomainEvent>,
): CommandResult {
  if (phase.tag !== "Locking") {
    return { events, state: { ...state, phase } };
  }
  const r = registerLockReset(phase, state.cfg.maxLockResets);
  if (r.reset) {
    events.push({
      kind: "LockReset",
      reason,
      resets: r.phase.lockResets,
      tick: state.tick,
    });
  }
  return { events, lockReset: r.reset, state: { ...state, phase: r.phase } };
}

function handleShift(
  state: GameState,
  phase: PiecePhase,
  dx: -1 | 1,
  toWall: boolean,
): CommandResult {
  const r = toWall
    ? slidePiece(state.board, phase, dx)
    : shiftPiece(state.board, phase, dx);
  if (!r.moved) return { events: [], state };
  return commitPieceMove(state, r.phase, "move", [
    {
      fromX: r.fromX,
      kind: dx < 0 ? "MovedLeft" : "MovedRight",
      tick: state.tick,
      toX: r.toX,
    },
  ]);
}

function handleRotation(
  state: GameState,
  phase: PiecePhase,
  dir: "CW" | "CCW",
): CommandResult {
  const r = rotatePiece(state.board, phase, dir, state.cfg.spinBonusEnabled);
  if (!r.rotated) return { events: [], state };
  return commitPieceMove(state, r.phase, "rotate", [
    {
      dir,
      kick: r.kick,
      kickIndex: r.kickIndex,
      kind: "Rotated",
      tick: state.tick,
    },
  ]);
}

function handleSoftDrop(state: GameState, on: boolean): CommandResult {
  if (state.softDropOn === on) return { events: [], state };
  return {
    events: [{ kind: "SoftDropToggled", on, tick: state.tick }],
    state: { ...state, softDropOn: on },
  };
}

function handleHardDrop(state: GameState, phase: PiecePhase): CommandResult {
  const r = hardDropPiece(state.board, phase);
  const points = r.distance * HARD_DROP_POINTS_PER_CELL;
  return {
    events: [],
    hardDropped: true,
    state: {
      ...state,
      phase: r.phase,
      scoring: { ...state.scoring, score: state.scoring.score + points },
      stats: {
        ...state.stats,
        hardDropPoints: state.stats.hardDropPoints + points,
      },
    },
  };
}

/**
 * Maps commands to their handlers. Piece commands are silent no-ops when no
 * piece is in play; Pause and Resume are handled by the step entry point.
 */
function getCommandHandler(cmd: Command, state: GameState): CommandResult {
  if (cmd.kind === "SoftDropOn") return handleSoftDrop(state, true);
  if (cmd.kind === "SoftDropOff") return handleSoftDrop(state, false);

  const { phase } = state;
  if (!isPiecePhase(phase)) return { events: [], state };

  switch (cmd.kind) {
    case "Hold":
      return tryHold(state);
    case "RotateCW":
      return handleRotation(state, phase, "CW");
    case "RotateCCW":
      return handleRotation(state, phase, "CCW");
    case "MoveLeft":
      return handleShift(state, phase, -1, false);
    case "MoveRight":
      return handleShift(state, phase, 1, false);
    case "ShiftToWallLeft":
      return handleShift(state, phase, -1, true);
    case "ShiftToWallRight":
      return handleShift(state, phase, 1, true);
    case "HardDrop":
      return handleHardDrop(state, phase);
    case "Pause":
    case "Resume":
      return { events: [], state };
    default:
      return assertNever(cmd);
  }
}

/** Applies already-ordered commands; the frame stops reading them after a hard drop. */
export function applyCommands(
  state: GameState,
  cmds: ReadonlyArray<Command>,
): {
  state: GameState;
  events: ReadonlyArray<DomainEvent>;
  sideEffects: CommandSideEffects;
} {
  let s = state;
  const events: Array<DomainEvent> = [];
  let hardDropped = false;
  let lockReset = false;

  for (const cmd of cmds) {
    if (hardDropped) break;
    const result = getCommandHandler(cmd, s);
    s = result.state;
    events.push(...result.events);
    hardDropped = result.hardDropped ?? false;
    lockReset = lockReset || (result.lockReset ?? false);
  }

  return { events, sideEffects: { hardDropped, lockReset }, state: s };
}

import { isAtBottom } from "../core/board";
import { gravityStep } from "../physics/gravity";
import {
  resumeFalling,
  startLock,
  tickAirborneLock,
  tickLock,
} from "../physics/lock-delay";
import { SOFT_DROP_POINTS_PER_CELL } from "../scoring/scoring";
import { assertNever } from "../types";
import { durationMsAsNumber } from "../../types/brands";

import type { DomainEvent } from "../events";
import type { CommandSideEffects } from "./apply-commands";
import type { GameState, LockingPhase } from "../types";

export type PhysicsSideEffects = {
  hardDropped: boolean;
  lockNow: boolean;
};

type PhysicsResult = {
  state: GameState;
  events: ReadonlyArray<DomainEvent>;
  sideEffects: PhysicsSideEffects;
};

function withSoftDropPoints(state: GameState, cells: number): GameState {
  if (cells === 0) return state;
  const points = cells * SOFT_DROP_POINTS_PER_CELL;
  return {
    ...state,
    scoring: { ...state.scoring, score: state.scoring.score + points },
    stats: {
      ...state.stats,
      softDropPoints: state.stats.softDropPoints + points,
    },
  };
}

/**
 * Advances the frame-based gravity counter and the millisecond timers
 * (lock delay, line clear delay). A frame that grounds a piece or resets
 * its lock timer does not count toward the lock delay. A piece lifted off
 * the stack keeps spending its lock delay until it falls below the lowest
 * row it has landed on.
 */
export function advancePhysics(
  state: GameState,
  cmdFx: CommandSideEffects,
  elapsedMs: number,
): PhysicsResult {
  const { cfg, phase } = state;
  const events: Array<DomainEvent> = [];
  const lockDelayMs = durationMsAsNumber(cfg.lockDelayMs);

  // Hard drop bypasses the lock delay entirely
  if (cmdFx.hardDropped) {
    return {
      events,
      sideEffects: { hardDropped: true, lockNow: true },
      state,
    };
  }

  const done = (s: GameState, lockNow = false): PhysicsResult => ({
    events,
    sideEffects: { hardDropped: false, lockNow },
    state: s,
  });

  switch (phase.tag) {
    case "Falling": {
      let s = state;
      let falling = phase;
      if (!isAtBottom(s.board, falling.piece)) {
        const g = gravityStep(
          cfg,
          s.board,
          falling,
          s.scoring.level,
          s.softDropOn,
        );
        falling = g.phase;
        s = withSoftDropPoints(s, g.softDropCells);
      }
      if (!isAtBottom(s.board, falling.piece)) {
        const airborne = tickAirborneLock(
          falling,
          cmdFx.lockReset ? 0 : elapsedMs,
        );
        return done({ ...s, phase: airborne });
      }
      const locking: LockingPhase = startLock(falling);
      events.push({ kind: "LockStarted", tick: s.tick });
      return done(
        { ...s, phase: locking },
        locking.lockElapsedMs >= lockDelayMs,
      );
    }
    case "Locking": {
      if (!isAtBottom(state.board, phase.piece)) {
        return done({ ...state, phase: resumeFalling(phase) });
      }
      const lock = tickLock(
        phase,
        cmdFx.lockReset ? 0 : elapsedMs,
        lockDelayMs,
      );
      return done({ ...state, phase: lock.phase }, lock.lockNow);
    }
    case "Clearing": {
      const elapsed = phase.elapsedMs + elapsedMs;
      if (elapsed >= durationMsAsNumber(cfg.lineClearDelayMs)) {
        return done({ ...state, phase: { tag: "Spawning" } });
      }
      return done({ ...state, phase: { ...phase, elapsedMs: elapsed } });
    }
    case "Spawning":
    case "Paused":
    case "GameOver":
      return done(state);
    default:
      return assertNever(phase);
  }
}

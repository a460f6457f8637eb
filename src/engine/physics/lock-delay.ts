import { gridCoordAsNumber } from "../../types/brands";

import type { FallingPhase, LockingPhase } from "../types";

/**
 * Grounds a falling piece. Landing below every row it has landed on before
 * starts a fresh timer; landing again at or above that row keeps the time
 * already spent, so lifting a piece never buys a new lock delay.
 */
export function startLock(phase: FallingPhase): LockingPhase {
  const y = gridCoordAsNumber(phase.piece.y);
  const relanded = phase.lockFloorY !== null && y <= phase.lockFloorY;
  return {
    lockElapsedMs: relanded ? phase.lockElapsedMs : 0,
    lockFloorY: Math.max(y, phase.lockFloorY ?? y),
    lockResets: phase.lockResets,
    piece: phase.piece,
    spin: phase.spin,
    tag: "Locking",
  };
}

// Airborne again after a move; the reset count and the timer carry over
export function resumeFalling(phase: LockingPhase): FallingPhase {
  return {
    gravityFrames: 0,
    lockElapsedMs: phase.lockElapsedMs,
    lockFloorY: phase.lockFloorY,
    lockResets: phase.lockResets,
    piece: phase.piece,
    spin: phase.spin,
    tag: "Falling",
  };
}

/**
 * Runs the carried lock timer of a lifted piece. The timer stops and clears
 * once the piece falls below its lock floor.
 */
export function tickAirborneLock(
  phase: FallingPhase,
  elapsedMs: number,
): FallingPhase {
  if (phase.lockFloorY === null) return phase;
  if (gridCoordAsNumber(phase.piece.y) > phase.lockFloorY) {
    return phase.lockElapsedMs === 0 ? phase : { ...phase, lockElapsedMs: 0 };
  }
  return { ...phase, lockElapsedMs: phase.lockElapsedMs + elapsedMs };
}

/**
 * Restarts the lock timer after a successful move or rotation, until
 * maxLockResets resets have been spent for this piece.
 */
export function registerLockReset(
  phase: LockingPhase,
  maxLockResets: number,
): { phase: LockingPhase; reset: boolean } {
  if (phase.lockResets >= maxLockResets) return { phase, reset: false };
  return {
    phase: { ...phase, lockElapsedMs: 0, lockResets: phase.lockResets + 1 },
    reset: true,
  };
}

export function tickLock(
  phase: LockingPhase,
  elapsedMs: number,
  lockDelayMs: number,
): { phase: LockingPhase; lockNow: boolean } {
  const lockElapsedMs = phase.lockElapsedMs + elapsedMs;
  return {
    lockNow: lockElapsedMs >= lockDelayMs,
    phase: { ...phase, lockElapsedMs },
  };
}

import { calculateGhostPosition, isAtBottom } from "./core/board";
import { peekPieces } from "./core/queue";
import { activePiece } from "./types";

import type { ActivePiece, GameState, PieceId } from "./types";

export const selectPhaseTag = (s: GameState): GameState["phase"]["tag"] =>
  s.phase.tag;
export const selectIsPaused = (s: GameState): boolean =>
  s.phase.tag === "Paused";
export const selectIsGameOver = (s: GameState): boolean =>
  s.phase.tag === "GameOver";

export const selectActive = (s: GameState): ActivePiece | null =>
  activePiece(s);

// Grounded/lock delay status for UI indicators
export const selectIsGrounded = (s: GameState): boolean => {
  const a = selectActive(s);
  return a !== null && isAtBottom(s.board, a);
};

export const selectLockResets = (s: GameState): number =>
  s.phase.tag === "Locking" || s.phase.tag === "Falling"
    ? s.phase.lockResets
    : 0;

export const selectLockElapsedMs = (s: GameState): number =>
  s.phase.tag === "Locking" ? s.phase.lockElapsedMs : 0;

// Ghost piece, null when disabled or when no piece is in play
export function selectGhost(s: GameState): ActivePiece | null {
  if (!s.cfg.ghostEnabled) return null;
  const a = selectActive(s);
  return a ? calculateGhostPosition(s.board, a) : null;
}

export const selectPreview = (s: GameState): ReadonlyArray<PieceId> =>
  peekPieces(s.queue, s.cfg.previewCount);

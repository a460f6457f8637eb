import { type PieceQueue } from "./core/queue";
import { type ActivePiece, type Board, type PieceId } from "./core/types";

import type { DurationMs, Seed } from "../types/brands";

export * from "./core/types";
export {
  type PieceDraw,
  type PieceRandomGenerator,
} from "./core/rng/interface";
export { type PieceQueue } from "./core/queue";

export type Tick = number & { readonly brand: "Tick" };

export type EngineConfig = Readonly<{
  boardWidth: number;
  boardHeight: number;
  hiddenRows: number;
  dasMs: DurationMs;
  arrMs: DurationMs;
  gravityTable: ReadonlyArray<number>; // frames per cell, index = level - 1
  levelUpLines: number;
  startLevel: number;
  maxLevel: number;
  victoryLevel: number | null;
  ghostEnabled: boolean;
  holdEnabled: boolean;
  previewCount: number;
  spinBonusEnabled: boolean;
  lockDelayMs: DurationMs;
  maxLockResets: number;
  softDropFramesPerCell: number;
  lineClearDelayMs: DurationMs;
  seed: Seed;
}>;

export type SpinKind = "none" | "mini" | "full";

// Set by a kicked rotation that leaves the piece grounded, cleared by any
// later translation.
export type SpinCandidate = Readonly<{ kickIndex: number }>;

export type TopOutReason = "blockOut" | "lockOut";
export type GameOverReason = TopOutReason | "victory";

export type SpawningPhase = Readonly<{ tag: "Spawning" }>;
export type FallingPhase = Readonly<{
  tag: "Falling";
  piece: ActivePiece;
  gravityFrames: number;
  lockResets: number;
  // Lock delay already spent; carried while a landed piece is lifted
  lockElapsedMs: number;
  // Lowest row the piece has landed on, null until it first lands
  lockFloorY: number | null;
  spin: SpinCandidate | null;
}>;
export type LockingPhase = Readonly<{
  tag: "Locking";
  piece: ActivePiece;
  lockElapsedMs: number;
  lockResets: number;
  lockFloorY: number;
  spin: SpinCandidate | null;
}>;
export type ClearingPhase = Readonly<{
  tag: "Clearing";
  rows: ReadonlyArray<number>;
  elapsedMs: number;
}>;

export type ActivePhase =
  | SpawningPhase
  | FallingPhase
  | LockingPhase
  | ClearingPhase;

export type SessionPhase =
  | ActivePhase
  | Readonly<{ tag: "Paused"; resume: ActivePhase }>
  | Readonly<{ tag: "GameOver"; reason: GameOverReason }>;

export type PiecePhase = FallingPhase | LockingPhase;

export type HoldSlot = Readonly<{ piece: PieceId | null; usedThisTurn: boolean }>;

export type ScoringState = Readonly<{
  score: number;
  level: number;
  linesClearedTotal: number;
  linesSinceLevelUp: number;
  // Consecutive clearing locks minus one; -1 when the chain is broken
  combo: number;
  // Last clearing lock was a tetris or a spin clear
  backToBack: boolean;
}>;

export type Stats = Readonly<{
  piecesPlaced: number;
  singles: number;
  doubles: number;
  triples: number;
  tetrises: number;
  spins: number;
  miniSpins: number;
  maxCombo: number;
  backToBacks: number;
  softDropPoints: number;
  hardDropPoints: number;
  holds: number;
}>;

export type GameState = {
  readonly cfg: EngineConfig;
  readonly board: Board;
  readonly queue: PieceQueue;
  readonly hold: HoldSlot;
  readonly phase: SessionPhase;
  readonly softDropOn: boolean;
  readonly scoring: ScoringState;
  readonly stats: Stats;
  readonly tick: Tick;
  readonly playTimeMs: number;
};

// Type guards and helpers
export function isPiecePhase(phase: SessionPhase): phase is PiecePhase {
  return phase.tag === "Falling" || phase.tag === "Locking";
}

export function activePiece(state: GameState): ActivePiece | null {
  const phase =
    state.phase.tag === "Paused" ? state.phase.resume : state.phase;
  return isPiecePhase(phase) ? phase.piece : null;
}

export function isGameOver(state: GameState): boolean {
  return state.phase.tag === "GameOver";
}

export function isPaused(state: GameState): boolean {
  return state.phase.tag === "Paused";
}

export function assertNever(x: never): never {
  throw new Error(`Unexpected value: ${String(x)}`);
}

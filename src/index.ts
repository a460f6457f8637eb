// Public entry point of the blockfall engine

export {
  DEFAULT_ENGINE_CONFIG,
  loadEngineConfig,
  parseEngineConfig,
  type RawConfig,
} from "./app/config";
export {
  NO_INPUT,
  TimingController,
  computeEdges,
  type ControlConfig,
  type ControlEvent,
  type ControlResult,
  type ControlSnapshot,
  type InputSnapshot,
} from "./control";
export { init, step, stepN, type InitOptions, type StepResult } from "./engine";
export { orderCommands, type Command } from "./engine/commands";
export {
  clearFullRows,
  canPlacePiece,
  columnHeight,
  createEmptyBoard,
  isOccupied,
  isRowFull,
  lockPiece,
} from "./engine/core/board";
export { PIECES, ALL_PIECES } from "./engine/core/pieces";
export { createPieceQueue, nextPiece, peekPieces } from "./engine/core/queue";
export { SevenBagRng, createSevenBagRng } from "./engine/core/rng/seeded";
export { SequenceRng } from "./engine/core/rng/sequence";
export { getNextRotation, tryRotateWithKickInfo } from "./engine/core/srs";
export {
  ConfigurationError,
  EngineError,
  InvariantViolationError,
  OutOfBoundsError,
  type ConfigIssue,
} from "./engine/errors";
export type { DomainEvent } from "./engine/events";
export {
  framesPerCell,
  validateGravityTable,
  DEFAULT_GRAVITY_TABLE,
} from "./engine/physics/gravity-table";
export { scoreLock, SCORE_TABLE } from "./engine/scoring/scoring";
export { summarize, type SessionSummary } from "./engine/scoring/stats";
export * as selectors from "./engine/selectors";
export type {
  ActivePiece,
  Board,
  EngineConfig,
  GameState,
  PieceId,
  PieceDraw,
  PieceRandomGenerator,
  Rot,
  SessionPhase,
  SpinKind,
} from "./engine/types";
export {
  FRAME_MS,
  FixedStepLoop,
  type AdvanceOutput,
  type LoopOptions,
} from "./runtime/loop";
export {
  GameSession,
  type FrameInput,
  type FrameResult,
  type SessionOptions,
  type SessionSnapshot,
} from "./session/game-session";

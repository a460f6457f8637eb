import { TimingController } from "../control";
import { init, step } from "../engine";
import {
  selectActive,
  selectGhost,
  selectPreview,
} from "../engine/selectors";
import { summarize } from "../engine/scoring/stats";
import { durationMsAsNumber } from "../types/brands";
import { debugLog } from "../utils/debug";

import type { ControlSnapshot, InputSnapshot } from "../control";
import type { Command } from "../engine/commands";
import type { DomainEvent } from "../engine/events";
import type { SessionSummary } from "../engine/scoring/stats";
import type {
  ActivePiece,
  EngineConfig,
  GameOverReason,
  GameState,
  PieceId,
  PieceRandomGenerator,
  SessionPhase,
} from "../engine/types";

export type FrameInput = Readonly<{
  elapsedMs: number;
  input: InputSnapshot;
}>;

/** Read-only view handed to renderers. */
export type SessionSnapshot = Readonly<{
  // Full stored grid, hidden rows first, row-major
  cells: Uint8Array;
  width: number;
  height: number;
  hiddenRows: number;
  active: ActivePiece | null;
  ghost: ActivePiece | null;
  hold: PieceId | null;
  holdUsed: boolean;
  preview: ReadonlyArray<PieceId>;
  score: number;
  level: number;
  linesClearedTotal: number;
  phase: SessionPhase["tag"];
  gameOverReason: GameOverReason | null;
  control: ControlSnapshot;
}>;

export type FrameResult = Readonly<{
  snapshot: SessionSnapshot;
  events: ReadonlyArray<DomainEvent>;
  commands: ReadonlyArray<Command>;
}>;

export type SessionOptions = {
  rng?: PieceRandomGenerator;
};

/**
 * Owns one game: the engine state plus the timing controller feeding it.
 * Each call to step() is one frame.
 */
export class GameSession {
  private state: GameState;
  private readonly control: TimingController;
  private pauseHeld = false;
  // Events from init, reported with the first frame
  private pending: ReadonlyArray<DomainEvent>;

  constructor(cfg: EngineConfig, opts: SessionOptions = {}) {
    const started = init(cfg, opts);
    this.state = started.state;
    this.pending = started.events;
    this.control = new TimingController({
      arrMs: durationMsAsNumber(cfg.arrMs),
      dasMs: durationMsAsNumber(cfg.dasMs),
    });
    debugLog("session", "started", { seed: cfg.seed });
  }

  step(frame: FrameInput): FrameResult {
    const carried = this.pending;
    this.pending = [];

    if (this.isOver()) return this.result(carried, []);

    // Pause is read before anything else and consumes the frame
    const pauseEdge = frame.input.pause && !this.pauseHeld;
    this.pauseHeld = frame.input.pause;
    if (pauseEdge) {
      const cmd: Command = this.isPaused()
        ? { kind: "Resume" }
        : { kind: "Pause" };
      const r = step(this.state, [cmd], 0);
      this.state = r.state;
      debugLog("session", cmd.kind, { tick: this.state.tick });
      return this.result([...carried, ...r.events], [cmd]);
    }
    // Held input stays frozen while paused
    if (this.isPaused()) return this.result(carried, []);

    const control = this.control.update(frame.elapsedMs, frame.input);
    const r = step(this.state, control.commands, frame.elapsedMs);
    this.state = r.state;

    if (this.isOver()) {
      debugLog("session", "game over", this.summary());
    }
    return this.result([...carried, ...r.events], control.commands);
  }

  snapshot(): SessionSnapshot {
    const s = this.state;
    return {
      active: selectActive(s),
      cells: s.board.cells.slice(),
      control: this.control.snapshot(),
      gameOverReason: s.phase.tag === "GameOver" ? s.phase.reason : null,
      ghost: selectGhost(s),
      height: s.board.height,
      hiddenRows: s.board.hiddenRows,
      hold: s.hold.piece,
      holdUsed: s.hold.usedThisTurn,
      level: s.scoring.level,
      linesClearedTotal: s.scoring.linesClearedTotal,
      phase: s.phase.tag,
      preview: selectPreview(s),
      score: s.scoring.score,
      width: s.board.width,
    };
  }

  /** Current engine state, for tools and tests. */
  engineState(): GameState {
    return this.state;
  }

  isPaused(): boolean {
    return this.state.phase.tag === "Paused";
  }

  isOver(): boolean {
    return this.state.phase.tag === "GameOver";
  }

  summary(): SessionSummary {
    return summarize(this.state);
  }

  private result(
    events: ReadonlyArray<DomainEvent>,
    commands: ReadonlyArray<Command>,
  ): FrameResult {
    return { commands, events, snapshot: this.snapshot() };
  }
}

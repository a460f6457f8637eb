import { debugLog } from "../utils/debug";

import type { InputSnapshot } from "../control";
import type { Command } from "../engine/commands";
import type { DomainEvent } from "../engine/events";
import type { FrameResult, GameSession } from "../session/game-session";

export const FRAME_MS = 1000 / 60;

export type LoopOptions = Readonly<{
  frameMs?: number;
  // Frames one advance() may run; the rest of the backlog is dropped
  maxFramesPerAdvance?: number;
}>;

/** Everything the loop stepped during one advance() call. */
export type AdvanceOutput = Readonly<{
  frames: number;
  droppedMs: number;
  events: ReadonlyArray<DomainEvent>;
  commands: ReadonlyArray<Command>;
  last: FrameResult | null;
}>;

/**
 * Fixed-step driver: accumulates wall-clock deltas and steps the session
 * in whole frames, so render rate never changes gravity or DAS timing.
 * The same sequence of deltas always yields the same frames.
 */
export class FixedStepLoop {
  private accumulatorMs = 0;
  private framesRun = 0;
  private readonly frameMs: number;
  private readonly maxFrames: number;

  constructor(
    private readonly session: GameSession,
    opts: LoopOptions = {},
  ) {
    this.frameMs = opts.frameMs ?? FRAME_MS;
    this.maxFrames = opts.maxFramesPerAdvance ?? 5;
  }

  /**
   * Adds deltaMs of wall-clock time and runs every whole frame it covers.
   * The input snapshot applies to each frame run.
   */
  advance(deltaMs: number, input: InputSnapshot): AdvanceOutput {
    this.accumulatorMs += Math.max(0, deltaMs);

    const events: Array<DomainEvent> = [];
    const commands: Array<Command> = [];
    let last: FrameResult | null = null;
    let frames = 0;

    while (this.accumulatorMs >= this.frameMs && frames < this.maxFrames) {
      this.accumulatorMs -= this.frameMs;
      last = this.session.step({ elapsedMs: this.frameMs, input });
      events.push(...last.events);
      commands.push(...last.commands);
      frames++;
    }

    let droppedMs = 0;
    if (this.accumulatorMs >= this.frameMs) {
      // Spiral-of-death guard: keep only the partial frame
      const keep = this.accumulatorMs % this.frameMs;
      droppedMs = this.accumulatorMs - keep;
      this.accumulatorMs = keep;
      debugLog("loop", "dropped backlog", { droppedMs });
    }

    this.framesRun += frames;
    return { commands, droppedMs, events, frames, last };
  }

  /** Milliseconds carried into the next advance(). */
  pendingMs(): number {
    return this.accumulatorMs;
  }

  totalFrames(): number {
    return this.framesRun;
  }
}

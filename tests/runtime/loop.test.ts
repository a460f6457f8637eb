import { describe, expect, it } from "@jest/globals";

import { NO_INPUT } from "@/control";
import { SequenceRng } from "@/engine/core/rng/sequence";
import { FRAME_MS, FixedStepLoop } from "@/runtime/loop";
import { GameSession } from "@/session/game-session";

import { createTestConfig } from "../test-helpers";

function newSession(): GameSession {
  return new GameSession(createTestConfig(), { rng: new SequenceRng(["T"]) });
}

describe("FixedStepLoop", () => {
  it("runs at sixty frames per second by default", () => {
    expect(FRAME_MS).toBeCloseTo(16.667, 3);
  });

  it("runs only whole frames and carries the remainder", () => {
    const loop = new FixedStepLoop(newSession(), { frameMs: 10 });

    const a = loop.advance(25, NO_INPUT);
    expect(a.frames).toBe(2);
    expect(loop.pendingMs()).toBe(5);

    const b = loop.advance(5, NO_INPUT);
    expect(b.frames).toBe(1);
    expect(loop.pendingMs()).toBe(0);

    const c = loop.advance(4, NO_INPUT);
    expect(c.frames).toBe(0);
    expect(c.last).toBe(null);
    expect(loop.totalFrames()).toBe(3);
  });

  it("steps the same frames however the time is sliced", () => {
    const coarse = new FixedStepLoop(newSession(), { frameMs: 10 });
    const fine = new FixedStepLoop(newSession(), { frameMs: 10 });

    coarse.advance(40, NO_INPUT);
    for (let i = 0; i < 8; i++) fine.advance(5, NO_INPUT);

    expect(fine.totalFrames()).toBe(coarse.totalFrames());
  });

  it("drops the backlog beyond maxFramesPerAdvance", () => {
    const loop = new FixedStepLoop(newSession(), {
      frameMs: 10,
      maxFramesPerAdvance: 5,
    });
    const r = loop.advance(1003, NO_INPUT);
    expect(r.frames).toBe(5);
    expect(r.droppedMs).toBe(950);
    expect(loop.pendingMs()).toBe(3);
  });

  it("applies level gravity in frames, not wall-clock chunks", () => {
    const loop = new FixedStepLoop(newSession(), {
      frameMs: 10,
      maxFramesPerAdvance: 100,
    });
    const r = loop.advance(600, NO_INPUT);
    expect(r.frames).toBe(60);
    expect(r.last?.snapshot.active?.y).toBe(0);
  });

  it("collects events and commands from every frame it runs", () => {
    const loop = new FixedStepLoop(newSession(), { frameMs: 10 });
    const r = loop.advance(20, { ...NO_INPUT, moveLeft: true });
    expect(r.events.map((e) => e.kind)).toEqual(["PieceSpawned", "MovedLeft"]);
    expect(r.commands).toEqual([{ kind: "MoveLeft", source: "tap" }]);
  });

  it("ignores negative deltas", () => {
    const loop = new FixedStepLoop(newSession(), { frameMs: 10 });
    loop.advance(-50, NO_INPUT);
    expect(loop.pendingMs()).toBe(0);
  });
});

import { describe, expect, it } from "@jest/globals";

import { NO_INPUT, TimingController } from "@/control";

import { press } from "../test-helpers";

import type { Command } from "@/engine/commands";
import type { InputSnapshot } from "@/control";

const FRAME = 10;
const LEFT = press({ moveLeft: true });

function run(
  controller: TimingController,
  frames: number,
  input: InputSnapshot,
): Array<ReadonlyArray<Command>> {
  const out: Array<ReadonlyArray<Command>> = [];
  for (let i = 0; i < frames; i++) {
    out.push(controller.update(FRAME, input).commands);
  }
  return out;
}

describe("TimingController", () => {
  it("moves once on a tap", () => {
    const c = new TimingController({ arrMs: 30, dasMs: 170 });
    expect(c.update(FRAME, LEFT).commands).toEqual([
      { kind: "MoveLeft", source: "tap" },
    ]);
    expect(c.update(FRAME, NO_INPUT).commands).toEqual([]);
    expect(c.snapshot().dasState).toBe("idle");
  });

  it("starts repeating when DAS expires, then every ARR interval", () => {
    const c = new TimingController({ arrMs: 30, dasMs: 170 });
    // Pressed at t=10, DAS deadline t=180 (frame 18), next repeat t=210
    const frames = run(c, 21, LEFT);

    expect(frames[0]).toEqual([{ kind: "MoveLeft", source: "tap" }]);
    for (let i = 1; i < 17; i++) expect(frames[i]).toEqual([]);
    expect(frames[17]).toEqual([{ kind: "MoveLeft", source: "repeat" }]);
    expect(frames[18]).toEqual([]);
    expect(frames[19]).toEqual([]);
    expect(frames[20]).toEqual([{ kind: "MoveLeft", source: "repeat" }]);
  });

  it("emits every repeat a long frame spans", () => {
    const c = new TimingController({ arrMs: 30, dasMs: 170 });
    c.update(FRAME, LEFT);
    const r = c.update(250, LEFT);

    expect(r.commands).toEqual([
      { kind: "MoveLeft", source: "repeat" },
      { kind: "MoveLeft", source: "repeat" },
      { kind: "MoveLeft", source: "repeat" },
    ]);
    expect(r.telemetry).toEqual([
      { atMs: 260, dir: "Left", kind: "DasMature" },
      { atMs: 260, count: 3, dir: "Left", kind: "ArrRepeat" },
    ]);
  });

  it("slides to the wall every frame past DAS when ARR is zero", () => {
    const c = new TimingController({ arrMs: 0, dasMs: 50 });
    const frames = run(c, 7, press({ moveRight: true }));

    expect(frames[0]).toEqual([{ kind: "MoveRight", source: "tap" }]);
    for (let i = 1; i < 5; i++) expect(frames[i]).toEqual([]);
    expect(frames[5]).toEqual([{ kind: "ShiftToWallRight" }]);
    expect(frames[6]).toEqual([{ kind: "ShiftToWallRight" }]);
  });

  it("lets the last pressed direction win", () => {
    const c = new TimingController({ arrMs: 30, dasMs: 170 });
    c.update(FRAME, LEFT);
    const r = c.update(FRAME, press({ moveLeft: true, moveRight: true }));

    expect(r.commands).toEqual([{ kind: "MoveRight", source: "tap" }]);
    expect(c.snapshot().activeDir).toBe("Right");
  });

  it("charges toward the still-held key when the active one is released", () => {
    const c = new TimingController({ arrMs: 30, dasMs: 170 });
    c.update(FRAME, LEFT);
    c.update(FRAME, press({ moveLeft: true, moveRight: true }));
    const r = c.update(FRAME, LEFT);

    expect(r.commands).toEqual([{ kind: "MoveLeft", source: "tap" }]);
    expect(c.snapshot()).toEqual({
      activeDir: "Left",
      clockMs: 30,
      dasChargeMs: 0,
      dasState: "charging",
    });
  });

  it("ignores the release of the inactive direction", () => {
    const c = new TimingController({ arrMs: 30, dasMs: 170 });
    c.update(FRAME, LEFT);
    c.update(FRAME, press({ moveLeft: true, moveRight: true }));
    const r = c.update(FRAME, press({ moveRight: true }));

    expect(r.commands).toEqual([]);
    expect(c.snapshot().activeDir).toBe("Right");
  });

  it("taps both directions when pressed on the same frame, right last", () => {
    const c = new TimingController({ arrMs: 30, dasMs: 170 });
    const r = c.update(FRAME, press({ moveLeft: true, moveRight: true }));
    expect(r.commands).toEqual([
      { kind: "MoveLeft", source: "tap" },
      { kind: "MoveRight", source: "tap" },
    ]);
    expect(c.snapshot().activeDir).toBe("Right");
  });

  it("outputs a frame's commands in engine priority order", () => {
    const c = new TimingController({ arrMs: 30, dasMs: 170 });
    const r = c.update(
      FRAME,
      press({
        hardDrop: true,
        hold: true,
        moveLeft: true,
        rotateCW: true,
        softDrop: true,
      }),
    );
    expect(r.commands.map((cmd) => cmd.kind)).toEqual([
      "Hold",
      "RotateCW",
      "MoveLeft",
      "SoftDropOn",
      "HardDrop",
    ]);
  });

  it("fires rotation and hard drop on the press edge only", () => {
    const c = new TimingController({ arrMs: 30, dasMs: 170 });
    const held = press({ hardDrop: true, rotateCCW: true });
    const frames = run(c, 3, held);
    expect(frames[0]).toEqual([{ kind: "RotateCCW" }, { kind: "HardDrop" }]);
    expect(frames[1]).toEqual([]);
    expect(frames[2]).toEqual([]);
  });

  it("toggles soft drop on press and release", () => {
    const c = new TimingController({ arrMs: 30, dasMs: 170 });
    expect(c.update(FRAME, press({ softDrop: true })).commands).toEqual([
      { kind: "SoftDropOn" },
    ]);
    expect(c.update(FRAME, press({ softDrop: true })).commands).toEqual([]);
    expect(c.update(FRAME, NO_INPUT).commands).toEqual([{ kind: "SoftDropOff" }]);
  });

  it("reports key edges and taps as telemetry", () => {
    const c = new TimingController({ arrMs: 30, dasMs: 170 });
    expect(c.update(FRAME, LEFT).telemetry).toEqual([
      { atMs: 10, key: "Left", kind: "KeyDown" },
      { atMs: 10, dir: "Left", kind: "Tap" },
      { atMs: 10, dir: "Left", kind: "DasStart" },
    ]);
  });

  it("caps the reported DAS charge at dasMs", () => {
    const c = new TimingController({ arrMs: 30, dasMs: 170 });
    c.update(FRAME, LEFT);
    run(c, 5, LEFT);
    expect(c.dasChargeMs()).toBe(50);
    run(c, 30, LEFT);
    expect(c.dasChargeMs()).toBe(170);
  });

  it("produces identical output for identical input", () => {
    const script: ReadonlyArray<readonly [number, InputSnapshot]> = [
      [16, LEFT],
      [17, LEFT],
      [200, press({ moveLeft: true, rotateCW: true })],
      [16, press({ moveRight: true })],
      [33, press({ moveRight: true, hardDrop: true })],
      [16, NO_INPUT],
    ];
    const a = new TimingController({ arrMs: 20, dasMs: 100 });
    const b = new TimingController({ arrMs: 20, dasMs: 100 });
    const outA = script.map(([ms, input]) => a.update(ms, input));
    const outB = script.map(([ms, input]) => b.update(ms, input));
    expect(outA).toEqual(outB);
  });

  it("uses new timings after updateConfig", () => {
    const c = new TimingController({ arrMs: 30, dasMs: 170 });
    c.updateConfig({ arrMs: 0, dasMs: 20 });
    const frames = run(c, 3, LEFT);
    expect(frames[2]).toEqual([{ kind: "ShiftToWallLeft" }]);
  });

  it("forgets held keys on reset", () => {
    const c = new TimingController({ arrMs: 30, dasMs: 170 });
    c.update(FRAME, LEFT);
    c.reset();
    expect(c.snapshot().dasState).toBe("idle");
    // Still held: seen as a fresh press
    expect(c.update(FRAME, LEFT).commands).toEqual([
      { kind: "MoveLeft", source: "tap" },
    ]);
  });
});

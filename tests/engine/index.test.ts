import { describe, expect, it } from "@jest/globals";

import { init, step, stepN } from "@/engine";
import { createSevenBagRng } from "@/engine/core/rng/seeded";
import { InvariantViolationError } from "@/engine/errors";
import { selectActive, selectGhost, selectPreview } from "@/engine/selectors";
import { createSeed } from "@/types/brands";

import {
  createTestConfig,
  createTestPiece,
  createTestState,
  eventKinds,
  stepFrames,
} from "../test-helpers";

describe("engine", () => {
  describe("init", () => {
    it("spawns the first piece of the seeded bag", () => {
      const cfg = createTestConfig({ seed: createSeed("opening") });
      const first = createSevenBagRng("opening").draw(1).pieces[0];

      const r = init(cfg);

      expect(r.events).toEqual([
        { kind: "PieceSpawned", pieceId: first, tick: 0 },
      ]);
      expect(r.state.phase.tag).toBe("Falling");
      expect(selectActive(r.state)?.id).toBe(first);
      expect(r.state.scoring).toEqual({
        backToBack: false,
        combo: -1,
        level: 1,
        linesClearedTotal: 0,
        linesSinceLevelUp: 0,
        score: 0,
      });
    });

    it("is reproducible for the same seed", () => {
      const cfg = createTestConfig({ seed: createSeed("replay") });
      expect(selectPreview(init(cfg).state)).toEqual(
        selectPreview(init(cfg).state),
      );
    });

    it("starts at the configured level", () => {
      expect(createTestState(["T"], { startLevel: 5 }).scoring.level).toBe(5);
    });
  });

  describe("step", () => {
    it("advances the tick and play time on every frame", () => {
      const r = stepFrames(createTestState(["T"]), 3, [], 16);
      expect(r.state.tick).toBe(3);
      expect(r.state.playTimeMs).toBe(48);
    });

    it("rejects negative or non-finite elapsed time", () => {
      const s = createTestState(["T"]);
      expect(() => step(s, [], -1)).toThrow(InvariantViolationError);
      expect(() => step(s, [], Number.NaN)).toThrow(InvariantViolationError);
    });

    it("does not mutate the input state", () => {
      const s = createTestState(["T"]);
      const before = selectActive(s);
      step(s, [{ kind: "MoveLeft" }], 16);
      expect(selectActive(s)).toEqual(before);
      expect(s.tick).toBe(0);
    });

    it("applies commands in priority order whatever order they arrive in", () => {
      const s = createTestState(["T"]);
      const r = step(s, [{ kind: "MoveLeft" }, { kind: "RotateCW" }], 16);
      expect(eventKinds(r)).toEqual(["Rotated", "MovedLeft"]);
    });

    it("ignores piece commands when the move is blocked", () => {
      const s = createTestState(["T"]);
      const r = step(s, [{ kind: "ShiftToWallLeft" }], 16);
      const again = step(r.state, [{ kind: "MoveLeft" }], 16);
      expect(eventKinds(r)).toEqual(["MovedLeft"]);
      expect(r.events[0]).toMatchObject({ fromX: 3, toX: 0 });
      expect(eventKinds(again)).toEqual([]);
    });

    it("tracks the ghost under the active piece", () => {
      const s = createTestState(["T"]);
      expect(selectGhost(s)).toEqual(createTestPiece("T", 3, 18));
      const hidden = createTestState(["T"], { ghostEnabled: false });
      expect(selectGhost(hidden)).toBe(null);
    });
  });

  describe("stepN", () => {
    it("steps one frame per command bucket", () => {
      const s = createTestState(["T"]);
      const r = stepN(
        s,
        [[{ kind: "MoveLeft" }], [], [{ kind: "MoveRight" }]],
        16,
      );
      expect(eventKinds(r)).toEqual(["MovedLeft", "MovedRight"]);
      expect(r.state.tick).toBe(3);
      expect(selectActive(r.state)?.x).toBe(3);
    });
  });
});

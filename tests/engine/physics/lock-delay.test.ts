import { describe, expect, it } from "@jest/globals";

import { step } from "@/engine";
import {
  registerLockReset,
  resumeFalling,
  startLock,
  tickAirborneLock,
  tickLock,
} from "@/engine/physics/lock-delay";

import {
  createTestPiece,
  createTestState,
  emptyBoard,
  eventKinds,
  fallingPhase,
  setBoardCell,
  stepFrames,
  withPiece,
} from "../../test-helpers";

import type { Command } from "@/engine/commands";
import type { GameState } from "@/engine/types";

describe("lock delay", () => {
  describe("phase helpers", () => {
    const locking = startLock({
      ...fallingPhase(createTestPiece("T", 4, 18)),
      lockResets: 2,
    });

    it("starts with a fresh timer and carries the reset count", () => {
      expect(locking.tag).toBe("Locking");
      expect(locking.lockElapsedMs).toBe(0);
      expect(locking.lockResets).toBe(2);
    });

    it("locks once the accumulated time reaches the delay", () => {
      const a = tickLock(locking, 499, 500);
      expect(a.lockNow).toBe(false);
      expect(tickLock(a.phase, 1, 500).lockNow).toBe(true);
    });

    it("stops resetting once the cap is spent", () => {
      const ticking = tickLock(locking, 300, 500).phase;
      const r = registerLockReset(ticking, 3);
      expect(r.reset).toBe(true);
      expect(r.phase.lockElapsedMs).toBe(0);
      expect(r.phase.lockResets).toBe(3);

      const capped = registerLockReset(tickLock(r.phase, 100, 500).phase, 3);
      expect(capped.reset).toBe(false);
      expect(capped.phase.lockElapsedMs).toBe(100);
    });

    it("resumes falling with a reset gravity counter", () => {
      const falling = resumeFalling(locking);
      expect(falling).toEqual({
        gravityFrames: 0,
        lockElapsedMs: 0,
        lockFloorY: 18,
        lockResets: 2,
        piece: locking.piece,
        spin: null,
        tag: "Falling",
      });
    });
  });

  describe("landing again", () => {
    const lifted = {
      ...fallingPhase(createTestPiece("T", 4, 17)),
      lockElapsedMs: 300,
      lockFloorY: 18,
    };

    it("keeps the spent time when the piece lands at or above its floor", () => {
      const again = startLock(lifted);
      expect(again.lockElapsedMs).toBe(300);
      expect(again.lockFloorY).toBe(18);
    });

    it("starts a fresh timer below the floor", () => {
      const lower = startLock({
        ...lifted,
        piece: createTestPiece("T", 4, 19),
      });
      expect(lower.lockElapsedMs).toBe(0);
      expect(lower.lockFloorY).toBe(19);
    });

    it("runs the timer while a landed piece is lifted", () => {
      expect(tickAirborneLock(lifted, 100).lockElapsedMs).toBe(400);
    });

    it("clears the timer once the piece is below its floor", () => {
      const below = { ...lifted, piece: createTestPiece("T", 4, 19) };
      expect(tickAirborneLock(below, 100).lockElapsedMs).toBe(0);
    });

    it("leaves a piece that never landed alone", () => {
      const fresh = fallingPhase(createTestPiece("T", 4, 5));
      expect(tickAirborneLock(fresh, 100)).toBe(fresh);
    });
  });

  describe("through the engine", () => {
    // T resting on the floor, 100 ms frames against the default 500 ms delay
    function grounded(board = emptyBoard()): GameState {
      return withPiece(
        createTestState(["T", "O"]),
        createTestPiece("T", 4, 18),
        board,
      );
    }

    it("enters Locking on the grounding frame without counting it", () => {
      const r = step(grounded(), [], 100);
      expect(eventKinds(r)).toEqual(["LockStarted"]);
      expect(r.state.phase.tag === "Locking" && r.state.phase.lockElapsedMs).toBe(
        0,
      );
    });

    it("locks after the full delay has elapsed", () => {
      const started = step(grounded(), [], 100).state;
      const waiting = stepFrames(started, 4, [], 100);
      expect(waiting.state.phase.tag).toBe("Locking");

      const r = step(waiting.state, [], 100);
      expect(eventKinds(r)).toEqual(["Locked", "PieceSpawned"]);
      expect(r.events[0]).toMatchObject({ source: "ground", spin: "none" });
    });

    it("restarts the timer on a successful move", () => {
      const started = step(grounded(), [], 100).state;
      const waiting = stepFrames(started, 2, [], 100).state;

      const moved = step(waiting, [{ kind: "MoveLeft" }], 100);
      expect(eventKinds(moved)).toEqual(["MovedLeft", "LockReset"]);
      const phase = moved.state.phase;
      expect(phase.tag === "Locking" && phase.lockElapsedMs).toBe(0);
      expect(phase.tag === "Locking" && phase.lockResets).toBe(1);

      // Five more frames are needed from the reset
      expect(stepFrames(moved.state, 4, [], 100).state.phase.tag).toBe(
        "Locking",
      );
      expect(eventKinds(stepFrames(moved.state, 5, [], 100))).toContain(
        "Locked",
      );
    });

    it("ignores moves for the timer after maxLockResets", () => {
      const start: GameState = {
        ...grounded(),
        cfg: { ...grounded().cfg, maxLockResets: 1 },
      };
      let s = step(start, [], 100).state;
      s = step(s, [{ kind: "MoveLeft" }], 100).state;
      s = step(s, [{ kind: "MoveRight" }], 100).state;

      const phase = s.phase;
      expect(phase.tag).toBe("Locking");
      expect(phase.tag === "Locking" && phase.lockResets).toBe(1);
      expect(phase.tag === "Locking" && phase.lockElapsedMs).toBe(100);
    });

    it("locks a piece kicked off the floor once the cap is spent", () => {
      // I flat on the floor; CW kicks it up two rows, CCW leaves it airborne
      const start = withPiece(
        createTestState(["I", "O"], {
          gravityTable: [2],
          lockDelayMs: 500,
          maxLevel: 1,
          maxLockResets: 0,
        }),
        createTestPiece("I", 3, 18),
      );
      const lift: ReadonlyArray<Command> = [
        { kind: "RotateCW" },
        { kind: "RotateCCW" },
      ];

      let s = start;
      let lockedAt = -1;
      for (let frame = 0; frame < 100 && lockedAt < 0; frame++) {
        const r = step(s, s.phase.tag === "Locking" ? lift : [], 100);
        if (eventKinds(r).includes("Locked")) lockedAt = frame;
        s = r.state;
      }

      // Landing, lift, 3 airborne frames, relanding at 300 ms, lift,
      // 3 more airborne frames, relanding at 600 ms locks at once
      expect(lockedAt).toBe(10);
    });

    it("falls again when a move leaves the ledge", () => {
      // Resting on a single block under its centre column
      const board = setBoardCell(emptyBoard(), 4, 19);
      const ledge = withPiece(
        createTestState(["T", "O"]),
        createTestPiece("T", 3, 17),
        board,
      );
      const started = step(ledge, [], 100);
      expect(started.state.phase.tag).toBe("Locking");

      const slid = step(started.state, [{ kind: "ShiftToWallLeft" }], 100);
      expect(slid.state.phase.tag).toBe("Falling");
      expect(slid.state.phase.tag === "Falling" && slid.state.phase.lockResets).toBe(
        1,
      );
    });
  });
});

import { describe, expect, it } from "@jest/globals";

import {
  hardDropPiece,
  rotatePiece,
  shiftPiece,
  slidePiece,
} from "@/engine/gameplay/movement";

import {
  createTestPiece,
  emptyBoard,
  fallingPhase,
  fillBoardRow,
  setBoardCell,
} from "../../test-helpers";

describe("movement", () => {
  describe("shiftPiece", () => {
    it("moves one column and clears the spin candidate", () => {
      const phase = {
        ...fallingPhase(createTestPiece("T", 4, 5)),
        spin: { kickIndex: 2 },
      };
      const r = shiftPiece(emptyBoard(), phase, 1);
      expect(r).toMatchObject({ fromX: 4, moved: true, toX: 5 });
      expect(r.phase.spin).toBe(null);
    });

    it("leaves the phase untouched when blocked", () => {
      const phase = fallingPhase(createTestPiece("T", 0, 5));
      const r = shiftPiece(emptyBoard(), phase, -1);
      expect(r.moved).toBe(false);
      expect(r.phase).toBe(phase);
    });
  });

  describe("slidePiece", () => {
    it("travels to the wall in one command", () => {
      const r = slidePiece(emptyBoard(), fallingPhase(createTestPiece("T", 4, 5)), 1);
      expect(r).toMatchObject({ fromX: 4, moved: true, toX: 7 });
    });

    it("reports no move when already against the wall", () => {
      const r = slidePiece(emptyBoard(), fallingPhase(createTestPiece("T", 7, 5)), 1);
      expect(r.moved).toBe(false);
    });
  });

  describe("rotatePiece", () => {
    it("marks a spin candidate only for a kicked rotation that ends grounded", () => {
      const board = fillBoardRow(emptyBoard(), 19, [3]);
      const kicked = rotatePiece(
        board,
        fallingPhase(createTestPiece("T", 3, 17)),
        "CW",
        true,
      );
      expect(kicked.kickIndex).toBe(1);
      expect(kicked.phase.spin).toEqual({ kickIndex: 1 });

      const free = rotatePiece(
        emptyBoard(),
        fallingPhase(createTestPiece("T", 3, 10)),
        "CW",
        true,
      );
      expect(free.kickIndex).toBe(0);
      expect(free.phase.spin).toBe(null);
    });

    it("does not mark a kicked rotation that can still fall", () => {
      // Wall kick in open air: grounded check fails
      const r = rotatePiece(
        emptyBoard(),
        fallingPhase(createTestPiece("T", -1, 5, "right")),
        "CCW",
        true,
      );
      expect(r.kickIndex).toBe(1);
      expect(r.phase.spin).toBe(null);
    });

    it("reports a rejected rotation without changing the phase", () => {
      let board = emptyBoard();
      for (let y = -3; y < 20; y++) board = fillBoardRow(board, y, [0]);
      const phase = fallingPhase(createTestPiece("I", -1, 10, "left"));
      const r = rotatePiece(board, phase, "CW", true);
      expect(r.rotated).toBe(false);
      expect(r.phase).toBe(phase);
    });
  });

  describe("hardDropPiece", () => {
    it("returns the distance dropped", () => {
      const board = setBoardCell(emptyBoard(), 4, 10);
      const r = hardDropPiece(board, fallingPhase(createTestPiece("T", 3, 0)));
      // Lands with its bottom row on row 9
      expect(r.distance).toBe(8);
      expect(r.phase.piece.y).toBe(8);
    });

    it("keeps the phase when the piece is already resting", () => {
      const phase = {
        ...fallingPhase(createTestPiece("T", 3, 18)),
        spin: { kickIndex: 1 },
      };
      const r = hardDropPiece(emptyBoard(), phase);
      expect(r.distance).toBe(0);
      expect(r.phase).toBe(phase);
    });
  });
});

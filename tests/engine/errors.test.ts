import { describe, expect, it } from "@jest/globals";

import { step } from "@/engine";
import { isOccupied } from "@/engine/core/board";
import {
  ConfigurationError,
  EngineError,
  InvariantViolationError,
  OutOfBoundsError,
} from "@/engine/errors";

import { createTestState, emptyBoard } from "../test-helpers";

describe("engine errors", () => {
  it("describes an out-of-bounds cell", () => {
    let caught: unknown;
    try {
      isOccupied(emptyBoard(), 10, 0);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(OutOfBoundsError);
    expect(caught).toBeInstanceOf(EngineError);
    expect(caught).toMatchObject({
      code: "OUT_OF_BOUNDS",
      message: "Cell (10, 0) is outside the board",
      name: "OutOfBoundsError",
      x: 10,
      y: 0,
    });
  });

  it("carries the offending value on an invariant violation", () => {
    let caught: unknown;
    try {
      step(createTestState(["T"]), [], -1);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(InvariantViolationError);
    expect(caught).toMatchObject({
      code: "INVARIANT_VIOLATION",
      details: { elapsedMs: -1 },
    });
  });

  it("lists configuration issues in order", () => {
    const err = new ConfigurationError([
      { message: "expected an integer", path: "boardWidth" },
      { message: "must be >= 0", path: "dasMs" },
    ]);
    expect(err.name).toBe("ConfigurationError");
    expect(err.code).toBe("CONFIGURATION_ERROR");
    expect(err.message).toBe(
      "Invalid engine configuration: boardWidth: expected an integer; dasMs: must be >= 0",
    );
    expect(err).toBeInstanceOf(Error);
  });
});

import { describe, expect, it } from "@jest/globals";

import { createStats, recordLock, summarize } from "@/engine/scoring/stats";

import { createTestState } from "../../test-helpers";

describe("stats", () => {
  it("tallies clear kinds, spins and combos per lock", () => {
    let stats = createStats();
    stats = recordLock(stats, {
      backToBackApplied: false,
      combo: 0,
      rows: 4,
      spin: "none",
    });
    stats = recordLock(stats, {
      backToBackApplied: true,
      combo: 1,
      rows: 2,
      spin: "full",
    });
    stats = recordLock(stats, {
      backToBackApplied: false,
      combo: -1,
      rows: 0,
      spin: "mini",
    });

    expect(stats).toMatchObject({
      backToBacks: 1,
      doubles: 1,
      maxCombo: 1,
      miniSpins: 1,
      piecesPlaced: 3,
      spins: 1,
      tetrises: 1,
    });
  });

  it("summarizes a session", () => {
    const state = {
      ...createTestState(["T"]),
      playTimeMs: 120_000,
      stats: { ...createStats(), piecesPlaced: 90 },
    };
    expect(summarize(state)).toMatchObject({
      durationMs: 120_000,
      level: 1,
      lines: 0,
      piecesPerMinute: 45,
      score: 0,
      victory: false,
    });
  });

  it("reports zero pieces per minute before any time has passed", () => {
    expect(summarize(createTestState(["T"])).piecesPerMinute).toBe(0);
  });
});

import type { GameState, SpinKind, Stats } from "../types";

export function createStats(): Stats {
  return {
    backToBacks: 0,
    doubles: 0,
    hardDropPoints: 0,
    holds: 0,
    maxCombo: 0,
    miniSpins: 0,
    piecesPlaced: 0,
    singles: 0,
    softDropPoints: 0,
    spins: 0,
    tetrises: 0,
    triples: 0,
  };
}

export function applyDelta(prev: Stats, delta: Partial<Stats>): Stats {
  return { ...prev, ...delta };
}

export function recordLock(
  stats: Stats,
  lock: Readonly<{
    rows: number;
    spin: SpinKind;
    combo: number;
    backToBackApplied: boolean;
  }>,
): Stats {
  return applyDelta(stats, {
    backToBacks: stats.backToBacks + (lock.backToBackApplied ? 1 : 0),
    doubles: stats.doubles + (lock.rows === 2 ? 1 : 0),
    maxCombo: Math.max(stats.maxCombo, lock.combo),
    miniSpins: stats.miniSpins + (lock.spin === "mini" ? 1 : 0),
    piecesPlaced: stats.piecesPlaced + 1,
    singles: stats.singles + (lock.rows === 1 ? 1 : 0),
    spins: stats.spins + (lock.spin === "full" ? 1 : 0),
    tetrises: stats.tetrises + (lock.rows >= 4 ? 1 : 0),
    triples: stats.triples + (lock.rows === 3 ? 1 : 0),
  });
}

/** End-of-session figures handed to persistence collaborators. */
export type SessionSummary = Readonly<{
  score: number;
  level: number;
  lines: number;
  durationMs: number;
  victory: boolean;
  piecesPerMinute: number;
  stats: Stats;
}>;

export function summarize(state: GameState): SessionSummary {
  const minutes = state.playTimeMs / 60_000;
  return {
    durationMs: state.playTimeMs,
    level: state.scoring.level,
    lines: state.scoring.linesClearedTotal,
    piecesPerMinute: minutes > 0 ? state.stats.piecesPlaced / minutes : 0,
    score: state.scoring.score,
    stats: state.stats,
    victory: state.phase.tag === "GameOver" && state.phase.reason === "victory",
  };
}

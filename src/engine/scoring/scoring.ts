import type { ScoringState, SpinKind } from "../types";

// Points per lock by rows cleared (index) before level scaling
export const SCORE_TABLE: Readonly<Record<SpinKind, ReadonlyArray<number>>> = {
  full: [400, 800, 1200, 1600, 2000],
  mini: [100, 200, 400, 600, 900],
  none: [0, 100, 300, 500, 800],
};

export const SOFT_DROP_POINTS_PER_CELL = 1;
export const HARD_DROP_POINTS_PER_CELL = 2;
export const BACK_TO_BACK_MULTIPLIER = 1.5;
export const COMBO_BONUS = 50;

export function createScoringState(startLevel: number): ScoringState {
  return {
    backToBack: false,
    combo: -1,
    level: startLevel,
    linesClearedTotal: 0,
    linesSinceLevelUp: 0,
    score: 0,
  };
}

export function basePoints(rows: number, spin: SpinKind): number {
  const table = SCORE_TABLE[spin];
  const i = Math.min(Math.max(rows, 0), table.length - 1);
  return table[i] ?? 0;
}

// Tetrises and spins that clear rows
export function isDifficultClear(rows: number, spin: SpinKind): boolean {
  return rows >= 4 || (rows > 0 && spin !== "none");
}

export type LevelProgress = Readonly<{
  level: number;
  linesSinceLevelUp: number;
  levelUps: ReadonlyArray<number>;
}>;

/**
 * Adds cleared rows to the level counter. Each level-up subtracts
 * levelUpLines so overflow lines carry into the next level. At maxLevel the
 * counter keeps growing.
 */
export function applyLevelProgress(
  level: number,
  linesSinceLevelUp: number,
  rows: number,
  levelUpLines: number,
  maxLevel: number,
): LevelProgress {
  let nextLevel = level;
  let lines = linesSinceLevelUp + rows;
  const levelUps: Array<number> = [];
  while (lines >= levelUpLines && nextLevel < maxLevel) {
    lines -= levelUpLines;
    nextLevel += 1;
    levelUps.push(nextLevel);
  }
  return { level: nextLevel, levelUps, linesSinceLevelUp: lines };
}

export type LockAward = Readonly<{
  points: number;
  backToBackApplied: boolean;
  scoring: ScoringState;
  levelUps: ReadonlyArray<number>;
}>;

/**
 * Scores one lock. Points use the level in effect before any level-up the
 * same clear causes.
 */
export function scoreLock(
  scoring: ScoringState,
  rows: number,
  spin: SpinKind,
  rules: Readonly<{ levelUpLines: number; maxLevel: number }>,
): LockAward {
  const { level } = scoring;

  if (rows === 0) {
    const points = basePoints(0, spin) * level;
    return {
      backToBackApplied: false,
      levelUps: [],
      points,
      scoring: { ...scoring, combo: -1, score: scoring.score + points },
    };
  }

  const difficult = isDifficultClear(rows, spin);
  const backToBackApplied = difficult && scoring.backToBack;
  const combo = scoring.combo + 1;
  const base = basePoints(rows, spin) * level;
  const comboBonus = combo > 0 ? COMBO_BONUS * combo * level : 0;
  const points =
    Math.floor(base * (backToBackApplied ? BACK_TO_BACK_MULTIPLIER : 1)) +
    comboBonus;

  const progress = applyLevelProgress(
    level,
    scoring.linesSinceLevelUp,
    rows,
    rules.levelUpLines,
    rules.maxLevel,
  );

  return {
    backToBackApplied,
    levelUps: progress.levelUps,
    points,
    scoring: {
      backToBack: difficult,
      combo,
      level: progress.level,
      linesClearedTotal: scoring.linesClearedTotal + rows,
      linesSinceLevelUp: progress.linesSinceLevelUp,
      score: scoring.score + points,
    },
  };
}

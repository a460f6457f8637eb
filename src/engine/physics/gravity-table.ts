import { ConfigurationError, type ConfigIssue } from "../errors";

/** Frames per cell for levels 1..20. */
export const DEFAULT_GRAVITY_TABLE: ReadonlyArray<number> = [
  60, 50, 40, 30, 25, 20, 15, 12, 10, 8, 7, 6, 5, 4, 3, 3, 2, 2, 1, 1,
];

export function gravityTableIssues(
  table: ReadonlyArray<number>,
  maxLevel: number,
  path = "gravityTable",
): Array<ConfigIssue> {
  const issues: Array<ConfigIssue> = [];
  if (table.length < maxLevel) {
    issues.push({
      message: `needs an entry for every level up to ${String(maxLevel)}, got ${String(table.length)}`,
      path,
    });
  }
  table.forEach((framesPerCell, i) => {
    if (!Number.isInteger(framesPerCell) || framesPerCell < 1) {
      issues.push({
        message: "frames per cell must be a positive integer",
        path: `${path}[${String(i)}]`,
      });
    }
    const previous = table[i - 1];
    if (previous !== undefined && framesPerCell > previous) {
      issues.push({
        message: `level ${String(i + 1)} falls slower than level ${String(i)}`,
        path: `${path}[${String(i)}]`,
      });
    }
  });
  return issues;
}

/**
 * Throws ConfigurationError unless the table covers every level up to
 * maxLevel with positive, non-increasing frame counts.
 */
export function validateGravityTable(
  table: ReadonlyArray<number>,
  maxLevel: number,
): void {
  const issues = gravityTableIssues(table, maxLevel);
  if (issues.length > 0) throw new ConfigurationError(issues);
}

// Levels past the end of the table use its last entry
export function framesPerCell(
  table: ReadonlyArray<number>,
  level: number,
): number {
  const i = Math.min(Math.max(level, 1), table.length) - 1;
  return table[i] ?? 1;
}

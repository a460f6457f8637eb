import type { InputSnapshot, Key, KeyEdge } from "./types";

// Deterministic edge order; Pause is read by the session, not here
const KEY_FIELDS: ReadonlyArray<readonly [Key, keyof InputSnapshot]> = [
  ["Hold", "hold"],
  ["CW", "rotateCW"],
  ["CCW", "rotateCCW"],
  ["Left", "moveLeft"],
  ["Right", "moveRight"],
  ["SoftDrop", "softDrop"],
  ["HardDrop", "hardDrop"],
];

export function isKeyHeld(input: InputSnapshot, key: Key): boolean {
  for (const [k, field] of KEY_FIELDS) {
    if (k === key) return input[field];
  }
  return false;
}

/**
 * Diffs two consecutive snapshots into key edges.
 */
export function computeEdges(
  prev: InputSnapshot,
  next: InputSnapshot,
): ReadonlyArray<KeyEdge> {
  const edges: Array<KeyEdge> = [];
  for (const [key, field] of KEY_FIELDS) {
    if (prev[field] !== next[field]) {
      edges.push({ key, type: next[field] ? "down" : "up" });
    }
  }
  return edges;
}

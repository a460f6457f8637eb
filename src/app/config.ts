// Engine configuration: validation of raw JSON into a frozen EngineConfig
// Unknown keys are ignored; every known key but victoryLevel must be present

import { readFileSync } from "node:fs";

import { ConfigurationError } from "../engine/errors";
import {
  DEFAULT_GRAVITY_TABLE,
  gravityTableIssues,
} from "../engine/physics/gravity-table";
import { createDurationMs, createSeed } from "../types/brands";
import { debugLog } from "../utils/debug";

import type { ConfigIssue } from "../engine/errors";
import type { EngineConfig } from "../engine/types";

/** Plain JSON shape of a configuration file. */
export type RawConfig = Partial<{
  boardWidth: number;
  boardHeight: number;
  hiddenRows: number;
  dasMs: number;
  arrMs: number;
  gravityTable: ReadonlyArray<number> | Readonly<Record<string, number>>;
  levelUpLines: number;
  startLevel: number;
  maxLevel: number;
  victoryLevel: number | null;
  ghostEnabled: boolean;
  holdEnabled: boolean;
  previewCount: number;
  spinBonusEnabled: boolean;
  lockDelayMs: number;
  maxLockResets: number;
  softDropFramesPerCell: number;
  lineClearDelayMs: number;
  seed: string;
}>;

export const DEFAULT_ENGINE_CONFIG: EngineConfig = Object.freeze({
  arrMs: createDurationMs(30),
  boardHeight: 20,
  boardWidth: 10,
  dasMs: createDurationMs(170),
  ghostEnabled: true,
  gravityTable: DEFAULT_GRAVITY_TABLE,
  hiddenRows: 3,
  holdEnabled: true,
  levelUpLines: 10,
  lineClearDelayMs: createDurationMs(200),
  lockDelayMs: createDurationMs(500),
  maxLevel: 20,
  maxLockResets: 15,
  previewCount: 3,
  seed: createSeed("blockfall"),
  softDropFramesPerCell: 3,
  spinBonusEnabled: true,
  startLevel: 1,
  victoryLevel: null,
});

// Legacy snake_case keys and the camelCase field each one feeds
const ALIASES: Readonly<Record<string, keyof RawConfig>> = {
  arr_delay: "arrMs",
  das_delay: "dasMs",
  enable_hold: "holdEnabled",
  ghost_piece: "ghostEnabled",
  gravity_table: "gravityTable",
  level_up_lines: "levelUpLines",
  max_level: "maxLevel",
  preview_count: "previewCount",
  spin_bonus: "spinBonusEnabled",
  start_level: "startLevel",
};

// Legacy files nest gameplay keys under these sections
const SECTIONS = ["game", "tetromino"] as const;

function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === "object" && x !== null && !Array.isArray(x);
}

function isNumber(x: unknown): x is number {
  return typeof x === "number" && Number.isFinite(x);
}

function isBoolean(x: unknown): x is boolean {
  return typeof x === "boolean";
}

function isString(x: unknown): x is string {
  return typeof x === "string";
}

/** Flattens legacy sections and renames snake_case keys. */
function normalizeKeys(raw: Record<string, unknown>): Record<string, unknown> {
  const flat: Record<string, unknown> = {};
  for (const section of SECTIONS) {
    const nested = raw[section];
    if (isRecord(nested)) Object.assign(flat, nested);
  }
  for (const [key, value] of Object.entries(raw)) {
    if (!(SECTIONS as ReadonlyArray<string>).includes(key)) flat[key] = value;
  }
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(flat)) {
    const alias = ALIASES[key];
    // camelCase wins when both spellings are given
    if (alias !== undefined) {
      if (!(alias in flat)) out[alias] = value;
    } else {
      out[key] = value;
    }
  }
  return out;
}

// Values a reader returns for a rejected key; never reach an EngineConfig
const UNSET_NUMBER = NaN;
const UNSET_TABLE: ReadonlyArray<number> = [];

class FieldReader {
  readonly issues: Array<ConfigIssue> = [];

  constructor(readonly src: Record<string, unknown>) {}

  /** True when no issue has been recorded against the key. */
  ok(key: keyof RawConfig): boolean {
    return !this.issues.some((i) => i.path === key);
  }

  private present(key: keyof RawConfig): unknown {
    const v = this.src[key];
    if (v === undefined) {
      this.issues.push({ message: "is required", path: key });
    }
    return v;
  }

  integer(key: keyof RawConfig, min: number): number {
    const v = this.present(key);
    if (v === undefined) return UNSET_NUMBER;
    if (!isNumber(v) || !Number.isInteger(v)) {
      this.issues.push({ message: "expected an integer", path: key });
      return UNSET_NUMBER;
    }
    if (v < min) {
      this.issues.push({ message: `must be >= ${String(min)}`, path: key });
      return UNSET_NUMBER;
    }
    return v;
  }

  boolean(key: keyof RawConfig): boolean {
    const v = this.present(key);
    if (v === undefined) return false;
    if (!isBoolean(v)) {
      this.issues.push({ message: "expected a boolean", path: key });
      return false;
    }
    return v;
  }

  string(key: keyof RawConfig): string {
    const v = this.present(key);
    if (v === undefined) return "";
    if (!isString(v) || v.length === 0) {
      this.issues.push({ message: "expected a non-empty string", path: key });
      return "";
    }
    return v;
  }

  gravityTable(): ReadonlyArray<number> {
    const v = this.present("gravityTable");
    if (v === undefined) return UNSET_TABLE;
    if (Array.isArray(v)) {
      return v.map((n: unknown) => (isNumber(n) ? n : NaN));
    }
    if (isRecord(v)) return tableFromLevels(v, this.issues);
    this.issues.push({
      message: "expected an array or a level-keyed object",
      path: "gravityTable",
    });
    return UNSET_TABLE;
  }
}

// { "1": 60, "2": 50, ... } → [60, 50, ...]
function tableFromLevels(
  levels: Record<string, unknown>,
  issues: Array<ConfigIssue>,
): ReadonlyArray<number> {
  const entries: Array<[number, number]> = [];
  for (const [key, value] of Object.entries(levels)) {
    const level = Number(key);
    if (!Number.isInteger(level) || level < 1) {
      issues.push({
        message: `level keys must be integers >= 1, got "${key}"`,
        path: "gravityTable",
      });
      continue;
    }
    entries.push([level, isNumber(value) ? value : NaN]);
  }
  entries.sort((a, b) => a[0] - b[0]);
  entries.forEach(([level], i) => {
    if (level !== i + 1) {
      issues.push({
        message: `missing level ${String(i + 1)}`,
        path: "gravityTable",
      });
    }
  });
  return entries.map(([, fpc]) => fpc);
}

/**
 * Validates raw configuration. Every key but victoryLevel is required; all
 * missing and invalid keys are reported in a single ConfigurationError.
 */
export function parseEngineConfig(raw: unknown): EngineConfig {
  if (!isRecord(raw)) {
    throw new ConfigurationError([
      { message: "expected a JSON object", path: "" },
    ]);
  }
  const r = new FieldReader(normalizeKeys(raw));
  const { issues } = r;

  const boardWidth = r.integer("boardWidth", 4);
  const boardHeight = r.integer("boardHeight", 4);
  const hiddenRows = r.integer("hiddenRows", 1);
  const dasMs = r.integer("dasMs", 0);
  const arrMs = r.integer("arrMs", 0);
  const levelUpLines = r.integer("levelUpLines", 1);
  const startLevel = r.integer("startLevel", 1);
  const maxLevel = r.integer("maxLevel", 1);
  const previewCount = r.integer("previewCount", 0);
  const lockDelayMs = r.integer("lockDelayMs", 0);
  const maxLockResets = r.integer("maxLockResets", 0);
  const softDropFramesPerCell = r.integer("softDropFramesPerCell", 1);
  const lineClearDelayMs = r.integer("lineClearDelayMs", 0);
  const gravityTable = r.gravityTable();
  const ghostEnabled = r.boolean("ghostEnabled");
  const holdEnabled = r.boolean("holdEnabled");
  const spinBonusEnabled = r.boolean("spinBonusEnabled");
  const seed = r.string("seed");

  // Optional: absent or null means no victory level
  const rawVictory = r.src["victoryLevel"];
  const victoryLevel =
    rawVictory === undefined || rawVictory === null
      ? null
      : r.integer("victoryLevel", 1);

  if (r.ok("maxLevel")) {
    if (r.ok("startLevel") && startLevel > maxLevel) {
      issues.push({ message: "must not exceed maxLevel", path: "startLevel" });
    }
    if (
      victoryLevel !== null &&
      r.ok("victoryLevel") &&
      victoryLevel > maxLevel
    ) {
      issues.push({
        message: "must not exceed maxLevel",
        path: "victoryLevel",
      });
    }
  }
  if (r.ok("gravityTable")) {
    const levels = r.ok("maxLevel") ? maxLevel : 0;
    issues.push(...gravityTableIssues(gravityTable, levels, "gravityTable"));
  }

  if (issues.length > 0) {
    debugLog("config", "rejected", issues);
    throw new ConfigurationError(issues);
  }

  return Object.freeze({
    arrMs: createDurationMs(arrMs),
    boardHeight,
    boardWidth,
    dasMs: createDurationMs(dasMs),
    ghostEnabled,
    gravityTable: Object.freeze([...gravityTable]),
    hiddenRows,
    holdEnabled,
    levelUpLines,
    lineClearDelayMs: createDurationMs(lineClearDelayMs),
    lockDelayMs: createDurationMs(lockDelayMs),
    maxLevel,
    maxLockResets,
    previewCount,
    seed: createSeed(seed),
    softDropFramesPerCell,
    spinBonusEnabled,
    startLevel,
    victoryLevel,
  });
}

/** Reads and validates a JSON configuration file. */
export function loadEngineConfig(path: string): EngineConfig {
  const text = readFileSync(path, "utf8");
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError([{ message, path }]);
  }
  debugLog("config", `loaded ${path}`);
  return parseEngineConfig(raw);
}

import type { Command } from "../engine/commands";
import type { DASState } from "../input/machines/das";

/** Logical buttons held during one frame. */
export type InputSnapshot = Readonly<{
  moveLeft: boolean;
  moveRight: boolean;
  softDrop: boolean;
  hardDrop: boolean;
  rotateCW: boolean;
  rotateCCW: boolean;
  hold: boolean;
  pause: boolean;
}>;

export const NO_INPUT: InputSnapshot = {
  hardDrop: false,
  hold: false,
  moveLeft: false,
  moveRight: false,
  pause: false,
  rotateCCW: false,
  rotateCW: false,
  softDrop: false,
};

export type Key =
  | "Left"
  | "Right"
  | "CW"
  | "CCW"
  | "HardDrop"
  | "SoftDrop"
  | "Hold";
export type KeyEdge = { key: Key; type: "down" | "up" };

export type ControlConfig = Readonly<{
  dasMs: number;
  arrMs: number;
}>;

export type HorizontalDir = "Left" | "Right";

/**
 * Telemetry describing how horizontal moves happened
 * (tap, DAS/ARR repeat or a slide to the wall).
 */
export type ControlEvent =
  | { kind: "KeyDown"; key: Key; atMs: number }
  | { kind: "KeyUp"; key: Key; atMs: number }
  | { kind: "Tap"; dir: HorizontalDir; atMs: number }
  | { kind: "DasStart"; dir: HorizontalDir; atMs: number }
  | { kind: "DasMature"; dir: HorizontalDir; atMs: number }
  | { kind: "ArrRepeat"; dir: HorizontalDir; count: number; atMs: number }
  | { kind: "SonicShift"; dir: HorizontalDir; atMs: number };

export type ControlResult = {
  commands: ReadonlyArray<Command>;
  telemetry: ReadonlyArray<ControlEvent>;
};

export type ControlSnapshot = Readonly<{
  clockMs: number;
  dasState: DASState;
  activeDir: HorizontalDir | null;
  dasChargeMs: number;
}>;

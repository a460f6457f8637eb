import { computeEdges, isKeyHeld } from "./edges";
import { NO_INPUT } from "./types";
import {
  DASMachineService,
  createDefaultDASContext,
} from "../input/machines/das";
import { assertNever } from "../engine/types";
import { debugLog } from "../utils/debug";

import type {
  ControlConfig,
  ControlEvent,
  ControlResult,
  ControlSnapshot,
  HorizontalDir,
  InputSnapshot,
  Key,
  KeyEdge,
} from "./types";
import type { Command } from "../engine/commands";
import type { DASOutput, Direction } from "../input/machines/das";

function toDirection(dir: HorizontalDir): Direction {
  return dir === "Left" ? -1 : 1;
}

function fromDirection(direction: Direction): HorizontalDir {
  return direction === -1 ? "Left" : "Right";
}

function moveCommand(dir: HorizontalDir, source: "tap" | "repeat"): Command {
  return dir === "Left"
    ? { kind: "MoveLeft", source }
    : { kind: "MoveRight", source };
}

function isHorizontal(key: Key): key is HorizontalDir {
  return key === "Left" || key === "Right";
}

// Commands grouped so the frame's output is already in priority order
type CommandBuckets = {
  hold: Array<Command>;
  rotation: Array<Command>;
  horizontal: Array<Command>;
  softDrop: Array<Command>;
  hardDrop: Array<Command>;
};

function emptyBuckets(): CommandBuckets {
  return { hardDrop: [], hold: [], horizontal: [], rotation: [], softDrop: [] };
}

function processActionKey(edge: KeyEdge, buckets: CommandBuckets): void {
  const down = edge.type === "down";
  switch (edge.key) {
    case "SoftDrop":
      buckets.softDrop.push({ kind: down ? "SoftDropOn" : "SoftDropOff" });
      break;
    case "HardDrop":
      if (down) buckets.hardDrop.push({ kind: "HardDrop" });
      break;
    case "CW":
      if (down) buckets.rotation.push({ kind: "RotateCW" });
      break;
    case "CCW":
      if (down) buckets.rotation.push({ kind: "RotateCCW" });
      break;
    case "Hold":
      if (down) buckets.hold.push({ kind: "Hold" });
      break;
    case "Left":
    case "Right":
      break;
    default:
      assertNever(edge.key);
  }
}

/**
 * Turns DAS machine output into horizontal commands plus telemetry.
 */
function translateOutput(
  output: DASOutput,
  atMs: number,
  commands: Array<Command>,
  telemetry: Array<ControlEvent>,
): void {
  const dir = fromDirection(output.direction);
  switch (output.type) {
    case "Tap":
      commands.push(moveCommand(dir, "tap"));
      telemetry.push({ atMs, dir, kind: "Tap" });
      telemetry.push({ atMs, dir, kind: "DasStart" });
      break;
    case "Charged":
      telemetry.push({ atMs, dir, kind: "DasMature" });
      break;
    case "Repeat":
      for (let i = 0; i < output.count; i++) {
        commands.push(moveCommand(dir, "repeat"));
      }
      telemetry.push({ atMs, count: output.count, dir, kind: "ArrRepeat" });
      break;
    case "Slide":
      commands.push({
        kind: dir === "Left" ? "ShiftToWallLeft" : "ShiftToWallRight",
      });
      telemetry.push({ atMs, dir, kind: "SonicShift" });
      break;
    default:
      assertNever(output);
  }
}

/**
 * Per-frame input transducer.
 *
 * Diffs the held-button snapshot against the previous frame and turns the
 * edges into engine commands. Horizontal movement goes through the DAS
 * machine:
 * - a press moves once immediately and starts charging DAS;
 * - after dasMs the first repeat fires, then one every arrMs, catching up
 *   when a frame spans several intervals;
 * - with arrMs = 0 every frame past DAS slides to the wall;
 * - the last pressed direction wins; releasing it while the other is still
 *   held charges toward the other, starting with a tap.
 *
 * Time only moves by the elapsedMs handed to update(), so identical input
 * sequences yield identical commands.
 */
export class TimingController {
  private readonly das: DASMachineService;
  private clockMs = 0;
  private prev: InputSnapshot = NO_INPUT;

  constructor(cfg: ControlConfig) {
    this.das = new DASMachineService(
      createDefaultDASContext(cfg.dasMs, cfg.arrMs),
    );
  }

  update(elapsedMs: number, input: InputSnapshot): ControlResult {
    this.clockMs += elapsedMs;
    const at = this.clockMs;
    const prev = this.prev;
    this.prev = input;

    const edges = computeEdges(prev, input);
    const buckets = emptyBuckets();
    const telemetry: Array<ControlEvent> = edges.map(
      (edge): ControlEvent => ({
        atMs: at,
        key: edge.key,
        kind: edge.type === "down" ? "KeyDown" : "KeyUp",
      }),
    );

    // Releases first so swapping directions in one frame taps only once
    const outputs: Array<DASOutput> = [];
    for (const edge of edges) {
      if (edge.type === "up" && isHorizontal(edge.key)) {
        outputs.push(...this.release(edge.key, prev, input, at));
      }
    }
    for (const edge of edges) {
      if (edge.type === "down" && isHorizontal(edge.key)) {
        outputs.push(
          ...this.das.send({
            direction: toDirection(edge.key),
            timestamp: at,
            type: "KEY_DOWN",
          }),
        );
      }
    }
    outputs.push(...this.das.send({ timestamp: at, type: "TIMER_TICK" }));

    for (const output of outputs) {
      translateOutput(output, at, buckets.horizontal, telemetry);
    }
    for (const edge of edges) {
      processActionKey(edge, buckets);
    }

    const commands = [
      ...buckets.hold,
      ...buckets.rotation,
      ...buckets.horizontal,
      ...buckets.softDrop,
      ...buckets.hardDrop,
    ];
    if (commands.length > 0) {
      debugLog("control", `t=${String(at)}ms`, commands);
    }
    return { commands, telemetry };
  }

  /** Milliseconds the active direction has been charging, capped at DAS. */
  dasChargeMs(): number {
    const { context } = this.das.getState();
    if (context.dasStartTime === undefined) return 0;
    return Math.min(this.clockMs - context.dasStartTime, context.dasMs);
  }

  snapshot(): ControlSnapshot {
    const { context, state } = this.das.getState();
    return {
      activeDir:
        context.direction === undefined
          ? null
          : fromDirection(context.direction),
      clockMs: this.clockMs,
      dasChargeMs: this.dasChargeMs(),
      dasState: state,
    };
  }

  updateConfig(cfg: ControlConfig): void {
    this.das.updateConfig(cfg.dasMs, cfg.arrMs);
  }

  /** Forgets held keys and DAS progress; the clock keeps running. */
  reset(): void {
    this.das.reset();
    this.prev = NO_INPUT;
  }

  private release(
    dir: HorizontalDir,
    prev: InputSnapshot,
    input: InputSnapshot,
    at: number,
  ): Array<DASOutput> {
    const { context } = this.das.getState();
    if (context.direction !== toDirection(dir)) return [];

    const outputs = this.das.send({
      direction: toDirection(dir),
      timestamp: at,
      type: "KEY_UP",
    });
    const other: HorizontalDir = dir === "Left" ? "Right" : "Left";
    // A same-frame press of the other key arrives as its own down edge
    if (isKeyHeld(prev, other) && isKeyHeld(input, other)) {
      outputs.push(
        ...this.das.send({
          direction: toDirection(other),
          timestamp: at,
          type: "KEY_DOWN",
        }),
      );
    }
    return outputs;
  }
}

export { computeEdges } from "./edges";
export { NO_INPUT } from "./types";
export type {
  ControlConfig,
  ControlEvent,
  ControlResult,
  ControlSnapshot,
  InputSnapshot,
} from "./types";

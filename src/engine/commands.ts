export type Command =
  | { kind: "MoveLeft"; source?: "tap" | "repeat" }
  | { kind: "MoveRight"; source?: "tap" | "repeat" }
  | { kind: "ShiftToWallLeft" }
  | { kind: "ShiftToWallRight" }
  | { kind: "RotateCW" }
  | { kind: "RotateCCW" }
  | { kind: "SoftDropOn" }
  | { kind: "SoftDropOff" }
  | { kind: "HardDrop" }
  | { kind: "Hold" }
  | { kind: "Pause" }
  | { kind: "Resume" };

// Lower runs first within a frame
const PRIORITY: Record<Command["kind"], number> = {
  HardDrop: 4,
  Hold: 0,
  MoveLeft: 2,
  MoveRight: 2,
  Pause: 0,
  Resume: 0,
  RotateCCW: 1,
  RotateCW: 1,
  ShiftToWallLeft: 2,
  ShiftToWallRight: 2,
  SoftDropOff: 3,
  SoftDropOn: 3,
};

/** Stable sort into hold → rotation → horizontal → soft drop → hard drop. */
export function orderCommands(
  cmds: ReadonlyArray<Command>,
): ReadonlyArray<Command> {
  return cmds
    .map((cmd, i) => ({ cmd, i }))
    .sort((a, b) => PRIORITY[a.cmd.kind] - PRIORITY[b.cmd.kind] || a.i - b.i)
    .map(({ cmd }) => cmd);
}

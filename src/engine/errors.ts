/**
 * Error hierarchy for contract violations and start-up failures.
 *
 * Rejected moves and rotations are ordinary values and top-out is a phase;
 * none of them surface through these classes.
 */
export abstract class EngineError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Readonly<Record<string, unknown>>,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export type ConfigIssue = Readonly<{ path: string; message: string }>;

export class ConfigurationError extends EngineError {
  constructor(public readonly issues: ReadonlyArray<ConfigIssue>) {
    super(
      `Invalid engine configuration: ${issues
        .map((i) => `${i.path}: ${i.message}`)
        .join("; ")}`,
      "CONFIGURATION_ERROR",
      { issues },
    );
  }
}

export class OutOfBoundsError extends EngineError {
  constructor(
    public readonly x: number,
    public readonly y: number,
  ) {
    super(
      `Cell (${String(x)}, ${String(y)}) is outside the board`,
      "OUT_OF_BOUNDS",
      { x, y },
    );
  }
}

export class InvariantViolationError extends EngineError {
  constructor(message: string, details?: Readonly<Record<string, unknown>>) {
    super(message, "INVARIANT_VIOLATION", details);
  }
}

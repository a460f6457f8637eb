// Branded primitive types for type safety and domain modeling

// Duration in milliseconds - for time intervals/deltas
declare const DurationMsBrand: unique symbol;
export type DurationMs = number & { readonly [DurationMsBrand]: true };

// Grid coordinates - for board positions (must be integers)
declare const GridCoordBrand: unique symbol;
export type GridCoord = number & { readonly [GridCoordBrand]: true };

// Cell values - 0=empty, 1-7=pieces
declare const CellValueBrand: unique symbol;
export type CellValue = (0 | 1 | 2 | 3 | 4 | 5 | 6 | 7) & {
  readonly [CellValueBrand]: true;
};

// RNG seed - for random number generator seeding
declare const SeedBrand: unique symbol;
export type Seed = string & { readonly [SeedBrand]: true };

// DurationMs constructors and guards
export function createDurationMs(value: number): DurationMs {
  if (value < 0 || !Number.isFinite(value)) {
    throw new Error("DurationMs must be a non-negative finite number");
  }
  return value as DurationMs;
}

export function isDurationMs(n: unknown): n is DurationMs {
  return typeof n === "number" && n >= 0 && Number.isFinite(n);
}

// GridCoord constructor
export function createGridCoord(value: number): GridCoord {
  if (!Number.isInteger(value)) {
    throw new Error("GridCoord must be an integer");
  }
  return value as GridCoord;
}

// CellValue constructor
export function createCellValue(value: number): CellValue {
  if (!Number.isInteger(value) || value < 0 || value > 7) {
    throw new Error("CellValue must be an integer from 0 to 7");
  }
  return value as CellValue;
}

// Seed constructor
export function createSeed(value: string): Seed {
  if (value.length === 0) {
    throw new Error("Seed must be a non-empty string");
  }
  return value as Seed;
}

// Conversion helpers for interop at boundaries
export const durationMsAsNumber = (d: DurationMs): number => d as number;
export const gridCoordAsNumber = (g: GridCoord): number => g as number;
export const seedAsString = (s: Seed): string => s as string;

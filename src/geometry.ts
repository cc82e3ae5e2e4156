import type { Direction, Point } from "./types.js";

export function point(row: number, col: number): Point {
  if (!Number.isInteger(row) || !Number.isInteger(col) || row < 0 || col < 0) {
    throw new RangeError(`Invalid grid point (${row}, ${col})`);
  }
  return { row, col };
}

export function pointKey(p: Point): string {
  return `${p.row},${p.col}`;
}

export function pointsEqual(a: Point, b: Point): boolean {
  return a.row === b.row && a.col === b.col;
}

export function comparePoints(a: Point, b: Point): number {
  return a.row - b.row || a.col - b.col;
}

const opposites: Record<Direction, Direction> = {
  UP: "DOWN", DOWN: "UP", LEFT: "RIGHT", RIGHT: "LEFT",
};

export function oppositeOf(dir: Direction): Direction {
  return opposites[dir];
}

export function isOpposite(a: Direction, b: Direction): boolean {
  return opposites[a] === b;
}

/**
 * Returns the neighbouring cell in `dir`. Coordinates are unsigned, so
 * stepping UP from row 0 or LEFT from col 0 is a RangeError.
 */
export function advance(p: Point, dir: Direction): Point {
  switch (dir) {
    case "UP":    return point(p.row - 1, p.col);
    case "DOWN":  return point(p.row + 1, p.col);
    case "LEFT":  return point(p.row, p.col - 1);
    case "RIGHT": return point(p.row, p.col + 1);
  }
}

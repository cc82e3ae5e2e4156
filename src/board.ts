import { comparePoints, point, pointKey } from "./geometry.js";
import type { Point, RandomSource } from "./types.js";

export function randomInt(min: number, max: number, random: RandomSource = Math.random): number {
  return Math.floor(random() * (max - min)) + min;
}

export function isInterior(p: Point, height: number, width: number): boolean {
  return p.row > 0 && p.row < height - 1 && p.col > 0 && p.col < width - 1;
}

/** Interior cells free for food placement. */
export class OpenSpace {
  private cells = new Map<string, Point>();

  static interior(height: number, width: number, excluded: Iterable<Point> = []): OpenSpace {
    const space = new OpenSpace();
    for (let row = 1; row < height - 1; row++) {
      for (let col = 1; col < width - 1; col++) {
        space.insert(point(row, col));
      }
    }
    for (const p of excluded) {
      space.remove(p);
    }
    return space;
  }

  get size(): number {
    return this.cells.size;
  }

  has(p: Point): boolean {
    return this.cells.has(pointKey(p));
  }

  insert(p: Point): void {
    this.cells.set(pointKey(p), p);
  }

  remove(p: Point): void {
    this.cells.delete(pointKey(p));
  }

  /** Members ordered by (row, col). */
  points(): Point[] {
    return [...this.cells.values()].sort(comparePoints);
  }

  // Indexing into the sorted enumeration keeps the pick reproducible for a
  // seeded random source.
  pickRandom(random: RandomSource = Math.random): Point {
    if (this.cells.size === 0) {
      throw new Error("No open space left to pick from");
    }
    const ordered = this.points();
    return ordered[randomInt(0, ordered.length, random)];
  }
}

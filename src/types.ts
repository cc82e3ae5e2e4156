import type { z } from "zod";
import type {
  BodySegmentSchema,
  DirectionSchema,
  GridSchema,
  KeyEventSchema,
  LogSettingsSchema,
  PointSchema,
} from "./schemas.js";

export type Direction = z.infer<typeof DirectionSchema>;

export type Point = Readonly<z.infer<typeof PointSchema>>;

// heading is the direction of travel when the cell was entered
export type BodySegment = Readonly<z.infer<typeof BodySegmentSchema>>;

export type Grid = z.infer<typeof GridSchema>;

export type KeyEvent = z.infer<typeof KeyEventSchema>;

export type LogSettings = z.infer<typeof LogSettingsSchema>;

/** Result of a single engine step. */
export type GameStatus = "continue" | "over" | "win";

export type Command = Direction | "PAUSE" | "QUIT" | "UNKNOWN";

export interface GameResult {
  status: Exclude<GameStatus, "continue"> | "quit";
  score: number;
  ticks: number;
}

/** Read-only view of the engine handed to the renderer. */
export interface GameView {
  grid: Grid;
  score: number;
  food: Point;
  segments: readonly BodySegment[];
}

/** Source of uniformly distributed numbers in [0, 1). */
export type RandomSource = () => number;

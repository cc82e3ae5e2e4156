import { LogSettingsSchema } from "./schemas.js";
import type { BodySegment, Direction, LogSettings, Point } from "./types.js";

const startingBody: BodySegment[] = [  // head first
  { position: { row: 1, col: 2 }, heading: "RIGHT" },
  { position: { row: 1, col: 1 }, heading: "RIGHT" },
];
const initialFood: Point = { row: 1, col: 5 };
const initialCommand: Direction = "RIGHT";

export const config = {
  tickRateMs: 62.5,         // 16 ticks/second
  pointsPerFood: 100,
  startingBody,
  initialFood,
  initialCommand,
  glyphs: {
    border: "█",
    food: "O",
    UP: "^",
    DOWN: "v",
    LEFT: "<",
    RIGHT: ">",
  },
};

export function loadLogSettings(env: NodeJS.ProcessEnv): LogSettings {
  return LogSettingsSchema.parse({
    level: env.LOG_LEVEL || undefined,
    file: env.SNAKE_LOG_FILE || undefined,
  });
}

import { config } from "./config.js";
import { isInterior, OpenSpace } from "./board.js";
import { pointsEqual } from "./geometry.js";
import { silentLogger, type Logger } from "./logger.js";
import { GridSchema } from "./schemas.js";
import { Snake } from "./snake.js";
import type {
  BodySegment, Direction, GameStatus, GameView, Grid, Point, RandomSource,
} from "./types.js";

export class GameSetupError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "GameSetupError";
  }
}

export interface GameOptions {
  grid: Grid;
  random?: RandomSource;
  logger?: Logger;
  start?: readonly BodySegment[];
  food?: Point;
}

export class SnakeGame {
  readonly grid: Grid;
  private snake: Snake;
  private openSpace: OpenSpace;
  private foodAt: Point;
  private points = 0;
  private state: GameStatus = "continue";
  private readonly random: RandomSource;
  private readonly log: Logger;

  constructor(options: GameOptions) {
    const parsed = GridSchema.safeParse(options.grid);
    if (!parsed.success) {
      throw new GameSetupError(
        `Terminal too small: ${options.grid.width}x${options.grid.height} cells`,
      );
    }
    this.grid = parsed.data;
    this.random = options.random ?? Math.random;
    this.log = (options.logger ?? silentLogger).child({ component: "game" });

    const { height, width } = this.grid;
    const start = options.start ?? config.startingBody;
    for (const seg of start) {
      if (!isInterior(seg.position, height, width)) {
        throw new GameSetupError(
          `Terminal too small for the starting snake: ${width}x${height} cells`,
        );
      }
    }
    this.snake = new Snake(start);
    this.openSpace = OpenSpace.interior(height, width, start.map(s => s.position));

    const food = options.food ?? config.initialFood;
    if (!this.openSpace.has(food)) {
      throw new GameSetupError(`Initial food at (${food.row}, ${food.col}) is not an open cell`);
    }
    this.foodAt = food;
    this.openSpace.remove(food);

    this.log.info({ height, width, openCells: this.openSpace.size }, "game created");
  }

  get score(): number {
    return this.points;
  }

  get status(): GameStatus {
    return this.state;
  }

  get food(): Point {
    return this.foodAt;
  }

  get heading(): Direction {
    return this.snake.head.heading;
  }

  get segments(): readonly BodySegment[] {
    return this.snake.segments;
  }

  get openCells(): Point[] {
    return this.openSpace.points();
  }

  view(): GameView {
    return {
      grid: this.grid,
      score: this.points,
      food: this.foodAt,
      segments: this.snake.segments,
    };
  }

  // --- Tick ---

  update(direction: Direction): GameStatus {
    if (this.state !== "continue") {
      throw new Error("Game has already ended");
    }
    this.state = this.step(direction);
    if (this.state !== "continue") {
      this.log.info({ status: this.state, score: this.points, length: this.snake.length }, "game ended");
    }
    return this.state;
  }

  private step(direction: Direction): GameStatus {
    const { height, width } = this.grid;

    // 1. Move
    const oldTail = this.snake.tail;
    this.snake.move(direction);
    const head = this.snake.head.position;
    this.openSpace.remove(head);

    // 2. Border collision
    if (head.row === 0 || head.row >= height - 1 || head.col === 0 || head.col >= width - 1) {
      this.log.debug({ head }, "hit border");
      return "over";
    }

    // 3. Self collision
    if (this.snake.bodyCollides()) {
      this.log.debug({ head }, "hit own body");
      return "over";
    }

    // 4. Food
    if (pointsEqual(head, this.foodAt)) {
      if (this.openSpace.size === 0) {
        return "win";
      }
      this.snake.grow(oldTail);
      this.points += config.pointsPerFood;
      this.placeFood();
      return "continue";
    }

    // The head may have moved into the cell the tail just left.
    if (!pointsEqual(oldTail.position, head)) {
      this.openSpace.insert(oldTail.position);
    }
    return "continue";
  }

  // --- Food ---

  private placeFood() {
    this.foodAt = this.openSpace.pickRandom(this.random);
    this.openSpace.remove(this.foodAt);
    this.log.debug({ food: this.foodAt, score: this.points }, "food placed");
  }
}

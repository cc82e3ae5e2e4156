import { setTimeout as delay } from "node:timers/promises";
import { config } from "./config.js";
import { isOpposite } from "./geometry.js";
import type { SnakeGame } from "./game.js";
import { directionOf, type InputRelay } from "./input.js";
import { silentLogger, type Logger } from "./logger.js";
import type { Renderer } from "./render.js";
import type { Command, Direction, GameResult } from "./types.js";

export interface PlayOptions {
  tickRateMs?: number;
  /** Resolves once the tick window has elapsed. */
  wait?: (ms: number) => Promise<void>;
  logger?: Logger;
}

const messages: Record<GameResult["status"], string> = {
  over: "Game Over",
  win: "You Win",
  quit: "Quit",
};

/**
 * Picks the command that counts for this tick: the latest QUIT or
 * direction received during the window, or null when there was none.
 */
export function latestCommand(commands: readonly Command[]): Direction | "QUIT" | null {
  for (let i = commands.length - 1; i >= 0; i--) {
    const command = commands[i];
    if (command === "QUIT") return command;
    const dir = directionOf(command);
    if (dir) return dir;
  }
  return null;
}

/** A reversal would put the head straight into the neck, so keep going. */
export function resolveDirection(requested: Direction, heading: Direction): Direction {
  return isOpposite(requested, heading) ? heading : requested;
}

export async function play(
  game: SnakeGame,
  relay: InputRelay,
  renderer: Renderer,
  options: PlayOptions = {},
): Promise<GameResult> {
  const tickRateMs = options.tickRateMs ?? config.tickRateMs;
  const wait = options.wait ?? ((ms: number) => delay(ms));
  const log = (options.logger ?? silentLogger).child({ component: "loop" });

  let command: Direction = config.initialCommand;
  let ticks = 0;

  const finish = (status: GameResult["status"]): GameResult => {
    const { height, width } = game.grid;
    renderer.announce(`${messages[status]}: ${game.score}`, width, height);
    log.info({ status, score: game.score, ticks }, "loop finished");
    return { status, score: game.score, ticks };
  };

  for (;;) {
    renderer.draw(game.view());
    await wait(tickRateMs);

    const latest = latestCommand(relay.drain());
    if (latest === "QUIT") return finish("quit");
    if (latest) command = latest;

    command = resolveDirection(command, game.heading);
    ticks++;
    const status = game.update(command);
    if (status !== "continue") return finish(status);
  }
}

#!/usr/bin/env node
import { loadLogSettings } from "./config.js";
import { SnakeGame } from "./game.js";
import { InputRelay } from "./input.js";
import { createLogger } from "./logger.js";
import { play } from "./loop.js";
import { Renderer } from "./render.js";
import { NodeTerminal, type Terminal } from "./terminal.js";

const logger = createLogger(loadLogSettings(process.env));

let terminal: Terminal | null = null;
let failure: unknown = null;
try {
  terminal = new NodeTerminal();
  const grid = terminal.size();
  const game = new SnakeGame({ grid, logger });

  terminal.clearScreen();
  terminal.hideCursor();

  const relay = new InputRelay(terminal, logger);
  relay.start();

  const result = await play(game, relay, new Renderer(terminal), { logger });
  logger.info(result, "session finished");
} catch (err) {
  failure = err;
} finally {
  terminal?.close();
}

// Reported after close() so the message lands on a restored terminal.
if (failure !== null) {
  logger.fatal({ err: failure }, "snake crashed");
  console.error(failure instanceof Error ? failure.message : failure);
  process.exitCode = 1;
}

import { silentLogger, type Logger } from "./logger.js";
import { TerminalClosedError, type Terminal } from "./terminal.js";
import type { Command, Direction, KeyEvent } from "./types.js";

const keyCommands = new Map<string, Command>([
  ["up", "UP"],
  ["down", "DOWN"],
  ["left", "LEFT"],
  ["right", "RIGHT"],
  ["escape", "PAUSE"],
]);

export function decodeKey(key: KeyEvent): Command {
  if (key.ctrl && key.name === "c") return "QUIT";
  if (!key.ctrl && key.name === "q") return "QUIT";
  return keyCommands.get(key.name) ?? "UNKNOWN";
}

export function directionOf(command: Command): Direction | null {
  switch (command) {
    case "UP":
    case "DOWN":
    case "LEFT":
    case "RIGHT":
      return command;
    case "PAUSE":
    case "QUIT":
    case "UNKNOWN":
      return null;
  }
}

/**
 * Reads keys in the background and queues decoded commands for the game
 * loop. The queue is the only thing shared with the loop.
 */
export class InputRelay {
  private queue: Command[] = [];
  private failure: unknown = null;
  private running: Promise<void> | null = null;
  private readonly log: Logger;

  constructor(private readonly terminal: Terminal, logger: Logger = silentLogger) {
    this.log = logger.child({ component: "input" });
  }

  start(): void {
    if (this.running) return;
    this.running = this.pump().catch((err: unknown) => {
      if (err instanceof TerminalClosedError) return;
      this.log.error({ err }, "key read failed");
      this.failure = err;
    });
  }

  /** Returns everything queued since the last call, oldest first. */
  drain(): Command[] {
    if (this.failure !== null) throw this.failure;
    const commands = this.queue;
    this.queue = [];
    return commands;
  }

  private async pump(): Promise<void> {
    for (;;) {
      const key = await this.terminal.readKey();
      const command = decodeKey(key);
      this.log.trace({ key: key.name, command }, "key");
      this.queue.push(command);
    }
  }
}

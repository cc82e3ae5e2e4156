import chalk, { type ChalkInstance } from "chalk";
import { config } from "./config.js";
import type { Terminal } from "./terminal.js";
import type { GameView } from "./types.js";

export class Renderer {
  constructor(
    private readonly terminal: Terminal,
    private readonly style: ChalkInstance = chalk,
  ) {}

  draw(view: GameView): void {
    const t = this.terminal;
    const { height, width } = view.grid;
    const { glyphs } = config;

    t.clearScreen();

    // Border
    const edge = glyphs.border.repeat(width);
    t.moveCursorTo(0, 0);
    t.write(edge);
    t.moveCursorTo(0, height - 1);
    t.write(edge);
    for (let row = 1; row < height - 1; row++) {
      t.moveCursorTo(0, row);
      t.write(glyphs.border);
      t.moveCursorTo(width - 1, row);
      t.write(glyphs.border);
    }

    // Score sits on the bottom border
    t.moveCursorTo(0, height - 1);
    t.write(this.style.black.bgWhite(`Score: ${view.score}`));

    t.moveCursorTo(view.food.col, view.food.row);
    t.write(this.style.red.bgBlack(glyphs.food));

    for (const seg of view.segments) {
      t.moveCursorTo(seg.position.col, seg.position.row);
      t.write(this.style.green.bgWhite(glyphs[seg.heading]));
    }
  }

  /** Writes a one-line message centred on the middle row. */
  announce(message: string, width: number, height: number): void {
    const col = Math.max(0, Math.floor((width - message.length) / 2));
    this.terminal.moveCursorTo(col, Math.floor(height / 2));
    this.terminal.write(this.style.bold(message));
  }
}

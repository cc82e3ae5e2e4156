import { clearScreenDown, cursorTo, emitKeypressEvents } from "node:readline";
import type { ReadStream, WriteStream } from "node:tty";
import { KeyEventSchema } from "./schemas.js";
import type { Grid, KeyEvent } from "./types.js";

export class TerminalError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TerminalError";
  }
}

export class TerminalClosedError extends TerminalError {
  constructor() {
    super("Terminal closed");
    this.name = "TerminalClosedError";
  }
}

/** Everything the game needs from a character terminal. */
export interface Terminal {
  size(): Grid;
  clearScreen(): void;
  moveCursorTo(col: number, row: number): void;
  write(text: string): void;
  readKey(): Promise<KeyEvent>;
  hideCursor(): void;
  /** Restores the cursor and cooked mode; pending reads reject. */
  close(): void;
}

interface Waiter {
  resolve: (key: KeyEvent) => void;
  reject: (err: Error) => void;
}

export class NodeTerminal implements Terminal {
  private pending: KeyEvent[] = [];
  private waiters: Waiter[] = [];
  private failure: Error | null = null;
  private closed = false;

  constructor(
    private readonly input: ReadStream = process.stdin,
    private readonly output: WriteStream = process.stdout,
  ) {
    if (!input.isTTY || !output.isTTY) {
      throw new TerminalError("Snake needs an interactive terminal");
    }
    emitKeypressEvents(input);
    input.setRawMode(true);
    input.on("keypress", this.onKeypress);
    input.on("error", this.onError);
    output.on("error", this.onError);
    input.resume();
  }

  size(): Grid {
    this.check();
    return { height: this.output.rows, width: this.output.columns };
  }

  clearScreen(): void {
    this.check();
    cursorTo(this.output, 0, 0);
    clearScreenDown(this.output);
  }

  moveCursorTo(col: number, row: number): void {
    this.check();
    cursorTo(this.output, col, row);
  }

  write(text: string): void {
    this.check();
    this.output.write(text);
  }

  readKey(): Promise<KeyEvent> {
    if (this.failure) return Promise.reject(this.failure);
    if (this.closed) return Promise.reject(new TerminalClosedError());
    const key = this.pending.shift();
    if (key) return Promise.resolve(key);
    return new Promise((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  hideCursor(): void {
    this.write("\x1b[?25l");
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.input.off("keypress", this.onKeypress);
    if (this.input.isTTY) this.input.setRawMode(false);
    this.input.pause();
    if (!this.failure) {
      this.output.write("\x1b[?25h\n");
    }
    const waiters = this.waiters;
    this.waiters = [];
    for (const w of waiters) w.reject(new TerminalClosedError());
  }

  private check() {
    if (this.failure) throw this.failure;
    if (this.closed) throw new TerminalClosedError();
  }

  private onKeypress = (_str: string | undefined, key: unknown) => {
    const parsed = KeyEventSchema.safeParse(key ?? {});
    if (!parsed.success) return;
    const waiter = this.waiters.shift();
    if (waiter) waiter.resolve(parsed.data);
    else this.pending.push(parsed.data);
  };

  private onError = (err: Error) => {
    const failure = new TerminalError(`Terminal I/O failed: ${err.message}`, { cause: err });
    this.failure = failure;
    const waiters = this.waiters;
    this.waiters = [];
    for (const w of waiters) w.reject(failure);
  };
}

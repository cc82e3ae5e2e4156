import { TerminalClosedError, type Terminal } from "../src/terminal.js";
import type { Grid, KeyEvent, RandomSource } from "../src/types.js";

export function key(name: string, ctrl = false): KeyEvent {
  return { name, sequence: name, ctrl };
}

/** Deterministic PRNG (mulberry32). */
export function seededRandom(seed: number): RandomSource {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Lets queued promise callbacks run. */
export function flush(): Promise<void> {
  return new Promise(resolve => setImmediate(resolve));
}

interface Waiter {
  resolve: (key: KeyEvent) => void;
  reject: (err: Error) => void;
}

/** In-memory terminal: a sparse character grid plus a scripted key queue. */
export class FakeTerminal implements Terminal {
  cells = new Map<string, string>();
  cursorHidden = false;
  closed = false;
  private cursor = { col: 0, row: 0 };
  private keys: KeyEvent[] = [];
  private waiters: Waiter[] = [];
  private failure: Error | null = null;

  constructor(private readonly grid: Grid) {}

  size(): Grid {
    return this.grid;
  }

  clearScreen(): void {
    this.cells.clear();
    this.cursor = { col: 0, row: 0 };
  }

  moveCursorTo(col: number, row: number): void {
    this.cursor = { col, row };
  }

  write(text: string): void {
    for (const ch of text) {
      this.cells.set(`${this.cursor.row},${this.cursor.col}`, ch);
      this.cursor.col++;
    }
  }

  readKey(): Promise<KeyEvent> {
    if (this.failure) return Promise.reject(this.failure);
    if (this.closed) return Promise.reject(new TerminalClosedError());
    const next = this.keys.shift();
    if (next) return Promise.resolve(next);
    return new Promise((resolve, reject) => this.waiters.push({ resolve, reject }));
  }

  hideCursor(): void {
    this.cursorHidden = true;
  }

  close(): void {
    this.closed = true;
    this.rejectAll(new TerminalClosedError());
  }

  press(...events: KeyEvent[]): void {
    for (const event of events) {
      const waiter = this.waiters.shift();
      if (waiter) waiter.resolve(event);
      else this.keys.push(event);
    }
  }

  failReads(err: Error): void {
    this.failure = err;
    this.rejectAll(err);
  }

  charAt(row: number, col: number): string {
    return this.cells.get(`${row},${col}`) ?? " ";
  }

  textAt(row: number, col: number, length: number): string {
    let text = "";
    for (let i = 0; i < length; i++) text += this.charAt(row, col + i);
    return text;
  }

  private rejectAll(err: Error) {
    const waiters = this.waiters;
    this.waiters = [];
    for (const w of waiters) w.reject(err);
  }
}

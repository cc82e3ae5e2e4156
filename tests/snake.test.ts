import { describe, it, expect } from "vitest";
import { Snake } from "../src/snake.js";
import type { BodySegment } from "../src/types.js";

const start: BodySegment[] = [
  { position: { row: 1, col: 2 }, heading: "RIGHT" },
  { position: { row: 1, col: 1 }, heading: "RIGHT" },
];

const positions = (snake: Snake) => snake.segments.map(s => s.position);

describe("snake", () => {
  it("needs at least one segment", () => {
    expect(() => new Snake([])).toThrow();
  });

  it("moves without changing length", () => {
    const snake = new Snake(start);
    snake.move("RIGHT");
    expect(snake.length).toBe(2);
    expect(positions(snake)).toEqual([{ row: 1, col: 3 }, { row: 1, col: 2 }]);

    snake.move("DOWN");
    expect(snake.length).toBe(2);
    expect(snake.head).toEqual({ position: { row: 2, col: 3 }, heading: "DOWN" });
    expect(snake.tail).toEqual({ position: { row: 1, col: 3 }, heading: "RIGHT" });
  });

  it("grows by exactly the reinstated tail", () => {
    const snake = new Snake(start);
    const oldTail = snake.tail;
    snake.move("RIGHT");
    const before = positions(snake);
    snake.grow(oldTail);
    expect(snake.length).toBe(3);
    expect(positions(snake)).toEqual([...before, { row: 1, col: 1 }]);
  });

  it("advances the head and retracts the tail separately", () => {
    const snake = new Snake(start);
    expect(snake.advanceHead("DOWN")).toEqual({ position: { row: 2, col: 2 }, heading: "DOWN" });
    expect(snake.length).toBe(3);
    expect(snake.retractTail()).toEqual({ position: { row: 1, col: 1 }, heading: "RIGHT" });
    expect(snake.length).toBe(2);
  });

  it("never retracts its last segment", () => {
    const snake = new Snake([start[0]]);
    expect(() => snake.retractTail()).toThrow();
  });

  it("detects the head on its own body", () => {
    const snake = new Snake([
      { position: { row: 2, col: 2 }, heading: "LEFT" },
      { position: { row: 2, col: 3 }, heading: "UP" },
      { position: { row: 3, col: 3 }, heading: "RIGHT" },
      { position: { row: 3, col: 2 }, heading: "RIGHT" },
      { position: { row: 3, col: 1 }, heading: "RIGHT" },
    ]);
    expect(snake.bodyCollides()).toBe(false);
    snake.move("DOWN");
    expect(snake.head.position).toEqual({ row: 3, col: 2 });
    expect(snake.bodyCollides()).toBe(true);
  });
});

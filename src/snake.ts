import { advance, pointsEqual } from "./geometry.js";
import type { BodySegment, Direction } from "./types.js";

export class Snake {
  // body[0] is the head
  private body: BodySegment[];

  constructor(start: readonly BodySegment[]) {
    if (start.length === 0) {
      throw new Error("A snake needs at least one segment");
    }
    this.body = [...start];
  }

  get head(): BodySegment {
    return this.body[0];
  }

  get tail(): BodySegment {
    return this.body[this.body.length - 1];
  }

  get length(): number {
    return this.body.length;
  }

  get segments(): readonly BodySegment[] {
    return this.body;
  }

  advanceHead(dir: Direction): BodySegment {
    const head: BodySegment = { position: advance(this.head.position, dir), heading: dir };
    this.body.unshift(head);
    return head;
  }

  retractTail(): BodySegment {
    if (this.body.length === 1) {
      throw new Error("Cannot retract the last segment");
    }
    const tail = this.tail;
    this.body.pop();
    return tail;
  }

  grow(segment: BodySegment): void {
    this.body.push(segment);
  }

  move(dir: Direction): void {
    this.advanceHead(dir);
    this.retractTail();
  }

  /** True when the head shares a cell with any other segment. */
  bodyCollides(): boolean {
    const head = this.head.position;
    return this.body.some((seg, i) => i > 0 && pointsEqual(seg.position, head));
  }
}

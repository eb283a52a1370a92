import type { OverflowPolicy } from "./types.js";

export type OfferResult<T> =
  | { readonly accepted: true; readonly evicted?: T }
  | { readonly accepted: false };

/**
 * Fixed-capacity FIFO shared by the capturing caller and the delivery worker.
 *
 * Every operation is synchronous, so on Node's single thread each call is its own critical
 * section; the worker never holds the buffer across an await.
 */
export class BoundedEventBuffer<T> {
  private items: T[] = [];

  constructor(
    readonly capacity: number,
    readonly overflowPolicy: OverflowPolicy = "drop_newest",
  ) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Buffer capacity must be a positive integer, received ${capacity}`);
    }
  }

  get size(): number {
    return this.items.length;
  }

  get isFull(): boolean {
    return this.items.length >= this.capacity;
  }

  offer(item: T): OfferResult<T> {
    if (!this.isFull) {
      this.items.push(item);
      return { accepted: true };
    }

    switch (this.overflowPolicy) {
      case "drop_newest":
        return { accepted: false };
      case "drop_oldest": {
        const evicted = this.items.shift();
        this.items.push(item);
        return evicted === undefined ? { accepted: true } : { accepted: true, evicted };
      }
      default:
        return assertNever(this.overflowPolicy);
    }
  }

  /** Removes and returns up to `max` items, oldest first. */
  drain(max: number = this.items.length): T[] {
    return this.items.splice(0, Math.max(0, max));
  }

  /**
   * Puts undelivered items back ahead of anything captured since they were drained.
   * Returns the tail of `items` that did not fit.
   */
  requeue(items: ReadonlyArray<T>): T[] {
    const free = this.capacity - this.items.length;
    const fitting = items.slice(0, Math.max(0, free));
    this.items = [...fitting, ...this.items];
    return items.slice(fitting.length);
  }
}

const assertNever = (value: never): never => {
  throw new Error(`Unhandled overflow policy: ${String(value)}`);
};

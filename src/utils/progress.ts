/**
 * Bounded queue with non-blocking send-or-discard semantics.
 *
 * Producers call `offer`, which never waits: once `capacity` updates are
 * buffered, further updates are dropped until the consumer drains.
 */
export class ProgressChannel<T> {
  private buffer: T[] = [];
  private dropped = 0;

  constructor(private readonly capacity = 100) {}

  offer(update: T): boolean {
    if (this.buffer.length >= this.capacity) {
      this.dropped++;
      return false;
    }
    this.buffer.push(update);
    return true;
  }

  drain(): T[] {
    const drained = this.buffer;
    this.buffer = [];
    return drained;
  }

  get size(): number {
    return this.buffer.length;
  }

  get droppedCount(): number {
    return this.dropped;
  }
}

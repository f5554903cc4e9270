/**
 * Runs tasks one at a time per key. A turn reads the transcript, waits on the
 * model and then appends, so two overlapping turns on one session would
 * interleave their messages.
 *
 * Ordering holds within this process only; several instances sharing one
 * Redis do not serialize against each other.
 */
export class TurnQueue {
  private tails = new Map<string, Promise<void>>();

  run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(task);

    // The tail only orders turns; the caller sees failures through `result`
    const tail: Promise<void> = result.then(
      () => this.release(key, tail),
      () => this.release(key, tail),
    );
    this.tails.set(key, tail);
    return result;
  }

  /** Keys with a turn running or waiting. */
  get activeKeys(): number {
    return this.tails.size;
  }

  private release(key: string, tail: Promise<void>): void {
    if (this.tails.get(key) === tail) {
      this.tails.delete(key);
    }
  }
}

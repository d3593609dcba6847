/**
 * Runs queued work strictly one at a time, in arrival order.
 */
export class ActorMailbox {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  get idle(): boolean {
    return this.pending === 0;
  }

  async run<TOutput>(operation: () => Promise<TOutput>): Promise<TOutput> {
    this.pending += 1;
    const acquire = this.tail;
    let releaseTail: () => void = () => {};
    const releaseSignal = new Promise<void>((resolve) => {
      releaseTail = resolve;
    });
    this.tail = this.tail.then(() => releaseSignal);

    await acquire;
    try {
      return await operation();
    } finally {
      releaseTail();
      this.pending -= 1;
    }
  }
}

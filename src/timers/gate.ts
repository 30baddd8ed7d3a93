/**
 * Binary gate with acquire/release semantics. Waiters are served in FIFO
 * order; release() hands the gate straight to the next waiter.
 */
export class Gate {
  private held = false;
  private readonly waiters: Array<() => void> = [];

  get locked(): boolean {
    return this.held;
  }

  acquire(): Promise<void> {
    if (!this.held) {
      this.held = true;
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  release(): void {
    if (!this.held) throw new Error('Gate released while not locked');
    const next = this.waiters.shift();
    if (next) {
      next();
      return;
    }
    this.held = false;
  }
}

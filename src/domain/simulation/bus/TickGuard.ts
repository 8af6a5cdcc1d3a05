/**
 * Drops input older than the newest tick a consumer has already handled.
 * Ordering is only guaranteed per channel, so each consumer keeps its own
 * guard for each channel it reads.
 */
export class TickGuard {
  private lastTick = -1;

  /**
   * @returns true when the message is current and should be processed
   */
  accept(tick: number): boolean {
    if (tick < this.lastTick) {
      return false;
    }
    this.lastTick = tick;
    return true;
  }

  get latest(): number {
    return this.lastTick;
  }
}

/**
 * @description
 * Accumulates elapsed time and fires a callback at a fixed rate.
 *
 * Entity owners use it to pace full snapshots: the host calls `advance`
 * every frame with the frame's elapsed time, and the ticker fires once per
 * replication interval regardless of the frame rate.
 *
 * @remarks
 * - At most `maxTicksPerAdvance` ticks run per call; when a frame was too long
 *   the backlog is dropped and reported through `onTickSkipped`, since a
 *   burst of snapshots carries nothing a single one does not.
 */
export class FixedTicker {
  /**
   * @description Accumulator for the time passed since the last tick (ms)
   */
  private accumulator = 0;

  /**
   * @description Ticks per second
   */
  readonly rate: number;

  /**
   * @description Milliseconds per tick
   */
  readonly intervalMs: number;

  private readonly maxTicksPerAdvance: number;
  private readonly onTick: (tick: number) => void;
  private readonly onTickSkipped?: (skippedTicks: number) => void;
  private _tickCount = 0;

  constructor({ rate, onTick, onTickSkipped, maxTicksPerAdvance = 1 }: FixedTickerProps) {
    if (!(rate > 0)) {
      throw new RangeError(`Tick rate must be positive, got ${rate}`);
    }

    this.rate = rate;
    this.intervalMs = 1000 / rate;
    this.onTick = onTick;
    this.onTickSkipped = onTickSkipped;
    this.maxTicksPerAdvance = Math.max(1, maxTicksPerAdvance);
  }

  /**
   * @description
   * Adds elapsed time and runs the ticks that became due.
   *
   * @param elapsedMs Milliseconds since the previous call
   * @returns Number of ticks run
   */
  advance(elapsedMs: number): number {
    if (elapsedMs > 0) this.accumulator += elapsedMs;

    let ticks = 0;
    while (this.accumulator >= this.intervalMs && ticks < this.maxTicksPerAdvance) {
      this.accumulator -= this.intervalMs;
      ticks++;
    }

    const skipped = Math.floor(this.accumulator / this.intervalMs);
    if (skipped > 0) {
      this.accumulator -= skipped * this.intervalMs;
      this.onTickSkipped?.(skipped);
    }

    for (let i = 0; i < ticks; i++) {
      this.onTick(this._tickCount++);
    }

    return ticks;
  }

  /**
   * @description
   * Number of ticks run since construction or the last reset.
   */
  get tickCount(): number {
    return this._tickCount;
  }

  /**
   * @description
   * Drops accumulated time and the tick counter.
   */
  reset(): void {
    this.accumulator = 0;
    this._tickCount = 0;
  }
}

interface FixedTickerProps {
  /**
   * @description
   * Rate of ticks per second
   */
  rate: number;

  /**
   * @description
   * Callback to execute on each tick
   */
  onTick: (tick: number) => void;

  /**
   * @description
   * Called with the number of ticks dropped because a frame was too long.
   */
  onTickSkipped?: (skippedTicks: number) => void;

  /**
   * @description
   * Upper bound of ticks run by one `advance` call (default: 1).
   */
  maxTicksPerAdvance?: number;
}

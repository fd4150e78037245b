import { clamp01, lerp, lerpAngle } from "../lerp/lerp";

/** Snapshots per second sent by entity owners. */
export const REPLICATION_RATE = 16;

/** Milliseconds between two authoritative snapshots. */
export const REPLICATION_INTERVAL_MS = 1000 / REPLICATION_RATE;

/**
 * @description
 * Smooths a scalar sampled at irregular receive times.
 *
 * Holds the previous ("from") and latest ("to") authoritative samples and the
 * time at which "to" was set. Reading is a pure function of the clock and the
 * two samples, so it is safe to call every render tick.
 *
 * @example
 * ```ts
 * const x = new Interpolator();
 * x.set(0, 1000);
 * x.set(10, 1000);
 * x.get(1000);                             // 0
 * x.get(1000 + REPLICATION_INTERVAL_MS);   // 10
 * ```
 */
export class Interpolator {
  private from = 0;
  private to = 0;
  private setAt = 0;
  private seeded = false;

  /**
   * @param interval Milliseconds the blend from "from" to "to" takes
   */
  constructor(readonly interval: number = REPLICATION_INTERVAL_MS) {}

  /** Latest authoritative sample */
  get target(): number {
    return this.to;
  }

  /** Previous authoritative sample */
  get previous(): number {
    return this.from;
  }

  /** Clock time of the latest `set` */
  get lastSetAt(): number {
    return this.setAt;
  }

  /**
   * Records a fresh authoritative sample.
   * The first sample seeds both ends so nothing blends in from zero.
   */
  set(value: number, now: number): void {
    this.from = this.seeded ? this.to : value;
    this.to = value;
    this.setAt = now;
    this.seeded = true;
  }

  /**
   * Jumps straight to a value with no blend.
   */
  snap(value: number, now: number): void {
    this.from = value;
    this.to = value;
    this.setAt = now;
    this.seeded = true;
  }

  /** Linear value at `now`. */
  get(now: number): number {
    return lerp(this.from, this.to, this.progress(now));
  }

  /** Angular value (degrees) at `now`, along the shortest arc. */
  getAngle(now: number): number {
    return lerpAngle(this.from, this.to, this.progress(now));
  }

  private progress(now: number): number {
    if (this.interval <= 0) return 1;
    return clamp01((now - this.setAt) / this.interval);
  }
}

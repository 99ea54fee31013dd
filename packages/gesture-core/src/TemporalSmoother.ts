import type { Vec2 } from "./types";

type Sample = { point: Vec2; timestamp: number };

/**
 * Short per-hand position history. A shorter window reacts faster, a longer
 * one filters more jitter.
 */
export class TemporalSmoother {
  private readonly samples: Sample[] = [];

  constructor(
    private readonly windowSize: number,
    private readonly recentWeight = 0.8
  ) {
    if (!Number.isInteger(windowSize) || windowSize < 1) {
      throw new Error(`Smoothing window must be a positive integer, got ${windowSize}`);
    }
    if (!(recentWeight > 0 && recentWeight <= 1)) {
      throw new Error(`Smoothing weight must be in (0, 1], got ${recentWeight}`);
    }
  }

  push(point: Vec2, timestamp: number): void {
    this.samples.push({ point: { ...point }, timestamp });
    if (this.samples.length > this.windowSize) {
      this.samples.shift();
    }
  }

  get size(): number {
    return this.samples.length;
  }

  /** Newest sample blended with the mean of the older ones; null when empty. */
  smoothed(): Vec2 | null {
    const newest = this.samples[this.samples.length - 1];
    if (!newest) return null;
    if (this.samples.length === 1) return { ...newest.point };

    const older = this.samples.slice(0, -1);
    const mean = {
      x: older.reduce((acc, s) => acc + s.point.x, 0) / older.length,
      y: older.reduce((acc, s) => acc + s.point.y, 0) / older.length,
    };
    const w = this.recentWeight;
    return {
      x: w * newest.point.x + (1 - w) * mean.x,
      y: w * newest.point.y + (1 - w) * mean.y,
    };
  }

  /** Units per second across the buffered span. */
  velocity(): Vec2 {
    if (this.samples.length < 2) return { x: 0, y: 0 };
    const oldest = this.samples[0];
    const newest = this.samples[this.samples.length - 1];
    const elapsedSeconds = (newest.timestamp - oldest.timestamp) / 1000;
    if (elapsedSeconds <= 0) return { x: 0, y: 0 };
    return {
      x: (newest.point.x - oldest.point.x) / elapsedSeconds,
      y: (newest.point.y - oldest.point.y) / elapsedSeconds,
    };
  }

  clear(): void {
    this.samples.length = 0;
  }
}

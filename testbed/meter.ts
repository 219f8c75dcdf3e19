import { performance } from 'perf_hooks';
import { RING_SIZE, WINDOW_TICKS } from './config';

const RING_MASK = RING_SIZE - 1;

const RISE_ALPHA = 0.15; // needle rises at this rate
const FALL_ALPHA = 0.08; // and falls slower
const COLD_ALPHA = 0.3; // while the window is still filling
const DECAY_FACTOR = 0.7; // alpha shrinks by up to 70% at the end of the phase
const DISPLAY_FLOOR_MBPS = 0.01;

export type Clock = () => number; // milliseconds, monotonic

export interface MeterOptions {
  totalDurationSeconds: number;
  windowTicks?: number;
  clock?: Clock;
}

/**
 * Three-layer throughput meter, one instance per phase.
 *
 *   1. Accumulator  - monotonic clock and running byte count (ground truth)
 *   2. Estimator    - delta over a trailing window of ticks, kept in a ring buffer
 *   3. Display EMA  - asymmetric smoothing for live display only
 *
 * addBytes() is the only write path and must be called when bytes are known to
 * have crossed the network, never when they are handed to a local buffer.
 * finish() is the authoritative number; displayMbps never is.
 *
 * 1 byte per microsecond is 8 Mbit/s, so Mbps = bytes * 8 / us.
 */
export class ThroughputMeter {
  readonly totalDurationSeconds: number;
  private readonly windowTicks: number;
  private readonly clock: Clock;

  private startMs = 0;
  private stopMs: number | null = null;
  private totalBytesValue = 0;
  private hasData = false;
  private firstDataUs = 0;

  private readonly ringUs = new Float64Array(RING_SIZE);
  private readonly ringBytes = new Float64Array(RING_SIZE);
  private head = 0;

  private windowedValue = 0;
  private displayValue = 0;

  constructor(options: MeterOptions) {
    this.totalDurationSeconds = options.totalDurationSeconds;
    this.windowTicks = Math.min(options.windowTicks ?? WINDOW_TICKS, RING_SIZE - 1);
    this.clock = options.clock ?? (() => performance.now());
  }

  get totalBytes(): number {
    return this.totalBytesValue;
  }

  get displayMbps(): number {
    return this.displayValue;
  }

  // Raw layer-2 value computed by the last tick().
  get windowedMbps(): number {
    return this.windowedValue;
  }

  // True average from the first byte to now (or to finish()).
  get overallMbps(): number {
    if (!this.hasData || this.totalBytesValue <= 0) return 0;
    const elapsedUs = this.elapsedUs() - this.firstDataUs;
    return elapsedUs > 0 ? (this.totalBytesValue * 8) / elapsedUs : 0;
  }

  start(): void {
    this.startMs = this.clock();
    this.stopMs = null;
    this.totalBytesValue = 0;
    this.hasData = false;
    this.firstDataUs = 0;
    this.ringUs.fill(0);
    this.ringBytes.fill(0);
    this.head = 0;
    this.windowedValue = 0;
    this.displayValue = 0;
  }

  addBytes(bytes: number): void {
    if (bytes <= 0) return;
    if (!this.hasData) {
      this.hasData = true;
      this.firstDataUs = this.elapsedUs();
    }
    this.totalBytesValue += bytes;
  }

  /** Called on the UI cadence. Returns the smoothed Mbps for display. */
  tick(): number {
    if (!this.hasData) return 0;

    const nowUs = this.elapsedUs();
    const head = this.head;

    this.ringUs[head & RING_MASK] = nowUs;
    this.ringBytes[head & RING_MASK] = this.totalBytesValue;

    const lookback = Math.min(head, this.windowTicks);
    let rawMbps = 0;
    if (lookback > 0) {
      const tail = (head - lookback) & RING_MASK;
      const deltaBytes = this.totalBytesValue - this.ringBytes[tail];
      const deltaUs = nowUs - this.ringUs[tail];
      if (deltaUs > 0) rawMbps = (deltaBytes * 8) / deltaUs;
    }
    this.head = head + 1;
    this.windowedValue = rawMbps;

    // Decay progress counts from the first byte, so connection setup is excluded.
    const dataElapsedSec = (nowUs - this.firstDataUs) / 1_000_000;
    const progress = Math.min(1, dataElapsedSec / this.totalDurationSeconds);
    const decay = 1 - progress * DECAY_FACTOR;
    const steadyAlpha = (rawMbps >= this.displayValue ? RISE_ALPHA : FALL_ALPHA) * decay;

    let alpha = steadyAlpha;
    if (lookback < this.windowTicks) {
      const warmth = lookback / this.windowTicks;
      alpha = COLD_ALPHA + warmth * (steadyAlpha - COLD_ALPHA);
    }

    this.displayValue += alpha * (rawMbps - this.displayValue);
    if (this.displayValue < DISPLAY_FLOOR_MBPS) this.displayValue = 0;

    return this.displayValue;
  }

  /** Stops the clock and returns the true overall average in Mbps. */
  finish(): number {
    if (this.stopMs === null) this.stopMs = this.clock();
    return this.overallMbps;
  }

  private elapsedUs(): number {
    const now = this.stopMs ?? this.clock();
    return (now - this.startMs) * 1000;
  }
}

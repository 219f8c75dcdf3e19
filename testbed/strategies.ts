import crypto from 'crypto';
import { errorMessage } from './errors';
import { ResourceLifecycle } from './lifecycle';
import { logger } from './logger';
import { BytesCallback, LatencyResult, MetadataReporter } from './types';

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

// Sleeps in short slices so a stop request ends the wait early.
export async function pause(ms: number, stop: () => boolean, sliceMs = 50): Promise<void> {
  const until = Date.now() + ms;
  while (!stop()) {
    const left = until - Date.now();
    if (left <= 0) return;
    await sleep(Math.min(sliceMs, left));
  }
}

export function deadlineAfter(seconds: number): number {
  return Date.now() + seconds * 1000;
}

export function isPast(deadline: number): boolean {
  return Date.now() >= deadline;
}

// Random bytes so transparent compression on the path cannot shrink the upload.
export function incompressiblePayload(size: number): Buffer {
  return crypto.randomBytes(size);
}

// ───────────────────────────── Adaptive chunking ─────────────────────────────

export interface ChunkSizerOptions {
  initial: number;
  min: number;
  max: number;
  fastMs?: number; // faster than this: double
  slowMs?: number; // slower than this: halve
}

/**
 * Keeps per-request latency in a target band: the next chunk doubles (up to
 * max) after a fast request and halves (down to min) after a slow one.
 */
export class ChunkSizer {
  private current: number;
  readonly fastMs: number;
  readonly slowMs: number;

  constructor(private readonly options: ChunkSizerOptions) {
    this.current = options.initial;
    this.fastMs = options.fastMs ?? 300;
    this.slowMs = options.slowMs ?? 8000;
  }

  get size(): number {
    return this.current;
  }

  record(elapsedMs: number): number {
    if (elapsedMs < this.fastMs) {
      this.current = Math.min(this.current * 2, this.options.max);
    } else if (elapsedMs > this.slowMs) {
      this.current = Math.max(Math.floor(this.current / 2), this.options.min);
    }
    return this.current;
  }

  reset(): void {
    this.current = this.options.initial;
  }
}

// Shared across the workers of one phase; every take() is a distinct index.
export class ChunkCursor {
  private nextIndex = 0;

  take(): number {
    return this.nextIndex++;
  }
}

export interface ByteRange {
  start: number;
  end: number; // inclusive
}

export function rangeFor(index: number, chunkSize: number, contentLength: number): ByteRange {
  const start = (index * chunkSize) % contentLength;
  return { start, end: Math.min(start + chunkSize - 1, contentLength - 1) };
}

// ───────────────────────────── Worker ramp-up ─────────────────────────────

export interface RampOptions {
  initial: number;
  step: number;
  max: number;
  minGain?: number; // relative rate gain that justifies more connections
}

/**
 * Grows the worker count on a fixed interval. Stops for good once adding
 * workers no longer raised the aggregate rate by minGain: from then on the
 * link, not the connection count, is the bottleneck.
 */
export class WorkerRamp {
  private active: number;
  private lastRate = 0;
  private saturatedFlag = false;
  private readonly minGain: number;

  constructor(private readonly options: RampOptions) {
    this.active = options.initial;
    this.minGain = options.minGain ?? 0.1;
  }

  get workers(): number {
    return this.active;
  }

  get saturated(): boolean {
    return this.saturatedFlag;
  }

  /** Takes the aggregate rate of the last interval, returns how many workers to add. */
  next(rateMbps: number): number {
    if (this.saturatedFlag || this.active >= this.options.max) return 0;
    if (this.lastRate > 0 && rateMbps < this.lastRate * (1 + this.minGain)) {
      this.saturatedFlag = true;
      return 0;
    }
    this.lastRate = rateMbps;
    return this.grow();
  }

  // Adds a step on schedule alone, without looking at the rate.
  grow(): number {
    if (this.active >= this.options.max) return 0;
    const add = Math.min(this.options.step, this.options.max - this.active);
    this.active += add;
    return add;
  }
}

// ───────────────────────────── Latency ─────────────────────────────

export function summarizeLatency(samples: readonly number[]): LatencyResult {
  if (samples.length === 0) return { ping: 0, jitter: 0 };

  // The first two samples carry the TCP/TLS handshake.
  const warm = samples.length > 2 ? samples.slice(2) : [...samples];
  warm.sort((a, b) => a - b);
  const trim = Math.floor(warm.length * 0.1);
  const trimmed = warm.slice(trim, warm.length - trim);

  if (trimmed.length === 0) {
    return { ping: warm.reduce((a, b) => a + b, 0) / warm.length, jitter: 0 };
  }

  const ping = trimmed.reduce((a, b) => a + b, 0) / trimmed.length;
  let jitterSum = 0;
  for (let i = 1; i < trimmed.length; i++) {
    jitterSum += Math.abs(trimmed[i] - trimmed[i - 1]);
  }
  return { ping, jitter: trimmed.length > 1 ? jitterSum / (trimmed.length - 1) : 0 };
}

// ───────────────────────────── Discovery cascade ─────────────────────────────

/**
 * Probes candidates in order and accepts the first that validates. Later
 * candidates are never probed once one succeeds.
 */
export async function runCascade<C, T>(
  candidates: readonly C[],
  probe: (candidate: C) => Promise<T | null>,
  lifecycle: ResourceLifecycle,
  describe: (candidate: C) => string = String,
): Promise<T | null> {
  for (const candidate of candidates) {
    if (lifecycle.shouldStop) return null;
    try {
      const accepted = await probe(candidate);
      if (accepted) return accepted;
      logger.log(`[Discovery] Rejected ${describe(candidate)}`);
    } catch (error) {
      logger.log(`[Discovery] Probe failed for ${describe(candidate)}: ${errorMessage(error)}`);
    }
  }
  return null;
}

// ───────────────────────────── Tiered upload ─────────────────────────────

export interface UploadTier {
  name: string;
  // One short request; true when the target accepted it. Probe bytes are not counted.
  probe(lifecycle: ResourceLifecycle): Promise<boolean>;
  // Runs the tier's workers until the phase stops.
  run(lifecycle: ResourceLifecycle, onBytes: BytesCallback): Promise<void>;
}

/**
 * Tries each tier in order and runs the first one that accepts uploads. The
 * active tier is reported as 'uploadTier'. Returns its name, or null.
 */
export async function runTieredUpload(
  tiers: readonly UploadTier[],
  lifecycle: ResourceLifecycle,
  onBytes: BytesCallback,
  report: MetadataReporter,
): Promise<string | null> {
  for (const tier of tiers) {
    if (lifecycle.shouldStop) return null;
    let accepted = false;
    try {
      accepted = await tier.probe(lifecycle);
    } catch (error) {
      logger.log(`[Upload] Tier ${tier.name} probe failed: ${errorMessage(error)}`);
    }
    if (!accepted) {
      logger.log(`[Upload] Tier ${tier.name} rejected, falling back.`);
      continue;
    }
    report('uploadTier', tier.name);
    logger.log(`[Upload] Using tier ${tier.name}`);
    await tier.run(lifecycle, onBytes);
    return tier.name;
  }
  if (!lifecycle.shouldStop) report('uploadTier', 'none');
  return null;
}

// ───────────────────────────── Worker groups ─────────────────────────────

/**
 * The workers of one engine phase. settled() also waits for workers spawned
 * while it is waiting (ramp-up). Worker errors are logged, not rethrown.
 */
export class WorkerGroup {
  private tasks = new Set<Promise<void>>();

  constructor(private readonly label: string) {}

  get size(): number {
    return this.tasks.size;
  }

  spawn(body: () => Promise<void>, delayMs = 0): void {
    const task: Promise<void> = sleep(delayMs)
      .then(body)
      .catch(error => logger.log(`[${this.label}] Worker failed: ${errorMessage(error)}`))
      .finally(() => {
        this.tasks.delete(task);
      });
    this.tasks.add(task);
  }

  async settled(): Promise<void> {
    while (this.tasks.size > 0) {
      await Promise.all([...this.tasks]);
    }
  }
}

import { EventEmitter } from 'events';
import { INTER_PHASE_PAUSE_MS, LATENCY_PAUSE_MS, UI_TICK_MS } from './config';
import { MeasurementEngine } from './engine';
import { DiscoveryError, errorMessage } from './errors';
import { ResourceLifecycle } from './lifecycle';
import { logger } from './logger';
import { Clock, ThroughputMeter } from './meter';
import { pause } from './strategies';
import {
  MetadataReporter,
  OrchestratorState,
  PhaseKind,
  RunMetadata,
  TargetDescriptor,
  UnifiedResult,
} from './types';

export interface OrchestratorOptions {
  tickIntervalMs?: number;
  latencyPauseMs?: number;
  interPhasePauseMs?: number;
  clock?: Clock;
}

export interface Orchestrator {
  on(event: 'result', listener: (result: UnifiedResult) => void): this;
  on(event: 'state', listener: (state: OrchestratorState) => void): this;
  once(event: 'result', listener: (result: UnifiedResult) => void): this;
  once(event: 'state', listener: (state: OrchestratorState) => void): this;
}

function describeTarget(target: TargetDescriptor): RunMetadata {
  const metadata: RunMetadata = { target: target.url, host: target.host };
  if (target.address) metadata.address = target.address;
  if (target.edgeId) metadata.edgeId = target.edgeId;
  if (target.contentLength !== undefined) metadata.contentLength = target.contentLength;
  if (target.classification) metadata.classification = target.classification;
  if (target.label) metadata.label = target.label;
  if (target.urls) metadata.targets = target.urls.length;
  return metadata;
}

/**
 * Runs any MeasurementEngine through Discovery, Latency, Download and Upload.
 * Owns the lifecycle, the per-phase meter and the kill/UI timers; the engine
 * only reports bytes. Live results are emitted as 'result' events and the
 * terminal one (done or error) is also what start() resolves with.
 */
export class Orchestrator extends EventEmitter {
  private readonly lifecycle = new ResourceLifecycle();
  private readonly tickIntervalMs: number;
  private readonly latencyPauseMs: number;
  private readonly interPhasePauseMs: number;
  private readonly clock?: Clock;

  private stateValue: OrchestratorState = 'idle';
  private running = false;
  private metadata: RunMetadata = {};
  private downloadMbps = 0;
  private uploadMbps = 0;
  private pingMs?: number;
  private jitterMs?: number;

  constructor(options: OrchestratorOptions = {}) {
    super();
    this.tickIntervalMs = options.tickIntervalMs ?? UI_TICK_MS;
    this.latencyPauseMs = options.latencyPauseMs ?? LATENCY_PAUSE_MS;
    this.interPhasePauseMs = options.interPhasePauseMs ?? INTER_PHASE_PAUSE_MS;
    this.clock = options.clock;
  }

  get state(): OrchestratorState {
    return this.stateValue;
  }

  get isRunning(): boolean {
    return this.running;
  }

  async start(engine: MeasurementEngine): Promise<UnifiedResult> {
    if (this.running) throw new Error('A test is already running');
    this.running = true;
    this.lifecycle.reset();
    this.metadata = { engine: engine.name };
    this.downloadMbps = 0;
    this.uploadMbps = 0;
    this.pingMs = undefined;
    this.jitterMs = undefined;

    try {
      logger.log(`[Orchestrator] === Starting ${engine.name} ===`);
      const terminal = await this.run(engine);
      this.emit('result', terminal);
      logger.log(`[Orchestrator] === ${engine.name}: ${terminal.status} ===`);
      return terminal;
    } finally {
      this.running = false;
    }
  }

  // Forced teardown of everything the run holds, effective across phases.
  cancel(): void {
    if (!this.running) return;
    logger.log('[Orchestrator] Cancel requested.');
    this.lifecycle.cancel();
  }

  private async run(engine: MeasurementEngine): Promise<UnifiedResult> {
    let target: TargetDescriptor | null = null;
    try {
      if (engine.hasDiscovery) {
        this.setState('discovering');
        this.emitLive(`Discovering ${engine.name} endpoints...`);
        target = await engine.discover(this.lifecycle);
        if (this.lifecycle.userCancelled) return this.cancelled();
        if (!target) throw new DiscoveryError(engine.name);
        Object.assign(this.metadata, describeTarget(target));
        logger.log(`[Orchestrator] Discovered ${target.url}`);
      }

      if (engine.hasLatencyTest) {
        this.setState('measuring-latency');
        this.emitLive('Measuring latency...');
        const latency = await engine.measureLatency(this.lifecycle, target);
        if (this.lifecycle.userCancelled) return this.cancelled();
        this.pingMs = latency.ping;
        this.jitterMs = latency.jitter;
        logger.log(`[Orchestrator] Ping: ${latency.ping.toFixed(1)}ms, Jitter: ${latency.jitter.toFixed(1)}ms`);
        this.emitLive(`Ping: ${latency.ping.toFixed(0)}ms`);
        await this.pause(this.latencyPauseMs);
        if (this.lifecycle.userCancelled) return this.cancelled();
      }

      this.setState('downloading');
      this.downloadMbps = await this.runPhase(engine, 'download', target);
      if (this.lifecycle.userCancelled) return this.cancelled();
      logger.log(`[Orchestrator] Download: ${this.downloadMbps.toFixed(2)} Mbps`);

      if (engine.hasUpload) {
        await this.pause(this.interPhasePauseMs);
        if (this.lifecycle.userCancelled) return this.cancelled();
        this.setState('uploading');
        this.uploadMbps = await this.runPhase(engine, 'upload', target);
        if (this.lifecycle.userCancelled) return this.cancelled();
        logger.log(`[Orchestrator] Upload: ${this.uploadMbps.toFixed(2)} Mbps`);
      }

      this.setState('done');
      return this.snapshot({ done: true, status: 'Complete' });
    } catch (error) {
      if (this.lifecycle.userCancelled) return this.cancelled();
      logger.error(`[Orchestrator] ${engine.name} failed: ${errorMessage(error)}`);
      // Sweep whatever the failed step left registered.
      this.lifecycle.cancel();
      this.setState('done');
      return {
        downloadMbps: 0,
        uploadMbps: 0,
        pingMs: this.pingMs,
        jitterMs: this.jitterMs,
        done: true,
        error: errorMessage(error),
        status: 'Error',
        metadata: { ...this.metadata },
      };
    }
  }

  /**
   * One timed phase. Ends when the engine returns or the kill timer fires,
   * whichever comes first; every worker has settled before the meter's
   * overall average is read.
   */
  private async runPhase(engine: MeasurementEngine, kind: PhaseKind, target: TargetDescriptor | null): Promise<number> {
    const label = kind === 'download' ? 'Download' : 'Upload';
    logger.log(`[Orchestrator] -- ${label} phase --`);
    this.emitLive(`Starting ${label}...`);

    const meter = new ThroughputMeter({ totalDurationSeconds: engine.phaseDurationSeconds, clock: this.clock });
    meter.start();
    this.lifecycle.beginPhase();

    const killTimer = setTimeout(() => {
      logger.log(`[Orchestrator] ${label} kill timer -> timeout.`);
      this.lifecycle.timeoutPhase();
    }, engine.phaseDurationSeconds * 1000);
    this.lifecycle.registerTimer(killTimer);

    const uiTimer = setInterval(() => {
      if (this.lifecycle.shouldStop) return;
      this.emitLive(`Testing ${label}...`, kind, meter.tick());
    }, this.tickIntervalMs);
    this.lifecycle.registerTimer(uiTimer);

    const onBytes = (bytes: number) => meter.addBytes(bytes);
    const report: MetadataReporter = (key, value) => {
      this.metadata[key] = value;
    };

    this.lifecycle.launchWorker(async () => {
      try {
        if (kind === 'download') {
          await engine.runDownload(this.lifecycle, onBytes, target, report);
        } else {
          await engine.runUpload(this.lifecycle, onBytes, target, report);
        }
      } finally {
        this.lifecycle.completePhase();
      }
    });

    await this.lifecycle.awaitPhaseComplete();
    await this.lifecycle.awaitAllWorkers();
    this.lifecycle.clearTimer(killTimer);
    this.lifecycle.clearTimer(uiTimer);

    return meter.finish();
  }

  private pause(ms: number): Promise<void> {
    return pause(ms, () => this.lifecycle.userCancelled);
  }

  private cancelled(): UnifiedResult {
    this.setState('cancelled');
    return this.snapshot({ done: true, status: 'Cancelled' });
  }

  private setState(state: OrchestratorState): void {
    this.stateValue = state;
    this.emit('state', state);
  }

  private emitLive(status: string, kind?: PhaseKind, mbps = 0): void {
    this.emit(
      'result',
      this.snapshot({
        done: false,
        status,
        downloadMbps: kind === 'download' ? mbps : this.downloadMbps,
        uploadMbps: kind === 'upload' ? mbps : this.uploadMbps,
      }),
    );
  }

  private snapshot(fields: Pick<UnifiedResult, 'done' | 'status'> & Partial<UnifiedResult>): UnifiedResult {
    return {
      downloadMbps: this.downloadMbps,
      uploadMbps: this.uploadMbps,
      pingMs: this.pingMs,
      jitterMs: this.jitterMs,
      ...fields,
      metadata: { ...this.metadata },
    };
  }
}

import { PHASE_DURATION_SECONDS } from './config';
import { DiscoveryError } from './errors';
import { ResourceLifecycle } from './lifecycle';
import { BytesCallback, LatencyResult, MetadataReporter, TargetDescriptor } from './types';

/**
 * A measurement engine knows how to talk to one kind of target. It never
 * touches the meter, the timers or the result stream: it registers every
 * handle it opens with the lifecycle and reports confirmed bytes via onBytes.
 * The capability flags tell the Orchestrator which phases to run.
 */
export interface MeasurementEngine {
  name: string;
  hasDiscovery: boolean;
  hasLatencyTest: boolean;
  hasUpload: boolean;
  phaseDurationSeconds: number;
  discover: (lifecycle: ResourceLifecycle) => Promise<TargetDescriptor | null>;
  measureLatency: (lifecycle: ResourceLifecycle, target: TargetDescriptor | null) => Promise<LatencyResult>;
  runDownload: (
    lifecycle: ResourceLifecycle,
    onBytes: BytesCallback,
    target: TargetDescriptor | null,
    report?: MetadataReporter,
  ) => Promise<void>;
  runUpload: (
    lifecycle: ResourceLifecycle,
    onBytes: BytesCallback,
    target: TargetDescriptor | null,
    report?: MetadataReporter,
  ) => Promise<void>;
}

export abstract class BaseEngine implements MeasurementEngine {
  abstract name: string;
  hasDiscovery = false;
  hasLatencyTest = false;
  hasUpload = true;
  phaseDurationSeconds = PHASE_DURATION_SECONDS;

  async discover(_lifecycle: ResourceLifecycle): Promise<TargetDescriptor | null> {
    return null;
  }

  async measureLatency(_lifecycle: ResourceLifecycle, _target: TargetDescriptor | null): Promise<LatencyResult> {
    return { ping: 0, jitter: 0 };
  }

  abstract runDownload(
    lifecycle: ResourceLifecycle,
    onBytes: BytesCallback,
    target: TargetDescriptor | null,
    report?: MetadataReporter,
  ): Promise<void>;

  abstract runUpload(
    lifecycle: ResourceLifecycle,
    onBytes: BytesCallback,
    target: TargetDescriptor | null,
    report?: MetadataReporter,
  ): Promise<void>;

  // For engines whose phases depend on discover().
  protected requireTarget(target: TargetDescriptor | null): TargetDescriptor {
    if (!target) throw new DiscoveryError(this.name, 'no target was discovered');
    return target;
  }
}

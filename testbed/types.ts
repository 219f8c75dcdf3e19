// Note: UNITS
// All speeds are in megabits per second (Mbps)
// All latencies are in milliseconds (ms)
// All sizes are in bytes

export type MetadataValue = string | number | boolean;

export type RunMetadata = Record<string, MetadataValue>;

export type OrchestratorState =
  | 'idle'
  | 'discovering'
  | 'measuring-latency'
  | 'downloading'
  | 'uploading'
  | 'done'
  | 'cancelled';

export type PhaseKind = 'download' | 'upload';

// Output of discover(). Immutable once produced, handed read-only to every worker.
export interface TargetDescriptor {
  url: string;
  host: string;
  address?: string;       // resolved edge IP
  edgeId?: string;        // CDN node / cache identifier
  contentLength?: number; // size of the test object, when known
  classification?: string; // e.g. 'near-cache', 'edge-pop', 'distant'
  label?: string;
  urls?: string[];        // engines with several targets (one per stream)
}

export interface LatencyResult {
  ping: number;
  jitter: number;
}

export interface UnifiedResult {
  downloadMbps: number;
  uploadMbps: number;
  pingMs?: number;
  jitterMs?: number;
  done: boolean;
  error?: string;
  status: string;
  metadata: RunMetadata;
}

export type BytesCallback = (bytes: number) => void;

export type MetadataReporter = (key: string, value: MetadataValue) => void;

export interface ParsedResponse {
  statusCode: number;
  bodyBytes: number;
}

import { AxiosInstance } from 'axios';
import dns from 'dns/promises';
import { performance } from 'perf_hooks';
import { FALLBACK_UPLOAD_URL, FAST_TOKEN, SERVER_URL, USER_AGENT } from './config';
import { BaseEngine, MeasurementEngine } from './engine';
import { DiscoveryError, ProtocolError, errorMessage } from './errors';
import { ResourceLifecycle } from './lifecycle';
import { logger } from './logger';
import {
  HttpClient,
  agentFor,
  createHttpClient,
  headerValue,
  isAccepted,
  postBuffer,
  probeHead,
  releaseHttpClient,
  sampleLatency,
  streamGet,
  streamingPost,
} from './requests';
import {
  ChunkCursor,
  ChunkSizer,
  UploadTier,
  WorkerGroup,
  WorkerRamp,
  deadlineAfter,
  incompressiblePayload,
  isPast,
  pause,
  rangeFor,
  runCascade,
  runTieredUpload,
} from './strategies';
import {
  PersistentTransport,
  TransportOptions,
  buildGetRequest,
  buildPostHeader,
  connectSocket,
  socketTargetFromUrl,
} from './transport';
import { BytesCallback, LatencyResult, MetadataReporter, ParsedResponse, TargetDescriptor } from './types';

const PROBE_PAYLOAD_BYTES = 64 * 1024;
const CONNECT_TIMEOUT_MS = 8000;

const noReport: MetadataReporter = () => {};

// ───────────────────────────── Shared worker shapes ─────────────────────────────

interface UploadSettings {
  workers: number;
  payloadBytes: number;
  chunkBytes: number; // socket tier slice size
  deadline: number;
  probeTimeoutMs: number;
}

function stopper(lifecycle: ResourceLifecycle, deadline: number): () => boolean {
  return () => lifecycle.shouldStop || isPast(deadline);
}

/**
 * Opens a connection, runs request cycles on it until one fails, reconnects.
 * A 0 status (connection closed) reconnects at once; a non-2xx status is a
 * ProtocolError and reconnects after a short back-off.
 */
async function socketWorker(
  label: string,
  url: string,
  address: string | undefined,
  lifecycle: ResourceLifecycle,
  deadline: number,
  transportOptions: TransportOptions,
  cycle: (transport: PersistentTransport) => Promise<ParsedResponse>,
): Promise<void> {
  const stop = stopper(lifecycle, deadline);
  const target = socketTargetFromUrl(url, address);
  while (!stop()) {
    let transport: PersistentTransport | null = null;
    try {
      const socket = await connectSocket(target, lifecycle, CONNECT_TIMEOUT_MS);
      transport = new PersistentTransport(socket, transportOptions);
      while (!stop()) {
        const response = await cycle(transport);
        if (response.statusCode === 0) break;
        if (!isAccepted(response.statusCode)) {
          throw new ProtocolError(`Unexpected HTTP ${response.statusCode}`, response.statusCode);
        }
      }
    } catch (error) {
      if (lifecycle.shouldStop) return;
      logger.log(`[${label}] ${errorMessage(error)}`);
      await pause(500, stop);
    } finally {
      transport?.close();
    }
  }
}

function requestPath(url: string): string {
  const parsed = new URL(url);
  return `${parsed.pathname}${parsed.search}`;
}

// POSTs a fixed payload per request and counts it once the server accepted it.
export function bufferedUploadTier(name: string, url: string, settings: UploadSettings): UploadTier {
  return {
    name,
    async probe(lifecycle) {
      const client = createHttpClient(lifecycle, { maxSockets: 1, timeoutMs: settings.probeTimeoutMs });
      if (!client) return false;
      try {
        return isAccepted(await postBuffer(client.http, url, incompressiblePayload(PROBE_PAYLOAD_BYTES)));
      } finally {
        releaseHttpClient(lifecycle, client);
      }
    },
    async run(lifecycle, onBytes) {
      const client = createHttpClient(lifecycle, { maxSockets: settings.workers });
      if (!client) return;
      const payload = incompressiblePayload(settings.payloadBytes);
      const stop = stopper(lifecycle, settings.deadline);
      const group = new WorkerGroup(`UL ${name}`);
      for (let i = 0; i < settings.workers; i++) {
        group.spawn(async () => {
          while (!stop()) {
            try {
              const status = await postBuffer(client.http, url, payload);
              if (isAccepted(status)) onBytes(payload.length);
              else await pause(500, stop);
            } catch (error) {
              if (lifecycle.shouldStop) return;
              logger.log(`[UL ${name}] ${errorMessage(error)}`);
              await pause(200, stop);
            }
          }
        });
      }
      await group.settled();
      releaseHttpClient(lifecycle, client);
    },
  };
}

// Content-Length POSTs written in slices on a persistent socket; each slice counts once flushed.
export function socketUploadTier(
  name: string,
  url: string,
  address: string | undefined,
  settings: UploadSettings,
  headers: Record<string, string> = {},
): UploadTier {
  const host = new URL(url).host;
  const path = requestPath(url);
  return {
    name,
    async probe(lifecycle) {
      const socket = await connectSocket(socketTargetFromUrl(url, address), lifecycle, settings.probeTimeoutMs);
      const transport = new PersistentTransport(socket);
      try {
        const body = incompressiblePayload(PROBE_PAYLOAD_BYTES);
        const header = buildPostHeader(host, path, body.length, headers);
        const response = await transport.sendRequestChunked(header, body, settings.chunkBytes, () => {});
        return isAccepted(response.statusCode);
      } finally {
        transport.close();
      }
    },
    async run(lifecycle, onBytes) {
      const payload = incompressiblePayload(settings.payloadBytes);
      const header = buildPostHeader(host, path, payload.length, headers);
      const group = new WorkerGroup(`UL ${name}`);
      for (let i = 0; i < settings.workers; i++) {
        group.spawn(
          () =>
            socketWorker(`UL ${name} W${i}`, url, address, lifecycle, settings.deadline, {}, transport =>
              transport.sendRequestChunked(header, payload, settings.chunkBytes, onBytes),
            ),
          i * 50,
        );
      }
      await group.settled();
    },
  };
}

// ───────────────────────────── Cloudflare ─────────────────────────────

export interface CloudflareOptions {
  downloadUrl?: string;
  uploadUrl?: string;
  workers?: number;
  uploadPayloadBytes?: number;
  phaseDurationSeconds?: number;
}

/** Fixed endpoints: parallel GET streams down, 512 KB POSTs up. */
export class CloudflareEngine extends BaseEngine {
  name = 'Cloudflare';
  private readonly downloadUrl: string;
  private readonly uploadUrl: string;
  private readonly workers: number;
  private readonly uploadPayloadBytes: number;

  constructor(options: CloudflareOptions = {}) {
    super();
    this.downloadUrl = options.downloadUrl ?? 'https://speed.cloudflare.com/__down?bytes=25000000';
    this.uploadUrl = options.uploadUrl ?? FALLBACK_UPLOAD_URL;
    this.workers = options.workers ?? 16;
    this.uploadPayloadBytes = options.uploadPayloadBytes ?? 512 * 1024;
    if (options.phaseDurationSeconds) this.phaseDurationSeconds = options.phaseDurationSeconds;
  }

  async runDownload(lifecycle: ResourceLifecycle, onBytes: BytesCallback): Promise<void> {
    const client = createHttpClient(lifecycle, { maxSockets: this.workers });
    if (!client) return;
    const stop = stopper(lifecycle, deadlineAfter(this.phaseDurationSeconds));
    const group = new WorkerGroup('Cloudflare DL');
    for (let i = 0; i < this.workers; i++) {
      group.spawn(async () => {
        while (!stop()) {
          try {
            const { status } = await streamGet(client.http, this.downloadUrl, onBytes, lifecycle);
            if (status !== 200) await pause(100, stop);
          } catch (error) {
            if (lifecycle.shouldStop) return;
            logger.log(`[Cloudflare DL] ${errorMessage(error)}`);
            await pause(200, stop);
          }
        }
      });
    }
    await group.settled();
    releaseHttpClient(lifecycle, client);
  }

  async runUpload(lifecycle: ResourceLifecycle, onBytes: BytesCallback): Promise<void> {
    const tier = bufferedUploadTier('cloudflare', this.uploadUrl, {
      workers: this.workers,
      payloadBytes: this.uploadPayloadBytes,
      chunkBytes: this.uploadPayloadBytes,
      deadline: deadlineAfter(this.phaseDurationSeconds),
      probeTimeoutMs: CONNECT_TIMEOUT_MS,
    });
    await tier.run(lifecycle, onBytes);
  }
}

// ───────────────────────────── Fast ─────────────────────────────

export interface FastOptions {
  apiUrl?: string;
  token?: string;
  urlCount?: number;
  maxStreams?: number;
  highLatencyMs?: number;
  latencySamples?: number;
  uploadPath?: string;
  uploadChunkBytes?: number;
  uploadRequestBytes?: number;
  phaseDurationSeconds?: number;
}

export function parseFastTargets(data: unknown): string[] {
  if (typeof data !== 'object' || data === null || !('targets' in data)) return [];
  const targets: unknown = data.targets;
  if (!Array.isArray(targets)) return [];
  const urls: string[] = [];
  for (const target of targets) {
    if (typeof target === 'object' && target !== null && 'url' in target && typeof target.url === 'string') {
      urls.push(target.url);
    }
  }
  return urls;
}

export function toUploadUrl(downloadUrl: string, uploadPath: string): string {
  const parsed = new URL(downloadUrl);
  parsed.pathname = uploadPath;
  return parsed.toString();
}

/**
 * Target list from an API; a ranged one-byte probe picks the stream count.
 * Upload streams chunked POSTs, counting each chunk from its write callback.
 */
export class FastEngine extends BaseEngine {
  name = 'Fast';
  hasDiscovery = true;
  hasLatencyTest = true;

  private readonly apiUrl: string;
  private readonly token: string;
  private readonly urlCount: number;
  private readonly maxStreams: number;
  private readonly highLatencyMs: number;
  private readonly latencySamples: number;
  private readonly uploadPath: string;
  private readonly uploadChunkBytes: number;
  private readonly uploadRequestBytes: number;
  private streams: number;

  constructor(options: FastOptions = {}) {
    super();
    this.apiUrl = options.apiUrl ?? 'https://api.fast.com/netflix/speedtest/v2';
    this.token = options.token ?? FAST_TOKEN;
    this.urlCount = options.urlCount ?? 5;
    this.maxStreams = options.maxStreams ?? 5;
    this.highLatencyMs = options.highLatencyMs ?? 500;
    this.latencySamples = options.latencySamples ?? 5;
    this.uploadPath = options.uploadPath ?? '/speedtest/upload';
    this.uploadChunkBytes = options.uploadChunkBytes ?? 512 * 1024;
    this.uploadRequestBytes = options.uploadRequestBytes ?? 25 * 1024 * 1024;
    this.streams = this.maxStreams;
    if (options.phaseDurationSeconds) this.phaseDurationSeconds = options.phaseDurationSeconds;
  }

  get streamCount(): number {
    return this.streams;
  }

  async discover(lifecycle: ResourceLifecycle): Promise<TargetDescriptor | null> {
    if (!this.token) throw new DiscoveryError(this.name, 'EDGEMETER_FAST_TOKEN is not set');
    const client = createHttpClient(lifecycle, { timeoutMs: 10_000 });
    if (!client) return null;
    try {
      const query = new URLSearchParams({ https: 'true', token: this.token, urlCount: String(this.urlCount) });
      const response = await client.http.get<unknown>(`${this.apiUrl}?${query}`, { responseType: 'json' });
      if (response.status !== 200) {
        throw new DiscoveryError(this.name, `target API returned HTTP ${response.status}`);
      }
      const urls = parseFastTargets(response.data);
      if (urls.length === 0) return null;
      logger.log(`[Fast] ${urls.length} targets acquired.`);
      return { url: urls[0], host: new URL(urls[0]).hostname, urls, label: `${urls.length} targets` };
    } finally {
      releaseHttpClient(lifecycle, client);
    }
  }

  async measureLatency(lifecycle: ResourceLifecycle, target: TargetDescriptor | null): Promise<LatencyResult> {
    const { url } = this.requireTarget(target);
    const client = createHttpClient(lifecycle, { maxSockets: 1, timeoutMs: 3000 });
    if (!client) return { ping: 0, jitter: 0 };
    try {
      const latency = await sampleLatency(lifecycle, this.latencySamples, 0, () =>
        client.http.get(url, { headers: { Range: 'bytes=0-0' }, responseType: 'arraybuffer' }),
      );
      this.streams = latency.ping > this.highLatencyMs ? 2 : this.maxStreams;
      logger.log(`[Fast] Ping ${latency.ping.toFixed(0)}ms -> ${this.streams} streams.`);
      return latency;
    } finally {
      releaseHttpClient(lifecycle, client);
    }
  }

  async runDownload(
    lifecycle: ResourceLifecycle,
    onBytes: BytesCallback,
    target: TargetDescriptor | null,
    report: MetadataReporter = noReport,
  ): Promise<void> {
    const urls = this.targetUrls(target).slice(0, this.streams);
    report('streams', urls.length);
    const client = createHttpClient(lifecycle, { maxSockets: urls.length });
    if (!client) return;
    const stop = stopper(lifecycle, deadlineAfter(this.phaseDurationSeconds));
    const group = new WorkerGroup('Fast DL');
    for (const url of urls) {
      group.spawn(async () => {
        while (!stop()) {
          try {
            const { status } = await streamGet(client.http, url, onBytes, lifecycle);
            if (!isAccepted(status)) await pause(200, stop);
          } catch (error) {
            if (lifecycle.shouldStop) return;
            logger.log(`[Fast DL] ${errorMessage(error)}`);
            await pause(200, stop);
          }
        }
      });
    }
    await group.settled();
    releaseHttpClient(lifecycle, client);
  }

  async runUpload(lifecycle: ResourceLifecycle, onBytes: BytesCallback, target: TargetDescriptor | null): Promise<void> {
    const urls = this.targetUrls(target)
      .slice(0, this.maxStreams)
      .map(url => toUploadUrl(url, this.uploadPath));
    const client = createHttpClient(lifecycle, { maxSockets: urls.length });
    if (!client) return;
    const chunk = incompressiblePayload(this.uploadChunkBytes);
    const stop = stopper(lifecycle, deadlineAfter(this.phaseDurationSeconds));
    const group = new WorkerGroup('Fast UL');
    for (const url of urls) {
      group.spawn(async () => {
        while (!stop()) {
          try {
            const status = await streamingPost(url, agentFor(client, url), lifecycle, {
              chunk,
              maxBytes: this.uploadRequestBytes,
              onSent: onBytes,
            });
            if (!isAccepted(status)) await pause(200, stop);
          } catch (error) {
            if (lifecycle.shouldStop) return;
            logger.log(`[Fast UL] ${errorMessage(error)}`);
            await pause(200, stop);
          }
        }
      });
    }
    await group.settled();
    releaseHttpClient(lifecycle, client);
  }

  private targetUrls(target: TargetDescriptor | null): string[] {
    const resolved = this.requireTarget(target);
    return resolved.urls && resolved.urls.length > 0 ? resolved.urls : [resolved.url];
  }
}

// ───────────────────────────── Edge caches ─────────────────────────────

const EDGE_DEFAULTS = {
  fallbackUploadUrl: FALLBACK_UPLOAD_URL,
  minContentLength: 1024 * 1024,
  rejectContentTypes: ['text/html'],
  edgeHeaders: ['x-served-by', 'x-cache', 'x-amz-cf-pop', 'via'],
  probeTimeoutMs: 4000,
  maxRedirects: 3,
  initialWorkers: 2,
  maxWorkers: 8,
  rampStep: 2,
  rampIntervalMs: 2000,
  workerStaggerMs: 150,
  chunkInitial: 256 * 1024,
  chunkMax: 8 * 1024 * 1024,
  slowChunkMs: 8000,
  uploadWorkers: 4,
  uploadPayloadBytes: 512 * 1024,
  uploadChunkBytes: 16 * 1024,
  latencySamples: 12,
  latencyGapMs: 50,
};

export type EdgeCacheOptions = Partial<typeof EDGE_DEFAULTS> & {
  name: string;
  candidates: string[];
  uploadUrl?: string; // primary upload tier; defaults to the discovered target
  phaseDurationSeconds?: number;
};

type EdgeCacheSettings = typeof EDGE_DEFAULTS & EdgeCacheOptions;

export type EdgeClass = 'near-cache' | 'edge-pop' | 'distant';

export function classifyRtt(rttMs: number): EdgeClass {
  if (rttMs < 20) return 'near-cache';
  if (rttMs < 50) return 'edge-pop';
  return 'distant';
}

/**
 * A large cached object on a CDN edge. Discovery walks the candidate list
 * with HEAD probes; download is the adaptive range-chunked strategy with
 * worker ramp-up; upload falls back edge POST, then raw socket to the edge
 * address, then the shared fallback target.
 */
export class EdgeCacheEngine extends BaseEngine {
  name: string;
  hasDiscovery = true;
  hasLatencyTest = true;
  private readonly settings: EdgeCacheSettings;

  constructor(options: EdgeCacheOptions) {
    super();
    this.settings = { ...EDGE_DEFAULTS, ...options };
    this.name = options.name;
    if (options.phaseDurationSeconds) this.phaseDurationSeconds = options.phaseDurationSeconds;
  }

  async discover(lifecycle: ResourceLifecycle): Promise<TargetDescriptor | null> {
    const client = createHttpClient(lifecycle, { timeoutMs: this.settings.probeTimeoutMs });
    if (!client) return null;
    try {
      return await runCascade(this.settings.candidates, url => this.probeCandidate(client.http, url), lifecycle);
    } finally {
      releaseHttpClient(lifecycle, client);
    }
  }

  async measureLatency(lifecycle: ResourceLifecycle, target: TargetDescriptor | null): Promise<LatencyResult> {
    const { url } = this.requireTarget(target);
    const client = createHttpClient(lifecycle, { maxSockets: 1, timeoutMs: this.settings.probeTimeoutMs });
    if (!client) return { ping: 0, jitter: 0 };
    try {
      return await sampleLatency(lifecycle, this.settings.latencySamples, this.settings.latencyGapMs, () =>
        client.http.head(url),
      );
    } finally {
      releaseHttpClient(lifecycle, client);
    }
  }

  async runDownload(
    lifecycle: ResourceLifecycle,
    onBytes: BytesCallback,
    target: TargetDescriptor | null,
    report: MetadataReporter = noReport,
  ): Promise<void> {
    const { url, contentLength } = this.requireTarget(target);
    const { initialWorkers, maxWorkers, rampStep, rampIntervalMs, workerStaggerMs } = this.settings;
    const client = createHttpClient(lifecycle, { maxSockets: maxWorkers });
    if (!client) return;

    const deadline = deadlineAfter(this.phaseDurationSeconds);
    const stop = stopper(lifecycle, deadline);
    const cursor = new ChunkCursor();
    const ramp = new WorkerRamp({ initial: initialWorkers, step: rampStep, max: maxWorkers });
    const group = new WorkerGroup(`${this.name} DL`);
    const length = contentLength ?? this.settings.minContentLength;

    let counted = 0;
    const count: BytesCallback = bytes => {
      counted += bytes;
      onBytes(bytes);
    };
    const spawn = (delayMs: number) =>
      group.spawn(() => this.rangeWorker(client, url, length, cursor, lifecycle, count, deadline), delayMs);

    for (let i = 0; i < ramp.workers; i++) spawn(i * workerStaggerMs);

    group.spawn(async () => {
      let previous = 0;
      while (!stop() && !ramp.saturated && ramp.workers < maxWorkers) {
        await pause(rampIntervalMs, stop);
        if (stop()) break;
        const rateMbps = ((counted - previous) * 8) / (rampIntervalMs * 1000);
        previous = counted;
        const added = ramp.next(rateMbps);
        for (let i = 0; i < added; i++) spawn(i * workerStaggerMs);
        if (added > 0) logger.log(`[${this.name}] Ramp: ${ramp.workers} workers at ${rateMbps.toFixed(1)} Mbps`);
      }
    });

    await group.settled();
    report('downloadWorkers', ramp.workers);
    releaseHttpClient(lifecycle, client);
  }

  async runUpload(
    lifecycle: ResourceLifecycle,
    onBytes: BytesCallback,
    target: TargetDescriptor | null,
    report: MetadataReporter = noReport,
  ): Promise<void> {
    const edge = this.requireTarget(target);
    const uploadUrl = this.settings.uploadUrl ?? edge.url;
    const settings: UploadSettings = {
      workers: this.settings.uploadWorkers,
      payloadBytes: this.settings.uploadPayloadBytes,
      chunkBytes: this.settings.uploadChunkBytes,
      deadline: deadlineAfter(this.phaseDurationSeconds),
      probeTimeoutMs: this.settings.probeTimeoutMs,
    };
    const tiers: UploadTier[] = [bufferedUploadTier('edge-post', uploadUrl, settings)];
    if (edge.address) tiers.push(socketUploadTier('edge-socket', uploadUrl, edge.address, settings));
    tiers.push(bufferedUploadTier('fallback', this.settings.fallbackUploadUrl, settings));
    await runTieredUpload(tiers, lifecycle, onBytes, report);
  }

  private async probeCandidate(client: AxiosInstance, candidate: string): Promise<TargetDescriptor | null> {
    const probe = await probeHead(client, candidate, this.settings.maxRedirects);
    const reject = (reason: string) => {
      logger.log(`[${this.name}] ${candidate}: ${reason}`);
      return null;
    };

    if (probe.status !== 200 && probe.status !== 206) return reject(`HTTP ${probe.status}`);
    if (headerValue(probe.headers, 'accept-ranges') !== 'bytes' && probe.status !== 206) {
      return reject('no byte-range support');
    }
    const contentType = (headerValue(probe.headers, 'content-type') ?? '').toLowerCase();
    if (this.settings.rejectContentTypes.some(type => contentType.startsWith(type))) {
      return reject(`content type ${contentType}`);
    }
    const contentLength = parseInt(headerValue(probe.headers, 'content-length') ?? '', 10);
    if (!Number.isFinite(contentLength) || contentLength < this.settings.minContentLength) {
      return reject('object too small or of unknown size');
    }

    const host = new URL(probe.url).hostname;
    const { address } = await dns.lookup(host);
    const edgeId = this.settings.edgeHeaders
      .map(name => headerValue(probe.headers, name))
      .find(value => value !== undefined);
    const classification = classifyRtt(probe.elapsedMs);
    logger.log(`[${this.name}] Edge ${host} (${address}) ${classification} ${probe.elapsedMs.toFixed(0)}ms`);
    return { url: probe.url, host, address, edgeId: edgeId ?? host, contentLength, classification, label: this.name };
  }

  private async rangeWorker(
    client: HttpClient,
    url: string,
    contentLength: number,
    cursor: ChunkCursor,
    lifecycle: ResourceLifecycle,
    onBytes: BytesCallback,
    deadline: number,
  ): Promise<void> {
    const stop = stopper(lifecycle, deadline);
    const sizer = new ChunkSizer({
      initial: this.settings.chunkInitial,
      min: this.settings.chunkInitial,
      max: this.settings.chunkMax,
      slowMs: this.settings.slowChunkMs,
    });
    while (!stop()) {
      const { start, end } = rangeFor(cursor.take(), sizer.size, contentLength);
      const started = performance.now();
      try {
        const { status } = await streamGet(client.http, url, onBytes, lifecycle, { Range: `bytes=${start}-${end}` });
        if (status === 200 || status === 206) {
          sizer.record(performance.now() - started);
        } else if (status === 429) {
          await pause(2000, stop);
        } else if (status === 416) {
          sizer.reset();
        } else {
          await pause(500, stop);
        }
      } catch (error) {
        if (lifecycle.shouldStop) return;
        logger.log(`[${this.name} DL] ${errorMessage(error)}`);
        await pause(200, stop);
      }
    }
  }
}

// ───────────────────────────── Socket CDN ─────────────────────────────

export interface CdnCandidate {
  url: string;
  label: string;
  minBytes: number;
}

interface SocketCdnSettings {
  candidates: CdnCandidate[];
  ogImagePages: string[];
  uploadUrl: string;
  fallbackUploadUrl: string;
  scrapeUserAgent: string;
  scrapedMinBytes: number;
  probeTimeoutMs: number;
  downloadWorkers: number;
  uploadWorkers: number;
  uploadPayloadBytes: number;
  uploadChunkBytes: number;
}

const SOCKET_CDN_DEFAULTS: SocketCdnSettings = {
  candidates: [],
  ogImagePages: [],
  uploadUrl: 'https://graph.facebook.com/v19.0/me',
  fallbackUploadUrl: FALLBACK_UPLOAD_URL,
  scrapeUserAgent: 'facebookexternalhit/1.1',
  scrapedMinBytes: 50_000,
  probeTimeoutMs: 6000,
  downloadWorkers: 4,
  uploadWorkers: 3,
  uploadPayloadBytes: 1024 * 1024,
  uploadChunkBytes: 16 * 1024,
};

export type SocketCdnOptions = Partial<SocketCdnSettings> & { phaseDurationSeconds?: number };

const OG_IMAGE = /<meta property="og:image"\s+content="([^"]+)"/;

export function extractOgImage(html: string): string | null {
  const match = OG_IMAGE.exec(html);
  return match ? match[1].replace(/&amp;/g, '&') : null;
}

/**
 * Media objects on a social CDN, fetched over raw persistent connections.
 * Candidates come from og:image tags of seed pages, then the static list.
 */
export class SocketCdnEngine extends BaseEngine {
  name = 'Facebook CDN';
  hasDiscovery = true;
  private readonly settings: SocketCdnSettings;

  constructor(options: SocketCdnOptions = {}) {
    super();
    this.settings = { ...SOCKET_CDN_DEFAULTS, ...options };
    if (options.phaseDurationSeconds) this.phaseDurationSeconds = options.phaseDurationSeconds;
  }

  async discover(lifecycle: ResourceLifecycle): Promise<TargetDescriptor | null> {
    const client = createHttpClient(lifecycle, { timeoutMs: this.settings.probeTimeoutMs });
    if (!client) return null;
    try {
      const scraped: CdnCandidate[] = [];
      for (const page of this.settings.ogImagePages) {
        if (lifecycle.shouldStop) return null;
        const image = await this.scrapeOgImage(client.http, page);
        if (image) scraped.push({ url: image, label: `og:image ${new URL(page).pathname}`, minBytes: this.settings.scrapedMinBytes });
      }
      return await runCascade(
        [...scraped, ...this.settings.candidates],
        candidate => this.probeCandidate(client.http, candidate, lifecycle),
        lifecycle,
        candidate => candidate.label,
      );
    } finally {
      releaseHttpClient(lifecycle, client);
    }
  }

  async runDownload(lifecycle: ResourceLifecycle, onBytes: BytesCallback, target: TargetDescriptor | null): Promise<void> {
    const { url, address } = this.requireTarget(target);
    const request = buildGetRequest(new URL(url).host, requestPath(url), {
      'User-Agent': USER_AGENT,
      Accept: 'image/webp,image/*,*/*',
    });
    const deadline = deadlineAfter(this.phaseDurationSeconds);
    const group = new WorkerGroup('CDN DL');
    for (let i = 0; i < this.settings.downloadWorkers; i++) {
      group.spawn(
        () =>
          socketWorker(`CDN DL W${i}`, url, address, lifecycle, deadline, { onBodyBytes: onBytes }, transport =>
            transport.sendRequest(request),
          ),
        i * 50,
      );
    }
    await group.settled();
  }

  async runUpload(
    lifecycle: ResourceLifecycle,
    onBytes: BytesCallback,
    _target: TargetDescriptor | null,
    report: MetadataReporter = noReport,
  ): Promise<void> {
    const settings: UploadSettings = {
      workers: this.settings.uploadWorkers,
      payloadBytes: this.settings.uploadPayloadBytes,
      chunkBytes: this.settings.uploadChunkBytes,
      deadline: deadlineAfter(this.phaseDurationSeconds),
      probeTimeoutMs: this.settings.probeTimeoutMs,
    };
    await runTieredUpload(
      [
        socketUploadTier('socket-post', this.settings.uploadUrl, undefined, settings, { 'User-Agent': USER_AGENT }),
        bufferedUploadTier('fallback', this.settings.fallbackUploadUrl, settings),
      ],
      lifecycle,
      onBytes,
      report,
    );
  }

  private async scrapeOgImage(client: AxiosInstance, page: string): Promise<string | null> {
    try {
      const response = await client.get<string>(page, {
        responseType: 'text',
        headers: { 'User-Agent': this.settings.scrapeUserAgent },
      });
      if (response.status !== 200) return null;
      const image = extractOgImage(response.data);
      if (image) logger.log(`[CDN] og:image on ${page}: ${image}`);
      return image;
    } catch (error) {
      logger.log(`[CDN] Scraping ${page} failed: ${errorMessage(error)}`);
      return null;
    }
  }

  private async probeCandidate(
    client: AxiosInstance,
    candidate: CdnCandidate,
    lifecycle: ResourceLifecycle,
  ): Promise<TargetDescriptor | null> {
    let received = 0;
    const response = await streamGet(client, candidate.url, bytes => (received += bytes), lifecycle, {
      Accept: 'image/webp,image/*,*/*',
    });
    if (response.status !== 200 || received < candidate.minBytes) {
      logger.log(`[CDN] ${candidate.label}: HTTP ${response.status}, ${received} bytes`);
      return null;
    }
    const edgeId = headerValue(response.headers, 'x-served-by') ?? headerValue(response.headers, 'x-fb-edge-debug');
    return {
      url: candidate.url,
      host: new URL(candidate.url).hostname,
      edgeId,
      contentLength: received,
      label: candidate.label,
    };
  }
}

// ───────────────────────────── Real speed ─────────────────────────────

export interface RealSpeedOptions {
  downloadUrl?: string;
  uploadUrl?: string;
  downloadWorkers?: number;
  uploadWorkers?: number;
  uploadChunkBytes?: number;
  uploadRequestBytes?: number;
  phaseDurationSeconds?: number;
}

/**
 * One large release binary fetched by many parallel GETs; upload streams
 * chunked POSTs to the shared upload target. No discovery, no latency.
 */
export class RealSpeedEngine extends BaseEngine {
  name = 'Real Speed';
  private readonly downloadUrl: string;
  private readonly uploadUrl: string;
  private readonly downloadWorkers: number;
  private readonly uploadWorkers: number;
  private readonly uploadChunkBytes: number;
  private readonly uploadRequestBytes: number;

  constructor(options: RealSpeedOptions = {}) {
    super();
    this.downloadUrl =
      options.downloadUrl ??
      'https://github.com/desktop/desktop/releases/download/release-3.3.13/GitHubDesktopSetup-x64.exe';
    this.uploadUrl = options.uploadUrl ?? FALLBACK_UPLOAD_URL;
    this.downloadWorkers = options.downloadWorkers ?? 16;
    this.uploadWorkers = options.uploadWorkers ?? 16;
    this.uploadChunkBytes = options.uploadChunkBytes ?? 512 * 1024;
    this.uploadRequestBytes = options.uploadRequestBytes ?? 100 * 1024 * 1024;
    if (options.phaseDurationSeconds) this.phaseDurationSeconds = options.phaseDurationSeconds;
  }

  async runDownload(lifecycle: ResourceLifecycle, onBytes: BytesCallback): Promise<void> {
    const client = createHttpClient(lifecycle, { maxSockets: this.downloadWorkers });
    if (!client) return;
    const url = await this.resolveDownloadUrl(client.http);
    const stop = stopper(lifecycle, deadlineAfter(this.phaseDurationSeconds));
    const group = new WorkerGroup('Real Speed DL');
    for (let i = 0; i < this.downloadWorkers; i++) {
      group.spawn(async () => {
        while (!stop()) {
          try {
            const { status } = await streamGet(client.http, url, onBytes, lifecycle);
            if (!isAccepted(status)) await pause(500, stop);
          } catch (error) {
            if (lifecycle.shouldStop) return;
            logger.log(`[Real Speed DL] ${errorMessage(error)}`);
            await pause(500, stop);
          }
        }
      });
    }
    await group.settled();
    releaseHttpClient(lifecycle, client);
  }

  async runUpload(lifecycle: ResourceLifecycle, onBytes: BytesCallback): Promise<void> {
    const client = createHttpClient(lifecycle, { maxSockets: this.uploadWorkers });
    if (!client) return;
    const chunk = incompressiblePayload(this.uploadChunkBytes);
    const stop = stopper(lifecycle, deadlineAfter(this.phaseDurationSeconds));
    const group = new WorkerGroup('Real Speed UL');
    for (let i = 0; i < this.uploadWorkers; i++) {
      group.spawn(async () => {
        while (!stop()) {
          try {
            const status = await streamingPost(this.uploadUrl, agentFor(client, this.uploadUrl), lifecycle, {
              chunk,
              maxBytes: this.uploadRequestBytes,
              onSent: onBytes,
            });
            if (!isAccepted(status)) await pause(500, stop);
          } catch (error) {
            if (lifecycle.shouldStop) return;
            logger.log(`[Real Speed UL] ${errorMessage(error)}`);
            await pause(500, stop);
          }
        }
      });
    }
    await group.settled();
    releaseHttpClient(lifecycle, client);
  }

  // Release downloads redirect to signed storage URLs; workers go straight there.
  private async resolveDownloadUrl(client: AxiosInstance): Promise<string> {
    try {
      const head = await probeHead(client, this.downloadUrl);
      if (head.hops > 0) logger.log(`[Real Speed] ${this.downloadUrl} -> ${head.url}`);
      return head.url;
    } catch (error) {
      logger.log(`[Real Speed] Redirect lookup failed, using ${this.downloadUrl}: ${errorMessage(error)}`);
      return this.downloadUrl;
    }
  }
}

// ───────────────────────────── Ookla ─────────────────────────────

export interface OoklaServer {
  id: string;
  name: string;
  sponsor: string;
  country: string;
  url: string; // upload endpoint; test files live beside it
}

interface OoklaSettings {
  serversUrl: string;
  country: string;
  candidateCount: number;
  requestTimeoutMs: number;
  pingSamples: number;
  pingGapMs: number;
  downloadFiles: string[];
  initialWorkers: number;
  maxWorkers: number;
  rampStep: number;
  rampIntervalMs: number;
  workerStaggerMs: number;
  uploadPayloadBytes: number;
}

const OOKLA_DEFAULTS: OoklaSettings = {
  serversUrl: 'https://www.speedtest.net/api/js/servers?engine=js&limit=40',
  country: '',
  candidateCount: 10,
  requestTimeoutMs: 4000,
  pingSamples: 10,
  pingGapMs: 100,
  downloadFiles: [
    'random350x350.jpg',
    'random750x750.jpg',
    'random1500x1500.jpg',
    'random2000x2000.jpg',
    'random3000x3000.jpg',
    'random4000x4000.jpg',
  ],
  initialWorkers: 2,
  maxWorkers: 16,
  rampStep: 2,
  rampIntervalMs: 2000,
  workerStaggerMs: 50,
  uploadPayloadBytes: 256 * 1024,
};

export type OoklaOptions = Partial<OoklaSettings> & { phaseDurationSeconds?: number };

function field(entry: object, key: string): string {
  const value: unknown = Reflect.get(entry, key);
  return typeof value === 'string' || typeof value === 'number' ? String(value) : '';
}

export function parseOoklaServers(data: unknown): OoklaServer[] {
  if (!Array.isArray(data)) return [];
  const servers: OoklaServer[] = [];
  for (const entry of data) {
    if (typeof entry !== 'object' || entry === null) continue;
    const url = field(entry, 'url');
    if (!url.startsWith('http')) continue;
    servers.push({
      id: field(entry, 'id'),
      name: field(entry, 'name'),
      sponsor: field(entry, 'sponsor'),
      country: field(entry, 'country'),
      url,
    });
  }
  return servers;
}

// Servers in the preferred country first; three of them are enough on their own.
export function pickOoklaCandidates(servers: OoklaServer[], country: string, count: number): OoklaServer[] {
  const wanted = country.trim().toLowerCase();
  const local = wanted ? servers.filter(server => server.country.toLowerCase() === wanted) : [];
  if (local.length >= 3) return local;
  return [...new Set([...local, ...servers.slice(0, count)])];
}

// Test files and latency.txt sit in the directory of the upload endpoint.
export function ooklaFileUrl(serverUrl: string, file: string): string {
  return new URL(file, serverUrl).toString();
}

let cacheBustCounter = 0;

function withCacheBuster(url: string): string {
  const parsed = new URL(url);
  parsed.searchParams.set('x', `${Date.now()}${cacheBustCounter++}`);
  return parsed.toString();
}

/**
 * Public speed test servers. Discovery ranks nearby servers by ping and
 * keeps the fastest one that serves test files. Both phases add workers on a
 * fixed schedule; download moves up a ladder of larger test images as it
 * does, upload counts each payload once the server answered.
 */
export class OoklaEngine extends BaseEngine {
  name = 'Ookla';
  hasDiscovery = true;
  hasLatencyTest = true;
  private readonly settings: OoklaSettings;

  constructor(options: OoklaOptions = {}) {
    super();
    this.settings = { ...OOKLA_DEFAULTS, ...options };
    if (options.phaseDurationSeconds) this.phaseDurationSeconds = options.phaseDurationSeconds;
  }

  async discover(lifecycle: ResourceLifecycle): Promise<TargetDescriptor | null> {
    const client = createHttpClient(lifecycle, { timeoutMs: this.settings.requestTimeoutMs });
    if (!client) return null;
    try {
      const response = await client.http.get<unknown>(this.settings.serversUrl, {
        responseType: 'json',
        headers: { Accept: 'application/json' },
      });
      if (response.status !== 200) {
        throw new DiscoveryError(this.name, `server list returned HTTP ${response.status}`);
      }
      const servers = parseOoklaServers(response.data);
      logger.log(`[Ookla] Fetched ${servers.length} servers.`);
      const candidates = pickOoklaCandidates(servers, this.settings.country, this.settings.candidateCount);
      const ranked = await this.rankByPing(client.http, candidates, lifecycle);
      return await runCascade(ranked, server => this.checkServer(client.http, server), lifecycle, server => server.name);
    } finally {
      releaseHttpClient(lifecycle, client);
    }
  }

  async measureLatency(lifecycle: ResourceLifecycle, target: TargetDescriptor | null): Promise<LatencyResult> {
    const latencyUrl = ooklaFileUrl(this.requireTarget(target).url, 'latency.txt');
    const client = createHttpClient(lifecycle, { maxSockets: 1, timeoutMs: 3000 });
    if (!client) return { ping: 0, jitter: 0 };
    try {
      return await sampleLatency(lifecycle, this.settings.pingSamples, this.settings.pingGapMs, () =>
        client.http.get(withCacheBuster(latencyUrl), { responseType: 'arraybuffer' }),
      );
    } finally {
      releaseHttpClient(lifecycle, client);
    }
  }

  async runDownload(
    lifecycle: ResourceLifecycle,
    onBytes: BytesCallback,
    target: TargetDescriptor | null,
    report: MetadataReporter = noReport,
  ): Promise<void> {
    const { url } = this.requireTarget(target);
    const { downloadFiles, maxWorkers } = this.settings;
    const client = createHttpClient(lifecycle, { maxSockets: maxWorkers });
    if (!client) return;
    const stop = stopper(lifecycle, deadlineAfter(this.phaseDurationSeconds));
    const group = new WorkerGroup('Ookla DL');

    let fileIndex = 0;
    const workers = await this.rampOnSchedule(group, stop, added => {
      const fileUrl = ooklaFileUrl(url, downloadFiles[fileIndex]);
      fileIndex = Math.min(fileIndex + 1, downloadFiles.length - 1);
      logger.log(`[Ookla DL] +${added} workers on ${fileUrl}`);
      return async () => {
        while (!stop()) {
          try {
            const { status } = await streamGet(client.http, withCacheBuster(fileUrl), onBytes, lifecycle);
            if (status !== 200) await pause(200, stop);
          } catch (error) {
            if (lifecycle.shouldStop) return;
            logger.log(`[Ookla DL] ${errorMessage(error)}`);
            await pause(200, stop);
          }
        }
      };
    });
    report('downloadWorkers', workers);
    releaseHttpClient(lifecycle, client);
  }

  async runUpload(
    lifecycle: ResourceLifecycle,
    onBytes: BytesCallback,
    target: TargetDescriptor | null,
    report: MetadataReporter = noReport,
  ): Promise<void> {
    const { url } = this.requireTarget(target);
    const client = createHttpClient(lifecycle, { maxSockets: this.settings.maxWorkers });
    if (!client) return;
    const payload = incompressiblePayload(this.settings.uploadPayloadBytes);
    const stop = stopper(lifecycle, deadlineAfter(this.phaseDurationSeconds));
    const group = new WorkerGroup('Ookla UL');

    const workers = await this.rampOnSchedule(group, stop, added => {
      logger.log(`[Ookla UL] +${added} workers`);
      return async () => {
        while (!stop()) {
          try {
            const status = await postBuffer(client.http, withCacheBuster(url), payload);
            if (status === 200) {
              if (!lifecycle.shouldStop) onBytes(payload.length);
            } else {
              logger.log(`[Ookla UL] Server rejected with HTTP ${status}`);
              await pause(200, stop);
            }
          } catch (error) {
            if (lifecycle.shouldStop) return;
            logger.log(`[Ookla UL] ${errorMessage(error)}`);
            await pause(200, stop);
          }
        }
      };
    });
    report('uploadWorkers', workers);
    releaseHttpClient(lifecycle, client);
  }

  /**
   * Starts the initial workers, then adds rampStep more every rampIntervalMs
   * until maxWorkers or the stop. `batch` builds the worker body for each
   * batch. Resolves with the final worker count once every worker settled.
   */
  private async rampOnSchedule(
    group: WorkerGroup,
    stop: () => boolean,
    batch: (added: number) => () => Promise<void>,
  ): Promise<number> {
    const { initialWorkers, maxWorkers, rampStep, rampIntervalMs, workerStaggerMs } = this.settings;
    const ramp = new WorkerRamp({ initial: initialWorkers, step: rampStep, max: maxWorkers });
    const launch = (count: number) => {
      const body = batch(count);
      for (let i = 0; i < count; i++) group.spawn(body, i * workerStaggerMs);
    };

    launch(ramp.workers);
    group.spawn(async () => {
      while (!stop() && ramp.workers < maxWorkers) {
        await pause(rampIntervalMs, stop);
        if (stop()) break;
        launch(ramp.grow());
      }
    });
    await group.settled();
    return ramp.workers;
  }

  // One latency.txt round trip per server; unreachable servers drop out.
  private async rankByPing(
    client: AxiosInstance,
    servers: OoklaServer[],
    lifecycle: ResourceLifecycle,
  ): Promise<OoklaServer[]> {
    const timed: { server: OoklaServer; ping: number }[] = [];
    for (const server of servers) {
      if (lifecycle.shouldStop) break;
      const started = performance.now();
      try {
        const response = await client.get(withCacheBuster(ooklaFileUrl(server.url, 'latency.txt')), {
          responseType: 'arraybuffer',
        });
        const ping = performance.now() - started;
        if (isAccepted(response.status)) timed.push({ server, ping });
        else logger.log(`[Ookla] ${server.name}: latency HTTP ${response.status}`);
      } catch (error) {
        logger.log(`[Ookla] ${server.name}: ${errorMessage(error)}`);
      }
    }
    timed.sort((a, b) => a.ping - b.ping);
    return timed.map(entry => entry.server);
  }

  private async checkServer(client: AxiosInstance, server: OoklaServer): Promise<TargetDescriptor | null> {
    const response = await client.head(ooklaFileUrl(server.url, this.settings.downloadFiles[0]));
    if (response.status !== 200) return null;
    logger.log(`[Ookla] Server: ${server.name} (${server.sponsor})`);
    return {
      url: server.url,
      host: new URL(server.url).hostname,
      edgeId: server.id,
      label: `${server.name} (${server.sponsor})`,
    };
  }
}

// ───────────────────────────── Registry ─────────────────────────────

export interface EngineEntry {
  id: string;
  title: string;
  factory: () => MeasurementEngine;
}

export const engines: EngineEntry[] = [
  {
    id: 'real-speed',
    title: 'Real speed',
    factory: () => new RealSpeedEngine(),
  },
  {
    id: 'fast',
    title: 'Fast',
    factory: () => new FastEngine(),
  },
  {
    id: 'ookla',
    title: 'Speedtest by Ookla',
    factory: () => new OoklaEngine(),
  },
  {
    id: 'cloudflare',
    title: 'Cloudflare',
    factory: () => new CloudflareEngine(),
  },
  {
    id: 'akamai',
    title: 'Akamai Edge-Cache',
    factory: () =>
      new EdgeCacheEngine({
        name: 'Akamai',
        candidates: [
          'http://swcdn.apple.com/content/downloads/28/01/041-88407-A_T8D7833FO7/0y7xlyp38xrt816x5f14x13a69aoxr8p25/Safari15.6.1BigSurAuto.pkg',
          'http://ardownload2.adobe.com/pub/adobe/reader/win/AcroRdrDC2100120155_en_US.exe',
          'http://steamcdn-a.akamaihd.net/client/installer/SteamSetup.exe',
        ],
      }),
  },
  {
    id: 'google-ggc',
    title: 'Google Global Cache',
    factory: () =>
      new EdgeCacheEngine({
        name: 'Google GGC',
        candidates: [
          'http://dl.google.com/linux/direct/google-chrome-stable_current_amd64.deb',
          'http://dl.google.com/dl/cloudsdk/channels/rapid/google-cloud-cli-linux-x86_64.tar.gz',
          'http://dl.google.com/android/repository/platform-tools-latest-linux.zip',
          'http://redirector.gvt1.com/edgedl/linux/direct/google-chrome-stable_current_amd64.deb',
        ],
        initialWorkers: 6,
        maxWorkers: 12,
        chunkMax: 16 * 1024 * 1024,
      }),
  },
  {
    id: 'facebook-cdn',
    title: 'Facebook CDN',
    factory: () =>
      new SocketCdnEngine({
        ogImagePages: [
          'https://www.facebook.com/facebook',
          'https://www.facebook.com/meta',
          'https://www.facebook.com/instagram',
          'https://www.facebook.com/whatsapp',
        ],
      }),
  },
  {
    id: 'local',
    title: 'Local target server',
    factory: () =>
      new EdgeCacheEngine({
        name: 'Local',
        candidates: [`${SERVER_URL}/download/${100 * 1024 * 1024}`],
        uploadUrl: `${SERVER_URL}/upload`,
        fallbackUploadUrl: `${SERVER_URL}/upload`,
      }),
  },
];

export function byId(id: string): EngineEntry | undefined {
  return engines.find(entry => entry.id === id);
}

export function byName(name: string): EngineEntry | undefined {
  const wanted = name.trim().toLowerCase();
  return engines.find(entry => entry.title.toLowerCase() === wanted || entry.id === wanted);
}

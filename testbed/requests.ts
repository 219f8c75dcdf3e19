import axios, { AxiosInstance } from 'axios';
import http from 'http';
import https from 'https';
import { performance } from 'perf_hooks';
import { Readable } from 'stream';
import { AgentOptions, USER_AGENT, createAgent } from './config';
import { TransportError, errorMessage } from './errors';
import { ResourceLifecycle } from './lifecycle';
import { logger } from './logger';
import { sleep, summarizeLatency } from './strategies';
import { BytesCallback, LatencyResult } from './types';

// Headers every measurement request carries: wire bytes must equal counted bytes.
export const MEASUREMENT_HEADERS: Record<string, string> = {
  'Accept-Encoding': 'identity',
  'Cache-Control': 'no-store',
  'User-Agent': USER_AGENT,
};

export interface HttpClient {
  http: AxiosInstance;
  httpAgent: http.Agent;
  httpsAgent: http.Agent;
}

/**
 * An axios instance over keep-alive agents registered with the lifecycle, so
 * a forced teardown destroys their sockets. Returns null when the run is
 * already stopping. Every status resolves; redirects are never followed.
 */
export function createHttpClient(
  lifecycle: ResourceLifecycle,
  options: AgentOptions & { timeoutMs?: number } = {},
): HttpClient | null {
  const httpAgent = createAgent('http:', options);
  const httpsAgent = createAgent('https:', options);
  if (!lifecycle.registerClient(httpAgent)) {
    httpsAgent.destroy();
    return null;
  }
  if (!lifecycle.registerClient(httpsAgent)) {
    lifecycle.releaseClient(httpAgent);
    return null;
  }
  const instance = axios.create({
    httpAgent,
    httpsAgent,
    proxy: false,
    decompress: false,
    maxRedirects: 0,
    timeout: options.timeoutMs ?? 0,
    validateStatus: () => true,
    headers: MEASUREMENT_HEADERS,
  });
  return { http: instance, httpAgent, httpsAgent };
}

export function releaseHttpClient(lifecycle: ResourceLifecycle, client: HttpClient): void {
  lifecycle.releaseClient(client.httpAgent);
  lifecycle.releaseClient(client.httpsAgent);
}

export function agentFor(client: HttpClient, url: string): http.Agent {
  return url.startsWith('https:') ? client.httpsAgent : client.httpAgent;
}

export function headerValue(headers: Record<string, unknown>, name: string): string | undefined {
  const value = headers[name.toLowerCase()];
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  if (Array.isArray(value)) {
    const first: unknown = value[0];
    return typeof first === 'string' ? first : undefined;
  }
  return undefined;
}

export interface HeadProbe {
  status: number;
  url: string; // after redirects
  headers: Record<string, unknown>;
  elapsedMs: number; // last hop only
  hops: number;
}

export async function probeHead(client: AxiosInstance, url: string, maxRedirects = 3): Promise<HeadProbe> {
  let current = url;
  for (let hop = 0; ; hop++) {
    const started = performance.now();
    const response = await client.head(current);
    const elapsedMs = performance.now() - started;
    const location = headerValue(response.headers, 'location');
    if (response.status >= 300 && response.status < 400 && location && hop < maxRedirects) {
      current = new URL(location, current).toString();
      continue;
    }
    return { status: response.status, url: current, headers: response.headers, elapsedMs, hops: hop };
  }
}

/**
 * Reads a body to its end, reporting each chunk as it arrives. A stream cut
 * short by a stop request resolves with the bytes read so far.
 */
export function consumeStream(stream: Readable, onBytes: BytesCallback, lifecycle: ResourceLifecycle): Promise<number> {
  return new Promise((resolve, reject) => {
    let bytes = 0;
    let ended = false;
    stream.on('data', (chunk: Buffer) => {
      if (lifecycle.shouldStop) {
        stream.destroy();
        return;
      }
      bytes += chunk.length;
      onBytes(chunk.length);
    });
    stream.once('end', () => {
      ended = true;
      resolve(bytes);
    });
    stream.on('error', error => reject(new TransportError(errorMessage(error))));
    stream.once('close', () => {
      if (ended || lifecycle.shouldStop) resolve(bytes);
      else reject(new TransportError('Response closed before its end'));
    });
  });
}

export interface StreamedResponse {
  status: number;
  bytes: number;
  headers: Record<string, unknown>;
}

// Only 200/206 bodies are counted; anything else is drained and discarded.
export async function streamGet(
  client: AxiosInstance,
  url: string,
  onBytes: BytesCallback,
  lifecycle: ResourceLifecycle,
  headers: Record<string, string> = {},
): Promise<StreamedResponse> {
  const response = await client.get<Readable>(url, { responseType: 'stream', headers });
  const counted = response.status === 200 || response.status === 206;
  const bytes = await consumeStream(response.data, counted ? onBytes : () => {}, lifecycle);
  return { status: response.status, bytes: counted ? bytes : 0, headers: response.headers };
}

export async function postBuffer(
  client: AxiosInstance,
  url: string,
  payload: Buffer,
  timeoutMs = 0,
): Promise<number> {
  const response = await client.post(url, payload, {
    headers: { 'Content-Type': 'application/octet-stream' },
    responseType: 'arraybuffer',
    maxBodyLength: Infinity,
    maxContentLength: Infinity,
    timeout: timeoutMs,
  });
  return response.status;
}

export function isAccepted(status: number): boolean {
  return status >= 200 && status < 300;
}

export interface StreamingPostOptions {
  chunk: Buffer;
  maxBytes: number;
  onSent: BytesCallback;
}

/**
 * Chunked-transfer POST that keeps writing `chunk` until maxBytes or a stop.
 * A slice is reported only from its write callback, i.e. after the socket
 * took it. Resolves with the response status.
 */
export function streamingPost(
  url: string,
  agent: http.Agent,
  lifecycle: ResourceLifecycle,
  options: StreamingPostOptions,
): Promise<number> {
  return new Promise<number>((resolve, reject) => {
    const requestOptions: http.RequestOptions = {
      method: 'POST',
      agent,
      headers: {
        ...MEASUREMENT_HEADERS,
        'Content-Type': 'application/octet-stream',
        'Transfer-Encoding': 'chunked',
      },
    };
    const req = url.startsWith('https:') ? https.request(url, requestOptions) : http.request(url, requestOptions);
    let answered = false;

    req.once('socket', socket => {
      lifecycle.registerSocket(socket);
    });
    req.once('response', res => {
      answered = true;
      res.resume();
      res.once('end', () => resolve(res.statusCode ?? 0));
      res.once('error', error => reject(new TransportError(errorMessage(error))));
    });
    req.on('error', error => reject(new TransportError(errorMessage(error))));

    const write = (slice: Buffer) =>
      new Promise<void>((done, fail) => {
        req.write(slice, error => (error ? fail(error) : done()));
      });

    const pump = async () => {
      let sent = 0;
      // The server may answer (and reject) before the body is complete.
      while (sent < options.maxBytes && !answered && !lifecycle.shouldStop) {
        await write(options.chunk);
        options.onSent(options.chunk.length);
        sent += options.chunk.length;
      }
      req.end();
    };
    pump().catch(error => {
      req.destroy();
      reject(new TransportError(errorMessage(error)));
    });
  });
}

/**
 * Times `count` sequential requests, `gapMs` apart, and summarizes them.
 * Failed samples are skipped.
 */
export async function sampleLatency(
  lifecycle: ResourceLifecycle,
  count: number,
  gapMs: number,
  request: () => Promise<unknown>,
): Promise<LatencyResult> {
  const samples: number[] = [];
  for (let i = 0; i < count && !lifecycle.shouldStop; i++) {
    const started = performance.now();
    try {
      await request();
      samples.push(performance.now() - started);
    } catch (error) {
      logger.log(`[Latency] Sample ${i + 1} failed: ${errorMessage(error)}`);
    }
    if (gapMs > 0 && i < count - 1) await sleep(gapMs);
  }
  return summarizeLatency(samples);
}

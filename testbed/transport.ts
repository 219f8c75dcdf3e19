import net from 'net';
import tls from 'tls';
import { Duplex } from 'stream';
import { ProtocolError, TransportError, errorMessage } from './errors';
import { ResourceLifecycle } from './lifecycle';
import { BytesCallback, ParsedResponse } from './types';

const CRLF = Buffer.from('\r\n', 'latin1');
const HEADER_END = Buffer.from('\r\n\r\n', 'latin1');
const MAX_HEADER_BYTES = 64 * 1024;
const CLOSED: ParsedResponse = { statusCode: 0, bodyBytes: 0 };

/**
 * Growable byte buffer with explicit consume/compact. Inbound chunks are
 * copied into one backing store instead of concatenated into new buffers.
 */
export class ByteArena {
  private store: Buffer;
  private start = 0;
  private end = 0;

  constructor(capacity = 64 * 1024) {
    this.store = Buffer.allocUnsafe(capacity);
  }

  get length(): number {
    return this.end - this.start;
  }

  append(chunk: Buffer): void {
    if (this.end + chunk.length > this.store.length) {
      this.compact();
      if (this.end + chunk.length > this.store.length) {
        const grown = Buffer.allocUnsafe(Math.max(this.store.length * 2, this.end + chunk.length));
        this.store.copy(grown, 0, 0, this.end);
        this.store = grown;
      }
    }
    chunk.copy(this.store, this.end);
    this.end += chunk.length;
  }

  // Valid until the next append/compact.
  view(): Buffer {
    return this.store.subarray(this.start, this.end);
  }

  indexOf(sequence: Buffer): number {
    return this.view().indexOf(sequence);
  }

  consume(bytes: number): void {
    this.start = Math.min(this.start + bytes, this.end);
    if (this.start === this.end) {
      this.start = 0;
      this.end = 0;
    }
  }

  compact(): void {
    if (this.start === 0) return;
    this.store.copy(this.store, 0, this.start, this.end);
    this.end -= this.start;
    this.start = 0;
  }

  clear(): void {
    this.start = 0;
    this.end = 0;
  }
}

type ParserState =
  | 'headers'
  | 'body'        // Content-Length framing
  | 'until-close' // no framing, body ends with the connection
  | 'chunk-size'
  | 'chunk-data'
  | 'chunk-end'
  | 'trailers';

interface PendingRequest {
  resolve: (response: ParsedResponse) => void;
  isHead: boolean;
  statusCode: number;
  bodyBytes: number;
}

export interface TransportOptions {
  // Body bytes as they are consumed from the socket.
  onBodyBytes?: BytesCallback;
  onClose?: () => void;
}

/**
 * Streaming HTTP/1.1 client bound to one already-connected socket. Sends
 * repeated requests over the same connection, one in flight at a time, and
 * reports exactly how many body bytes each response carried.
 *
 * Bytes that arrive after a response completes stay buffered for the next
 * request. A socket error or peer close completes the pending request with
 * { statusCode: 0, bodyBytes: 0 } and tears the connection down.
 */
export class PersistentTransport {
  private readonly arena = new ByteArena();
  private state: ParserState = 'headers';
  private remaining = 0;
  private pending: PendingRequest | null = null;
  private closed = false;

  constructor(
    private readonly socket: Duplex,
    private readonly options: TransportOptions = {},
  ) {
    socket.on('data', (chunk: Buffer) => this.onData(chunk));
    socket.on('error', () => this.close());
    socket.on('end', () => this.close());
    socket.on('close', () => this.close());
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get inFlight(): boolean {
    return this.pending !== null;
  }

  get bufferedBytes(): number {
    return this.arena.length;
  }

  sendRequest(request: Buffer): Promise<ParsedResponse> {
    const response = this.begin(request);
    if (!this.pending) return response;
    this.socket.write(request, error => {
      if (error) this.close();
    });
    this.processBuffer();
    return response;
  }

  /**
   * Writes the header, then the body in slices of chunkSize. Each slice is
   * reported through onSent only after the socket confirms it was flushed.
   */
  async sendRequestChunked(
    header: Buffer,
    body: Buffer,
    chunkSize: number,
    onSent: BytesCallback,
  ): Promise<ParsedResponse> {
    if (!(chunkSize >= 1)) throw new ProtocolError(`Invalid upload slice size: ${chunkSize}`);
    const response = this.begin(header);
    const request = this.pending;
    if (!request) return response;
    try {
      await this.write(header);
      let offset = 0;
      // The server may answer (e.g. reject) before the body is complete.
      while (offset < body.length && this.pending === request && !this.closed) {
        const slice = body.subarray(offset, Math.min(offset + chunkSize, body.length));
        await this.write(slice);
        onSent(slice.length);
        offset += slice.length;
      }
      // The peer still expects the rest of the body; the connection can't carry another request.
      if (offset < body.length) {
        this.close();
        return response;
      }
      this.processBuffer();
    } catch {
      this.close();
    }
    return response;
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    const pending = this.pending;
    this.pending = null;
    if (pending) {
      // A body without framing legitimately ends with the connection.
      pending.resolve(
        this.state === 'until-close'
          ? { statusCode: pending.statusCode, bodyBytes: pending.bodyBytes }
          : CLOSED,
      );
    }
    this.arena.clear();
    this.socket.destroy();
    this.options.onClose?.();
  }

  private begin(request: Buffer): Promise<ParsedResponse> {
    if (this.pending) {
      throw new ProtocolError('A request is already in flight on this connection');
    }
    if (this.closed) return Promise.resolve(CLOSED);
    return new Promise<ParsedResponse>(resolve => {
      this.pending = {
        resolve,
        isHead: request.subarray(0, 5).toString('latin1') === 'HEAD ',
        statusCode: 0,
        bodyBytes: 0,
      };
    });
  }

  private write(data: Buffer): Promise<void> {
    return new Promise((resolve, reject) => {
      if (this.closed) {
        reject(new TransportError('Connection closed'));
        return;
      }
      this.socket.write(data, error => (error ? reject(error) : resolve()));
    });
  }

  private onData(chunk: Buffer): void {
    if (this.closed) return;
    this.arena.append(chunk);
    this.processBuffer();
  }

  private processBuffer(): void {
    try {
      // Without a pending request, bytes wait in the arena for the next one.
      while (this.pending && !this.closed && this.step(this.pending)) {
        // keep stepping while progress is made
      }
    } catch (error) {
      if (error instanceof ProtocolError) this.close();
      else throw error;
    }
  }

  // Returns true when the parser made progress and should run again.
  private step(pending: PendingRequest): boolean {
    switch (this.state) {
      case 'headers':
        return this.readHeaders(pending);
      case 'body': {
        const taken = this.take(pending, this.remaining);
        if (taken === 0 && this.remaining > 0) return false;
        this.remaining -= taken;
        if (this.remaining === 0) this.finish(pending);
        return true;
      }
      case 'until-close':
        this.take(pending, this.arena.length);
        return false;
      case 'chunk-size': {
        const lineEnd = this.arena.indexOf(CRLF);
        if (lineEnd === -1) return false;
        const line = this.arena.view().subarray(0, lineEnd).toString('latin1');
        const size = parseInt(line.split(';')[0].trim(), 16);
        if (Number.isNaN(size) || size < 0) {
          throw new ProtocolError(`Malformed chunk size line: ${line}`);
        }
        this.arena.consume(lineEnd + 2);
        if (size === 0) {
          this.state = 'trailers';
        } else {
          this.remaining = size;
          this.state = 'chunk-data';
        }
        return true;
      }
      case 'chunk-data': {
        const taken = this.take(pending, this.remaining);
        if (taken === 0) return false;
        this.remaining -= taken;
        if (this.remaining === 0) this.state = 'chunk-end';
        return true;
      }
      case 'chunk-end':
        if (this.arena.length < 2) return false;
        this.arena.consume(2);
        this.state = 'chunk-size';
        return true;
      case 'trailers': {
        const lineEnd = this.arena.indexOf(CRLF);
        if (lineEnd === -1) return false;
        this.arena.consume(lineEnd + 2);
        if (lineEnd === 0) this.finish(pending);
        return true;
      }
    }
  }

  private readHeaders(pending: PendingRequest): boolean {
    const headerEnd = this.arena.indexOf(HEADER_END);
    if (headerEnd === -1) {
      if (this.arena.length > MAX_HEADER_BYTES) {
        throw new ProtocolError('Response header exceeds limit');
      }
      return false;
    }

    const lines = this.arena.view().subarray(0, headerEnd).toString('latin1').split('\r\n');
    this.arena.consume(headerEnd + HEADER_END.length);

    const match = /^HTTP\/1\.[01] (\d{3})/.exec(lines[0]);
    if (!match) throw new ProtocolError(`Malformed status line: ${lines[0]}`);
    const statusCode = parseInt(match[1], 10);

    let contentLength = -1;
    let chunked = false;
    for (const line of lines.slice(1)) {
      const separator = line.indexOf(':');
      if (separator === -1) continue;
      const name = line.slice(0, separator).trim().toLowerCase();
      const value = line.slice(separator + 1).trim();
      if (name === 'content-length') {
        contentLength = parseInt(value, 10);
        if (Number.isNaN(contentLength)) throw new ProtocolError(`Malformed Content-Length: ${value}`);
      } else if (name === 'transfer-encoding' && value.toLowerCase().includes('chunked')) {
        chunked = true;
      }
    }

    // Interim responses carry no body and precede the real one.
    if (statusCode >= 100 && statusCode < 200) return true;

    pending.statusCode = statusCode;
    pending.bodyBytes = 0;

    if (pending.isHead || statusCode === 204 || statusCode === 304 || (contentLength === 0 && !chunked)) {
      this.finish(pending);
    } else if (chunked) {
      this.state = 'chunk-size';
    } else if (contentLength > 0) {
      this.remaining = contentLength;
      this.state = 'body';
    } else {
      this.state = 'until-close';
    }
    return true;
  }

  private take(pending: PendingRequest, limit: number): number {
    const taken = Math.min(limit, this.arena.length);
    if (taken <= 0) return 0;
    this.arena.consume(taken);
    pending.bodyBytes += taken;
    this.options.onBodyBytes?.(taken);
    return taken;
  }

  private finish(pending: PendingRequest): void {
    this.state = 'headers';
    this.remaining = 0;
    this.pending = null;
    pending.resolve({ statusCode: pending.statusCode, bodyBytes: pending.bodyBytes });
  }
}

export interface SocketTarget {
  host: string;
  port: number;
  secure: boolean;
  address?: string; // connect here instead of resolving host
}

export function socketTargetFromUrl(url: string, address?: string): SocketTarget {
  const parsed = new URL(url);
  const secure = parsed.protocol === 'https:';
  return {
    host: parsed.hostname,
    port: parsed.port ? parseInt(parsed.port, 10) : secure ? 443 : 80,
    secure,
    address,
  };
}

/**
 * Opens a TCP (or TLS) socket registered with the lifecycle before it
 * connects, so a teardown during the handshake destroys it too.
 */
export function connectSocket(
  target: SocketTarget,
  lifecycle: ResourceLifecycle,
  timeoutMs: number,
): Promise<Duplex> {
  return new Promise((resolve, reject) => {
    const host = target.address ?? target.host;
    const socket = target.secure
      ? tls.connect({
          host,
          port: target.port,
          servername: net.isIP(target.host) ? undefined : target.host,
          ALPNProtocols: ['http/1.1'],
          rejectUnauthorized: false,
        })
      : net.connect({ host, port: target.port });

    const fail = (error: unknown) => {
      socket.destroy();
      reject(new TransportError(`Connect to ${target.host}:${target.port} failed: ${errorMessage(error)}`));
    };
    const onClose = () => fail(new Error('closed during connect'));
    const onTimeout = () => fail(new Error('timed out'));
    socket.once('error', fail);
    socket.once('close', onClose);
    socket.once('timeout', onTimeout);
    socket.setTimeout(timeoutMs);

    if (!lifecycle.registerSocket(socket)) {
      fail(new Error('test is stopping'));
      return;
    }

    socket.once(target.secure ? 'secureConnect' : 'connect', () => {
      socket.setTimeout(0);
      socket.removeListener('timeout', onTimeout);
      socket.removeListener('close', onClose);
      socket.removeListener('error', fail);
      socket.setNoDelay(true);
      resolve(socket);
    });
  });
}

export function buildGetRequest(host: string, path: string, headers: Record<string, string> = {}): Buffer {
  return buildHead('GET', host, path, headers);
}

export function buildPostHeader(
  host: string,
  path: string,
  contentLength: number,
  headers: Record<string, string> = {},
): Buffer {
  return buildHead('POST', host, path, {
    'Content-Type': 'application/octet-stream',
    'Content-Length': String(contentLength),
    ...headers,
  });
}

function buildHead(method: string, host: string, path: string, headers: Record<string, string>): Buffer {
  const all: Record<string, string> = {
    Host: host,
    'Accept-Encoding': 'identity',
    'Cache-Control': 'no-store',
    Connection: 'keep-alive',
    ...headers,
  };
  const lines = [`${method} ${path} HTTP/1.1`, ...Object.entries(all).map(([k, v]) => `${k}: ${v}`)];
  return Buffer.from(`${lines.join('\r\n')}\r\n\r\n`, 'latin1');
}

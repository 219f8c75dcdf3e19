import express, { Request, Response } from 'express';
import fs from 'fs/promises';
import fsSync from 'fs';
import http from 'http';
import crypto from 'crypto';
import path from 'path';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import mime from 'mime-types';
import { SERVER_HOST, SERVER_PORT } from './config';
import { errorMessage } from './errors';
import { logger } from './logger';
import { ByteRange } from './strategies';

export const MAX_DOWNLOAD_BYTES = 1024 * 1024 * 1024;

const PATTERN_BYTES = 64 * 1024;
const DEFAULT_FILES_DIR = path.join(process.cwd(), 'input_files');

// Hash-chain bytes: incompressible, and identical on every run.
const PATTERN = (() => {
  const block = Buffer.alloc(PATTERN_BYTES);
  for (let offset = 0, counter = 0; offset < PATTERN_BYTES; counter++) {
    const digest = crypto.createHash('sha256').update(`edgemeter-${counter}`).digest();
    offset += digest.copy(block, offset);
  }
  return block;
})();

export function patternChunk(start: number, length: number): Buffer {
  const out = Buffer.alloc(length);
  let written = 0;
  while (written < length) {
    const at = (start + written) % PATTERN_BYTES;
    written += PATTERN.copy(out, written, at, Math.min(PATTERN_BYTES, at + length - written));
  }
  return out;
}

function* patternSlices(range: ByteRange): Generator<Buffer> {
  for (let at = range.start; at <= range.end; at += PATTERN_BYTES) {
    yield patternChunk(at, Math.min(PATTERN_BYTES, range.end - at + 1));
  }
}

/**
 * Parses a single `bytes=` range against a body of `size` bytes. Returns null
 * when there is no usable header (the full body is sent).
 */
export function parseRange(header: string | undefined, size: number): ByteRange | 'unsatisfiable' | null {
  if (!header) return null;
  const match = /^bytes=(\d*)-(\d*)$/.exec(header.trim());
  if (!match || (match[1] === '' && match[2] === '')) return null;

  if (match[1] === '') {
    const suffix = parseInt(match[2], 10);
    if (suffix === 0 || size === 0) return 'unsatisfiable';
    return { start: Math.max(0, size - suffix), end: size - 1 };
  }

  const start = parseInt(match[1], 10);
  const end = match[2] === '' ? size - 1 : Math.min(parseInt(match[2], 10), size - 1);
  if (start >= size || end < start) return 'unsatisfiable';
  return { start, end };
}

interface FileMetadata {
  filename: string;
  size: number;
  hash: string;
  contentType: string;
  timestamp: string;
}

async function calculateFileHash(filePath: string): Promise<string> {
  const hash = crypto.createHash('sha256');
  await pipeline(fsSync.createReadStream(filePath), hash);
  return hash.digest('hex');
}

async function getFileMetadata(filePath: string): Promise<FileMetadata> {
  const stats = await fs.stat(filePath);
  return {
    filename: path.basename(filePath),
    size: stats.size,
    hash: await calculateFileHash(filePath),
    contentType: mime.lookup(filePath) || 'application/octet-stream',
    timestamp: stats.mtime.toISOString(),
  };
}

export interface ServerOptions {
  filesDir?: string;
  maxDownloadBytes?: number;
}

export function createApp(options: ServerOptions = {}): express.Express {
  const filesDir = options.filesDir ?? DEFAULT_FILES_DIR;
  const maxDownloadBytes = options.maxDownloadBytes ?? MAX_DOWNLOAD_BYTES;
  const app = express();
  app.disable('x-powered-by');
  app.disable('etag');

  // Express answers HEAD through the GET handlers.
  app.get('/download/:bytes', (req: Request, res: Response) => {
    const requested = Number(req.params.bytes);
    if (!Number.isSafeInteger(requested) || requested < 0) {
      return res.status(400).json({ error: `Invalid size: ${req.params.bytes}` });
    }
    const size = Math.min(requested, maxDownloadBytes);
    const range = parseRange(req.get('range'), size);

    res.set({
      'Content-Type': 'application/octet-stream',
      'Accept-Ranges': 'bytes',
      'Cache-Control': 'no-store',
    });

    if (range === 'unsatisfiable') {
      logger.log(`[Server] Unsatisfiable range ${req.get('range')} for ${size} bytes`);
      res.set('Content-Range', `bytes */${size}`);
      return res.status(416).end();
    }

    const body = range ?? { start: 0, end: size - 1 };
    const length = body.end - body.start + 1;
    if (range) {
      res.status(206).set('Content-Range', `bytes ${range.start}-${range.end}/${size}`);
    }
    res.set('Content-Length', String(length));

    if (req.method === 'HEAD' || length === 0) return res.end();

    logger.log(`[Server] Sending ${length} bytes (${body.start}-${body.end} of ${size})`);
    pipeline(Readable.from(patternSlices(body)), res).catch(error =>
      logger.log(`[Server] Download stream ended early: ${errorMessage(error)}`),
    );
  });

  app.post('/upload', (req: Request, res: Response) => {
    let received = 0;
    req.on('data', (chunk: Buffer) => {
      received += chunk.length;
    });
    req.on('end', () => {
      logger.log(`[Server] Upload drained: ${received} bytes`);
      res.json({ bytes: received });
    });
    req.on('error', error => {
      const message = `Error receiving upload: ${error.message}`;
      logger.error(message);
      if (!res.headersSent) res.status(500).json({ error: message });
    });
  });

  app.get('/ping', (_req: Request, res: Response) => {
    res.set('Cache-Control', 'no-store').status(204).end();
  });

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.get('/files', async (_req: Request, res: Response) => {
    try {
      const entries = await fs.readdir(filesDir, { withFileTypes: true });
      const files = entries.filter(entry => entry.isFile()).map(entry => entry.name).sort();
      res.json(await Promise.all(files.map(name => getFileMetadata(path.join(filesDir, name)))));
    } catch (error) {
      const message = `Failed to list files: ${errorMessage(error)}`;
      logger.error(message);
      res.status(500).json({ error: message });
    }
  });

  app.get('/files/:name', async (req: Request, res: Response) => {
    // basename() keeps the lookup inside filesDir.
    const filePath = path.join(filesDir, path.basename(req.params.name));
    let metadata: FileMetadata;
    try {
      metadata = await getFileMetadata(filePath);
    } catch (error) {
      logger.log(`[Server] File lookup failed for ${req.params.name}: ${errorMessage(error)}`);
      return res.status(404).json({ error: `File not found: ${req.params.name}` });
    }

    res.set({
      'Content-Type': metadata.contentType,
      'Content-Length': String(metadata.size),
      'X-File-Hash': metadata.hash,
      'X-File-Size': String(metadata.size),
    });
    logger.log(`[Server] Sending file ${metadata.filename} (${metadata.size} bytes) with hash ${metadata.hash}`);
    try {
      await pipeline(fsSync.createReadStream(filePath), res);
    } catch (error) {
      logger.log(`[Server] File stream ended early: ${errorMessage(error)}`);
    }
  });

  return app;
}

export interface StartOptions extends ServerOptions {
  port?: number;
  host?: string;
}

export function startServer(options: StartOptions = {}): Promise<http.Server> {
  const app = createApp(options);
  const port = options.port ?? SERVER_PORT;
  const host = options.host ?? SERVER_HOST;
  return new Promise((resolve, reject) => {
    const server = app.listen(port, host, () => {
      logger.log(`[Server] Listening on http://${host}:${port}`);
      resolve(server);
    });
    server.once('error', reject);
  });
}

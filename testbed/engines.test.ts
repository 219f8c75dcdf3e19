import { after, before, describe, it } from 'node:test';
import assert from 'node:assert/strict';
import express from 'express';
import http from 'http';
import { DiscoveryError } from './errors';
import {
  CloudflareEngine,
  EdgeCacheEngine,
  FastEngine,
  OoklaEngine,
  RealSpeedEngine,
  SocketCdnEngine,
  byId,
  byName,
  classifyRtt,
  extractOgImage,
  ooklaFileUrl,
  parseFastTargets,
  parseOoklaServers,
  pickOoklaCandidates,
  toUploadUrl,
} from './engines';
import { ResourceLifecycle } from './lifecycle';
import { createApp } from './server';
import { MetadataReporter, MetadataValue } from './types';

const MB = 1024 * 1024;

function portOf(server: http.Server): number {
  const address = server.address();
  if (typeof address === 'object' && address) return address.port;
  throw new Error('server is not listening');
}

function recorder() {
  const reports: [string, MetadataValue][] = [];
  const report: MetadataReporter = (key, value) => {
    reports.push([key, value]);
  };
  return { reports, report };
}

class ByteCounter {
  bytes = 0;
  onBytes = (n: number) => {
    this.bytes += n;
  };
}

const byteCounter = () => new ByteCounter();

function drain(req: express.Request, res: express.Response) {
  let bytes = 0;
  req.on('data', (chunk: Buffer) => {
    bytes += chunk.length;
  });
  req.on('end', () => res.json({ bytes }));
}

describe('engines against a local target', () => {
  const hits: string[] = [];
  let server: http.Server;
  let base = '';

  before(async () => {
    const app = express();
    app.use((req, _res, next) => {
      hits.push(`${req.method} ${req.path}`);
      next();
    });
    app.get('/plain', (_req, res) => {
      res.type('application/octet-stream').send(Buffer.alloc(2 * MB));
    });
    app.get('/page.html', (_req, res) => {
      res.set('Accept-Ranges', 'bytes').type('html').send(`<html>${'x'.repeat(2 * MB)}</html>`);
    });
    app.get('/moved', (_req, res) => res.redirect(302, '/download/2097152'));
    app.post('/rejected', (_req, res) => res.status(403).end());
    // Turns away anything that sends a User-Agent.
    app.post('/picky', (req, res) => {
      if (req.get('user-agent')) return res.status(403).end();
      drain(req, res);
    });
    app.get('/api', (req, res) => {
      if (req.query.token !== 'test-secret') return res.status(403).json({ error: 'bad token' });
      const count = Number(req.query.urlCount);
      const origin = `http://${req.get('host')}`;
      res.json({ targets: ['a', 'b', 'c'].slice(0, count).map(name => ({ url: `${origin}/fast/${name}?tok=1` })) });
    });
    app.get('/api-empty', (_req, res) => res.json({ targets: [] }));
    app.get('/fast/:name', (_req, res) => {
      res.type('application/octet-stream').send(Buffer.alloc(10_000, 7));
    });
    app.post('/speedtest/upload', drain);
    app.get('/social', (req, res) => {
      const image = `http://${req.get('host')}/img.jpg?a=1&amp;b=2`;
      res.type('html').send(`<html><head><meta property="og:image" content="${image}" /></head></html>`);
    });
    app.get('/img.jpg', (_req, res) => {
      res.set('X-Served-By', 'edge-test').type('jpeg').send(Buffer.alloc(60_000, 1));
    });
    app.get('/ookla/servers', (req, res) => {
      const origin = `http://${req.get('host')}`;
      res.json([
        { id: 1, name: 'Dead', sponsor: 'Test ISP', country: 'Testland', url: `${origin}/gone/upload.php` },
        { id: 2, name: 'Slow', sponsor: 'Test ISP', country: 'Testland', url: `${origin}/slow/upload.php` },
        { id: 3, name: 'Quick', sponsor: 'Test ISP', country: 'Testland', url: `${origin}/ookla/upload.php` },
      ]);
    });
    app.get('/slow/latency.txt', (_req, res) => {
      setTimeout(() => res.type('text').send('test=test'), 150);
    });
    app.get('/ookla/latency.txt', (_req, res) => res.type('text').send('test=test'));
    app.get('/ookla/:file', (_req, res) => {
      res.type('jpeg').send(Buffer.alloc(20_000, 3));
    });
    app.post('/ookla/upload.php', drain);
    app.get('/release', (_req, res) => res.redirect(302, '/download/65536'));
    app.use(createApp());

    server = await new Promise<http.Server>(resolve => {
      const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
    });
    base = `http://127.0.0.1:${portOf(server)}`;
  });

  after(async () => {
    server.closeAllConnections();
    await new Promise<void>(resolve => server.close(() => resolve()));
  });

  describe('EdgeCacheEngine', () => {
    it('walks the candidates until one serves a large ranged object', async () => {
      const engine = new EdgeCacheEngine({
        name: 'Local test',
        candidates: [
          `${base}/missing`,
          `${base}/plain`,
          `${base}/page.html`,
          `${base}/moved`,
          `${base}/download/4194304`,
        ],
      });
      hits.length = 0;

      const target = await engine.discover(new ResourceLifecycle());

      assert.ok(target);
      assert.equal(target.url, `${base}/download/2097152`);
      assert.equal(target.host, '127.0.0.1');
      assert.equal(target.address, '127.0.0.1');
      assert.equal(target.edgeId, '127.0.0.1');
      assert.equal(target.contentLength, 2097152);
      assert.equal(target.label, 'Local test');
      assert.ok(['near-cache', 'edge-pop', 'distant'].includes(target.classification ?? ''));
      assert.deepEqual(hits, [
        'HEAD /missing',
        'HEAD /plain',
        'HEAD /page.html',
        'HEAD /moved',
        'HEAD /download/2097152',
      ]);
    });

    it('returns null when no candidate validates', async () => {
      const engine = new EdgeCacheEngine({ name: 'Local test', candidates: [`${base}/missing`, `${base}/plain`] });
      assert.equal(await engine.discover(new ResourceLifecycle()), null);
    });

    it('samples latency with HEAD requests', async () => {
      const engine = new EdgeCacheEngine({ name: 'Local test', candidates: [], latencySamples: 4, latencyGapMs: 0 });
      const latency = await engine.measureLatency(new ResourceLifecycle(), {
        url: `${base}/download/2097152`,
        host: '127.0.0.1',
      });
      assert.ok(latency.ping > 0);
      assert.ok(latency.jitter >= 0);
    });

    it('downloads byte ranges until the phase deadline', async () => {
      const engine = new EdgeCacheEngine({
        name: 'Local test',
        candidates: [],
        phaseDurationSeconds: 0.5,
        initialWorkers: 2,
        maxWorkers: 2,
        chunkInitial: 64 * 1024,
        chunkMax: 256 * 1024,
      });
      const lifecycle = new ResourceLifecycle();
      const counter = byteCounter();
      const { reports, report } = recorder();
      hits.length = 0;

      await engine.runDownload(
        lifecycle,
        counter.onBytes,
        { url: `${base}/download/1048576`, host: '127.0.0.1', contentLength: 1048576 },
        report,
      );

      assert.ok(counter.bytes > 0);
      assert.ok(hits.length > 0);
      assert.ok(hits.every(hit => hit === 'GET /download/1048576'));
      assert.deepEqual(reports, [['downloadWorkers', 2]]);
      assert.equal(lifecycle.tracked.clients, 0);
    });

    it('falls back to the shared upload target when the edge refuses', async () => {
      const engine = new EdgeCacheEngine({
        name: 'Local test',
        candidates: [],
        uploadUrl: `${base}/rejected`,
        fallbackUploadUrl: `${base}/upload`,
        uploadWorkers: 2,
        uploadPayloadBytes: 32 * 1024,
        phaseDurationSeconds: 0.4,
      });
      const counter = byteCounter();
      const { reports, report } = recorder();

      await engine.runUpload(new ResourceLifecycle(), counter.onBytes, { url: `${base}/x`, host: '127.0.0.1' }, report);

      assert.deepEqual(reports, [['uploadTier', 'fallback']]);
      assert.ok(counter.bytes > 0);
      assert.equal(counter.bytes % (32 * 1024), 0);
    });

    it('uses a raw socket to the edge address when plain POSTs are refused', async () => {
      const engine = new EdgeCacheEngine({
        name: 'Local test',
        candidates: [],
        uploadUrl: `${base}/picky`,
        fallbackUploadUrl: `${base}/upload`,
        uploadWorkers: 2,
        uploadPayloadBytes: 32 * 1024,
        uploadChunkBytes: 16 * 1024,
        phaseDurationSeconds: 0.4,
      });
      const counter = byteCounter();
      const { reports, report } = recorder();

      await engine.runUpload(
        new ResourceLifecycle(),
        counter.onBytes,
        { url: `${base}/x`, host: '127.0.0.1', address: '127.0.0.1' },
        report,
      );

      assert.deepEqual(reports, [['uploadTier', 'edge-socket']]);
      assert.ok(counter.bytes > 0);
      assert.equal(counter.bytes % (16 * 1024), 0);
    });
  });

  describe('CloudflareEngine', () => {
    it('streams downloads and posts fixed payloads', async () => {
      const engine = new CloudflareEngine({
        downloadUrl: `${base}/download/65536`,
        uploadUrl: `${base}/upload`,
        workers: 2,
        uploadPayloadBytes: 16 * 1024,
        phaseDurationSeconds: 0.3,
      });
      const lifecycle = new ResourceLifecycle();
      const down = byteCounter();
      const up = byteCounter();

      await engine.runDownload(lifecycle, down.onBytes);
      await engine.runUpload(lifecycle, up.onBytes);

      assert.ok(down.bytes > 0);
      assert.equal(down.bytes % 65536, 0);
      assert.ok(up.bytes > 0);
      assert.equal(up.bytes % (16 * 1024), 0);
      assert.equal(lifecycle.tracked.clients, 0);
    });
  });

  describe('FastEngine', () => {
    it('needs a token before it asks for targets', async () => {
      const engine = new FastEngine({ apiUrl: `${base}/api`, token: '' });
      await assert.rejects(engine.discover(new ResourceLifecycle()), DiscoveryError);
    });

    it('treats a refused target request as a failed discovery', async () => {
      const engine = new FastEngine({ apiUrl: `${base}/api`, token: 'wrong' });
      await assert.rejects(engine.discover(new ResourceLifecycle()), {
        name: 'DiscoveryError',
        message: 'Fast discovery failed: target API returned HTTP 403',
      });
    });

    it('returns null for an empty target list', async () => {
      const engine = new FastEngine({ apiUrl: `${base}/api-empty`, token: 'test-secret' });
      assert.equal(await engine.discover(new ResourceLifecycle()), null);
    });

    it('discovers targets, sizes its streams by latency and runs both phases', async () => {
      const engine = new FastEngine({
        apiUrl: `${base}/api`,
        token: 'test-secret',
        urlCount: 2,
        maxStreams: 3,
        highLatencyMs: 0,
        latencySamples: 3,
        uploadChunkBytes: 16 * 1024,
        uploadRequestBytes: 64 * 1024,
        phaseDurationSeconds: 0.3,
      });
      const lifecycle = new ResourceLifecycle();

      const target = await engine.discover(lifecycle);
      assert.ok(target);
      assert.deepEqual(target.urls, [`${base}/fast/a?tok=1`, `${base}/fast/b?tok=1`]);
      assert.equal(target.url, `${base}/fast/a?tok=1`);
      assert.equal(target.label, '2 targets');

      // Any measurable ping is above a 0 ms threshold.
      await engine.measureLatency(lifecycle, target);
      assert.equal(engine.streamCount, 2);

      const down = byteCounter();
      const { reports, report } = recorder();
      await engine.runDownload(lifecycle, down.onBytes, target, report);
      assert.deepEqual(reports, [['streams', 2]]);
      assert.ok(down.bytes > 0);
      assert.equal(down.bytes % 10_000, 0);

      const up = byteCounter();
      hits.length = 0;
      await engine.runUpload(lifecycle, up.onBytes, target);
      assert.ok(up.bytes > 0);
      assert.equal(up.bytes % (16 * 1024), 0);
      assert.ok(hits.every(hit => hit === 'POST /speedtest/upload'));
    });
  });

  describe('RealSpeedEngine', () => {
    it('follows the release redirect once and fetches the binary in parallel', async () => {
      const engine = new RealSpeedEngine({
        downloadUrl: `${base}/release`,
        uploadUrl: `${base}/upload`,
        downloadWorkers: 3,
        uploadWorkers: 2,
        uploadChunkBytes: 16 * 1024,
        uploadRequestBytes: 64 * 1024,
        phaseDurationSeconds: 0.3,
      });
      const lifecycle = new ResourceLifecycle();
      const down = byteCounter();
      hits.length = 0;

      await engine.runDownload(lifecycle, down.onBytes);

      assert.deepEqual(hits.slice(0, 2), ['HEAD /release', 'HEAD /download/65536']);
      assert.ok(hits.slice(2).every(hit => hit === 'GET /download/65536'));
      assert.ok(down.bytes > 0);
      assert.equal(down.bytes % 65536, 0);

      const up = byteCounter();
      await engine.runUpload(lifecycle, up.onBytes);
      assert.ok(up.bytes > 0);
      assert.equal(up.bytes % (16 * 1024), 0);
      assert.equal(lifecycle.tracked.clients, 0);
    });

    it('skips discovery and latency', () => {
      const engine = new RealSpeedEngine();
      assert.equal(engine.hasDiscovery, false);
      assert.equal(engine.hasLatencyTest, false);
      assert.equal(engine.hasUpload, true);
    });
  });

  describe('OoklaEngine', () => {
    it('picks the fastest answering server from the list', async () => {
      const engine = new OoklaEngine({ serversUrl: `${base}/ookla/servers` });
      hits.length = 0;

      const target = await engine.discover(new ResourceLifecycle());

      assert.ok(target);
      assert.equal(target.url, `${base}/ookla/upload.php`);
      assert.equal(target.host, '127.0.0.1');
      assert.equal(target.edgeId, '3');
      assert.equal(target.label, 'Quick (Test ISP)');
      assert.deepEqual(hits, [
        'GET /ookla/servers',
        'GET /gone/latency.txt',
        'GET /slow/latency.txt',
        'GET /ookla/latency.txt',
        'HEAD /ookla/random350x350.jpg',
      ]);
    });

    it('treats a refused server list as a failed discovery', async () => {
      const engine = new OoklaEngine({ serversUrl: `${base}/gone/servers` });
      await assert.rejects(engine.discover(new ResourceLifecycle()), {
        name: 'DiscoveryError',
        message: 'Ookla discovery failed: server list returned HTTP 404',
      });
    });

    it('pings latency.txt beside the upload endpoint', async () => {
      const engine = new OoklaEngine({ pingSamples: 3, pingGapMs: 0 });
      const target = { url: `${base}/ookla/upload.php`, host: '127.0.0.1' };
      hits.length = 0;

      const latency = await engine.measureLatency(new ResourceLifecycle(), target);

      assert.ok(latency.ping > 0);
      assert.deepEqual(hits, ['GET /ookla/latency.txt', 'GET /ookla/latency.txt', 'GET /ookla/latency.txt']);
    });

    it('adds workers on schedule in both phases and climbs the file ladder', async () => {
      const engine = new OoklaEngine({
        maxWorkers: 6,
        rampIntervalMs: 100,
        workerStaggerMs: 0,
        uploadPayloadBytes: 32 * 1024,
        phaseDurationSeconds: 0.6,
      });
      const target = { url: `${base}/ookla/upload.php`, host: '127.0.0.1' };
      const lifecycle = new ResourceLifecycle();
      hits.length = 0;

      const down = byteCounter();
      const downReports = recorder();
      await engine.runDownload(lifecycle, down.onBytes, target, downReports.report);
      assert.deepEqual(downReports.reports, [['downloadWorkers', 6]]);
      assert.ok(down.bytes > 0);
      assert.equal(down.bytes % 20_000, 0);
      assert.ok(hits.includes('GET /ookla/random350x350.jpg'));
      assert.ok(hits.includes('GET /ookla/random750x750.jpg'));

      hits.length = 0;
      const up = byteCounter();
      const upReports = recorder();
      await engine.runUpload(lifecycle, up.onBytes, target, upReports.report);
      assert.deepEqual(upReports.reports, [['uploadWorkers', 6]]);
      assert.ok(up.bytes > 0);
      assert.equal(up.bytes % (32 * 1024), 0);
      assert.ok(hits.every(hit => hit === 'POST /ookla/upload.php'));
      assert.equal(lifecycle.tracked.clients, 0);
    });
  });

  describe('SocketCdnEngine', () => {
    it('finds a media object through og:image and downloads it over raw sockets', async () => {
      const engine = new SocketCdnEngine({
        ogImagePages: [`${base}/social`],
        uploadUrl: `${base}/picky`,
        fallbackUploadUrl: `${base}/upload`,
        downloadWorkers: 2,
        uploadWorkers: 2,
        uploadPayloadBytes: 32 * 1024,
        phaseDurationSeconds: 0.3,
      });
      const lifecycle = new ResourceLifecycle();

      const target = await engine.discover(lifecycle);
      assert.ok(target);
      assert.equal(target.url, `${base}/img.jpg?a=1&b=2`);
      assert.equal(target.edgeId, 'edge-test');
      assert.equal(target.contentLength, 60_000);
      assert.equal(target.label, 'og:image /social');

      const down = byteCounter();
      await engine.runDownload(lifecycle, down.onBytes, target);
      assert.ok(down.bytes > 0);
      assert.equal(down.bytes % 60_000, 0);

      // The upload host refuses the browser User-Agent, so the fallback runs.
      const up = byteCounter();
      const { reports, report } = recorder();
      await engine.runUpload(lifecycle, up.onBytes, target, report);
      assert.deepEqual(reports, [['uploadTier', 'fallback']]);
      assert.equal(up.bytes % (32 * 1024), 0);
    });
  });
});

describe('engine helpers', () => {
  it('classifies edges by round-trip time', () => {
    assert.equal(classifyRtt(5), 'near-cache');
    assert.equal(classifyRtt(20), 'edge-pop');
    assert.equal(classifyRtt(49.9), 'edge-pop');
    assert.equal(classifyRtt(50), 'distant');
  });

  it('extracts and unescapes og:image URLs', () => {
    assert.equal(
      extractOgImage('<meta property="og:image" content="https://cdn.example.test/p.jpg?x=1&amp;y=2" />'),
      'https://cdn.example.test/p.jpg?x=1&y=2',
    );
    assert.equal(extractOgImage('<html></html>'), null);
  });

  it('keeps only well-formed target URLs', () => {
    assert.deepEqual(parseFastTargets({ targets: [{ url: 'https://a.test/x' }, { nope: 1 }, 'b', { url: 2 }] }), [
      'https://a.test/x',
    ]);
    assert.deepEqual(parseFastTargets(null), []);
    assert.deepEqual(parseFastTargets({ targets: 'x' }), []);
  });

  it('swaps the path of a target URL for the upload path', () => {
    assert.equal(
      toUploadUrl('https://x.example.test/speedtest?c=1&t=2', '/speedtest/upload'),
      'https://x.example.test/speedtest/upload?c=1&t=2',
    );
  });

  it('reads server entries and drops those without an http URL', () => {
    assert.deepEqual(
      parseOoklaServers([
        { id: 7, name: 'A', sponsor: 'S', country: 'X', url: 'http://a.test:8080/speedtest/upload.php', lat: '1' },
        { id: 8, name: 'B', url: 'ftp://b.test/upload.php' },
        'c',
        null,
      ]),
      [{ id: '7', name: 'A', sponsor: 'S', country: 'X', url: 'http://a.test:8080/speedtest/upload.php' }],
    );
    assert.deepEqual(parseOoklaServers({ servers: [] }), []);
  });

  it('prefers servers in the given country', () => {
    const server = (id: string, country: string) => ({ id, name: id, sponsor: '', country, url: `http://${id}.test/upload.php` });
    const list = [server('a', 'Elsewhere'), server('b', 'Home'), server('c', 'Elsewhere'), server('d', 'Home')];

    // Two local servers are not enough on their own; the head of the list joins them.
    assert.deepEqual(
      pickOoklaCandidates(list, 'home', 2).map(s => s.id),
      ['b', 'd', 'a'],
    );
    assert.deepEqual(
      pickOoklaCandidates([...list, server('e', 'Home')], 'Home', 2).map(s => s.id),
      ['b', 'd', 'e'],
    );
    assert.deepEqual(
      pickOoklaCandidates(list, '', 3).map(s => s.id),
      ['a', 'b', 'c'],
    );
  });

  it('places test files beside the upload endpoint', () => {
    assert.equal(
      ooklaFileUrl('http://a.test:8080/speedtest/upload.php', 'random750x750.jpg'),
      'http://a.test:8080/speedtest/random750x750.jpg',
    );
  });

  it('looks engines up by id and title', () => {
    assert.equal(byName('real speed')?.id, 'real-speed');
    assert.equal(byName('speedtest by ookla')?.id, 'ookla');
    assert.equal(byName('google global cache')?.id, 'google-ggc');
    assert.equal(byName('LOCAL')?.id, 'local');
    assert.equal(byId('cloudflare')?.title, 'Cloudflare');
    assert.equal(byId('nope'), undefined);
  });
});

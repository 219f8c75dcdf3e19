import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { ResourceLifecycle } from './lifecycle';
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
  sleep,
  summarizeLatency,
} from './strategies';
import { MetadataValue } from './types';

describe('ChunkSizer', () => {
  it('doubles after fast requests and halves after slow ones, within bounds', () => {
    const sizer = new ChunkSizer({ initial: 256, min: 256, max: 1024 });

    assert.equal(sizer.record(50), 512);
    assert.equal(sizer.record(50), 1024);
    assert.equal(sizer.record(50), 1024);
    assert.equal(sizer.record(1000), 1024);
    assert.equal(sizer.record(9000), 512);
    assert.equal(sizer.record(9000), 256);
    assert.equal(sizer.record(9000), 256);

    sizer.record(50);
    sizer.reset();
    assert.equal(sizer.size, 256);
  });
});

describe('range chunks', () => {
  it('hands out distinct indexes and wraps ranges over the object', () => {
    const cursor = new ChunkCursor();
    assert.deepEqual([cursor.take(), cursor.take(), cursor.take()], [0, 1, 2]);

    assert.deepEqual(rangeFor(0, 100, 250), { start: 0, end: 99 });
    assert.deepEqual(rangeFor(2, 100, 250), { start: 200, end: 249 });
    assert.deepEqual(rangeFor(3, 100, 250), { start: 50, end: 149 });
  });
});

describe('WorkerRamp', () => {
  it('adds workers while the rate keeps climbing, then stops for good', () => {
    const ramp = new WorkerRamp({ initial: 2, step: 2, max: 8 });

    assert.equal(ramp.next(100), 2);
    assert.equal(ramp.next(150), 2);
    assert.equal(ramp.workers, 6);

    // 160 is below a 10% gain over 150.
    assert.equal(ramp.next(160), 0);
    assert.equal(ramp.saturated, true);
    assert.equal(ramp.next(1000), 0);
    assert.equal(ramp.workers, 6);
  });

  it('never exceeds the maximum', () => {
    const ramp = new WorkerRamp({ initial: 6, step: 4, max: 8 });

    assert.equal(ramp.next(10), 2);
    assert.equal(ramp.next(100), 0);
    assert.equal(ramp.workers, 8);
    assert.equal(ramp.saturated, false);
  });

  it('grows on schedule regardless of the rate, up to the maximum', () => {
    const ramp = new WorkerRamp({ initial: 2, step: 2, max: 5 });

    assert.equal(ramp.grow(), 2);
    assert.equal(ramp.grow(), 1);
    assert.equal(ramp.grow(), 0);
    assert.equal(ramp.workers, 5);
    assert.equal(ramp.saturated, false);
  });
});

describe('summarizeLatency', () => {
  it('drops warm-up samples and trims outliers', () => {
    const samples = [100, 90, 10, 12, 14, 16, 18, 20, 22, 24, 26, 200];
    assert.deepEqual(summarizeLatency(samples), { ping: 19, jitter: 2 });
  });

  it('handles short inputs', () => {
    assert.deepEqual(summarizeLatency([]), { ping: 0, jitter: 0 });
    assert.deepEqual(summarizeLatency([5]), { ping: 5, jitter: 0 });
    assert.deepEqual(summarizeLatency([7, 9]), { ping: 8, jitter: 2 });
  });
});

describe('runCascade', () => {
  it('accepts the first candidate that validates and checks nothing after it', async () => {
    const probed: string[] = [];
    const accepted = await runCascade(
      ['a', 'b', 'c', 'd'],
      async candidate => {
        probed.push(candidate);
        if (candidate === 'b') throw new Error('connection refused');
        return candidate === 'c' || candidate === 'd' ? `${candidate}!` : null;
      },
      new ResourceLifecycle(),
    );

    assert.equal(accepted, 'c!');
    assert.deepEqual(probed, ['a', 'b', 'c']);
  });

  it('returns null when nothing validates or the run is stopping', async () => {
    const lifecycle = new ResourceLifecycle();
    assert.equal(await runCascade([1, 2], async () => null, lifecycle), null);

    lifecycle.cancel();
    let probes = 0;
    assert.equal(
      await runCascade(
        [1],
        async () => {
          probes++;
          return 'never';
        },
        lifecycle,
      ),
      null,
    );
    assert.equal(probes, 0);
  });
});

function tier(name: string, accepts: boolean | Error, runs: string[]): UploadTier {
  return {
    name,
    async probe() {
      if (accepts instanceof Error) throw accepts;
      return accepts;
    },
    async run(_lifecycle, onBytes) {
      runs.push(name);
      onBytes(10);
    },
  };
}

describe('runTieredUpload', () => {
  it('runs the first tier that accepts and reports it', async () => {
    const runs: string[] = [];
    const reports: [string, MetadataValue][] = [];
    let bytes = 0;

    const chosen = await runTieredUpload(
      [tier('edge-post', false, runs), tier('edge-socket', new Error('reset'), runs), tier('fallback', true, runs)],
      new ResourceLifecycle(),
      n => (bytes += n),
      (key, value) => reports.push([key, value]),
    );

    assert.equal(chosen, 'fallback');
    assert.deepEqual(runs, ['fallback']);
    assert.deepEqual(reports, [['uploadTier', 'fallback']]);
    assert.equal(bytes, 10);
  });

  it('reports when no tier accepts', async () => {
    const runs: string[] = [];
    const reports: [string, MetadataValue][] = [];

    const chosen = await runTieredUpload(
      [tier('edge-post', false, runs)],
      new ResourceLifecycle(),
      () => {},
      (key, value) => reports.push([key, value]),
    );

    assert.equal(chosen, null);
    assert.deepEqual(runs, []);
    assert.deepEqual(reports, [['uploadTier', 'none']]);
  });
});

describe('timing helpers', () => {
  it('ends a pause early once asked to stop', async () => {
    let stopped = false;
    setTimeout(() => {
      stopped = true;
    }, 60);
    const started = Date.now();
    await pause(10_000, () => stopped);
    assert.ok(Date.now() - started < 1000);
  });

  it('tells whether a deadline has passed', () => {
    assert.equal(isPast(deadlineAfter(-1)), true);
    assert.equal(isPast(deadlineAfter(60)), false);
  });

  it('builds payloads of the requested size', () => {
    assert.equal(incompressiblePayload(1024).length, 1024);
  });
});

describe('WorkerGroup', () => {
  it('settles after late spawns and absorbs failures', async () => {
    const group = new WorkerGroup('test');
    const done: string[] = [];

    group.spawn(async () => {
      group.spawn(async () => {
        await sleep(20);
        done.push('late');
      });
      throw new Error('boom');
    });
    group.spawn(async () => {
      done.push('delayed');
    }, 10);

    await group.settled();
    assert.deepEqual(done, ['delayed', 'late']);
    assert.equal(group.size, 0);
  });
});

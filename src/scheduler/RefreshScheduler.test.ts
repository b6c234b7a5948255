/**
 * Tests for RefreshScheduler.
 */

import { describe, it, expect } from 'vitest';
import { createLogger } from '../logging/logger.js';
import type { RefreshOutcome } from '../pipeline/LibraryPipeline.js';
import { FetchFailureError } from '../types/errors.js';
import {
  RefreshScheduler,
  resolveRefreshPolicy,
  type RefreshRunner,
  type SchedulerClock,
} from './RefreshScheduler.js';

const logger = createLogger('silent');

interface Timer {
  at: number;
  fn: () => void;
  every?: number;
  cancelled: boolean;
}

class FakeClock implements SchedulerClock {
  time = 0;
  private timers: Timer[] = [];

  now(): number {
    return this.time;
  }

  schedule(fn: () => void, ms: number): () => void {
    return this.add({ at: this.time + ms, fn, cancelled: false });
  }

  repeat(fn: () => void, ms: number): () => void {
    return this.add({ at: this.time + ms, fn, every: ms, cancelled: false });
  }

  advance(ms: number): void {
    const target = this.time + ms;
    for (;;) {
      const due = this.timers
        .filter((timer) => !timer.cancelled && timer.at <= target)
        .sort((a, b) => a.at - b.at)[0];
      if (!due) break;
      this.time = due.at;
      if (due.every !== undefined) due.at += due.every;
      else due.cancelled = true;
      due.fn();
    }
    this.time = target;
  }

  get pending(): number {
    return this.timers.filter((timer) => !timer.cancelled).length;
  }

  private add(timer: Timer): () => void {
    this.timers.push(timer);
    return () => {
      timer.cancelled = true;
    };
  }
}

function outcome(library: string): RefreshOutcome {
  return { library, records: 1, skipped: 0, unmapped: 0, notes: 0, triples: 3, graphs: [{ graph: 'http://ex/g', size: 3 }] };
}

function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

function flush(): Promise<void> {
  return new Promise((done) => setImmediate(done));
}

describe('resolveRefreshPolicy', () => {
  it('maps intervals to policies', () => {
    expect(resolveRefreshPolicy(-1)).toEqual({ policy: { mode: 'disabled' } });
    expect(resolveRefreshPolicy(0)).toEqual({ policy: { mode: 'startup' } });
    expect(resolveRefreshPolicy(30)).toEqual({ policy: { mode: 'periodic', intervalMs: 30000 } });
  });

  it('treats short intervals as startup-only with a warning', () => {
    expect(resolveRefreshPolicy(10)).toEqual({
      policy: { mode: 'startup' },
      warning: 'refresh_interval 10 is below 30 seconds; refreshing at startup only',
    });
  });
});

describe('RefreshScheduler', () => {
  it('runs a refresh through its stages', async () => {
    const clock = new FakeClock();
    const scheduler = new RefreshScheduler({ logger, clock });
    const seen: string[] = [];
    scheduler.register('a', async ({ onStage }) => {
      for (const stage of ['fetching', 'mapping', 'loading'] as const) {
        onStage(stage);
        seen.push(scheduler.statusOf('a')?.state ?? 'unknown');
      }
      clock.time += 250;
      return outcome('a');
    }, { mode: 'startup' });

    const result = await scheduler.trigger('a');
    expect(result).toEqual({ library: 'a', status: 'completed', outcome: outcome('a'), durationMs: 250 });
    expect(seen).toEqual(['fetching', 'mapping', 'loading']);
    expect(scheduler.statusOf('a')).toEqual({
      library: 'a',
      state: 'idle',
      inFlight: false,
      policy: { mode: 'startup' },
      runs: 1,
      errorStreak: 0,
      lastRunAt: '1970-01-01T00:00:00.000Z',
      lastSuccessAt: '1970-01-01T00:00:00.250Z',
      lastDurationMs: 250,
      lastOutcome: outcome('a'),
    });
  });

  it('skips a trigger while a run is in flight', async () => {
    const scheduler = new RefreshScheduler({ logger, clock: new FakeClock() });
    const gate = deferred<RefreshOutcome>();
    let calls = 0;
    scheduler.register('a', () => {
      calls++;
      return gate.promise;
    }, { mode: 'startup' });

    const first = scheduler.trigger('a');
    const second = await scheduler.trigger('a');
    expect(second).toEqual({ library: 'a', status: 'skipped', skippedBusy: true });
    expect(scheduler.statusOf('a')?.inFlight).toBe(true);

    gate.resolve(outcome('a'));
    expect((await first).status).toBe('completed');
    expect(calls).toBe(1);
  });

  it('records failures and resets the streak on success', async () => {
    const scheduler = new RefreshScheduler({ logger, clock: new FakeClock() });
    let fail = true;
    scheduler.register('a', async () => {
      if (fail) throw new FetchFailureError('upstream down', 'https://api.example.org/');
      return outcome('a');
    }, { mode: 'startup' });

    expect(await scheduler.trigger('a')).toEqual({
      library: 'a',
      status: 'failed',
      error: 'upstream down',
      code: 'FETCH_FAILURE',
      durationMs: 0,
    });
    await scheduler.trigger('a');
    expect(scheduler.statusOf('a')).toMatchObject({ state: 'failed', errorStreak: 2, lastError: 'upstream down' });

    fail = false;
    await scheduler.trigger('a');
    const status = scheduler.statusOf('a');
    expect(status).toMatchObject({ state: 'idle', errorStreak: 0, runs: 3 });
    expect(status?.lastError).toBeUndefined();
  });

  it('aborts runs that exceed the timeout', async () => {
    const clock = new FakeClock();
    const scheduler = new RefreshScheduler({ logger, clock, timeoutMs: 1000 });
    let signal: AbortSignal | undefined;
    scheduler.register('slow', (context) => {
      signal = context.signal;
      return new Promise<RefreshOutcome>(() => undefined);
    }, { mode: 'startup' });

    const pending = scheduler.trigger('slow');
    clock.advance(1000);
    expect(await pending).toEqual({
      library: 'slow',
      status: 'failed',
      error: "Refresh of 'slow' exceeded 1000 ms",
      code: 'REFRESH_TIMEOUT',
      durationMs: 1000,
    });
    expect(signal?.aborted).toBe(true);
  });

  it('stays busy until a timed-out runner settles', async () => {
    const clock = new FakeClock();
    const scheduler = new RefreshScheduler({ logger, clock, timeoutMs: 1000 });
    const gate = deferred<RefreshOutcome>();
    let calls = 0;
    scheduler.register('slow', () => {
      calls++;
      return gate.promise;
    }, { mode: 'startup' });

    const pending = scheduler.trigger('slow');
    clock.advance(1000);
    expect((await pending).status).toBe('failed');
    expect(scheduler.statusOf('slow')?.inFlight).toBe(true);
    expect(await scheduler.trigger('slow')).toEqual({ library: 'slow', status: 'skipped', skippedBusy: true });
    expect(calls).toBe(1);

    gate.resolve(outcome('slow'));
    await flush();
    expect(scheduler.statusOf('slow')?.inFlight).toBe(false);
    expect((await scheduler.trigger('slow')).status).toBe('completed');
    expect(calls).toBe(2);
  });

  it('passes the parse-notes option to the runner', async () => {
    const scheduler = new RefreshScheduler({ logger, clock: new FakeClock() });
    const options: Array<boolean | undefined> = [];
    scheduler.register('a', async (context) => {
      options.push(context.parseNotes);
      return outcome('a');
    }, { mode: 'startup' });

    await scheduler.trigger('a', { parseNotes: true });
    await scheduler.trigger('a');
    expect(options).toEqual([true, undefined]);
  });

  it('arms startup and periodic runs', async () => {
    const clock = new FakeClock();
    const scheduler = new RefreshScheduler({ logger, clock, startupDelayMs: 500 });
    const runner: RefreshRunner = async () => outcome('x');
    scheduler.register('periodic', runner, { mode: 'periodic', intervalMs: 60000 });
    scheduler.register('once', runner, { mode: 'startup' });
    scheduler.register('off', runner, { mode: 'disabled' });
    scheduler.start();

    const runs = (): number[] => scheduler.status().map((status) => status.runs);
    clock.advance(499);
    expect(runs()).toEqual([0, 0, 0]);
    clock.advance(1);
    await flush();
    expect(runs()).toEqual([1, 1, 0]);

    clock.advance(60000);
    await flush();
    expect(runs()).toEqual([2, 1, 0]);

    await scheduler.stop();
    expect(clock.pending).toBe(0);
  });

  it('cancels in-flight runs on stop', async () => {
    const scheduler = new RefreshScheduler({ logger, clock: new FakeClock() });
    scheduler.register('a', () => new Promise<RefreshOutcome>(() => undefined), { mode: 'startup' });

    const pending = scheduler.trigger('a');
    await scheduler.stop();
    expect(await pending).toMatchObject({ status: 'failed', code: 'REFRESH_ABORTED', error: "Refresh of 'a' cancelled" });
  });

  it('triggers every library and rejects unknown ones', async () => {
    const scheduler = new RefreshScheduler({ logger, clock: new FakeClock() });
    scheduler.register('a', async () => outcome('a'), { mode: 'startup' });
    scheduler.register('b', async () => outcome('b'), { mode: 'startup' });

    const results = await scheduler.triggerAll();
    expect(results.map((result) => [result.library, result.status])).toEqual([['a', 'completed'], ['b', 'completed']]);
    expect(scheduler.libraries()).toEqual(['a', 'b']);
    expect(() => scheduler.trigger('missing')).toThrow("Unknown library 'missing'");
    expect(() => scheduler.register('a', async () => outcome('a'), { mode: 'startup' })).toThrow(
      "Library 'a' is already registered",
    );
  });
});

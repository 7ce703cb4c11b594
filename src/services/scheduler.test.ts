import { beforeEach, describe, expect, it, vi } from 'vitest';
import { Repositories, Store } from '../db/store';
import { at, FakeClock } from '../test-utils/clock';
import { MemoryStore } from '../test-utils/memory-store';
import { IsoDate } from '../types/opportunity';
import { ScheduledJob, Scheduler } from './scheduler';

const EIGHT_AM = { hours: 8, minutes: 0 };

function recordingJob(name: string, calls: string[]): ScheduledJob {
  return {
    name,
    run: async (date: IsoDate) => {
      calls.push(`${name}@${date}`);
      return name;
    },
  };
}

class UnavailableStore implements Store {
  async withTransaction<T>(_work: (repos: Repositories) => Promise<T>): Promise<T> {
    throw new Error('connection refused');
  }
}

describe('Scheduler', () => {
  let clock: FakeClock;
  let store: MemoryStore;
  let calls: string[];
  let jobs: ScheduledJob[];

  beforeEach(() => {
    clock = new FakeClock(at(2026, 3, 10, 8, 0));
    store = new MemoryStore(clock);
    calls = [];
    jobs = [recordingJob('stale-check', calls), recordingJob('digest', calls), recordingJob('feed-poll', calls)];
  });

  function scheduler(): Scheduler {
    return new Scheduler(store, jobs, { runTime: EIGHT_AM, tickIntervalMs: 60_000 }, clock);
  }

  it('waits for the configured time of day', async () => {
    clock.set(at(2026, 3, 10, 7, 59));

    expect(await scheduler().tick()).toEqual({ ran: false, reason: 'before-run-time' });
    expect(calls).toEqual([]);
    expect(store.snapshot.lastRunDate).toBeNull();
  });

  it('runs every job in order once the time has come', async () => {
    const outcome = await scheduler().tick();

    expect(outcome).toMatchObject({
      ran: true,
      date: '2026-03-10',
      results: [
        { job: 'stale-check', status: 'succeeded', output: 'stale-check' },
        { job: 'digest', status: 'succeeded', output: 'digest' },
        { job: 'feed-poll', status: 'succeeded', output: 'feed-poll' },
      ],
    });
    expect(calls).toEqual(['stale-check@2026-03-10', 'digest@2026-03-10', 'feed-poll@2026-03-10']);
    expect(store.snapshot.lastRunDate).toBe('2026-03-10');
  });

  it('runs at most once per day', async () => {
    const instance = scheduler();

    await instance.tick();
    clock.set(at(2026, 3, 10, 23, 59));
    const second = await instance.tick();

    expect(second).toEqual({ ran: false, reason: 'already-ran' });
    expect(calls).toHaveLength(3);
  });

  it('does not run again after a restart on the same day', async () => {
    await scheduler().tick();

    const restarted = await scheduler().tick();

    expect(restarted).toEqual({ ran: false, reason: 'already-ran' });
    expect(calls).toHaveLength(3);
  });

  it('runs again the next day', async () => {
    const instance = scheduler();
    await instance.tick();

    clock.set(at(2026, 3, 11, 8, 5));
    const outcome = await instance.tick();

    expect(outcome).toMatchObject({ ran: true, date: '2026-03-11' });
    expect(calls.slice(3)).toEqual(['stale-check@2026-03-11', 'digest@2026-03-11', 'feed-poll@2026-03-11']);
  });

  it('lets only one of two schedulers sharing a store run', async () => {
    const outcomes = await Promise.all([scheduler().tick(), scheduler().tick()]);

    expect(outcomes.filter(outcome => outcome.ran)).toHaveLength(1);
    expect(outcomes.filter(outcome => !outcome.ran)).toEqual([{ ran: false, reason: 'already-ran' }]);
    expect(calls).toHaveLength(3);
  });

  it('refuses to start a second run while one is in progress', async () => {
    const instance = scheduler();

    const first = instance.tick();
    expect(instance.state).toBe('running');
    const second = await instance.tick();
    await first;

    expect(second).toEqual({ ran: false, reason: 'running' });
    expect(instance.state).toBe('idle');
  });

  it('keeps running the remaining jobs when one fails', async () => {
    jobs.splice(1, 1, {
      name: 'digest',
      run: async () => {
        throw new Error('Digest summarize timed out after 60000ms');
      },
    });

    const outcome = await scheduler().tick();

    expect(outcome).toMatchObject({
      ran: true,
      results: [
        { job: 'stale-check', status: 'succeeded' },
        { job: 'digest', status: 'failed', error: 'Digest summarize timed out after 60000ms' },
        { job: 'feed-poll', status: 'succeeded' },
      ],
    });
    expect(calls).toEqual(['stale-check@2026-03-10', 'feed-poll@2026-03-10']);
  });

  it('does not retry failed jobs later the same day', async () => {
    const failing = vi.fn(async () => {
      throw new Error('boom');
    });
    const instance = new Scheduler(store, [{ name: 'digest', run: failing }], {
      runTime: EIGHT_AM,
      tickIntervalMs: 60_000,
    }, clock);

    await instance.tick();
    clock.set(at(2026, 3, 10, 12, 0));
    await instance.tick();

    expect(failing).toHaveBeenCalledTimes(1);
  });

  it('reports when its state cannot be read', async () => {
    const instance = new Scheduler(new UnavailableStore(), jobs, {
      runTime: EIGHT_AM,
      tickIntervalMs: 60_000,
    }, clock);

    expect(await instance.tick()).toEqual({ ran: false, reason: 'state-unavailable' });
    expect(calls).toEqual([]);
    expect(instance.state).toBe('idle');
  });

  it('uses the new time after a reschedule', async () => {
    clock.set(at(2026, 3, 10, 7, 30));
    const instance = scheduler();

    instance.reschedule({ hours: 7, minutes: 15 });

    expect(await instance.tick()).toMatchObject({ ran: true, date: '2026-03-10' });
  });

  it('ticks on start and finishes the tick before stop resolves', async () => {
    const instance = scheduler();

    instance.start();
    await instance.stop();

    expect(calls).toEqual(['stale-check@2026-03-10', 'digest@2026-03-10', 'feed-poll@2026-03-10']);
    expect(instance.state).toBe('idle');
  });

  it('ticks again on every interval', async () => {
    vi.useFakeTimers({ toFake: ['setInterval', 'clearInterval'] });
    try {
      clock.set(at(2026, 3, 10, 7, 59));
      const instance = scheduler();
      instance.start();
      await vi.advanceTimersByTimeAsync(0);
      expect(calls).toEqual([]);

      clock.set(at(2026, 3, 10, 8, 0));
      await vi.advanceTimersByTimeAsync(60_000);
      await instance.stop();

      expect(calls).toHaveLength(3);
    } finally {
      vi.useRealTimers();
    }
  });
});

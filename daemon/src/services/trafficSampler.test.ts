import { describe, it, expect, vi } from 'vitest';
import { TrafficSampler, computeRate } from './trafficSampler';
import type { TrafficResponse } from '../clients/schemas';

function deferred<T>() {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

function clock(start = 0) {
  let time = start;
  return {
    now: () => time,
    advance: (ms: number) => {
      time += ms;
    },
  };
}

describe('computeRate', () => {
  it('reports zero for the first reading', () => {
    expect(computeRate(null, { up: 500, down: 900, at: 1000 })).toEqual({ upload: 0, download: 0 });
  });

  it('divides the counter growth by the elapsed seconds', () => {
    const rate = computeRate({ up: 0, down: 0, at: 0 }, { up: 1000, down: 2000, at: 1000 });
    expect(rate).toEqual({ upload: 1000, download: 2000 });
  });

  it('treats a decrease as a counter reset', () => {
    const rate = computeRate({ up: 5000, down: 8000, at: 1000 }, { up: 50, down: 100, at: 2000 });
    expect(rate).toEqual({ upload: 0, download: 0 });
  });

  it('handles each direction on its own', () => {
    const rate = computeRate({ up: 5000, down: 1000, at: 0 }, { up: 10, down: 3000, at: 2000 });
    expect(rate).toEqual({ upload: 0, download: 1000 });
  });
});

describe('TrafficSampler', () => {
  it('derives rates from consecutive readings and rebases after a reset', async () => {
    const readings: TrafficResponse[] = [
      { up: 0, down: 0 },
      { up: 1000, down: 2000 },
      { up: 50, down: 100 },
      { up: 1050, down: 1100 },
    ];
    const getTraffic = vi.fn(async () => readings.shift() ?? { up: 0, down: 0 });
    const time = clock();
    const sampler = new TrafficSampler({ getTraffic }, { intervalMs: 1000, now: time.now });

    await sampler.tick();
    expect(sampler.snapshot()).toMatchObject({ uploadRate: 0, downloadRate: 0 });

    time.advance(1000);
    await sampler.tick();
    expect(sampler.snapshot()).toMatchObject({ uploadRate: 1000, downloadRate: 2000, totalUpload: 1000, totalDownload: 2000 });

    time.advance(1000);
    await sampler.tick();
    expect(sampler.snapshot()).toMatchObject({ uploadRate: 0, downloadRate: 0, totalUpload: 50, totalDownload: 100 });

    time.advance(1000);
    await sampler.tick();
    expect(sampler.snapshot()).toMatchObject({ uploadRate: 1000, downloadRate: 1000 });
    expect(sampler.snapshot().history).toEqual([
      { time: 0, upload: 0, download: 0 },
      { time: 1000, upload: 1000, download: 2000 },
      { time: 2000, upload: 0, download: 0 },
      { time: 3000, upload: 1000, download: 1000 },
    ]);
  });

  it('skips a tick while the previous reading is outstanding', async () => {
    const pending = deferred<TrafficResponse>();
    const getTraffic = vi.fn(() => pending.promise);
    const sampler = new TrafficSampler({ getTraffic }, { intervalMs: 1000 });

    const first = sampler.tick();
    await expect(sampler.tick()).resolves.toBe(false);
    expect(getTraffic).toHaveBeenCalledTimes(1);

    pending.resolve({ up: 10, down: 20 });
    await expect(first).resolves.toBe(true);
  });

  it('swallows read failures and keeps the last rate', async () => {
    const getTraffic = vi.fn(async (): Promise<TrafficResponse> => ({ up: 0, down: 0 }));
    const time = clock();
    const sampler = new TrafficSampler({ getTraffic }, { intervalMs: 1000, now: time.now });
    await sampler.tick();

    getTraffic.mockRejectedValueOnce(new Error('connection refused'));
    time.advance(1000);
    await expect(sampler.tick()).resolves.toBe(false);

    expect(sampler.snapshot().history).toHaveLength(1);
  });

  it('discards a reading that arrives after stop', async () => {
    const pending = deferred<TrafficResponse>();
    const sampler = new TrafficSampler({ getTraffic: () => pending.promise }, { intervalMs: 1000 });

    const tick = sampler.tick();
    sampler.stop();
    pending.resolve({ up: 4096, down: 8192 });

    await expect(tick).resolves.toBe(false);
    expect(sampler.snapshot()).toEqual({ uploadRate: 0, downloadRate: 0, totalUpload: 0, totalDownload: 0, history: [] });
  });

  it('keeps only the most recent history points', async () => {
    let counter = 0;
    const time = clock();
    const sampler = new TrafficSampler(
      { getTraffic: async () => ({ up: (counter += 100), down: 0 }) },
      { intervalMs: 1000, historySize: 3, now: time.now },
    );

    for (let i = 0; i < 5; i++) {
      await sampler.tick();
      time.advance(1000);
    }

    expect(sampler.snapshot().history.map((point) => point.time)).toEqual([2000, 3000, 4000]);
  });

  it('notifies listeners on every sample', async () => {
    const sampler = new TrafficSampler({ getTraffic: async () => ({ up: 1, down: 2 }) }, { intervalMs: 1000 });
    const listener = vi.fn();
    const unsubscribe = sampler.onSample(listener);

    await sampler.tick();
    unsubscribe();
    await sampler.tick();

    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener.mock.calls[0][0]).toMatchObject({ totalUpload: 1, totalDownload: 2 });
  });

  it('samples on its interval until stopped', async () => {
    vi.useFakeTimers();
    try {
      const getTraffic = vi.fn(async () => ({ up: 0, down: 0 }));
      const sampler = new TrafficSampler({ getTraffic }, { intervalMs: 1000 });

      sampler.start();
      expect(sampler.isActive()).toBe(true);
      await vi.advanceTimersByTimeAsync(3000);
      expect(getTraffic).toHaveBeenCalledTimes(3);

      sampler.stop();
      await vi.advanceTimersByTimeAsync(3000);
      expect(getTraffic).toHaveBeenCalledTimes(3);
      expect(sampler.isActive()).toBe(false);
    } finally {
      vi.useRealTimers();
    }
  });
});

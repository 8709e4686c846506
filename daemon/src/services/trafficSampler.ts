import { EventEmitter } from 'events';
import { logger } from '../logger';
import { errorMessage } from '../errors';
import type { ControlApi } from '../clients/controlApiClient';
import type { TrafficHistoryPoint, TrafficRate, TrafficSample, TrafficSnapshot } from '../types';

const MAX_TRAFFIC_HISTORY = 40;

export interface TrafficSamplerOptions {
  intervalMs: number;
  historySize?: number;
  now?: () => number;
}

/**
 * Bytes per second between two cumulative readings. A counter that went
 * down means the core restarted: that dimension reports 0 and the new
 * reading becomes the baseline.
 */
export function computeRate(previous: TrafficSample | null, current: TrafficSample): TrafficRate {
  if (!previous) return { upload: 0, download: 0 };

  const elapsedSec = (current.at - previous.at) / 1000;
  if (elapsedSec <= 0) return { upload: 0, download: 0 };

  return {
    upload: current.up >= previous.up ? (current.up - previous.up) / elapsedSec : 0,
    download: current.down >= previous.down ? (current.down - previous.down) / elapsedSec : 0,
  };
}

export class TrafficSampler {
  private timer: NodeJS.Timeout | null = null;
  private inFlight = false;
  private generation = 0;
  private previous: TrafficSample | null = null;
  private rate: TrafficRate = { upload: 0, download: 0 };
  private history: TrafficHistoryPoint[] = [];
  private events = new EventEmitter();
  private now: () => number;
  private historySize: number;

  constructor(private client: Pick<ControlApi, 'getTraffic'>, private options: TrafficSamplerOptions) {
    this.now = options.now || Date.now;
    this.historySize = options.historySize || MAX_TRAFFIC_HISTORY;
  }

  isActive(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.timer) return;
    this.reset();
    this.timer = setInterval(() => {
      void this.tick();
    }, this.options.intervalMs);
    this.timer.unref();
    logger.debug({ module: 'services.trafficSampler', interval_ms: this.options.intervalMs }, 'Traffic sampling started');
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      logger.debug({ module: 'services.trafficSampler' }, 'Traffic sampling stopped');
    }
    this.reset();
  }

  /**
   * One sampling round. Returns false when skipped because the previous
   * round is still outstanding or when the reading failed.
   */
  async tick(): Promise<boolean> {
    if (this.inFlight) {
      logger.trace({ module: 'services.trafficSampler' }, 'Traffic tick skipped');
      return false;
    }

    this.inFlight = true;
    const generation = this.generation;
    try {
      const traffic = await this.client.getTraffic();
      // a stop() while the request was outstanding discards its result
      if (generation !== this.generation) return false;

      const sample: TrafficSample = { up: traffic.up, down: traffic.down, at: this.now() };
      this.rate = computeRate(this.previous, sample);
      this.previous = sample;
      this.history.push({ time: sample.at, upload: this.rate.upload, download: this.rate.download });
      if (this.history.length > this.historySize) {
        this.history.shift();
      }
      this.events.emit('sample', this.snapshot());
      return true;
    } catch (err) {
      logger.debug({ module: 'services.trafficSampler', error_detail: errorMessage(err) }, 'Traffic fetch fail');
      return false;
    } finally {
      this.inFlight = false;
    }
  }

  snapshot(): TrafficSnapshot {
    return {
      uploadRate: this.rate.upload,
      downloadRate: this.rate.download,
      totalUpload: this.previous?.up ?? 0,
      totalDownload: this.previous?.down ?? 0,
      history: this.history.map((point) => ({ ...point })),
    };
  }

  onSample(listener: (snapshot: TrafficSnapshot) => void): () => void {
    this.events.on('sample', listener);
    return () => this.events.off('sample', listener);
  }

  private reset(): void {
    this.generation++;
    this.previous = null;
    this.rate = { upload: 0, download: 0 };
    this.history = [];
  }
}

/**
 * Per-host request pacing with random jitter.
 * Sleep and randomness are injectable so tests never wait on the wall clock.
 */
import { setTimeout as delay } from 'node:timers/promises';
import type { CrawlerConfig } from '../config/config.js';
import { fetchPage } from './http-client.js';
import type { PageFetcher } from './types.js';
import { logger } from '../logger.js';

export const MIN_JITTER_MS = 1000;
export const MAX_JITTER_MS = 3000;

export type Sleep = (ms: number) => Promise<void>;

/** Returns a float in [0, 1), like Math.random. */
export type RandomSource = () => number;

export interface PacerOptions {
  sleep?: Sleep;
  random?: RandomSource;
  minDelayMs?: number;
  maxDelayMs?: number;
}

const realSleep: Sleep = async (ms) => {
  await delay(ms);
};

export class RequestPacer {
  private readonly sleep: Sleep;
  private readonly random: RandomSource;
  private readonly minDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly contactedHosts = new Set<string>();

  constructor(options: PacerOptions = {}) {
    this.sleep = options.sleep ?? realSleep;
    this.random = options.random ?? Math.random;
    this.minDelayMs = options.minDelayMs ?? MIN_JITTER_MS;
    this.maxDelayMs = Math.max(this.minDelayMs, options.maxDelayMs ?? MAX_JITTER_MS);
  }

  /** Uniform integer delay in [minDelayMs, maxDelayMs]. */
  nextDelayMs(): number {
    const span = this.maxDelayMs - this.minDelayMs + 1;
    return this.minDelayMs + Math.min(span - 1, Math.floor(this.random() * span));
  }

  /**
   * Wait before a request to `url`. The first request to a host goes out
   * immediately; every later one waits a jittered delay.
   */
  async pace(url: string): Promise<number> {
    const host = hostOf(url);
    if (!this.contactedHosts.has(host)) {
      this.contactedHosts.add(host);
      return 0;
    }

    const waitMs = this.nextDelayMs();
    logger.debug({ host, waitMs }, 'Pacing request');
    await this.sleep(waitMs);
    return waitMs;
  }
}

function hostOf(url: string): string {
  try {
    return new URL(url).host.toLowerCase();
  } catch {
    return url;
  }
}

/**
 * Build the fetcher used for a run: pace per host, then GET.
 */
export function createFetcher(
  config: CrawlerConfig,
  pacer: RequestPacer = new RequestPacer()
): PageFetcher {
  return async (url) => {
    await pacer.pace(url);
    return fetchPage(url, config);
  };
}

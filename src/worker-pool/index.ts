/**
 * Worker Pool Module
 *
 * Runs crawl jobs concurrently on a fixed number of worker slots. Each slot
 * owns one browser session (from the SessionPool) and one fetcher bound to
 * it; sessions are never shared across slots.
 *
 * - Jobs queue FIFO and start as soon as a slot frees up
 * - URLs within a job run sequentially (see crawler)
 * - shutdown() rejects queued jobs, waits for running ones, then tears
 *   down every session; calling it again is a no-op
 *
 * Usage:
 * ```typescript
 * const pool = createWorkerPool(resolveConfig());
 * const output = await pool.run({ urls: ['https://www.g2.com/products/acme/reviews'] });
 * await pool.shutdown();
 * ```
 */

import type { LeadDiscoveryConfig } from '../config/index.js';
import { crawl, type CrawlOptions } from '../crawler/index.js';
import { createFetcher, type PageFetcher } from '../fetcher/index.js';
import { defaultLogger, defaultMetrics } from '../logger/index.js';
import {
  SessionPool,
  playwrightSessionFactory,
  type SessionFactory,
  type SessionSlot,
} from '../session-pool/index.js';
import type { CrawlOutput, Logger, Metrics, Sleep } from '../types/index.js';

// ============================================================================
// Type Definitions
// ============================================================================

export interface CrawlJob {
  urls: readonly string[];
  maxPages?: number;
  forceScripted?: boolean;
  signal?: AbortSignal;
}

export interface WorkerPoolOptions {
  /** Number of slots (default: 2) */
  workers?: number;
  /** Creates each slot's browser session on first scripted fetch */
  sessionFactory: SessionFactory;
  /** Builds the fetcher a slot uses, bound to that slot's session */
  createFetcher: (slot: SessionSlot) => PageFetcher;
  /** Default pages per URL when a job does not set one */
  maxPages?: number;
  pageDelayMs?: number;
  parse?: CrawlOptions['parse'];
  sleep?: Sleep;
  logger?: Logger;
  metrics?: Metrics;
}

interface QueuedJob {
  job: CrawlJob;
  resolve: (output: CrawlOutput) => void;
  reject: (error: unknown) => void;
}

export class WorkerPoolClosedError extends Error {
  constructor() {
    super('Worker pool has been shut down');
    this.name = 'WorkerPoolClosedError';
  }
}

// ============================================================================
// Worker Pool
// ============================================================================

export class CrawlWorkerPool {
  private readonly sessions: SessionPool;
  private readonly fetchers: PageFetcher[];
  private readonly freeSlots: number[];
  private readonly queue: QueuedJob[] = [];
  private readonly running = new Set<Promise<void>>();
  private shutdownPromise: Promise<void> | null = null;
  private readonly logger: Logger;
  private readonly metrics: Metrics;

  constructor(private readonly options: WorkerPoolOptions) {
    const workers = options.workers ?? 2;
    this.logger = options.logger ?? defaultLogger;
    this.metrics = options.metrics ?? defaultMetrics;
    this.sessions = new SessionPool(workers, options.sessionFactory, this.logger);
    this.fetchers = Array.from({ length: workers }, (_, id) =>
      options.createFetcher(this.sessions.slot(id))
    );
    this.freeSlots = Array.from({ length: workers }, (_, id) => id);
  }

  get size(): number {
    return this.sessions.size;
  }

  /** Jobs waiting for a slot */
  get queued(): number {
    return this.queue.length;
  }

  /** Jobs currently running */
  get active(): number {
    return this.running.size;
  }

  /** Slots whose browser session has been created */
  get activeSessions(): number {
    return this.sessions.activeCount();
  }

  get isShutdown(): boolean {
    return this.shutdownPromise !== null;
  }

  /**
   * Queue a crawl job; resolves with its output once a slot has run it
   *
   * @throws WorkerPoolClosedError after shutdown()
   */
  run(job: CrawlJob): Promise<CrawlOutput> {
    if (this.shutdownPromise !== null) {
      return Promise.reject(new WorkerPoolClosedError());
    }

    return new Promise<CrawlOutput>((resolve, reject) => {
      this.queue.push({ job, resolve, reject });
      this.metrics.gauge('worker_pool.queued', this.queue.length);
      this.dispatch();
    });
  }

  private dispatch(): void {
    while (this.freeSlots.length > 0 && this.queue.length > 0) {
      const slotId = this.freeSlots.shift();
      const task = this.queue.shift();
      if (slotId === undefined || task === undefined) return;

      const execution: Promise<void> = this.execute(slotId, task.job)
        .then(task.resolve, task.reject)
        .finally(() => {
          this.running.delete(execution);
          this.freeSlots.push(slotId);
          this.dispatch();
        });
      this.running.add(execution);
    }
  }

  private execute(slotId: number, job: CrawlJob): Promise<CrawlOutput> {
    const fetcher = this.fetchers[slotId];
    if (fetcher === undefined) {
      return Promise.reject(new RangeError(`No fetcher for slot ${slotId}`));
    }

    this.logger.debug('Worker starting job', { slot: slotId, urls: job.urls.length });

    const crawlOptions: CrawlOptions = {
      fetcher,
      logger: this.logger,
      metrics: this.metrics,
    };
    const maxPages = job.maxPages ?? this.options.maxPages;
    if (maxPages !== undefined) crawlOptions.maxPages = maxPages;
    if (this.options.pageDelayMs !== undefined) crawlOptions.pageDelayMs = this.options.pageDelayMs;
    if (this.options.parse) crawlOptions.parse = this.options.parse;
    if (this.options.sleep) crawlOptions.sleep = this.options.sleep;
    if (job.signal) crawlOptions.signal = job.signal;
    if (job.forceScripted) crawlOptions.forceScripted = true;

    return crawl(job.urls, crawlOptions);
  }

  /**
   * Stop accepting jobs, reject queued ones, let running ones finish,
   * then close every browser session
   */
  shutdown(): Promise<void> {
    if (this.shutdownPromise === null) {
      this.shutdownPromise = this.drainAndClose();
    }
    return this.shutdownPromise;
  }

  private async drainAndClose(): Promise<void> {
    const abandoned = this.queue.splice(0, this.queue.length);
    for (const task of abandoned) {
      task.reject(new WorkerPoolClosedError());
    }

    this.logger.info('Shutting down worker pool', {
      running: this.running.size,
      abandoned: abandoned.length,
    });

    await Promise.all([...this.running]);
    await this.sessions.closeAll();
  }
}

/**
 * Build a pool from resolved configuration, with Playwright sessions and
 * the standard fetch orchestrator per slot
 */
export function createWorkerPool(
  config: LeadDiscoveryConfig,
  deps: { logger?: Logger; metrics?: Metrics; sessionFactory?: SessionFactory } = {}
): CrawlWorkerPool {
  const logger = deps.logger ?? defaultLogger;
  const metrics = deps.metrics ?? defaultMetrics;
  const launchOptions = {
    headless: config.headless,
    navigationTimeoutMs: config.navigationTimeoutMs,
    ...(config.browserExecutablePath ? { executablePath: config.browserExecutablePath } : {}),
  };

  return new CrawlWorkerPool({
    workers: config.workers,
    maxPages: config.maxPages,
    pageDelayMs: config.pageDelayMs,
    sessionFactory: deps.sessionFactory ?? playwrightSessionFactory(launchOptions),
    createFetcher: (slot) => createFetcher(config, { session: slot, logger, metrics }),
    logger,
    metrics,
  });
}

/**
 * Unit tests for the Crawler Module
 */

import { describe, test, expect } from '@jest/globals';
import { ConfigurationError } from '../../src/config/index.js';
import { crawl, denylistMessage, type CrawlOptions } from '../../src/crawler/index.js';
import type { FetchOptions, PageFetcher } from '../../src/fetcher/index.js';
import type { FetchFailureKind, FetchResult, ReviewRecord } from '../../src/types/index.js';
import {
  createMockLogger,
  createMockMetrics,
  createNoSleep,
  makeRecord,
} from '../helpers/mocks.js';

const G2_URL = 'https://www.g2.com/products/widget/reviews';
const GENERIC_URL = 'https://reviews.example.com/widget';
const CAPTERRA_URL = 'https://www.capterra.com/p/123/Widget/reviews/';

function ok(url: string, html: string): FetchResult {
  return { success: true, html, via: 'http', url };
}

function fail(url: string, kind: FetchFailureKind, message: string): FetchResult {
  return { success: false, error: { kind, url, message } };
}

class FakeFetcher implements PageFetcher {
  readonly calls: Array<{ url: string; options: FetchOptions | undefined }> = [];

  constructor(
    private readonly pages: Record<string, FetchResult>,
    private readonly onFetch?: (url: string) => void
  ) {}

  async fetch(url: string, options?: FetchOptions): Promise<FetchResult> {
    this.calls.push({ url, options });
    this.onFetch?.(url);
    return this.pages[url] ?? fail(url, 'http', `HTTP 404 from ${url}`);
  }

  get urls(): string[] {
    return this.calls.map((call) => call.url);
  }
}

/** One record per "review" marker in the html */
function countingParser(html: string, sourceUrl: string): ReviewRecord[] {
  return html
    .split(' ')
    .filter((token) => token === 'review')
    .map(() => makeRecord({ sourceUrl }));
}

function options(fetcher: PageFetcher, overrides: Partial<CrawlOptions> = {}): CrawlOptions {
  return {
    fetcher,
    parse: countingParser,
    sleep: createNoSleep(),
    logger: createMockLogger(),
    metrics: createMockMetrics(),
    ...overrides,
  };
}

describe('Crawler Module', () => {
  describe('denylistMessage()', () => {
    test('should name the host and recommend the supported sites', () => {
      expect(denylistMessage(CAPTERRA_URL)).toBe(
        'www.capterra.com prohibits automated scraping in its terms of service. ' +
          'Use G2, GetApp, TrustRadius or Software Advice instead.'
      );
    });
  });

  describe('crawl()', () => {
    test('should reject denylisted hosts without fetching', async () => {
      const fetcher = new FakeFetcher({});

      const output = await crawl([CAPTERRA_URL], options(fetcher));

      expect(fetcher.calls).toHaveLength(0);
      expect(output.records).toEqual([]);
      expect(output.errors).toEqual([
        { url: CAPTERRA_URL, kind: 'denied', message: denylistMessage(CAPTERRA_URL) },
      ]);
    });

    test('should skip login-gated hosts silently', async () => {
      const fetcher = new FakeFetcher({});
      const logger = createMockLogger();

      const output = await crawl(
        ['https://www.linkedin.com/company/widget'],
        options(fetcher, { logger })
      );

      expect(fetcher.calls).toHaveLength(0);
      expect(output.records).toEqual([]);
      expect(output.errors).toEqual([]);
      expect(logger.info).toHaveBeenCalledWith('Skipping login-gated host', {
        url: 'https://www.linkedin.com/company/widget',
        host: 'www.linkedin.com',
      });
    });

    test('should stop paginating at the first empty page', async () => {
      const fetcher = new FakeFetcher({
        [G2_URL]: ok(G2_URL, 'review review'),
        [`${G2_URL}?page=2`]: ok(`${G2_URL}?page=2`, 'nothing here'),
        [`${G2_URL}?page=3`]: ok(`${G2_URL}?page=3`, 'review'),
      });

      const output = await crawl([G2_URL], options(fetcher, { maxPages: 3 }));

      expect(fetcher.urls).toEqual([G2_URL, `${G2_URL}?page=2`]);
      expect(output.records).toHaveLength(2);
      expect(output.meta.pagesFetched).toBe(2);
      expect(output.errors).toEqual([]);
    });

    test('should fetch every page up to maxPages', async () => {
      const fetcher = new FakeFetcher({
        [G2_URL]: ok(G2_URL, 'review'),
        [`${G2_URL}?page=2`]: ok(`${G2_URL}?page=2`, 'review'),
        [`${G2_URL}?page=3`]: ok(`${G2_URL}?page=3`, 'review'),
      });
      const sleep = createNoSleep();

      const output = await crawl([G2_URL], options(fetcher, { maxPages: 3, pageDelayMs: 250, sleep }));

      expect(output.records.map((record) => record.sourceUrl)).toEqual([
        G2_URL,
        `${G2_URL}?page=2`,
        `${G2_URL}?page=3`,
      ]);
      expect(sleep.mock.calls).toEqual([[250], [250], [250]]);
    });

    test('should not paginate hosts without page parameters', async () => {
      const fetcher = new FakeFetcher({ [GENERIC_URL]: ok(GENERIC_URL, 'review') });

      await crawl([GENERIC_URL], options(fetcher, { maxPages: 3 }));

      expect(fetcher.urls).toEqual([GENERIC_URL]);
    });

    test('should record a first-page failure and continue with the next URL', async () => {
      const fetcher = new FakeFetcher({
        [G2_URL]: fail(G2_URL, 'blocked', 'www.g2.com returned 403 Forbidden'),
        [GENERIC_URL]: ok(GENERIC_URL, 'review'),
      });

      const output = await crawl([G2_URL, GENERIC_URL], options(fetcher));

      expect(output.errors).toEqual([
        { url: G2_URL, kind: 'blocked', message: 'www.g2.com returned 403 Forbidden' },
      ]);
      expect(output.records).toHaveLength(1);
      expect(output.meta).toMatchObject({ urlsRequested: 2, pagesFetched: 1 });
    });

    test('should end a URL quietly when a later page fails', async () => {
      const fetcher = new FakeFetcher({
        [G2_URL]: ok(G2_URL, 'review'),
        [`${G2_URL}?page=2`]: fail(`${G2_URL}?page=2`, 'timeout', 'Timed out'),
      });

      const output = await crawl([G2_URL], options(fetcher, { maxPages: 3 }));

      expect(fetcher.urls).toEqual([G2_URL, `${G2_URL}?page=2`]);
      expect(output.records).toHaveLength(1);
      expect(output.errors).toEqual([]);
    });

    test('should record a parse failure on the first page', async () => {
      const fetcher = new FakeFetcher({ [GENERIC_URL]: ok(GENERIC_URL, 'review') });
      const parse = () => {
        throw new Error('unexpected markup');
      };

      const output = await crawl([GENERIC_URL], options(fetcher, { parse }));

      expect(output.errors).toEqual([
        {
          url: GENERIC_URL,
          kind: 'parse',
          message: `Failed to parse ${GENERIC_URL}: unexpected markup`,
        },
      ]);
    });

    test('should pass forceScripted to the fetcher', async () => {
      const fetcher = new FakeFetcher({ [GENERIC_URL]: ok(GENERIC_URL, 'review') });

      await crawl([GENERIC_URL], options(fetcher, { forceScripted: true }));

      expect(fetcher.calls[0]?.options).toEqual({ forceScripted: true });
    });

    test('should not start when already cancelled', async () => {
      const fetcher = new FakeFetcher({ [GENERIC_URL]: ok(GENERIC_URL, 'review') });
      const controller = new AbortController();
      controller.abort();

      const output = await crawl(
        [GENERIC_URL, G2_URL],
        options(fetcher, { signal: controller.signal })
      );

      expect(fetcher.calls).toHaveLength(0);
      expect(output.errors).toEqual([
        { url: GENERIC_URL, kind: 'cancelled', message: 'Crawl cancelled before this URL started' },
      ]);
    });

    test('should stop between pages once cancelled', async () => {
      const controller = new AbortController();
      const fetcher = new FakeFetcher(
        {
          [G2_URL]: ok(G2_URL, 'review'),
          [`${G2_URL}?page=2`]: ok(`${G2_URL}?page=2`, 'review'),
        },
        () => controller.abort()
      );

      const output = await crawl(
        [G2_URL, GENERIC_URL],
        options(fetcher, { maxPages: 2, signal: controller.signal })
      );

      expect(fetcher.urls).toEqual([G2_URL]);
      expect(output.records).toHaveLength(1);
      expect(output.errors).toEqual([
        { url: G2_URL, kind: 'cancelled', message: `Crawl cancelled before ${G2_URL}?page=2` },
      ]);
    });

    test.each([0, -1, 1.5])('should reject maxPages %p', async (maxPages) => {
      const fetcher = new FakeFetcher({});

      await expect(crawl([GENERIC_URL], options(fetcher, { maxPages }))).rejects.toThrow(
        ConfigurationError
      );
    });

    test('should report metrics for fetched pages and records', async () => {
      const fetcher = new FakeFetcher({ [GENERIC_URL]: ok(GENERIC_URL, 'review review review') });
      const metrics = createMockMetrics();

      await crawl([GENERIC_URL], options(fetcher, { metrics }));

      expect(metrics.increment).toHaveBeenCalledWith('crawler.page.fetched', { via: 'http' });
      expect(metrics.gauge).toHaveBeenCalledWith('crawler.records', 3);
    });

    test('should run the real parser by default', async () => {
      const html =
        '<div class="review-card"><span class="rating">2.0 stars</span>' +
        '<p>Support response time was terrible and the UI is too complex to learn</p></div>';
      const fetcher = new FakeFetcher({ [GENERIC_URL]: ok(GENERIC_URL, html) });
      const output = await crawl([GENERIC_URL], options(fetcher, { parse: undefined }));

      expect(output.records).toHaveLength(1);
      expect(output.records[0]?.leadScore).toBe(62);
      expect(output.records[0]?.painTags).toEqual(['complexity', 'support']);
    });
  });
});

/**
 * Session Pool Module - Scripted Browser Sessions
 *
 * Each crawl worker owns exactly one browser session. The pool hands out
 * one SessionSlot per worker; a slot creates its session lazily on first
 * use and never shares it with another slot.
 *
 * Features:
 * - BrowserSession / BrowserPage seams so fetch logic is testable with fakes
 * - Playwright (playwright-core, Chromium) backed implementation
 * - Single-flight lazy creation: concurrent acquires share one launch
 * - Idempotent teardown that never throws
 *
 * playwright-core does not download a browser. When Chromium is missing,
 * acquire() rejects with SessionUnavailableError and callers fall back to
 * plain HTTP.
 */

import { chromium, errors, type Browser, type BrowserContext, type Page } from 'playwright-core';
import { defaultLogger, errorMessage } from '../logger/index.js';
import type { Logger } from '../types/index.js';

// ============================================================================
// Type Definitions
// ============================================================================

export type NavigationWait = 'domcontentloaded' | 'load' | 'commit';

/**
 * One open tab. Pages are short-lived: opened per fetch, always closed.
 */
export interface BrowserPage {
  goto(url: string, options: { waitUntil: NavigationWait; timeoutMs: number }): Promise<void>;
  content(): Promise<string>;
  /** Scroll to a fraction of the document height (0 = top, 1 = bottom) */
  scrollTo(fraction: number): Promise<void>;
  /** Resolves false when the selector did not appear within the timeout */
  waitForSelector(selector: string, timeoutMs: number): Promise<boolean>;
  /** Click the first element matching the selector; false when there is none */
  clickFirst(selector: string, timeoutMs: number): Promise<boolean>;
  close(): Promise<void>;
}

/**
 * A long-lived browser plus context, reused across fetches by one worker
 */
export interface BrowserSession {
  newPage(): Promise<BrowserPage>;
  close(): Promise<void>;
}

export type SessionFactory = () => Promise<BrowserSession>;

export interface BrowserLaunchOptions {
  headless?: boolean;
  executablePath?: string;
  navigationTimeoutMs?: number;
}

/**
 * The scripted browser is not installed or could not be started
 */
export class SessionUnavailableError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'SessionUnavailableError';
  }
}

// ============================================================================
// Browser Context Settings
// ============================================================================

export const BROWSER_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

export const BROWSER_CONTEXT_SETTINGS = {
  userAgent: BROWSER_USER_AGENT,
  viewport: { width: 1920, height: 1080 },
  locale: 'en-US',
  timezoneId: 'America/New_York',
  extraHTTPHeaders: {
    Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,image/webp,*/*;q=0.8',
    'Accept-Language': 'en-US,en;q=0.9',
    DNT: '1',
    'Upgrade-Insecure-Requests': '1',
  },
} as const;

export const BROWSER_ARGS = [
  '--disable-blink-features=AutomationControlled',
  '--disable-dev-shm-usage',
  '--no-sandbox',
];

/**
 * Teardown errors that only mean "already closed" or "closed elsewhere"
 */
const BENIGN_TEARDOWN_PATTERNS: readonly RegExp[] = [
  /has been closed/i,
  /already closed/i,
  /target closed/i,
  /different thread/i,
  /connection closed/i,
];

export function isBenignTeardownError(error: unknown): boolean {
  const message = errorMessage(error);
  return BENIGN_TEARDOWN_PATTERNS.some((pattern) => pattern.test(message));
}

// ============================================================================
// Playwright Implementation
// ============================================================================

class PlaywrightPage implements BrowserPage {
  constructor(private readonly page: Page) {}

  async goto(url: string, options: { waitUntil: NavigationWait; timeoutMs: number }): Promise<void> {
    await this.page.goto(url, { waitUntil: options.waitUntil, timeout: options.timeoutMs });
  }

  content(): Promise<string> {
    return this.page.content();
  }

  async scrollTo(fraction: number): Promise<void> {
    await this.page.evaluate(
      `window.scrollTo(0, document.body ? document.body.scrollHeight * ${fraction} : 0)`
    );
  }

  async waitForSelector(selector: string, timeoutMs: number): Promise<boolean> {
    try {
      await this.page.waitForSelector(selector, { timeout: timeoutMs });
      return true;
    } catch (error) {
      if (error instanceof errors.TimeoutError) {
        return false;
      }
      throw error;
    }
  }

  async clickFirst(selector: string, timeoutMs: number): Promise<boolean> {
    const target = this.page.locator(selector).first();
    if ((await target.count()) === 0) {
      return false;
    }
    await target.click({ timeout: timeoutMs });
    return true;
  }

  close(): Promise<void> {
    return this.page.close();
  }
}

/**
 * Chromium browser with one stealth-configured context
 */
export class PlaywrightSession implements BrowserSession {
  private constructor(
    private readonly browser: Browser,
    private readonly context: BrowserContext
  ) {}

  /**
   * Launch Chromium and open the shared context
   *
   * @throws SessionUnavailableError when the browser cannot be launched
   */
  static async launch(options: BrowserLaunchOptions = {}): Promise<PlaywrightSession> {
    let browser: Browser;
    try {
      browser = await chromium.launch({
        headless: options.headless ?? true,
        args: BROWSER_ARGS,
        ...(options.executablePath ? { executablePath: options.executablePath } : {}),
      });
    } catch (error) {
      throw new SessionUnavailableError(
        `Scripted browser unavailable: ${errorMessage(error)}`,
        error
      );
    }

    try {
      const context = await browser.newContext({ ...BROWSER_CONTEXT_SETTINGS });
      if (options.navigationTimeoutMs !== undefined) {
        context.setDefaultNavigationTimeout(options.navigationTimeoutMs);
      }
      return new PlaywrightSession(browser, context);
    } catch (error) {
      await browser.close();
      throw new SessionUnavailableError(
        `Scripted browser context failed: ${errorMessage(error)}`,
        error
      );
    }
  }

  async newPage(): Promise<BrowserPage> {
    return new PlaywrightPage(await this.context.newPage());
  }

  close(): Promise<void> {
    return closeContextThenBrowser(this.context, this.browser);
  }
}

interface Closable {
  close(): Promise<void>;
}

/**
 * Close a browser context, then its browser, even when the context fails to close
 */
export async function closeContextThenBrowser(context: Closable, browser: Closable): Promise<void> {
  try {
    await context.close();
  } finally {
    await browser.close();
  }
}

/**
 * Session factory that launches Playwright Chromium
 */
export function playwrightSessionFactory(options: BrowserLaunchOptions = {}): SessionFactory {
  return () => PlaywrightSession.launch(options);
}

// ============================================================================
// Session Slot
// ============================================================================

/**
 * Lazily-created session owned by one worker
 */
export class SessionSlot {
  private pending: Promise<BrowserSession> | null = null;
  private closed = false;

  constructor(
    readonly id: number,
    private readonly factory: SessionFactory,
    private readonly logger: Logger = defaultLogger
  ) {}

  /**
   * Whether a session has been created (or is being created)
   */
  get isActive(): boolean {
    return this.pending !== null;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Session for this slot, created on first call
   *
   * Concurrent calls share one creation. A failed creation is not cached,
   * so a later call retries.
   *
   * @throws SessionUnavailableError
   */
  acquire(): Promise<BrowserSession> {
    if (this.closed) {
      return Promise.reject(new SessionUnavailableError(`Session slot ${this.id} is closed`));
    }

    if (this.pending === null) {
      this.logger.debug('Creating browser session', { slot: this.id });
      this.pending = this.factory().catch((error: unknown) => {
        this.pending = null;
        throw error instanceof SessionUnavailableError
          ? error
          : new SessionUnavailableError(`Session creation failed: ${errorMessage(error)}`, error);
      });
    }

    return this.pending;
  }

  /**
   * Close the session if one was created. Safe to call any number of times.
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    const pending = this.pending;
    this.pending = null;
    if (pending === null) return;

    let session: BrowserSession;
    try {
      session = await pending;
    } catch (error) {
      this.logger.debug('Session never started, nothing to close', {
        slot: this.id,
        error: errorMessage(error),
      });
      return;
    }

    try {
      await session.close();
      this.logger.debug('Browser session closed', { slot: this.id });
    } catch (error) {
      if (isBenignTeardownError(error)) {
        this.logger.debug('Browser session already closed', {
          slot: this.id,
          error: errorMessage(error),
        });
      } else {
        this.logger.warn('Browser session teardown failed', {
          slot: this.id,
          error: errorMessage(error),
        });
      }
    }
  }
}

// ============================================================================
// Session Pool
// ============================================================================

/**
 * Fixed set of session slots, one per worker
 */
export class SessionPool {
  private readonly slots: SessionSlot[];

  constructor(size: number, factory: SessionFactory, logger: Logger = defaultLogger) {
    if (!Number.isInteger(size) || size < 1) {
      throw new RangeError(`Session pool size must be a positive integer, got ${size}`);
    }
    this.slots = Array.from({ length: size }, (_, id) => new SessionSlot(id, factory, logger));
  }

  get size(): number {
    return this.slots.length;
  }

  /**
   * The slot owned by a worker
   */
  slot(id: number): SessionSlot {
    const slot = this.slots[id];
    if (!slot) {
      throw new RangeError(`No session slot ${id} (pool size ${this.slots.length})`);
    }
    return slot;
  }

  /**
   * Number of slots whose session has been created
   */
  activeCount(): number {
    return this.slots.filter((slot) => slot.isActive).length;
  }

  /**
   * Close every slot. Idempotent.
   */
  async closeAll(): Promise<void> {
    await Promise.all(this.slots.map((slot) => slot.close()));
  }
}

/**
 * Review Lead Discovery - Main Entry Point
 *
 * Crawls software review sites, keeps the negative reviews, tags the
 * complaints and ranks the reviewing companies as sales leads.
 *
 * Architecture:
 * - crawler drives fetcher (HTTP with scripted-browser escalation) and parser
 * - worker-pool runs crawl jobs concurrently, one browser session per slot
 * - storage persists leads with identity-hash deduplication
 * - renderers and indicators are independent consumers of records
 */

// Core Types
export type * from './types/index.js';
export { LEAD_STATUSES } from './types/index.js';

// Logging & Configuration
export { defaultLogger, silentLogger, defaultMetrics, errorMessage } from './logger/index.js';
export {
  ConfigurationError,
  DEFAULT_CONFIG,
  resolveConfig,
  type LeadDiscoveryConfig,
  type ScriptedFetchMode,
} from './config/index.js';

// Host Policy
export {
  SCRIPTED_HOSTS,
  DENYLISTED_HOSTS,
  AUTH_GATED_HOSTS,
  PAGINATED_HOSTS,
  RECOMMENDED_SITES,
  extractHostname,
  requiresScripting,
  isDenylisted,
  isAuthGated,
  sourceBucket,
  buildPageSequence,
} from './hosts/index.js';

// Classifier Module - Pain tags, negativity, scoring
export {
  PAIN_KEYWORDS,
  PAIN_TAGS,
  MAX_NEGATIVE_RATING,
  classifyPains,
  isNegative,
  scoreLead,
  type ScoreInput,
} from './classifier/index.js';

// Parser Module - Site-specific review extraction
export {
  SITE_PROFILES,
  GENERIC_PROFILE,
  selectSiteProfile,
  extractReviews,
  toReviewRecord,
  parseReviews,
  firstSome,
  type SiteName,
  type SiteProfile,
  type ExtractedReview,
  type Extractor,
  type ParseOptions,
} from './parser/index.js';

// Session Pool Module - Browser session lifecycle
export {
  SessionPool,
  SessionSlot,
  SessionUnavailableError,
  PlaywrightSession,
  closeContextThenBrowser,
  playwrightSessionFactory,
  type BrowserPage,
  type BrowserSession,
  type SessionFactory,
  type BrowserLaunchOptions,
} from './session-pool/index.js';

// Fetcher Module - HTTP with scripted escalation
export {
  FetchOrchestrator,
  FetchError,
  createFetcher,
  createHttpClient,
  unwrapFetchResult,
  isChallengePage,
  type PageFetcher,
  type FetchOptions,
  type FetchOrchestratorOptions,
} from './fetcher/index.js';

// Crawler Module - Crawl controller
export { crawl, denylistMessage, type CrawlOptions } from './crawler/index.js';

// Worker Pool Module
export {
  CrawlWorkerPool,
  WorkerPoolClosedError,
  createWorkerPool,
  type CrawlJob,
  type WorkerPoolOptions,
} from './worker-pool/index.js';

// Storage Module - Lead persistence
export {
  LibsqlLeadStore,
  MemoryLeadStore,
  createLeadStore,
  computeIdentityHash,
  type LeadStore,
  type LeadStoreConfig,
  type LeadStoreOptions,
} from './storage/index.js';

// Renderers Module
export { renderCsv, renderLeadSummary, csvFileName, CSV_COLUMNS } from './renderers/index.js';

// Indicators Module - Target product discovery
export {
  DEFAULT_INDICATORS,
  loadIndicators,
  saveIndicators,
  parseIndicators,
  findIndicator,
  checkCompany,
  checkKeywords,
  checkLinks,
  probeSubdomain,
  indicatorMatchToRecord,
  type TargetIndicator,
  type IndicatorResult,
  type DiscoveredCompany,
} from './indicators/index.js';

/**
 * Core type definitions for review lead discovery
 *
 * This module exports all shared types used across the pipeline:
 * crawl → fetch → parse → classify/score → store.
 */

// ============================================================================
// Leads
// ============================================================================

/**
 * Built-in complaint categories, in keyword-table order
 */
export type PainTag =
  | 'complexity'
  | 'bugs'
  | 'support'
  | 'integration'
  | 'cost'
  | 'performance';

/**
 * Sales pipeline status of a lead. Transitions are free-form.
 */
export type LeadStatus = 'new' | 'contacted' | 'converted' | 'lost';

export const LEAD_STATUSES: readonly LeadStatus[] = ['new', 'contacted', 'converted', 'lost'];

/**
 * One scraped negative review, as produced by the parser
 *
 * `painTags` keeps keyword-table order. Discovery records created from
 * target indicators carry non-built-in tags such as `discovery`.
 */
export interface ReviewRecord {
  companyName: string;
  reviewerName: string;
  /** At most 100 characters */
  title: string;
  /** At most 500 characters */
  body: string;
  /** Assumed 1-5 scale; null when the card carried no usable rating */
  rating: number | null;
  painTags: string[];
  sourceUrl: string;
  /** ISO-8601 */
  capturedAt: string;
  /** 0-100 */
  leadScore: number;
  status: LeadStatus;
  notes: string;
}

/**
 * A persisted lead row
 */
export interface StoredLead extends ReviewRecord {
  id: number;
  identityHash: string;
  contactedAt: string | null;
  convertedAt: string | null;
  createdAt: string;
}

// ============================================================================
// Fetching
// ============================================================================

/**
 * Fetch failure taxonomy
 *
 * - blocked: HTTP 403 with no further escalation possible
 * - denied: host is on the automation denylist
 * - timeout: request or navigation exceeded its deadline
 * - unavailable: scripted browser not installed or not launchable
 * - network: connection-level failure
 * - http: any other non-success HTTP status
 */
export type FetchFailureKind = 'blocked' | 'denied' | 'timeout' | 'unavailable' | 'network' | 'http';

export interface FetchFailure {
  kind: FetchFailureKind;
  message: string;
  url: string;
  status?: number;
}

export type FetchVia = 'http' | 'scripted';

export type FetchResult =
  | { success: true; html: string; via: FetchVia; url: string }
  | { success: false; error: FetchFailure };

// ============================================================================
// Crawling
// ============================================================================

export type CrawlErrorKind = FetchFailureKind | 'parse' | 'cancelled';

/**
 * Per-URL diagnostic returned alongside recovered records
 */
export interface CrawlError {
  url: string;
  kind: CrawlErrorKind;
  message: string;
}

export interface CrawlOutput {
  records: ReviewRecord[];
  errors: CrawlError[];
  meta: {
    startedAt: string;
    completedAt: string;
    urlsRequested: number;
    pagesFetched: number;
  };
}

// ============================================================================
// Storage
// ============================================================================

export interface SaveResult {
  saved: number;
  duplicates: number;
  failed: number;
}

/**
 * Sort keys accepted by lead queries. Unknown keys fall back to `score`.
 */
export type LeadSortKey = 'score' | 'lead_score' | 'rating' | 'recent' | 'company';

export interface LeadQuery {
  limit?: number;
  /** Substring of the stored comma-joined pain tags */
  pain?: string;
  status?: LeadStatus;
  minScore?: number;
  sortBy?: LeadSortKey | string;
}

export interface LeadAnalytics {
  total: number;
  by_status: Record<string, number>;
  avg_score: number;
  high_value_leads: number;
  by_pain: Record<string, number>;
  by_source: Record<string, number>;
}

export interface LeadCounts {
  total: number;
  by_pain: Record<string, number>;
}

/**
 * Injected delay; tests pass one that resolves immediately
 */
export type Sleep = (ms: number) => Promise<void>;

// ============================================================================
// Observability
// ============================================================================

/**
 * Logger interface for observability
 */
export interface Logger {
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
}

/**
 * Metrics interface for observability
 */
export interface Metrics {
  increment(metric: string, tags?: Record<string, string>): void;
  gauge(metric: string, value: number, tags?: Record<string, string>): void;
  timing(metric: string, value: number, tags?: Record<string, string>): void;
}

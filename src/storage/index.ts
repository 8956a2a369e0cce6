/**
 * Storage Module
 *
 * Responsibilities:
 * - Define LeadStore interface
 * - Implement LibsqlLeadStore on a SQLite database via @libsql/client
 * - Implement MemoryLeadStore for testing
 * - Deduplicate by identity hash, filter/sort queries, status updates
 * - Aggregate analytics and lead counts
 *
 * Table layout:
 * - leads(id, company_name, reviewer_name, review_title, review_text, rating,
 *   pain_tags, source_url, scraped_at, created_at, identity_hash UNIQUE,
 *   lead_score, status, notes, contacted_at, converted_at)
 *
 * Usage:
 * const { createLeadStore } = await import('review-lead-discovery/storage');
 * const store = createLeadStore({ type: 'libsql', url: 'file:leads.db' });
 * await store.init();
 * const { saved, duplicates } = await store.save(records);
 */

import { createClient, type Client, type InValue, type Row } from '@libsql/client';
import { createHash } from 'crypto';
import { scoreLead } from '../classifier/index.js';
import { ConfigurationError, type LeadDiscoveryConfig } from '../config/index.js';
import { sourceBucket } from '../hosts/index.js';
import { defaultLogger, defaultMetrics, errorMessage } from '../logger/index.js';
import {
  LEAD_STATUSES,
  type LeadAnalytics,
  type LeadCounts,
  type LeadQuery,
  type LeadStatus,
  type Logger,
  type Metrics,
  type ReviewRecord,
  type SaveResult,
  type StoredLead,
} from '../types/index.js';

// ============================================================================
// Interface
// ============================================================================

/**
 * Persistent lead table
 */
export interface LeadStore {
  /** Create the table and indexes if missing */
  init(): Promise<void>;
  /** Insert records, skipping (and counting) identity-hash duplicates */
  save(records: readonly ReviewRecord[]): Promise<SaveResult>;
  query(query?: LeadQuery): Promise<StoredLead[]>;
  get(id: number): Promise<StoredLead | null>;
  /** False when no lead has the id */
  updateStatus(id: number, status: LeadStatus, notes?: string): Promise<boolean>;
  analytics(): Promise<LeadAnalytics>;
  stats(): Promise<LeadCounts>;
  close(): Promise<void>;
}

export interface LeadStoreOptions {
  /** Clock for created_at / contacted_at / converted_at (default: current time) */
  now?: () => Date;
  logger?: Logger;
  metrics?: Metrics;
}

export const DEFAULT_QUERY_LIMIT = 1000;
export const HIGH_VALUE_SCORE = 70;
export const TOP_PAIN_TAGS = 10;
/** Body prefix length that participates in the identity hash */
export const IDENTITY_BODY_PREFIX = 200;

// ============================================================================
// Shared Helpers
// ============================================================================

/**
 * Deduplication key: MD5 of reviewer|company|body[0:200]|sourceUrl
 */
export function computeIdentityHash(
  record: Pick<ReviewRecord, 'reviewerName' | 'companyName' | 'body' | 'sourceUrl'>
): string {
  const content = [
    record.reviewerName,
    record.companyName,
    record.body.slice(0, IDENTITY_BODY_PREFIX),
    record.sourceUrl,
  ].join('|');
  return createHash('md5').update(content, 'utf8').digest('hex');
}

export function joinPainTags(tags: readonly string[]): string {
  return tags.join(',');
}

export function splitPainTags(joined: string): string[] {
  return joined
    .split(',')
    .map((tag) => tag.trim())
    .filter((tag) => tag.length > 0);
}

interface NormalizedQuery {
  limit: number;
  pain?: string;
  status?: LeadStatus;
  minScore?: number;
  sortBy: 'score' | 'rating' | 'recent' | 'company';
}

/**
 * Validate a query and resolve its sort key (unknown keys mean score)
 */
export function normalizeQuery(query: LeadQuery = {}): NormalizedQuery {
  const limit = query.limit ?? DEFAULT_QUERY_LIMIT;
  if (!Number.isInteger(limit) || limit < 1) {
    throw new ConfigurationError('Invalid lead query', [
      `limit: expected a positive integer, got ${limit}`,
    ]);
  }
  if (query.minScore !== undefined && !Number.isFinite(query.minScore)) {
    throw new ConfigurationError('Invalid lead query', ['minScore: expected a finite number']);
  }

  let sortBy: NormalizedQuery['sortBy'] = 'score';
  if (query.sortBy === 'rating' || query.sortBy === 'recent' || query.sortBy === 'company') {
    sortBy = query.sortBy;
  }

  const normalized: NormalizedQuery = { limit, sortBy };
  if (query.pain) normalized.pain = query.pain;
  if (query.status) normalized.status = query.status;
  if (query.minScore !== undefined) normalized.minScore = query.minScore;
  return normalized;
}

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Comparator for a sort key; ties go to the lower id
 *
 * rating: ascending (worst first), unrated last.
 */
export function leadComparator(
  sortBy: NormalizedQuery['sortBy']
): (a: StoredLead, b: StoredLead) => number {
  const byId = (a: StoredLead, b: StoredLead): number => a.id - b.id;
  switch (sortBy) {
    case 'rating':
      return (a, b) => {
        if (a.rating === null || b.rating === null) {
          if (a.rating === b.rating) return byId(a, b);
          return a.rating === null ? 1 : -1;
        }
        return a.rating - b.rating || byId(a, b);
      };
    case 'recent':
      return (a, b) => compareText(b.capturedAt, a.capturedAt) || byId(a, b);
    case 'company':
      return (a, b) => compareText(a.companyName, b.companyName) || byId(a, b);
    case 'score':
      return (a, b) => b.leadScore - a.leadScore || byId(a, b);
  }
}

/**
 * Count individual pain tags; top N by frequency, ties by first appearance
 */
export function tallyPainTags(
  joinedTags: readonly string[],
  top = TOP_PAIN_TAGS
): Record<string, number> {
  const counts = new Map<string, number>();
  for (const joined of joinedTags) {
    for (const tag of splitPainTags(joined)) {
      counts.set(tag, (counts.get(tag) ?? 0) + 1);
    }
  }
  return Object.fromEntries([...counts.entries()].sort((a, b) => b[1] - a[1]).slice(0, top));
}

/**
 * Sum counts per source-site bucket, highest first
 */
export function tallySources(
  sources: ReadonlyArray<readonly [string, number]>
): Record<string, number> {
  const counts = new Map<string, number>();
  for (const [sourceUrl, count] of sources) {
    const bucket = sourceBucket(sourceUrl);
    counts.set(bucket, (counts.get(bucket) ?? 0) + count);
  }
  return Object.fromEntries([...counts.entries()].sort((a, b) => b[1] - a[1]));
}

export function roundToTenth(value: number): number {
  return Math.round(value * 10) / 10;
}

function isLeadStatus(value: string): value is LeadStatus {
  return LEAD_STATUSES.some((status) => status === value);
}

// ============================================================================
// libsql (SQLite) Store
// ============================================================================

const SCHEMA: readonly string[] = [
  `CREATE TABLE IF NOT EXISTS leads (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    company_name TEXT NOT NULL,
    reviewer_name TEXT NOT NULL,
    review_title TEXT NOT NULL,
    review_text TEXT NOT NULL,
    rating REAL,
    pain_tags TEXT NOT NULL DEFAULT '',
    source_url TEXT NOT NULL,
    scraped_at TEXT NOT NULL,
    created_at TEXT NOT NULL,
    identity_hash TEXT NOT NULL UNIQUE,
    lead_score REAL NOT NULL DEFAULT 0,
    status TEXT NOT NULL DEFAULT 'new',
    notes TEXT NOT NULL DEFAULT '',
    contacted_at TEXT,
    converted_at TEXT
  )`,
  'CREATE INDEX IF NOT EXISTS idx_leads_company_name ON leads(company_name)',
  'CREATE INDEX IF NOT EXISTS idx_leads_pain_tags ON leads(pain_tags)',
  'CREATE INDEX IF NOT EXISTS idx_leads_scraped_at ON leads(scraped_at)',
  'CREATE INDEX IF NOT EXISTS idx_leads_lead_score ON leads(lead_score)',
  'CREATE INDEX IF NOT EXISTS idx_leads_status ON leads(status)',
];

const ORDER_BY: Record<NormalizedQuery['sortBy'], string> = {
  score: 'lead_score DESC, id ASC',
  rating: 'rating IS NULL, rating ASC, id ASC',
  recent: 'scraped_at DESC, id ASC',
  company: 'company_name ASC, id ASC',
};

function columnText(row: Row, column: string): string {
  const value = row[column];
  if (value === null || value === undefined) return '';
  return typeof value === 'string' ? value : String(value);
}

function columnNullableText(row: Row, column: string): string | null {
  const value = row[column];
  return value === null || value === undefined ? null : columnText(row, column);
}

function columnNumber(row: Row, column: string): number {
  const value = row[column];
  if (typeof value === 'number') return value;
  if (typeof value === 'bigint') return Number(value);
  if (typeof value === 'string') return Number(value);
  return 0;
}

function columnNullableNumber(row: Row, column: string): number | null {
  const value = row[column];
  return value === null || value === undefined ? null : columnNumber(row, column);
}

/**
 * Map a leads row to a StoredLead
 */
export function rowToLead(row: Row): StoredLead {
  const status = columnText(row, 'status');
  return {
    id: columnNumber(row, 'id'),
    identityHash: columnText(row, 'identity_hash'),
    companyName: columnText(row, 'company_name'),
    reviewerName: columnText(row, 'reviewer_name'),
    title: columnText(row, 'review_title'),
    body: columnText(row, 'review_text'),
    rating: columnNullableNumber(row, 'rating'),
    painTags: splitPainTags(columnText(row, 'pain_tags')),
    sourceUrl: columnText(row, 'source_url'),
    capturedAt: columnText(row, 'scraped_at'),
    createdAt: columnText(row, 'created_at'),
    leadScore: columnNumber(row, 'lead_score'),
    status: isLeadStatus(status) ? status : 'new',
    notes: columnText(row, 'notes'),
    contactedAt: columnNullableText(row, 'contacted_at'),
    convertedAt: columnNullableText(row, 'converted_at'),
  };
}

/**
 * SQLite-backed lead store
 *
 * Writes run one at a time through an internal queue. Duplicates are
 * absorbed by the ON CONFLICT clause; any other failed insert is logged
 * and counted as failed.
 */
export class LibsqlLeadStore implements LeadStore {
  private readonly client: Client;
  private readonly now: () => Date;
  private readonly logger: Logger;
  private readonly metrics: Metrics;
  private writeQueue: Promise<void> = Promise.resolve();
  private initialized: Promise<void> | null = null;

  constructor(client: Client, options: LeadStoreOptions = {}) {
    this.client = client;
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? defaultLogger;
    this.metrics = options.metrics ?? defaultMetrics;
  }

  /**
   * Open a store from a libsql URL (`file:leads.db`, `:memory:`, `libsql://...`)
   */
  static open(url: string, authToken?: string, options: LeadStoreOptions = {}): LibsqlLeadStore {
    const client = createClient(authToken ? { url, authToken } : { url });
    return new LibsqlLeadStore(client, options);
  }

  init(): Promise<void> {
    if (this.initialized === null) {
      this.initialized = this.createSchema();
    }
    return this.initialized;
  }

  private async createSchema(): Promise<void> {
    for (const statement of SCHEMA) {
      await this.client.execute(statement);
    }
    this.logger.debug('Lead table ready');
  }

  /**
   * Run a write after every previously queued write has settled
   */
  private serialize<T>(operation: () => Promise<T>): Promise<T> {
    const result = this.writeQueue.then(operation);
    // The queue only orders writes; failures reach the caller through `result`.
    this.writeQueue = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  async save(records: readonly ReviewRecord[]): Promise<SaveResult> {
    await this.init();
    if (records.length === 0) {
      return { saved: 0, duplicates: 0, failed: 0 };
    }

    return this.serialize(async () => {
      const result: SaveResult = { saved: 0, duplicates: 0, failed: 0 };
      const createdAt = this.now().toISOString();

      for (const record of records) {
        const identityHash = computeIdentityHash(record);
        try {
          const inserted = await this.client.execute({
            sql: `INSERT INTO leads (
                    company_name, reviewer_name, review_title, review_text, rating,
                    pain_tags, source_url, scraped_at, created_at, identity_hash,
                    lead_score, status, notes
                  ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
                  ON CONFLICT(identity_hash) DO NOTHING`,
            args: [
              record.companyName,
              record.reviewerName,
              record.title,
              record.body,
              record.rating,
              joinPainTags(record.painTags),
              record.sourceUrl,
              record.capturedAt,
              createdAt,
              identityHash,
              scoreLead(record),
              record.status,
              record.notes,
            ],
          });

          if (inserted.rowsAffected === 0) {
            result.duplicates++;
          } else {
            result.saved++;
          }
        } catch (error) {
          result.failed++;
          this.logger.error('Failed to save lead', {
            identityHash,
            company: record.companyName,
            error: errorMessage(error),
          });
        }
      }

      this.metrics.gauge('storage.saved', result.saved);
      this.metrics.gauge('storage.duplicates', result.duplicates);
      this.metrics.gauge('storage.failures', result.failed);
      this.logger.info('Saved leads', { ...result });
      return result;
    });
  }

  async query(query: LeadQuery = {}): Promise<StoredLead[]> {
    const normalized = normalizeQuery(query);
    await this.init();

    const conditions: string[] = [];
    const args: InValue[] = [];

    if (normalized.pain !== undefined) {
      conditions.push('instr(lower(pain_tags), ?) > 0');
      args.push(normalized.pain.toLowerCase());
    }
    if (normalized.status !== undefined) {
      conditions.push('status = ?');
      args.push(normalized.status);
    }
    if (normalized.minScore !== undefined) {
      conditions.push('lead_score >= ?');
      args.push(normalized.minScore);
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    args.push(normalized.limit);

    const result = await this.client.execute({
      sql: `SELECT * FROM leads ${where} ORDER BY ${ORDER_BY[normalized.sortBy]} LIMIT ?`,
      args,
    });
    return result.rows.map(rowToLead);
  }

  async get(id: number): Promise<StoredLead | null> {
    await this.init();
    const result = await this.client.execute({ sql: 'SELECT * FROM leads WHERE id = ?', args: [id] });
    const row = result.rows[0];
    return row ? rowToLead(row) : null;
  }

  async updateStatus(id: number, status: LeadStatus, notes?: string): Promise<boolean> {
    if (!isLeadStatus(status)) {
      throw new ConfigurationError('Invalid lead status', [`status: ${String(status)}`]);
    }
    await this.init();

    return this.serialize(async () => {
      const assignments = ['status = ?'];
      const args: InValue[] = [status];

      if (notes) {
        assignments.push('notes = ?');
        args.push(notes);
      }
      if (status === 'contacted') {
        assignments.push('contacted_at = ?');
        args.push(this.now().toISOString());
      } else if (status === 'converted') {
        assignments.push('converted_at = ?');
        args.push(this.now().toISOString());
      }
      args.push(id);

      const result = await this.client.execute({
        sql: `UPDATE leads SET ${assignments.join(', ')} WHERE id = ?`,
        args,
      });
      this.logger.debug('Updated lead status', { id, status, updated: result.rowsAffected });
      return result.rowsAffected > 0;
    });
  }

  async analytics(): Promise<LeadAnalytics> {
    await this.init();

    const totals = await this.client.execute(
      `SELECT COUNT(*) AS total,
              AVG(lead_score) AS avg_score,
              SUM(CASE WHEN lead_score >= ${HIGH_VALUE_SCORE} THEN 1 ELSE 0 END) AS high_value
       FROM leads`
    );
    const byStatus = await this.client.execute(
      'SELECT status, COUNT(*) AS count FROM leads GROUP BY status ORDER BY status'
    );
    const painTags = await this.client.execute('SELECT pain_tags FROM leads ORDER BY id');
    const bySource = await this.client.execute(
      'SELECT source_url, COUNT(*) AS count FROM leads GROUP BY source_url ORDER BY MIN(id)'
    );

    const summary = totals.rows[0];
    return {
      total: summary ? columnNumber(summary, 'total') : 0,
      by_status: Object.fromEntries(
        byStatus.rows.map((row): [string, number] => [
          columnText(row, 'status'),
          columnNumber(row, 'count'),
        ])
      ),
      avg_score: summary ? roundToTenth(columnNumber(summary, 'avg_score')) : 0,
      high_value_leads: summary ? columnNumber(summary, 'high_value') : 0,
      by_pain: tallyPainTags(painTags.rows.map((row) => columnText(row, 'pain_tags'))),
      by_source: tallySources(
        bySource.rows.map((row): [string, number] => [
          columnText(row, 'source_url'),
          columnNumber(row, 'count'),
        ])
      ),
    };
  }

  async stats(): Promise<LeadCounts> {
    await this.init();
    const total = await this.client.execute('SELECT COUNT(*) AS total FROM leads');
    const byPain = await this.client.execute(
      'SELECT pain_tags, COUNT(*) AS count FROM leads GROUP BY pain_tags ORDER BY count DESC, MIN(id)'
    );
    const summary = total.rows[0];
    return {
      total: summary ? columnNumber(summary, 'total') : 0,
      by_pain: Object.fromEntries(
        byPain.rows.map((row): [string, number] => [
          columnText(row, 'pain_tags'),
          columnNumber(row, 'count'),
        ])
      ),
    };
  }

  async close(): Promise<void> {
    await this.writeQueue;
    this.client.close();
  }
}

// ============================================================================
// In-Memory Store
// ============================================================================

/**
 * In-memory lead store for testing and development
 *
 * Same semantics as LibsqlLeadStore.
 */
export class MemoryLeadStore implements LeadStore {
  private leads: StoredLead[] = [];
  private readonly hashes = new Set<string>();
  private nextId = 1;
  private readonly now: () => Date;
  private readonly logger: Logger;
  private readonly metrics: Metrics;

  constructor(options: LeadStoreOptions = {}) {
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? defaultLogger;
    this.metrics = options.metrics ?? defaultMetrics;
  }

  async init(): Promise<void> {
    this.logger.debug('Memory lead store ready');
  }

  async save(records: readonly ReviewRecord[]): Promise<SaveResult> {
    const result: SaveResult = { saved: 0, duplicates: 0, failed: 0 };
    const createdAt = this.now().toISOString();

    for (const record of records) {
      const identityHash = computeIdentityHash(record);
      if (this.hashes.has(identityHash)) {
        result.duplicates++;
        continue;
      }

      this.hashes.add(identityHash);
      this.leads.push({
        ...record,
        painTags: [...record.painTags],
        leadScore: scoreLead(record),
        id: this.nextId++,
        identityHash,
        contactedAt: null,
        convertedAt: null,
        createdAt,
      });
      result.saved++;
    }

    this.metrics.gauge('storage.saved', result.saved);
    this.metrics.gauge('storage.duplicates', result.duplicates);
    this.metrics.gauge('storage.failures', result.failed);
    return result;
  }

  async query(query: LeadQuery = {}): Promise<StoredLead[]> {
    const normalized = normalizeQuery(query);
    const { pain, status, minScore } = normalized;

    return this.leads
      .filter(
        (lead) =>
          pain === undefined ||
          joinPainTags(lead.painTags).toLowerCase().includes(pain.toLowerCase())
      )
      .filter((lead) => status === undefined || lead.status === status)
      .filter((lead) => minScore === undefined || lead.leadScore >= minScore)
      .sort(leadComparator(normalized.sortBy))
      .slice(0, normalized.limit)
      .map((lead) => ({ ...lead, painTags: [...lead.painTags] }));
  }

  async get(id: number): Promise<StoredLead | null> {
    const lead = this.leads.find((candidate) => candidate.id === id);
    return lead ? { ...lead, painTags: [...lead.painTags] } : null;
  }

  async updateStatus(id: number, status: LeadStatus, notes?: string): Promise<boolean> {
    if (!isLeadStatus(status)) {
      throw new ConfigurationError('Invalid lead status', [`status: ${String(status)}`]);
    }
    const lead = this.leads.find((candidate) => candidate.id === id);
    if (!lead) return false;

    lead.status = status;
    if (notes) lead.notes = notes;
    if (status === 'contacted') lead.contactedAt = this.now().toISOString();
    if (status === 'converted') lead.convertedAt = this.now().toISOString();
    return true;
  }

  async analytics(): Promise<LeadAnalytics> {
    const total = this.leads.length;
    const byStatus: Record<string, number> = {};
    for (const lead of [...this.leads].sort((a, b) => compareText(a.status, b.status))) {
      byStatus[lead.status] = (byStatus[lead.status] ?? 0) + 1;
    }

    const sourceCounts = new Map<string, number>();
    for (const lead of this.leads) {
      sourceCounts.set(lead.sourceUrl, (sourceCounts.get(lead.sourceUrl) ?? 0) + 1);
    }

    const scoreSum = this.leads.reduce((sum, lead) => sum + lead.leadScore, 0);
    return {
      total,
      by_status: byStatus,
      avg_score: total > 0 ? roundToTenth(scoreSum / total) : 0,
      high_value_leads: this.leads.filter((lead) => lead.leadScore >= HIGH_VALUE_SCORE).length,
      by_pain: tallyPainTags(this.leads.map((lead) => joinPainTags(lead.painTags))),
      by_source: tallySources([...sourceCounts.entries()]),
    };
  }

  async stats(): Promise<LeadCounts> {
    const counts = new Map<string, number>();
    for (const lead of this.leads) {
      const joined = joinPainTags(lead.painTags);
      counts.set(joined, (counts.get(joined) ?? 0) + 1);
    }
    return {
      total: this.leads.length,
      by_pain: Object.fromEntries([...counts.entries()].sort((a, b) => b[1] - a[1])),
    };
  }

  async close(): Promise<void> {
    this.logger.debug('Memory lead store closed', { leads: this.leads.length });
  }

  /**
   * Remove every lead (useful for test cleanup)
   */
  clear(): void {
    this.leads = [];
    this.hashes.clear();
    this.nextId = 1;
  }

  /**
   * Number of stored leads (useful for testing)
   */
  size(): number {
    return this.leads.length;
  }
}

// ============================================================================
// Factory
// ============================================================================

export type LeadStoreConfig =
  | { type: 'libsql'; url: string; authToken?: string }
  | { type: 'memory' };

/**
 * Create the lead store for an explicit store configuration, or for the
 * resolved application configuration (`LEADS_DATABASE_URL`,
 * `LEADS_DATABASE_AUTH_TOKEN`)
 */
export function createLeadStore(
  config: LeadStoreConfig | LeadDiscoveryConfig,
  options: LeadStoreOptions = {}
): LeadStore {
  if ('databaseUrl' in config) {
    return LibsqlLeadStore.open(config.databaseUrl, config.databaseAuthToken, options);
  }
  if (config.type === 'memory') {
    return new MemoryLeadStore(options);
  }
  return LibsqlLeadStore.open(config.url, config.authToken, options);
}

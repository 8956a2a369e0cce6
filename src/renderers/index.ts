/**
 * Renderers Module
 *
 * Views over lead records. Records (scraped or stored) are the only
 * canonical data; every format here is derived from them.
 *
 * Responsibilities:
 * - CSV export with a fixed column order (RFC 4180 quoting, CRLF rows)
 * - Plain-text lead listing for terminal output
 * - Export file naming
 *
 * Usage:
 * const { renderCsv } = await import('review-lead-discovery/renderers');
 * const csv = renderCsv(await store.query(), { includeScore: true });
 */

import type { ReviewRecord } from '../types/index.js';

// ============================================================================
// CSV Export
// ============================================================================

export const CSV_COLUMNS = [
  'company_name',
  'reviewer_name',
  'review_title',
  'review_text',
  'rating',
  'pain_tags',
  'source_url',
  'scraped_at',
] as const;

/** Appended for database-sourced exports */
export const CSV_SCORE_COLUMNS = ['lead_score', 'status'] as const;

export interface CsvOptions {
  /** Append lead_score and status columns */
  includeScore?: boolean;
}

const CSV_LINE_BREAK = '\r\n';

/**
 * Quote a field when it contains a delimiter, quote or line break
 */
export function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

function csvFields(record: ReviewRecord, includeScore: boolean): string[] {
  const fields = [
    record.companyName,
    record.reviewerName,
    record.title,
    record.body,
    record.rating === null ? '' : String(record.rating),
    record.painTags.join(','),
    record.sourceUrl,
    record.capturedAt,
  ];
  if (includeScore) {
    fields.push(String(record.leadScore), record.status);
  }
  return fields;
}

/**
 * Render records as CSV: header row, one row per record
 */
export function renderCsv(records: readonly ReviewRecord[], options: CsvOptions = {}): string {
  const includeScore = options.includeScore ?? false;
  const header: string[] = [...CSV_COLUMNS];
  if (includeScore) {
    header.push(...CSV_SCORE_COLUMNS);
  }

  const lines = [header.join(',')];
  for (const record of records) {
    lines.push(csvFields(record, includeScore).map(escapeCsvField).join(','));
  }
  return lines.join(CSV_LINE_BREAK) + CSV_LINE_BREAK;
}

/**
 * Export file name stamped with the local date and time: leads_YYYYMMDD_HHMM.csv
 */
export function csvFileName(now: Date = new Date(), prefix = 'leads'): string {
  const pad = (value: number): string => String(value).padStart(2, '0');
  const date = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}${pad(now.getMinutes())}`;
  return `${prefix}_${date}_${time}.csv`;
}

// ============================================================================
// Plain Text
// ============================================================================

function clip(text: string, length: number): string {
  return text.length > length ? `${text.slice(0, length)}...` : text;
}

/**
 * Render a numbered plain-text listing of leads
 */
export function renderLeadSummary(records: readonly ReviewRecord[]): string {
  if (records.length === 0) {
    return 'No leads found\n';
  }

  const rule = '-'.repeat(80);
  const sections = records.map((record, index) =>
    [
      `[${index + 1}] Score: ${record.leadScore.toFixed(1)}/100`,
      `    Reviewer: ${record.reviewerName || 'Unknown'}`,
      `    Company: ${record.companyName || 'Unknown'}`,
      `    Rating: ${record.rating === null ? 'N/A' : String(record.rating)}`,
      `    Pain Tags: ${record.painTags.length > 0 ? record.painTags.join(', ') : 'None'}`,
      `    Title: ${record.title ? clip(record.title, 80) : 'N/A'}`,
      `    Review: ${clip(record.body, 150)}`,
      `    Source: ${record.sourceUrl}`,
      `    Scraped: ${record.capturedAt}`,
      rule,
    ].join('\n')
  );

  return `Found ${records.length} potential leads\n${rule}\n${sections.join('\n')}\nTotal: ${records.length} leads\n`;
}

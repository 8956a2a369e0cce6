/**
 * Classification & Scoring Module
 *
 * Pure functions, no I/O:
 * - classifyPains: keyword-table lookup, table order preserved
 * - isNegative: admission gate into the pipeline
 * - scoreLead: additive, capped 0-100 sales-readiness score
 */

import type { PainTag } from '../types/index.js';

/**
 * Keyword table. Matching is case-insensitive substring presence.
 * Iteration order of this object is the tag order of every result.
 */
export const PAIN_KEYWORDS: Readonly<Record<PainTag, readonly string[]>> = {
  complexity: ['complex', 'complicated', 'confusing', 'hard to use', 'difficult'],
  bugs: ['buggy', 'crash', 'error', 'issue', 'downtime', 'glitch'],
  support: ['support', 'service', 'helpdesk', 'customer service', 'response time'],
  integration: ['integration', 'integrate', 'api', 'sync', "doesn't connect"],
  cost: ['expensive', 'too costly', 'price', 'pricing', 'overpriced'],
  performance: ['slow', 'laggy', 'performance', 'takes forever'],
};

export const PAIN_TAGS: readonly PainTag[] = [
  'complexity',
  'bugs',
  'support',
  'integration',
  'cost',
  'performance',
];

/** Ratings at or below this count as a bad review */
export const MAX_NEGATIVE_RATING = 3.0;

/** Tags worth +7 each */
const HIGH_VALUE_TAGS = ['complexity', 'bugs', 'performance'];

const UNKNOWN_NAMES = new Set(['unknown', 'n/a', '']);

/**
 * Tag free text with pain categories
 */
export function classifyPains(text: string): PainTag[] {
  const lowered = text.toLowerCase();
  return PAIN_TAGS.filter((tag) => PAIN_KEYWORDS[tag].some((keyword) => lowered.includes(keyword)));
}

/**
 * A review is negative if it is rated 3.0 or lower, or mentions any pain
 */
export function isNegative(text: string, rating: number | null): boolean {
  if (rating !== null && rating <= MAX_NEGATIVE_RATING) {
    return true;
  }
  return classifyPains(text).length > 0;
}

/**
 * Fields the score depends on
 */
export interface ScoreInput {
  rating: number | null;
  painTags: readonly string[];
  body: string;
  companyName: string;
  reviewerName: string;
}

function ratingPoints(rating: number | null): number {
  if (rating === null) return 0;
  if (rating <= 1.0) return 30;
  if (rating <= 2.0) return 25;
  if (rating <= 2.5) return 20;
  if (rating <= 3.0) return 15;
  return 5;
}

function painCountPoints(count: number): number {
  if (count >= 3) return 40;
  if (count === 2) return 30;
  if (count === 1) return 20;
  return 0;
}

function lengthPoints(body: string): number {
  if (body.length > 300) return 10;
  if (body.length > 150) return 5;
  return 0;
}

/**
 * Whether a company/reviewer name is something a salesperson can act on
 */
export function isKnownName(name: string): boolean {
  return !UNKNOWN_NAMES.has(name.trim().toLowerCase());
}

/**
 * Calculate lead score
 *
 * Rating (max 30) + pain count (max 40) + high-value tags (7 each)
 * + body length (max 10) + known company (5) + known reviewer (5),
 * capped at 100.
 */
export function scoreLead(input: ScoreInput): number {
  let score = ratingPoints(input.rating);
  score += painCountPoints(input.painTags.length);

  for (const tag of HIGH_VALUE_TAGS) {
    if (input.painTags.includes(tag)) {
      score += 7;
    }
  }

  score += lengthPoints(input.body);

  if (isKnownName(input.companyName)) score += 5;
  if (isKnownName(input.reviewerName)) score += 5;

  return Math.min(score, 100);
}

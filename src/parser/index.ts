/**
 * Parser Module - Site-Adaptive Review Extraction
 *
 * Converts raw review-page HTML into ReviewRecords.
 *
 * Features:
 * - Host-based dispatch to one of four known-site profiles or the generic one
 * - Ranked card selectors: first selector with any match wins
 * - Layered field extraction composed with firstSome(): each layer is
 *   consulted only when the previous ones found nothing
 * - Negativity gate, truncation and scoring before a record is emitted
 *
 * Pure: no I/O. An empty result is "nothing found on this page", not an error.
 *
 * Usage:
 * ```typescript
 * const { parseReviews } = await import('review-lead-discovery/parser');
 * const records = parseReviews(html, 'https://www.g2.com/products/acme/reviews');
 * ```
 */

import * as cheerio from 'cheerio';
import type { Cheerio, CheerioAPI } from 'cheerio';
import { isTag, isText, type AnyNode, type Element } from 'domhandler';
import { classifyPains, isNegative, scoreLead } from '../classifier/index.js';
import { extractHostname, hostMatches } from '../hosts/index.js';
import { silentLogger } from '../logger/index.js';
import type { Logger, ReviewRecord } from '../types/index.js';

// ============================================================================
// Type Definitions
// ============================================================================

export type SiteName = 'getapp' | 'g2' | 'trustradius' | 'softwareadvice' | 'generic';

/**
 * A review card element together with the document it belongs to
 */
export interface ReviewCard {
  $: CheerioAPI;
  node: Cheerio<Element>;
}

/**
 * One extraction strategy: a value, or null to defer to the next strategy
 */
export type Extractor<T> = (card: ReviewCard) => T | null;

/**
 * Descendant lookup: a CSS selector, optionally narrowed by a class-name test
 */
export interface ElementQuery {
  selector: string;
  classMatch?: (className: string) => boolean;
}

/**
 * Per-site extraction profile. Every list is tried in order.
 */
export interface SiteProfile {
  site: SiteName;
  /** Registrable domains served by this profile (subdomains match too) */
  hosts: readonly string[];
  cardSelectors: readonly string[];
  /** Broader card lookup used only when no card selector matched */
  fallbackCards?: ElementQuery;
  text: readonly ElementQuery[];
  rating: readonly ElementQuery[];
  reviewerClasses: readonly ElementQuery[];
  companyClasses: readonly ElementQuery[];
  title: readonly ElementQuery[];
}

/**
 * Fields pulled from one card before classification
 */
export interface ExtractedReview {
  title: string | null;
  body: string;
  rating: number | null;
  reviewerName: string | null;
  companyName: string | null;
}

export interface ParseOptions {
  /** Maximum cards examined per page (default: 200) */
  maxCards?: number;
  /** Clock used for capturedAt (default: current time) */
  now?: () => Date;
  logger?: Logger;
}

// ============================================================================
// Constants
// ============================================================================

export const MAX_CARDS_PER_PAGE = 200;
export const MIN_BODY_LENGTH = 20;
export const MAX_TITLE_LENGTH = 100;
export const MAX_BODY_LENGTH = 500;
/** Title fallback: this many leading characters of the body */
export const TITLE_FROM_BODY_LENGTH = 50;

const UNKNOWN = 'Unknown';

/** Leading number, optionally followed by a count in parentheses: "3.9 (168)" */
const RATING_LINE = /^\d+\.?\d*\s*\(?\d*\)?/;
/** Label followed by a score: "Value for money 3.6" */
const LABELLED_SCORE_LINE = /^[A-Z][a-z]+(?:\s+[a-z]+){0,3}\s+\d+(?:\.\d+)?$/;
const FIRST_NUMBER = /(\d+\.?\d*)/;
const FUNCTION_WORDS = /\b(?:the|and|is|was|are|have|has|this|that|with|for|from)\b/i;

const PLACEHOLDER_NAMES = new Set(['unknown', 'anonymous', 'n/a']);
const LINK_STOP_WORDS = new Set(['view', 'more', 'read', 'see', 'profile', 'review', 'author']);
const NAME_PREFIX = /^(?:reviewed|written|posted)\s+by\s*:?\s*/i;

const REVIEWER_TEXT_PATTERNS: readonly RegExp[] = [
  /\b(?:[Rr]eviewed|[Ww]ritten|[Pp]osted)\s+by\s*:?\s*([A-Z][a-z]+(?:\s+[A-Z][a-z]+)?)/,
  /\b[Bb]y\s*:?\s*([A-Z][a-z]+(?:\s+[A-Z][a-z]+)?)/,
  /\b([A-Z][a-z]+\s+[A-Z][a-z]+)\s+reviewed\b/,
];

const COMPANY_TEXT_PATTERNS: readonly RegExp[] = [
  /\b(?:[Cc]ompany|[Oo]rganization)\s*:\s*([A-Z][\w&.'-]*(?:\s+[A-Z][\w&.'-]*){0,4})/,
  /\b(?:[Ww]orks?|[Ww]orking)\s+at\s+([A-Z][\w&.'-]*(?:\s+[A-Z][\w&.'-]*){0,4})/,
];

const SKIPPED_TAGS = new Set(['script', 'style', 'noscript', 'template']);

// ============================================================================
// Class-Name Heuristics
// ============================================================================

function classTokens(className: string): string[] {
  return className.toLowerCase().split(/\s+/).filter((token) => token.length > 0);
}

/**
 * Class test: some class token (or the whole attribute) contains any keyword
 */
export function classHasAny(...keywords: string[]): (className: string) => boolean {
  return (className) => {
    const candidates = [...classTokens(className), className.toLowerCase()];
    return candidates.some((candidate) => keywords.some((keyword) => candidate.includes(keyword)));
  };
}

/**
 * Class test: some class token (or the whole attribute) contains every keyword
 */
export function classHasAll(...keywords: string[]): (className: string) => boolean {
  return (className) => {
    const candidates = [...classTokens(className), className.toLowerCase()];
    return candidates.some((candidate) => keywords.every((keyword) => candidate.includes(keyword)));
  };
}

// ============================================================================
// Site Profiles
// ============================================================================

const TITLE_CLASS = classHasAny('title');
const RATING_CLASS = classHasAny('rating', 'star');

export const SITE_PROFILES: readonly SiteProfile[] = [
  {
    site: 'getapp',
    hosts: ['getapp.com'],
    cardSelectors: [
      "div[data-testid*='review']",
      '.review-item',
      '.review-card',
      "[class*='ReviewCard']",
      "[class*='review-card']",
      "div[class*='review']",
    ],
    fallbackCards: { selector: 'div', classMatch: classHasAny('review', 'rating', 'comment') },
    text: [
      {
        selector: 'p, div, span',
        classMatch: classHasAny('text', 'content', 'body', 'description', 'review'),
      },
    ],
    rating: [{ selector: 'span, div', classMatch: RATING_CLASS }],
    reviewerClasses: [
      { selector: 'span, div, a', classMatch: classHasAny('author') },
      { selector: 'span, div, a, strong, b, p', classMatch: classHasAll('reviewer', 'name') },
      { selector: 'span, div, a, strong, b, p', classMatch: classHasAll('user', 'name') },
      { selector: 'span, div, a, strong, b, p', classMatch: classHasAll('author', 'name') },
      { selector: 'span, div, a, strong, b, p', classMatch: classHasAll('profile', 'name') },
      { selector: 'span, div, a, strong, b, p', classMatch: classHasAny('writer') },
      { selector: 'span, div, a, strong, b, p', classMatch: classHasAll('posted', 'by') },
    ],
    companyClasses: [
      { selector: 'span, div, a', classMatch: classHasAll('company', 'name') },
      { selector: 'span, div, a', classMatch: classHasAny('organization') },
      { selector: 'span, div, a', classMatch: classHasAll('business', 'name') },
      { selector: 'span, div, a', classMatch: classHasAny('firm') },
      { selector: 'span, div, a', classMatch: classHasAny('company') },
    ],
    title: [{ selector: 'h3, h4, h5, div', classMatch: TITLE_CLASS }],
  },
  {
    site: 'g2',
    hosts: ['g2.com'],
    cardSelectors: [
      "div[data-testid*='review']",
      '.review-card',
      "[class*='ReviewCard']",
      "article[class*='review']",
    ],
    text: [{ selector: 'p, div', classMatch: classHasAny('text', 'content') }],
    rating: [{ selector: 'span, div', classMatch: RATING_CLASS }],
    reviewerClasses: [{ selector: 'span, div, a', classMatch: classHasAny('reviewer', 'author') }],
    companyClasses: [{ selector: 'span, div', classMatch: classHasAny('company') }],
    title: [{ selector: 'h3, h4', classMatch: TITLE_CLASS }],
  },
  {
    site: 'trustradius',
    hosts: ['trustradius.com'],
    cardSelectors: [
      '.review-card',
      '.review-item',
      "article[class*='review']",
      "div[class*='ReviewCard']",
      '[data-review-id]',
    ],
    fallbackCards: { selector: 'div[data-review-id]' },
    text: [
      { selector: 'p, div', classMatch: classHasAny('text', 'content', 'body', 'review') },
      { selector: "[itemprop='reviewBody']" },
    ],
    rating: [
      { selector: "[itemprop='ratingValue']" },
      { selector: 'span, div', classMatch: RATING_CLASS },
    ],
    reviewerClasses: [{ selector: 'span, div, a', classMatch: classHasAny('reviewer', 'author') }],
    companyClasses: [{ selector: 'span, div', classMatch: classHasAny('company') }],
    title: [{ selector: 'h3, h4, h5', classMatch: TITLE_CLASS }],
  },
  {
    site: 'softwareadvice',
    hosts: ['softwareadvice.com'],
    cardSelectors: [
      '.review-card',
      '.review-item',
      'article.review',
      "div[class*='review']",
      '[data-review]',
    ],
    fallbackCards: { selector: 'div', classMatch: classHasAny('review', 'rating') },
    text: [{ selector: 'p, div', classMatch: classHasAny('text', 'content', 'body') }],
    rating: [{ selector: 'span, div', classMatch: RATING_CLASS }],
    reviewerClasses: [
      { selector: 'span, div, a', classMatch: classHasAny('reviewer', 'author', 'user') },
    ],
    companyClasses: [{ selector: 'span, div', classMatch: classHasAny('company') }],
    title: [{ selector: 'h3, h4, h5', classMatch: TITLE_CLASS }],
  },
];

export const GENERIC_PROFILE: SiteProfile = {
  site: 'generic',
  hosts: [],
  cardSelectors: [
    '.review-card, .review-item, article.review, [data-review]',
    "[class*='review']",
    "[id*='review']",
    'article',
    '.review',
  ],
  text: [
    {
      selector:
        ".review-body, .review-text, [itemprop='reviewBody'], p, [class*='text'], [class*='body']",
    },
  ],
  rating: [
    {
      selector:
        "[itemprop='ratingValue'], .star-rating, .rating, [class*='rating'], [class*='star']",
    },
  ],
  reviewerClasses: [
    {
      selector:
        ".reviewer-name, .author-name, .user-name, [class*='reviewer-name'], [class*='author-name']",
    },
  ],
  companyClasses: [
    {
      selector:
        ".reviewer-company, .company-name, [class*='company-name'], [class*='reviewer-company']",
    },
    { selector: "[class*='company'], [class*='organization']" },
  ],
  title: [{ selector: ".review-title, h3, h4, .title, [class*='title']" }],
};

// ============================================================================
// Dispatch
// ============================================================================

/**
 * Select the extraction profile for a source URL
 */
export function selectSiteProfile(url: string): SiteProfile {
  const hostname = extractHostname(url);
  return (
    SITE_PROFILES.find((profile) => profile.hosts.some((domain) => hostMatches(hostname, domain))) ??
    GENERIC_PROFILE
  );
}

// ============================================================================
// Text Helpers
// ============================================================================

function collectText(node: AnyNode, pieces: string[]): void {
  if (isText(node)) {
    const piece = node.data.replace(/\s+/g, ' ').trim();
    if (piece.length > 0) {
      pieces.push(piece);
    }
    return;
  }
  if (isTag(node)) {
    if (SKIPPED_TAGS.has(node.name)) return;
    for (const child of node.children) {
      collectText(child, pieces);
    }
  }
}

/**
 * Text of an element: each text node trimmed, empty ones dropped, joined
 */
export function flattenText(node: Cheerio<Element>, separator = ' '): string {
  const pieces: string[] = [];
  for (const element of node.toArray()) {
    collectText(element, pieces);
  }
  return pieces.join(separator);
}

/**
 * Whether a line looks like rating or metadata rather than prose
 */
export function isRatingLine(text: string): boolean {
  return RATING_LINE.test(text) || LABELLED_SCORE_LINE.test(text);
}

/**
 * First number in a string, or null when there is none
 */
export function parseRatingValue(value: string): number | null {
  const match = value.match(FIRST_NUMBER);
  if (!match?.[1]) return null;
  const rating = Number.parseFloat(match[1]);
  return Number.isFinite(rating) ? rating : null;
}

function truncate(text: string, length: number): string {
  return text.length > length ? text.slice(0, length) : text;
}

// ============================================================================
// Extractor Combinators
// ============================================================================

/**
 * Compose extractors: the first non-null result wins
 */
export function firstSome<T>(...extractors: Array<Extractor<T>>): Extractor<T> {
  return (card) => {
    for (const extractor of extractors) {
      const value = extractor(card);
      if (value !== null) {
        return value;
      }
    }
    return null;
  };
}

/**
 * Descendants of the card matching a query, in document order
 */
export function queryAll(card: ReviewCard, query: ElementQuery): Cheerio<Element> {
  return narrowByClass(card.node.find(query.selector), query);
}

function narrowByClass(found: Cheerio<Element>, query: ElementQuery): Cheerio<Element> {
  const { classMatch } = query;
  if (!classMatch) return found;
  return found.filter((_, element) => {
    const className = element.attribs['class'];
    return className !== undefined && classMatch(className);
  });
}

function queryFirst(card: ReviewCard, query: ElementQuery): Cheerio<Element> | null {
  const found = queryAll(card, query).first();
  return found.length > 0 ? found : null;
}

/**
 * Text of the first element matching the query, if long enough
 */
export function textFrom(query: ElementQuery, minLength = MIN_BODY_LENGTH): Extractor<string> {
  return (card) => {
    const element = queryFirst(card, query);
    if (!element) return null;
    const text = flattenText(element);
    return text.length >= minLength ? text : null;
  };
}

/**
 * Longest line of the card's text that is not rating/metadata
 */
export const longestParagraph: Extractor<string> = (card) => {
  const lines = flattenText(card.node, '\n')
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 30 && !isRatingLine(line));

  let longest: string | null = null;
  for (const line of lines) {
    if (longest === null || line.length > longest.length) {
      longest = line;
    }
  }
  return longest;
};

/**
 * First p/div/span whose text has a plausible length and reads as prose
 */
export const sentenceLikeChild: Extractor<string> = (card) => {
  for (const element of card.node.find('p, div, span').toArray()) {
    const text = flattenText(card.$(element));
    if (isRatingLine(text)) continue;
    if (text.length > 50 && text.length < 2000 && FUNCTION_WORDS.test(text)) {
      return text;
    }
  }
  return null;
};

/**
 * Rating from the first matching element's content/data-rating attribute or text
 */
export function ratingFrom(query: ElementQuery): Extractor<number> {
  return (card) => {
    const element = queryFirst(card, query);
    if (!element) return null;
    const value = element.attr('content') ?? element.attr('data-rating') ?? flattenText(element);
    return parseRatingValue(value);
  };
}

function acceptReviewerName(raw: string): string | null {
  const name = raw.replace(NAME_PREFIX, '').trim();
  if (name.length < 2 || name.length > 100) return null;
  if (PLACEHOLDER_NAMES.has(name.toLowerCase())) return null;
  return name;
}

function acceptCompanyName(raw: string): string | null {
  const name = raw.trim();
  if (name.length <= 2 || name.length >= 200) return null;
  if (PLACEHOLDER_NAMES.has(name.toLowerCase())) return null;
  return name;
}

function nameFrom(query: ElementQuery, accept: (raw: string) => string | null): Extractor<string> {
  return (card) => {
    const element = queryFirst(card, query);
    return element ? accept(flattenText(element)) : null;
  };
}

/**
 * Value of a data attribute on the card or a descendant, falling back to its text
 */
function attributeValue(card: ReviewCard, attribute: string): string | null {
  const own = card.node.attr(attribute);
  if (own !== undefined && own.trim().length > 0) return own.trim();

  const element = card.node.find(`[${attribute}]`).first();
  if (element.length === 0) return null;
  const value = element.attr(attribute)?.trim();
  return value && value.length > 0 ? value : flattenText(element);
}

function microdataName(card: ReviewCard, itemprop: string): string | null {
  const element = card.node.find(`[itemprop='${itemprop}']`).first();
  if (element.length === 0) return null;
  const nested = element.find("[itemprop='name']").first();
  const content = element.attr('content');
  if (nested.length > 0) return flattenText(nested);
  return content && content.trim().length > 0 ? content.trim() : flattenText(element);
}

/**
 * Reviewer from author microdata or data-reviewer/data-author/data-user
 */
export const structuredReviewer: Extractor<string> = (card) => {
  const author = microdataName(card, 'author');
  const accepted = author === null ? null : acceptReviewerName(author);
  if (accepted) return accepted;

  for (const attribute of ['data-reviewer', 'data-author', 'data-user']) {
    const value = attributeValue(card, attribute);
    const name = value === null ? null : acceptReviewerName(value);
    if (name) return name;
  }
  return null;
};

/**
 * Company from worksFor microdata or data-company/data-organization
 */
export const structuredCompany: Extractor<string> = (card) => {
  const worksFor = microdataName(card, 'worksFor');
  const accepted = worksFor === null ? null : acceptCompanyName(worksFor);
  if (accepted) return accepted;

  for (const attribute of ['data-company', 'data-organization']) {
    const value = attributeValue(card, attribute);
    const name = value === null ? null : acceptCompanyName(value);
    if (name) return name;
  }
  return null;
};

/**
 * Reviewer from the text of a link to a user/profile page
 */
export const profileLinkName: Extractor<string> = (card) => {
  for (const link of card.node.find('a[href]').toArray()) {
    const href = link.attribs['href'] ?? '';
    if (!/(user|profile|reviewer|author)/i.test(href)) continue;

    const text = flattenText(card.$(link));
    if (text.length < 2 || text.length > 50) continue;
    if (!/[a-zA-Z]/.test(text) || /^\d+$/.test(text)) continue;
    if (LINK_STOP_WORDS.has(text.toLowerCase())) continue;
    return text;
  }
  return null;
};

function textPatterns(
  patterns: readonly RegExp[],
  accept: (raw: string) => string | null
): Extractor<string> {
  return (card) => {
    const text = flattenText(card.node);
    for (const pattern of patterns) {
      const captured = text.match(pattern)?.[1];
      if (captured) {
        const name = accept(captured);
        if (name) return name;
      }
    }
    return null;
  };
}

// ============================================================================
// Field Cascades
// ============================================================================

interface FieldExtractors {
  body: Extractor<string>;
  rating: Extractor<number>;
  reviewer: Extractor<string>;
  company: Extractor<string>;
  title: Extractor<string>;
}

const extractorCache = new WeakMap<SiteProfile, FieldExtractors>();

/**
 * Build the layered extractors for a profile
 */
export function buildExtractors(profile: SiteProfile): FieldExtractors {
  const cached = extractorCache.get(profile);
  if (cached) return cached;

  const extractors: FieldExtractors = {
    body: firstSome(
      ...profile.text.map((query) => textFrom(query)),
      longestParagraph,
      sentenceLikeChild
    ),
    rating: firstSome(...profile.rating.map(ratingFrom)),
    reviewer: firstSome(
      structuredReviewer,
      ...profile.reviewerClasses.map((query) => nameFrom(query, acceptReviewerName)),
      profileLinkName,
      textPatterns(REVIEWER_TEXT_PATTERNS, acceptReviewerName)
    ),
    company: firstSome(
      structuredCompany,
      ...profile.companyClasses.map((query) => nameFrom(query, acceptCompanyName)),
      textPatterns(COMPANY_TEXT_PATTERNS, acceptCompanyName)
    ),
    title: firstSome(...profile.title.map((query) => textFrom(query, 1))),
  };

  extractorCache.set(profile, extractors);
  return extractors;
}

// ============================================================================
// Card Selection
// ============================================================================

/**
 * Elements matching a selector held in a variable
 */
function selectElements($: CheerioAPI, selector: string): Cheerio<Element> {
  return $(selector).filter((_, node): node is Element => isTag(node));
}

/**
 * Review cards of a page: the first card selector with any match wins,
 * then the profile's fallback lookup.
 */
export function selectCards(
  $: CheerioAPI,
  profile: SiteProfile,
  logger: Logger = silentLogger
): Element[] {
  for (const selector of profile.cardSelectors) {
    const found = selectElements($, selector);
    if (found.length > 0) {
      logger.debug('Card selector matched', { site: profile.site, selector, count: found.length });
      return found.toArray();
    }
  }

  if (profile.fallbackCards) {
    const found = narrowByClass(
      selectElements($, profile.fallbackCards.selector),
      profile.fallbackCards
    );
    if (found.length > 0) {
      logger.debug('Fallback card lookup matched', { site: profile.site, count: found.length });
      return found.toArray();
    }
  }

  logger.debug('No review cards found', { site: profile.site });
  return [];
}

/**
 * Extract raw review fields from every card on a page (no negativity filter)
 */
export function extractReviews(
  html: string,
  sourceUrl: string,
  options: ParseOptions = {}
): ExtractedReview[] {
  const logger = options.logger ?? silentLogger;
  const maxCards = options.maxCards ?? MAX_CARDS_PER_PAGE;
  const profile = selectSiteProfile(sourceUrl);
  const extractors = buildExtractors(profile);

  const $ = cheerio.load(html);
  const cards = selectCards($, profile, logger).slice(0, maxCards);

  const reviews: ExtractedReview[] = [];
  for (const element of cards) {
    const card: ReviewCard = { $, node: $(element) };
    const body = extractors.body(card);
    if (body === null || body.length < MIN_BODY_LENGTH) continue;

    reviews.push({
      title: extractors.title(card),
      body,
      rating: extractors.rating(card),
      reviewerName: extractors.reviewer(card),
      companyName: extractors.company(card),
    });
  }

  return reviews;
}

/**
 * Turn an extracted review into a scored record
 *
 * Pain tags come from the full text; the score sees the truncated body.
 */
export function toReviewRecord(
  review: ExtractedReview,
  sourceUrl: string,
  capturedAt: Date
): ReviewRecord {
  const body = truncate(review.body, MAX_BODY_LENGTH);
  const title =
    review.title && review.title.length > 0
      ? truncate(review.title, MAX_TITLE_LENGTH)
      : review.body.slice(0, TITLE_FROM_BODY_LENGTH);

  const record: ReviewRecord = {
    companyName: review.companyName ?? UNKNOWN,
    reviewerName: review.reviewerName ?? UNKNOWN,
    title,
    body,
    rating: review.rating,
    painTags: classifyPains(review.body),
    sourceUrl,
    capturedAt: capturedAt.toISOString(),
    leadScore: 0,
    status: 'new',
    notes: '',
  };
  record.leadScore = scoreLead(record);
  return record;
}

/**
 * Parse a review page into negative-review records
 *
 * @param html - Raw page HTML
 * @param sourceUrl - Page URL; selects the site profile and is stored on each record
 */
export function parseReviews(
  html: string,
  sourceUrl: string,
  options: ParseOptions = {}
): ReviewRecord[] {
  const capturedAt = (options.now ?? (() => new Date()))();
  const logger = options.logger ?? silentLogger;

  const reviews = extractReviews(html, sourceUrl, options);
  const records = reviews
    .filter((review) => isNegative(review.body, review.rating))
    .map((review) => toReviewRecord(review, sourceUrl, capturedAt));

  logger.debug('Parsed review page', {
    url: sourceUrl,
    cards: reviews.length,
    negative: records.length,
  });

  return records;
}

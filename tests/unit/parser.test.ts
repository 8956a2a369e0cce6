/**
 * Unit tests for the Parser Module
 * Site dispatch, layered field extraction and record building
 */

import { describe, test, expect } from '@jest/globals';
import * as cheerio from 'cheerio';
import {
  GENERIC_PROFILE,
  classHasAll,
  classHasAny,
  extractReviews,
  firstSome,
  isRatingLine,
  parseRatingValue,
  parseReviews,
  selectCards,
  selectSiteProfile,
  toReviewRecord,
  type Extractor,
  type ReviewCard,
} from '../../src/parser/index.js';

const NOW = () => new Date('2024-03-01T10:00:00.000Z');

const SCENARIO_BODY = 'Support response time was terrible and the UI is too complex to learn';

function page(cards: string): string {
  return `<html><head><title>Reviews</title></head><body>${cards}</body></html>`;
}

function cardOf(html: string): ReviewCard {
  const $ = cheerio.load(html);
  return { $, node: $('div').first() };
}

describe('Parser Module', () => {
  describe('selectSiteProfile()', () => {
    test.each([
      ['https://www.g2.com/products/acme/reviews', 'g2'],
      ['https://www.getapp.com/software/acme/reviews/', 'getapp'],
      ['https://www.trustradius.com/products/acme/reviews', 'trustradius'],
      ['https://www.softwareadvice.com/crm/acme/reviews/', 'softwareadvice'],
      ['https://notg2.com/reviews', 'generic'],
      ['https://reviews.example.com/acme', 'generic'],
    ])('%s uses the %s profile', (url, site) => {
      expect(selectSiteProfile(url).site).toBe(site);
    });
  });

  describe('helpers', () => {
    test('parseRatingValue() should take the first number', () => {
      expect(parseRatingValue('2.0 stars')).toBe(2);
      expect(parseRatingValue('Rated 4.5 out of 5')).toBe(4.5);
      expect(parseRatingValue('no rating')).toBeNull();
    });

    test('isRatingLine() should flag scores and labelled scores', () => {
      expect(isRatingLine('3.9 (168)')).toBe(true);
      expect(isRatingLine('Value for money 3.6')).toBe(true);
      expect(isRatingLine('Ease of use 4')).toBe(true);
      expect(isRatingLine('The product was hard to configure')).toBe(false);
      expect(isRatingLine('Support 24 hours a day was promised but never delivered')).toBe(false);
    });

    test('classHasAny() should test class tokens', () => {
      const matches = classHasAny('rating', 'star');
      expect(matches('card StarRating')).toBe(true);
      expect(matches('card body')).toBe(false);
    });

    test('classHasAll() should need every keyword in one token', () => {
      const matches = classHasAll('reviewer', 'name');
      expect(matches('reviewer-name bold')).toBe(true);
      expect(matches('reviewer name')).toBe(true);
      expect(matches('reviewer label')).toBe(false);
    });

    test('firstSome() should return the first non-null extractor result', () => {
      const calls: string[] = [];
      const none: Extractor<string> = () => {
        calls.push('none');
        return null;
      };
      const some: Extractor<string> = () => {
        calls.push('some');
        return 'value';
      };
      const never: Extractor<string> = () => {
        calls.push('never');
        return 'other';
      };

      expect(firstSome(none, some, never)(cardOf('<div></div>'))).toBe('value');
      expect(calls).toEqual(['none', 'some']);
      expect(firstSome(none)(cardOf('<div></div>'))).toBeNull();
    });
  });

  describe('generic profile', () => {
    const url = 'https://reviews.example.com/acme';

    test('should produce one scored record for the support/complexity scenario', () => {
      const html = page(
        `<div class="review-card"><span class="rating">2.0 stars</span><p>${SCENARIO_BODY}</p></div>`
      );

      const records = parseReviews(html, url, { now: NOW });

      expect(records).toHaveLength(1);
      expect(records[0]).toEqual({
        companyName: 'Unknown',
        reviewerName: 'Unknown',
        title: 'Support response time was terrible and the UI is t',
        body: SCENARIO_BODY,
        rating: 2,
        painTags: ['complexity', 'support'],
        sourceUrl: url,
        capturedAt: '2024-03-01T10:00:00.000Z',
        leadScore: 62,
        status: 'new',
        notes: '',
      });
    });

    test('should drop positive reviews without pain keywords', () => {
      const html = page(
        '<div class="review-card"><span class="rating">5 stars</span>' +
          '<p>Wonderful product, our team loves it every single day</p></div>'
      );

      expect(parseReviews(html, url, { now: NOW })).toEqual([]);
      expect(extractReviews(html, url)).toHaveLength(1);
    });

    test('should skip cards whose text is shorter than 20 characters', () => {
      const html = page('<div class="review-card"><p>Too slow.</p></div>');

      expect(extractReviews(html, url)).toEqual([]);
    });

    test('should return nothing for a page without review cards', () => {
      expect(parseReviews(page('<p>Nothing to see here</p>'), url)).toEqual([]);
    });

    test('should keep at most maxCards cards', () => {
      const card = `<div class="review-card"><span class="rating">1</span><p>${SCENARIO_BODY}</p></div>`;
      const html = page(card.repeat(5));

      expect(parseReviews(html, url, { maxCards: 3 })).toHaveLength(3);
    });

    test('should read reviewer and company from the generic class selectors', () => {
      const html = page(
        '<div class="review-card">' +
          '<h3>Not worth it</h3>' +
          '<span class="reviewer-name">Jane Doe</span>' +
          '<span class="company-name">Acme Corp</span>' +
          '<span class="rating">1</span>' +
          `<p>${SCENARIO_BODY}</p>` +
          '</div>'
      );

      const [record] = parseReviews(html, url, { now: NOW });

      expect(record?.title).toBe('Not worth it');
      expect(record?.reviewerName).toBe('Jane Doe');
      expect(record?.companyName).toBe('Acme Corp');
      // 30 + 30 + 7 + 5 + 5
      expect(record?.leadScore).toBe(77);
    });

    test('should fall back to "Reviewed by" text for the reviewer', () => {
      const html = page(
        '<div class="review-card"><span class="rating">2</span>' +
          `<p>${SCENARIO_BODY}</p><em>Reviewed by Sam Lee</em></div>`
      );

      const [record] = parseReviews(html, url, { now: NOW });

      expect(record?.reviewerName).toBe('Sam Lee');
    });

    test('should expose the generic profile for unknown hosts', () => {
      expect(selectSiteProfile(url)).toBe(GENERIC_PROFILE);
    });
  });

  describe('G2 profile', () => {
    test('should extract every field from a test-id card', () => {
      const html = page(
        '<div data-testid="review-1">' +
          '<h3 class="review-title">Too buggy</h3>' +
          '<span class="star-rating">1.5</span>' +
          '<span class="reviewer-name">Jane Doe</span>' +
          '<span class="company-label">Acme Corp</span>' +
          '<div class="review-content">The app crashes constantly and the pricing is far too expensive for us</div>' +
          '</div>'
      );

      const [record] = parseReviews(html, 'https://www.g2.com/products/widget/reviews', {
        now: NOW,
      });

      expect(record).toMatchObject({
        title: 'Too buggy',
        body: 'The app crashes constantly and the pricing is far too expensive for us',
        rating: 1.5,
        reviewerName: 'Jane Doe',
        companyName: 'Acme Corp',
        painTags: ['bugs', 'cost'],
        leadScore: 72,
      });
    });
  });

  describe('TrustRadius profile', () => {
    test('should read microdata body, rating, author and employer', () => {
      const html = page(
        '<div data-review-id="42">' +
          '<meta itemprop="ratingValue" content="2">' +
          '<span itemprop="author"><span itemprop="name">Sam Lee</span></span>' +
          '<span itemprop="worksFor">Globex</span>' +
          '<div itemprop="reviewBody">Integration with our CRM never worked and the sync keeps failing every night</div>' +
          '</div>'
      );

      const [record] = parseReviews(html, 'https://www.trustradius.com/products/widget/reviews', {
        now: NOW,
      });

      expect(record).toMatchObject({
        rating: 2,
        reviewerName: 'Sam Lee',
        companyName: 'Globex',
        painTags: ['integration'],
        leadScore: 55,
      });
    });
  });

  describe('selectCards()', () => {
    test('should return the elements of the first matching card selector', () => {
      const $ = cheerio.load(page('<div class="review-card">one</div><div class="review-card">two</div>'));

      const cards = selectCards($, selectSiteProfile('https://www.g2.com/products/widget/reviews'));

      expect(cards.map((card) => card.attribs['class'])).toEqual(['review-card', 'review-card']);
    });

    test('should narrow the fallback lookup by class', () => {
      const $ = cheerio.load(page('<div class="sidebar">menu</div><div class="user-comment">text</div>'));

      const cards = selectCards($, selectSiteProfile('https://www.getapp.com/software/widget/reviews/'));

      expect(cards.map((card) => `${card.tagName}.${card.attribs['class'] ?? ''}`)).toEqual([
        'div.user-comment',
      ]);
    });

    test('should return nothing when no card matches', () => {
      const $ = cheerio.load(page('<p>No reviews yet</p>'));

      expect(selectCards($, GENERIC_PROFILE)).toEqual([]);
    });
  });

  describe('GetApp profile', () => {
    test('should use the fallback card lookup and the longest prose line', () => {
      const html = page(
        '<div class="user-comment">' +
          '<p>Customer service never answered our tickets and onboarding was confusing</p>' +
          '<span>Rated 2</span>' +
          '</div>'
      );

      const [record] = parseReviews(html, 'https://www.getapp.com/software/widget/reviews/', {
        now: NOW,
      });

      expect(record).toMatchObject({
        body: 'Customer service never answered our tickets and onboarding was confusing',
        rating: null,
        reviewerName: 'Unknown',
        companyName: 'Unknown',
        painTags: ['complexity', 'support'],
        leadScore: 37,
      });
    });
  });

  describe('toReviewRecord()', () => {
    test('should truncate body and title and tag the full text', () => {
      const body = `${'a'.repeat(520)} too slow`;
      const record = toReviewRecord(
        { title: 'T'.repeat(120), body, rating: 2.5, reviewerName: null, companyName: null },
        'https://reviews.example.com/acme',
        NOW()
      );

      expect(record.body).toHaveLength(500);
      expect(record.title).toHaveLength(100);
      expect(record.painTags).toEqual(['performance']);
      // 20 + 20 + 7 + 10
      expect(record.leadScore).toBe(57);
      expect(record.leadScore).toBeWithinScoreRange();
    });
  });
});

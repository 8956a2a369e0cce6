/**
 * Unit tests for the host policy tables
 */

import { describe, test, expect } from '@jest/globals';
import {
  buildPageSequence,
  extractHostname,
  hostMatches,
  isAuthGated,
  isDenylisted,
  refererFor,
  requiresScripting,
  sourceBucket,
} from '../../src/hosts/index.js';

describe('Hosts Module', () => {
  describe('extractHostname()', () => {
    test.each([
      ['https://www.G2.com/products/acme/reviews', 'www.g2.com'],
      ['http://example.org:8080/path?q=1', 'example.org'],
      ['not a url', ''],
    ])('extractHostname(%j) is %j', (url, expected) => {
      expect(extractHostname(url)).toBe(expected);
    });
  });

  describe('hostMatches()', () => {
    test('should match the domain and its subdomains only', () => {
      expect(hostMatches('g2.com', 'g2.com')).toBe(true);
      expect(hostMatches('www.g2.com', 'g2.com')).toBe(true);
      expect(hostMatches('notg2.com', 'g2.com')).toBe(false);
    });
  });

  describe('host tables', () => {
    test.each([
      ['https://www.g2.com/products/acme/reviews', true],
      ['https://www.getapp.com/software/acme/reviews/', true],
      ['https://www.softwareadvice.com/crm/acme-profile/reviews/', true],
      ['https://reviews.example.com/acme', false],
    ])('requiresScripting(%j) is %p', (url, expected) => {
      expect(requiresScripting(url)).toBe(expected);
    });

    test('should denylist capterra on both top-level domains', () => {
      expect(isDenylisted('https://www.capterra.com/p/123/Acme/reviews/')).toBe(true);
      expect(isDenylisted('https://www.capterra.ca/software/123/acme')).toBe(true);
      expect(isDenylisted('https://www.g2.com/products/acme/reviews')).toBe(false);
    });

    test('should mark login-gated hosts', () => {
      expect(isAuthGated('https://www.linkedin.com/company/acme')).toBe(true);
      expect(isAuthGated('https://www.glassdoor.com/Reviews/acme')).toBe(true);
      expect(isAuthGated('https://www.trustradius.com/products/acme/reviews')).toBe(false);
    });

    test('should send a site-root referer to g2 and getapp only', () => {
      expect(refererFor('https://www.g2.com/products/acme/reviews')).toBe('https://www.g2.com/');
      expect(refererFor('https://www.getapp.com/software/acme')).toBe('https://www.getapp.com/');
      expect(refererFor('https://www.trustradius.com/products/acme')).toBeUndefined();
    });
  });

  describe('sourceBucket()', () => {
    test.each([
      ['https://www.g2.com/products/acme/reviews', 'G2'],
      ['https://www.getapp.com/software/acme', 'GetApp'],
      ['https://www.trustradius.com/products/acme', 'TrustRadius'],
      ['https://www.softwareadvice.com/crm/acme', 'Software Advice'],
      ['discovery:manual', 'Other'],
    ])('sourceBucket(%j) is %j', (url, expected) => {
      expect(sourceBucket(url)).toBe(expected);
    });
  });

  describe('buildPageSequence()', () => {
    test('should paginate known hosts on the query-stripped URL', () => {
      expect(buildPageSequence('https://www.g2.com/products/acme/reviews?sort=recent', 3)).toEqual([
        'https://www.g2.com/products/acme/reviews?sort=recent',
        'https://www.g2.com/products/acme/reviews?page=2',
        'https://www.g2.com/products/acme/reviews?page=3',
      ]);
    });

    test('should return only the URL for other hosts', () => {
      expect(buildPageSequence('https://reviews.example.com/acme', 3)).toEqual([
        'https://reviews.example.com/acme',
      ]);
    });

    test('should return only the first page when maxPages is 1', () => {
      expect(buildPageSequence('https://www.trustradius.com/products/acme', 1)).toEqual([
        'https://www.trustradius.com/products/acme',
      ]);
    });
  });
});

/**
 * Host tables
 *
 * Static per-host policy shared by the fetcher, crawler, parser and store.
 * Matching is by registrable domain: `www.g2.com` and `g2.com` both match `g2.com`.
 */

/**
 * Hosts whose review pages render client-side; scripted fetch goes first
 */
export const SCRIPTED_HOSTS: readonly string[] = [
  'g2.com',
  'getapp.com',
  'capterra.com',
  'trustradius.com',
  'softwareadvice.com',
];

/**
 * Hosts whose terms of service forbid automated collection
 */
export const DENYLISTED_HOSTS: readonly string[] = ['capterra.com', 'capterra.ca'];

/**
 * Hosts that only serve content behind a login; crawling them is a no-op
 */
export const AUTH_GATED_HOSTS: readonly string[] = ['linkedin.com', 'glassdoor.com'];

/**
 * Hosts that paginate reviews with a `?page=N` query parameter
 */
export const PAGINATED_HOSTS: readonly string[] = ['g2.com', 'trustradius.com', 'getapp.com'];

/**
 * Referer sent with plain HTTP requests to these hosts
 */
export const REFERERS: Readonly<Record<string, string>> = {
  'g2.com': 'https://www.g2.com/',
  'getapp.com': 'https://www.getapp.com/',
};

/**
 * Coarse source-site buckets used by analytics, first match wins
 */
export const SOURCE_BUCKETS: ReadonlyArray<readonly [string, string]> = [
  ['g2.com', 'G2'],
  ['getapp.com', 'GetApp'],
  ['trustradius.com', 'TrustRadius'],
  ['softwareadvice.com', 'Software Advice'],
];

export const OTHER_SOURCE = 'Other';

/**
 * Sites recommended in place of a denylisted one
 */
export const RECOMMENDED_SITES = ['G2', 'GetApp', 'TrustRadius', 'Software Advice'];

/**
 * Lower-cased hostname of a URL, or '' when it cannot be parsed
 */
export function extractHostname(url: string): string {
  try {
    return new URL(url).hostname.toLowerCase();
  } catch {
    const match = url.match(/^[a-z][a-z0-9+.-]*:\/\/([^/?#:]+)/i);
    return match?.[1]?.toLowerCase() ?? '';
  }
}

/**
 * Whether a hostname is the given domain or one of its subdomains
 */
export function hostMatches(hostname: string, domain: string): boolean {
  return hostname === domain || hostname.endsWith(`.${domain}`);
}

/**
 * First domain of the table served by the URL's host, if any
 */
export function matchHost(url: string, domains: readonly string[]): string | undefined {
  const hostname = extractHostname(url);
  if (hostname === '') return undefined;
  return domains.find((domain) => hostMatches(hostname, domain));
}

export function requiresScripting(url: string): boolean {
  return matchHost(url, SCRIPTED_HOSTS) !== undefined;
}

export function isDenylisted(url: string): boolean {
  return matchHost(url, DENYLISTED_HOSTS) !== undefined;
}

export function isAuthGated(url: string): boolean {
  return matchHost(url, AUTH_GATED_HOSTS) !== undefined;
}

/**
 * Referer for a URL's host, if the host expects one
 */
export function refererFor(url: string): string | undefined {
  const domain = matchHost(url, Object.keys(REFERERS));
  return domain === undefined ? undefined : REFERERS[domain];
}

/**
 * Analytics bucket of a source URL (substring match on the known hostnames)
 */
export function sourceBucket(sourceUrl: string): string {
  const lowered = sourceUrl.toLowerCase();
  const bucket = SOURCE_BUCKETS.find(([domain]) => lowered.includes(domain));
  return bucket ? bucket[1] : OTHER_SOURCE;
}

/**
 * Page sequence for a URL: the URL itself, then `?page=2..maxPages`
 * on the query-stripped URL for paginated hosts
 */
export function buildPageSequence(url: string, maxPages: number): string[] {
  const pages = [url];
  if (matchHost(url, PAGINATED_HOSTS) === undefined) {
    return pages;
  }

  const base = url.split('?')[0] ?? url;
  for (let page = 2; page <= maxPages; page++) {
    pages.push(`${base}?page=${page}`);
  }
  return pages;
}

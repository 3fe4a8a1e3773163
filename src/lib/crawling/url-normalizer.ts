/**
 * URL Normalization Utilities
 * Functions for normalizing, resolving and scoping URLs
 */

/**
 * Normalize a URL for visited-set keys: drop the fragment, sort query params,
 * lower-case the host and drop a trailing slash (except for root)
 */
export function normalizeUrl(url: string, baseUrl?: string): string {
  try {
    const urlObj = baseUrl ? new URL(url, baseUrl) : new URL(url);

    urlObj.hash = '';

    const sortedParams = Array.from(urlObj.searchParams.entries()).sort(([a], [b]) =>
      a.localeCompare(b)
    );
    urlObj.search = '';
    sortedParams.forEach(([key, value]) => {
      urlObj.searchParams.append(key, value);
    });

    if (urlObj.pathname.length > 1 && urlObj.pathname.endsWith('/')) {
      urlObj.pathname = urlObj.pathname.slice(0, -1);
    }

    urlObj.hostname = urlObj.hostname.toLowerCase();

    return urlObj.href;
  } catch {
    // If URL parsing fails, return original
    return url;
  }
}

/**
 * Resolve a possibly relative href against the page it was found on
 */
export function resolveUrl(href: string, baseUrl: string): string | null {
  try {
    return new URL(href, baseUrl).href;
  } catch {
    return null;
  }
}

/**
 * Only http(s) links are crawlable
 */
export function isHttpUrl(url: string): boolean {
  try {
    const { protocol } = new URL(url);
    return protocol === 'http:' || protocol === 'https:';
  } catch {
    return false;
  }
}

/**
 * Extract hostname from URL, without a leading "www."
 */
export function extractDomain(url: string): string {
  try {
    let hostname = new URL(url).hostname.toLowerCase();
    if (hostname.startsWith('www.')) {
      hostname = hostname.substring(4);
    }
    return hostname;
  } catch {
    return '';
  }
}

/**
 * True when the URL's host is the domain or one of its sub-domains
 */
export function isWithinDomain(url: string, domain: string): boolean {
  const host = extractDomain(url);
  const allowed = domain.toLowerCase().replace(/^www\./, '');
  if (!host || !allowed) {
    return false;
  }
  return host === allowed || host.endsWith(`.${allowed}`);
}

/**
 * Origin used to look up robots.txt and per-domain throttling
 */
export function originOf(url: string): string {
  try {
    return new URL(url).origin;
  } catch {
    return '';
  }
}

/**
 * URL Canonicalization Utility
 * Normalizes URLs for crawl identity, structured-data lookups and domain checks
 */

import * as psl from 'psl';

const TRACKING_PARAMS = [
  'gclid',
  'fbclid',
  'msclkid',
  '_ga',
  'mc_cid',
  'mc_eid',
  'ref',
  'srsltid',
];

function isHttp(urlObj: URL): boolean {
  return urlObj.protocol === 'http:' || urlObj.protocol === 'https:';
}

/**
 * Scheme + host + path with trailing slashes stripped.
 * Query and fragment are dropped. Used to key structured-data listings.
 */
export function canonUrl(url: string): string {
  const trimmed = (url || '').trim();
  try {
    const urlObj = new URL(trimmed);
    if (!isHttp(urlObj)) {
      return trimmed.replace(/\/+$/, '');
    }
    return `${urlObj.protocol}//${urlObj.host}${urlObj.pathname}`.replace(/\/+$/, '');
  } catch {
    return trimmed.replace(/\/+$/, '');
  }
}

/**
 * Identity of a URL inside a site crawl:
 * 1. Scheme dropped (http and https are the same page)
 * 2. Lowercase host without 'www.'
 * 3. Trailing slashes removed
 * 4. Fragment and tracking parameters removed
 * 5. Remaining query parameters sorted (so ?page=2 stays distinct)
 */
export function visitKey(url: string): string {
  try {
    const urlObj = new URL(url);

    let host = urlObj.host.toLowerCase();
    if (host.startsWith('www.')) {
      host = host.substring(4);
    }

    const pathname = urlObj.pathname.replace(/\/+$/, '');

    const filteredParams = new URLSearchParams();
    for (const [key, value] of urlObj.searchParams.entries()) {
      const lower = key.toLowerCase();
      if (!lower.startsWith('utm_') && !TRACKING_PARAMS.includes(lower)) {
        filteredParams.append(key, value);
      }
    }
    filteredParams.sort();

    const query = filteredParams.toString();
    return `${host}${pathname}${query ? `?${query}` : ''}`;
  } catch {
    return url.trim();
  }
}

/**
 * Lowercase hostname without port, or '' when the URL does not parse
 */
export function hostOf(url: string): string {
  try {
    return new URL(url).hostname.toLowerCase();
  } catch {
    return '';
  }
}

/**
 * Registrable domain (eTLD+1) of a URL, e.g. "shop.example.com.eg" -> "example.com.eg".
 * Falls back to the bare host for IPs and single-label hosts.
 */
export function registrableDomain(url: string): string {
  const host = hostOf(url);
  if (!host) {
    return url;
  }
  return psl.get(host) ?? host.replace(/^www\./, '');
}

/**
 * A discovered link belongs to the site when its host ends with the host of
 * the page it was found on (subdomains of that host are accepted).
 */
export function isSameSite(candidateUrl: string, pageUrl: string): boolean {
  const pageHost = hostOf(pageUrl);
  if (!pageHost) {
    return false;
  }
  return hostOf(candidateUrl).endsWith(pageHost);
}

export function isHttpUrl(url: string): boolean {
  try {
    return isHttp(new URL(url));
  } catch {
    return false;
  }
}

/**
 * Resolve an href against a base URL. An empty href resolves to the base itself;
 * an unresolvable one yields ''.
 */
export function resolveUrl(baseUrl: string, href: string | undefined): string {
  const trimmed = (href || '').trim();
  if (!trimmed) {
    return baseUrl;
  }
  try {
    return new URL(trimmed, baseUrl).href;
  } catch {
    return '';
  }
}

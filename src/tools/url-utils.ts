/**
 * URL Utilities
 */

const SCHEME_PATTERN = /^https?:\/\//i;
const IPV4_PATTERN = /^\d{1,3}(\.\d{1,3}){3}$/;

/**
 * Normalize a URL typed by a user or a model.
 *
 * Strips whitespace and backticks, defaults the scheme to https, and adds a
 * `www.` prefix to bare registrable domains (`example.com`). Hosts that already
 * carry a subdomain, IP addresses and localhost are left alone.
 *
 * @throws TypeError when the result is not a valid URL
 */
export function normalizeUrl(raw: string): string {
  let value = raw.trim().replace(/^`+|`+$/g, '').trim();
  if (!SCHEME_PATTERN.test(value)) {
    value = `https://${value}`;
  }

  const url = new URL(value);
  const labels = url.hostname.split('.');
  if (labels.length === 2 && !IPV4_PATTERN.test(url.hostname)) {
    url.hostname = `www.${url.hostname}`;
  }
  return url.toString();
}

/**
 * Substitute a URL-encoded query into a `{query}` template.
 */
export function buildSearchUrl(template: string, query: string): string {
  return template.split('{query}').join(encodeURIComponent(query.trim()));
}

/**
 * Return the URL with a `filter` query parameter set.
 */
export function withFilterParam(url: string, criteria: string): string {
  const parsed = new URL(url);
  parsed.searchParams.set('filter', criteria.trim());
  return parsed.toString();
}

/**
 * Source labelling and URL helpers.
 * Pattern matching on the hostname only (no HTTP).
 */

export const SOURCE_LABELS: ReadonlyArray<readonly [domain: string, label: string]> = [
  ['github.com', 'GitHub'],
  ['medium.com', 'Medium'],
  ['reddit.com', 'Reddit'],
  ['leetcode.com', 'LeetCode'],
  ['hackerrank.com', 'HackerRank'],
  ['stratascratch.com', 'StrataScratch'],
  ['geeksforgeeks.org', 'GeeksforGeeks'],
  ['w3schools.com', 'W3Schools'],
  ['kaggle.com', 'Kaggle'],
  ['stackoverflow.com', 'StackOverflow'],
  ['interviewbit.com', 'InterviewBit'],
  ['tutorialspoint.com', 'TutorialsPoint'],
];

function parseUrl(url: string): URL | null {
  try {
    const s = url.trim();
    const withProtocol = /^https?:\/\//i.test(s) ? s : `https://${s}`;
    return new URL(withProtocol);
  } catch {
    return null;
  }
}

export function hostOf(url: string): string {
  return parseUrl(url)?.hostname.toLowerCase() ?? '';
}

/**
 * Short label for a URL's site, e.g. "GitHub" for gist.github.com.
 * Unknown sites fall back to the raw hostname.
 */
export function sourceLabelFor(url: string): string {
  const host = hostOf(url);
  if (!host) return url;
  for (const [domain, label] of SOURCE_LABELS) {
    if (host === domain || host.endsWith(`.${domain}`)) return label;
  }
  return host;
}

/**
 * Canonical form used to spot the same page reached through different links:
 * https, lowercase host, no fragment, no utm_* params, sorted query, no trailing slash.
 */
export function normalizeUrl(url: string): string {
  const parsed = parseUrl(url);
  if (!parsed) return url.trim();

  parsed.protocol = 'https:';
  parsed.hash = '';
  parsed.pathname = parsed.pathname.replace(/\/+$/, '') || '/';
  const kept = [...parsed.searchParams.entries()]
    .filter(([k]) => !k.toLowerCase().startsWith('utm_'))
    .sort(([a], [b]) => a.localeCompare(b));
  parsed.search = kept.length ? `?${new URLSearchParams(kept).toString()}` : '';
  return parsed.toString();
}

/**
 * Fuzzy token-set similarity, 0-100.
 *
 * Strings are reduced to sets of lowercase alphanumeric tokens, so word order,
 * case, punctuation and repeated words do not matter. When one token set
 * contains the other the ratio is 100. Otherwise the ratio is the best Indel
 * ratio among the sorted intersection and the intersection extended with each
 * side's remaining tokens. Used by relevance scoring and candidate dedupe.
 */

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter(Boolean);
}

/** Length of the longest common subsequence of two strings. */
function lcsLength(a: string, b: string): number {
  if (!a.length || !b.length) return 0;
  let prev = new Array<number>(b.length + 1).fill(0);
  let curr = new Array<number>(b.length + 1).fill(0);

  for (let i = 1; i <= a.length; i++) {
    for (let j = 1; j <= b.length; j++) {
      curr[j] =
        a[i - 1] === b[j - 1] ? (prev[j - 1] ?? 0) + 1 : Math.max(prev[j] ?? 0, curr[j - 1] ?? 0);
    }
    [prev, curr] = [curr, prev];
  }
  return prev[b.length] ?? 0;
}

/**
 * Normalized Indel similarity: 100 * 2 * LCS / (len(a) + len(b)).
 */
export function indelRatio(a: string, b: string): number {
  const total = a.length + b.length;
  if (total === 0) return 100;
  return (200 * lcsLength(a, b)) / total;
}

export function tokenSetRatio(a: string, b: string): number {
  const setA = new Set(tokenize(a));
  const setB = new Set(tokenize(b));
  if (setA.size === 0 || setB.size === 0) return 0;

  const common = [...setA].filter((t) => setB.has(t)).sort();
  const onlyA = [...setA].filter((t) => !setB.has(t)).sort();
  const onlyB = [...setB].filter((t) => !setA.has(t)).sort();

  if (common.length > 0 && (onlyA.length === 0 || onlyB.length === 0)) return 100;

  const base = common.join(' ');
  const withA = [base, onlyA.join(' ')].filter(Boolean).join(' ');
  const withB = [base, onlyB.join(' ')].filter(Boolean).join(' ');

  return Math.max(indelRatio(base, withA), indelRatio(base, withB), indelRatio(withA, withB));
}

/** tokenSetRatio scaled to 0-1. */
export function similarity(a: string, b: string): number {
  return tokenSetRatio(a, b) / 100;
}

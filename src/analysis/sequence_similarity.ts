/**
 * @fileoverview Token-sequence similarity for canonical signatures
 *
 * The ratio is 2 * LCS / (m + n): one minus the normalised insert/delete
 * edit distance. It is symmetric in its arguments.
 */

/**
 * Longest-common-subsequence ratio of two token sequences.
 */
export function lcsRatio(tokens1: readonly string[], tokens2: readonly string[]): number {
  const m = tokens1.length;
  const n = tokens2.length;

  if (m === 0 || n === 0) return 0;

  // Use space-optimized LCS
  const dp = new Uint32Array(n + 1);

  for (let i = 1; i <= m; i++) {
    let prev = 0;
    for (let j = 1; j <= n; j++) {
      const temp = dp[j];
      if (tokens1[i - 1] === tokens2[j - 1]) {
        dp[j] = prev + 1;
      } else {
        dp[j] = Math.max(dp[j], dp[j - 1]);
      }
      prev = temp;
    }
  }

  return (2 * dp[n]) / (m + n);
}

/** Upper bound from lengths alone. */
export function lengthRatioBound(length1: number, length2: number): number {
  if (length1 === 0 || length2 === 0) return 0;
  return (2 * Math.min(length1, length2)) / (length1 + length2);
}

export type TokenHistogram = Map<string, number>;

export function buildHistogram(tokens: readonly string[]): TokenHistogram {
  const histogram: TokenHistogram = new Map();
  for (const token of tokens) {
    histogram.set(token, (histogram.get(token) ?? 0) + 1);
  }
  return histogram;
}

/**
 * Upper bound from shared token counts, ignoring order. Never below the
 * true ratio.
 */
export function histogramRatioBound(
  histogram1: TokenHistogram,
  length1: number,
  histogram2: TokenHistogram,
  length2: number,
): number {
  if (length1 === 0 || length2 === 0) return 0;
  let shared = 0;
  const [smaller, larger] = histogram1.size <= histogram2.size ? [histogram1, histogram2] : [histogram2, histogram1];
  for (const [token, count] of smaller) {
    shared += Math.min(count, larger.get(token) ?? 0);
  }
  return (2 * shared) / (length1 + length2);
}

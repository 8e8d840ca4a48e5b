/**
 * Insertion/deletion edit-distance ratio in [0, 1]:
 *   (|a| + |b| - distance) / (|a| + |b|)
 * which equals 2 * LCS(a, b) / (|a| + |b|). Case-insensitive.
 */
export function similarityRatio(leftRaw: string, rightRaw: string): number {
  return normalizedRatio(normalizeForSimilarity(leftRaw), normalizeForSimilarity(rightRaw));
}

export function indelDistance(left: string, right: string): number {
  return left.length + right.length - 2 * longestCommonSubsequence(left, right);
}

export function normalizeForSimilarity(value: string): string {
  return value.trim().toLowerCase();
}

// Ratio of two already-normalized strings.
export function normalizedRatio(left: string, right: string): number {
  const total = left.length + right.length;
  if (total === 0) return 1;
  if (!left || !right) return 0;
  if (left === right) return 1;
  return (2 * longestCommonSubsequence(left, right)) / total;
}

// Upper bounds on normalizedRatio, cheapest first.
export function lengthBound(left: string, right: string): number {
  const total = left.length + right.length;
  if (total === 0) return 1;
  return (2 * Math.min(left.length, right.length)) / total;
}

export function charBound(left: string, right: string): number {
  const total = left.length + right.length;
  if (total === 0) return 1;
  const counts = new Map<string, number>();
  for (const ch of left) counts.set(ch, (counts.get(ch) ?? 0) + 1);
  let shared = 0;
  for (const ch of right) {
    const available = counts.get(ch) ?? 0;
    if (available > 0) {
      counts.set(ch, available - 1);
      shared += 1;
    }
  }
  return (2 * shared) / total;
}

export type BestMatch<T> = { item: T; score: number };

export type Scorer = (left: string, right: string) => number;

/**
 * Highest score at or above the cutoff; ties keep the earlier candidate.
 * Candidates whose upper bound cannot reach the cutoff, or beat the current
 * best, are skipped without scoring. The scorer receives trimmed, lowercased
 * strings.
 */
export function bestMatch<T>(
  query: string,
  candidates: readonly T[],
  key: (candidate: T) => string,
  cutoff: number,
  scorer: Scorer = normalizedRatio
): BestMatch<T> | null {
  const needle = normalizeForSimilarity(query);
  if (!needle) return null;

  let best: BestMatch<T> | null = null;
  for (const item of candidates) {
    const candidate = normalizeForSimilarity(key(item));
    if (!canWin(lengthBound(needle, candidate), cutoff, best)) continue;
    if (!canWin(charBound(needle, candidate), cutoff, best)) continue;

    const score = scorer(needle, candidate);
    if (canWin(score, cutoff, best)) best = { item, score };
  }
  return best;
}

function canWin<T>(score: number, cutoff: number, best: BestMatch<T> | null) {
  if (score < cutoff) return false;
  return !best || score > best.score;
}

// Two rolling rows, reused across calls.
let rowA = new Int32Array(64);
let rowB = new Int32Array(64);

function longestCommonSubsequence(left: string, right: string): number {
  const width = right.length + 1;
  if (rowA.length < width) {
    rowA = new Int32Array(width * 2);
    rowB = new Int32Array(width * 2);
  }
  let prev = rowA;
  let curr = rowB;
  prev.fill(0, 0, width);
  curr[0] = 0;

  for (let i = 1; i <= left.length; i += 1) {
    const ch = left[i - 1];
    for (let j = 1; j <= right.length; j += 1) {
      curr[j] = ch === right[j - 1] ? prev[j - 1] + 1 : Math.max(prev[j], curr[j - 1]);
    }
    const swap = prev;
    prev = curr;
    curr = swap;
  }
  return prev[right.length];
}

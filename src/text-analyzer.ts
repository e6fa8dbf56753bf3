// Pure text analysis: response normalization and fuzzy similarity scoring.
// All functions are pure.
//
// Design: this module is the seam for alternative scorers.
// MatchEngine takes any SimilarityScorer; weightedRatio is the default.

import { MISSING, type NormalizedValue, type RawCell } from './types.js';
import {
  PARTIAL_MIN_LENGTH_RATIO,
  PARTIAL_LONG_LENGTH_RATIO,
  PARTIAL_SCALE,
  PARTIAL_SCALE_LONG,
  TOKEN_SCALE,
} from './thresholds.js';

/** Scores a candidate against a query, 0 (unrelated) to 100 (identical) */
export type SimilarityScorer = (query: string, candidate: string) => number;

/** Clean a raw cell for matching and categorization.
 *  Lowercase, keep only [a-z0-9] and spaces, collapse whitespace, trim.
 *  Absent cells and cells with nothing left after cleaning become MISSING. */
export function normalizeResponse(raw: RawCell | undefined): NormalizedValue {
  if (raw === null || raw === undefined) return MISSING;
  if (typeof raw === 'number' && Number.isNaN(raw)) return MISSING;

  const cleaned = String(raw)
    .toLowerCase()
    .replace(/[^a-z0-9\s]/g, '')
    .replace(/\s+/g, ' ')
    .trim();

  return cleaned.length > 0 ? cleaned : MISSING;
}

/** Scoring pre-process: punctuation becomes a token boundary rather than vanishing */
export function processForScoring(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, ' ')
    .trim();
}

/** Length of the longest common subsequence, two-row DP */
function lcsLength(a: string, b: string): number {
  if (a.length === 0 || b.length === 0) return 0;
  let prev = new Array<number>(b.length + 1).fill(0);
  let curr = new Array<number>(b.length + 1).fill(0);

  for (let i = 1; i <= a.length; i++) {
    for (let j = 1; j <= b.length; j++) {
      curr[j] = a[i - 1] === b[j - 1]
        ? prev[j - 1] + 1
        : Math.max(prev[j], curr[j - 1]);
    }
    [prev, curr] = [curr, prev];
  }
  return prev[b.length];
}

/** Indel similarity: 2 * LCS / (|a| + |b|), scaled to 0–100 */
export function ratio(a: string, b: string): number {
  const total = a.length + b.length;
  if (total === 0) return 0;
  return (200 * lcsLength(a, b)) / total;
}

/** Best ratio of the shorter string against every same-length window of the longer one */
export function partialRatio(a: string, b: string): number {
  const [shorter, longer] = a.length <= b.length ? [a, b] : [b, a];
  if (shorter.length === 0) return 0;
  if (shorter.length === longer.length) return ratio(shorter, longer);

  let best = 0;
  for (let start = 0; start + shorter.length <= longer.length; start++) {
    const score = ratio(shorter, longer.slice(start, start + shorter.length));
    if (score > best) best = score;
    if (best === 100) break;
  }
  return best;
}

function tokens(text: string): string[] {
  return text.split(' ').filter(t => t.length > 0);
}

function sortedTokens(text: string): string {
  return tokens(text).sort().join(' ');
}

/** Ratio after sorting tokens: "world hello" == "hello world" */
export function tokenSortRatio(a: string, b: string, partial = false): number {
  const sa = sortedTokens(a);
  const sb = sortedTokens(b);
  return partial ? partialRatio(sa, sb) : ratio(sa, sb);
}

/** Ratio over shared tokens plus each side's leftovers; ignores duplicated and extra words */
export function tokenSetRatio(a: string, b: string, partial = false): number {
  const ta = new Set(tokens(a));
  const tb = new Set(tokens(b));
  if (ta.size === 0 || tb.size === 0) return 0;

  const intersection = [...ta].filter(t => tb.has(t)).sort();
  // Any shared word is a full partial hit
  if (partial && intersection.length > 0) return 100;

  const onlyA = [...ta].filter(t => !tb.has(t)).sort();
  const onlyB = [...tb].filter(t => !ta.has(t)).sort();

  const t0 = intersection.join(' ');
  const t1 = [...intersection, ...onlyA].join(' ');
  const t2 = [...intersection, ...onlyB].join(' ');

  const score = partial ? partialRatio : ratio;
  return Math.max(score(t0, t1), score(t0, t2), score(t1, t2));
}

/** Weighted ratio: best of plain, partial and token-based scores.
 *  Partial scoring only applies when the strings differ markedly in length. */
export const weightedRatio: SimilarityScorer = (query, candidate) => {
  const a = processForScoring(query);
  const b = processForScoring(candidate);
  if (a.length === 0 || b.length === 0) return 0;

  const base = ratio(a, b);
  const lengthRatio = Math.max(a.length, b.length) / Math.min(a.length, b.length);

  if (lengthRatio < PARTIAL_MIN_LENGTH_RATIO) {
    return Math.round(Math.max(
      base,
      tokenSortRatio(a, b) * TOKEN_SCALE,
      tokenSetRatio(a, b) * TOKEN_SCALE,
    ));
  }

  const partialScale = lengthRatio > PARTIAL_LONG_LENGTH_RATIO ? PARTIAL_SCALE_LONG : PARTIAL_SCALE;
  return Math.round(Math.max(
    base,
    partialRatio(a, b) * partialScale,
    tokenSortRatio(a, b, true) * TOKEN_SCALE * partialScale,
    tokenSetRatio(a, b, true) * TOKEN_SCALE * partialScale,
  ));
};

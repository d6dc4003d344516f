// src/metrics.ts
//
// Pairwise string similarity functions. Every metric takes two already-normalized
// strings, works on Unicode code points and returns a value in [0, 1].

export type SimilarityMetric = (a: string, b: string) => number;

function codePoints(text: string): string[] {
  return Array.from(text);
}

function tokenize(text: string): string[] {
  return text.split(/\s+/).filter(Boolean);
}

// Jaro and block matching scan one side against the other; fixing the argument
// order keeps them symmetric.
function ordered(a: string, b: string): [string, string] {
  return a <= b ? [a, b] : [b, a];
}

export function levenshteinDistance(a: string, b: string): number {
  const s1 = codePoints(a);
  const s2 = codePoints(b);
  if (s1.length === 0) return s2.length;
  if (s2.length === 0) return s1.length;

  let previous = Array.from({ length: s2.length + 1 }, (_, j) => j);
  for (let i = 1; i <= s1.length; i++) {
    const current = [i];
    for (let j = 1; j <= s2.length; j++) {
      const cost = s1[i - 1] === s2[j - 1] ? 0 : 1;
      current[j] = Math.min(
        previous[j] + 1, // deletion
        current[j - 1] + 1, // insertion
        previous[j - 1] + cost, // substitution
      );
    }
    previous = current;
  }
  return previous[s2.length];
}

export function editDistanceRatio(a: string, b: string): number {
  const maxLength = Math.max(codePoints(a).length, codePoints(b).length);
  if (maxLength === 0) return 1;
  return 1 - levenshteinDistance(a, b) / maxLength;
}

export function jaroSimilarity(a: string, b: string): number {
  if (!a || !b) return 0;
  if (a === b) return 1;

  const [first, second] = ordered(a, b);
  const s1 = codePoints(first);
  const s2 = codePoints(second);
  const window = Math.max(Math.floor(Math.max(s1.length, s2.length) / 2) - 1, 0);

  const s1Matches = new Array<boolean>(s1.length).fill(false);
  const s2Matches = new Array<boolean>(s2.length).fill(false);
  let matches = 0;

  for (let i = 0; i < s1.length; i++) {
    const start = Math.max(0, i - window);
    const end = Math.min(i + window + 1, s2.length);
    for (let j = start; j < end; j++) {
      if (s2Matches[j] || s1[i] !== s2[j]) continue;
      s1Matches[i] = true;
      s2Matches[j] = true;
      matches++;
      break;
    }
  }

  if (matches === 0) return 0;

  let transpositions = 0;
  let k = 0;
  for (let i = 0; i < s1.length; i++) {
    if (!s1Matches[i]) continue;
    while (!s2Matches[k]) k++;
    if (s1[i] !== s2[k]) transpositions++;
    k++;
  }

  const halfTranspositions = transpositions / 2;
  return (matches / s1.length + matches / s2.length + (matches - halfTranspositions) / matches) / 3;
}

/** Overlapping n-length substrings; a string shorter than n is its own only gram. */
export function ngrams(text: string, n = 2): Set<string> {
  const chars = codePoints(text);
  if (chars.length < n) return new Set([text]);
  const grams = new Set<string>();
  for (let i = 0; i <= chars.length - n; i++) {
    grams.add(chars.slice(i, i + n).join(""));
  }
  return grams;
}

export function ngramJaccard(a: string, b: string, n = 2): number {
  if (!a && !b) return 1;
  if (!a || !b) return 0;

  const grams1 = ngrams(a, n);
  const grams2 = ngrams(b, n);
  let intersection = 0;
  for (const gram of grams1) {
    if (grams2.has(gram)) intersection++;
  }
  const union = grams1.size + grams2.size - intersection;
  return union > 0 ? intersection / union : 0;
}

export function tokenSortRatio(a: string, b: string): number {
  const sorted1 = tokenize(a).sort().join(" ");
  const sorted2 = tokenize(b).sort().join(" ");
  return editDistanceRatio(sorted1, sorted2);
}

export function tokenSetRatio(a: string, b: string): number {
  const tokens1 = new Set(tokenize(a));
  const tokens2 = new Set(tokenize(b));
  if (tokens1.size === 0 && tokens2.size === 0) return 1;

  const intersection = [...tokens1].filter((token) => tokens2.has(token)).sort().join(" ");
  const sorted1 = [...tokens1].sort().join(" ");
  const sorted2 = [...tokens2].sort().join(" ");

  return Math.max(
    editDistanceRatio(intersection, sorted1),
    editDistanceRatio(intersection, sorted2),
    editDistanceRatio(sorted1, sorted2),
  );
}

interface MatchingBlock {
  aStart: number;
  bStart: number;
  size: number;
}

function findLongestMatch(
  a: string[],
  b2j: Map<string, number[]>,
  aLow: number,
  aHigh: number,
  bLow: number,
  bHigh: number,
): MatchingBlock {
  let best: MatchingBlock = { aStart: aLow, bStart: bLow, size: 0 };
  let runLengths = new Map<number, number>();

  for (let i = aLow; i < aHigh; i++) {
    const nextRunLengths = new Map<number, number>();
    for (const j of b2j.get(a[i]) ?? []) {
      if (j < bLow) continue;
      if (j >= bHigh) break;
      const size = (runLengths.get(j - 1) ?? 0) + 1;
      nextRunLengths.set(j, size);
      if (size > best.size) {
        best = { aStart: i - size + 1, bStart: j - size + 1, size };
      }
    }
    runLengths = nextRunLengths;
  }
  return best;
}

/** Total size of the matching blocks found by recursive longest-common-substring splitting. */
export function matchingCharacters(a: string, b: string): number {
  const s1 = codePoints(a);
  const s2 = codePoints(b);
  const b2j = new Map<string, number[]>();
  s2.forEach((char, j) => {
    const positions = b2j.get(char);
    if (positions) positions.push(j);
    else b2j.set(char, [j]);
  });

  let total = 0;
  const queue: Array<[number, number, number, number]> = [[0, s1.length, 0, s2.length]];
  while (queue.length > 0) {
    const range = queue.pop();
    if (!range) break;
    const [aLow, aHigh, bLow, bHigh] = range;
    const { aStart, bStart, size } = findLongestMatch(s1, b2j, aLow, aHigh, bLow, bHigh);
    if (size === 0) continue;

    total += size;
    if (aLow < aStart && bLow < bStart) queue.push([aLow, aStart, bLow, bStart]);
    if (aStart + size < aHigh && bStart + size < bHigh) queue.push([aStart + size, aHigh, bStart + size, bHigh]);
  }
  return total;
}

export function sequenceMatchRatio(a: string, b: string): number {
  const [first, second] = ordered(a, b);
  const length = codePoints(first).length + codePoints(second).length;
  if (length === 0) return 1;
  return (2 * matchingCharacters(first, second)) / length;
}

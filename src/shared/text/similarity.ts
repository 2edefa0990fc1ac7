/**
 * Lowercases and collapses everything but letters, digits and the symbols that carry meaning in head names.
 */
export const normalizeText = (text: string): string =>
  text
    .toLowerCase()
    .replace(/[^a-z0-9%&/]+/g, " ")
    .replace(/\s+/g, " ")
    .trim();

const tokenBigrams = (text: string): Map<string, number> => {
  const counts = new Map<string, number>();
  for (const token of text.split(" ").filter(Boolean)) {
    const grams =
      token.length < 2
        ? [token]
        : Array.from({ length: token.length - 1 }, (_, index) =>
            token.slice(index, index + 2),
          );
    for (const gram of grams) {
      counts.set(gram, (counts.get(gram) ?? 0) + 1);
    }
  }
  return counts;
};

const totalCount = (counts: Map<string, number>): number =>
  Array.from(counts.values()).reduce((sum, count) => sum + count, 0);

/**
 * Sørensen-Dice coefficient over per-token character bigrams of the normalized inputs.
 */
export const diceCoefficient = (left: string, right: string): number => {
  const a = tokenBigrams(normalizeText(left));
  const b = tokenBigrams(normalizeText(right));
  const size = totalCount(a) + totalCount(b);
  if (size === 0) {
    return 0;
  }

  let overlap = 0;
  for (const [gram, count] of a) {
    overlap += Math.min(count, b.get(gram) ?? 0);
  }
  return (2 * overlap) / size;
};

/**
 * True when every token of `inner` appears, in order and contiguously, inside `outer`.
 */
export const containsPhrase = (outer: string, inner: string): boolean => {
  const normalizedInner = normalizeText(inner);
  if (!normalizedInner) {
    return false;
  }
  return ` ${normalizeText(outer)} `.includes(` ${normalizedInner} `);
};

const CONTAINMENT_FLOOR = 0.85;

/**
 * Similarity in [0, 1]. Phrase containment on token boundaries lifts the score above the
 * containment floor, scaled by how much of the longer text the shorter one covers.
 */
export const similarityScore = (query: string, candidate: string): number => {
  const left = normalizeText(query);
  const right = normalizeText(candidate);
  if (!left || !right) {
    return 0;
  }
  if (left === right) {
    return 1;
  }

  const dice = diceCoefficient(left, right);
  const [shorter, longer] =
    left.length <= right.length ? [left, right] : [right, left];
  if (containsPhrase(longer, shorter)) {
    const coverage = shorter.length / longer.length;
    return Math.max(dice, CONTAINMENT_FLOOR + (1 - CONTAINMENT_FLOOR) * coverage);
  }
  return dice;
};

export type RankedMatch<T> = {
  item: T;
  score: number;
};

/**
 * Scores items against a query, dropping zero scores; ties keep input order.
 */
export const rankBySimilarity = <T>(
  query: string,
  items: readonly T[],
  labels: (item: T) => string[],
): RankedMatch<T>[] =>
  items
    .map((item) => ({
      item,
      score: Math.max(0, ...labels(item).map((label) => similarityScore(query, label))),
    }))
    .filter((match) => match.score > 0)
    .sort((left, right) => right.score - left.score);

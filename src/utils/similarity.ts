import { normalizePersonName } from './normalize';

export const levenshteinDistance = (left: string, right: string): number => {
  if (left === right) return 0;
  if (left.length === 0) return right.length;
  if (right.length === 0) return left.length;

  let previous = Array.from({ length: right.length + 1 }, (_, index) => index);
  for (let i = 1; i <= left.length; i += 1) {
    const current = [i];
    for (let j = 1; j <= right.length; j += 1) {
      const substitution = previous[j - 1] + (left[i - 1] === right[j - 1] ? 0 : 1);
      current.push(Math.min(previous[j] + 1, current[j - 1] + 1, substitution));
    }
    previous = current;
  }
  return previous[right.length];
};

/**
 * Case-insensitive similarity ratio in [0, 1]: the share of the longer name
 * that survives the edit distance. Symmetric in its arguments.
 */
export const nameSimilarity = (left: string, right: string): number => {
  const a = normalizePersonName(left);
  const b = normalizePersonName(right);
  const longest = Math.max(a.length, b.length);
  if (longest === 0) return 1;
  return (longest - levenshteinDistance(a, b)) / longest;
};

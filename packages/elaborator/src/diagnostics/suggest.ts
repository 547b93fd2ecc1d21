export const MAX_SUGGESTIONS = 5;

/**
 * Restricted Damerau-Levenshtein distance (optimal string alignment): unit
 * cost insertions, deletions, substitutions and adjacent transpositions,
 * where no substring is edited more than once.
 */
export const editDistance = (left: string, right: string): number => {
  const cols = right.length + 1;
  let twoBack: number[] = [];
  let previousRow: number[] = Array.from({ length: cols }, (_unused, index) => index);

  for (let row = 1; row <= left.length; row += 1) {
    const currentRow: number[] = new Array<number>(cols).fill(0);
    currentRow[0] = row;

    for (let col = 1; col <= right.length; col += 1) {
      const substitutionCost = left[row - 1] === right[col - 1] ? 0 : 1;
      const insertCost = (currentRow[col - 1] ?? Number.POSITIVE_INFINITY) + 1;
      const deleteCost = (previousRow[col] ?? Number.POSITIVE_INFINITY) + 1;
      const replaceCost =
        (previousRow[col - 1] ?? Number.POSITIVE_INFINITY) + substitutionCost;
      let best = Math.min(insertCost, deleteCost, replaceCost);

      const transposed =
        row > 1 &&
        col > 1 &&
        left[row - 1] === right[col - 2] &&
        left[row - 2] === right[col - 1];
      if (transposed) {
        best = Math.min(best, (twoBack[col - 2] ?? Number.POSITIVE_INFINITY) + 1);
      }

      currentRow[col] = best;
    }

    twoBack = previousRow;
    previousRow = currentRow;
  }

  return previousRow[right.length] ?? 0;
};

export const closestNames = (
  invalid: string,
  validOptions: readonly string[],
  limit: number = MAX_SUGGESTIONS
): string[] =>
  validOptions
    .map((candidate) => ({ candidate, distance: editDistance(invalid, candidate) }))
    .sort((left, right) => {
      if (left.distance !== right.distance) {
        return left.distance - right.distance;
      }
      if (left.candidate === right.candidate) return 0;
      return left.candidate < right.candidate ? -1 : 1;
    })
    .slice(0, limit)
    .map((entry) => entry.candidate);

/** Renders the ". Did you mean: [...]" suffix, or nothing when there are no options. */
export const didYouMean = (
  invalid: string,
  validOptions: readonly string[],
  limit: number = MAX_SUGGESTIONS
): string => {
  if (validOptions.length === 0) {
    return "";
  }
  return `. Did you mean: ${JSON.stringify(closestNames(invalid, validOptions, limit))}`;
};

/**
 * Picks the options close enough to `input` to be offered as "did you mean"
 * suggestions, nearest first and alphabetical among equals.
 *
 * Closeness is an edit distance over lower-cased text (insert, delete,
 * substitute, or swap two neighbours). An option differing only in case is
 * one edit away. An option is kept when it is at most
 * `floor(input.length * 0.4) + 1` edits away.
 */
export function suggestionList(
  input: string,
  options: ReadonlyArray<string>,
): Array<string> {
  const threshold = Math.floor(input.length * 0.4) + 1;
  const lowerInput = input.toLowerCase();

  const distances = new Map<string, number>();
  for (const option of options) {
    const distance =
      option === input
        ? 0
        : option.toLowerCase() === lowerInput
        ? 1
        : editDistance(lowerInput, option.toLowerCase(), threshold);
    if (distance !== undefined) {
      distances.set(option, distance);
    }
  }

  return [...distances.keys()].sort(
    (a, b) =>
      (distances.get(a) ?? 0) - (distances.get(b) ?? 0) || a.localeCompare(b),
  );
}

/**
 * Optimal string alignment distance between `a` and `b`, or `undefined` once
 * it is known to exceed `threshold`.
 */
function editDistance(
  a: string,
  b: string,
  threshold: number,
): number | undefined {
  const [longer, shorter] = a.length >= b.length ? [a, b] : [b, a];
  if (longer.length - shorter.length > threshold) {
    return undefined;
  }

  // Only the last three rows of the distance matrix are needed.
  let beforePrevious: Array<number> = [];
  let previous = Array.from({ length: shorter.length + 1 }, (_, j) => j);

  for (let i = 1; i <= longer.length; i++) {
    const current = [i];
    let rowMinimum = i;

    for (let j = 1; j <= shorter.length; j++) {
      const cost = longer[i - 1] === shorter[j - 1] ? 0 : 1;
      let cell = Math.min(
        previous[j] + 1,
        current[j - 1] + 1,
        previous[j - 1] + cost,
      );

      const swapped =
        i > 1 &&
        j > 1 &&
        longer[i - 1] === shorter[j - 2] &&
        longer[i - 2] === shorter[j - 1];
      if (swapped) {
        cell = Math.min(cell, beforePrevious[j - 2] + 1);
      }

      current.push(cell);
      rowMinimum = Math.min(rowMinimum, cell);
    }

    // No later row can get below this row's minimum.
    if (rowMinimum > threshold) {
      return undefined;
    }
    beforePrevious = previous;
    previous = current;
  }

  const distance = previous[shorter.length];
  return distance <= threshold ? distance : undefined;
}

import type { GraphStore } from "../db/GraphStore.js";
import type { FunctionName } from "../db/Types.js";

const DEFAULT_LIMIT = 5;

const SCOPE_SEPARATOR = "::";

/** `Account::deposit` → "deposit"; unqualified names are returned as is. */
const unqualified = (name: string): string => {
  const separator = name.lastIndexOf(SCOPE_SEPARATOR);
  return separator === -1
    ? name
    : name.slice(separator + SCOPE_SEPARATOR.length);
};

/**
 * Case-insensitive edit distance between `a` and `b`, capped at
 * `max + 1`: once every cell of a row exceeds `max` the walk stops.
 *
 * @example
 * boundedEditDistance("mainloop", "Main_Loop", 2); // 1
 * boundedEditDistance("db_connect", "db_close", 2); // 3
 */
export const boundedEditDistance = (
  a: string,
  b: string,
  max: number,
): number => {
  const left = a.toLowerCase();
  const right = b.toLowerCase();
  const over = max + 1;

  if (Math.abs(left.length - right.length) > max) {
    return over;
  }

  let previous = Array.from({ length: right.length + 1 }, (_, j) => j);
  for (let i = 1; i <= left.length; i++) {
    const current = [i];
    let rowMin = i;
    for (let j = 1; j <= right.length; j++) {
      const substitution =
        (previous[j - 1] ?? over) + (left[i - 1] === right[j - 1] ? 0 : 1);
      const cell = Math.min(
        substitution,
        (previous[j] ?? over) + 1,
        (current[j - 1] ?? over) + 1,
      );
      current.push(cell);
      rowMin = Math.min(rowMin, cell);
    }
    if (rowMin > max) {
      return over;
    }
    previous = current;
  }

  return Math.min(previous[right.length] ?? over, over);
};

/**
 * Names in the graph that look like `name`, closest first, ties in insertion
 * order.
 *
 * A name is close when it is within `max(2, ⌊len/3⌋)` edits of the query,
 * either whole or, for qualified names queried without a scope, by its last
 * segment (`deposti` finds `Account::deposit`). Names that merely contain the
 * query (case-insensitive) come after the close ones.
 *
 * @example
 * suggestSimilarNames(store, "mainloop"); // ["main_loop"]
 */
export const suggestSimilarNames = (
  store: GraphStore,
  name: FunctionName,
  limit = DEFAULT_LIMIT,
): FunctionName[] => {
  const needle = name.toLowerCase();
  const maxDistance = Math.max(2, Math.floor(name.length / 3));
  const queryIsQualified = name.includes(SCOPE_SEPARATOR);

  const distanceTo = (candidate: FunctionName): number => {
    const whole = boundedEditDistance(candidate, name, maxDistance);
    if (queryIsQualified || !candidate.includes(SCOPE_SEPARATOR)) {
      return whole;
    }
    return Math.min(
      whole,
      boundedEditDistance(unqualified(candidate), name, maxDistance),
    );
  };

  return store
    .nodes()
    .map((node, order) => ({
      name: node.name,
      order,
      distance: distanceTo(node.name),
    }))
    .filter(
      (candidate) =>
        candidate.distance <= maxDistance ||
        candidate.name.toLowerCase().includes(needle),
    )
    .sort((a, b) => a.distance - b.distance || a.order - b.order)
    .slice(0, limit)
    .map((candidate) => candidate.name);
};

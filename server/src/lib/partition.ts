import { UnclassifiedItemError } from './errors';

export type Predicate<T> = (item: T) => boolean;

/**
 * Split items into those matching the predicate and those that don't.
 * Both halves keep input order.
 *
 *   partition((i) => i % 2 === 0, [0, 1, 2, 3]) // [[0, 2], [1, 3]]
 */
export function partition<T>(predicate: Predicate<T>, items: readonly T[]): [T[], T[]] {
  const matching: T[] = [];
  const rest: T[] = [];
  for (const item of items) {
    if (predicate(item)) {
      matching.push(item);
    } else {
      rest.push(item);
    }
  }
  return [matching, rest];
}

/**
 * Split items into one bucket per predicate. Each item lands in the bucket of
 * the first predicate it satisfies, never in a later one. An item that
 * satisfies none fails the whole call; end the list with `() => true` when
 * the other predicates can't be made exhaustive.
 */
export function multiPartition<T>(predicates: readonly Predicate<T>[], items: readonly T[]): T[][] {
  const buckets: T[][] = predicates.map(() => []);
  for (const item of items) {
    const index = predicates.findIndex((predicate) => predicate(item));
    if (index === -1) {
      throw new UnclassifiedItemError(item);
    }
    buckets[index].push(item);
  }
  return buckets;
}

/**
 * Group items by key. Unlike the partitions, the set of groups comes from
 * the data.
 */
export function groupBy<T, K>(keyOf: (item: T) => K, items: readonly T[]): Map<K, T[]> {
  const groups = new Map<K, T[]>();
  for (const item of items) {
    const key = keyOf(item);
    const group = groups.get(key);
    if (group) {
      group.push(item);
    } else {
      groups.set(key, [item]);
    }
  }
  return groups;
}

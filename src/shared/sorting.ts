export const sorted = <T>(items: readonly T[], compareFn?: (a: T, b: T) => number): T[] => {
  // the copy keeps callers' collections untouched
  return [...items].sort(compareFn);
};

export const compareIds = (a: string, b: string): number => a.localeCompare(b);

/** Map keys in a stable order, so random draws made per entry do not depend on insertion order. */
export const sortedKeys = <K extends string, V>(map: ReadonlyMap<K, V>): K[] => sorted(Array.from(map.keys()), compareIds);

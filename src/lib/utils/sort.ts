/** Orders strings by UTF-16 code units, independent of the host locale. */
export const compareCodeUnits = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

export const sortedEntries = <V>(record: Record<string, V>): [string, V][] =>
  Object.entries(record).sort(([a], [b]) => compareCodeUnits(a, b));

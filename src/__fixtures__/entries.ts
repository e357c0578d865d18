/** Turns maps into entry lists, recursively, so `toEqual` also compares key order. */
export function entries(value: unknown): unknown {
  if (value instanceof Map) return [...value.entries()].map(([key, item]) => [key, entries(item)]);
  if (Array.isArray(value)) return value.map(entries);
  return value;
}

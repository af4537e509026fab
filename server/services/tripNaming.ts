/**
 * Collision-safe trip names.
 *
 * "Beach Week" -> "Beach Week (1)" -> "Beach Week (2)" ...
 */
export function uniqueName(base: string, existingNames: Iterable<string>): string {
  const taken = existingNames instanceof Set ? existingNames : new Set(existingNames);

  if (!taken.has(base)) {
    return base;
  }

  let counter = 1;
  while (taken.has(`${base} (${counter})`)) {
    counter++;
  }
  return `${base} (${counter})`;
}

/**
 * Accepted forms of a resource's `depends` declaration.
 *
 * - A single uid
 * - A list of uids
 */
export type DependsSpec = string | ReadonlyArray<string>;

/**
 * Normalizes a `depends` declaration into an ordered list of uids.
 * Declaration order is preserved, empty entries and repeats are dropped.
 */
export function normalizeDepends(
  depends: DependsSpec | undefined
): readonly string[] {
  if (depends === undefined) return [];

  const ids = typeof depends === "string" ? [depends] : depends;

  const seen = new Set<string>();
  const all: string[] = [];
  for (const id of ids) {
    if (id === "" || seen.has(id)) continue;
    seen.add(id);
    all.push(id);
  }

  return all;
}

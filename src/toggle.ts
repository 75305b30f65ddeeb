/**
 * Runtime switches for `include` (resources) and `skip` (groups).
 *
 * A toggle is either a fixed boolean or a predicate evaluated lazily when a
 * resolution pass visits the entity, so delivery can adapt without
 * re-declaring the graph.
 */

export type Toggle =
  | { readonly type: "fixed"; readonly value: boolean }
  | { readonly type: "predicate"; readonly predicate: () => boolean };

/**
 * Accepted wherever a toggle is configured: a plain boolean, a nullary
 * predicate, or an already built toggle.
 */
export type ToggleInput = boolean | (() => boolean) | Toggle;

export function fixed(value: boolean): Toggle {
  return { type: "fixed", value };
}

export function when(predicate: () => boolean): Toggle {
  return { type: "predicate", predicate };
}

export function toToggle(input: ToggleInput): Toggle {
  if (typeof input === "boolean") return fixed(input);
  if (typeof input === "function") return when(input);
  return input;
}

export function evaluateToggle(toggle: Toggle): boolean {
  switch (toggle.type) {
    case "fixed":
      return toggle.value;
    case "predicate":
      return toggle.predicate();
  }
}

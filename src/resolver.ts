import {
  collect,
  collectDeclared,
  type Candidate,
  type Declared,
  type Roots,
} from "./collect";
import {
  ResourceCircularDependencyError,
  ResourceConflictError,
  ResourceMissingDependencyError,
} from "./errors";
import type { ResourceGroup } from "./group";
import type { ResourceKind } from "./resource";

export type ResolveOptions = {
  /**
   * Everything declared for this pass, skipped and excluded entities
   * included. Lets missing dependency errors tell an excluded resource from
   * an undeclared one, and enables group uid conflict checks.
   */
  declared?: Declared;
};

function nodeKey(kind: ResourceKind, uid: string): string {
  return `${kind}:${uid}`;
}

/**
 * Orders candidates so every resource follows the resources it depends on.
 *
 * Uses Kahn's algorithm with a ready set ordered by candidate position: among
 * all resources whose dependencies are already placed, the one declared
 * first goes next. The same declaration therefore always yields the same
 * order, and declaration order is kept wherever no dependency forces
 * otherwise.
 *
 * @reference https://en.wikipedia.org/wiki/Topological_sorting
 *
 * Checks run in this order, and the first failure aborts the pass:
 * 1. Conflicts: distinct resources sharing a uid within a kind
 * 2. Missing dependencies: uids that name no candidate of the same kind
 * 3. Cycles
 *
 * The same resource object appearing twice is kept once, at its first
 * position.
 *
 * @throws ResourceConflictError
 * @throws ResourceMissingDependencyError
 * @throws ResourceCircularDependencyError
 */
export function resolve(
  candidates: ReadonlyArray<Candidate>,
  options: ResolveOptions = {}
): Candidate[] {
  const nodes: Candidate[] = [];
  const indexByKey = new Map<string, number>();

  for (const candidate of candidates) {
    const { kind, uid } = candidate.resource;
    const key = nodeKey(kind, uid);
    const existing = indexByKey.get(key);
    if (existing !== undefined) {
      const first = nodes[existing].resource;
      if (first === candidate.resource) continue;
      throw new ResourceConflictError(kind, uid, first, candidate.resource);
    }
    indexByKey.set(key, nodes.length);
    nodes.push(candidate);
  }

  if (options.declared) {
    checkGroupConflicts(options.declared.groups);
  }

  // If resource A depends on B, then B -> A in the graph
  const inDegree: number[] = nodes.map(() => 0);
  const dependents: number[][] = nodes.map(() => []);
  const dependencies: number[][] = nodes.map(() => []);

  nodes.forEach(({ resource }, index) => {
    for (const dep of resource.depends) {
      const depIndex = indexByKey.get(nodeKey(resource.kind, dep));
      if (depIndex === undefined) {
        const excluded = options.declared?.resources.some(
          (other) => other.kind === resource.kind && other.uid === dep
        );
        throw new ResourceMissingDependencyError(
          resource,
          dep,
          excluded ? "excluded" : "undeclared"
        );
      }
      dependents[depIndex].push(index);
      dependencies[index].push(depIndex);
      inDegree[index] += 1;
    }
  });

  const byPosition = (a: number, b: number) =>
    nodes[a].position - nodes[b].position;

  // Start with nodes that have no dependencies
  const ready: number[] = [];
  inDegree.forEach((degree, index) => {
    if (degree === 0) ready.push(index);
  });
  ready.sort(byPosition);

  const placed: boolean[] = nodes.map(() => false);
  const result: Candidate[] = [];

  let next = ready.shift();
  while (next !== undefined) {
    placed[next] = true;
    result.push(nodes[next]);

    for (const dependent of dependents[next]) {
      inDegree[dependent] -= 1;
      if (inDegree[dependent] === 0) {
        insertSorted(ready, dependent, byPosition);
      }
    }
    next = ready.shift();
  }

  if (result.length !== nodes.length) {
    const unresolved = nodes
      .filter((_, index) => !placed[index])
      .map((node) => node.resource.uid);
    const cycle = findCycle(dependencies, placed).map(
      (index) => nodes[index].resource.uid
    );
    throw new ResourceCircularDependencyError(cycle, unresolved);
  }

  return result;
}

/**
 * Collects and resolves in one pass.
 *
 * @example
 * ```typescript
 * const ordered = resolveMembers([vendor, app]);
 * ordered.map((c) => c.resource.uid); // ["jquery", "app"]
 * ```
 */
export function resolveMembers(roots: Roots): Candidate[] {
  return resolve(collect(roots), { declared: collectDeclared(roots) });
}

function checkGroupConflicts(groups: ReadonlyArray<ResourceGroup>): void {
  const seen = new Map<string, ResourceGroup>();
  for (const group of groups) {
    const first = seen.get(group.uid);
    if (first && first !== group) {
      throw new ResourceConflictError("group", group.uid, first, group);
    }
    seen.set(group.uid, group);
  }
}

function insertSorted(
  list: number[],
  value: number,
  compare: (a: number, b: number) => number
): void {
  let low = 0;
  let high = list.length;
  while (low < high) {
    const mid = (low + high) >>> 1;
    if (compare(list[mid], value) < 0) low = mid + 1;
    else high = mid;
  }
  list.splice(low, 0, value);
}

/**
 * Every unplaced node still has an unplaced dependency, so following those
 * from any unplaced node must revisit a node. The revisited stretch is a
 * cycle, returned as a closed path in "depends on" direction.
 */
function findCycle(
  dependencies: ReadonlyArray<ReadonlyArray<number>>,
  placed: ReadonlyArray<boolean>
): number[] {
  const path: number[] = [];
  const seenAt = new Map<number, number>();

  let current = placed.indexOf(false);
  while (current !== -1 && !seenAt.has(current)) {
    seenAt.set(current, path.length);
    path.push(current);
    current = dependencies[current].find((dep) => !placed[dep]) ?? -1;
  }

  const start = seenAt.get(current);
  return start === undefined ? path : [...path.slice(start), current];
}

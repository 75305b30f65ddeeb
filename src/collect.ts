/**
 * Graph Builder
 *
 * Projects a tree of resources and groups onto the flat list of candidates
 * for one resolution pass. Read-only: entities are never mutated.
 */

import { cascade, type GroupMember, type ResourceGroup } from "./group";
import type { AnyResource } from "./resource";
import { evaluateToggle } from "./toggle";

/**
 * A resource that survived group `skip` and its own `include`, with its
 * cascading attributes resolved.
 */
export type Candidate<TResource extends AnyResource = AnyResource> = {
  readonly resource: TResource;
  /** Effective directory: own value, else nearest group's value */
  readonly directory: string | undefined;
  /** Effective URL path: own value, else nearest group's value */
  readonly path: string | undefined;
  /** Index in candidate (declaration) order, used as resolver tie-break */
  readonly position: number;
};

export type Roots = GroupMember | ReadonlyArray<GroupMember>;

function toList(roots: Roots): ReadonlyArray<GroupMember> {
  return "kind" in roots ? [roots] : roots;
}

/**
 * Walks the roots depth-first in member order and returns the candidates.
 *
 * - A group whose `skip` evaluates true prunes its entire subtree, whatever
 *   its members' own `include` says.
 * - A resource whose `include` evaluates false is pruned.
 * - An entity reached more than once is visited (and its toggle evaluated)
 *   only the first time.
 *
 * @example
 * ```typescript
 * const candidates = collect([vendorGroup, appScript]);
 * candidates.map((c) => c.resource.uid); // declaration order
 * ```
 */
export function collect(roots: Roots): Candidate[] {
  const candidates: Candidate[] = [];
  const visited = new Set<GroupMember>();

  const visit = (member: GroupMember): void => {
    if (visited.has(member)) return;
    visited.add(member);

    if (member.kind === "group") {
      if (evaluateToggle(member.skip)) return;
      for (const child of member.members) {
        visit(child);
      }
      return;
    }

    if (!evaluateToggle(member.include)) return;
    candidates.push({
      resource: member,
      directory: cascade(member, "directory"),
      path: cascade(member, "path"),
      position: candidates.length,
    });
  };

  for (const root of toList(roots)) {
    visit(root);
  }

  return candidates;
}

/**
 * Everything declared under the roots, regardless of `include` and `skip`.
 * No toggle is evaluated.
 */
export type Declared = {
  readonly resources: ReadonlyArray<AnyResource>;
  readonly groups: ReadonlyArray<ResourceGroup>;
};

export function collectDeclared(roots: Roots): Declared {
  const resources: AnyResource[] = [];
  const groups: ResourceGroup[] = [];
  const visited = new Set<GroupMember>();

  const visit = (member: GroupMember): void => {
    if (visited.has(member)) return;
    visited.add(member);

    if (member.kind === "group") {
      groups.push(member);
      member.members.forEach(visit);
    } else {
      resources.push(member);
    }
  };

  toList(roots).forEach(visit);
  return { resources, groups };
}

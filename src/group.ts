/**
 * Resource groups: ordered, nestable containers providing shared defaults
 * (`directory`, `path`) and bulk exclusion (`skip`).
 *
 * A group owns its members. A member only holds a back reference to its
 * group, so the containment structure stays a tree.
 */

import { ResourceError } from "./errors";
import type { AnyResource, ResourceKind } from "./resource";
import { fixed, toToggle, type Toggle, type ToggleInput } from "./toggle";

export type ResourceGroup = {
  readonly kind: "group";
  readonly uid: string;
  readonly members: ReadonlyArray<GroupMember>;
  directory?: string;
  path?: string;
  /** When true, the group and its whole subtree are left out of a pass */
  skip: Toggle;
  group?: ResourceGroup;
};

export type GroupMember = AnyResource | ResourceGroup;

export type GroupConfig = {
  uid: string;
  directory?: string;
  path?: string;
  skip?: ToggleInput;
  members?: ReadonlyArray<GroupMember>;
  /** Enclosing group the new group is added to */
  group?: ResourceGroup;
};

/** Attributes looked up through the enclosing groups when unset */
export type CascadingAttribute = "directory" | "path";

// Members are only ever appended through addMember, which keeps the back
// references in sync; the public type exposes them read-only.
const memberLists = new WeakMap<ResourceGroup, GroupMember[]>();

function membersOf(group: ResourceGroup): GroupMember[] {
  const members = memberLists.get(group);
  if (!members) {
    throw new ResourceError(
      `Group "${group.uid}" was not created with defineGroup`
    );
  }
  return members;
}

/**
 * Defines a resource group, optionally adding initial members in order.
 *
 * @example
 * ```typescript
 * const vendor = defineGroup({
 *   uid: "vendor",
 *   path: "js",
 *   members: [jquery, app],
 * });
 * ```
 */
export function defineGroup(config: GroupConfig): ResourceGroup {
  if (config.uid === "") {
    throw new ResourceError("A resource group needs a non-empty uid");
  }

  const members: GroupMember[] = [];
  const group: ResourceGroup = {
    kind: "group",
    uid: config.uid,
    members,
    directory: config.directory,
    path: config.path,
    skip: config.skip === undefined ? fixed(false) : toToggle(config.skip),
  };
  memberLists.set(group, members);

  for (const member of config.members ?? []) {
    addMember(group, member);
  }
  if (config.group) {
    addMember(config.group, group);
  }

  return group;
}

/**
 * Appends a member to a group and points the member's back reference at it.
 *
 * @throws ResourceError if the member already belongs to a group, or if
 * adding it would make a group contain itself
 */
export function addMember(group: ResourceGroup, member: GroupMember): void {
  if (member.group !== undefined) {
    throw new ResourceError(
      `${describe(member)} already belongs to group "${member.group.uid}"`
    );
  }
  for (
    let ancestor: ResourceGroup | undefined = group;
    ancestor;
    ancestor = ancestor.group
  ) {
    if (ancestor === member) {
      throw new ResourceError(
        `Adding group "${member.uid}" to "${group.uid}" would make it contain itself`
      );
    }
  }

  membersOf(group).push(member);
  member.group = group;
}

/**
 * Detaches a member from its group.
 *
 * @throws ResourceError if the member belongs to no group
 */
export function removeMember(member: GroupMember): void {
  const group = member.group;
  if (!group) {
    throw new ResourceError(`${describe(member)} is no member of a group`);
  }
  const members = membersOf(group);
  const index = members.indexOf(member);
  if (index === -1) {
    throw new ResourceError(
      `${describe(member)} is not listed in group "${group.uid}"`
    );
  }
  members.splice(index, 1);
  member.group = undefined;
}

/**
 * Deep copy of a resource or a whole group subtree, for declaring variants.
 * Nested members are copied with back references to their new parents; the
 * returned copy belongs to no group.
 *
 * @example
 * ```typescript
 * const printStyles = copyMember(styles);
 * printStyles.path = "print";
 * ```
 */
export function copyMember(member: ResourceGroup): ResourceGroup;
export function copyMember<TResource extends AnyResource>(
  member: TResource
): TResource;
export function copyMember(member: GroupMember): GroupMember;
export function copyMember(member: GroupMember): GroupMember {
  if (member.kind !== "group") {
    return {
      ...member,
      depends: [...member.depends],
      attrs: { ...member.attrs },
      group: undefined,
    };
  }

  const copy = defineGroup({
    uid: member.uid,
    directory: member.directory,
    path: member.path,
    skip: member.skip,
  });
  for (const child of member.members) {
    addMember(copy, copyMember(child));
  }
  return copy;
}

/**
 * Lists the resources contained in a group and its nested groups,
 * depth-first in member order. Toggles are not evaluated.
 */
export function groupResources(group: ResourceGroup): AnyResource[];
export function groupResources<TKind extends ResourceKind>(
  group: ResourceGroup,
  kind: TKind
): Extract<AnyResource, { kind: TKind }>[];
export function groupResources(
  group: ResourceGroup,
  kind?: ResourceKind
): AnyResource[] {
  const resources: AnyResource[] = [];
  for (const member of group.members) {
    if (member.kind === "group") {
      resources.push(...groupResources(member));
    } else {
      resources.push(member);
    }
  }
  return kind === undefined
    ? resources
    : resources.filter((resource) => resource.kind === kind);
}

/**
 * Effective value of a cascading attribute: the entity's own value, else the
 * value of the nearest enclosing group that sets it.
 */
export function cascade(
  entity: GroupMember,
  attribute: CascadingAttribute
): string | undefined {
  for (
    let current: GroupMember | undefined = entity;
    current;
    current = current.group
  ) {
    const value = current[attribute];
    if (value !== undefined) return value;
  }
  return undefined;
}

function describe(member: GroupMember): string {
  return member.kind === "group"
    ? `Group "${member.uid}"`
    : `${member.kind} resource "${member.uid}"`;
}

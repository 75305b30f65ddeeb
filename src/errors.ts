import type { AnyResource, ResourceKind } from "./resource";
import type { ResourceGroup } from "./group";

/**
 * Base class for every error raised while declaring or resolving resources.
 */
export class ResourceError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ResourceError";
  }
}

/**
 * Two distinct declarations share one uid within a namespace.
 * There is no "last one wins": the pass fails before any ordering.
 */
export class ResourceConflictError extends ResourceError {
  readonly kind: ResourceKind | "group";
  readonly uid: string;
  readonly declarations: readonly [
    AnyResource | ResourceGroup,
    AnyResource | ResourceGroup
  ];

  constructor(
    kind: ResourceKind | "group",
    uid: string,
    first: AnyResource | ResourceGroup,
    second: AnyResource | ResourceGroup
  ) {
    super(`Conflicting ${kind} declarations for uid "${uid}"`);
    this.name = "ResourceConflictError";
    this.kind = kind;
    this.uid = uid;
    this.declarations = [first, second];
  }
}

/**
 * Why a dependency target is not available in the current pass.
 *
 * - undeclared: no resource of that kind carries the uid
 * - excluded: the resource exists but `include` or a group `skip` pruned it
 */
export type MissingDependencyReason = "undeclared" | "excluded";

export class ResourceMissingDependencyError extends ResourceError {
  readonly dependent: AnyResource;
  readonly dependency: string;
  readonly reason: MissingDependencyReason;

  constructor(
    dependent: AnyResource,
    dependency: string,
    reason: MissingDependencyReason
  ) {
    const detail =
      reason === "excluded"
        ? "which is excluded from this pass"
        : "which is not declared";
    super(
      `${dependent.kind} resource "${dependent.uid}" depends on "${dependency}" ${detail}`
    );
    this.name = "ResourceMissingDependencyError";
    this.dependent = dependent;
    this.dependency = dependency;
    this.reason = reason;
  }
}

export class ResourceCircularDependencyError extends ResourceError {
  /** Closed path of uids along one detected cycle, e.g. ["a", "b", "a"] */
  readonly cycle: readonly string[];
  /** Every node the sort could not place */
  readonly unresolved: readonly string[];

  constructor(cycle: readonly string[], unresolved: readonly string[]) {
    super(
      `Circular dependency detected: ${cycle.join(
        " -> "
      )}. Unresolved resources: ${unresolved.join(", ")}`
    );
    this.name = "ResourceCircularDependencyError";
    this.cycle = cycle;
    this.unresolved = unresolved;
  }
}

export class ConfigError extends ResourceError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ConfigError";
  }
}

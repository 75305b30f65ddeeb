/**
 * Resource Registry - Core Types
 *
 * Declarative descriptions of the scripts, stylesheets and generic links an
 * application delivers. Resources are plain data: define them once at startup,
 * place them in groups, and let the resolver work out the render order.
 */

import { normalizeDepends, type DependsSpec } from "./dependencies";
import { ResourceError } from "./errors";
import { addMember, type ResourceGroup } from "./group";
import { fixed, toToggle, type Toggle, type ToggleInput } from "./toggle";

/**
 * Resource kinds. Each kind is an independent uid namespace: a script and a
 * style may share a uid, and dependencies never cross kinds.
 */
export type ResourceKind = "script" | "style" | "link";

export type HashAlgorithm = "sha256" | "sha384" | "sha512";

export const DEFAULT_UNIQUE_PREFIX = "++assetweave++";
export const DEFAULT_HASH_ALGORITHM: HashAlgorithm = "sha384";

/**
 * Fields shared by every resource kind.
 */
export type ResourceFields<TKind extends ResourceKind> = {
  readonly kind: TKind;
  readonly uid: string;
  /** Uids of same-kind resources that must render before this one */
  depends: readonly string[];
  /** Directory containing the resource files. Cascades from groups when unset */
  directory?: string;
  /** URL path segment for tag creation. Cascades from groups when unset */
  path?: string;
  /** External URL; takes precedence over file based URL generation */
  url?: string;
  /** Raw resource file name */
  file?: string;
  /** Compressed resource file name, preferred outside development mode */
  compressed?: string;
  include: Toggle;
  /** Whether to inject a content based key into the URL. Ignored when `url` is set */
  unique: boolean;
  uniquePrefix: string;
  hashAlgorithm: HashAlgorithm;
  crossorigin?: string;
  referrerpolicy?: string;
  type?: string;
  /** Additional attributes rendered on the tag */
  attrs: Readonly<Record<string, string>>;
  /**
   * Enclosing group. Non-owning back reference used for cascading lookups;
   * maintained by `addMember` / `removeMember`.
   */
  group?: ResourceGroup;
};

export type ScriptResource = ResourceFields<"script"> & {
  async: boolean;
  defer: boolean;
  nomodule: boolean;
  /** `true` computes the hash from the file content, a string is used as is */
  integrity?: true | string;
};

export type LinkResource = ResourceFields<"link"> & {
  hreflang?: string;
  media?: string;
  rel?: string;
  sizes?: string;
  title?: string;
};

export type StyleResource = ResourceFields<"style"> & {
  hreflang?: string;
  media: string;
  rel: string;
  title?: string;
};

export type AnyResource = ScriptResource | StyleResource | LinkResource;

/**
 * Configuration accepted by every `define*` helper.
 */
export type ResourceConfig = {
  uid: string;
  depends?: DependsSpec;
  directory?: string;
  path?: string;
  url?: string;
  file?: string;
  compressed?: string;
  include?: ToggleInput;
  unique?: boolean;
  uniquePrefix?: string;
  hashAlgorithm?: HashAlgorithm;
  crossorigin?: string;
  referrerpolicy?: string;
  attrs?: Record<string, string>;
  /** Group the new resource is added to */
  group?: ResourceGroup;
};

export type ScriptConfig = ResourceConfig & {
  type?: string;
  async?: boolean;
  defer?: boolean;
  nomodule?: boolean;
  integrity?: boolean | string;
};

export type LinkConfig = ResourceConfig & {
  type?: string;
  hreflang?: string;
  media?: string;
  rel?: string;
  sizes?: string;
  title?: string;
};

export type StyleConfig = ResourceConfig & {
  hreflang?: string;
  media?: string;
  rel?: string;
  title?: string;
};

function resourceFields<TKind extends ResourceKind>(
  kind: TKind,
  config: ResourceConfig
): ResourceFields<TKind> {
  if (config.uid === "") {
    throw new ResourceError(`A ${kind} resource needs a non-empty uid`);
  }
  if (config.file === undefined && config.url === undefined) {
    throw new ResourceError(
      `${kind} resource "${config.uid}" needs either a file or a url`
    );
  }

  return {
    kind,
    uid: config.uid,
    depends: normalizeDepends(config.depends),
    directory: config.directory,
    path: config.path,
    url: config.url,
    file: config.file,
    compressed: config.compressed,
    include: config.include === undefined ? fixed(true) : toToggle(config.include),
    unique: config.unique ?? false,
    uniquePrefix: config.uniquePrefix ?? DEFAULT_UNIQUE_PREFIX,
    hashAlgorithm: config.hashAlgorithm ?? DEFAULT_HASH_ALGORITHM,
    crossorigin: config.crossorigin,
    referrerpolicy: config.referrerpolicy,
    attrs: { ...config.attrs },
  };
}

/**
 * Defines a script resource.
 *
 * @example
 * ```typescript
 * const jquery = defineScript({ uid: "jquery", file: "jquery.js", compressed: "jquery.min.js" });
 * const app = defineScript({ uid: "app", depends: "jquery", file: "app.js", integrity: true });
 * ```
 */
export function defineScript(config: ScriptConfig): ScriptResource {
  const fields = resourceFields("script", config);
  if (config.integrity === true && config.url !== undefined) {
    throw new ResourceError(
      `Cannot compute an integrity hash for external script "${config.uid}"`
    );
  }

  return attach(config.group, {
    ...fields,
    type: config.type,
    async: config.async ?? false,
    defer: config.defer ?? false,
    nomodule: config.nomodule ?? false,
    integrity: config.integrity === false ? undefined : config.integrity,
  });
}

/**
 * Defines a stylesheet. Rendered as `<link type="text/css">`, with `media`
 * defaulting to "all" and `rel` to "stylesheet".
 */
export function defineStyle(config: StyleConfig): StyleResource {
  return attach(config.group, {
    ...resourceFields("style", config),
    type: "text/css",
    hreflang: config.hreflang,
    media: config.media ?? "all",
    rel: config.rel ?? "stylesheet",
    title: config.title,
  });
}

/**
 * Defines a generic `<link>` resource such as an icon or a manifest.
 */
export function defineLink(config: LinkConfig): LinkResource {
  return attach(config.group, {
    ...resourceFields("link", config),
    type: config.type,
    hreflang: config.hreflang,
    media: config.media,
    rel: config.rel,
    sizes: config.sizes,
    title: config.title,
  });
}

function attach<TResource extends AnyResource>(
  group: ResourceGroup | undefined,
  resource: TResource
): TResource {
  if (group) addMember(group, resource);
  return resource;
}

export function isResource(
  entity: AnyResource | ResourceGroup
): entity is AnyResource {
  return entity.kind !== "group";
}

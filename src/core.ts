export { defineLink, defineScript, defineStyle, isResource } from "./resource";
export type {
  AnyResource,
  HashAlgorithm,
  LinkConfig,
  LinkResource,
  ResourceConfig,
  ResourceKind,
  ScriptConfig,
  ScriptResource,
  StyleConfig,
  StyleResource,
} from "./resource";
export {
  addMember,
  cascade,
  copyMember,
  defineGroup,
  groupResources,
  removeMember,
} from "./group";
export type { GroupConfig, GroupMember, ResourceGroup } from "./group";
export { evaluateToggle, fixed, toToggle, when } from "./toggle";
export type { Toggle, ToggleInput } from "./toggle";
export { collect, collectDeclared } from "./collect";
export type { Candidate, Declared, Roots } from "./collect";
export { resolve, resolveMembers } from "./resolver";
export type { ResolveOptions } from "./resolver";
export { render, renderGraceful, renderStrict } from "./renderer";
export type {
  MarkupFormatter,
  RenderOptions,
  RenderPassOptions,
} from "./renderer";
export {
  escapeAttribute,
  fileName,
  filePath,
  formatTag,
  renderTag,
  resourceUrl,
} from "./markup";
export type { MarkupContext } from "./markup";
export { createFileHasher, integrityValue, uniqueKey } from "./hashing";
export type { FileHasher, FileHasherOptions } from "./hashing";
export { defineConfig, loadConfigFromEnv } from "./config";
export type { LoadConfigOptions, LogLevel, RenderConfig } from "./config";
export { createLogger } from "./logger";
export type { Logger } from "./logger";
export {
  ConfigError,
  ResourceCircularDependencyError,
  ResourceConflictError,
  ResourceError,
  ResourceMissingDependencyError,
} from "./errors";
export type { MissingDependencyReason } from "./errors";

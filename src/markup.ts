/**
 * URL building and HTML tag formatting for resolved resources.
 */

import { join } from "node:path";
import type { Candidate } from "./collect";
import type { RenderConfig } from "./config";
import { ResourceError } from "./errors";
import { integrityValue, uniqueKey, type FileHasher } from "./hashing";
import type { AnyResource, LinkResource, ScriptResource, StyleResource } from "./resource";

/**
 * Everything formatting needs besides the candidate itself.
 */
export type MarkupContext = {
  config: RenderConfig;
  hasher: FileHasher;
};

/** Attribute values: strings render as `name="value"`, `true` as a bare name */
type AttributeValue = string | boolean | undefined;

/**
 * File name to deliver: the compressed file outside development mode when
 * one is set, the raw file otherwise.
 *
 * @throws ResourceError when the resource has no file (external `url` only)
 */
export function fileName(resource: AnyResource, config: RenderConfig): string {
  if (!config.development && resource.compressed !== undefined) {
    return resource.compressed;
  }
  if (resource.file === undefined) {
    throw new ResourceError(
      `${resource.kind} resource "${resource.uid}" has no file name`
    );
  }
  return resource.file;
}

/**
 * Absolute location of the delivered file, from the effective directory.
 *
 * @throws ResourceError when no directory is set on the resource or its groups
 */
export function filePath(candidate: Candidate, config: RenderConfig): string {
  const { resource, directory } = candidate;
  if (directory === undefined) {
    throw new ResourceError(
      `No directory set for ${resource.kind} resource "${resource.uid}"`
    );
  }
  return join(directory, fileName(resource, config));
}

function trimSlashes(value: string): string {
  return value.replace(/^\/+|\/+$/g, "");
}

function fileDigest(candidate: Candidate, context: MarkupContext): string {
  return context.hasher.digest(
    filePath(candidate, context.config),
    candidate.resource.hashAlgorithm,
    context.config
  );
}

/**
 * URL of the resource: the external `url` when set, otherwise
 * `<baseUrl>/<path>/<unique key>/<file name>` with the optional parts left
 * out.
 */
export function resourceUrl(candidate: Candidate, context: MarkupContext): string {
  const { resource } = candidate;
  if (resource.url !== undefined) return resource.url;

  const parts = [trimSlashes(context.config.baseUrl)];
  if (candidate.path) {
    parts.push(trimSlashes(candidate.path));
  }
  if (resource.unique) {
    parts.push(uniqueKey(resource.uniquePrefix, fileDigest(candidate, context)));
  }
  parts.push(fileName(resource, context.config));
  return parts.join("/");
}

export function escapeAttribute(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/"/g, "&quot;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;");
}

/**
 * Renders a tag with its attributes sorted by name. Unset and `false`
 * attributes are dropped.
 */
export function renderTag(
  tag: string,
  closingTag: boolean,
  attrs: Record<string, AttributeValue>
): string {
  const rendered = Object.keys(attrs)
    .sort()
    .flatMap((name) => {
      const value = attrs[name];
      if (value === undefined || value === false) return [];
      if (value === true) return [name];
      return [`${name}="${escapeAttribute(value)}"`];
    });

  const attrString = rendered.length > 0 ? ` ${rendered.join(" ")}` : "";
  return closingTag ? `<${tag}${attrString}></${tag}>` : `<${tag}${attrString} />`;
}

function scriptIntegrity(
  candidate: Candidate<ScriptResource>,
  context: MarkupContext
): string | undefined {
  const { integrity, hashAlgorithm } = candidate.resource;
  if (integrity === true) {
    return integrityValue(hashAlgorithm, fileDigest(candidate, context));
  }
  return integrity;
}

function formatScript(
  candidate: Candidate<ScriptResource>,
  context: MarkupContext
): string {
  const { resource } = candidate;
  return renderTag("script", true, {
    src: resourceUrl(candidate, context),
    crossorigin: resource.crossorigin,
    referrerpolicy: resource.referrerpolicy,
    type: resource.type,
    async: resource.async,
    defer: resource.defer,
    integrity: scriptIntegrity(candidate, context),
    nomodule: resource.nomodule,
    ...resource.attrs,
  });
}

function formatLink(
  candidate: Candidate<LinkResource | StyleResource>,
  context: MarkupContext
): string {
  const { resource } = candidate;
  return renderTag("link", false, {
    href: resourceUrl(candidate, context),
    crossorigin: resource.crossorigin,
    referrerpolicy: resource.referrerpolicy,
    type: resource.type,
    hreflang: resource.hreflang,
    media: resource.media,
    rel: resource.rel,
    sizes: resource.kind === "link" ? resource.sizes : undefined,
    title: resource.title,
    ...resource.attrs,
  });
}

/**
 * Markup for one resolved resource: a `<script>` element for scripts and a
 * self-closing `<link>` for styles and links.
 *
 * Any failure (missing file name or directory, unreadable file while hashing)
 * propagates to the caller.
 */
export function formatTag(candidate: Candidate, context: MarkupContext): string {
  const { resource } = candidate;
  switch (resource.kind) {
    case "script":
      return formatScript({ ...candidate, resource }, context);
    case "style":
    case "link":
      return formatLink({ ...candidate, resource }, context);
  }
}

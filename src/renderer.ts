/**
 * Resource Renderer
 *
 * Turns a resolved candidate list into markup, one item per candidate in
 * resolved order. Two failure policies share that contract:
 *
 * - strict: the first failing resource aborts the whole call
 * - graceful: a failing resource becomes an HTML comment placeholder, the
 *   failure is logged, and rendering continues
 */

import type { Candidate, Roots } from "./collect";
import type { RenderConfig } from "./config";
import { createFileHasher, type FileHasher } from "./hashing";
import { createLogger, type Logger } from "./logger";
import { formatTag, type MarkupContext } from "./markup";
import { resolveMembers } from "./resolver";

export type MarkupFormatter = (
  candidate: Candidate,
  context: MarkupContext
) => string;

export type RenderOptions = {
  config: RenderConfig;
  /** Digest provider for unique URLs and integrity. Defaults to reading from disk */
  hasher?: FileHasher;
  /** Receives graceful render failures. Defaults to a console logger at `config.logLevel` */
  logger?: Logger;
  /** Formats one candidate. Defaults to `formatTag` */
  format?: MarkupFormatter;
};

function markupContext(options: RenderOptions): MarkupContext {
  return {
    config: options.config,
    hasher: options.hasher ?? createFileHasher(),
  };
}

/**
 * Renders every candidate, propagating the first failure. No partial output
 * is returned.
 */
export function renderStrict(
  resolved: ReadonlyArray<Candidate>,
  options: RenderOptions
): string[] {
  const context = markupContext(options);
  const format = options.format ?? formatTag;
  return resolved.map((candidate) => format(candidate, context));
}

/**
 * Renders every candidate. A candidate whose markup cannot be computed is
 * replaced by a placeholder comment and the error is logged, so the result
 * always has exactly one item per candidate.
 *
 * @example
 * ```typescript
 * renderGraceful(resolveMembers(page), { config });
 * // ['<script src="/js/jquery.js"></script>',
 * //  '<!-- Failure to render script resource "app" - details in logs -->']
 * ```
 */
export function renderGraceful(
  resolved: ReadonlyArray<Candidate>,
  options: RenderOptions
): string[] {
  const context = markupContext(options);
  const format = options.format ?? formatTag;
  const logger = options.logger ?? createLogger({ level: options.config.logLevel });

  return resolved.map((candidate) => {
    try {
      return format(candidate, context);
    } catch (error) {
      const { kind, uid } = candidate.resource;
      const message = `Failure to render ${kind} resource "${uid}"`;
      logger.error(message, error);
      return `<!-- ${message} - details in logs -->`;
    }
  });
}

export type RenderPassOptions = RenderOptions & {
  /** Use the graceful policy instead of the strict one */
  graceful?: boolean;
};

/**
 * Runs a whole resolution pass over the roots and joins the markup with
 * newlines. Resolver errors (conflicts, missing dependencies, cycles)
 * propagate under both policies.
 *
 * @example
 * ```typescript
 * const head = render([styles, scripts], {
 *   config: defineConfig({ baseUrl: "https://cdn.example.com" }),
 *   graceful: true,
 * });
 * ```
 */
export function render(roots: Roots, options: RenderPassOptions): string {
  const resolved = resolveMembers(roots);
  const markup = options.graceful
    ? renderGraceful(resolved, options)
    : renderStrict(resolved, options);
  return markup.join("\n");
}

/**
 * File digests for cache busting URLs and subresource integrity.
 */

import { createHash } from "node:crypto";
import { readFileSync } from "node:fs";
import { v5 as uuidv5 } from "uuid";
import type { RenderConfig } from "./config";
import type { HashAlgorithm } from "./resource";

/** Namespace for the uuid embedded in unique resource URLs */
export const UNIQUE_KEY_NAMESPACE = "f3341b2e-f97e-40d2-ad2f-10a08a778877";

export type FileHasher = {
  /**
   * Base64 digest of the file at `filePath`. Outside development mode the
   * first digest per (path, algorithm) is cached; in development mode the
   * file is hashed on every call so edits show up immediately.
   */
  digest(filePath: string, algorithm: HashAlgorithm, config: RenderConfig): string;
};

export type FileHasherOptions = {
  /** Reads file bytes. Defaults to a synchronous read from disk */
  readFile?: (filePath: string) => Uint8Array;
};

export function createFileHasher(options: FileHasherOptions = {}): FileHasher {
  const readFile = options.readFile ?? ((filePath: string) => readFileSync(filePath));
  const cache = new Map<string, string>();

  return {
    digest(filePath, algorithm, config) {
      const key = `${algorithm}:${filePath}`;
      if (!config.development) {
        const cached = cache.get(key);
        if (cached !== undefined) return cached;
      }

      const digest = createHash(algorithm)
        .update(readFile(filePath))
        .digest("base64");
      cache.set(key, digest);
      return digest;
    },
  };
}

/**
 * URL segment derived from a file digest, e.g.
 * `++assetweave++4be37419-d3f6-5ec5-99e8-92565ede87d0`.
 */
export function uniqueKey(prefix: string, digest: string): string {
  return `${prefix}${uuidv5(digest, UNIQUE_KEY_NAMESPACE)}`;
}

/** Subresource integrity value, e.g. `sha384-<base64 digest>` */
export function integrityValue(algorithm: HashAlgorithm, digest: string): string {
  return `${algorithm}-${digest}`;
}

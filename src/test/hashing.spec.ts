import { describe, expect, test, vi } from "vitest";
import { createFileHasher, defineConfig, integrityValue, uniqueKey } from "../core";

const RESOURCE_DIGEST =
  "VwEVpw/Hy4OlSeTX7oDQ/lzkncnWgKEV0zOX9OXa9Uy+qypLkrBrJxPtNsax1HJo";

describe("File hashing", () => {
  test("returns the base64 digest of the file content", () => {
    const hasher = createFileHasher({
      readFile: () => Buffer.from("Resource Content ä", "utf8"),
    });

    expect(hasher.digest("/srv/res", "sha384", defineConfig())).toBe(RESOURCE_DIGEST);
  });

  test("caches digests outside development mode", () => {
    let content = "Resource Content ä";
    const readFile = vi.fn(() => Buffer.from(content, "utf8"));
    const hasher = createFileHasher({ readFile });
    const production = defineConfig();

    const first = hasher.digest("/srv/res", "sha384", production);
    content = "Changed Content";
    const second = hasher.digest("/srv/res", "sha384", production);

    expect(second).toBe(first);
    expect(readFile).toHaveBeenCalledTimes(1);
  });

  test("rehashes on every call in development mode", () => {
    let content = "Resource Content ä";
    const readFile = vi.fn(() => Buffer.from(content, "utf8"));
    const hasher = createFileHasher({ readFile });
    const development = defineConfig({ development: true });

    const first = hasher.digest("/srv/res", "sha384", development);
    content = "Changed Content";
    const second = hasher.digest("/srv/res", "sha384", development);

    expect(first).toBe(RESOURCE_DIGEST);
    expect(second).not.toBe(first);
    expect(readFile).toHaveBeenCalledTimes(2);
  });

  test("keeps separate cache entries per algorithm", () => {
    const readFile = vi.fn(() => Buffer.from("Resource Content ä", "utf8"));
    const hasher = createFileHasher({ readFile });

    const sha384 = hasher.digest("/srv/res", "sha384", defineConfig());
    const sha256 = hasher.digest("/srv/res", "sha256", defineConfig());

    expect(sha256).not.toBe(sha384);
    // 32 bytes encode to 44 base64 characters, 48 bytes to 64
    expect(sha256).toHaveLength(44);
    expect(sha384).toHaveLength(64);
    expect(readFile).toHaveBeenCalledTimes(2);
  });

  test("propagates read failures", () => {
    const hasher = createFileHasher({
      readFile: (path) => {
        throw new Error(`ENOENT: ${path}`);
      },
    });

    expect(() => hasher.digest("/nowhere", "sha384", defineConfig())).toThrow(
      "ENOENT: /nowhere"
    );
  });

  test("derives the unique key from the digest", () => {
    expect(uniqueKey("++assetweave++", RESOURCE_DIGEST)).toBe(
      "++assetweave++4be37419-d3f6-5ec5-99e8-92565ede87d0"
    );
    expect(uniqueKey("v-", RESOURCE_DIGEST)).toBe(
      "v-4be37419-d3f6-5ec5-99e8-92565ede87d0"
    );
  });

  test("formats integrity values", () => {
    expect(integrityValue("sha512", "abc=")).toBe("sha512-abc=");
  });
});

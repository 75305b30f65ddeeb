import { afterEach, describe, expect, test, vi } from "vitest";
import { createLogger } from "../core";

describe("Logger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  test("drops messages below the configured level", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const logger = createLogger({ level: "warn" });

    logger.debug("hidden");
    logger.warn("shown", 42);

    expect(debug).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith("[assetweave] shown", 42);
  });

  test("defaults to info with the package prefix", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    const info = vi.spyOn(console, "info").mockImplementation(() => {});
    const logger = createLogger();

    logger.debug("hidden");
    logger.info("hello");

    expect(debug).not.toHaveBeenCalled();
    expect(info).toHaveBeenCalledWith("[assetweave] hello");
  });

  test("uses a custom prefix", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});

    createLogger({ prefix: "[head]" }).error("failed");

    expect(error).toHaveBeenCalledWith("[head] failed");
  });
});

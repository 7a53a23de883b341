import { describe, expect, it, vi } from "vitest";
import { createLogger } from "./logger.js";

function makeTarget() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe("createLogger", () => {
  it("prefixes lines with the scope", () => {
    const target = makeTarget();
    const logger = createLogger("cache", { target });

    logger.warn("frame interval clamped", { requested: 0 });
    logger.info("ready");

    expect(target.warn).toHaveBeenCalledWith("[cache] frame interval clamped", { requested: 0 });
    expect(target.info).toHaveBeenCalledWith("[cache] ready");
  });

  it("drops messages below the level", () => {
    const target = makeTarget();
    const logger = createLogger("cache", { target, level: "warn" });

    logger.debug("rebuild");
    logger.info("rebuild");
    logger.error("boom");

    expect(target.debug).not.toHaveBeenCalled();
    expect(target.info).not.toHaveBeenCalled();
    expect(target.error).toHaveBeenCalledWith("[cache] boom");
  });
});

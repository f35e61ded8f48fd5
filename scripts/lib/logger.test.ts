import { afterEach, describe, expect, it, vi } from "vitest";
import { logger, setLogLevel } from "./logger.js";

describe("logger", () => {
  afterEach(() => {
    setLogLevel("info");
    vi.restoreAllMocks();
  });

  it("writes one JSON line to stderr", () => {
    const write = vi.spyOn(process.stderr, "write").mockImplementation(() => true);

    logger.info("dynamic published", { dynamicId: "1" });

    expect(write).toHaveBeenCalledTimes(1);
    const line = String(write.mock.calls[0][0]);
    expect(line.endsWith("\n")).toBe(true);
    expect(JSON.parse(line)).toMatchObject({
      level: "info",
      message: "dynamic published",
      ctx: { dynamicId: "1" },
    });
  });

  it("drops entries below the threshold", () => {
    const write = vi.spyOn(process.stderr, "write").mockImplementation(() => true);
    setLogLevel("warn");

    logger.debug("request");
    logger.info("dynamic published");
    logger.warn("api error");

    expect(write).toHaveBeenCalledTimes(1);
  });

  it("tags errors with an id and stack", () => {
    const write = vi.spyOn(process.stderr, "write").mockImplementation(() => true);

    const errorId = logger.error("command failed", { command: "post" }, new Error("boom"));

    expect(errorId).toHaveLength(8);
    const entry = JSON.parse(String(write.mock.calls[0][0]));
    expect(entry.errorId).toBe(errorId);
    expect(entry.ctx.command).toBe("post");
    expect(entry.ctx.error).toBe("boom");
  });
});

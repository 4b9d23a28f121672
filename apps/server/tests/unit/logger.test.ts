import { afterEach, describe, it, expect, vi } from "vitest";
import { createLogger, getLogLevel, setLogLevel } from "../../src/utils/logger";

describe("createLogger", () => {
  afterEach(() => {
    setLogLevel("info");
    vi.restoreAllMocks();
  });

  it("prefixes messages with the tag", () => {
    const spy = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    createLogger("market").warn("price unavailable", 42);
    expect(spy).toHaveBeenCalledWith("[market]", "price unavailable", 42);
  });

  it("drops messages below the threshold", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => undefined);
    const info = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);

    setLogLevel("error");
    expect(getLogLevel()).toBe("error");
    const log = createLogger("api");
    log.debug("d");
    log.info("i");
    log.error("e");

    expect(debug).not.toHaveBeenCalled();
    expect(info).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledWith("[api]", "e");
  });
});

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { error, isVerbose, log, setVerbose, warn } from "../../src/util/logger.js";

describe("logger", () => {
  let errorSpy: ReturnType<typeof vi.spyOn>;
  let stdoutSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    stdoutSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    setVerbose(false);
  });

  afterEach(() => {
    setVerbose(false);
    vi.restoreAllMocks();
  });

  it("tracks verbosity", () => {
    expect(isVerbose()).toBe(false);
    setVerbose(true);
    expect(isVerbose()).toBe(true);
  });

  it("drops log() output unless verbose", () => {
    log("scanning");
    expect(errorSpy).not.toHaveBeenCalled();

    setVerbose(true);
    log("scanning %s", "/etc/site-aliases");
    expect(errorSpy).toHaveBeenCalledWith("[sitealias] scanning %s", "/etc/site-aliases");
  });

  it("always prints warnings with the WARN prefix", () => {
    warn("file skipped");
    expect(errorSpy).toHaveBeenCalledWith("[sitealias WARN] file skipped");
  });

  it("always prints errors with the ERROR prefix", () => {
    error("Alias not found: @missing");
    expect(errorSpy).toHaveBeenCalledWith("[sitealias ERROR] Alias not found: @missing");
  });

  it("never writes to stdout", () => {
    setVerbose(true);
    log("a");
    warn("b");
    error("c");
    expect(stdoutSpy).not.toHaveBeenCalled();
  });
});

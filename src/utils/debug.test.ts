import { afterEach, describe, it, expect, vi } from "vitest";
import { debugGroup, debugLog, isDebugEnabled } from "./debug";

describe("debug output", () => {
  const original = process.env.DEBUG;

  afterEach(() => {
    if (original === undefined) delete process.env.DEBUG;
    else process.env.DEBUG = original;
    vi.restoreAllMocks();
  });

  it("picks up DEBUG set after the module loaded", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    process.env.DEBUG = "false";
    debugLog("hidden");
    expect(log).not.toHaveBeenCalled();

    process.env.DEBUG = "true";
    expect(isDebugEnabled()).toBe(true);
    debugLog("Round 1 paired", 4);
    expect(log).toHaveBeenCalledWith("Round 1 paired", 4);
  });

  it("prints groups only when enabled", () => {
    const group = vi.spyOn(console, "group").mockImplementation(() => {});
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "groupEnd").mockImplementation(() => {});
    delete process.env.DEBUG;
    debugGroup("[Round 1] Pairing Decisions", ["A-B"]);
    expect(group).not.toHaveBeenCalled();

    process.env.DEBUG = "true";
    debugGroup("[Round 1] Pairing Decisions", ["A-B", "C-D"]);
    expect(group).toHaveBeenCalledWith("[Round 1] Pairing Decisions");
    expect(log.mock.calls).toEqual([["A-B"], ["C-D"]]);
  });
});

import { afterEach, describe, expect, it, jest } from "@jest/globals";

import { debugLog, isDebugEnabled } from "@/utils/debug";

describe("debug logging", () => {
  const original = process.env["BLOCKFALL_DEBUG"];

  afterEach(() => {
    if (original === undefined) {
      delete process.env["BLOCKFALL_DEBUG"];
    } else {
      process.env["BLOCKFALL_DEBUG"] = original;
    }
    jest.restoreAllMocks();
  });

  it("is off unless BLOCKFALL_DEBUG is set", () => {
    delete process.env["BLOCKFALL_DEBUG"];
    expect(isDebugEnabled("engine")).toBe(false);
    process.env["BLOCKFALL_DEBUG"] = "off";
    expect(isDebugEnabled()).toBe(false);
  });

  it("enables every topic for a truthy value", () => {
    process.env["BLOCKFALL_DEBUG"] = "1";
    expect(isDebugEnabled("loop")).toBe(true);
    expect(isDebugEnabled("config")).toBe(true);
  });

  it("enables only the listed topics", () => {
    process.env["BLOCKFALL_DEBUG"] = "session, config";
    expect(isDebugEnabled("session")).toBe(true);
    expect(isDebugEnabled("config")).toBe(true);
    expect(isDebugEnabled("loop")).toBe(false);
  });

  it("writes tagged lines through console.warn", () => {
    process.env["BLOCKFALL_DEBUG"] = "config";
    const warn = jest.spyOn(console, "warn").mockImplementation(() => undefined);

    debugLog("config", "loaded", { file: "a.json" });
    debugLog("config", "plain");
    debugLog("loop", "hidden");

    expect(warn.mock.calls).toEqual([
      ["[DBG:config] loaded", { file: "a.json" }],
      ["[DBG:config] plain"],
    ]);
  });
});

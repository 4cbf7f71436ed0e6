import { describe, test, expect, afterEach, vi } from "vitest";
import { log, setLogLevel } from "./log";

afterEach(() => {
  setLogLevel("silent");
  vi.restoreAllMocks();
});

describe("log", () => {
  test("is silent by default", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => {});
    log.error("Main", "nothing to see");
    expect(spy).not.toHaveBeenCalled();
  });

  test("writes scoped lines to stderr at or above the level", () => {
    const err = vi.spyOn(console, "error").mockImplementation(() => {});
    const out = vi.spyOn(console, "log").mockImplementation(() => {});
    setLogLevel("info");

    log.debug("Socket", "dropped");
    log.info("Resolver", "resolved", { address: "203.0.113.7" });

    expect(out).not.toHaveBeenCalled();
    expect(err).toHaveBeenCalledTimes(1);
    expect(err.mock.calls[0][0]).toMatch(
      /^\[\d{2}:\d{2}:\d{2}\.\d{3}\]\[Resolver\] resolved \{"address":"203\.0\.113\.7"\}$/,
    );
  });

  test("summarises errors by name and message", () => {
    const err = vi.spyOn(console, "error").mockImplementation(() => {});
    setLogLevel("debug");
    log.debug("Socket", "failed", new Error("connect ECONNREFUSED"));
    expect(err.mock.calls[0][0]).toMatch(
      /\]\[Socket\] failed \{"name":"Error","message":"connect ECONNREFUSED"\}$/,
    );
  });
});

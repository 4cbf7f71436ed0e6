import { describe, test, expect } from "vitest";
import { buildRequest, lastLine, splitLines } from "./response";

describe("buildRequest", () => {
  test("produces the exact GET bytes for icanhazip", () => {
    expect(buildRequest("icanhazip.com").toString("ascii")).toBe(
      "GET / HTTP/1.1\r\nHost: icanhazip.com\r\n\r\n",
    );
  });
});

describe("splitLines", () => {
  test("handles every line break style without a trailing empty entry", () => {
    expect(splitLines("a\r\nb\nc\rd\n")).toEqual(["a", "b", "c", "d"]);
  });

  test("keeps inner empty lines", () => {
    expect(splitLines("a\r\n\r\nb")).toEqual(["a", "", "b"]);
  });
});

describe("lastLine", () => {
  test("returns the body of a full HTTP response", () => {
    const raw =
      "HTTP/1.1 200 OK\r\nContent-Type: text/plain\r\nContent-Length: 12\r\n\r\n203.0.113.7\n";
    expect(lastLine(Buffer.from(raw))).toBe("203.0.113.7");
  });

  test("skips trailing blank lines", () => {
    expect(lastLine(Buffer.from("2001:db8::1\n\n  \r\n"))).toBe("2001:db8::1");
  });

  test("trims spaces and tabs around the chosen line", () => {
    expect(lastLine(Buffer.from("HTTP/1.1 200 OK\r\n\r\n \t203.0.113.7 \n"))).toBe(
      "203.0.113.7",
    );
  });

  test("returns null for an empty payload", () => {
    expect(lastLine(Buffer.alloc(0))).toBeNull();
    expect(lastLine(Buffer.from("\r\n\r\n"))).toBeNull();
  });
});

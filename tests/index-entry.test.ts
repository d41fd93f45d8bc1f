import { describe, it, expect } from "vitest";
import { isCliInvocation } from "../src/index.js";

describe("entrypoint module", () => {
  it("detects direct invocation path", () => {
    const moduleUrl = "file:///app/dist/index.js";
    const argv = ["node", "/app/dist/index.js"];
    expect(isCliInvocation(argv, moduleUrl, (value) => value)).toBe(true);
  });

  it("detects invocation through symlinked path", () => {
    const moduleUrl = "file:///app/dist/index.js";
    const argv = ["node", "/usr/local/bin/cake-instrument"];
    const resolver = (value: string) =>
      value === "/usr/local/bin/cake-instrument" ? "/app/dist/index.js" : value;
    expect(isCliInvocation(argv, moduleUrl, resolver)).toBe(true);
  });

  it("ignores imports from other modules", () => {
    const moduleUrl = "file:///app/dist/index.js";
    expect(isCliInvocation(["node", "/app/tests/run.js"], moduleUrl, (value) => value)).toBe(
      false
    );
    expect(isCliInvocation(["node"], moduleUrl)).toBe(false);
  });
});

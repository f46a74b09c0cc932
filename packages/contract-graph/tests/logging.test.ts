import { LogLevel } from "effect";
import { describe, expect, it } from "vitest";
import { formatLogLine } from "../src/logging.js";

describe("formatLogLine", () => {
  it("prefixes the level label", () => {
    expect(formatLogLine(LogLevel.Warning, "[Scanner] shop: 2 endpoints")).toBe(
      "[faultline:WARN] [Scanner] shop: 2 endpoints",
    );
  });

  it("joins multi-part messages with spaces", () => {
    expect(formatLogLine(LogLevel.Info, ["scanned", 3, "files"])).toBe("[faultline:INFO] scanned 3 files");
  });
});

import { describe, expect, it } from "vitest";
import { isLogLevel, Logger } from "../../src/utils/logger";

describe("Logger", () => {
  it("shares its level with children created before and after a change", () => {
    const root = new Logger({ minLevel: "warn" });
    const early = root.child({ component: "early" });

    root.setMinLevel("debug");
    const late = root.child({ component: "late" });

    expect(early.isLevelEnabled("debug")).toBe(true);
    expect(late.minLevel).toBe("debug");

    late.setMinLevel("error");
    expect(root.isLevelEnabled("warn")).toBe(false);
    expect(early.minLevel).toBe("error");
  });

  it("keeps separate roots independent", () => {
    const a = new Logger({ minLevel: "info" });
    const b = new Logger({ minLevel: "info" });

    a.setMinLevel("error");

    expect(b.isLevelEnabled("info")).toBe(true);
  });

  it("recognises level names", () => {
    expect(isLogLevel("warn")).toBe(true);
    expect(isLogLevel("verbose")).toBe(false);
    expect(isLogLevel("toString")).toBe(false);
  });
});

import { describe, it, expect, vi, afterEach } from "vitest";
import { NOT_CONFIGURED } from "@greenlight/core";
import { banner, exitWithError, formatAge, formatValue, header, stateColor } from "../../src/lib/format.js";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("formatAge", () => {
  const now = new Date("2026-01-15T12:00:00Z").getTime();

  it("formats seconds ago", () => {
    expect(formatAge(new Date(now - 30_000), now)).toBe("30s ago");
  });

  it("formats minutes ago", () => {
    expect(formatAge(new Date(now - 5 * 60_000), now)).toBe("5m ago");
  });

  it("formats hours ago", () => {
    expect(formatAge(new Date(now - 2 * 3600_000), now)).toBe("2h ago");
  });

  it("formats days ago", () => {
    expect(formatAge(new Date(now - 3 * 86400_000), now)).toBe("3d ago");
  });

  it("clamps future dates to zero", () => {
    expect(formatAge(new Date(now + 10_000), now)).toBe("0s ago");
  });
});

describe("formatValue", () => {
  it("prints strings bare and everything else as JSON", () => {
    expect(formatValue("arnold")).toBe("arnold");
    expect(formatValue(24)).toBe("24");
    expect(formatValue(["exr", "png"])).toBe('["exr","png"]');
    expect(formatValue(null)).toBe("null");
  });

  it("marks missing keys", () => {
    expect(formatValue(NOT_CONFIGURED)).toBe("<not configured>");
  });
});

describe("stateColor", () => {
  it("keeps the state name", () => {
    expect(stateColor("in_development")).toContain("in_development");
    expect(stateColor("rejected")).toContain("rejected");
  });
});

describe("header / banner", () => {
  it("draws a box around the title", () => {
    expect(header("Plugins")).toContain("Plugins");
    expect(header("Plugins").split("\n")).toHaveLength(3);
    expect(banner("GREENLIGHT STATUS")).toContain("GREENLIGHT STATUS");
  });
});

describe("exitWithError", () => {
  it("prints the message and exits 1", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    vi.spyOn(process, "exit").mockImplementation((code) => {
      throw new Error(`process.exit(${code})`);
    });

    expect(() => exitWithError(new Error("depot offline"))).toThrow("process.exit(1)");
    expect(String(error.mock.calls[0]?.[0])).toContain("depot offline");
  });
});

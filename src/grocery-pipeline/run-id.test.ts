import { describe, expect, it } from "vitest";
import { formatRunId, generateRunId } from "./run-id.js";

describe("generateRunId", () => {
  it("is deterministic for a seed", () => {
    expect(generateRunId("abc")).toBe("900150983cd2");
    expect(generateRunId("abc")).toBe(generateRunId("abc"));
  });

  it("is random without a seed", () => {
    const id = generateRunId();
    expect(id).toMatch(/^[0-9a-f]{12}$/);
    expect(generateRunId()).not.toBe(id);
  });
});

describe("formatRunId", () => {
  it("prefixes the local date", () => {
    expect(formatRunId("abc123", true, new Date(2024, 0, 5))).toBe("20240105_abc123");
  });

  it("can leave the id bare", () => {
    expect(formatRunId("abc123", false)).toBe("abc123");
  });
});

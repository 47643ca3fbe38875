import { describe, it, expect } from "vitest";
import { generateEventId, generateRequestId, generateSessionId } from "../../../src/utils/id.js";

describe("generateEventId", () => {
  it("returns a string in the expected format (base36-hex)", () => {
    const id = generateEventId();
    expect(id).toMatch(/^[a-z0-9]+-[a-f0-9]{8}$/);
  });

  it("generates unique IDs", () => {
    const ids = new Set<string>();
    for (let i = 0; i < 1000; i++) {
      ids.add(generateEventId());
    }
    expect(ids.size).toBe(1000);
  });

  it("is time-sortable", () => {
    const [time1 = ""] = generateEventId().split("-");
    const [time2 = ""] = generateEventId().split("-");
    expect(parseInt(time2, 36)).toBeGreaterThanOrEqual(parseInt(time1, 36));
  });
});

describe("generateRequestId", () => {
  it("renders 80 random bits as 16 base32 characters", () => {
    expect(generateRequestId()).toMatch(/^[A-Z2-7]{16}$/);
  });

  it("does not repeat", () => {
    const ids = new Set(Array.from({ length: 500 }, () => generateRequestId()));
    expect(ids.size).toBe(500);
  });
});

describe("generateSessionId", () => {
  it("returns a UUID", () => {
    expect(generateSessionId()).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
  });
});

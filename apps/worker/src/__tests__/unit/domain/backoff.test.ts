import { describe, it, expect, vi, afterEach } from "vitest";
import { calculateBackoff, calculateStorageBackoff } from "../../../domain/utils/backoff.js";

describe("calculateBackoff", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("default options", () => {
    it("should return base delay for first attempt", () => {
      expect(calculateBackoff(0)).toBe(1000);
    });

    it("should double delay for each attempt", () => {
      expect(calculateBackoff(1)).toBe(2000);
      expect(calculateBackoff(2)).toBe(4000);
      expect(calculateBackoff(3)).toBe(8000);
    });

    it("should cap at max delay", () => {
      expect(calculateBackoff(6)).toBe(60000); // 64000 capped
      expect(calculateBackoff(100)).toBe(60000);
    });

    it("should treat negative attempts as the first", () => {
      expect(calculateBackoff(-2)).toBe(1000);
    });
  });

  describe("jitter", () => {
    it("should add at most jitterFactor of the delay", () => {
      vi.spyOn(Math, "random").mockReturnValue(0.5);
      expect(calculateBackoff(0, { jitterFactor: 0.2 })).toBe(1100);
    });
  });
});

describe("calculateStorageBackoff", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should wait the base delay after the first failure", () => {
    vi.spyOn(Math, "random").mockReturnValue(0);
    expect(calculateStorageBackoff(1, { baseDelayMs: 200, maxDelayMs: 5000 })).toBe(200);
    expect(calculateStorageBackoff(2, { baseDelayMs: 200, maxDelayMs: 5000 })).toBe(400);
  });

  it("should stay within the cap plus jitter", () => {
    vi.spyOn(Math, "random").mockReturnValue(0.999);
    const delay = calculateStorageBackoff(20, { baseDelayMs: 200, maxDelayMs: 5000 });
    expect(delay).toBeGreaterThanOrEqual(5000);
    expect(delay).toBeLessThan(5500);
  });
});

import { describe, expect, it } from "vitest";

import { roundHalfEven } from "@/lib/utils/round";

describe("roundHalfEven", () => {
  it("sends exact ties to the even neighbour", () => {
    expect(roundHalfEven(12.25, 1)).toBe(12.2);
    expect(roundHalfEven(12.75, 1)).toBe(12.8);
    expect(roundHalfEven(-12.25, 1)).toBe(-12.2);
    expect(roundHalfEven(0.125, 2)).toBe(0.12);
    expect(roundHalfEven(0.375, 2)).toBe(0.38);
  });

  it("rounds other values to the nearest", () => {
    expect(roundHalfEven(2.675, 2)).toBe(2.67);
    expect(roundHalfEven(80 / 3, 2)).toBe(26.67);
    expect(roundHalfEven(3.275 - 3.265, 3)).toBe(0.01);
    expect(roundHalfEven(-523, 1)).toBe(-523);
  });
});

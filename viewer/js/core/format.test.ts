import { describe, it, expect } from "vitest";
import { clamp, formatDuration, formatSignificant } from "./format";

describe("formatSignificant", () => {
  it("keeps three significant digits and drops trailing zeros", () => {
    expect(formatSignificant(30)).toBe("30");
    expect(formatSignificant(0.5)).toBe("0.5");
    expect(formatSignificant(2.5)).toBe("2.5");
    expect(formatSignificant(100)).toBe("100");
    expect(formatSignificant(-12.345)).toBe("-12.3");
  });

  it("switches to exponent form at 1e3 and below 1e-4", () => {
    expect(formatSignificant(1000)).toBe("1e+03");
    expect(formatSignificant(1234)).toBe("1.23e+03");
    expect(formatSignificant(999.6)).toBe("1e+03");
    expect(formatSignificant(0.0001)).toBe("0.0001");
    expect(formatSignificant(0.00001234)).toBe("1.23e-05");
  });

  it("names the special values", () => {
    expect(formatSignificant(0)).toBe("0");
    expect(formatSignificant(NaN)).toBe("nan");
    expect(formatSignificant(Infinity)).toBe("inf");
    expect(formatSignificant(-Infinity)).toBe("-inf");
  });

  it("honors a custom digit count", () => {
    expect(formatSignificant(3.14159, 5)).toBe("3.1416");
  });
});

describe("formatDuration", () => {
  it("picks a unit by magnitude", () => {
    expect(formatDuration(0.0125)).toBe("12.5 ms");
    expect(formatDuration(2.5)).toBe("2.50 s");
    expect(formatDuration(90)).toBe("1m 30s");
  });
});

describe("clamp", () => {
  it("limits to the closed range", () => {
    expect(clamp(5, 0, 3)).toBe(3);
    expect(clamp(-1, 0, 3)).toBe(0);
    expect(clamp(2, 0, 3)).toBe(2);
  });
});

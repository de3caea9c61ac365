import { describe, expect, it } from "vitest";
import { InvalidInputError } from "../errors";
import { roundToStandard } from "../reference/standardSizes";

const SIZES = [10, 16, 20, 25, 30, 40];

describe("roundToStandard", () => {
  it("rounds up to the smallest size that is large enough", () => {
    expect(roundToStandard(0.0216, SIZES)).toEqual({
      status: "standard",
      diameter: 25,
    });
  });

  it("keeps an exact catalog match", () => {
    expect(roundToStandard(0.025, SIZES)).toEqual({
      status: "standard",
      diameter: 25,
    });
  });

  it("returns the first size for tiny requirements", () => {
    expect(roundToStandard(0.001, SIZES)).toEqual({
      status: "standard",
      diameter: 10,
    });
  });

  it("flags the largest size as undersized when nothing fits", () => {
    expect(roundToStandard(1.0, SIZES)).toEqual({
      status: "undersized",
      diameter: 40,
      required: 1000,
    });
  });

  it.each([null, undefined, 0, -0.01, Number.NaN])(
    "is not computable for %s",
    (required) => {
      expect(roundToStandard(required, SIZES)).toBeNull();
    },
  );

  it("rejects an empty table", () => {
    expect(() => roundToStandard(0.02, [])).toThrow(InvalidInputError);
  });

  it("rejects a table that is not strictly ascending", () => {
    expect(() => roundToStandard(0.03, [40, 10])).toThrow(
      "Standard sizes must be strictly ascending. Received 40 before 10.",
    );
    expect(() => roundToStandard(0.03, [10, 20, 20, 40])).toThrow(
      InvalidInputError,
    );
  });

  it("returns a frozen resolution", () => {
    expect(Object.isFrozen(roundToStandard(0.0216, SIZES))).toBe(true);
  });
});

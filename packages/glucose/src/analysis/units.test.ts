import { describe, it, expect } from "vitest";
import {
  convertGlucoseUnit,
  inferUnitsFromBounds,
  inferUnitsFromMean,
  parseUnit,
  UNIT_MGDL,
  UNIT_MMOLL,
} from "./units.js";

describe("convertGlucoseUnit", () => {
  it("converts mg/dL to mmol/L with two decimals", () => {
    expect(convertGlucoseUnit(100, UNIT_MGDL, UNIT_MMOLL)).toBe(5.56);
  });

  it("converts mmol/L to whole mg/dL", () => {
    expect(convertGlucoseUnit(10, UNIT_MMOLL, UNIT_MGDL)).toBe(180);
    expect(convertGlucoseUnit(4, UNIT_MMOLL)).toBe(72);
  });

  it("leaves values alone for identical units", () => {
    expect(convertGlucoseUnit(100, UNIT_MGDL, UNIT_MGDL)).toBe(100);
  });
});

describe("parseUnit", () => {
  it("recognises unit spellings", () => {
    expect(parseUnit("mg/dL")).toBe(UNIT_MGDL);
    expect(parseUnit("MG")).toBe(UNIT_MGDL);
    expect(parseUnit("mmol/l")).toBe(UNIT_MMOLL);
    expect(parseUnit("furlongs")).toBeUndefined();
    expect(parseUnit(undefined)).toBeUndefined();
  });
});

describe("inferUnitsFromBounds", () => {
  it("detects mg/dL from a high above 35 or a low above 20", () => {
    expect(inferUnitsFromBounds(180, 70)).toBe(UNIT_MGDL);
    expect(inferUnitsFromBounds(undefined, 25)).toBe(UNIT_MGDL);
  });

  it("defaults to mmol/L", () => {
    expect(inferUnitsFromBounds(8, 4)).toBe(UNIT_MMOLL);
    expect(inferUnitsFromBounds()).toBe(UNIT_MMOLL);
  });
});

describe("inferUnitsFromMean", () => {
  it("treats means above 35 as mg/dL", () => {
    expect(inferUnitsFromMean(120)).toBe(UNIT_MGDL);
    expect(inferUnitsFromMean(35)).toBe(UNIT_MMOLL);
    expect(inferUnitsFromMean(6.5)).toBe(UNIT_MMOLL);
  });
});

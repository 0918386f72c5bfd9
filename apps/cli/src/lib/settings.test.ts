import { describe, expect, it } from "vitest";
import { defaultParameterSet } from "@vectorize-batch/core";
import { normalizeParameters, normalizeStoredSettings } from "./settings";

describe("normalizeParameters", () => {
  it("fills a missing set with the defaults", () => {
    expect(normalizeParameters(undefined)).toEqual(defaultParameterSet);
  });

  it("keeps valid values and replaces the rest", () => {
    expect(
      normalizeParameters({ hierarchical: "cutout", filterSpeckle: 12, colorPrecision: Number.NaN, mode: "pixel" })
    ).toEqual({ ...defaultParameterSet, hierarchical: "cutout", filterSpeckle: 12 });
  });
});

describe("normalizeStoredSettings", () => {
  it("ignores a blank output directory", () => {
    expect(normalizeStoredSettings({ outputDir: "  " }).outputDir).toBeUndefined();
    expect(normalizeStoredSettings({ outputDir: "/svg" }).outputDir).toBe("/svg");
    expect(normalizeStoredSettings(null)).toEqual({ outputDir: undefined, parameters: defaultParameterSet });
  });
});

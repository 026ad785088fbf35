import { DegenerateVectorError, DimensionMismatchError } from "../errors.js";
import {
  clampUnit,
  cosineSimilarity,
  dot,
  interpretSimilarity,
  l2Norm,
  vectorStats
} from "./similarity.js";

describe("cosineSimilarity", () => {
  it("is 1 for identical vectors", () => {
    expect(cosineSimilarity([0.3, -0.2, 0.9], [0.3, -0.2, 0.9])).toBeCloseTo(1, 9);
  });

  it("ignores magnitude", () => {
    expect(cosineSimilarity([1, 2, 3], [2, 4, 6])).toBeCloseTo(1, 9);
  });

  it("is 0 for orthogonal vectors", () => {
    expect(cosineSimilarity([1, 0, 0], [0, 1, 0])).toBe(0);
  });

  it("is -1 for opposite vectors", () => {
    expect(cosineSimilarity([1, 1], [-1, -1])).toBeCloseTo(-1, 9);
  });

  it("never leaves [-1, 1]", () => {
    const v = [0.1, 0.2, 0.3, 0.4, 0.5, 0.6, 0.7];
    const score = cosineSimilarity(v, v);
    expect(score).toBeLessThanOrEqual(1);
    expect(score).toBeGreaterThanOrEqual(-1);
  });

  it("rejects vectors of different length", () => {
    expect(() => cosineSimilarity([1, 0], [1, 0, 0])).toThrow(DimensionMismatchError);
  });

  it("rejects zero vectors", () => {
    expect(() => cosineSimilarity([0, 0], [1, 0])).toThrow(DegenerateVectorError);
    expect(() => cosineSimilarity([1, 0], [0, 0])).toThrow(DegenerateVectorError);
  });

  it("stays in range for very large components", () => {
    expect(cosineSimilarity([1e200, 1e200], [1e200, 1e200])).toBeCloseTo(1, 9);
    expect(cosineSimilarity([1e200, 0], [0, 1e300])).toBe(0);
    expect(cosineSimilarity([1e308, -1e308], [-1e308, 1e308])).toBeCloseTo(-1, 9);
  });

  it("treats very small components as non-zero", () => {
    expect(cosineSimilarity([1e-200, 0], [1, 0])).toBe(1);
    expect(cosineSimilarity([1e-300, 1e-300], [3e-310, 3e-310])).toBeCloseTo(1, 9);
  });
});

describe("clampUnit", () => {
  it("clips drift beyond the unit interval", () => {
    expect(clampUnit(1.0000000002)).toBe(1);
    expect(clampUnit(-1.3)).toBe(-1);
    expect(clampUnit(0.25)).toBe(0.25);
  });
});

describe("dot and l2Norm", () => {
  it("computes the dot product", () => {
    expect(dot([1, 2, 3], [4, 5, 6])).toBe(32);
  });

  it("computes the euclidean norm", () => {
    expect(l2Norm([3, 4])).toBe(5);
  });

  it("computes norms at the edges of double range", () => {
    expect(l2Norm([3e200, 4e200])).toBeCloseTo(5e200, -190);
    expect(l2Norm([3e-200, 4e-200]) / 5e-200).toBeCloseTo(1, 12);
    expect(l2Norm([0, 0])).toBe(0);
  });

  it("rejects mismatched lengths in dot", () => {
    expect(() => dot([1], [1, 2])).toThrow(DimensionMismatchError);
  });
});

describe("vectorStats", () => {
  it("summarizes a vector", () => {
    expect(vectorStats([1, 2, 3, 4])).toEqual({
      mean: 2.5,
      stdDev: Math.sqrt(1.25),
      min: 1,
      max: 4,
      l2Norm: Math.sqrt(30)
    });
  });

  it("rejects an empty vector", () => {
    expect(() => vectorStats([])).toThrow(DegenerateVectorError);
  });
});

describe("interpretSimilarity", () => {
  it.each([
    [0.95, "Very similar - nearly identical meaning"],
    [0.8, "Similar - related concepts"],
    [0.6, "Somewhat similar - some relation"],
    [0.4, "Weakly similar - distant relation"],
    [0.3, "Different - unrelated concepts"],
    [-0.5, "Different - unrelated concepts"]
  ] as const)("labels %s", (score, label) => {
    expect(interpretSimilarity(score).label).toBe(label);
  });
});

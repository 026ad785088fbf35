import { DegenerateVectorError, DimensionMismatchError } from "../errors.js";
import { rank } from "./search.js";
import type { EmbeddingStore } from "./types.js";

const v1 = [1, 0, 0];
const v2 = [0.95, Math.sqrt(1 - 0.95 * 0.95), 0];
const v3 = [0.05, 0, Math.sqrt(1 - 0.05 * 0.05)];

const store: EmbeddingStore = {
  model: "text-embedding-3-small",
  dimensions: 3,
  records: [
    { text: "cat", vector: v1 },
    { text: "dog", vector: v2 },
    { text: "car", vector: v3 }
  ]
};

describe("rank", () => {
  it("ranks near-parallel vectors above near-orthogonal ones", () => {
    const results = rank(v1, store, 2);

    expect(results.map((r) => r.text)).toEqual(["cat", "dog"]);
    expect(results[0]?.score).toBeCloseTo(1, 9);
    expect(results[1]?.score).toBeCloseTo(0.95, 9);
  });

  it("returns every record in descending order", () => {
    const results = rank(v1, store, 3);

    expect(results.map((r) => r.text)).toEqual(["cat", "dog", "car"]);
    expect(results[2]?.score).toBeCloseTo(0.05, 9);
  });

  it("returns the whole store when k exceeds its size", () => {
    expect(rank(v2, store, 1000)).toHaveLength(3);
  });

  it("returns nothing for an empty store", () => {
    expect(rank(v1, { dimensions: 3, records: [] }, 5)).toEqual([]);
  });

  it("is deterministic", () => {
    expect(rank(v3, store, 3)).toEqual(rank(v3, store, 3));
  });

  it("scores orthogonal vectors as 0", () => {
    const results = rank([0, 1], { dimensions: 2, records: [{ text: "x", vector: [1, 0] }] }, 1);
    expect(results).toEqual([{ text: "x", score: 0 }]);
  });

  it("keeps store order between equal scores", () => {
    const dupes: EmbeddingStore = {
      dimensions: 2,
      records: [
        { text: "first", vector: [0, 1] },
        { text: "second", vector: [1, 1] },
        { text: "third", vector: [2, 2] },
        { text: "fourth", vector: [1, 1] }
      ]
    };

    const results = rank([1, 1], dupes, 4);

    expect(results.map((r) => r.text)).toEqual(["second", "third", "fourth", "first"]);
    expect(results[0]?.score).toBeCloseTo(1, 9);
  });

  it("does not mutate the store", () => {
    const records = [...store.records];
    rank(v3, store, 3);
    expect(store.records).toEqual(records);
  });

  it("rejects a query of another dimension", () => {
    expect(() => rank([1, 0], store, 2)).toThrow(DimensionMismatchError);
  });

  it("rejects a store with a record of another dimension", () => {
    const mixed: EmbeddingStore = {
      dimensions: 2,
      records: [
        { text: "a", vector: [1, 0] },
        { text: "b", vector: [1, 0, 0] }
      ]
    };
    expect(() => rank([1, 0], mixed, 1)).toThrow("at record 1");
  });

  it("rejects zero-norm vectors", () => {
    const zero: EmbeddingStore = { dimensions: 2, records: [{ text: "z", vector: [0, 0] }] };
    expect(() => rank([1, 0], zero, 1)).toThrow(DegenerateVectorError);
    expect(() => rank([0, 0], { dimensions: 2, records: [{ text: "a", vector: [1, 0] }] }, 1)).toThrow(
      DegenerateVectorError
    );
  });

  it("keeps scores in [-1, 1] for extreme magnitudes", () => {
    const extreme: EmbeddingStore = {
      dimensions: 2,
      records: [
        { text: "huge", vector: [1e200, 1e200] },
        { text: "tiny", vector: [1e-200, 0] }
      ]
    };
    const results = rank([1e200, 1e200], extreme, 2);

    expect(results.map((r) => r.text)).toEqual(["huge", "tiny"]);
    expect(results[0]?.score).toBeCloseTo(1, 9);
    expect(results[1]?.score).toBeCloseTo(Math.SQRT1_2, 9);
  });

  it.each([0, -1, 1.5, Number.NaN])("rejects k = %s", (k) => {
    expect(() => rank(v1, store, k)).toThrow(RangeError);
  });
});

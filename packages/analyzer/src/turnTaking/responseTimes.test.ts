import { describe, it, expect } from "vitest";
import { createTurn } from "./turnBuilder";
import { computeResponseTimes, listResponseTransitions } from "./responseTimes";

describe("listResponseTransitions", () => {
  it("should list clean handoffs with their gap", () => {
    const turns = [createTurn("A", 0, 2), createTurn("B", 3, 5), createTurn("A", 6, 8)];

    expect(listResponseTransitions(turns)).toEqual([
      { at: 2, from: "A", to: "B", gap: 1 },
      { at: 5, from: "B", to: "A", gap: 1 },
    ]);
  });

  it("should skip overlapping and touching handoffs", () => {
    const turns = [createTurn("A", 0, 4), createTurn("B", 3, 6), createTurn("A", 6, 7)];

    expect(listResponseTransitions(turns)).toEqual([]);
  });

  it("should skip consecutive turns of the same speaker", () => {
    const turns = [createTurn("A", 0, 1), createTurn("A", 2, 3)];

    expect(listResponseTransitions(turns)).toEqual([]);
  });
});

describe("computeResponseTimes", () => {
  it("should attribute each gap to the speaker taking the turn", () => {
    const turns = [createTurn("A", 0, 2), createTurn("B", 2.5, 5), createTurn("A", 7, 8)];

    expect(computeResponseTimes(turns, "A", "B")).toEqual({ a: [2], b: [0.5] });
  });

  it("should ignore speakers that match neither label", () => {
    const turns = [createTurn("A", 0, 1), createTurn("C", 2, 3)];

    expect(computeResponseTimes(turns, "A", "B")).toEqual({ a: [], b: [] });
  });

  it("should return empty samples with fewer than two turns", () => {
    expect(computeResponseTimes([createTurn("A", 0, 1)], "A", "B")).toEqual({ a: [], b: [] });
  });
});

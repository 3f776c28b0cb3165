import { describe, expect, it } from "vitest";
import {
  adjacency,
  adjacencyModifier,
  advantageTargets,
  cyclicDistance,
  isStance,
  parseStance,
  relationship,
  stanceChart
} from "../../src/engine/stances";
import { STANCES } from "../../src/engine/types";
import { expectRuleError } from "../helpers";

describe("relationship", () => {
  it("follows the clockwise cycle from Bagr", () => {
    expect(relationship("Bagr", "Radae")).toBe("ADVANTAGE");
    expect(relationship("Bagr", "Darda")).toBe("ADVANTAGE");
    expect(relationship("Bagr", "Tigr")).toBe("NEUTRAL");
    expect(relationship("Bagr", "Riposje")).toBe("DISADVANTAGE");
    expect(relationship("Bagr", "Tortad")).toBe("DISADVANTAGE");
  });

  it("treats a stance against itself as neutral", () => {
    for (const stance of STANCES) {
      expect(relationship(stance, stance)).toBe("NEUTRAL");
    }
  });

  it("is antisymmetric for every non-opposite pair", () => {
    for (const a of STANCES) {
      for (const b of STANCES) {
        if (a === b) continue;
        const forward = relationship(a, b);
        const backward = relationship(b, a);
        if (cyclicDistance(a, b) === 3) {
          expect(forward).toBe("NEUTRAL");
          expect(backward).toBe("NEUTRAL");
        } else {
          expect(forward).not.toBe("NEUTRAL");
          expect(forward === "ADVANTAGE").toBe(backward === "DISADVANTAGE");
        }
      }
    }
  });

  it("wraps around the end of the cycle", () => {
    expect(relationship("Tortad", "Bagr")).toBe("ADVANTAGE");
    expect(relationship("Tortad", "Radae")).toBe("ADVANTAGE");
    expect(relationship("Riposje", "Bagr")).toBe("ADVANTAGE");
  });
});

describe("adjacency", () => {
  it("classifies neighbours, opposites and the rest", () => {
    expect(adjacency("Bagr", "Radae")).toBe("ADJACENT");
    expect(adjacency("Tortad", "Bagr")).toBe("ADJACENT");
    expect(adjacency("Radae", "Bagr")).toBe("ADJACENT");
    expect(adjacency("Bagr", "Tigr")).toBe("OPPOSITE");
    expect(adjacency("Darda", "Tortad")).toBe("OPPOSITE");
    expect(adjacency("Bagr", "Darda")).toBe("OTHER");
    expect(adjacency("Bagr", "Bagr")).toBe("OTHER");
  });

  it("maps each class to its roll adjustment", () => {
    expect(adjacencyModifier("ADJACENT")).toBe(1);
    expect(adjacencyModifier("OPPOSITE")).toBe(-1);
    expect(adjacencyModifier("OTHER")).toBe(0);
  });
});

describe("parseStance", () => {
  it("accepts any casing and surrounding whitespace", () => {
    expect(parseStance("tigr")).toBe("Tigr");
    expect(parseStance("  RIPOSJE ")).toBe("Riposje");
  });

  it("rejects unknown names", () => {
    expectRuleError(() => parseStance("Sword"), "INVALID_STANCE");
    expect(isStance("bagr")).toBe(false);
    expect(isStance("Bagr")).toBe(true);
  });
});

describe("advantageTargets", () => {
  it("wraps around the end of the cycle", () => {
    expect(advantageTargets("Riposje")).toEqual(["Bagr", "Tortad"]);
  });
});

describe("stanceChart", () => {
  it("lists what each stance beats and loses to", () => {
    const chart = stanceChart();
    expect(chart).toHaveLength(6);
    expect(chart[0]).toEqual({
      stance: "Bagr",
      beats: ["Radae", "Darda"],
      losesTo: ["Riposje", "Tortad"],
      opposite: "Tigr"
    });
    expect(chart[5]).toEqual({
      stance: "Tortad",
      beats: ["Bagr", "Radae"],
      losesTo: ["Tigr", "Riposje"],
      opposite: "Darda"
    });
  });
});

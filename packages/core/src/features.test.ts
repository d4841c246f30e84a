import { describe, expect, it } from "vitest";
import { FeatureVectorError, MalformedInputError } from "./errors.js";
import {
  FEATURE_VECTOR_LENGTH,
  closestLetters,
  featureDistance,
  fromVector,
  symbolFeatures,
  symbolText,
  toVector,
  type FeatureSymbol,
} from "./features.js";
import { symbols } from "./test-tables.js";
import type { BreakType, PhoneLength, Stress } from "./types.js";

const STRESSES: Stress[] = ["NONE", "PRIMARY", "SECONDARY"];
const LENGTHS: PhoneLength[] = ["NORMAL", "LONG", "HALF_LONG", "EXTRA_SHORT"];
const BREAKS: BreakType[] = ["MINOR", "MAJOR", "WORD", "SYLLABLE"];

function segment(text: string): FeatureSymbol {
  return symbolFeatures(text, symbols);
}

describe("feature vectors", () => {
  it("reads back every letter with each stress and length", () => {
    for (const { features } of symbols.letters()) {
      for (const stress of STRESSES) {
        for (const length of LENGTHS) {
          const symbol: FeatureSymbol = {
            kind: "SEGMENT",
            letter: features,
            stress,
            length,
            nasalized: length === "LONG",
            velarized: stress === "SECONDARY",
          };
          const vector = toVector(symbol);
          expect(vector).toHaveLength(FEATURE_VECTOR_LENGTH);
          expect(fromVector(vector)).toEqual(symbol);
        }
      }
    }
  });

  it.each(BREAKS)("reads back a %s break", (breakType) => {
    expect(fromVector(toVector({ kind: "BREAK", breakType }))).toEqual({ kind: "BREAK", breakType });
  });

  it("rejects a vector of the wrong length", () => {
    expect(() => fromVector([1, 0])).toThrow(FeatureVectorError);
  });

  it("rejects a segment without a letter kind", () => {
    const vector = toVector({ kind: "BREAK", breakType: "MINOR" });
    vector[0] = 1;
    vector[1] = 0;
    expect(() => fromVector(vector)).toThrow("Invalid feature vector: letterKind is missing");
  });
});

describe("symbolFeatures", () => {
  it("reads stress, length and nasalization", () => {
    expect(segment("ˈa\u0303ː")).toEqual({
      kind: "SEGMENT",
      letter: { kind: "VOWEL", height: "open", placement: "front", rounded: false },
      stress: "PRIMARY",
      length: "LONG",
      nasalized: true,
      velarized: false,
    });
  });

  it("reads velarization", () => {
    expect(segment("lˠ")).toMatchObject({
      letter: { kind: "CONSONANT", type: "lateral-approximant", place: "alveolar", voiced: true },
      velarized: true,
    });
  });

  it("reads breaks", () => {
    expect(segment("|")).toEqual({ kind: "BREAK", breakType: "MINOR" });
  });

  it("rejects more than one phone", () => {
    expect(() => segment("ab")).toThrow(MalformedInputError);
  });
});

describe("symbolText", () => {
  it("writes stress, diacritics and length around the letter", () => {
    expect(symbolText(segment("ˈa\u0303ː"), symbols)).toBe("ˈ\u00E3ː");
    expect(symbolText({ kind: "BREAK", breakType: "SYLLABLE" }, symbols)).toBe(".");
  });

  it("writes every letter back to one with the same features", () => {
    const changed = symbols.letters().filter(({ symbol }) => {
      const text = symbolText(segment(symbol), symbols);
      return text === undefined || JSON.stringify(segment(text)) !== JSON.stringify(segment(symbol));
    });
    expect(changed).toEqual([]);
  });

  it("picks the first registered letter among equal ones", () => {
    expect(symbolText(segment("ɝ"), symbols)).toBe("ɚ");
  });
});

describe("distances", () => {
  it("weights voicing by half", () => {
    expect(featureDistance(segment("p"), segment("p"))).toBe(0);
    expect(featureDistance(segment("p"), segment("b"))).toBeCloseTo(1);
  });

  it.each([
    ["p", "t"],
    ["ʝ", "ʑ"],
    ["ɑ", "ɒ"],
    ["i", "y"],
  ])("finds %s nearest to %s", (from, to) => {
    expect(closestLetters(from, symbols)[0]).toBe(to);
  });

  it("puts letters with equal features first and leaves out the letter itself", () => {
    const closest = closestLetters("ɝ", symbols);
    expect(closest.slice(0, 2)).toEqual(["ɚ", "ɹ\u0329"]);
    expect(closest).not.toContain("ɝ");
  });
});

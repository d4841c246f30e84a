import { describe, expect, it } from "vitest";
import { G_FORMS, R_LIKE, consonantDistance, guessPhonemeMap, guessPhonemes, vowelDistance } from "./accent.js";
import { parsePhonemeTable } from "./phonemes.js";
import { phonemeTable, symbols } from "./test-tables.js";

const enUs = phonemeTable("en-us");
const deDe = phonemeTable("de-de");

describe("distances", () => {
  it("weights vowel height twice", () => {
    const a = { kind: "VOWEL", height: "open", placement: "front", rounded: false } as const;
    const o = { kind: "VOWEL", height: "close-mid", placement: "back", rounded: true } as const;
    expect(vowelDistance(a, a)).toBe(0);
    expect(vowelDistance(a, o)).toBe(4 * 2 + 4 + 1);
  });

  it("counts manner, place and voicing steps", () => {
    const t = { kind: "CONSONANT", type: "plosive", place: "alveolar", voiced: false } as const;
    const z = { kind: "CONSONANT", type: "fricative", place: "alveolar", voiced: true } as const;
    expect(consonantDistance(t, z)).toBe(2 + 0 + 1);
  });
});

describe("guessPhonemes", () => {
  it.each([
    ["g", "ɡ"],
    ["ɚ", "ə"],
    ["ɑ", "a"],
    ["i", "iː"],
    ["ð", "v"],
    ["θ", "f"],
  ])("maps %s to %s", (from, to) => {
    expect(guessPhonemes(from, deDe, symbols)).toBe(to);
  });

  it("keeps an exact match", () => {
    expect(guessPhonemes("k", deDe, symbols)).toBe("k");
  });

  it("matches on letters, ignoring length and diacritics", () => {
    expect(guessPhonemes("ɐ\u032Fː", deDe, symbols)).toBe("ɐ");
  });

  it("maps a phoneme listed as a replacement to its owner", () => {
    expect(guessPhonemes("aʊ", deDe, symbols)).toBe("aʊ\u032F");
    expect(guessPhonemes("ɔɪ", deDe, symbols)).toBe("ɔʏ\u032F");
  });

  it("matches a diphthong to a diphthong with the same letters", () => {
    const { table } = parsePhonemeTable("a k(a)tze\naʊ\u032F h(au)s\nʊ m(u)tter\n", "xx");
    expect(guessPhonemes("aʊ", table, symbols)).toBe("aʊ\u032F");
  });

  it("splits a diphthong the target lacks", () => {
    expect(guessPhonemes("oʊ", deDe, symbols)).toEqual(["oː", "ʊ"]);
    expect(guessPhonemes("eɪ", deDe, symbols)).toEqual(["eː", "ɪ"]);
    const { table } = parsePhonemeTable("a k(a)tze\nʊ m(u)tter\n", "xx");
    expect(guessPhonemes("aʊ", table, symbols)).toEqual(["a", "ʊ"]);
  });

  it.each(G_FORMS.map((g) => [g]))("keeps %s a g", (g) => {
    expect(guessPhonemes(g, deDe, symbols)).toBe("ɡ");
  });

  it.each(R_LIKE.map((r) => [r]))("maps r-like %s to the target's rhotic", (r) => {
    expect(guessPhonemes(r, deDe, symbols)).toBe("ʁ");
    expect(guessPhonemes(r, enUs, symbols)).toBe("ɹ");
  });
});

describe("guessPhonemeMap", () => {
  it("maps r-like phonemes onto the target's rhotic", () => {
    const mapping = guessPhonemeMap(enUs, deDe, symbols);
    expect(mapping.get("ɹ")).toBe("ʁ");
    expect(mapping.get("t\u0361ʃ")).toBe("t\u0361ʃ");
    expect(mapping.get("aʊ")).toBe("aʊ\u032F");
    expect(mapping.get("oʊ")).toEqual(["oː", "ʊ"]);
    expect(guessPhonemeMap(deDe, enUs, symbols).get("ʁ")).toBe("ɹ");
  });
});

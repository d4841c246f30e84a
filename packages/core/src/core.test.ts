import { describe, expect, it } from "vitest";
import {
  PhonemeTableError,
  SymbolTable,
  Trie,
  UnknownSymbolError,
  comparePhonemeSetIds,
  formatPhonemeSetId,
  isPhonemeSetId,
  parsePhonemeSetId,
  parseSymbolDefinitions,
  resolveLanguage,
} from "./index.js";
import { symbols } from "./test-tables.js";

const minimal = {
  vowels: [{ symbol: "a", height: "open", placement: "front", rounded: false }],
  schwas: [],
  consonants: [],
  diacritics: [],
  suprasegmentals: [],
  ties: [],
};

describe("symbol table", () => {
  it("classifies letters, diacritics, suprasegmentals and ties", () => {
    expect(symbols.classify("a")).toMatchObject({
      category: "LETTER",
      features: { kind: "VOWEL", height: "open", placement: "front", rounded: false },
    });
    expect(symbols.categoryOf("\u0303")).toBe("DIACRITIC");
    expect(symbols.classify("ː")).toMatchObject({ category: "SUPRASEGMENTAL", role: "LONG" });
    expect(symbols.categoryOf("\u0361")).toBe("TIE");
  });

  it("looks up multi-codepoint letters by normalized form", () => {
    expect(symbols.letter("t\u0361ʃ")?.features).toEqual({
      kind: "CONSONANT",
      type: "affricate",
      place: "post-alveolar",
      voiced: false,
    });
    expect(symbols.has("c\u0327")).toBe(true);
  });

  it("throws for unknown symbols", () => {
    expect(() => symbols.classify("%", 4)).toThrow(UnknownSymbolError);
    expect(() => symbols.classify("%", 4)).toThrow('Unknown symbol "%" (U+0025) at offset 4');
    expect(symbols.lookup("%")).toBeUndefined();
  });

  it("rejects duplicate definitions", () => {
    const definitions = parseSymbolDefinitions({ ...minimal, schwas: [{ symbol: "a", rColoured: false }] });
    expect(() => new SymbolTable(definitions)).toThrow(PhonemeTableError);
  });

  it("rejects definitions that fail validation", () => {
    expect(() => parseSymbolDefinitions({ ...minimal, vowels: [{ symbol: "a", height: "tall" }] })).toThrow();
  });

  it("counts what it registered", () => {
    const table = new SymbolTable(parseSymbolDefinitions(minimal));
    expect(table.size).toBe(1);
    expect(table.letters().map((l) => l.symbol)).toEqual(["a"]);
  });
});

describe("phoneme set ids", () => {
  it("validates and splits ids", () => {
    expect(isPhonemeSetId("en-us/cmudict")).toBe(true);
    expect(isPhonemeSetId("EN US")).toBe(false);
    expect(parsePhonemeSetId("en-us/cmudict")).toEqual({ language: "en-us", variant: "cmudict" });
    expect(formatPhonemeSetId({ language: "de-de" })).toBe("de-de");
    expect(() => parsePhonemeSetId("../etc")).toThrow("Invalid phoneme set id: ../etc");
  });

  it("resolves aliases after normalizing case and separators", () => {
    expect(resolveLanguage("EN", { en: "en-us" })).toBe("en-us");
    expect(resolveLanguage("de_DE")).toBe("de-de");
  });

  it("sorts a language before its variants", () => {
    expect(["fr-fr", "en-us/cmudict", "en-us"].sort(comparePhonemeSetIds)).toEqual(["en-us", "en-us/cmudict", "fr-fr"]);
  });
});

describe("trie", () => {
  it("finds the longest key and keeps the first value per key", () => {
    const trie = new Trie<string>();
    trie.insert("t", "t");
    trie.insert("tS", "t\u0361ʃ");
    expect(trie.insert("t", "other")).toBe(false);
    expect(trie.longestMatch(Array.from("tSa"), 0)).toEqual({ value: "t\u0361ʃ", length: 2 });
    expect(trie.longestMatch(Array.from("ta"), 0)).toEqual({ value: "t", length: 1 });
    expect(trie.longestMatch(Array.from("a"), 0)).toBeUndefined();
    expect(trie.size).toBe(2);
  });
});

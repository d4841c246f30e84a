import { describe, expect, it } from "vitest";
import { PhonemeTableError, UnmappableSymbolError } from "./errors.js";
import { NotationTable, fromNotation, ipaToNotation, notationToIpa, toNotation } from "./notation.js";
import { notation, symbols } from "./test-tables.js";
import { tokenize } from "./tokenizer.js";

const sampa = notation("sampa");
const espeak = notation("espeak");

describe("sampa", () => {
  it("converts a stressed word both ways", () => {
    const phones = tokenize("mʊmˈbaɪ", symbols);
    expect(phones.map((p) => p.text)).toEqual(["m", "ʊ", "m", "ˈb", "a", "ɪ"]);
    expect(toNotation(phones, sampa)).toBe('mUm"baI');

    const back = fromNotation('mUm"baI', sampa);
    expect(back.map((p) => [p.text, p.offset])).toEqual([
      ["m", 0],
      ["ʊ", 1],
      ["m", 2],
      ["ˈb", 3],
      ["a", 5],
      ["ɪ", 6],
    ]);
  });

  it("keeps word boundaries", () => {
    expect(ipaToNotation("ˈhɛloʊ wɝld", sampa)).toBe('"hEloU w3`ld');
    expect(ipaToNotation("ab", sampa, { separator: " " })).toBe("a b");
    expect(ipaToNotation("a | b", sampa, { separator: " " })).toBe("a | b");
    expect(ipaToNotation("ab|cd", sampa)).toBe("ab | cd");
  });

  it("reads aliases and emits the first token", () => {
    expect(ipaToNotation("tʲ", sampa)).toBe("t_j");
    expect(notationToIpa("t_j", sampa)).toBe("tʲ");
    expect(notationToIpa("t'", sampa)).toBe("tʲ");
  });

  it("prefers multigraph tokens, so an untied affricate comes back tied", () => {
    expect(ipaToNotation("t\u0361ʃ", sampa)).toBe("tS");
    expect(notationToIpa(ipaToNotation("tʃ", sampa), sampa)).toBe("t\u0361ʃ");
  });

  it("resolves a shared token to the first IPA entry", () => {
    expect(sampa.tokenFor("g")).toBe("g");
    expect(sampa.ipaFor("g")).toBe("ɡ");
  });

  it("drops symbols mapped to an empty token", () => {
    expect(ipaToNotation("a¹", sampa)).toBe("a");
  });

  it("fails on tokens it does not know", () => {
    try {
      notationToIpa("a%", sampa);
      throw new Error("expected an error");
    } catch (err) {
      expect(err).toBeInstanceOf(UnmappableSymbolError);
      expect(err).toMatchObject({ code: "UNMAPPABLE_SYMBOL", symbol: "%", offset: 1, notation: "sampa" });
    }
  });

  it("fails on symbols with no token", () => {
    const [phone] = tokenize("a", symbols);
    expect(() => sampa.encodePhone({ ...phone, text: "%" })).toThrow(UnmappableSymbolError);
  });
});

describe("espeak", () => {
  it("wraps output on request", () => {
    expect(ipaToNotation("ˈhɛloʊ wɝld", espeak, { wrap: true })).toBe("[['hEloU w3ld]]");
    expect(ipaToNotation("ˈhɛloʊ wɝld", espeak)).toBe("'hEloU w3ld");
    expect(ipaToNotation("a ‖ b", espeak)).toBe("a _::_:: b");
  });

  it("ignores brackets and reports offsets into the wrapped text", () => {
    expect(notationToIpa("[[h@l'oU]]", espeak, " ")).toBe("h ə l ˈo ʊ");
    expect(fromNotation("[[h@l]]", espeak).map((p) => p.offset)).toEqual([2, 3, 4]);
  });
});

describe("NotationTable", () => {
  it("requires a token for every registered symbol", () => {
    expect(() => new NotationTable({ name: "partial", symbols: { a: "a" } }, symbols)).toThrow(PhonemeTableError);
  });

  it.each([
    ["sampa", sampa],
    ["espeak", espeak],
  ])("reads back any two letters written side by side in %s", (_name, table) => {
    const unreadable: string[] = [];
    const letters = symbols.letters().filter(({ symbol }) => ipaToNotation(symbol, table) !== "");
    for (const a of letters) {
      for (const b of letters) {
        const text = ipaToNotation(a.symbol, table) + ipaToNotation(b.symbol, table);
        try {
          fromNotation(text, table);
        } catch {
          unreadable.push(text);
        }
      }
    }
    expect(unreadable).toEqual([]);
  });

  it("steps back to a shorter token when the longest one strands the rest", () => {
    expect(fromNotation("bv\\", sampa).map((p) => p.text)).toEqual(["b", "ʋ"]);
    expect(fromNotation("ts<lat>", espeak).map((p) => p.text)).toEqual(["t", "ɬ"]);
    expect(fromNotation("ts<lat>", espeak).map((p) => p.offset)).toEqual([0, 1]);
  });

  it.each([
    ["sampa", sampa],
    ["espeak", espeak],
  ])("round-trips every letter whose token maps back to it in %s", (_name, table) => {
    for (const { symbol } of symbols.letters()) {
      const token = table.tokenFor(symbol);
      if (!token || table.ipaFor(token) !== symbol) {
        continue;
      }
      expect(ipaToNotation(symbol, table)).toBe(token);
      expect(fromNotation(token, table).map((p) => p.text)).toEqual([symbol]);
    }
  });
});

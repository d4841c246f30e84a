import { describe, expect, it } from "vitest";
import { PhonemeTableError, UnmappableSymbolError, UnsupportedLanguageError } from "./errors.js";
import {
  PhonemeRegistry,
  alternateToPhones,
  groupPhonemes,
  parseIpaMap,
  parsePhonemeTable,
  phonemesToAlternate,
  validatePhonemeTable,
} from "./phonemes.js";
import { phonemeTable, symbols } from "./test-tables.js";
import { tokenize } from "./tokenizer.js";
import type { GroupOptions, PhonemeTable } from "./types.js";

const enUs = phonemeTable("en-us");
const cmudict = phonemeTable("en-us/cmudict");

function group(text: string, table: PhonemeTable, options: GroupOptions = {}): string[] {
  return groupPhonemes(tokenize(text, symbols), table, symbols, options).map((p) => p.text);
}

function tableError(fn: () => unknown): PhonemeTableError {
  try {
    fn();
  } catch (err) {
    if (err instanceof PhonemeTableError) {
      return err;
    }
    throw err;
  }
  throw new Error("expected a PhonemeTableError");
}

describe("parsePhonemeTable", () => {
  it("reads rules in order, skipping comments and blank lines", () => {
    const { table, warnings } = parsePhonemeTable("# vowels\na f(a)ther ɑ ɑː # open\n\nt\u0361ʃ (ch)in tʃ\n", "xx");
    expect(warnings).toEqual([]);
    expect(table).toMatchObject({ id: "xx", language: "xx" });
    expect(table.rules).toEqual([
      { phoneme: "a", example: "f(a)ther", replacements: ["ɑ", "ɑː"], line: 2 },
      { phoneme: "t\u0361ʃ", example: "(ch)in", replacements: ["tʃ"], line: 4 },
    ]);
  });

  it("splits language and variant from the set id", () => {
    expect(cmudict).toMatchObject({ id: "en-us/cmudict", language: "en-us", variant: "cmudict" });
  });

  it("warns about a repeated phoneme and keeps the first line", () => {
    const { table, warnings } = parsePhonemeTable("m (m)a\nm (m)e ɱ\n", "xx");
    expect(warnings).toEqual([{ line: 2, message: 'duplicate phoneme "m" ignored (first defined on line 1)' }]);
    expect(table.rules).toEqual([{ phoneme: "m", example: "(m)a", replacements: [], line: 1 }]);
  });

  it("rejects a replacement claimed by two rules", () => {
    const err = tableError(() => parsePhonemeTable("a x ɑ\nɛ y ɑ\n", "xx"));
    expect(err).toMatchObject({ code: "INVALID_TABLE", line: 2 });
  });

  it("rejects a replacement equal to another rule's phoneme", () => {
    const err = tableError(() => parsePhonemeTable("a x e\ne y\n", "xx"));
    expect(err).toMatchObject({ code: "INVALID_TABLE", line: 1 });
  });

  it("requires an example word", () => {
    expect(tableError(() => parsePhonemeTable("\na\n", "xx")).line).toBe(2);
  });

  it("rejects surfaces made of unregistered symbols", () => {
    const { table } = parsePhonemeTable("a x %\n", "xx");
    expect(tableError(() => validatePhonemeTable(table, symbols)).line).toBe(1);
    expect(() => validatePhonemeTable(enUs, symbols)).not.toThrow();
  });
});

describe("parseIpaMap", () => {
  it("maps canonical IPA to the alternate symbol", () => {
    expect([...parseIpaMap("# comment\nAA ɑ\nAE æ\n")]).toEqual([
      ["ɑ", "AA"],
      ["æ", "AE"],
    ]);
  });

  it("rejects duplicate symbols and duplicate IPA", () => {
    expect(tableError(() => parseIpaMap("AA ɑ\nAA æ\n")).line).toBe(2);
    expect(tableError(() => parseIpaMap("AA ɑ\nAO ɑ\n")).line).toBe(2);
  });
});

describe("groupPhonemes", () => {
  it("folds an untied affricate into its canonical phoneme", () => {
    const { table } = parsePhonemeTable("d\u0361ʒ (j)ive dʒ ʒ\nʌ c(u)t\ns (s)it\nt (t)ie\n", "xx");
    const phonemes = groupPhonemes(tokenize("dʒʌst", symbols), table, symbols);
    expect(phonemes.map((p) => p.text)).toEqual(["d\u0361ʒ", "ʌ", "s", "t"]);
    expect(phonemes.every((p) => p.matched)).toBe(true);
    expect(phonemes[0].phones.map((p) => p.text)).toEqual(["d", "ʒ"]);
  });

  it("prefers the longer surface at the same position", () => {
    const { table } = parsePhonemeTable("r (r)ot χ ʁ ɹ ʀ\nʁa (ra)t\n", "xx");
    expect(groupPhonemes(tokenize("ʁa", symbols), table, symbols).map((p) => p.text)).toEqual(["ʁa"]);
    expect(groupPhonemes(tokenize("ʁ", symbols), table, symbols).map((p) => p.text)).toEqual(["r"]);
  });

  it("keeps stress on request", () => {
    expect(group("/dʒʌst ə kˈaʊ/", enUs, { keepStress: true })).toEqual(["d\u0361ʒ", "ʌ", "s", "t", "ə", "k", "ˈaʊ"]);
    const plain = groupPhonemes(tokenize("kˈaʊ", symbols), enUs, symbols);
    expect(plain.map((p) => [p.text, p.stress])).toEqual([
      ["k", "NONE"],
      ["aʊ", "NONE"],
    ]);
  });

  it("never matches across words or breaks", () => {
    expect(group("aʊ", enUs)).toEqual(["aʊ"]);
    expect(group("a ʊ", enUs)).toEqual(["ɑ", "ʊ"]);
    expect(group("a|ʊ", enUs)).toEqual(["ɑ", "|", "ʊ"]);
  });

  it("passes unknown phones through unmatched", () => {
    const [phoneme] = groupPhonemes(tokenize("x", symbols), enUs, symbols);
    expect(phoneme).toMatchObject({ text: "x", phoneme: "x", matched: false, setId: "en-us" });
  });

  it("drops tones before matching when asked", () => {
    expect(group("á˥", enUs)).toEqual(["á˥"]);
    expect(group("á˥", enUs, { dropTones: true })).toEqual(["ɑ"]);
  });

  it("is a fixed point once canonical", () => {
    const first = groupPhonemes(tokenize("ˈhɛloʊ wɝld t\u0361ʃɑːm", symbols), enUs, symbols);
    expect(first.map((p) => p.phoneme)).toEqual(["h", "ɛ", "l", "oʊ", "w", "ɚ", "l", "d", "t\u0361ʃ", "ɑ", "m"]);
    const again = groupPhonemes(
      first.flatMap((p) => tokenize(p.phoneme, symbols)),
      enUs,
      symbols,
    );
    expect(again.map((p) => p.phoneme)).toEqual(first.map((p) => p.phoneme));
  });
});

describe("alternate alphabets", () => {
  it("attaches alternate symbols and converts them back to phones", () => {
    const phonemes = groupPhonemes(tokenize("ˈhɛloʊ", symbols), cmudict, symbols);
    expect(phonemes[0].alternate).toEqual({ setId: "en-us/cmudict", symbol: "HH" });
    expect(phonemesToAlternate(phonemes)).toEqual(["HH", "EH", "L", "OW"]);

    const phones = alternateToPhones("HH EH L OW", cmudict, symbols);
    expect(phones.map((p) => [p.text, p.offset, p.word])).toEqual([
      ["h", 0, 0],
      ["ɛ", 3, 1],
      ["l", 6, 2],
      ["o", 8, 3],
      ["ʊ", 8, 3],
    ]);
  });

  it("fails on phonemes and symbols outside the alphabet", () => {
    const phonemes = groupPhonemes(tokenize("x", symbols), cmudict, symbols);
    expect(() => phonemesToAlternate(phonemes)).toThrow(UnmappableSymbolError);
    expect(() => alternateToPhones("HH QQ", cmudict, symbols)).toThrow(UnmappableSymbolError);
  });
});

describe("PhonemeRegistry", () => {
  const registry = new PhonemeRegistry([enUs, cmudict], { en: "en-us" });

  it("resolves ids and aliases", () => {
    expect(registry.get("en")).toBe(enUs);
    expect(registry.get("EN_US")).toBe(enUs);
    expect(registry.get("en-us/cmudict")).toBe(cmudict);
    expect(registry.ids()).toEqual(["en-us", "en-us/cmudict"]);
  });

  it("throws for unknown sets", () => {
    expect(() => registry.get("xx-yy")).toThrow(UnsupportedLanguageError);
    try {
      registry.get("xx-yy");
    } catch (err) {
      expect(err).toMatchObject({ code: "UNSUPPORTED_LANGUAGE", supported: ["en-us", "en-us/cmudict"] });
    }
  });
});

import { PhonemeTableError, UnknownSymbolError } from "./errors.js";
import type { SymbolDefinitions } from "./schemas.js";
import type { LetterInfo, SymbolCategory, SymbolInfo } from "./types.js";
import { normalizeNfc } from "./unicode.js";

/**
 * Registry of known IPA symbols keyed by NFC form. Built once from static
 * definitions and frozen; every lookup is a map read.
 */
export class SymbolTable {
  private readonly bySymbol: ReadonlyMap<string, SymbolInfo>;

  constructor(definitions: SymbolDefinitions) {
    const entries = new Map<string, SymbolInfo>();
    const register = (info: SymbolInfo): void => {
      const key = normalizeNfc(info.symbol);
      if (entries.has(key)) {
        throw new PhonemeTableError("symbols", `Duplicate symbol "${key}"`);
      }
      entries.set(key, Object.freeze({ ...info, symbol: key }));
    };

    for (const v of definitions.vowels) {
      register({
        category: "LETTER",
        symbol: v.symbol,
        features: { kind: "VOWEL", height: v.height, placement: v.placement, rounded: v.rounded },
      });
    }
    for (const s of definitions.schwas) {
      register({ category: "LETTER", symbol: s.symbol, features: { kind: "SCHWA", rColoured: s.rColoured } });
    }
    for (const c of definitions.consonants) {
      register({
        category: "LETTER",
        symbol: c.symbol,
        features: { kind: "CONSONANT", type: c.type, place: c.place, voiced: c.voiced },
      });
    }
    for (const d of definitions.diacritics) {
      register({ category: "DIACRITIC", symbol: d.symbol, name: d.name, modifier: d.modifier });
    }
    for (const s of definitions.suprasegmentals) {
      register({ category: "SUPRASEGMENTAL", symbol: s.symbol, name: s.name, role: s.role });
    }
    for (const t of definitions.ties) {
      register({ category: "TIE", symbol: t.symbol, name: t.name });
    }

    for (const info of entries.values()) {
      if (info.category !== "LETTER" && Array.from(info.symbol).length !== 1) {
        throw new PhonemeTableError("symbols", `Only letters may span several codepoints: "${info.symbol}"`);
      }
    }

    this.bySymbol = entries;
    Object.freeze(this);
  }

  lookup(symbol: string): SymbolInfo | undefined {
    return this.bySymbol.get(normalizeNfc(symbol));
  }

  has(symbol: string): boolean {
    return this.bySymbol.has(normalizeNfc(symbol));
  }

  classify(symbol: string, offset?: number): SymbolInfo {
    const info = this.lookup(symbol);
    if (!info) {
      throw new UnknownSymbolError(symbol, offset);
    }
    return info;
  }

  categoryOf(codepoint: string, offset?: number): SymbolCategory {
    return this.classify(codepoint, offset).category;
  }

  letter(symbol: string): LetterInfo | undefined {
    const info = this.lookup(symbol);
    return info?.category === "LETTER" ? info : undefined;
  }

  symbols(): SymbolInfo[] {
    return [...this.bySymbol.values()];
  }

  letters(): LetterInfo[] {
    return this.symbols().filter((info): info is LetterInfo => info.category === "LETTER");
  }

  get size(): number {
    return this.bySymbol.size;
  }
}

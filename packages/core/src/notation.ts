import { PhonemeTableError, UnmappableSymbolError } from "./errors.js";
import type { SymbolTable } from "./symbols.js";
import { assemblePhones, groupWords, joinPhones, tokenize } from "./tokenizer.js";
import { Trie, type TrieMatch } from "./trie.js";
import type { NotationDefinition, Phone, ToNotationOptions, TokenizeOptions } from "./types.js";
import { isWhitespace, normalizeNfc, normalizeNfd, type SourceCodepoint } from "./unicode.js";

/** Sentinel stored in the reverse trie for characters the notation ignores. */
const IGNORED = null;

/**
 * IPA <-> notation token table. Every registered symbol must have an entry;
 * an empty token means the symbol is dropped in the notation.
 */
export class NotationTable {
  readonly name: string;
  readonly wrap?: readonly [string, string];
  private readonly forward = new Trie<string>();
  private readonly reverse = new Trie<string | typeof IGNORED>();

  constructor(
    definition: NotationDefinition,
    readonly symbols: SymbolTable,
  ) {
    this.name = definition.name;
    this.wrap = definition.wrap;

    const entries = Object.entries(definition.symbols).map(([ipa, value]) => ({
      ipa: normalizeNfc(ipa),
      tokens: typeof value === "string" ? [value] : value,
    }));
    const covered = new Set(entries.map((e) => e.ipa));
    const missing = symbols
      .symbols()
      .map((info) => info.symbol)
      .filter((symbol) => !covered.has(symbol));
    if (missing.length > 0) {
      throw new PhonemeTableError(
        `notations/${this.name}`,
        `no token for ${missing.map((s) => `"${s}"`).join(", ")}`,
      );
    }

    for (const { ipa, tokens } of entries) {
      const [primary] = tokens;
      if (!this.forward.insert(normalizeNfd(ipa), primary)) {
        throw new PhonemeTableError(`notations/${this.name}`, `duplicate entry for "${ipa}"`);
      }
      for (const token of tokens) {
        if (token.length > 0) {
          this.reverse.insert(token, ipa);
        }
      }
    }
    for (const ignored of definition.ignore ?? []) {
      this.reverse.insert(ignored, IGNORED);
    }
  }

  /** Token emitted for an IPA symbol or multigraph, or undefined when absent. */
  tokenFor(ipa: string): string | undefined {
    return this.forward.get(normalizeNfd(ipa));
  }

  /** IPA for a notation token; the first entry registered for a shared token wins. */
  ipaFor(token: string): string | undefined {
    return this.reverse.get(token) ?? undefined;
  }

  encodePhone(phone: Phone): string {
    const chars = Array.from(normalizeNfd(phone.text));
    let out = "";
    let i = 0;
    while (i < chars.length) {
      const match = this.forward.longestMatch(chars, i);
      if (!match) {
        throw new UnmappableSymbolError(chars[i], phone.offset, this.name, "to");
      }
      out += match.value;
      i += match.length;
    }
    return out;
  }

  /**
   * Splits notation text into IPA codepoints tagged with their token's offset.
   * Tokens are tried longest first; a token that leaves the rest unreadable is
   * retried with the next shorter one.
   */
  decode(text: string): SourceCodepoint[] {
    const chars = Array.from(text);
    const offsets: number[] = [];
    let offset = 0;
    for (const ch of chars) {
      offsets.push(offset);
      offset += ch.length;
    }

    const chosen = new Map<number, TrieMatch<string | typeof IGNORED>>();
    const dead = new Set<number>();
    let furthest = 0;
    const reach = (i: number): boolean => {
      if (i >= chars.length) return true;
      if (dead.has(i)) return false;
      furthest = Math.max(furthest, i);
      if (isWhitespace(chars[i])) {
        return reach(i + 1);
      }
      for (const match of this.reverse.matches(chars, i)) {
        if (reach(i + match.length)) {
          chosen.set(i, match);
          return true;
        }
      }
      dead.add(i);
      return false;
    };
    if (!reach(0)) {
      throw new UnmappableSymbolError(chars[furthest], offsets[furthest], this.name, "from");
    }

    const out: SourceCodepoint[] = [];
    let i = 0;
    while (i < chars.length) {
      const match = chosen.get(i);
      if (!match) {
        out.push({ ch: chars[i], offset: offsets[i] });
        i += 1;
        continue;
      }
      if (match.value !== IGNORED) {
        for (const ipaChar of normalizeNfd(match.value)) {
          out.push({ ch: ipaChar, offset: offsets[i] });
        }
      }
      i += match.length;
    }
    return out;
  }

  unwrap(text: string): { body: string; shift: number } {
    const trimmed = text.trim();
    const shift = text.indexOf(trimmed);
    if (this.wrap && trimmed.startsWith(this.wrap[0]) && trimmed.endsWith(this.wrap[1])) {
      const [left, right] = this.wrap;
      return { body: trimmed.slice(left.length, trimmed.length - right.length), shift: shift + left.length };
    }
    return { body: text, shift: 0 };
  }
}

/** Phones of one word are joined by `separator`; words by a single space. */
export function toNotation(phones: Iterable<Phone>, table: NotationTable, options: ToNotationOptions = {}): string {
  const encoded = Array.from(phones, (phone) => ({ phone, token: table.encodePhone(phone) })).filter(
    ({ token }) => token.length > 0,
  );
  const body = groupWords(encoded, ({ phone }) => phone)
    .map((word) => word.map(({ token }) => token).join(options.separator ?? ""))
    .join(" ");
  if (options.wrap && table.wrap) {
    return `${table.wrap[0]}${body}${table.wrap[1]}`;
  }
  return body;
}

/** Decodes notation text into phones; offsets point into `text`. */
export function fromNotation(text: string, table: NotationTable, options: TokenizeOptions = {}): Phone[] {
  const { body, shift } = table.unwrap(text);
  const stream = table.decode(body).map(({ ch, offset }) => ({ ch, offset: offset + shift }));
  return Array.from(assemblePhones(stream, table.symbols, options));
}

export function ipaToNotation(ipa: string, table: NotationTable, options: ToNotationOptions = {}): string {
  return toNotation(tokenize(ipa, table.symbols), table, options);
}

export function notationToIpa(text: string, table: NotationTable, separator = ""): string {
  return joinPhones(fromNotation(text, table), separator);
}

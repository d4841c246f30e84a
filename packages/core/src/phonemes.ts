import { IpaError, PhonemeTableError, UnmappableSymbolError, UnsupportedLanguageError } from "./errors.js";
import { comparePhonemeSetIds, parsePhonemeSetId, resolveLanguage } from "./phoneme-set-id.js";
import type { SymbolTable } from "./symbols.js";
import { phoneBody, tokenize } from "./tokenizer.js";
import type {
  GroupOptions,
  Phone,
  Phoneme,
  PhonemeRule,
  PhonemeSetId,
  PhonemeTable,
  PhonemeTableWarning,
} from "./types.js";
import { normalizeNfc, tokenizeWords } from "./unicode.js";

export interface ParsedPhonemeTable {
  table: PhonemeTable;
  warnings: PhonemeTableWarning[];
}

function stripComment(line: string): string {
  const hash = line.indexOf("#");
  return (hash >= 0 ? line.slice(0, hash) : line).trim();
}

/**
 * Builds an immutable table from ordered rules. A surface string may belong
 * to one rule only, either as its phoneme or as one of its replacements.
 */
export function createPhonemeTable(
  setId: PhonemeSetId,
  rules: PhonemeRule[],
  alphabet?: ReadonlyMap<string, string>,
): PhonemeTable {
  const { language, variant } = parsePhonemeSetId(setId);
  const owners = new Map<string, PhonemeRule>();

  for (const rule of rules) {
    const existing = owners.get(rule.phoneme);
    if (existing) {
      throw new PhonemeTableError(
        setId,
        `phoneme "${rule.phoneme}" is already claimed by "${existing.phoneme}" (line ${existing.line})`,
        rule.line,
      );
    }
    owners.set(rule.phoneme, rule);
  }
  for (const rule of rules) {
    for (const replacement of rule.replacements) {
      const existing = owners.get(replacement);
      if (existing && existing !== rule) {
        throw new PhonemeTableError(
          setId,
          `replacement "${replacement}" is already claimed by "${existing.phoneme}" (line ${existing.line})`,
          rule.line,
        );
      }
      owners.set(replacement, rule);
    }
  }

  if (alphabet) {
    for (const phoneme of alphabet.keys()) {
      if (!owners.has(phoneme)) {
        throw new PhonemeTableError(setId, `alphabet maps "${phoneme}", which is not a phoneme of the set`);
      }
    }
  }

  const table: PhonemeTable = {
    id: setId,
    language,
    variant,
    rules: Object.freeze(rules.map((rule) => Object.freeze({ ...rule, replacements: Object.freeze([...rule.replacements]) }))),
    alphabet,
  };
  return Object.freeze(table);
}

/** Parses `<phoneme> <example> [<replacement> ...]` lines. */
export function parsePhonemeTable(
  text: string,
  setId: PhonemeSetId,
  alphabet?: ReadonlyMap<string, string>,
): ParsedPhonemeTable {
  const rules: PhonemeRule[] = [];
  const warnings: PhonemeTableWarning[] = [];
  const firstLine = new Map<string, number>();

  text.split(/\r?\n/).forEach((raw, idx) => {
    const line = idx + 1;
    const fields = stripComment(raw).split(/\s+/).filter(Boolean);
    if (fields.length === 0) {
      return;
    }
    if (fields.length < 2) {
      throw new PhonemeTableError(setId, `expected "<phoneme> <example> [<replacement> ...]"`, line);
    }

    const [rawPhoneme, example, ...rest] = fields;
    const phoneme = normalizeNfc(rawPhoneme);
    const seen = firstLine.get(phoneme);
    if (seen !== undefined) {
      warnings.push({ line, message: `duplicate phoneme "${phoneme}" ignored (first defined on line ${seen})` });
      return;
    }
    firstLine.set(phoneme, line);

    const replacements = [...new Set(rest.map(normalizeNfc))].filter((r) => r !== phoneme);
    rules.push({ phoneme, example, replacements, line });
  });

  return { table: createPhonemeTable(setId, rules, alphabet), warnings };
}

/** Parses `<alternate-symbol> <ipa>` lines into a canonical IPA -> symbol map. */
export function parseIpaMap(text: string, source = "ipa_map"): ReadonlyMap<string, string> {
  const alphabet = new Map<string, string>();
  const symbols = new Map<string, number>();

  text.split(/\r?\n/).forEach((raw, idx) => {
    const line = idx + 1;
    const fields = stripComment(raw).split(/\s+/).filter(Boolean);
    if (fields.length === 0) {
      return;
    }
    if (fields.length !== 2) {
      throw new PhonemeTableError(source, `expected "<symbol> <ipa>"`, line);
    }
    const [symbol, rawIpa] = fields;
    const ipa = normalizeNfc(rawIpa);
    const seen = symbols.get(symbol);
    if (seen !== undefined) {
      throw new PhonemeTableError(source, `duplicate symbol "${symbol}" (first defined on line ${seen})`, line);
    }
    if (alphabet.has(ipa)) {
      throw new PhonemeTableError(source, `"${ipa}" is already mapped to "${alphabet.get(ipa)}"`, line);
    }
    symbols.set(symbol, line);
    alphabet.set(ipa, symbol);
  });

  return alphabet;
}

/** Checks that every phoneme and replacement in the table tokenizes cleanly. */
export function validatePhonemeTable(table: PhonemeTable, symbols: SymbolTable): void {
  for (const rule of table.rules) {
    for (const surface of [rule.phoneme, ...rule.replacements]) {
      try {
        tokenize(surface, symbols);
      } catch (err) {
        if (err instanceof IpaError) {
          throw new PhonemeTableError(table.id, `"${surface}": ${err.message}`, rule.line);
        }
        throw err;
      }
    }
  }
}

interface GroupIndex {
  /** NFC surface string -> canonical phoneme. */
  keys: Map<string, string>;
  /** Upper bound on the phones a single match can span. */
  maxPhones: number;
}

const indexCache = new WeakMap<PhonemeTable, GroupIndex>();

function groupIndex(table: PhonemeTable): GroupIndex {
  const cached = indexCache.get(table);
  if (cached) {
    return cached;
  }
  const keys = new Map<string, string>();
  let maxPhones = 1;
  for (const rule of table.rules) {
    for (const surface of [rule.phoneme, ...rule.replacements]) {
      if (!keys.has(surface)) {
        keys.set(surface, rule.phoneme);
      }
      maxPhones = Math.max(maxPhones, Array.from(surface.normalize("NFD")).length);
    }
  }
  const index = { keys, maxPhones };
  indexCache.set(table, index);
  return index;
}

function passThrough(phone: Phone, table: PhonemeTable, symbols: SymbolTable, options: GroupOptions): Phoneme {
  if (phone.kind !== "SEGMENT") {
    return { text: phone.text, phoneme: phone.text, phones: [phone], stress: "NONE", setId: table.id, matched: false };
  }
  return buildPhoneme(phoneBody(phone, symbols, options.dropTones), [phone], table, false, options);
}

function buildPhoneme(
  phoneme: string,
  phones: Phone[],
  table: PhonemeTable,
  matched: boolean,
  options: GroupOptions,
): Phoneme {
  const stressed = phones.find((p) => p.stress !== "NONE");
  const keepStress = options.keepStress ?? false;
  const prefix = keepStress && stressed ? stressed.prefix : "";
  const symbol = table.alphabet?.get(phoneme);
  return {
    text: normalizeNfc(`${prefix}${phoneme}`),
    phoneme,
    phones,
    stress: keepStress && stressed ? stressed.stress : "NONE",
    setId: table.id,
    matched,
    ...(symbol !== undefined ? { alternate: { setId: table.id, symbol } } : {}),
  };
}

/**
 * Folds phones into the table's phonemes by greedy longest match over the
 * stress-stripped phone texts. Matches never cross a word or a break.
 */
export function groupPhonemes(
  phones: Iterable<Phone>,
  table: PhonemeTable,
  symbols: SymbolTable,
  options: GroupOptions = {},
): Phoneme[] {
  const input = Array.from(phones);
  const { keys, maxPhones } = groupIndex(table);
  const out: Phoneme[] = [];

  let i = 0;
  while (i < input.length) {
    const first = input[i];
    if (first.kind !== "SEGMENT") {
      out.push(passThrough(first, table, symbols, options));
      i += 1;
      continue;
    }

    let surface = "";
    let best: { phoneme: string; end: number } | undefined;
    for (let j = i; j < input.length && j - i < maxPhones; j += 1) {
      const next = input[j];
      if (next.kind !== "SEGMENT" || next.word !== first.word) {
        break;
      }
      surface = normalizeNfc(surface + phoneBody(next, symbols, options.dropTones));
      const phoneme = keys.get(surface);
      if (phoneme !== undefined) {
        best = { phoneme, end: j + 1 };
      }
    }

    if (best) {
      out.push(buildPhoneme(best.phoneme, input.slice(i, best.end), table, true, options));
      i = best.end;
    } else {
      out.push(passThrough(first, table, symbols, options));
      i += 1;
    }
  }

  return out;
}

/** Alternate-alphabet symbols of grouped phonemes. Breaks keep their IPA text. */
export function phonemesToAlternate(phonemes: Phoneme[]): string[] {
  return phonemes.map((p) => {
    if (p.alternate) {
      return p.alternate.symbol;
    }
    if (p.phones.every((phone) => phone.kind !== "SEGMENT")) {
      return p.text;
    }
    const offset = p.phones[0]?.offset;
    throw new UnmappableSymbolError(p.phoneme, offset, p.setId, "to");
  });
}

/** Whitespace-separated alternate symbols back to IPA phones. */
export function alternateToPhones(text: string, table: PhonemeTable, symbols: SymbolTable): Phone[] {
  const reverse = new Map<string, string>();
  for (const [ipa, symbol] of table.alphabet ?? []) {
    reverse.set(symbol, ipa);
  }

  const phones: Phone[] = [];
  tokenizeWords(text).forEach((word, index) => {
    const ipa = reverse.get(word.text);
    if (ipa === undefined) {
      throw new UnmappableSymbolError(word.text, word.offset, table.id, "from");
    }
    for (const phone of tokenize(ipa, symbols)) {
      phones.push({ ...phone, offset: word.offset, word: index });
    }
  });
  return phones;
}

/** Phoneme tables by set id, with language aliases (`en` -> `en-us`). */
export class PhonemeRegistry {
  private readonly tables: ReadonlyMap<PhonemeSetId, PhonemeTable>;

  constructor(
    tables: Iterable<PhonemeTable>,
    private readonly aliases: Readonly<Record<string, string>> = {},
  ) {
    const byId = new Map<PhonemeSetId, PhonemeTable>();
    for (const table of tables) {
      byId.set(table.id, table);
    }
    this.tables = byId;
  }

  ids(): PhonemeSetId[] {
    return [...this.tables.keys()].sort(comparePhonemeSetIds);
  }

  resolve(id: string): PhonemeSetId {
    return resolveLanguage(id, this.aliases);
  }

  get(id: string): PhonemeTable {
    const table = this.tables.get(this.resolve(id));
    if (!table) {
      throw new UnsupportedLanguageError(id, this.ids());
    }
    return table;
  }
}

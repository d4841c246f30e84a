import { MalformedInputError } from "./errors.js";
import type { SymbolTable } from "./symbols.js";
import type { BreakType, Phone, PhoneKind, PhoneUnit, Stress, SuprasegmentalRole, TokenizeOptions } from "./types.js";
import { decomposeWithOffsets, isWhitespace, normalizeNfc, type SourceCodepoint } from "./unicode.js";

const BREAK_TYPES: Partial<Record<SuprasegmentalRole, BreakType>> = {
  BREAK_MINOR: "MINOR",
  BREAK_MAJOR: "MAJOR",
  BREAK_WORD: "WORD",
  BREAK_SYLLABLE: "SYLLABLE",
};

interface Draft {
  units: PhoneUnit[];
  prefix: string;
  suffix: string;
  stress: Stress;
  offset: number;
  word: number;
}

interface Pending {
  ch: string;
  offset: number;
}

export function unitText(unit: PhoneUnit): string {
  return `${unit.letter}${unit.diacritics.join("")}${unit.tie ?? ""}`;
}

function finishDraft(draft: Draft): Phone {
  const body = draft.units.map(unitText).join("");
  return {
    kind: "SEGMENT",
    text: normalizeNfc(`${draft.prefix}${body}${draft.suffix}`),
    letters: normalizeNfc(draft.units.map((u) => `${u.letter}${u.tie ?? ""}`).join("")),
    units: draft.units,
    prefix: draft.prefix,
    suffix: draft.suffix,
    stress: draft.stress,
    offset: draft.offset,
    word: draft.word,
  };
}

function markerPhone(kind: PhoneKind, ch: string, offset: number, word: number, breakType?: BreakType): Phone {
  return {
    kind,
    text: ch,
    letters: "",
    units: [],
    prefix: "",
    suffix: "",
    stress: "NONE",
    offset,
    word,
    breakType,
  };
}

/**
 * Groups a stream of decomposed codepoints into phones. Shared by the IPA
 * tokenizer and by notation decoding, which feeds it mapped IPA symbols tagged
 * with offsets into the notation text.
 */
export function* assemblePhones(
  stream: Iterable<SourceCodepoint>,
  table: SymbolTable,
  options: TokenizeOptions = {},
): Generator<Phone, void, undefined> {
  const keepStress = options.keepStress ?? true;
  const dropTones = options.dropTones ?? false;

  let current: Draft | null = null;
  let tie: Pending | null = null;
  let stressMarks: Pending[] = [];
  let word = 0;
  let wordHasPhones = false;

  const flush = (): Phone | null => {
    const done = current ? finishDraft(current) : null;
    current = null;
    return done;
  };

  const requireLetter = (ch: string, offset: number, what: string): Draft => {
    if (!current || tie) {
      throw new MalformedInputError(ch, offset, `${what} without a preceding letter`);
    }
    return current;
  };

  const rejectDangling = (): void => {
    if (tie) {
      throw new MalformedInputError(tie.ch, tie.offset, "tie without a following letter");
    }
    const stress = stressMarks[0];
    if (stress) {
      throw new MalformedInputError(stress.ch, stress.offset, "stress mark without a following letter");
    }
  };

  for (const { ch, offset } of stream) {
    if (isWhitespace(ch)) {
      rejectDangling();
      const done = flush();
      if (done) yield done;
      if (wordHasPhones) {
        word += 1;
        wordHasPhones = false;
      }
      continue;
    }

    const info = table.classify(ch, offset);

    if (info.category === "LETTER") {
      if (tie && current) {
        const last = current.units[current.units.length - 1];
        last.tie = tie.ch;
        current.units.push({ letter: ch, diacritics: [] });
        tie = null;
        continue;
      }

      const done = flush();
      if (done) yield done;

      const lastStress = stressMarks[stressMarks.length - 1];
      let stress: Stress = "NONE";
      if (keepStress && lastStress) {
        stress = isSecondary(table, lastStress.ch) ? "SECONDARY" : "PRIMARY";
      }
      current = {
        units: [{ letter: ch, diacritics: [] }],
        prefix: keepStress ? stressMarks.map((s) => s.ch).join("") : "",
        suffix: "",
        stress,
        offset: stressMarks[0]?.offset ?? offset,
        word,
      };
      stressMarks = [];
      wordHasPhones = true;
      continue;
    }

    if (info.category === "TIE") {
      requireLetter(ch, offset, "tie");
      tie = { ch, offset };
      continue;
    }

    if (info.category === "DIACRITIC") {
      const draft = requireLetter(ch, offset, "diacritic");
      if (dropTones && info.modifier === "TONE") {
        continue;
      }
      draft.units[draft.units.length - 1].diacritics.push(ch);
      continue;
    }

    switch (info.role) {
      case "STRESS_PRIMARY":
      case "STRESS_SECONDARY": {
        if (tie) {
          throw new MalformedInputError(ch, offset, "stress mark inside a tied letter sequence");
        }
        const done = flush();
        if (done) yield done;
        stressMarks.push({ ch, offset });
        break;
      }
      case "LONG":
      case "HALF_LONG":
      case "TONE": {
        const draft = requireLetter(ch, offset, info.role === "TONE" ? "tone mark" : "length mark");
        if (!(dropTones && info.role === "TONE")) {
          draft.suffix += ch;
        }
        break;
      }
      case "BRACKET": {
        if (tie) {
          throw new MalformedInputError(tie.ch, tie.offset, "tie without a following letter");
        }
        const done = flush();
        if (done) yield done;
        break;
      }
      default: {
        rejectDangling();
        const done = flush();
        if (done) yield done;
        yield info.role === "INTONATION"
          ? markerPhone("INTONATION", ch, offset, word)
          : markerPhone("BREAK", ch, offset, word, BREAK_TYPES[info.role]);
      }
    }
  }

  rejectDangling();
  const done = flush();
  if (done) yield done;
}

function isSecondary(table: SymbolTable, mark: string): boolean {
  const info = table.lookup(mark);
  return info?.category === "SUPRASEGMENTAL" && info.role === "STRESS_SECONDARY";
}

/** Lazy phone sequence; every iteration rescans `text` from the start. */
export function iteratePhones(text: string, table: SymbolTable, options: TokenizeOptions = {}): Iterable<Phone> {
  return {
    [Symbol.iterator]: () => assemblePhones(decomposeWithOffsets(text), table, options),
  };
}

/** Eager tokenization: throws on malformed input before returning any phone. */
export function tokenize(text: string, table: SymbolTable, options: TokenizeOptions = {}): Phone[] {
  return Array.from(iteratePhones(text, table, options));
}

/** Phone text without its stress prefix, optionally without tones. */
export function phoneBody(phone: Phone, table: SymbolTable, dropTones = false): string {
  if (phone.kind !== "SEGMENT") {
    return phone.text;
  }
  const units = phone.units
    .map((unit) => {
      const diacritics = dropTones
        ? unit.diacritics.filter((d) => {
            const info = table.lookup(d);
            return !(info?.category === "DIACRITIC" && info.modifier === "TONE");
          })
        : unit.diacritics;
      return `${unit.letter}${diacritics.join("")}${unit.tie ?? ""}`;
    })
    .join("");
  const suffix = dropTones
    ? Array.from(phone.suffix)
        .filter((s) => {
          const info = table.lookup(s);
          return !(info?.category === "SUPRASEGMENTAL" && info.role === "TONE");
        })
        .join("")
    : phone.suffix;
  return normalizeNfc(`${units}${suffix}`);
}

/**
 * Splits items into whitespace-delimited words. A break other than a syllable
 * break is a word of its own, so it keeps a space on either side.
 */
export function groupWords<T>(items: Iterable<T>, phoneOf: (item: T) => Phone | undefined): T[][] {
  const words: T[][] = [];
  let lastWord: number | undefined;
  let alone = false;
  for (const item of items) {
    const phone = phoneOf(item);
    const standalone = phone?.kind === "BREAK" && phone.breakType !== "SYLLABLE";
    if (words.length === 0 || standalone || alone || phone?.word !== lastWord) {
      words.push([]);
    }
    words[words.length - 1].push(item);
    lastWord = phone?.word;
    alone = standalone;
  }
  return words;
}

/** Phone texts, joined by `separator` within a word and by a space between words. */
export function joinPhones(phones: Iterable<Phone>, separator = " "): string {
  return groupWords(phones, (phone) => phone)
    .map((word) => word.map((phone) => phone.text).join(separator))
    .join(" ");
}

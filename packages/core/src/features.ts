import { classifyPhone } from "./classify.js";
import { FeatureVectorError, MalformedInputError } from "./errors.js";
import { consonantPlaceSchema, consonantTypeSchema, vowelHeightSchema, vowelPlacementSchema } from "./schemas.js";
import type { SymbolTable } from "./symbols.js";
import { tokenize } from "./tokenizer.js";
import type { BreakType, DiacriticModifier, LetterFeatures, PhoneLength, Stress, SuprasegmentalRole } from "./types.js";
import { normalizeNfc } from "./unicode.js";

export interface SegmentFeatures {
  kind: "SEGMENT";
  letter: LetterFeatures;
  stress: Stress;
  length: PhoneLength;
  nasalized: boolean;
  velarized: boolean;
}

export interface BreakFeatures {
  kind: "BREAK";
  breakType: BreakType;
}

export type FeatureSymbol = SegmentFeatures | BreakFeatures;

/**
 * An ordinal column takes one slot holding `index / values.length`; any
 * other column is one-hot over its values. The first value is the default.
 */
interface FeatureColumn<T extends string> {
  values: readonly T[];
  ordinal: boolean;
}

function column<T extends string>(values: readonly T[], ordinal = false): FeatureColumn<T> {
  return { values, ordinal };
}

const COLUMNS = {
  symbolType: column(["SEGMENT", "BREAK"]),
  letterKind: column(["NONE", "VOWEL", "CONSONANT", "SCHWA"]),
  nasalized: column(["NO", "YES"]),
  velarized: column(["NO", "YES"]),
  vowelHeight: column(["NONE", ...vowelHeightSchema.options], true),
  vowelPlacement: column(["NONE", ...vowelPlacementSchema.options], true),
  vowelRounded: column(["NONE", "ROUNDED", "UNROUNDED"]),
  consonantVoiced: column(["NONE", "VOICED", "UNVOICED"]),
  consonantType: column(["NONE", ...consonantTypeSchema.options], true),
  consonantPlace: column(["NONE", ...consonantPlaceSchema.options], true),
  rhotic: column(["NO", "YES"]),
  length: column(["NORMAL", "LONG", "HALF_LONG", "EXTRA_SHORT"]),
  stress: column(["NONE", "PRIMARY", "SECONDARY"], true),
  breakType: column(["NONE", "MINOR", "MAJOR", "WORD", "SYLLABLE"], true),
};

export type FeatureName = keyof typeof COLUMNS;

type FeatureValues = { [K in FeatureName]: (typeof COLUMNS)[K]["values"][number] };

const LAYOUT: readonly FeatureName[] = [
  "symbolType",
  "letterKind",
  "nasalized",
  "velarized",
  "vowelHeight",
  "vowelPlacement",
  "vowelRounded",
  "consonantVoiced",
  "consonantType",
  "consonantPlace",
  "rhotic",
  "length",
  "stress",
  "breakType",
];

const DEFAULTS: FeatureValues = {
  symbolType: "SEGMENT",
  letterKind: "NONE",
  nasalized: "NO",
  velarized: "NO",
  vowelHeight: "NONE",
  vowelPlacement: "NONE",
  vowelRounded: "NONE",
  consonantVoiced: "NONE",
  consonantType: "NONE",
  consonantPlace: "NONE",
  rhotic: "NO",
  length: "NORMAL",
  stress: "NONE",
  breakType: "NONE",
};

function width(col: FeatureColumn<string>): number {
  return col.ordinal ? 1 : col.values.length;
}

const OFFSETS = new Map<FeatureName, number>();
let nextOffset = 0;
for (const name of LAYOUT) {
  OFFSETS.set(name, nextOffset);
  nextOffset += width(COLUMNS[name]);
}

/** Number of slots in a feature vector. */
export const FEATURE_VECTOR_LENGTH = nextOffset;

export type FeatureWeights = Partial<Record<FeatureName, number>>;

/** Place and rounding count for less than manner and height. */
export const DEFAULT_FEATURE_WEIGHTS: Readonly<FeatureWeights> = {
  vowelPlacement: 0.5,
  vowelRounded: 0.01,
  consonantVoiced: 0.5,
  consonantPlace: 0.15,
  rhotic: 0.5,
};

function featureValues(symbol: FeatureSymbol): FeatureValues {
  if (symbol.kind === "BREAK") {
    return { ...DEFAULTS, symbolType: "BREAK", breakType: symbol.breakType };
  }
  const values: FeatureValues = {
    ...DEFAULTS,
    nasalized: symbol.nasalized ? "YES" : "NO",
    velarized: symbol.velarized ? "YES" : "NO",
    length: symbol.length,
    stress: symbol.stress,
  };
  const letter = symbol.letter;
  switch (letter.kind) {
    case "VOWEL":
      return {
        ...values,
        letterKind: "VOWEL",
        vowelHeight: letter.height,
        vowelPlacement: letter.placement,
        vowelRounded: letter.rounded ? "ROUNDED" : "UNROUNDED",
      };
    case "CONSONANT":
      return {
        ...values,
        letterKind: "CONSONANT",
        consonantVoiced: letter.voiced ? "VOICED" : "UNVOICED",
        consonantType: letter.type,
        consonantPlace: letter.place,
      };
    case "SCHWA":
      return { ...values, letterKind: "SCHWA", rhotic: letter.rColoured ? "YES" : "NO" };
  }
}

function encodeColumn(col: FeatureColumn<string>, value: string): number[] {
  const index = col.values.findIndex((v) => v === value);
  if (col.ordinal) {
    return [index / col.values.length];
  }
  return col.values.map((_, i) => (i === index ? 1 : 0));
}

export function toVector(symbol: FeatureSymbol): number[] {
  const values = featureValues(symbol);
  return LAYOUT.flatMap((name) => encodeColumn(COLUMNS[name], values[name]));
}

function slotsOf(vector: readonly number[], name: FeatureName): number[] {
  const start = OFFSETS.get(name) ?? 0;
  return vector.slice(start, start + width(COLUMNS[name]));
}

/** Ordinal slots round to the nearest value; one-hot slots take the largest. */
function decodeColumn<T extends string>(name: FeatureName, col: FeatureColumn<T>, vector: readonly number[]): T {
  const slots = slotsOf(vector, name);
  let index = 0;
  if (col.ordinal) {
    index = Math.round(slots[0] * col.values.length);
  } else {
    slots.forEach((slot, i) => {
      if (slot > slots[index]) index = i;
    });
  }
  const value = col.values[index];
  if (value === undefined) {
    throw new FeatureVectorError(`${name} slot ${slots[0]} is out of range`);
  }
  return value;
}

function isSet<T extends string>(value: T): value is Exclude<T, "NONE"> {
  return value !== "NONE";
}

function present<T extends string>(name: FeatureName, value: T): Exclude<T, "NONE"> {
  if (isSet(value)) {
    return value;
  }
  throw new FeatureVectorError(`${name} is missing`);
}

function decodeLetter(vector: readonly number[]): LetterFeatures {
  const kind = present("letterKind", decodeColumn("letterKind", COLUMNS.letterKind, vector));
  switch (kind) {
    case "VOWEL":
      return {
        kind,
        height: present("vowelHeight", decodeColumn("vowelHeight", COLUMNS.vowelHeight, vector)),
        placement: present("vowelPlacement", decodeColumn("vowelPlacement", COLUMNS.vowelPlacement, vector)),
        rounded: present("vowelRounded", decodeColumn("vowelRounded", COLUMNS.vowelRounded, vector)) === "ROUNDED",
      };
    case "CONSONANT":
      return {
        kind,
        type: present("consonantType", decodeColumn("consonantType", COLUMNS.consonantType, vector)),
        place: present("consonantPlace", decodeColumn("consonantPlace", COLUMNS.consonantPlace, vector)),
        voiced:
          present("consonantVoiced", decodeColumn("consonantVoiced", COLUMNS.consonantVoiced, vector)) === "VOICED",
      };
    case "SCHWA":
      return { kind, rColoured: decodeColumn("rhotic", COLUMNS.rhotic, vector) === "YES" };
  }
}

export function fromVector(vector: readonly number[]): FeatureSymbol {
  if (vector.length !== FEATURE_VECTOR_LENGTH) {
    throw new FeatureVectorError(`expected ${FEATURE_VECTOR_LENGTH} values, got ${vector.length}`);
  }
  if (decodeColumn("symbolType", COLUMNS.symbolType, vector) === "BREAK") {
    return { kind: "BREAK", breakType: present("breakType", decodeColumn("breakType", COLUMNS.breakType, vector)) };
  }
  return {
    kind: "SEGMENT",
    letter: decodeLetter(vector),
    stress: decodeColumn("stress", COLUMNS.stress, vector),
    length: decodeColumn("length", COLUMNS.length, vector),
    nasalized: decodeColumn("nasalized", COLUMNS.nasalized, vector) === "YES",
    velarized: decodeColumn("velarized", COLUMNS.velarized, vector) === "YES",
  };
}

function hasModifier(table: SymbolTable, mark: string, modifier: DiacriticModifier): boolean {
  const info = table.lookup(mark);
  return info?.category === "DIACRITIC" && info.modifier === modifier;
}

/** Features of a single phone written in IPA, such as `ˈaː` or `|`. */
export function symbolFeatures(text: string, table: SymbolTable): FeatureSymbol {
  const phones = tokenize(text, table);
  const [phone] = phones;
  if (!phone || phones.length > 1) {
    throw new MalformedInputError(text, 0, "expected a single phone");
  }
  if (phone.kind === "BREAK" && phone.breakType) {
    return { kind: "BREAK", breakType: phone.breakType };
  }
  const description = classifyPhone(phone, table);
  if (phone.kind !== "SEGMENT" || !description.features) {
    throw new MalformedInputError(text, phone.offset, "no single letter for");
  }
  return {
    kind: "SEGMENT",
    letter: description.features,
    stress: description.stress,
    length: description.length,
    nasalized: description.nasalized,
    velarized: phone.units.some((unit) => unit.diacritics.some((d) => hasModifier(table, d, "VELARIZED"))),
  };
}

function sameLetter(a: LetterFeatures, b: LetterFeatures): boolean {
  switch (a.kind) {
    case "VOWEL":
      return b.kind === "VOWEL" && a.height === b.height && a.placement === b.placement && a.rounded === b.rounded;
    case "CONSONANT":
      return b.kind === "CONSONANT" && a.type === b.type && a.place === b.place && a.voiced === b.voiced;
    case "SCHWA":
      return b.kind === "SCHWA" && a.rColoured === b.rColoured;
  }
}

const BREAK_ROLES: Record<BreakType, SuprasegmentalRole> = {
  MINOR: "BREAK_MINOR",
  MAJOR: "BREAK_MAJOR",
  WORD: "BREAK_WORD",
  SYLLABLE: "BREAK_SYLLABLE",
};

const STRESS_ROLES: Record<Stress, SuprasegmentalRole | undefined> = {
  NONE: undefined,
  PRIMARY: "STRESS_PRIMARY",
  SECONDARY: "STRESS_SECONDARY",
};

const LENGTH_ROLES: Record<PhoneLength, SuprasegmentalRole | undefined> = {
  NORMAL: undefined,
  LONG: "LONG",
  HALF_LONG: "HALF_LONG",
  EXTRA_SHORT: undefined,
};

/**
 * IPA text for a feature symbol: the first registered letter with those
 * features, with stress, diacritics and length marks around it. Undefined
 * when no letter or mark is registered for a feature.
 */
export function symbolText(symbol: FeatureSymbol, table: SymbolTable): string | undefined {
  const all = table.symbols();
  const role = (r: SuprasegmentalRole | undefined): string | undefined =>
    r === undefined ? "" : all.find((info) => info.category === "SUPRASEGMENTAL" && info.role === r)?.symbol;
  const mark = (wanted: boolean, modifier: DiacriticModifier): string | undefined =>
    wanted ? all.find((info) => info.category === "DIACRITIC" && info.modifier === modifier)?.symbol : "";

  if (symbol.kind === "BREAK") {
    return role(BREAK_ROLES[symbol.breakType]);
  }

  const letter = table.letters().find((info) => sameLetter(info.features, symbol.letter))?.symbol;
  const parts = [
    role(STRESS_ROLES[symbol.stress]),
    letter,
    mark(symbol.nasalized, "NASALIZED"),
    mark(symbol.velarized, "VELARIZED"),
    mark(symbol.length === "EXTRA_SHORT", "EXTRA_SHORT"),
    role(LENGTH_ROLES[symbol.length]),
  ];
  if (parts.some((part) => part === undefined)) {
    return undefined;
  }
  return normalizeNfc(parts.join(""));
}

function slotWeights(weights: Readonly<FeatureWeights>): number[] {
  return LAYOUT.flatMap((name) => new Array<number>(width(COLUMNS[name])).fill(weights[name] ?? 1));
}

/** Weighted Euclidean distance between two feature vectors. */
export function featureDistance(
  a: FeatureSymbol,
  b: FeatureSymbol,
  weights: Readonly<FeatureWeights> = DEFAULT_FEATURE_WEIGHTS,
): number {
  const va = toVector(a);
  const vb = toVector(b);
  const w = slotWeights(weights);
  return Math.sqrt(va.reduce((sum, x, i) => sum + w[i] * (x - vb[i]) ** 2, 0));
}

/** Registered letters ordered by feature distance from `text`, nearest first. */
export function closestLetters(
  text: string,
  table: SymbolTable,
  weights: Readonly<FeatureWeights> = DEFAULT_FEATURE_WEIGHTS,
): string[] {
  const source = symbolFeatures(text, table);
  const self = normalizeNfc(text);
  return table
    .letters()
    .filter((info) => info.symbol !== self)
    .map((info) => {
      const target: FeatureSymbol = {
        kind: "SEGMENT",
        letter: info.features,
        stress: "NONE",
        length: "NORMAL",
        nasalized: false,
        velarized: false,
      };
      return { symbol: info.symbol, distance: featureDistance(source, target, weights) };
    })
    .sort((a, b) => a.distance - b.distance)
    .map((entry) => entry.symbol);
}

import type { SymbolTable } from "./symbols.js";
import { unitText } from "./tokenizer.js";
import type {
  ConsonantFeatures,
  DiacriticModifier,
  LetterFeatures,
  Phone,
  PhoneDescription,
  PhoneLength,
  PhoneUnit,
  Stress,
  VowelFeatures,
} from "./types.js";
import { normalizeNfc } from "./unicode.js";

const MODIFIER_WORDS: Partial<Record<DiacriticModifier, string>> = {
  NASALIZED: "nasalized",
  SYLLABIC: "syllabic",
  NON_SYLLABIC: "non-syllabic",
  ASPIRATED: "aspirated",
  VELARIZED: "velarized",
  RHOTIC: "rhotic",
};

const STRESS_WORDS: Record<Stress, string | undefined> = {
  NONE: undefined,
  PRIMARY: "primary-stressed",
  SECONDARY: "secondary-stressed",
};

const LENGTH_WORDS: Record<PhoneLength, string | undefined> = {
  NORMAL: undefined,
  LONG: "long",
  HALF_LONG: "half-long",
  EXTRA_SHORT: "extra-short",
};

interface ResolvedUnits {
  features?: LetterFeatures;
  parts: LetterFeatures[];
  /** Diacritics not absorbed into a registered letter. */
  marks: string[];
}

function resolveUnit(unit: PhoneUnit, table: SymbolTable): { features?: LetterFeatures; marks: string[] } {
  const whole = table.letter(normalizeNfc(unitText({ ...unit, tie: undefined })));
  if (whole && unit.diacritics.length > 0) {
    return { features: whole.features, marks: [] };
  }
  return { features: table.letter(unit.letter)?.features, marks: unit.diacritics };
}

function resolveUnits(phone: Phone, table: SymbolTable): ResolvedUnits {
  const whole = table.letter(normalizeNfc(phone.units.map(unitText).join("")));
  if (whole) {
    return { features: whole.features, parts: [whole.features], marks: [] };
  }

  const resolved = phone.units.map((unit) => resolveUnit(unit, table));
  const parts = resolved.flatMap((r) => (r.features ? [r.features] : []));
  const marks = resolved.flatMap((r) => r.marks);

  const tied = table.letter(phone.letters);
  if (tied) {
    return { features: tied.features, parts: [tied.features], marks: phone.units.flatMap((u) => u.diacritics) };
  }
  return { features: phone.units.length === 1 ? parts[0] : undefined, parts, marks };
}

function lengthOf(phone: Phone, modifiers: DiacriticModifier[], table: SymbolTable): PhoneLength {
  let length: PhoneLength = modifiers.includes("EXTRA_SHORT") ? "EXTRA_SHORT" : "NORMAL";
  for (const mark of phone.suffix) {
    const info = table.lookup(mark);
    if (info?.category !== "SUPRASEGMENTAL") continue;
    if (info.role === "LONG") length = "LONG";
    else if (info.role === "HALF_LONG" && length !== "LONG") length = "HALF_LONG";
  }
  return length;
}

export function describeFeatures(features: LetterFeatures): string {
  switch (features.kind) {
    case "VOWEL":
      return `${features.height} ${features.placement} ${features.rounded ? "rounded" : "unrounded"} vowel`;
    case "SCHWA":
      return features.rColoured ? "r-coloured schwa" : "schwa";
    case "CONSONANT":
      return `${features.voiced ? "voiced" : "voiceless"} ${features.place} ${features.type.replace(/-/g, " ")}`;
  }
}

function applyVoicing(features: LetterFeatures, modifiers: DiacriticModifier[]): LetterFeatures {
  if (features.kind !== "CONSONANT") {
    return features;
  }
  const override: ConsonantFeatures = { ...features };
  if (modifiers.includes("VOICELESS")) override.voiced = false;
  else if (modifiers.includes("VOICED")) override.voiced = true;
  return override;
}

/** Structured articulatory reading of a phone, with its English description. */
export function classifyPhone(phone: Phone, table: SymbolTable): PhoneDescription {
  if (phone.kind !== "SEGMENT") {
    const info = table.lookup(phone.text);
    const name = info && info.category !== "LETTER" ? info.name : phone.text;
    return {
      phone: phone.text,
      kind: phone.kind,
      stress: "NONE",
      length: "NORMAL",
      nasalized: false,
      modifiers: [],
      tones: [],
      breakType: phone.breakType,
      description: name,
    };
  }

  const resolved = resolveUnits(phone, table);
  const modifiers: DiacriticModifier[] = [];
  const named: string[] = [];
  const tones: string[] = [];
  for (const mark of resolved.marks) {
    const info = table.lookup(mark);
    if (info?.category !== "DIACRITIC") continue;
    if (info.modifier === "TONE") {
      tones.push(info.name);
      continue;
    }
    if (info.modifier) modifiers.push(info.modifier);
    named.push(info.name);
  }
  for (const mark of phone.suffix) {
    const info = table.lookup(mark);
    if (info?.category === "SUPRASEGMENTAL" && info.role === "TONE") tones.push(info.name);
  }

  const length = lengthOf(phone, modifiers, table);
  const features = resolved.features ? applyVoicing(resolved.features, modifiers) : undefined;
  const vowels = resolved.parts.filter((p): p is VowelFeatures => p.kind === "VOWEL");
  const diphthong: [VowelFeatures, VowelFeatures] | undefined =
    !resolved.features && resolved.parts.length === 2 && vowels.length === 2 ? [vowels[0], vowels[1]] : undefined;

  let core: string;
  if (features) {
    core = describeFeatures(features);
  } else if (diphthong) {
    core = `diphthong (${describeFeatures(diphthong[0])} + ${describeFeatures(diphthong[1])})`;
  } else {
    core = `sequence (${resolved.parts.map(describeFeatures).join(" + ")})`;
  }

  const words = [
    STRESS_WORDS[phone.stress],
    LENGTH_WORDS[length],
    features?.kind !== "CONSONANT" && modifiers.includes("VOICELESS") ? "voiceless" : undefined,
    ...modifiers.flatMap((m) => {
      const word = MODIFIER_WORDS[m];
      return word ? [word] : [];
    }),
  ].filter((w): w is string => w !== undefined);

  const syllabic = modifiers.includes("SYLLABIC") ? true : modifiers.includes("NON_SYLLABIC") ? false : undefined;

  return {
    phone: phone.text,
    kind: phone.kind,
    features,
    diphthong,
    stress: phone.stress,
    length,
    nasalized: modifiers.includes("NASALIZED"),
    syllabic,
    modifiers: named,
    tones,
    description: [...words, core].join(" "),
  };
}

export function describe(phone: Phone, table: SymbolTable): string {
  return classifyPhone(phone, table).description;
}

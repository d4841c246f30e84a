import { classifyPhone } from "./classify.js";
import { consonantPlaceSchema, consonantTypeSchema, vowelHeightSchema, vowelPlacementSchema } from "./schemas.js";
import type { SymbolTable } from "./symbols.js";
import { tokenize } from "./tokenizer.js";
import { normalizeNfc } from "./unicode.js";
import type { ConsonantFeatures, PhonemeTable, SchwaFeatures, VowelFeatures } from "./types.js";

export const R_LIKE = ["ɹ", "ʁ", "r", "ʀ", "ɻ"] as const;
export const SCHWA_PREFERRED = ["ə", "ɐ"] as const;
export const G_FORMS = ["ɡ", "g"] as const;

const MID_CENTRAL: VowelFeatures = { kind: "VOWEL", height: "mid", placement: "central", rounded: false };

export type PhonemeGuess = string | [string, string];

interface PhonemeShape {
  text: string;
  letters: string;
  elongated: boolean;
  vowel?: VowelFeatures;
  consonant?: ConsonantFeatures;
  schwa?: SchwaFeatures;
  diphthong?: [VowelFeatures, VowelFeatures];
}

function shapeOf(text: string, symbols: SymbolTable): PhonemeShape {
  const phones = tokenize(text, symbols, { keepStress: false });
  const described = phones.map((phone) => classifyPhone(phone, symbols));
  const shape: PhonemeShape = {
    text,
    letters: phones.map((p) => p.letters).join(""),
    elongated: described.some((d) => d.length === "LONG"),
  };

  if (described.length === 1) {
    const [only] = described;
    const features = only.features;
    if (features?.kind === "VOWEL") shape.vowel = features;
    else if (features?.kind === "CONSONANT") shape.consonant = features;
    else if (features?.kind === "SCHWA") shape.schwa = features;
    if (only.diphthong) shape.diphthong = only.diphthong;
  } else if (described.length === 2) {
    const [first, second] = described;
    if (first.features?.kind === "VOWEL" && second.features?.kind === "VOWEL") {
      shape.diphthong = [first.features, second.features];
    }
  }
  return shape;
}

export function vowelDistance(a: VowelFeatures, b: VowelFeatures): number {
  const heights = vowelHeightSchema.options;
  const placements = vowelPlacementSchema.options;
  const height = Math.abs(heights.indexOf(a.height) - heights.indexOf(b.height)) * 2;
  const placement = Math.abs(placements.indexOf(a.placement) - placements.indexOf(b.placement));
  return height + placement + (a.rounded === b.rounded ? 0 : 1);
}

export function consonantDistance(a: ConsonantFeatures, b: ConsonantFeatures): number {
  const types = consonantTypeSchema.options;
  const places = consonantPlaceSchema.options;
  const type = Math.abs(types.indexOf(a.type) - types.indexOf(b.type));
  const place = Math.abs(places.indexOf(a.place) - places.indexOf(b.place));
  return type + place + (a.voiced === b.voiced ? 0 : 1);
}

function nearestVowel(vowel: VowelFeatures, candidates: PhonemeShape[]): PhonemeShape | undefined {
  let best: PhonemeShape | undefined;
  let min = Infinity;
  for (const candidate of candidates) {
    if (!candidate.vowel) continue;
    const dist = vowelDistance(vowel, candidate.vowel);
    if (dist < min) {
      min = dist;
      best = candidate;
    }
  }
  return best;
}

function closestPhonemes(
  source: PhonemeShape,
  to: PhonemeTable,
  inventory: ReadonlySet<string>,
  symbols: SymbolTable,
): PhonemeGuess | undefined {
  const pick = (preferred: readonly string[]): string | undefined => preferred.find((p) => inventory.has(p));

  const gForm = G_FORMS.some((g) => g === source.text) ? pick(G_FORMS) : undefined;
  if (gForm) {
    return gForm;
  }

  if (source.schwa) {
    const schwa = pick(SCHWA_PREFERRED) ?? (source.schwa.rColoured ? pick(R_LIKE) : undefined);
    if (schwa) {
      return schwa;
    }
    source.vowel = MID_CENTRAL;
  }

  if (inventory.has(source.text)) {
    return source.text;
  }

  const replaced = to.rules.find((r) => r.replacements.includes(source.text));
  if (replaced) {
    return replaced.phoneme;
  }

  // A diphthong only takes a phoneme with the same letters if that one is a diphthong too.
  const targets = to.rules.map((r) => shapeOf(r.phoneme, symbols));
  const sameLetters = targets.find(
    (t) => t.letters === source.letters && (source.diphthong === undefined || t.diphthong !== undefined),
  );
  if (sameLetters) {
    return sameLetters.text;
  }

  let best: string | undefined;
  let min = Infinity;
  for (const target of targets) {
    let dist: number | undefined;
    if (source.vowel && target.vowel) {
      dist = vowelDistance(source.vowel, target.vowel);
    } else if (source.consonant && target.consonant) {
      dist = consonantDistance(source.consonant, target.consonant);
    }
    if (dist === undefined) continue;
    dist += source.elongated === target.elongated ? 0 : 0.5;
    if (dist < min) {
      min = dist;
      best = target.text;
    }
  }
  if (best !== undefined) {
    return best;
  }

  if (source.diphthong) {
    const first = nearestVowel(source.diphthong[0], targets);
    const second = nearestVowel(source.diphthong[1], targets);
    if (first && second) {
      return [first.text, second.text];
    }
  }
  return undefined;
}

/**
 * Closest phoneme(s) of another inventory for one phoneme. An r-like
 * phoneme always lands on an r-like one when the target has any.
 */
export function guessPhonemes(from: string, to: PhonemeTable, symbols: SymbolTable): PhonemeGuess | undefined {
  const inventory = new Set(to.rules.map((r) => r.phoneme));
  const source = shapeOf(normalizeNfc(from), symbols);
  const guess = closestPhonemes(source, to, inventory, symbols);

  const rLike: readonly string[] = R_LIKE;
  if (guess !== undefined && rLike.includes(source.text) && !(typeof guess === "string" && rLike.includes(guess))) {
    return rLike.find((r) => inventory.has(r)) ?? guess;
  }
  return guess;
}

/** Guesses a mapping for every phoneme of `from`; phonemes with no guess are left out. */
export function guessPhonemeMap(from: PhonemeTable, to: PhonemeTable, symbols: SymbolTable): Map<string, PhonemeGuess> {
  const mapping = new Map<string, PhonemeGuess>();
  for (const rule of from.rules) {
    const guess = guessPhonemes(rule.phoneme, to, symbols);
    if (guess !== undefined) {
      mapping.set(rule.phoneme, guess);
    }
  }
  return mapping;
}

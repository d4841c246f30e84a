export type PhonemeSetId = string;

export type SymbolCategory = "LETTER" | "DIACRITIC" | "SUPRASEGMENTAL" | "TIE";

export type VowelHeight = "close" | "near-close" | "close-mid" | "mid" | "open-mid" | "near-open" | "open";
export type VowelPlacement = "front" | "near-front" | "central" | "near-back" | "back";

export type ConsonantType =
  | "nasal"
  | "plosive"
  | "affricate"
  | "fricative"
  | "approximant"
  | "flap"
  | "trill"
  | "lateral-approximant"
  | "lateral-fricative"
  | "lateral-flap"
  | "implosive"
  | "click";

export type ConsonantPlace =
  | "bilabial"
  | "labio-dental"
  | "dental"
  | "alveolar"
  | "post-alveolar"
  | "retroflex"
  | "alveolo-palatal"
  | "palatal"
  | "labial-palatal"
  | "velar"
  | "labial-velar"
  | "uvular"
  | "pharyngeal"
  | "epiglottal"
  | "glottal";

export type DiacriticModifier =
  | "NASALIZED"
  | "SYLLABIC"
  | "NON_SYLLABIC"
  | "EXTRA_SHORT"
  | "VOICELESS"
  | "VOICED"
  | "VELARIZED"
  | "ASPIRATED"
  | "RHOTIC"
  | "TONE";

export type SuprasegmentalRole =
  | "STRESS_PRIMARY"
  | "STRESS_SECONDARY"
  | "LONG"
  | "HALF_LONG"
  | "TONE"
  | "INTONATION"
  | "BREAK_MINOR"
  | "BREAK_MAJOR"
  | "BREAK_WORD"
  | "BREAK_SYLLABLE"
  | "BRACKET";

export type Stress = "NONE" | "PRIMARY" | "SECONDARY";
export type PhoneLength = "NORMAL" | "LONG" | "HALF_LONG" | "EXTRA_SHORT";
export type BreakType = "MINOR" | "MAJOR" | "WORD" | "SYLLABLE";

export interface VowelFeatures {
  kind: "VOWEL";
  height: VowelHeight;
  placement: VowelPlacement;
  rounded: boolean;
}

export interface ConsonantFeatures {
  kind: "CONSONANT";
  type: ConsonantType;
  place: ConsonantPlace;
  voiced: boolean;
}

export interface SchwaFeatures {
  kind: "SCHWA";
  rColoured: boolean;
}

export type LetterFeatures = VowelFeatures | ConsonantFeatures | SchwaFeatures;

export interface LetterInfo {
  category: "LETTER";
  symbol: string;
  features: LetterFeatures;
}

export interface DiacriticInfo {
  category: "DIACRITIC";
  symbol: string;
  name: string;
  modifier?: DiacriticModifier;
}

export interface SuprasegmentalInfo {
  category: "SUPRASEGMENTAL";
  symbol: string;
  name: string;
  role: SuprasegmentalRole;
}

export interface TieInfo {
  category: "TIE";
  symbol: string;
  name: string;
}

export type SymbolInfo = LetterInfo | DiacriticInfo | SuprasegmentalInfo | TieInfo;

export type PhoneKind = "SEGMENT" | "BREAK" | "INTONATION";

/** One base letter of a phone with the marks attached to it. */
export interface PhoneUnit {
  letter: string;
  diacritics: string[];
  tie?: string;
}

export interface Phone {
  kind: PhoneKind;
  text: string;
  /** Base letters and ties, without diacritics or suprasegmentals. */
  letters: string;
  units: PhoneUnit[];
  prefix: string;
  suffix: string;
  stress: Stress;
  offset: number;
  /** Index of the whitespace-delimited word the phone came from. */
  word: number;
  breakType?: BreakType;
}

export interface TokenizeOptions {
  keepStress?: boolean;
  dropTones?: boolean;
}

export interface PhoneDescription {
  phone: string;
  kind: PhoneKind;
  features?: LetterFeatures;
  diphthong?: [VowelFeatures, VowelFeatures];
  stress: Stress;
  length: PhoneLength;
  nasalized: boolean;
  syllabic?: boolean;
  modifiers: string[];
  tones: string[];
  breakType?: BreakType;
  description: string;
}

export interface PhonemeRule {
  phoneme: string;
  example: string;
  replacements: readonly string[];
  line: number;
}

export interface PhonemeTable {
  id: PhonemeSetId;
  language: string;
  variant?: string;
  rules: readonly PhonemeRule[];
  /** Canonical IPA phoneme -> symbol in the set's own alphabet. */
  alphabet?: ReadonlyMap<string, string>;
}

export interface PhonemeTableWarning {
  line: number;
  message: string;
}

export interface GroupOptions {
  keepStress?: boolean;
  dropTones?: boolean;
}

export interface AlternateSymbol {
  setId: PhonemeSetId;
  symbol: string;
}

export interface Phoneme {
  text: string;
  phoneme: string;
  phones: Phone[];
  stress: Stress;
  setId: PhonemeSetId;
  matched: boolean;
  alternate?: AlternateSymbol;
}

export interface NotationDefinition {
  name: string;
  description?: string;
  symbols: Record<string, string | string[]>;
  ignore?: string[];
  wrap?: [string, string];
}

export interface ToNotationOptions {
  separator?: string;
  wrap?: boolean;
}

import type { PhonemeSetId } from "./types.js";

const PHONEME_SET_ID_PATTERN = /^[a-z]{2,3}(?:-[a-z0-9]{2,8})*(?:\/[a-z0-9][a-z0-9_-]*)?$/;

export interface ParsedPhonemeSetId {
  language: string;
  variant?: string;
}

export function isPhonemeSetId(value: string): value is PhonemeSetId {
  return PHONEME_SET_ID_PATTERN.test(value);
}

export function parsePhonemeSetId(value: string): ParsedPhonemeSetId {
  if (!isPhonemeSetId(value)) {
    throw new Error(`Invalid phoneme set id: ${value}`);
  }
  const [language, variant] = value.split("/");
  return variant ? { language, variant } : { language };
}

export function formatPhonemeSetId(id: ParsedPhonemeSetId): PhonemeSetId {
  return id.variant ? `${id.language}/${id.variant}` : id.language;
}

/** Lower-cases, swaps `_` for `-` and applies aliases such as `en` -> `en-us`. */
export function resolveLanguage(value: string, aliases: Readonly<Record<string, string>> = {}): PhonemeSetId {
  const cleaned = value.trim().toLowerCase().replace(/_/g, "-");
  return aliases[cleaned] ?? cleaned;
}

export function comparePhonemeSetIds(a: PhonemeSetId, b: PhonemeSetId): number {
  const left = parsePhonemeSetId(a);
  const right = parsePhonemeSetId(b);

  if (left.language !== right.language) {
    return left.language.localeCompare(right.language);
  }
  if (!left.variant || !right.variant) {
    return Number(Boolean(left.variant)) - Number(Boolean(right.variant));
  }
  return left.variant.localeCompare(right.variant);
}

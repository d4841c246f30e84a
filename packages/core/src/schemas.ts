import { z } from "zod";
import type { NotationDefinition } from "./types.js";

const symbolString = z.string().min(1);

export const vowelHeightSchema = z.enum(["close", "near-close", "close-mid", "mid", "open-mid", "near-open", "open"]);
export const vowelPlacementSchema = z.enum(["front", "near-front", "central", "near-back", "back"]);

export const consonantTypeSchema = z.enum([
  "nasal",
  "plosive",
  "affricate",
  "fricative",
  "approximant",
  "flap",
  "trill",
  "lateral-approximant",
  "lateral-fricative",
  "lateral-flap",
  "implosive",
  "click",
]);

export const consonantPlaceSchema = z.enum([
  "bilabial",
  "labio-dental",
  "dental",
  "alveolar",
  "post-alveolar",
  "retroflex",
  "alveolo-palatal",
  "palatal",
  "labial-palatal",
  "velar",
  "labial-velar",
  "uvular",
  "pharyngeal",
  "epiglottal",
  "glottal",
]);

const vowelSchema = z.object({
  symbol: symbolString,
  height: vowelHeightSchema,
  placement: vowelPlacementSchema,
  rounded: z.boolean(),
});

const schwaSchema = z.object({
  symbol: symbolString,
  rColoured: z.boolean(),
});

const consonantSchema = z.object({
  symbol: symbolString,
  type: consonantTypeSchema,
  place: consonantPlaceSchema,
  voiced: z.boolean(),
});

const diacriticSchema = z.object({
  symbol: symbolString,
  name: z.string(),
  modifier: z
    .enum(["NASALIZED", "SYLLABIC", "NON_SYLLABIC", "EXTRA_SHORT", "VOICELESS", "VOICED", "VELARIZED", "ASPIRATED", "RHOTIC", "TONE"])
    .optional(),
});

const suprasegmentalSchema = z.object({
  symbol: symbolString,
  name: z.string(),
  role: z.enum([
    "STRESS_PRIMARY",
    "STRESS_SECONDARY",
    "LONG",
    "HALF_LONG",
    "TONE",
    "INTONATION",
    "BREAK_MINOR",
    "BREAK_MAJOR",
    "BREAK_WORD",
    "BREAK_SYLLABLE",
    "BRACKET",
  ]),
});

const tieSchema = z.object({
  symbol: symbolString,
  name: z.string(),
});

export const symbolDefinitionsSchema = z.object({
  vowels: z.array(vowelSchema),
  schwas: z.array(schwaSchema),
  consonants: z.array(consonantSchema),
  diacritics: z.array(diacriticSchema),
  suprasegmentals: z.array(suprasegmentalSchema),
  ties: z.array(tieSchema),
});

export type SymbolDefinitions = z.infer<typeof symbolDefinitionsSchema>;

export const notationDefinitionSchema = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
  symbols: z.record(z.union([z.string(), z.array(z.string()).min(1)])),
  ignore: z.array(z.string().min(1)).optional(),
  wrap: z.tuple([z.string(), z.string()]).optional(),
});

export function parseSymbolDefinitions(json: unknown): SymbolDefinitions {
  return symbolDefinitionsSchema.parse(json);
}

export function parseNotationDefinition(json: unknown): NotationDefinition {
  return notationDefinitionSchema.parse(json);
}

import {
  alternateToPhones,
  classifyPhone,
  describe,
  describeFeatures,
  fromNotation,
  groupPhonemes,
  groupWords,
  ipaToNotation,
  joinPhones,
  phonemesToAlternate,
  resolveLanguage,
  toNotation,
  tokenize,
  type Phone,
  type Phoneme,
  type PhonemeTable,
} from "@ipa-kit/core";
import type { TableStore } from "@ipa-kit/tables";
import type { Settings } from "./config.js";

export interface CommandContext {
  store: TableStore;
  settings: Settings;
  debug?: (message: string) => void;
}

export interface PhoneOptions {
  separator?: string;
  keepStress?: boolean;
  dropTones?: boolean;
}

export interface PhonemeOptions extends PhoneOptions {
  phonemesFile?: string;
}

export interface ConvertOptions {
  separator?: string;
  wrap?: boolean;
}

function phonemeTable(ctx: CommandContext, language: string): PhonemeTable {
  const table = ctx.store.registry(ctx.settings.languageAliases).get(language);
  ctx.debug?.(`using phoneme set ${table.id} (${table.rules.length} rules)`);
  return table;
}

function joinPhonemes(phonemes: Phoneme[], separator: string): string {
  return groupWords(phonemes, (phoneme) => phoneme.phones[0])
    .map((word) => word.map((phoneme) => phoneme.text).join(separator))
    .join(" ");
}

/**
 * One JSON line per registered letter, or per phoneme of a set when
 * `language` is given.
 */
export function printCommand(ctx: CommandContext, language?: string): string[] {
  const symbols = ctx.store.symbols();
  const sampa = ctx.store.notation("sampa");
  const espeak = ctx.store.notation("espeak");

  if (!language) {
    return symbols.letters().map((letter) =>
      JSON.stringify({
        symbol: letter.symbol,
        description: describeFeatures(letter.features),
        sampa: sampa.tokenFor(letter.symbol),
        espeak: espeak.tokenFor(letter.symbol),
      }),
    );
  }

  const table = phonemeTable(ctx, language);
  return table.rules.map((rule) =>
    JSON.stringify({
      phoneme: rule.phoneme,
      example: rule.example,
      description: tokenize(rule.phoneme, symbols)
        .map((phone) => describe(phone, symbols))
        .join(" + "),
      sampa: ipaToNotation(rule.phoneme, sampa),
      espeak: ipaToNotation(rule.phoneme, espeak),
      alternate: table.alphabet?.get(rule.phoneme),
    }),
  );
}

export function describeCommand(ctx: CommandContext, lines: string[]): string[] {
  const symbols = ctx.store.symbols();
  return lines.flatMap((line) => tokenize(line, symbols).map((phone) => JSON.stringify(classifyPhone(phone, symbols))));
}

export function phonesCommand(ctx: CommandContext, lines: string[], options: PhoneOptions = {}): string[] {
  const symbols = ctx.store.symbols();
  const separator = options.separator ?? ctx.settings.separator;
  return lines.map((line) =>
    joinPhones(
      tokenize(line, symbols, { keepStress: options.keepStress ?? false, dropTones: options.dropTones }),
      separator,
    ),
  );
}

export function phonemesCommand(
  ctx: CommandContext,
  language: string,
  lines: string[],
  options: PhonemeOptions = {},
): string[] {
  const symbols = ctx.store.symbols();
  const table = options.phonemesFile
    ? ctx.store.loadPhonemeFile(options.phonemesFile, resolveLanguage(language, ctx.settings.languageAliases))
    : phonemeTable(ctx, language);
  const separator = options.separator ?? ctx.settings.separator;

  return lines.map((line) => {
    const phonemes = groupPhonemes(tokenize(line, symbols), table, symbols, {
      keepStress: options.keepStress,
      dropTones: options.dropTones,
    });
    const unmatched = phonemes.filter((p) => !p.matched && p.phones.some((phone) => phone.kind === "SEGMENT"));
    if (unmatched.length > 0) {
      ctx.debug?.(`no ${table.id} phoneme for ${unmatched.map((p) => `"${p.text}"`).join(", ")}`);
    }
    return joinPhonemes(phonemes, separator);
  });
}

function decodeLine(ctx: CommandContext, source: string, line: string): Phone[] {
  const symbols = ctx.store.symbols();
  if (source === "ipa") {
    return tokenize(line, symbols);
  }
  if (ctx.store.notationNames().includes(source)) {
    return fromNotation(line, ctx.store.notation(source));
  }
  const table = phonemeTable(ctx, source);
  return table.alphabet ? alternateToPhones(line, table, symbols) : tokenize(line, symbols);
}

function encodeLine(ctx: CommandContext, dest: string, phones: Phone[], options: ConvertOptions): string {
  if (dest === "ipa") {
    return joinPhones(phones, options.separator ?? "");
  }
  if (ctx.store.notationNames().includes(dest)) {
    return toNotation(phones, ctx.store.notation(dest), { separator: options.separator ?? "", wrap: options.wrap });
  }
  const table = phonemeTable(ctx, dest);
  const phonemes = groupPhonemes(phones, table, ctx.store.symbols());
  if (table.alphabet) {
    return phonemesToAlternate(phonemes).join(options.separator ?? " ");
  }
  return joinPhonemes(phonemes, options.separator ?? " ");
}

/**
 * Converts between IPA, the registered notations and phoneme sets. A set
 * with its own alphabet reads and writes that alphabet.
 */
export function convertCommand(
  ctx: CommandContext,
  source: string,
  dest: string,
  lines: string[],
  options: ConvertOptions = {},
): string[] {
  return lines.map((line) => encodeLine(ctx, dest, decodeLine(ctx, source, line), options));
}

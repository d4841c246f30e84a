export type IpaErrorCode =
  | "UNKNOWN_SYMBOL"
  | "MALFORMED_INPUT"
  | "UNSUPPORTED_LANGUAGE"
  | "UNSUPPORTED_NOTATION"
  | "UNMAPPABLE_SYMBOL"
  | "INVALID_TABLE"
  | "INVALID_FEATURES";

export class IpaError extends Error {
  constructor(
    public readonly code: IpaErrorCode,
    message: string,
    public readonly symbol?: string,
    public readonly offset?: number,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

function at(offset: number | undefined): string {
  return offset === undefined ? "" : ` at offset ${offset}`;
}

function codepoints(symbol: string): string {
  return Array.from(symbol)
    .map((ch) => `U+${ch.codePointAt(0)?.toString(16).toUpperCase().padStart(4, "0")}`)
    .join(" ");
}

export class UnknownSymbolError extends IpaError {
  constructor(symbol: string, offset?: number) {
    super("UNKNOWN_SYMBOL", `Unknown symbol "${symbol}" (${codepoints(symbol)})${at(offset)}`, symbol, offset);
  }
}

export class MalformedInputError extends IpaError {
  constructor(symbol: string, offset: number, reason: string) {
    super("MALFORMED_INPUT", `Malformed input: ${reason} "${symbol}" (${codepoints(symbol)})${at(offset)}`, symbol, offset);
  }
}

export class UnsupportedLanguageError extends IpaError {
  constructor(
    public readonly setId: string,
    public readonly supported: string[] = [],
  ) {
    const hint = supported.length > 0 ? ` Supported: ${supported.join(", ")}` : "";
    super("UNSUPPORTED_LANGUAGE", `Unsupported language or phoneme set: ${setId}.${hint}`, setId);
  }
}

export class UnsupportedNotationError extends IpaError {
  constructor(
    public readonly notation: string,
    public readonly supported: string[] = [],
  ) {
    const hint = supported.length > 0 ? ` Supported: ${supported.join(", ")}` : "";
    super("UNSUPPORTED_NOTATION", `Unsupported notation: ${notation}.${hint}`, notation);
  }
}

export class UnmappableSymbolError extends IpaError {
  constructor(
    symbol: string,
    offset: number | undefined,
    public readonly notation: string,
    direction: "to" | "from",
  ) {
    const verb = direction === "to" ? `No ${notation} token for` : `No IPA symbol for ${notation} token`;
    super("UNMAPPABLE_SYMBOL", `${verb} "${symbol}"${at(offset)}`, symbol, offset);
  }
}

export class PhonemeTableError extends IpaError {
  constructor(
    public readonly table: string,
    message: string,
    public readonly line?: number,
  ) {
    super("INVALID_TABLE", line === undefined ? `${table}: ${message}` : `${table}:${line}: ${message}`);
  }
}

export class FeatureVectorError extends IpaError {
  constructor(message: string) {
    super("INVALID_FEATURES", `Invalid feature vector: ${message}`);
  }
}

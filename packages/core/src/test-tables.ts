import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { NotationTable } from "./notation.js";
import { parseIpaMap, parsePhonemeTable } from "./phonemes.js";
import { parseNotationDefinition, parseSymbolDefinitions } from "./schemas.js";
import { SymbolTable } from "./symbols.js";
import type { PhonemeTable } from "./types.js";

const dataDir = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../../data");

function readData(...parts: string[]): string {
  return fs.readFileSync(path.join(dataDir, ...parts), "utf8");
}

export const symbols = new SymbolTable(parseSymbolDefinitions(JSON.parse(readData("symbols.json"))));

export function notation(name: string): NotationTable {
  return new NotationTable(parseNotationDefinition(JSON.parse(readData("notations", `${name}.json`))), symbols);
}

export function phonemeTable(setId: string): PhonemeTable {
  const dir = setId.split("/");
  const mapFile = path.join(dataDir, ...dir, "ipa_map.txt");
  const alphabet = fs.existsSync(mapFile) ? parseIpaMap(fs.readFileSync(mapFile, "utf8"), mapFile) : undefined;
  return parsePhonemeTable(readData(...dir, "phonemes.txt"), setId, alphabet).table;
}

import fs from "node:fs";
import path from "node:path";
import {
  NotationTable,
  PhonemeRegistry,
  PhonemeTableError,
  SymbolTable,
  UnsupportedLanguageError,
  UnsupportedNotationError,
  comparePhonemeSetIds,
  isPhonemeSetId,
  parseIpaMap,
  parseNotationDefinition,
  parsePhonemeTable,
  parseSymbolDefinitions,
  validatePhonemeTable,
} from "@ipa-kit/core";
import type { PhonemeSetId, PhonemeTable, PhonemeTableWarning } from "@ipa-kit/core";
import { ZodError } from "zod";
import { notationPath, phonemeSetDir, symbolsPath } from "./paths.js";

export interface TableStoreOptions {
  dataDir: string;
  /** Receives load-time warnings such as repeated phoneme lines. Defaults to `console.warn`. */
  onWarning?: (source: string, warning: PhonemeTableWarning) => void;
}

function defaultWarning(source: string, warning: PhonemeTableWarning): void {
  console.warn(`${source}:${warning.line}: ${warning.message}`);
}

function readJson(file: string): unknown {
  try {
    return JSON.parse(fs.readFileSync(file, "utf8"));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new PhonemeTableError(file, `cannot read JSON: ${message}`);
  }
}

function validated<T>(file: string, parse: (json: unknown) => T): T {
  try {
    return parse(readJson(file));
  } catch (err) {
    if (err instanceof ZodError) {
      const issue = err.issues[0];
      throw new PhonemeTableError(file, `${issue?.path.join(".") ?? ""}: ${issue?.message ?? err.message}`);
    }
    throw err;
  }
}

/**
 * Reads the data directory and builds each table once. Tables are frozen and
 * shared by every caller of the same store.
 */
export class TableStore {
  private symbolTable: SymbolTable | null = null;
  private readonly notations = new Map<string, NotationTable>();
  private readonly phonemeTables = new Map<PhonemeSetId, PhonemeTable>();
  private phonemeSetIds: PhonemeSetId[] | null = null;

  constructor(private readonly options: TableStoreOptions) {}

  get dataDir(): string {
    return this.options.dataDir;
  }

  symbols(): SymbolTable {
    if (!this.symbolTable) {
      this.symbolTable = new SymbolTable(validated(symbolsPath(this.dataDir), parseSymbolDefinitions));
    }
    return this.symbolTable;
  }

  notationNames(): string[] {
    const dir = path.join(this.dataDir, "notations");
    if (!fs.existsSync(dir)) {
      return [];
    }
    return fs
      .readdirSync(dir)
      .filter((file) => file.endsWith(".json"))
      .map((file) => file.slice(0, -".json".length))
      .sort();
  }

  notation(name: string): NotationTable {
    const cached = this.notations.get(name);
    if (cached) {
      return cached;
    }
    const file = notationPath(this.dataDir, name);
    if (!/^[a-z0-9_-]+$/i.test(name) || !fs.existsSync(file)) {
      throw new UnsupportedNotationError(name, this.notationNames());
    }
    const table = new NotationTable(validated(file, parseNotationDefinition), this.symbols());
    this.notations.set(name, table);
    return table;
  }

  /** Every directory under the data directory holding a `phonemes.txt`. */
  listPhonemeSets(): PhonemeSetId[] {
    if (!this.phonemeSetIds) {
      const ids: PhonemeSetId[] = [];
      const walk = (dir: string, prefix: string[]): void => {
        for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
          if (!entry.isDirectory()) continue;
          const parts = [...prefix, entry.name];
          const full = path.join(dir, entry.name);
          const id = parts.join("/");
          if (isPhonemeSetId(id) && fs.existsSync(path.join(full, "phonemes.txt"))) {
            ids.push(id);
          }
          walk(full, parts);
        }
      };
      walk(this.dataDir, []);
      this.phonemeSetIds = ids.sort(comparePhonemeSetIds);
    }
    return this.phonemeSetIds;
  }

  phonemeTable(setId: PhonemeSetId): PhonemeTable {
    const cached = this.phonemeTables.get(setId);
    if (cached) {
      return cached;
    }
    if (!this.listPhonemeSets().includes(setId)) {
      throw new UnsupportedLanguageError(setId, this.listPhonemeSets());
    }
    const dir = phonemeSetDir(this.dataDir, setId);
    const table = this.loadPhonemeFile(path.join(dir, "phonemes.txt"), setId, path.join(dir, "ipa_map.txt"));
    this.phonemeTables.set(setId, table);
    return table;
  }

  /** Loads a phoneme table from an arbitrary file; not cached. */
  loadPhonemeFile(file: string, setId: PhonemeSetId, ipaMapFile?: string): PhonemeTable {
    const alphabet =
      ipaMapFile && fs.existsSync(ipaMapFile) ? parseIpaMap(fs.readFileSync(ipaMapFile, "utf8"), ipaMapFile) : undefined;
    const { table, warnings } = parsePhonemeTable(fs.readFileSync(file, "utf8"), setId, alphabet);
    const warn = this.options.onWarning ?? defaultWarning;
    for (const warning of warnings) {
      warn(file, warning);
    }
    validatePhonemeTable(table, this.symbols());
    return table;
  }

  registry(aliases: Readonly<Record<string, string>> = {}): PhonemeRegistry {
    return new PhonemeRegistry(
      this.listPhonemeSets().map((id) => this.phonemeTable(id)),
      aliases,
    );
  }
}

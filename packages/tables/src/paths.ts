import path from "node:path";
import { fileURLToPath } from "node:url";

const here = path.dirname(fileURLToPath(import.meta.url));

/** `IPA_KIT_DATA_DIR`, or the repository's own `data/` directory. */
export function defaultDataDir(): string {
  return process.env.IPA_KIT_DATA_DIR ?? path.resolve(here, "../../../data");
}

export function symbolsPath(dataDir: string): string {
  return path.join(dataDir, "symbols.json");
}

export function notationPath(dataDir: string, name: string): string {
  return path.join(dataDir, "notations", `${name}.json`);
}

export function phonemeSetDir(dataDir: string, setId: string): string {
  return path.join(dataDir, ...setId.split("/"));
}

import fs from "node:fs";
import path from "node:path";
import { z } from "zod";

const settingsSchema = z.object({
  separator: z.string().default(" "),
  languageAliases: z.record(z.string()).default({}),
});

export type Settings = z.infer<typeof settingsSchema>;

function resolveProjectRoot(): string {
  const cwd = process.cwd();
  const cliSuffix = `${path.sep}apps${path.sep}cli`;
  if (cwd.endsWith(cliSuffix)) {
    return path.resolve(cwd, "../..");
  }
  return cwd;
}

const root = resolveProjectRoot();

export function loadSettings(): Settings {
  const file = path.join(root, "config", "settings.json");
  if (!fs.existsSync(file)) {
    return settingsSchema.parse({});
  }
  return settingsSchema.parse(JSON.parse(fs.readFileSync(file, "utf8")));
}

export function getDataPaths(): { dataDir: string } {
  return {
    dataDir: process.env.IPA_KIT_DATA_DIR ?? path.join(root, "data"),
  };
}

export function isDebugEnabled(argv: string[] = process.argv): boolean {
  return argv.includes("--debug") || process.env.IPA_KIT_DEBUG === "1";
}

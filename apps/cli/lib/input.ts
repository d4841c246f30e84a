import fs from "node:fs";

export interface LineSource {
  isTTY: boolean;
  read: () => string;
}

const stdin: LineSource = {
  get isTTY() {
    return process.stdin.isTTY === true;
  },
  read: () => fs.readFileSync(0, "utf8"),
};

/** Pronunciations from the command line, or one per line from stdin. */
export function readInput(args: string[], source: LineSource = stdin): string[] {
  if (args.length > 0) {
    return args;
  }
  if (source.isTTY) {
    console.error("Reading pronunciations from stdin...");
  }
  return source
    .read()
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter(Boolean);
}

import { getArg, hasFlag, positionals } from "../lib/args.js";
import {
  convertCommand,
  describeCommand,
  phonemesCommand,
  phonesCommand,
  printCommand,
  type CommandContext,
} from "../lib/commands.js";
import { isDebugEnabled, loadSettings } from "../lib/config.js";
import { readInput } from "../lib/input.js";
import { getStore } from "../lib/store.js";

const USAGE = `Usage:
  npm run ipa -- print [--language=<set>]
  npm run ipa -- describe [<ipa> ...]
  npm run ipa -- phones [--separator=<s>] [--keep-stress] [--drop-tones] [<ipa> ...]
  npm run ipa -- phonemes <set> [--separator=<s>] [--keep-stress] [--drop-tones] [--phonemes-file=<path>] [<ipa> ...]
  npm run ipa -- convert <from> <to> [--separator=<s>] [--wrap] [<text> ...]

<from> and <to> are ipa, a notation name (sampa, espeak) or a phoneme set id.
Pronunciations are read one per line from stdin when none are given.`;

function run(argv: string[]): string[] {
  const [command, ...rest] = positionals(argv);
  const ctx: CommandContext = {
    store: getStore(),
    settings: loadSettings(),
    debug: isDebugEnabled(argv) ? (message) => console.error(`[debug] ${message}`) : undefined,
  };
  const phoneOptions = {
    separator: getArg(argv, "--separator"),
    keepStress: hasFlag(argv, "--keep-stress"),
    dropTones: hasFlag(argv, "--drop-tones"),
  };

  switch (command) {
    case "print":
      return printCommand(ctx, getArg(argv, "--language"));
    case "describe":
      return describeCommand(ctx, readInput(rest));
    case "phones":
      return phonesCommand(ctx, readInput(rest), phoneOptions);
    case "phonemes": {
      const [language, ...prons] = rest;
      if (!language) break;
      return phonemesCommand(ctx, language, readInput(prons), {
        ...phoneOptions,
        phonemesFile: getArg(argv, "--phonemes-file"),
      });
    }
    case "convert": {
      const [source, dest, ...prons] = rest;
      if (!source || !dest) break;
      return convertCommand(ctx, source, dest, readInput(prons), {
        separator: getArg(argv, "--separator"),
        wrap: hasFlag(argv, "--wrap"),
      });
    }
  }

  console.error(USAGE);
  process.exitCode = 1;
  return [];
}

try {
  for (const line of run(process.argv.slice(2))) {
    console.log(line);
  }
} catch (err) {
  console.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
}

export function getArg(argv: string[], name: string): string | undefined {
  const raw = argv.find((arg) => arg.startsWith(`${name}=`));
  return raw?.slice(name.length + 1);
}

export function hasFlag(argv: string[], name: string): boolean {
  return argv.includes(name);
}

/** Arguments that are not `--flags`. */
export function positionals(argv: string[]): string[] {
  return argv.filter((arg) => !arg.startsWith("--"));
}

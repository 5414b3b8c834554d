/** Minimal argv helpers shared by the command-line scripts. */

export function getArg(name: string, argv: readonly string[] = process.argv): string | undefined {
  const eqArg = argv.find((arg) => arg.startsWith(`${name}=`));
  if (eqArg) return eqArg.slice(name.length + 1);

  const index = argv.indexOf(name);
  const next = index >= 0 ? argv[index + 1] : undefined;
  return next !== undefined && !next.startsWith('--') ? next : undefined;
}

/** Every value of a repeatable flag, in order. */
export function getArgs(name: string, argv: readonly string[] = process.argv): string[] {
  const values: string[] = [];
  argv.forEach((arg, index) => {
    if (arg.startsWith(`${name}=`)) {
      values.push(arg.slice(name.length + 1));
    } else if (arg === name) {
      const next = argv[index + 1];
      if (next !== undefined && !next.startsWith('--')) values.push(next);
    }
  });
  return values;
}

export function hasFlag(name: string, argv: readonly string[] = process.argv): boolean {
  return argv.includes(name);
}

export function getNumberArg(name: string, argv: readonly string[] = process.argv): number | undefined {
  const raw = getArg(name, argv);
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`${name} expects a number, got "${raw}"`);
  }
  return value;
}

/** Positional arguments after the script path, flags and their values skipped. */
export function positionals(
  booleanFlags: readonly string[] = [],
  argv: readonly string[] = process.argv
): string[] {
  const args = argv.slice(2);
  const result: string[] = [];
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) continue;
    if (arg.startsWith('--')) {
      const next = args[i + 1];
      if (!arg.includes('=') && !booleanFlags.includes(arg) && next !== undefined && !next.startsWith('--')) i++;
      continue;
    }
    result.push(arg);
  }
  return result;
}

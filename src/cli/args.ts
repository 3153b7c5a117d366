/**
 * Argument helpers for the CLI. Flags take `--name value` or `--name=value`.
 */

export function getFlag(args: readonly string[], name: string): string | undefined {
  const prefix = `--${name}=`;
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) continue;
    if (arg.startsWith(prefix)) return arg.slice(prefix.length);
    if (arg === `--${name}`) {
      const next = args[i + 1];
      return next !== undefined && !next.startsWith('--') ? next : undefined;
    }
  }
  return undefined;
}

export function hasFlag(args: readonly string[], name: string): boolean {
  return args.some(a => a === `--${name}` || a.startsWith(`--${name}=`));
}

/** Arguments that are neither flags nor the value of a `--name value` flag. */
export function positionals(args: readonly string[]): string[] {
  const out: string[] = [];
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) continue;
    if (arg.startsWith('--')) {
      const next = args[i + 1];
      if (!arg.includes('=') && next !== undefined && !next.startsWith('--')) i++;
      continue;
    }
    out.push(arg);
  }
  return out;
}

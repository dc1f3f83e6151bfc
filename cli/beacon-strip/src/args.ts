export function getArg(args: string[], flag: string, fallback?: string): string | undefined {
  const idx = args.indexOf(flag);
  if (idx === -1) return fallback;
  const val = args[idx + 1];
  if (!val || val.startsWith("--")) return fallback;
  return val;
}

export function hasFlag(args: string[], flag: string): boolean {
  return args.includes(flag);
}

export function numberArg(args: string[], flag: string, fallback: number): number {
  const raw = getArg(args, flag);
  if (raw === undefined) return fallback;
  const n = Number(raw);
  if (!Number.isFinite(n)) throw new Error(`${flag} must be a number, got ${raw}`);
  return n;
}

export interface CliArgs {
  rounds?: number;
  seed?: number;
  interactive: boolean;
  table?: string;
  out?: string;
}

function intFlag(name: string, raw: string): number {
  const n = Number(raw);
  if (!Number.isInteger(n)) throw new Error(`--${name} expects an integer, got "${raw}"`);
  return n;
}

/** Accepts `--key=value` and bare `--interactive`; unknown flags are ignored. */
export function parseArgs(argv: readonly string[]): CliArgs {
  const args: CliArgs = { interactive: false };
  for (const arg of argv) {
    const [key, value] = arg.replace(/^--/, '').split('=', 2);
    switch (key) {
      case 'interactive':
      case 'i':
        args.interactive = true;
        break;
      case 'rounds':
        if (value !== undefined) args.rounds = intFlag('rounds', value);
        break;
      case 'seed':
        if (value !== undefined) args.seed = intFlag('seed', value);
        break;
      case 'table':
        if (value) args.table = value;
        break;
      case 'out':
        if (value) args.out = value;
        break;
    }
  }
  return args;
}

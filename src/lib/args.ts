export type ArgValue = string | number | boolean;
export type ArgSpec = { name: string; type: "string" | "boolean" | "number"; alias?: string; default?: ArgValue };

export function parseArgs(argv: string[], specs: ArgSpec[]) {
  const map = new Map<string, ArgSpec>();
  for (const s of specs) {
    map.set(`--${s.name}`, s);
    if (s.alias) map.set(`-${s.alias}`, s);
  }
  const result: Record<string, ArgValue> = {};
  for (const s of specs) {
    if (s.default !== undefined) result[s.name] = s.default;
  }
  const positional: string[] = [];
  for (let i = 0; i < argv.length; i++) {
    const tok = argv[i];
    if (!tok.startsWith('-')) { positional.push(tok); continue; }
    // --name=value
    const eq = tok.startsWith('--') ? tok.indexOf('=') : -1;
    const flag = eq > 0 ? tok.slice(0, eq) : tok;
    const spec = map.get(flag);
    if (!spec) throw new Error(`Unknown argument: ${flag}`);
    if (spec.type === 'boolean') {
      if (eq > 0) throw new Error(`Flag ${flag} does not take a value`);
      result[spec.name] = true;
      continue;
    }
    const val = eq > 0 ? tok.slice(eq + 1) : argv[++i];
    if (val === undefined) throw new Error(`Missing value for ${flag}`);
    if (spec.type === 'number') {
      const n = Number(val);
      if (val.trim() === '' || !Number.isFinite(n)) throw new Error(`Invalid number for ${flag}: ${val}`);
      result[spec.name] = n;
    } else {
      result[spec.name] = val;
    }
  }
  return { args: result, positional };
}

export function stringArg(args: Record<string, ArgValue>, name: string): string | undefined {
  const v = args[name];
  return typeof v === 'string' ? v : undefined;
}

export function booleanArg(args: Record<string, ArgValue>, name: string): boolean {
  return args[name] === true;
}

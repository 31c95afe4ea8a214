export type FlagValue = string | boolean | string[];

export interface ParsedArgs {
  command: string | undefined;
  positionals: string[];
  flags: Record<string, FlagValue>;
}

// A dash followed by digits is a value, not a flag
const NEGATIVE_NUMBER = /^-\d+(\.\d+)?$/;

function isFlag(str: string): boolean {
  if (!str.startsWith('-') || str === '-') return false;
  return !NEGATIVE_NUMBER.test(str);
}

/**
 * Store a flag value. Repeating a flag with values collects them into an
 * array (`--exclude a --exclude b`); a repeated boolean flag stays `true`.
 */
function setFlag(flags: Record<string, FlagValue>, key: string, value: string | boolean): void {
  const existing = flags[key];
  if (typeof value === 'string' && existing !== undefined && typeof existing !== 'boolean') {
    flags[key] = Array.isArray(existing) ? [...existing, value] : [existing, value];
  } else {
    flags[key] = value;
  }
}

export interface ParseOptions {
  /** Flags that never take a value, so a following word stays positional. */
  booleans?: readonly string[];
}

export function parseArgs(args: string[], options: ParseOptions = {}): ParsedArgs {
  const booleans = new Set(options.booleans ?? []);
  const takesValue = (key: string, next: string | undefined): next is string =>
    next !== undefined && next !== '' && next !== '--' && !isFlag(next) && !booleans.has(key);

  const result: ParsedArgs = {
    command: undefined,
    positionals: [],
    flags: {},
  };

  const addPositional = (arg: string): void => {
    if (result.command === undefined) {
      result.command = arg;
    } else {
      result.positionals.push(arg);
    }
  };

  let i = 0;
  while (i < args.length) {
    const arg = args[i];
    if (arg === undefined) {
      i++;
      continue;
    }

    if (arg === '--') {
      // Everything after a bare -- is positional
      args.slice(i + 1).forEach(addPositional);
      break;
    }

    if (arg.startsWith('--')) {
      const equalIndex = arg.indexOf('=');
      if (equalIndex !== -1) {
        setFlag(result.flags, arg.slice(2, equalIndex), arg.slice(equalIndex + 1));
      } else {
        const key = arg.slice(2);
        const nextArg = args[i + 1];
        if (takesValue(key, nextArg)) {
          setFlag(result.flags, key, nextArg);
          i++;
        } else {
          setFlag(result.flags, key, true);
        }
      }
    } else if (isFlag(arg)) {
      const key = arg.slice(1);

      // -abc is -a -b -c
      if (key.length > 1) {
        for (const char of key) {
          setFlag(result.flags, char, true);
        }
      } else {
        const nextArg = args[i + 1];
        if (takesValue(key, nextArg)) {
          setFlag(result.flags, key, nextArg);
          i++;
        } else {
          setFlag(result.flags, key, true);
        }
      }
    } else {
      addPositional(arg);
    }

    i++;
  }

  return result;
}

import { UsageError } from "@mailstash/shared";

export interface ParsedArgs {
  command: string;
  args: string[];
  /** Boolean flags are stored as "true". */
  flags: Record<string, string>;
}

/** Flags that never take a value. */
const BOOLEAN_FLAGS = new Set(["recurse", "long", "debug", "reject-existing", "help"]);

/** Flags followed by a value, either `--flag value` or `--flag=value`. */
const VALUE_FLAGS = new Set(["credentials", "folder", "root", "trash", "max-depth", "start-part"]);

const SHORT_FLAGS = new Map([
  ["r", "recurse"],
  ["l", "long"],
  ["c", "credentials"],
  ["f", "folder"],
  ["h", "help"],
]);

const COMMAND_ALIASES = new Map([
  ["ls", "list"],
  ["d", "download"],
  ["u", "upload"],
  ["rm", "remove"],
  ["lsf", "list-folders"],
]);

export const COMMANDS = ["list", "download", "upload", "remove", "list-folders", "help"] as const;
export type Command = (typeof COMMANDS)[number];

export function isCommand(name: string): name is Command {
  return COMMANDS.some((command) => command === name);
}

/**
 * Split argv into a command, positional arguments and flags. Flags may appear
 * anywhere; the first positional argument is the command.
 */
export function parseArgs(argv: readonly string[]): ParsedArgs {
  const flags: Record<string, string> = {};
  const positional: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i];
    if (token === "--") {
      positional.push(...argv.slice(i + 1));
      break;
    }

    let name: string;
    let inline: string | undefined;
    if (token.startsWith("--")) {
      const eq = token.indexOf("=");
      name = eq === -1 ? token.slice(2) : token.slice(2, eq);
      inline = eq === -1 ? undefined : token.slice(eq + 1);
    } else if (/^-[A-Za-z]$/.test(token)) {
      const long = SHORT_FLAGS.get(token.slice(1));
      if (long === undefined) throw new UsageError(`Unknown flag ${token}`);
      name = long;
    } else {
      positional.push(token);
      continue;
    }

    if (BOOLEAN_FLAGS.has(name)) {
      if (inline !== undefined) throw new UsageError(`--${name} takes no value`);
      flags[name] = "true";
    } else if (VALUE_FLAGS.has(name)) {
      const value = inline ?? argv[++i];
      if (value === undefined) throw new UsageError(`--${name} needs a value`);
      flags[name] = value;
    } else {
      throw new UsageError(`Unknown flag --${name}`);
    }
  }

  const [first, ...args] = positional;
  let command = first === undefined ? "help" : (COMMAND_ALIASES.get(first) ?? first);
  if (flags.help === "true") command = "help";
  return { command, args, flags };
}

/** Value of an integer flag, or undefined when absent. */
export function integerFlag(flags: Record<string, string>, name: string): number | undefined {
  const raw = flags[name];
  if (raw === undefined) return undefined;
  if (!/^\d+$/.test(raw)) {
    throw new UsageError(`--${name} must be a non-negative integer, got "${raw}"`);
  }
  return Number(raw);
}

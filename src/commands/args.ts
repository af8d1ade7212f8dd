import { KEY_MAX_LENGTH, KEY_MAX_VALUE, KEY_MIN_LENGTH, KEY_MIN_VALUE } from "../constants";
import { MAX_SEED } from "../core/random";
import { UsageError, ValidationError } from "../errors";

export interface RegionEdges {
  top: number;
  bottom: number;
  left: number;
  right: number;
}

export interface ScrambleArgs {
  command: "scramble";
  image: string;
  /** Absent with `--random` */
  key?: number[];
  random: boolean;
  seed?: number;
  output?: string;
  landmarks?: string;
}

export interface UnscrambleArgs {
  command: "unscramble";
  image: string;
  key: number[];
  /** Explicit edges, or `regionFile` pointing at a region record */
  region?: RegionEdges;
  regionFile?: string;
  output?: string;
}

export type ParsedArgs = { command: "help" } | ScrambleArgs | UnscrambleArgs;

export const USAGE = `
faceshuffle: scramble and unscramble the face region of an image with an integer key

Usage:
  faceshuffle scramble <image> <key...> [--output <dir>] [--landmarks <file>]
  faceshuffle scramble <image> --random [--seed <n>] [--output <dir>] [--landmarks <file>]
  faceshuffle unscramble <image> <key...> <top> <bottom> <left> <right> [--output <dir>]
  faceshuffle unscramble <image> <key...> --region <file> [--output <dir>]
  faceshuffle help

Keys are ${KEY_MIN_LENGTH} to ${KEY_MAX_LENGTH} integers from ${KEY_MIN_VALUE} to ${KEY_MAX_VALUE}.
Landmarks are read from <base>.landmarks.json beside the image unless --landmarks is given.
Scrambling writes <base>_Scrambled.<ext> and <base>_Landmarks.txt (top bottom left right).

Examples:
  faceshuffle scramble photo.png 12 7 199 40 3 3 88 150 61 20
  faceshuffle unscramble photo_Scrambled.png 12 7 199 40 3 3 88 150 61 20 --region photo_Landmarks.txt
`;

export function parseInteger(token: string, label: string): number {
  if (!/^-?\d+$/.test(token)) {
    throw new UsageError(`${label} must be an integer, got "${token}"`);
  }
  return Number(token);
}

function parseSeed(token: string): number {
  const seed = parseInteger(token, "--seed");
  if (seed < 0 || seed > MAX_SEED) {
    throw new UsageError(`--seed must be between 0 and ${MAX_SEED}, got ${seed}`);
  }
  return seed;
}

/** Key rules for keys typed by a user. */
export function validateUserKey(values: readonly number[]): void {
  if (values.length < KEY_MIN_LENGTH || values.length > KEY_MAX_LENGTH) {
    throw new ValidationError(
      `key length ${values.length} is not between ${KEY_MIN_LENGTH} and ${KEY_MAX_LENGTH} (inclusive)`
    );
  }
  const outside = values.find((v) => v < KEY_MIN_VALUE || v > KEY_MAX_VALUE);
  if (outside !== undefined) {
    throw new ValidationError(`key value ${outside} not in range [${KEY_MIN_VALUE}, ${KEY_MAX_VALUE}]`);
  }
}

interface Tokens {
  positionals: string[];
  flags: Map<string, string | true>;
}

const VALUE_FLAGS = new Set(["--output", "--landmarks", "--seed", "--region"]);
const BOOLEAN_FLAGS = new Set(["--random", "--help"]);
const ALIASES: Record<string, string> = { "-o": "--output", "-h": "--help" };

function tokenize(argv: readonly string[]): Tokens {
  const positionals: string[] = [];
  const flags = new Map<string, string | true>();

  for (let i = 0; i < argv.length; i++) {
    const raw = argv[i];
    const eq = raw.startsWith("--") ? raw.indexOf("=") : -1;
    const name = eq === -1 ? raw : raw.slice(0, eq);
    const inline = eq === -1 ? undefined : raw.slice(eq + 1);
    const flag = ALIASES[name] ?? name;

    if (VALUE_FLAGS.has(flag)) {
      const value = inline ?? argv[++i];
      if (value === undefined) throw new UsageError(`${flag} needs a value`);
      flags.set(flag, value);
    } else if (BOOLEAN_FLAGS.has(flag)) {
      flags.set(flag, true);
    } else if (flag.startsWith("--")) {
      throw new UsageError(`unknown option ${flag}`);
    } else {
      positionals.push(raw);
    }
  }
  return { positionals, flags };
}

function stringFlag(tokens: Tokens, name: string): string | undefined {
  const value = tokens.flags.get(name);
  return typeof value === "string" ? value : undefined;
}

function rejectFlags(tokens: Tokens, command: string, names: string[]): void {
  for (const name of names) {
    if (tokens.flags.has(name)) throw new UsageError(`${name} is not accepted by ${command}`);
  }
}

function parseScramble(tokens: Tokens): ScrambleArgs {
  rejectFlags(tokens, "scramble", ["--region"]);
  const [image, ...rest] = tokens.positionals;
  if (!image) throw new UsageError("scramble needs an image path");

  const random = tokens.flags.get("--random") === true;
  const seedFlag = stringFlag(tokens, "--seed");
  if (seedFlag !== undefined && !random) throw new UsageError("--seed only applies with --random");
  if (random && rest.length > 0) throw new UsageError("--random cannot be combined with an explicit key");
  if (!random && rest.length === 0) throw new UsageError("scramble needs a key or --random");

  return {
    command: "scramble",
    image,
    key: random ? undefined : rest.map((t, i) => parseInteger(t, `key value ${i + 1}`)),
    random,
    seed: seedFlag === undefined ? undefined : parseSeed(seedFlag),
    output: stringFlag(tokens, "--output"),
    landmarks: stringFlag(tokens, "--landmarks"),
  };
}

function parseUnscramble(tokens: Tokens): UnscrambleArgs {
  rejectFlags(tokens, "unscramble", ["--random", "--seed", "--landmarks"]);
  const [image, ...rest] = tokens.positionals;
  if (!image) throw new UsageError("unscramble needs an image path");

  const numbers = rest.map((t) => parseInteger(t, "key and region values"));
  const regionFile = stringFlag(tokens, "--region");
  const output = stringFlag(tokens, "--output");

  if (regionFile !== undefined) {
    if (numbers.length === 0) throw new UsageError("unscramble needs a key");
    return { command: "unscramble", image, key: numbers, regionFile, output };
  }

  if (numbers.length < 5) {
    throw new UsageError("unscramble needs a key followed by <top> <bottom> <left> <right>, or --region <file>");
  }
  const [top, bottom, left, right] = numbers.slice(-4);
  return {
    command: "unscramble",
    image,
    key: numbers.slice(0, -4),
    region: { top, bottom, left, right },
    output,
  };
}

export function parseArgs(argv: readonly string[]): ParsedArgs {
  const tokens = tokenize(argv);
  const [command, ...positionals] = tokens.positionals;
  if (tokens.flags.has("--help") || command === undefined || command === "help") {
    return { command: "help" };
  }

  const scoped: Tokens = { positionals, flags: tokens.flags };
  switch (command) {
    case "scramble":
      return parseScramble(scoped);
    case "unscramble":
      return parseUnscramble(scoped);
    default:
      throw new UsageError(`unknown command "${command}"`);
  }
}

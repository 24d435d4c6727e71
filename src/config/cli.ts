import { EnvConfig } from "./index";
import { ConfigurationError } from "../shared/utils/errors";
import { RunConfig } from "../shared/types/common";

export interface CliFlags {
  apiUser: string;
  apiKey: string;
  minLvl: number;
  fetchInterval: number;
  language: string;
  onlyActive: boolean;
  maxCycles: number;
  singleRun: boolean;
  help: boolean;
}

type StringFlag = "api-user" | "api-key" | "language";
type IntegerFlag = "min-lvl" | "fetch-interval" | "max-cycles";
type BooleanFlag = "only-active" | "single-run" | "help" | "h";

const STRING_FLAGS: readonly StringFlag[] = ["api-user", "api-key", "language"];
const INTEGER_FLAGS: readonly IntegerFlag[] = ["min-lvl", "fetch-interval", "max-cycles"];
const BOOLEAN_FLAGS: readonly BooleanFlag[] = ["only-active", "single-run", "help", "h"];

const isStringFlag = (name: string): name is StringFlag => (STRING_FLAGS as readonly string[]).includes(name);
const isIntegerFlag = (name: string): name is IntegerFlag => (INTEGER_FLAGS as readonly string[]).includes(name);
const isBooleanFlag = (name: string): name is BooleanFlag => (BOOLEAN_FLAGS as readonly string[]).includes(name);

export const USAGE = `Usage: party-up -api-user <id> -api-key <key> [options]

Options:
  -api-user string      Habitica API user
  -api-key string       Habitica API key
  -min-lvl int          Min level of users to invite to party (default 0)
  -fetch-interval int   Interval for fetching users in seconds (default 120)
  -language string      Language of users to invite to party (default all languages)
  -only-active          Only invite active users to party
  -max-cycles int       Number of cycles to run (default 1)
  -single-run           Run once and exit (overrides max-cycles)
  -h, -help             Show this message

HABITICA_API_USER and HABITICA_API_KEY are used when the flags are omitted.`;

function parseInteger(flag: string, raw: string): number {
  if (!/^[+-]?\d+$/.test(raw)) {
    throw new ConfigurationError(`invalid value "${raw}" for flag -${flag}: expected an integer`);
  }
  return Number.parseInt(raw, 10);
}

function parseBoolean(flag: string, raw: string): boolean {
  const normalized = raw.toLowerCase();
  if (["1", "t", "true"].includes(normalized)) return true;
  if (["0", "f", "false"].includes(normalized)) return false;
  throw new ConfigurationError(`invalid value "${raw}" for flag -${flag}: expected a boolean`);
}

// accepts -name value, --name value, -name=value and --name=value
export function parseCliArgs(argv: readonly string[]): CliFlags {
  const flags: CliFlags = {
    apiUser: "",
    apiKey: "",
    minLvl: 0,
    fetchInterval: 120,
    language: "",
    onlyActive: false,
    maxCycles: 1,
    singleRun: false,
    help: false,
  };

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    const match = /^--?([a-z][a-z-]*)(?:=(.*))?$/s.exec(arg);
    if (!match) {
      throw new ConfigurationError(`unexpected argument: ${arg}`);
    }

    const name = match[1];
    const inline: string | undefined = match[2];

    if (isBooleanFlag(name)) {
      const value = inline === undefined ? true : parseBoolean(name, inline);
      switch (name) {
        case "only-active":
          flags.onlyActive = value;
          break;
        case "single-run":
          flags.singleRun = value;
          break;
        case "help":
        case "h":
          flags.help = value;
          break;
      }
      continue;
    }

    if (!isStringFlag(name) && !isIntegerFlag(name)) {
      throw new ConfigurationError(`flag provided but not defined: -${name}`);
    }

    let raw = inline;
    if (raw === undefined) {
      if (i + 1 >= argv.length) {
        throw new ConfigurationError(`flag needs an argument: -${name}`);
      }
      raw = argv[++i];
    }

    switch (name) {
      case "api-user":
        flags.apiUser = raw;
        break;
      case "api-key":
        flags.apiKey = raw;
        break;
      case "language":
        flags.language = raw;
        break;
      case "min-lvl":
        flags.minLvl = parseInteger(name, raw);
        break;
      case "fetch-interval": {
        const seconds = parseInteger(name, raw);
        if (seconds < 0) {
          throw new ConfigurationError(`invalid value "${raw}" for flag -${name}: must not be negative`);
        }
        flags.fetchInterval = seconds;
        break;
      }
      case "max-cycles":
        flags.maxCycles = parseInteger(name, raw);
        break;
    }
  }

  return flags;
}

// merge flags with env fallbacks into the immutable run config
export function buildRunConfig(flags: CliFlags, env: Pick<EnvConfig, "apiUser" | "apiKey">): RunConfig {
  const apiUser = flags.apiUser || env.apiUser || "";
  const apiKey = flags.apiKey || env.apiKey || "";

  if (!apiUser || !apiKey) {
    throw new ConfigurationError("Please provide Habitica API user and key. (Use -api-user and -api-key flags)");
  }

  return Object.freeze({
    credentials: Object.freeze({ apiUser, apiKey }),
    criteria: Object.freeze({
      minLevel: flags.minLvl,
      language: flags.language === "" ? null : flags.language,
      onlyActive: flags.onlyActive,
    }),
    cycles: Object.freeze({
      maxCycles: flags.maxCycles > 0 ? flags.maxCycles : 1,
      intervalSeconds: flags.fetchInterval,
      singleRun: flags.singleRun,
    }),
  });
}

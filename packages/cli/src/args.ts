import {
  type ConcurrencyLimits,
  type ContextOptions,
  isPipelineSource,
} from "@conveyor/core";

export type Command = "run" | "validate" | "plan";

const COMMANDS: readonly Command[] = ["run", "validate", "plan"];

function isCommand(value: string): value is Command {
  return COMMANDS.some((c) => c === value);
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export interface CliOptions {
  command: Command | "help";
  file?: string;
  source?: string;
  ref?: string;
  tag?: string;
  sha?: string;
  defaultBranch?: string;
  variables: Record<string, string>;
  fromEnv: boolean;
  simulate: boolean;
  play: string[];
  tagLimits: Record<string, number>;
  maxJobs?: number;
  logsDir?: string;
  cacheDir?: string;
  workdir?: string;
  verbose: boolean;
}

const VALUE_FLAGS = new Set([
  "--source",
  "--ref",
  "--tag",
  "--sha",
  "--default-branch",
  "--var",
  "--play",
  "--limit",
  "--max-jobs",
  "--logs-dir",
  "--cache-dir",
  "--workdir",
]);

function splitPair(flag: string, pair: string): [string, string] {
  const eq = pair.indexOf("=");
  if (eq <= 0) throw new UsageError(`${flag} requires KEY=VALUE, got: ${pair}`);
  return [pair.slice(0, eq), pair.slice(eq + 1)];
}

function positiveInt(flag: string, value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) throw new UsageError(`${flag} requires a positive integer, got: ${value}`);
  return n;
}

/** Parse `argv` (without the node and script entries) */
export function parseArgs(argv: readonly string[]): CliOptions {
  const opts: CliOptions = {
    command: "help",
    variables: {},
    fromEnv: false,
    simulate: false,
    play: [],
    tagLimits: {},
    verbose: false,
  };

  const [command, ...rest] = argv;
  if (command === undefined || command === "--help" || command === "-h" || command === "help") {
    return opts;
  }
  if (!isCommand(command)) throw new UsageError(`Unknown command: ${command}`);
  opts.command = command;

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i] ?? "";
    if (!arg.startsWith("--")) {
      if (opts.file !== undefined) throw new UsageError(`Unexpected argument: ${arg}`);
      opts.file = arg;
      continue;
    }
    if (!VALUE_FLAGS.has(arg)) {
      switch (arg) {
        case "--from-env":
          opts.fromEnv = true;
          break;
        case "--simulate":
          opts.simulate = true;
          break;
        case "--verbose":
          opts.verbose = true;
          break;
        case "--help":
          opts.command = "help";
          break;
        default:
          throw new UsageError(`Unknown option: ${arg}`);
      }
      continue;
    }

    const value = rest[++i];
    if (value === undefined) throw new UsageError(`${arg} requires a value`);
    switch (arg) {
      case "--source":
        opts.source = value;
        break;
      case "--ref":
        opts.ref = value;
        break;
      case "--tag":
        opts.tag = value;
        break;
      case "--sha":
        opts.sha = value;
        break;
      case "--default-branch":
        opts.defaultBranch = value;
        break;
      case "--var": {
        const [key, v] = splitPair(arg, value);
        opts.variables[key] = v;
        break;
      }
      case "--play":
        opts.play.push(value);
        break;
      case "--limit": {
        const [tag, limit] = splitPair(arg, value);
        opts.tagLimits[tag] = positiveInt(arg, limit);
        break;
      }
      case "--max-jobs":
        opts.maxJobs = positiveInt(arg, value);
        break;
      case "--logs-dir":
        opts.logsDir = value;
        break;
      case "--cache-dir":
        opts.cacheDir = value;
        break;
      case "--workdir":
        opts.workdir = value;
        break;
    }
  }

  if (opts.command !== "help" && opts.file === undefined) {
    throw new UsageError("No pipeline file specified");
  }
  return opts;
}

/**
 * Pipeline context from the flags. With `--from-env`, CI_* variables of
 * the environment fill in whatever the flags leave unset.
 */
export function contextOptions(opts: CliOptions, env: NodeJS.ProcessEnv = {}): ContextOptions {
  const fallback = (value: string | undefined, name: string) =>
    value ?? (opts.fromEnv ? env[name] : undefined);

  const source = fallback(opts.source, "CI_PIPELINE_SOURCE") ?? "push";
  if (!isPipelineSource(source)) throw new UsageError(`Unknown pipeline source: ${source}`);

  const tag = fallback(opts.tag, "CI_COMMIT_TAG");
  const ref = fallback(opts.ref, "CI_COMMIT_BRANCH") ?? fallback(undefined, "CI_COMMIT_REF_NAME") ?? tag ?? "main";
  return {
    source,
    refName: ref,
    tag,
    sha: fallback(opts.sha, "CI_COMMIT_SHA"),
    defaultBranch: fallback(opts.defaultBranch, "CI_DEFAULT_BRANCH"),
    variables: opts.variables,
  };
}

export function concurrencyLimits(opts: CliOptions): ConcurrencyLimits {
  return {
    maxJobs: opts.maxJobs,
    tags: Object.keys(opts.tagLimits).length > 0 ? opts.tagLimits : undefined,
  };
}

#!/usr/bin/env -S node --import tsx
import * as fs from "node:fs";
import * as path from "node:path";
import {
  ArtifactBroker,
  ArtifactStore,
  ConfigurationError,
  createPipelineContext,
  type PipelineContext,
  type Diagnostic,
  type Executor,
  FileCacheStore,
  GraphError,
  type PipelineEvent,
  type PrepareResult,
  preparePipelineFile,
  Scheduler,
  Severity,
  SimulatedExecutor,
  validate,
  loadDefinitionFile,
} from "@conveyor/core";
import { LocalShellExecutor } from "@conveyor/executor-shell";
import { type CliOptions, concurrencyLimits, contextOptions, parseArgs, UsageError } from "./args.js";
import { formatClock, formatDiagnostic, formatEvent, formatPlan, formatSummary } from "./format.js";
import { runLayout } from "./layout.js";

async function main(): Promise<number> {
  let opts: CliOptions;
  try {
    opts = parseArgs(process.argv.slice(2));
  } catch (err) {
    if (!(err instanceof UsageError)) throw err;
    console.error(`Error: ${err.message}`);
    printUsage();
    return 1;
  }

  switch (opts.command) {
    case "help":
      printUsage();
      return 0;
    case "validate":
      return validateCommand(opts);
    case "plan":
      return planCommand(opts);
    case "run":
      return runCommand(opts);
  }
}

function printUsage() {
  console.log(`
conveyor - staged CI pipeline runner

Usage:
  conveyor run <pipeline.yml> [options]
  conveyor plan <pipeline.yml> [context options]
  conveyor validate <pipeline.yml>

Context options:
  --source <s>          Pipeline source (push, merge_request_event, schedule, ...; default: push)
  --ref <branch>        Branch name (default: main)
  --tag <tag>           Run as a tag pipeline
  --sha <sha>           Commit SHA
  --default-branch <b>  CI_DEFAULT_BRANCH (default: main)
  --var <KEY=VALUE>     Pipeline variable (repeatable)
  --from-env            Take unset context values from CI_* environment variables

Run options:
  --simulate            Do not run scripts; every job succeeds
  --play <job>          Run a manual job (repeatable)
  --max-jobs <n>        Jobs running at once
  --limit <tag=n>       Jobs running at once per runner tag (repeatable)
  --logs-dir <path>     Run log directory (default: .conveyor-runs/<timestamp>)
  --cache-dir <path>    Keep caches between runs in this directory
  --workdir <path>      Project directory copied into each job (default: the pipeline file's directory)
  --verbose             Show artifact, cache and skip events

General:
  --help, -h            Show this help
`);
}

function requireFile(opts: CliOptions): string {
  const filePath = path.resolve(opts.file ?? "");
  if (!fs.existsSync(filePath)) {
    throw new UsageError(`File not found: ${filePath}`);
  }
  return filePath;
}

/** Load, lint and plan; reports configuration problems and returns null */
function prepare(filePath: string, context: PipelineContext): PrepareResult | null {
  try {
    const result = preparePipelineFile(filePath, { context });
    for (const w of result.diagnostics.filter((d) => d.severity === Severity.WARNING)) {
      console.warn(formatDiagnostic(w));
    }
    return result;
  } catch (err) {
    if (err instanceof ConfigurationError || err instanceof GraphError) {
      console.error(`Invalid pipeline: ${err.message}`);
      return null;
    }
    throw err;
  }
}

function validateCommand(opts: CliOptions): number {
  const filePath = requireFile(opts);
  let diagnostics: Diagnostic[];
  try {
    diagnostics = validate(loadDefinitionFile(filePath));
  } catch (err) {
    if (!(err instanceof ConfigurationError)) throw err;
    console.error(`Invalid pipeline: ${err.message}`);
    return 1;
  }

  const errors = diagnostics.filter((d) => d.severity === Severity.ERROR);
  for (const d of diagnostics) {
    if (d.severity === Severity.ERROR) console.error(formatDiagnostic(d));
    else console.warn(formatDiagnostic(d));
  }
  if (errors.length > 0) return 1;
  console.log(`Valid pipeline: ${path.basename(filePath)}`);
  return 0;
}

function planCommand(opts: CliOptions): number {
  const prepared = prepare(requireFile(opts), createPipelineContext(contextOptions(opts, process.env)));
  if (prepared === null) return 1;
  if (prepared.graph === null) {
    console.log("No pipeline: workflow rules did not create one");
    return 0;
  }
  for (const line of formatPlan(prepared.graph)) console.log(line);
  return 0;
}

async function runCommand(opts: CliOptions): Promise<number> {
  const filePath = requireFile(opts);
  const context = createPipelineContext(contextOptions(opts, process.env));
  const prepared = prepare(filePath, context);
  if (prepared === null) return 1;
  if (prepared.graph === null) {
    console.log("No pipeline: workflow rules did not create one");
    return 0;
  }

  const { logsRoot, workRoot, sourceDir, sourceExclude } = runLayout(opts, filePath, Date.now().toString());
  const executor: Executor = opts.simulate
    ? new SimulatedExecutor()
    : new LocalShellExecutor({ workRoot, sourceDir, sourceExclude });
  const broker = new ArtifactBroker({
    store: new ArtifactStore(path.join(logsRoot, "artifacts")),
    cache: opts.cacheDir ? new FileCacheStore(path.resolve(opts.cacheDir)) : undefined,
  });

  const scheduler = new Scheduler({
    executor,
    broker,
    limits: concurrencyLimits(opts),
    playManual: opts.play,
    context,
    logsRoot,
    onEvent: (event) => printEvent(event, opts.verbose),
  });

  if (opts.simulate) console.log("Mode: simulation");
  console.log(`Jobs: ${prepared.graph.jobs.size} (${prepared.graph.excluded.length} excluded)`);
  console.log("---");

  const onSigint = () => {
    console.error("\nCanceling pipeline...");
    scheduler.cancel();
  };
  process.once("SIGINT", onSigint);
  try {
    const result = await scheduler.run(prepared.graph);
    console.log("\n---");
    for (const line of formatSummary(result)) console.log(line);
    console.log(`Logs: ${logsRoot}`);
    return result.exitCode;
  } finally {
    process.off("SIGINT", onSigint);
  }
}

function printEvent(event: PipelineEvent, verbose: boolean) {
  const line = formatEvent(event, verbose);
  if (line === null) return;
  const text = `[${formatClock(new Date(event.timestamp))}] ${line.text}`;
  if (line.stream === "err") console.error(text);
  else console.log(text);
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(err instanceof UsageError ? `Error: ${err.message}` : err);
    process.exitCode = 1;
  },
);

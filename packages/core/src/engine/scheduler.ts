import { ArtifactBroker, type RestoredCache } from "../artifacts/broker.js";
import type { ArtifactInfo, ArtifactSet } from "../artifacts/store.js";
import { DependencyUnavailable, ExecutionFailure, RunnerInfrastructureFailure } from "../errors.js";
import { EventEmitter, type PipelineEvent } from "../events/index.js";
import type { ExecutionOutcome, Executor, ResolvedEnvironment } from "../executor/types.js";
import type { JobGraph, JobNode } from "../model/graph.js";
import type { ArtifactSpec, CacheSpec, EnvironmentSpec } from "../model/job.js";
import { type FailureReason, slugify } from "../model/types.js";
import type { PipelineContext } from "../state/context.js";
import { expandVariableMap, expandVariables } from "../state/expand.js";
import { JobInstance } from "../state/job-instance.js";
import { isTerminal, JobState, type SkipReason } from "../state/types.js";
import { type ConcurrencyLimits, ConcurrencyLimiter } from "./limiter.js";
import { type PipelineResult, pipelineStatus, toJobResult } from "./result.js";
import { type BackoffConfig, delayForAttempt, isFailureAllowed, shouldRetry, sleep } from "./retry.js";
import { RunLog } from "./run-log.js";

/** Approves deployments before dispatch; the environment name arrives expanded */
export interface EnvironmentGate {
  approve(job: JobNode, environment: EnvironmentSpec): boolean | Promise<boolean>;
}

export interface RunConfig {
  executor: Executor;
  broker?: ArtifactBroker;
  limits?: ConcurrencyLimits;
  /** Delay between retry attempts; retries are immediate without it */
  retryBackoff?: BackoffConfig;
  /** How long canceled or timed-out jobs get to stop (default 10s) */
  cancelGracePeriodMs?: number;
  /** Applies to jobs without their own `timeout` */
  defaultTimeoutMs?: number;
  /** Manual jobs to run; every other manual job is skipped */
  playManual?: readonly string[];
  environmentGate?: EnvironmentGate;
  /** Invocation context; its variables sit above job variables */
  context?: PipelineContext;
  signal?: AbortSignal;
  /** Directory for the run log (manifest, per-job status, result) */
  logsRoot?: string;
  pipelineId?: string;
  onEvent?: (event: PipelineEvent) => void;
  now?: () => number;
}

const DEFAULT_GRACE_PERIOD_MS = 10_000;

interface FailureInfo {
  reason: FailureReason;
  exitCode?: number | null;
  error?: string;
}

/**
 * Reactive job scheduler: decides jobs as their predecessors finish,
 * dispatches them under the concurrency limits, and applies retry,
 * artifact and cache policies to every attempt.
 */
export class Scheduler {
  readonly events = new EventEmitter();
  private controller = new AbortController();
  private broker: ArtifactBroker;
  private now: () => number;
  private instances = new Map<string, JobInstance>();
  /** Failed jobs waiting out a retry backoff; not yet settled */
  private retrying = new Set<string>();
  private running = new Map<string, AbortController>();
  private runLog: RunLog | null;
  private pipelineId: string;
  private nextJobId = 1;
  private started = false;

  constructor(private config: RunConfig) {
    this.broker = config.broker ?? new ArtifactBroker({ now: config.now });
    this.now = config.now ?? Date.now;
    this.runLog = config.logsRoot ? new RunLog(config.logsRoot) : null;
    this.pipelineId = config.pipelineId ?? String(this.now());
    if (config.onEvent) {
      this.events.on(config.onEvent);
    }
    config.signal?.addEventListener("abort", () => this.cancel(), { once: true });
  }

  get canceled(): boolean {
    return this.controller.signal.aborted;
  }

  /** Cancel the run: nothing new starts, running jobs are asked to stop */
  cancel(): void {
    if (!this.controller.signal.aborted) this.controller.abort();
  }

  /** Run every job of the graph to a terminal state */
  async run(graph: JobGraph): Promise<PipelineResult> {
    if (this.started) throw new Error("Scheduler.run() may only be called once");
    this.started = true;
    if (this.config.signal?.aborted) this.cancel();

    const limiter = new ConcurrencyLimiter(this.config.limits);
    const inflight = new Map<string, Promise<void>>();
    const startTime = this.now();
    const startedAt = new Date(startTime).toISOString();

    for (const job of graph.jobs.values()) {
      this.instances.set(job.id, new JobInstance(job.id, job.index));
    }
    this.runLog?.writeManifest(this.pipelineId, graph, startedAt);
    this.events.emit({
      type: "pipeline_started",
      id: this.pipelineId,
      jobCount: graph.jobs.size,
      stages: [...graph.stages],
      timestamp: this.timestamp(),
    });

    const aborted = new Promise<void>((resolve) => {
      if (this.canceled) resolve();
      else this.controller.signal.addEventListener("abort", () => resolve(), { once: true });
    });

    while (!this.canceled) {
      this.promote(graph);
      this.dispatchReady(graph, limiter, inflight);
      if (inflight.size === 0) break;
      await Promise.race([...inflight.values(), aborted]);
    }

    if (this.canceled) {
      await this.cancelAll(graph, inflight);
    } else {
      const stuck = [...this.instances.values()].filter((i) => !isTerminal(i.state));
      if (stuck.length > 0) {
        throw new Error(`Unable to make progress; jobs left undecided: ${stuck.map((i) => i.name).join(", ")}`);
      }
    }

    return this.finish(graph, startTime, startedAt);
  }

  // ── Decisions ──

  private instance(id: string): JobInstance {
    const inst = this.instances.get(id);
    if (!inst) throw new Error(`Job not found: ${id}`);
    return inst;
  }

  private isSettled(id: string): boolean {
    return isTerminal(this.instance(id).state) && !this.retrying.has(id);
  }

  /** A finished predecessor that stops `on_success` successors */
  private isBlocking(id: string): boolean {
    const inst = this.instance(id);
    switch (inst.state) {
      case JobState.FAILED:
        return !inst.failureAllowed;
      case JobState.SKIPPED:
        return inst.skipReason === "upstream_failed";
      case JobState.CANCELED:
        return true;
      default:
        return false;
    }
  }

  /**
   * Decide every pending job whose predecessors have all settled. Repeats
   * until nothing changes, since a skip can settle a later job's needs.
   */
  private promote(graph: JobGraph): void {
    let changed = true;
    while (changed) {
      changed = false;
      for (const job of graph.jobs.values()) {
        const inst = this.instance(job.id);
        if (inst.state !== JobState.PENDING) continue;
        const preds = graph.predecessors(job.id);
        if (!preds.every((p) => this.isSettled(p))) continue;

        changed = true;
        const blocked = preds.some((p) => this.isBlocking(p));
        switch (job.when) {
          case "on_success":
            if (blocked) this.skip(job, inst, "upstream_failed");
            else inst.transition(JobState.READY);
            break;
          case "always":
            inst.transition(JobState.READY);
            break;
          case "on_failure":
            if (blocked) inst.transition(JobState.READY);
            else this.skip(job, inst, "no_upstream_failure");
            break;
          case "manual":
            if (blocked) this.skip(job, inst, "upstream_failed");
            else if (this.config.playManual?.includes(job.id)) inst.transition(JobState.READY);
            else this.skip(job, inst, "manual");
            break;
        }
      }
    }
  }

  private dispatchReady(
    graph: JobGraph,
    limiter: ConcurrencyLimiter,
    inflight: Map<string, Promise<void>>,
  ): void {
    for (const job of graph.jobs.values()) {
      const inst = this.instance(job.id);
      if (inst.state !== JobState.READY || inflight.has(job.id)) continue;
      if (!limiter.canAcquire(job)) continue;

      limiter.acquire(job);
      inst.start(this.now());
      const task = (async () => {
        let retryDelay: number | null;
        try {
          retryDelay = await this.runAttempt(job, inst);
        } finally {
          limiter.release(job);
        }
        if (retryDelay !== null) await this.backoff(job, inst, retryDelay);
      })().finally(() => inflight.delete(job.id));
      inflight.set(job.id, task);
    }
  }

  private async backoff(job: JobNode, inst: JobInstance, delayMs: number): Promise<void> {
    await sleep(delayMs, this.controller.signal);
    this.retrying.delete(job.id);
    if (this.canceled) {
      this.cancelInstance(job, inst);
    } else {
      inst.transition(JobState.READY);
    }
  }

  // ── One attempt ──

  /** Run one attempt; returns the backoff before the next attempt, or null */
  private async runAttempt(job: JobNode, inst: JobInstance): Promise<number | null> {
    const jobId = this.nextJobId++;
    this.events.emit({
      type: "job_started",
      name: job.id,
      stage: job.stage,
      jobId,
      attempt: inst.attempts,
      timestamp: this.timestamp(),
    });

    let sets: ArtifactSet[];
    try {
      sets = this.broker.resolve(job);
    } catch (err) {
      if (err instanceof DependencyUnavailable) {
        return this.recordFailure(job, inst, { reason: err.reason, error: err.message });
      }
      return this.recordFailure(job, inst, { reason: "data_integrity_failure", error: errorMessage(err) });
    }

    if (this.canceled) {
      if (inst.state === JobState.RUNNING) this.cancelInstance(job, inst);
      return null;
    }

    const variables = this.resolveVariables(job, jobId, sets);
    const environment = job.template.environment;
    const gate = this.config.environmentGate;
    if (environment !== null && gate) {
      const target = { ...environment, name: variables.CI_ENVIRONMENT_NAME ?? environment.name };
      let approved: boolean;
      try {
        approved = await gate.approve(job, target);
      } catch (err) {
        return this.recordFailure(job, inst, { reason: "deployment_rejected", error: errorMessage(err) });
      }
      if (!approved) {
        return this.recordFailure(job, inst, {
          reason: "deployment_rejected",
          error: `Deployment to '${target.name}' was not approved`,
        });
      }
      if (this.canceled) {
        if (inst.state === JobState.RUNNING) this.cancelInstance(job, inst);
        return null;
      }
    }

    const expand = (text: string) => expandVariables(text, (name) => variables[name]);
    const cacheSpecs: CacheSpec[] = job.template.cache.map((c) => ({ ...c, key: expand(c.key) }));
    const artifactSpec: ArtifactSpec | null = job.template.artifacts && {
      ...job.template.artifacts,
      name: expand(job.template.artifacts.name),
    };

    let caches: RestoredCache[];
    try {
      caches = this.broker.restoreCaches(cacheSpecs);
    } catch (err) {
      return this.recordFailure(job, inst, {
        reason: "runner_system_failure",
        error: `Cache restore failed: ${errorMessage(err)}`,
      });
    }
    for (const cache of caches) {
      if (cache.spec.policy === "push") continue;
      this.events.emit({
        type: "cache_restored",
        name: job.id,
        key: cache.spec.key,
        matchedKey: cache.matchedKey,
        timestamp: this.timestamp(),
      });
    }

    const controller = new AbortController();
    const onAbort = () => controller.abort();
    this.controller.signal.addEventListener("abort", onAbort, { once: true });
    this.running.set(job.id, controller);

    const timeoutMs = job.template.timeoutMs ?? this.config.defaultTimeoutMs ?? null;
    const env: ResolvedEnvironment = {
      jobId,
      jobName: job.id,
      stage: job.stage,
      attempt: inst.attempts,
      image: job.template.image === null ? null : expand(job.template.image),
      tags: job.template.tags,
      script: job.template.script,
      beforeScript: job.template.beforeScript,
      afterScript: job.template.afterScript,
      variables,
      artifacts: sets,
      caches,
      artifactSpec,
      cacheSpecs,
      timeoutMs,
      signal: controller.signal,
    };

    let outcome: ExecutionOutcome;
    try {
      outcome = await this.dispatchWithTimeout(job, env, controller, timeoutMs);
    } catch (err) {
      outcome = outcomeFromError(err);
    } finally {
      this.running.delete(job.id);
      this.controller.signal.removeEventListener("abort", onAbort);
    }

    return this.handleOutcome(job, inst, jobId, outcome, artifactSpec, cacheSpecs);
  }

  private async dispatchWithTimeout(
    job: JobNode,
    env: ResolvedEnvironment,
    controller: AbortController,
    timeoutMs: number | null,
  ): Promise<ExecutionOutcome> {
    const dispatch = Promise.resolve().then(() => this.config.executor.dispatch(job, env));
    if (timeoutMs === null) return dispatch;

    let timer: ReturnType<typeof setTimeout> | undefined;
    const expired = new Promise<"timeout">((resolve) => {
      timer = setTimeout(() => resolve("timeout"), timeoutMs);
    });
    const first = await Promise.race([dispatch, expired]).finally(() => clearTimeout(timer));
    if (first !== "timeout") return first;

    controller.abort();
    await this.stopExecutor(job);
    await this.waitAtMost(dispatch.catch(() => undefined), this.gracePeriod);
    return {
      status: "failed",
      failureReason: "job_execution_timeout",
      error: `Job exceeded its timeout of ${timeoutMs}ms`,
    };
  }

  private handleOutcome(
    job: JobNode,
    inst: JobInstance,
    jobId: number,
    outcome: ExecutionOutcome,
    artifactSpec: ArtifactSpec | null,
    cacheSpecs: CacheSpec[],
  ): number | null {
    // forcibly canceled while the executor was still stopping
    if (inst.state !== JobState.RUNNING) return null;

    if (outcome.log) this.runLog?.appendJobLog(job.id, inst.attempts, outcome.log);

    if (this.canceled || outcome.status === "canceled") {
      this.cancelInstance(job, inst);
      return null;
    }

    const succeeded = outcome.status === "success";
    if (artifactSpec && this.broker.shouldCollect(artifactSpec, succeeded)) {
      let info: ArtifactInfo;
      try {
        info = this.broker.publish(
          this.broker.buildArtifactSet(
            job,
            jobId,
            artifactSpec.name,
            outcome.artifacts ?? {},
            outcome.reports?.dotenv ?? {},
          ),
        );
      } catch (err) {
        return this.recordFailure(job, inst, {
          reason: "data_integrity_failure",
          error: `Artifact upload failed: ${errorMessage(err)}`,
        });
      }
      inst.artifactIds.push(info.id);
      this.events.emit({
        type: "artifacts_published",
        name: job.id,
        artifactId: info.id,
        fileCount: info.fileCount,
        sizeBytes: info.sizeBytes,
        timestamp: this.timestamp(),
      });
    }

    let saved: string[];
    try {
      saved = this.broker.saveCaches(cacheSpecs, outcome.cache, succeeded);
    } catch (err) {
      return this.recordFailure(job, inst, {
        reason: "runner_system_failure",
        error: `Cache save failed: ${errorMessage(err)}`,
      });
    }
    for (const key of saved) {
      this.events.emit({ type: "cache_saved", name: job.id, key, timestamp: this.timestamp() });
    }

    if (succeeded) {
      inst.succeed(this.now());
      this.events.emit({
        type: "job_succeeded",
        name: job.id,
        attempt: inst.attempts,
        durationMs: inst.durationMs,
        timestamp: this.timestamp(),
      });
      this.writeStatus(job, inst);
      return null;
    }

    return this.recordFailure(job, inst, {
      reason: outcome.failureReason ?? "script_failure",
      exitCode: outcome.exitCode ?? null,
      error: outcome.error,
    });
  }

  /** Fail the running attempt, then either schedule a retry or settle the job */
  private recordFailure(job: JobNode, inst: JobInstance, failure: FailureInfo): number | null {
    if (inst.state !== JobState.RUNNING) return null;
    const exitCode = failure.exitCode ?? null;
    inst.fail(failure.reason, this.now(), { exitCode: exitCode ?? undefined, error: failure.error });

    const willRetry =
      !this.canceled && shouldRetry(job.template.retry, { reason: failure.reason, exitCode }, inst.attempts);
    inst.failureAllowed = !willRetry && isFailureAllowed(job.allowFailure, exitCode);
    this.events.emit({
      type: "job_failed",
      name: job.id,
      attempt: inst.attempts,
      reason: failure.reason,
      exitCode,
      error: failure.error ?? null,
      allowed: inst.failureAllowed,
      willRetry,
      timestamp: this.timestamp(),
    });

    if (!willRetry) {
      this.writeStatus(job, inst);
      return null;
    }

    const delayMs = this.config.retryBackoff ? delayForAttempt(inst.attempts, this.config.retryBackoff) : 0;
    this.events.emit({
      type: "job_retrying",
      name: job.id,
      attempt: inst.attempts + 1,
      delayMs,
      timestamp: this.timestamp(),
    });
    if (delayMs === 0) {
      inst.transition(JobState.READY);
      return null;
    }
    this.retrying.add(job.id);
    return delayMs;
  }

  /**
   * Variables seen by one attempt, lowest precedence first: global, job,
   * rule, invocation context, predefined job variables, upstream dotenv
   * reports.
   */
  private resolveVariables(job: JobNode, jobId: number, sets: ArtifactSet[]): Record<string, string> {
    const context = this.config.context?.snapshot() ?? {};
    const predefined: Record<string, string> = {
      CI_JOB_NAME: job.id,
      CI_JOB_NAME_SLUG: slugify(job.id),
      CI_JOB_STAGE: job.stage,
      CI_JOB_ID: String(jobId),
      CI_PIPELINE_ID: this.pipelineId,
    };
    const declared = expandVariableMap(job.variables, (name) => context[name] ?? predefined[name]);
    const variables = {
      ...declared,
      ...context,
      ...predefined,
      ...this.broker.dotenvVariables(sets),
    };
    const environment = job.template.environment;
    if (environment !== null) {
      variables.CI_ENVIRONMENT_NAME = expandVariables(environment.name, (name) => variables[name]);
    }
    return variables;
  }

  // ── Cancellation ──

  private get gracePeriod(): number {
    return this.config.cancelGracePeriodMs ?? DEFAULT_GRACE_PERIOD_MS;
  }

  private async stopExecutor(job: JobNode): Promise<void> {
    try {
      await this.config.executor.cancel(job);
    } catch (err) {
      this.instance(job.id).errors.push(`cancel failed: ${errorMessage(err)}`);
    }
  }

  /** Resolve when `promise` settles or after `ms`, whichever is first */
  private async waitAtMost(promise: Promise<unknown>, ms: number): Promise<void> {
    const timer = new AbortController();
    await Promise.race([promise, sleep(ms, timer.signal)]);
    timer.abort();
  }

  private async cancelAll(graph: JobGraph, inflight: Map<string, Promise<void>>): Promise<void> {
    for (const job of graph.jobs.values()) {
      const inst = this.instance(job.id);
      if (inst.state === JobState.PENDING || inst.state === JobState.READY) {
        this.cancelInstance(job, inst);
      }
    }

    const stopping: Promise<void>[] = [];
    for (const [id, controller] of this.running) {
      controller.abort();
      stopping.push(this.stopExecutor(graph.getJob(id)));
    }
    await Promise.all(stopping);
    await this.waitAtMost(Promise.allSettled(inflight.values()), this.gracePeriod);

    for (const job of graph.jobs.values()) {
      const inst = this.instance(job.id);
      if (inst.state === JobState.RUNNING) {
        inst.errors.push(`did not stop within ${this.gracePeriod}ms of cancellation`);
        this.cancelInstance(job, inst);
      }
    }
  }

  // ── Bookkeeping ──

  private skip(job: JobNode, inst: JobInstance, reason: SkipReason): void {
    inst.skip(reason, this.now());
    this.events.emit({ type: "job_skipped", name: job.id, reason, timestamp: this.timestamp() });
    this.writeStatus(job, inst);
  }

  private cancelInstance(job: JobNode, inst: JobInstance): void {
    inst.cancel(this.now());
    this.events.emit({ type: "job_canceled", name: job.id, timestamp: this.timestamp() });
    this.writeStatus(job, inst);
  }

  private writeStatus(job: JobNode, inst: JobInstance): void {
    this.runLog?.writeJobStatus(toJobResult(inst, job.stage));
  }

  private timestamp(): string {
    return new Date(this.now()).toISOString();
  }

  private finish(graph: JobGraph, startTime: number, startedAt: string): PipelineResult {
    const jobs = [...graph.jobs.values()].map((job) => toJobResult(this.instance(job.id), job.stage));
    const status = pipelineStatus(jobs, this.canceled);
    const durationMs = this.now() - startTime;
    const result: PipelineResult = {
      id: this.pipelineId,
      status,
      hasWarnings: jobs.some((j) => j.state === JobState.FAILED && j.failureAllowed),
      exitCode: status === "success" ? 0 : 1,
      jobs,
      startedAt,
      finishedAt: this.timestamp(),
      durationMs,
    };

    if (status === "success") {
      this.events.emit({
        type: "pipeline_completed",
        id: this.pipelineId,
        durationMs,
        hasWarnings: result.hasWarnings,
        timestamp: this.timestamp(),
      });
    } else if (status === "canceled") {
      this.events.emit({ type: "pipeline_canceled", id: this.pipelineId, durationMs, timestamp: this.timestamp() });
    } else {
      this.events.emit({
        type: "pipeline_failed",
        id: this.pipelineId,
        failedJobs: jobs.filter((j) => j.state === JobState.FAILED && !j.failureAllowed).map((j) => j.name),
        durationMs,
        timestamp: this.timestamp(),
      });
    }
    this.runLog?.writeResult(result);
    return result;
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Map an exception thrown by an executor to a failed outcome */
function outcomeFromError(err: unknown): ExecutionOutcome {
  if (err instanceof ExecutionFailure) {
    return { status: "failed", failureReason: err.reason, exitCode: err.exitCode, error: err.message };
  }
  if (err instanceof RunnerInfrastructureFailure) {
    return { status: "failed", failureReason: err.reason, error: err.message };
  }
  return { status: "failed", failureReason: "runner_system_failure", error: errorMessage(err) };
}

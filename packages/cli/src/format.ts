import type { Diagnostic, JobGraph, PipelineEvent, PipelineResult } from "@conveyor/core";

export interface OutputLine {
  stream: "out" | "err";
  text: string;
}

/** Local wall-clock time as HH:MM:SS */
export function formatClock(date: Date): string {
  return [date.getHours(), date.getMinutes(), date.getSeconds()]
    .map((n) => String(n).padStart(2, "0"))
    .join(":");
}

function seconds(ms: number): string {
  return `${(ms / 1000).toFixed(1)}s`;
}

/** One line per event worth showing; chatty events only with `verbose` */
export function formatEvent(event: PipelineEvent, verbose: boolean): OutputLine | null {
  const out = (text: string): OutputLine => ({ stream: "out", text });
  const err = (text: string): OutputLine => ({ stream: "err", text });
  switch (event.type) {
    case "pipeline_started":
      return out(`Pipeline ${event.id} started: ${event.jobCount} job(s)`);
    case "pipeline_completed":
      return out(
        `Pipeline passed in ${seconds(event.durationMs)}${event.hasWarnings ? " (with warnings)" : ""}`,
      );
    case "pipeline_failed":
      return err(`Pipeline failed in ${seconds(event.durationMs)}: ${event.failedJobs.join(", ")}`);
    case "pipeline_canceled":
      return err(`Pipeline canceled after ${seconds(event.durationMs)}`);
    case "job_started":
      return out(
        `${event.name}: started (stage ${event.stage}${event.attempt > 1 ? `, attempt ${event.attempt}` : ""})`,
      );
    case "job_succeeded":
      return out(`${event.name}: passed in ${seconds(event.durationMs)}`);
    case "job_failed": {
      const detail = event.error ?? event.reason;
      const line = `${event.name}: failed: ${detail}${event.allowed && !event.willRetry ? " (allowed to fail)" : ""}`;
      return event.allowed || event.willRetry ? out(line) : err(line);
    }
    case "job_retrying":
      return out(`${event.name}: retrying (attempt ${event.attempt}, delay ${event.delayMs}ms)`);
    case "job_skipped":
      return verbose || event.reason === "upstream_failed" ? out(`${event.name}: skipped (${event.reason})`) : null;
    case "job_canceled":
      return err(`${event.name}: canceled`);
    case "artifacts_published":
      return verbose
        ? out(`${event.name}: uploaded ${event.fileCount} file(s), ${event.sizeBytes} bytes as ${event.artifactId}`)
        : null;
    case "cache_restored":
      if (!verbose) return null;
      return out(
        event.matchedKey === null
          ? `${event.name}: cache ${event.key} not found`
          : `${event.name}: cache ${event.key} restored from ${event.matchedKey}`,
      );
    case "cache_saved":
      return verbose ? out(`${event.name}: cache ${event.key} saved`) : null;
  }
}

/** Included jobs per stage with their `when` and what they wait for */
export function formatPlan(graph: JobGraph): string[] {
  const lines: string[] = [];
  for (const stage of graph.stages) {
    const jobs = graph.jobsInStage(stage);
    if (jobs.length === 0) continue;
    lines.push(`${stage}:`);
    for (const job of jobs) {
      let line = `  ${job.id} [${job.when}]`;
      if (job.template.needs !== null) {
        const needs = graph.edges.filter((e) => e.to === job.id && e.kind === "needs").map((e) => e.from);
        line += needs.length > 0 ? ` needs: ${needs.join(", ")}` : " needs: (none)";
      }
      if (job.allowFailure.allowed) line += " (allow failure)";
      lines.push(line);
    }
  }
  if (graph.excluded.length > 0) lines.push(`excluded: ${graph.excluded.join(", ")}`);
  return lines;
}

export function formatDiagnostic(d: Diagnostic): string {
  return `  [${d.severity}] [${d.rule}] ${d.message}${d.fix ? ` (fix: ${d.fix})` : ""}`;
}

export function formatSummary(result: PipelineResult): string[] {
  const lines = [`Result: ${result.status}`];
  for (const job of result.jobs) {
    const reason = job.failureReason ?? job.skipReason;
    lines.push(`  ${job.name}: ${job.state}${reason ? ` (${reason})` : ""}`);
  }
  return lines;
}

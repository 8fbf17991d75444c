import { GraphError } from "../errors.js";
import { decideJob } from "../rules/index.js";
import type { PipelineContext } from "../state/context.js";
import { type ArtifactSource, JobGraph, type JobEdge, type JobNode } from "./graph.js";
import type { AllowFailurePolicy, JobTemplate, PipelineDefinition } from "./job.js";
import { deepFreeze } from "./types.js";

export interface BuildOptions {
  /** Pipeline-level variables added on top of the document's (e.g. by workflow rules) */
  variables?: Record<string, string>;
}

const ALLOWED: AllowFailurePolicy = Object.freeze({ allowed: true, exitCodes: [] });
const NOT_ALLOWED: AllowFailurePolicy = Object.freeze({ allowed: false, exitCodes: [] });

interface LiveJob {
  template: JobTemplate;
  stageIndex: number;
  node: Omit<JobNode, "artifactSources">;
}

/**
 * Evaluate rules for every job and connect the survivors into a DAG.
 *
 * Pure: the same definition, context and options always produce an
 * identical graph.
 */
export function buildJobGraph(
  definition: PipelineDefinition,
  ctx: PipelineContext,
  opts: BuildOptions = {},
): JobGraph {
  const globals = { ...definition.variables, ...opts.variables };
  const stageIndex = new Map(definition.stages.map((s, i) => [s, i]));

  // 1. rules decide the live set
  const live = new Map<string, LiveJob>();
  const excluded: string[] = [];
  let index = 0;
  for (const template of definition.jobs.values()) {
    const vars = ctx.withDefaults({ ...globals, ...template.variables });
    const decision = decideJob(template, vars);
    if (decision.action === "excluded") {
      excluded.push(template.name);
      continue;
    }
    const allowFailure =
      decision.rule?.allowFailure ??
      template.allowFailure ??
      (decision.action === "manual" ? ALLOWED : NOT_ALLOWED);
    const stage = stageIndex.get(template.stage) ?? 0;
    live.set(template.name, {
      template,
      stageIndex: stage,
      node: {
        id: template.name,
        index,
        stage: template.stage,
        stageIndex: stage,
        template,
        when: decision.action,
        allowFailure,
        variables: { ...globals, ...template.variables, ...decision.rule?.variables },
      },
    });
    index++;
  }

  const checkTarget = (job: LiveJob, target: string, keyword: string): LiveJob | null => {
    if (target === job.template.name) {
      throw new GraphError(`job '${target}' cannot list itself in ${keyword}`, [target]);
    }
    if (!definition.jobs.has(target)) {
      throw new GraphError(
        `job '${job.template.name}' has ${keyword} on unknown job '${target}'`,
        [job.template.name, target],
      );
    }
    return live.get(target) ?? null;
  };

  // 2. edges
  const edges: JobEdge[] = [];
  const nodes = new Map<string, JobNode>();
  for (const job of live.values()) {
    const name = job.template.name;
    const predecessors: string[] = [];
    const { needs, dependencies } = job.template;

    if (needs === null) {
      for (const other of live.values()) {
        if (other.stageIndex < job.stageIndex) {
          predecessors.push(other.template.name);
          edges.push({ from: other.template.name, to: name, kind: "stage" });
        }
      }
    } else {
      for (const need of needs) {
        const target = need.optional && !definition.jobs.has(need.job) ? null : checkTarget(job, need.job, "needs");
        if (target === null) {
          if (need.optional) continue;
          throw new GraphError(
            `job '${name}' needs '${need.job}', which is not included in this pipeline`,
            [name, need.job],
          );
        }
        if (target.stageIndex > job.stageIndex) {
          throw new GraphError(
            `job '${name}' needs '${need.job}', which is in a later stage (${target.template.stage})`,
            [name, need.job],
          );
        }
        if (!predecessors.includes(need.job)) {
          predecessors.push(need.job);
          edges.push({ from: need.job, to: name, kind: "needs" });
        }
      }
    }

    // 3. artifact sources
    let sources: ArtifactSource[];
    if (dependencies !== null) {
      sources = [];
      for (const dep of dependencies) {
        const target = checkTarget(job, dep, "dependencies");
        const need = needs?.find((n) => n.job === dep);
        const needed = need !== undefined;
        if (needs !== null && !needed) {
          throw new GraphError(
            `job '${name}' depends on '${dep}', which is not listed in its needs`,
            [name, dep],
          );
        }
        if (target === null) continue;
        if (!needed && target.stageIndex >= job.stageIndex) {
          throw new GraphError(
            `job '${name}' depends on '${dep}', which is not in a previous stage`,
            [name, dep],
          );
        }
        const optional = need?.optional ?? false;
        sources.push({ job: dep, required: !optional && target.template.artifacts !== null });
      }
    } else if (needs !== null) {
      sources = [];
      for (const need of needs) {
        const target = live.get(need.job);
        if (need.artifacts && target) {
          sources.push({ job: need.job, required: !need.optional && target.template.artifacts !== null });
        }
      }
    } else {
      sources = predecessors.map((p) => ({ job: p, required: false }));
    }

    nodes.set(name, deepFreeze({ ...job.node, artifactSources: sources }));
  }

  detectCycles(nodes, edges);
  return new JobGraph(definition.stages, nodes, deepFreeze(edges), excluded);
}

/** DFS over needs edges; reports the first cycle found with its path */
function detectCycles(nodes: ReadonlyMap<string, JobNode>, edges: readonly JobEdge[]): void {
  const deps = new Map<string, string[]>();
  for (const id of nodes.keys()) deps.set(id, []);
  for (const edge of edges) deps.get(edge.to)?.push(edge.from);

  const visited = new Set<string>();
  const stack: string[] = [];

  const visit = (id: string): void => {
    const onStack = stack.indexOf(id);
    if (onStack >= 0) {
      const cycle = [...stack.slice(onStack), id];
      throw new GraphError(`circular dependency: ${cycle.join(" -> ")}`, cycle.slice(0, -1));
    }
    if (visited.has(id)) return;
    visited.add(id);
    stack.push(id);
    for (const dep of deps.get(id) ?? []) visit(dep);
    stack.pop();
  };

  for (const id of nodes.keys()) visit(id);
}

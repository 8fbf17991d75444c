import type { AllowFailurePolicy, JobTemplate } from "./job.js";
import type { RuleAction } from "./types.js";

/** An upstream job whose artifacts are downloaded before a job runs */
export interface ArtifactSource {
  readonly job: string;
  /** Missing or expired artifacts fail the dependant */
  readonly required: boolean;
}

/** A live job in the pipeline graph */
export interface JobNode {
  readonly id: string;
  /** Declaration order; dispatch ties break on it */
  readonly index: number;
  readonly stage: string;
  readonly stageIndex: number;
  readonly template: JobTemplate;
  readonly when: Exclude<RuleAction, "excluded">;
  readonly allowFailure: AllowFailurePolicy;
  /** global < job < matching rule */
  readonly variables: Readonly<Record<string, string>>;
  readonly artifactSources: readonly ArtifactSource[];
}

export type EdgeKind = "stage" | "needs";

/** `from` must reach a terminal state before `to` is decided */
export interface JobEdge {
  readonly from: string;
  readonly to: string;
  readonly kind: EdgeKind;
}

/** Immutable DAG of the jobs included in one pipeline */
export class JobGraph {
  readonly stages: readonly string[];
  readonly jobs: ReadonlyMap<string, JobNode>;
  readonly edges: readonly JobEdge[];
  /** Jobs excluded by rules, in declaration order */
  readonly excluded: readonly string[];
  private readonly preds: ReadonlyMap<string, readonly string[]>;
  private readonly succs: ReadonlyMap<string, readonly string[]>;

  constructor(
    stages: readonly string[],
    jobs: ReadonlyMap<string, JobNode>,
    edges: readonly JobEdge[],
    excluded: readonly string[] = [],
  ) {
    this.stages = stages;
    this.jobs = jobs;
    this.edges = edges;
    this.excluded = excluded;

    const preds = new Map<string, string[]>();
    const succs = new Map<string, string[]>();
    for (const id of jobs.keys()) {
      preds.set(id, []);
      succs.set(id, []);
    }
    for (const edge of edges) {
      preds.get(edge.to)?.push(edge.from);
      succs.get(edge.from)?.push(edge.to);
    }
    this.preds = preds;
    this.succs = succs;
    Object.freeze(this);
  }

  /** Get a job by name or throw */
  getJob(id: string): JobNode {
    const job = this.jobs.get(id);
    if (!job) throw new Error(`Job not found: ${id}`);
    return job;
  }

  predecessors(id: string): readonly string[] {
    return this.preds.get(id) ?? [];
  }

  successors(id: string): readonly string[] {
    return this.succs.get(id) ?? [];
  }

  /** Jobs of one stage in declaration order */
  jobsInStage(stage: string): JobNode[] {
    return [...this.jobs.values()].filter((j) => j.stage === stage);
  }

  /** Kahn's algorithm; ties resolved by declaration order */
  topologicalOrder(): string[] {
    return this.layers().flat();
  }

  /**
   * Jobs grouped by longest distance from a root: every job's predecessors
   * sit in earlier layers.
   */
  layers(): string[][] {
    const remaining = new Map<string, number>();
    for (const id of this.jobs.keys()) remaining.set(id, this.predecessors(id).length);

    let frontier = [...this.jobs.keys()].filter((id) => remaining.get(id) === 0);
    const result: string[][] = [];
    while (frontier.length > 0) {
      result.push(frontier);
      const next: string[] = [];
      for (const id of frontier) {
        for (const succ of this.successors(id)) {
          const left = (remaining.get(succ) ?? 0) - 1;
          remaining.set(succ, left);
          if (left === 0) next.push(succ);
        }
      }
      frontier = next.sort((a, b) => this.getJob(a).index - this.getJob(b).index);
    }
    return result;
  }
}

import { ConfigurationError } from "../errors.js";
import type { JobNode } from "../model/graph.js";

export interface ConcurrencyLimits {
  /** Jobs running at once across the whole pipeline */
  maxJobs?: number;
  /** Per-tag limits; a job takes one slot in every limited tag it carries */
  tags?: Record<string, number>;
}

/**
 * Slot accounting for dispatch. `resource_group` is always exclusive:
 * at most one running job per group.
 */
export class ConcurrencyLimiter {
  private running = 0;
  private tagUse = new Map<string, number>();
  private groups = new Set<string>();

  constructor(private limits: ConcurrencyLimits = {}) {
    if (limits.maxJobs !== undefined && !(limits.maxJobs >= 1)) {
      throw new ConfigurationError(`maxJobs must be at least 1 (got ${limits.maxJobs})`);
    }
    for (const [tag, limit] of Object.entries(limits.tags ?? {})) {
      if (!(limit >= 1)) {
        throw new ConfigurationError(`limit for tag '${tag}' must be at least 1 (got ${limit})`);
      }
    }
  }

  canAcquire(job: JobNode): boolean {
    if (this.limits.maxJobs !== undefined && this.running >= this.limits.maxJobs) return false;
    const group = job.template.resourceGroup;
    if (group !== null && this.groups.has(group)) return false;
    for (const tag of job.template.tags) {
      const limit = this.limits.tags?.[tag];
      if (limit !== undefined && (this.tagUse.get(tag) ?? 0) >= limit) return false;
    }
    return true;
  }

  acquire(job: JobNode): void {
    if (!this.canAcquire(job)) throw new Error(`No free slot for job '${job.id}'`);
    this.running++;
    for (const tag of job.template.tags) this.tagUse.set(tag, (this.tagUse.get(tag) ?? 0) + 1);
    if (job.template.resourceGroup !== null) this.groups.add(job.template.resourceGroup);
  }

  release(job: JobNode): void {
    this.running = Math.max(0, this.running - 1);
    for (const tag of job.template.tags) this.tagUse.set(tag, Math.max(0, (this.tagUse.get(tag) ?? 0) - 1));
    if (job.template.resourceGroup !== null) this.groups.delete(job.template.resourceGroup);
  }

  get active(): number {
    return this.running;
  }
}

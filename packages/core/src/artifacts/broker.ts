import { DependencyUnavailable } from "../errors.js";
import type { JobNode } from "../model/graph.js";
import type { ArtifactSpec, CacheSpec, CollectWhen } from "../model/job.js";
import { type CacheStore, MemoryCacheStore } from "./cache.js";
import { type ArtifactInfo, type ArtifactSet, ArtifactStore, type NewArtifactSet } from "./store.js";

/** A cache as handed to an executor before the job runs */
export interface RestoredCache {
  spec: CacheSpec;
  /** Key the files came from (the cache key or a fallback); null on a miss */
  matchedKey: string | null;
  files: ReadonlyMap<string, Uint8Array>;
}

export interface BrokerOptions {
  store?: ArtifactStore;
  cache?: CacheStore;
  now?: () => number;
}

function collects(when: CollectWhen, succeeded: boolean): boolean {
  return when === "always" || (when === "on_success") === succeeded;
}

/**
 * Moves artifacts between jobs and caches between runs.
 *
 * Artifact expiry is lazy: a set past its `expiresAt` reads as absent.
 */
export class ArtifactBroker {
  readonly store: ArtifactStore;
  readonly cache: CacheStore;
  private now: () => number;

  constructor(opts: BrokerOptions = {}) {
    this.store = opts.store ?? new ArtifactStore();
    this.cache = opts.cache ?? new MemoryCacheStore();
    this.now = opts.now ?? Date.now;
  }

  /** Whether a job's artifacts are uploaded given how its attempt ended */
  shouldCollect(spec: ArtifactSpec, succeeded: boolean): boolean {
    return collects(spec.when, succeeded);
  }

  buildArtifactSet(
    job: JobNode,
    jobId: number,
    name: string,
    files: Record<string, Uint8Array>,
    dotenv: Record<string, string> = {},
  ): NewArtifactSet {
    const createdAt = this.now();
    const expireIn = job.template.artifacts?.expireInMs ?? null;
    return {
      name,
      jobName: job.id,
      jobId,
      dotenv,
      createdAt,
      expiresAt: expireIn === null ? null : createdAt + expireIn,
      files: new Map(Object.entries(files)),
    };
  }

  publish(set: NewArtifactSet): ArtifactInfo {
    return this.store.store(set);
  }

  isExpired(info: ArtifactInfo): boolean {
    return info.expiresAt !== null && this.now() >= info.expiresAt;
  }

  /**
   * Latest live artifact set of each of the job's sources, in source order.
   * A required source with no set, or an expired one, throws
   * DependencyUnavailable; best-effort sources are silently skipped.
   */
  resolve(job: JobNode): ArtifactSet[] {
    const sets: ArtifactSet[] = [];
    for (const source of job.artifactSources) {
      const info = this.store.latest(source.job);
      if (!info) {
        if (source.required) throw new DependencyUnavailable(job.id, source.job, "missing");
        continue;
      }
      if (this.isExpired(info)) {
        if (source.required) throw new DependencyUnavailable(job.id, source.job, "expired");
        continue;
      }
      sets.push(this.store.retrieve(info.id));
    }
    return sets;
  }

  /** dotenv report variables of the given sets; later sets win */
  dotenvVariables(sets: readonly ArtifactSet[]): Record<string, string> {
    const vars: Record<string, string> = {};
    for (const set of sets) Object.assign(vars, set.dotenv);
    return vars;
  }

  /** Look up each cache by key, then by its fallback keys; misses start empty */
  restoreCaches(specs: readonly CacheSpec[]): RestoredCache[] {
    return specs.map((spec): RestoredCache => {
      if (spec.policy === "push") return { spec, matchedKey: null, files: new Map() };
      for (const key of [spec.key, ...spec.fallbackKeys]) {
        const entry = this.cache.get(key);
        if (entry) return { spec, matchedKey: key, files: entry.files };
      }
      return { spec, matchedKey: null, files: new Map() };
    });
  }

  /**
   * Store caches produced by an attempt, honouring `policy` and `when`.
   * Returns the keys written.
   */
  saveCaches(
    specs: readonly CacheSpec[],
    produced: Record<string, Record<string, Uint8Array>> | undefined,
    succeeded: boolean,
  ): string[] {
    const saved: string[] = [];
    for (const spec of specs) {
      if (spec.policy === "pull" || !collects(spec.when, succeeded)) continue;
      const files = produced?.[spec.key];
      if (!files) continue;
      this.cache.put(spec.key, new Map(Object.entries(files)), this.now());
      saved.push(spec.key);
    }
    return saved;
  }
}

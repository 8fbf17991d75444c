import * as fs from "node:fs";
import * as path from "node:path";
import type { JobGraph } from "../model/graph.js";
import { slugify } from "../model/types.js";
import type { JobResult, PipelineResult } from "./result.js";

/**
 * On-disk record of one pipeline run:
 *
 *   <root>/manifest.json          written at start
 *   <root>/<job-slug>/status.json per terminal job
 *   <root>/<job-slug>/output.log  executor log, when there is one
 *   <root>/result.json            written at the end
 */
export class RunLog {
  constructor(readonly root: string) {}

  writeManifest(id: string, graph: JobGraph, startedAt: string): void {
    fs.mkdirSync(this.root, { recursive: true });
    const manifest = {
      id,
      startTime: startedAt,
      stages: graph.stages,
      jobs: [...graph.jobs.values()].map((j) => ({
        name: j.id,
        stage: j.stage,
        when: j.when,
        needs: graph.predecessors(j.id),
      })),
      excluded: graph.excluded,
    };
    fs.writeFileSync(path.join(this.root, "manifest.json"), JSON.stringify(manifest, null, 2));
  }

  jobDir(name: string): string {
    return path.join(this.root, slugify(name) || "job");
  }

  writeJobStatus(result: JobResult): void {
    const dir = this.jobDir(result.name);
    fs.mkdirSync(dir, { recursive: true });
    fs.writeFileSync(path.join(dir, "status.json"), JSON.stringify(result, null, 2));
  }

  appendJobLog(name: string, attempt: number, log: string): void {
    const dir = this.jobDir(name);
    fs.mkdirSync(dir, { recursive: true });
    fs.appendFileSync(path.join(dir, "output.log"), `--- attempt ${attempt} ---\n${log}`);
  }

  writeResult(result: PipelineResult): void {
    fs.mkdirSync(this.root, { recursive: true });
    fs.writeFileSync(path.join(this.root, "result.json"), JSON.stringify(result, null, 2));
  }
}

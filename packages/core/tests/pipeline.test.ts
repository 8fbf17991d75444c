import { describe, it, expect } from "vitest";
import { fileURLToPath } from "node:url";
import { preparePipeline, preparePipelineFile } from "../src/engine/pipeline.js";
import { Scheduler } from "../src/engine/scheduler.js";
import { SimulatedExecutor } from "../src/executor/simulated.js";
import type { JobGraph } from "../src/model/graph.js";
import { createPipelineContext, type ContextOptions } from "../src/state/context.js";
import { ValidationError } from "../src/validation/index.js";

const CI_FILE = fileURLToPath(new URL("./fixtures/ci.yml", import.meta.url));

function prepare(opts: ContextOptions, variables?: Record<string, string>) {
  return preparePipelineFile(CI_FILE, { context: createPipelineContext(opts), variables });
}

function requireGraph(graph: JobGraph | null): JobGraph {
  if (graph === null) throw new Error("pipeline was not created");
  return graph;
}

describe("preparePipeline", () => {
  it("plans a branch pipeline", () => {
    const { graph, workflow, diagnostics } = prepare({ source: "push", refName: "main" });
    const plan = requireGraph(graph);
    expect(workflow).toEqual({ created: true, variables: {} });
    expect(diagnostics).toEqual([]);
    expect([...plan.jobs.keys()]).toEqual(["build", "unit", "deploy"]);
    expect(plan.excluded).toEqual(["nightly-e2e"]);
    expect(plan.getJob("deploy").when).toBe("manual");

    const build = plan.getJob("build");
    expect(build.template.image).toBe("node:20");
    expect(build.template.beforeScript).toEqual(["npm ci"]);
    expect(build.variables).toEqual({ FROM_INCLUDE: "yes", SHARED: "include", APP: "shop" });
  });

  it("excludes the manual deploy away from the default branch", () => {
    const plan = requireGraph(prepare({ source: "push", refName: "feature/cart" }).graph);
    expect(plan.excluded).toEqual(["nightly-e2e", "deploy"]);
  });

  it("adds workflow variables to scheduled pipelines", () => {
    const { graph, workflow } = prepare({ source: "schedule", refName: "main" });
    expect(workflow.variables).toEqual({ NIGHTLY: "true" });
    expect(requireGraph(graph).jobs.has("nightly-e2e")).toBe(true);
  });

  it("lets invocation variables drive job rules", () => {
    const plan = requireGraph(prepare({ source: "push", refName: "main" }, { NIGHTLY: "true" }).graph);
    expect(plan.excluded).toEqual([]);
  });

  it("creates no pipeline when workflow rules say so", () => {
    expect(prepare({ source: "push", refName: "v1.0.0", tag: "v1.0.0" }).graph).toBeNull();
    const skipped = prepare({
      source: "push",
      refName: "main",
      variables: { CI_COMMIT_MESSAGE: "Fix typo [skip ci]" },
    });
    expect(skipped.workflow.created).toBe(false);
    expect(skipped.graph).toBeNull();
  });

  it("refuses invalid pipelines before planning", () => {
    const context = createPipelineContext({ source: "push", refName: "main" });
    expect(() => preparePipeline("unit:\n  needs: [ghost]\n  script: x\n", { context })).toThrow(ValidationError);
  });
});

describe("end to end", () => {
  it("runs a branch pipeline with the simulated executor", async () => {
    const context = createPipelineContext({ source: "push", refName: "main" });
    const graph = requireGraph(preparePipelineFile(CI_FILE, { context }).graph);
    const executor = new SimulatedExecutor();
    const result = await new Scheduler({ executor, context }).run(graph);

    expect(result.status).toBe("success");
    expect(executor.dispatched).toEqual(["build", "unit"]);
    expect(result.jobs.map((j) => [j.name, j.state, j.skipReason])).toEqual([
      ["build", "success", null],
      ["unit", "success", null],
      ["deploy", "skipped", "manual"],
    ]);
  });

  it("runs the nightly job on schedules and plays the deploy on request", async () => {
    const context = createPipelineContext({ source: "schedule", refName: "main" });
    const graph = requireGraph(preparePipelineFile(CI_FILE, { context }).graph);
    const executor = new SimulatedExecutor();
    const result = await new Scheduler({ executor, context, playManual: ["deploy"] }).run(graph);

    expect(result.status).toBe("success");
    expect(executor.dispatched).toEqual(["build", "unit", "nightly-e2e", "deploy"]);
  });
});

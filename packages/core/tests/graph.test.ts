import { describe, it, expect } from "vitest";
import { loadDefinition } from "../src/definition/index.js";
import { GraphError } from "../src/errors.js";
import { buildJobGraph } from "../src/model/builder.js";
import { createPipelineContext, type PipelineContext } from "../src/state/context.js";

const push = createPipelineContext({ source: "push", refName: "main" });

function build(yaml: string, ctx: PipelineContext = push, variables?: Record<string, string>) {
  return buildJobGraph(loadDefinition(yaml), ctx, { variables });
}

const staged = `
stages: [build, test, deploy]
compile:
  stage: build
  script: make
  artifacts:
    paths: [bin]
assets:
  stage: build
  script: make assets
unit:
  stage: test
  script: make test
lint:
  stage: test
  script: make lint
ship:
  stage: deploy
  script: make ship
`;

describe("Job Graph Builder", () => {
  describe("stage ordering", () => {
    it("makes every job depend on all jobs of earlier stages", () => {
      const graph = build(staged);
      expect(graph.predecessors("compile")).toEqual([]);
      expect(graph.predecessors("unit")).toEqual(["compile", "assets"]);
      expect(graph.predecessors("ship")).toEqual(["compile", "assets", "unit", "lint"]);
      expect(graph.edges.every((e) => e.kind === "stage")).toBe(true);
    });

    it("layers jobs by stage", () => {
      expect(build(staged).layers()).toEqual([["compile", "assets"], ["unit", "lint"], ["ship"]]);
      expect(build(staged).topologicalOrder()).toEqual(["compile", "assets", "unit", "lint", "ship"]);
    });

    it("lists jobs of a stage in declaration order", () => {
      expect(build(staged).jobsInStage("test").map((j) => j.id)).toEqual(["unit", "lint"]);
    });

    it("makes stage predecessors best-effort artifact sources", () => {
      expect(build(staged).getJob("unit").artifactSources).toEqual([
        { job: "compile", required: false },
        { job: "assets", required: false },
      ]);
    });
  });

  describe("needs", () => {
    const dag = `
stages: [build, test, deploy]
compile:
  stage: build
  script: make
  artifacts:
    paths: [bin]
docs:
  stage: build
  script: make docs
unit:
  stage: test
  needs: [compile]
  script: make test
smoke:
  stage: test
  needs: [unit]
  script: make smoke
ship:
  stage: deploy
  needs:
    - compile
    - job: docs
      artifacts: false
  script: make ship
`;

    it("replaces stage edges with needs edges", () => {
      const graph = build(dag);
      expect(graph.predecessors("unit")).toEqual(["compile"]);
      expect(graph.predecessors("ship")).toEqual(["compile", "docs"]);
      expect(graph.edges.filter((e) => e.to === "ship").map((e) => e.kind)).toEqual(["needs", "needs"]);
    });

    it("allows needs within the same stage", () => {
      expect(build(dag).predecessors("smoke")).toEqual(["unit"]);
      expect(build(dag).layers()).toEqual([["compile", "docs"], ["unit", "ship"], ["smoke"]]);
    });

    it("takes artifacts from needs unless disabled", () => {
      expect(build(dag).getJob("ship").artifactSources).toEqual([{ job: "compile", required: true }]);
    });

    it("treats an empty needs list as no predecessors", () => {
      const graph = build(`
stages: [build, test]
compile:
  stage: build
  script: make
early:
  stage: test
  needs: []
  script: make early
`);
      expect(graph.predecessors("early")).toEqual([]);
    });

    it("rejects needs on a later stage", () => {
      const yaml = `
stages: [build, test]
compile:
  stage: build
  needs: [unit]
  script: make
unit:
  stage: test
  script: make test
`;
      expect(() => build(yaml)).toThrow(GraphError);
      expect(() => build(yaml)).toThrow("job 'compile' needs 'unit', which is in a later stage (test)");
    });

    it("rejects needs on unknown jobs and on itself", () => {
      expect(() => build("unit:\n  needs: [ghost]\n  script: x\n")).toThrow(
        "job 'unit' has needs on unknown job 'ghost'",
      );
      expect(() => build("unit:\n  needs: [unit]\n  script: x\n")).toThrow("job 'unit' cannot list itself in needs");
    });

    it("rejects a needed job that rules excluded, unless optional", () => {
      const yaml = (optional: boolean) => `
stages: [build, deploy]
package:
  stage: build
  script: make package
  rules:
    - if: $CI_COMMIT_TAG
deploy:
  stage: deploy
  needs:
    - job: package
      optional: ${optional}
  script: make deploy
`;
      expect(() => build(yaml(false))).toThrow("job 'deploy' needs 'package', which is not included in this pipeline");
      const graph = build(yaml(true));
      expect(graph.excluded).toEqual(["package"]);
      expect(graph.predecessors("deploy")).toEqual([]);
    });

    it("ignores an optional need on a job that does not exist", () => {
      const graph = build("unit:\n  needs:\n    - job: ghost\n      optional: true\n  script: x\n");
      expect(graph.predecessors("unit")).toEqual([]);
    });

    it("reports cycles with their path", () => {
      const yaml = `
a:
  needs: [b]
  script: x
b:
  needs: [a]
  script: y
`;
      expect(() => build(yaml)).toThrow("circular dependency: a -> b -> a");
    });
  });

  describe("dependencies", () => {
    it("limits artifact sources to the listed jobs", () => {
      const graph = build(`
stages: [build, test]
compile:
  stage: build
  script: make
  artifacts:
    paths: [bin]
docs:
  stage: build
  script: make docs
unit:
  stage: test
  dependencies: [compile, docs]
  script: make test
none:
  stage: test
  dependencies: []
  script: make none
`);
      expect(graph.getJob("unit").artifactSources).toEqual([
        { job: "compile", required: true },
        { job: "docs", required: false },
      ]);
      expect(graph.getJob("none").artifactSources).toEqual([]);
      expect(graph.predecessors("none")).toEqual(["compile", "docs"]);
    });

    it("never requires artifacts of an optional need", () => {
      const graph = build(`
stages: [build, deploy]
package:
  stage: build
  script: make
  artifacts:
    paths: [dist]
publish:
  stage: deploy
  needs:
    - job: package
      optional: true
  script: make publish
release:
  stage: deploy
  needs:
    - job: package
      optional: true
  dependencies: [package]
  script: make release
`);
      expect(graph.getJob("publish").artifactSources).toEqual([{ job: "package", required: false }]);
      expect(graph.getJob("release").artifactSources).toEqual([{ job: "package", required: false }]);
    });

    it("requires dependencies to be listed in needs", () => {
      expect(() =>
        build(`
stages: [build, test]
compile:
  stage: build
  script: make
docs:
  stage: build
  script: make docs
unit:
  stage: test
  needs: [compile]
  dependencies: [docs]
  script: make test
`),
      ).toThrow("job 'unit' depends on 'docs', which is not listed in its needs");
    });

    it("requires dependencies from an earlier stage", () => {
      expect(() =>
        build(`
lint:
  script: make lint
unit:
  dependencies: [lint]
  script: make test
`),
      ).toThrow("job 'unit' depends on 'lint', which is not in a previous stage");
    });

    it("drops dependencies on excluded jobs", () => {
      const graph = build(`
stages: [build, test]
compile:
  stage: build
  script: make
  rules:
    - if: $NEVER_SET
unit:
  stage: test
  dependencies: [compile]
  script: make test
`);
      expect(graph.getJob("unit").artifactSources).toEqual([]);
    });
  });

  describe("rules", () => {
    const yaml = `
variables:
  LEVEL: global
  REGION: eu
unit:
  script: x
  variables:
    LEVEL: job
  rules:
    - if: $CI_PIPELINE_SOURCE == "push"
      variables:
        LEVEL: rule
deploy:
  stage: deploy
  script: x
  rules:
    - if: $CI_COMMIT_BRANCH == "main"
      when: manual
    - when: never
audit:
  script: x
  rules:
    - when: manual
      allow_failure: false
`;

    it("records each job's when and excludes the rest", () => {
      const graph = build(yaml);
      expect(graph.getJob("unit").when).toBe("on_success");
      expect(graph.getJob("deploy").when).toBe("manual");
      const feature = build(yaml, createPipelineContext({ source: "push", refName: "feature" }));
      expect(feature.excluded).toEqual(["deploy"]);
      expect(feature.jobs.has("deploy")).toBe(false);
    });

    it("layers variables global, then job, then rule", () => {
      expect(build(yaml).getJob("unit").variables).toEqual({ LEVEL: "rule", REGION: "eu" });
    });

    it("adds pipeline variables on top of the document's", () => {
      expect(build(yaml, push, { REGION: "us" }).getJob("deploy").variables).toEqual({
        LEVEL: "global",
        REGION: "us",
      });
    });

    it("lets manual jobs fail unless a rule says otherwise", () => {
      const graph = build(yaml);
      expect(graph.getJob("deploy").allowFailure).toEqual({ allowed: true, exitCodes: [] });
      expect(graph.getJob("audit").allowFailure).toEqual({ allowed: false, exitCodes: [] });
      expect(graph.getJob("unit").allowFailure).toEqual({ allowed: false, exitCodes: [] });
    });

    it("evaluates rules with job variables visible", () => {
      const graph = build(`
variables:
  RUN_E2E: "false"
e2e:
  script: x
  variables:
    RUN_E2E: "true"
  rules:
    - if: $RUN_E2E == "true"
`);
      expect(graph.jobs.has("e2e")).toBe(true);
    });
  });

  it("builds identical graphs from identical inputs", () => {
    const definition = loadDefinition(staged);
    const first = buildJobGraph(definition, push);
    const second = buildJobGraph(definition, push);
    expect(second.edges).toEqual(first.edges);
    expect([...second.jobs.entries()]).toEqual([...first.jobs.entries()]);
    expect(second.excluded).toEqual(first.excluded);
    expect(Object.isFrozen(first)).toBe(true);
  });
});

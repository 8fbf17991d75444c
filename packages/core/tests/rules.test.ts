import { describe, it, expect } from "vitest";
import { loadDefinition } from "../src/definition/index.js";
import type { JobTemplate } from "../src/model/job.js";
import { decideJob, evaluateRules, evaluateWorkflow, matchRule } from "../src/rules/index.js";
import { parseCondition } from "../src/conditions/index.js";
import { createPipelineContext, PipelineContext } from "../src/state/context.js";

function template(yaml: string, name: string): JobTemplate {
  const found = loadDefinition(yaml).jobs.get(name);
  if (!found) throw new Error(`no job ${name}`);
  return found;
}

const push = createPipelineContext({ source: "push", refName: "main" });
const schedule = createPipelineContext({ source: "schedule", refName: "main" });
const featurePush = createPipelineContext({ source: "push", refName: "feature/login" });

describe("Rule Evaluator", () => {
  describe("matchRule", () => {
    const rules = [
      { if: parseCondition('$CI_PIPELINE_SOURCE == "schedule"'), when: "never" as const },
      { if: parseCondition('$CI_COMMIT_BRANCH == "main"'), when: "manual" as const },
      { if: null, when: "on_success" as const },
    ];

    it("returns the first rule that matches", () => {
      expect(matchRule(rules, schedule)).toBe(rules[0]);
      expect(matchRule(rules, push)).toBe(rules[1]);
      expect(matchRule(rules, featurePush)).toBe(rules[2]);
    });

    it("ignores later matches once one rule matched", () => {
      // both the second and third rule hold for a push to main
      expect(evaluateRules(rules, push)).toBe("manual");
    });

    it("returns null when nothing matches", () => {
      expect(matchRule(rules.slice(0, 2), featurePush)).toBeNull();
    });
  });

  describe("evaluateRules", () => {
    it("excludes on when: never and on no match", () => {
      const rules = [{ if: parseCondition("$DEPLOY"), when: "always" as const }];
      expect(evaluateRules(rules, new PipelineContext({ DEPLOY: "1" }))).toBe("always");
      expect(evaluateRules(rules, new PipelineContext({}))).toBe("excluded");
      expect(evaluateRules([{ if: null, when: "never" }], push)).toBe("excluded");
    });

    it("excludes a job with an empty rule list", () => {
      expect(evaluateRules([], push)).toBe("excluded");
    });
  });

  describe("decideJob", () => {
    const yaml = `
unit:
  script: x
  rules:
    - if: $CI_PIPELINE_SOURCE == "schedule"
      when: never
    - if: $CI_PIPELINE_SOURCE == "push"
      variables:
        SUITE: quick
nightly:
  script: x
  rules:
    - if: $CI_PIPELINE_SOURCE == "schedule"
cleanup:
  script: x
  when: always
disabled:
  script: x
  when: never
`;

    it("runs the scheduled-versus-push scenario", () => {
      const unit = template(yaml, "unit");
      const nightly = template(yaml, "nightly");
      expect(decideJob(unit, push).action).toBe("on_success");
      expect(decideJob(unit, schedule).action).toBe("excluded");
      expect(decideJob(nightly, push).action).toBe("excluded");
      expect(decideJob(nightly, schedule).action).toBe("on_success");
    });

    it("returns the matching rule with its variables", () => {
      const decision = decideJob(template(yaml, "unit"), push);
      expect(decision.rule?.variables).toEqual({ SUITE: "quick" });
    });

    it("falls back to the job's own when without rules", () => {
      expect(decideJob(template(yaml, "cleanup"), push)).toEqual({ action: "always", rule: null });
      expect(decideJob(template(yaml, "disabled"), push)).toEqual({ action: "excluded", rule: null });
    });

    it("is a pure function of template and variables", () => {
      const unit = template(yaml, "unit");
      expect(decideJob(unit, push)).toEqual(decideJob(unit, push));
    });
  });

  describe("evaluateWorkflow", () => {
    const workflow = loadDefinition(`
workflow:
  rules:
    - if: $CI_COMMIT_TAG
      variables:
        RELEASE: "true"
    - if: $CI_COMMIT_BRANCH == $CI_DEFAULT_BRANCH
    - when: never
unit:
  script: x
`).workflow;

    it("creates a pipeline on the first matching always rule", () => {
      const tagged = createPipelineContext({ source: "push", refName: "main", tag: "v1.0.0" });
      expect(evaluateWorkflow(workflow, tagged)).toEqual({ created: true, variables: { RELEASE: "true" } });
      expect(evaluateWorkflow(workflow, push)).toEqual({ created: true, variables: {} });
    });

    it("does not create one when a never rule matches", () => {
      expect(evaluateWorkflow(workflow, featurePush)).toEqual({ created: false, variables: {} });
    });

    it("always creates a pipeline without workflow rules", () => {
      expect(evaluateWorkflow({ name: null, rules: null }, featurePush)).toEqual({ created: true, variables: {} });
    });
  });
});

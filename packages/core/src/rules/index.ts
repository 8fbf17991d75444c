import { evaluateCondition, type VariableSource } from "../conditions/evaluate.js";
import type { JobRule, JobTemplate, Workflow } from "../model/job.js";
import type { RuleAction, WhenAction } from "../model/types.js";

export interface Rule {
  readonly if: JobRule["if"];
  readonly when: WhenAction;
}

/** First rule whose condition holds (a rule without `if` always holds), or null */
export function matchRule<R extends Rule>(rules: readonly R[], vars: VariableSource): R | null {
  for (const rule of rules) {
    if (rule.if === null || evaluateCondition(rule.if, vars)) return rule;
  }
  return null;
}

/**
 * Action of the first matching rule. `when: never` and no match both mean
 * the job is excluded from the pipeline.
 */
export function evaluateRules(rules: readonly Rule[], vars: VariableSource): RuleAction {
  const rule = matchRule(rules, vars);
  if (rule === null || rule.when === "never") return "excluded";
  return rule.when;
}

export interface JobDecision {
  action: RuleAction;
  /** The matching rule, when the job has rules and one matched */
  rule: JobRule | null;
}

/** Decide a job: rules when present, otherwise its own `when` */
export function decideJob(template: JobTemplate, vars: VariableSource): JobDecision {
  if (template.rules === null) {
    return { action: template.when === "never" ? "excluded" : template.when, rule: null };
  }
  const rule = matchRule(template.rules, vars);
  if (rule === null || rule.when === "never") return { action: "excluded", rule };
  return { action: rule.when, rule };
}

export interface WorkflowDecision {
  created: boolean;
  /** Variables added by the matching workflow rule */
  variables: Record<string, string>;
}

/** Decide whether a pipeline is created at all */
export function evaluateWorkflow(workflow: Workflow, vars: VariableSource): WorkflowDecision {
  if (workflow.rules === null) return { created: true, variables: {} };
  const rule = matchRule(workflow.rules, vars);
  if (rule === null || rule.when === "never") return { created: false, variables: {} };
  return { created: true, variables: { ...rule.variables } };
}

import { ConfigurationError } from "../errors.js";
import type { JobTemplate, PipelineDefinition } from "../model/job.js";
import { POST_STAGE, PRE_STAGE } from "../model/types.js";

export enum Severity {
  ERROR = "error",
  WARNING = "warning",
  INFO = "info",
}

export interface Diagnostic {
  rule: string;
  severity: Severity;
  message: string;
  job?: string;
  fix?: string;
}

export interface LintRule {
  name: string;
  apply(definition: PipelineDefinition): Diagnostic[];
}

function stageOf(definition: PipelineDefinition, job: string): number {
  const template = definition.jobs.get(job);
  return template ? definition.stages.indexOf(template.stage) : -1;
}

function jobs(definition: PipelineDefinition): JobTemplate[] {
  return [...definition.jobs.values()];
}

// ── ERROR rules ──

const needsTargetExistsRule: LintRule = {
  name: "needs_target_exists",
  apply(definition) {
    const diags: Diagnostic[] = [];
    for (const job of jobs(definition)) {
      for (const need of job.needs ?? []) {
        if (!need.optional && !definition.jobs.has(need.job)) {
          diags.push({
            rule: "needs_target_exists",
            severity: Severity.ERROR,
            message: `Job '${job.name}' needs unknown job '${need.job}'`,
            job: job.name,
            fix: `Define '${need.job}' or mark the need as optional: true`,
          });
        }
      }
    }
    return diags;
  },
};

const needsSelfRule: LintRule = {
  name: "needs_self",
  apply(definition) {
    return jobs(definition)
      .filter((job) => job.needs?.some((n) => n.job === job.name))
      .map((job) => ({
        rule: "needs_self",
        severity: Severity.ERROR,
        message: `Job '${job.name}' needs itself`,
        job: job.name,
      }));
  },
};

const needsStageOrderRule: LintRule = {
  name: "needs_stage_order",
  apply(definition) {
    const diags: Diagnostic[] = [];
    for (const job of jobs(definition)) {
      const own = definition.stages.indexOf(job.stage);
      for (const need of job.needs ?? []) {
        if (stageOf(definition, need.job) > own) {
          diags.push({
            rule: "needs_stage_order",
            severity: Severity.ERROR,
            message: `Job '${job.name}' (stage ${job.stage}) needs '${need.job}' from a later stage`,
            job: job.name,
          });
        }
      }
    }
    return diags;
  },
};

const dependenciesTargetExistsRule: LintRule = {
  name: "dependencies_target_exists",
  apply(definition) {
    const diags: Diagnostic[] = [];
    for (const job of jobs(definition)) {
      for (const dep of job.dependencies ?? []) {
        if (!definition.jobs.has(dep)) {
          diags.push({
            rule: "dependencies_target_exists",
            severity: Severity.ERROR,
            message: `Job '${job.name}' depends on unknown job '${dep}'`,
            job: job.name,
          });
        }
      }
    }
    return diags;
  },
};

const dependenciesStageOrderRule: LintRule = {
  name: "dependencies_stage_order",
  apply(definition) {
    const diags: Diagnostic[] = [];
    for (const job of jobs(definition)) {
      const own = definition.stages.indexOf(job.stage);
      for (const dep of job.dependencies ?? []) {
        const inNeeds = job.needs?.some((n) => n.job === dep) ?? false;
        if (definition.jobs.has(dep) && !inNeeds && stageOf(definition, dep) >= own) {
          diags.push({
            rule: "dependencies_stage_order",
            severity: Severity.ERROR,
            message: `Job '${job.name}' depends on '${dep}', which is not in a previous stage`,
            job: job.name,
          });
        }
      }
    }
    return diags;
  },
};

const dependenciesWithinNeedsRule: LintRule = {
  name: "dependencies_within_needs",
  apply(definition) {
    const diags: Diagnostic[] = [];
    for (const job of jobs(definition)) {
      if (job.needs === null || job.dependencies === null) continue;
      const needs = job.needs;
      for (const dep of job.dependencies) {
        if (!needs.some((n) => n.job === dep)) {
          diags.push({
            rule: "dependencies_within_needs",
            severity: Severity.ERROR,
            message: `Job '${job.name}' depends on '${dep}', which is not listed in its needs`,
            job: job.name,
            fix: `Add '${dep}' to needs`,
          });
        }
      }
    }
    return diags;
  },
};

// ── WARNING rules ──

const unreachableRuleRule: LintRule = {
  name: "unreachable_rule",
  apply(definition) {
    const diags: Diagnostic[] = [];
    for (const job of jobs(definition)) {
      const rules = job.rules ?? [];
      const catchAll = rules.findIndex((r) => r.if === null);
      if (catchAll >= 0 && catchAll < rules.length - 1) {
        diags.push({
          rule: "unreachable_rule",
          severity: Severity.WARNING,
          message: `Job '${job.name}': rules after rule #${catchAll + 1} can never match (it has no 'if')`,
          job: job.name,
        });
      }
    }
    return diags;
  },
};

const unknownKeywordRule: LintRule = {
  name: "unknown_keyword",
  apply(definition) {
    return jobs(definition)
      .filter((job) => job.unknownKeys.length > 0)
      .map((job) => ({
        rule: "unknown_keyword",
        severity: Severity.WARNING,
        message: `Job '${job.name}' uses unsupported keyword(s): ${job.unknownKeys.join(", ")}`,
        job: job.name,
      }));
  },
};

const includeUnsupportedRule: LintRule = {
  name: "include_unsupported",
  apply(definition) {
    return definition.warnings.map((warning) => ({
      rule: "include_unsupported",
      severity: Severity.WARNING,
      message: warning,
    }));
  },
};

// ── INFO rules ──

const emptyStageRule: LintRule = {
  name: "empty_stage",
  apply(definition) {
    return definition.stages
      .filter((stage) => stage !== PRE_STAGE && stage !== POST_STAGE)
      .filter((stage) => !jobs(definition).some((j) => j.stage === stage))
      .map((stage) => ({
        rule: "empty_stage",
        severity: Severity.INFO,
        message: `Stage '${stage}' has no jobs`,
      }));
  },
};

export const BUILT_IN_RULES: LintRule[] = [
  needsTargetExistsRule,
  needsSelfRule,
  needsStageOrderRule,
  dependenciesTargetExistsRule,
  dependenciesStageOrderRule,
  dependenciesWithinNeedsRule,
  unreachableRuleRule,
  unknownKeywordRule,
  includeUnsupportedRule,
  emptyStageRule,
];

/** Run all lint rules over a pipeline definition */
export function validate(
  definition: PipelineDefinition,
  extraRules?: LintRule[],
): Diagnostic[] {
  const rules = extraRules ? [...BUILT_IN_RULES, ...extraRules] : BUILT_IN_RULES;
  const diagnostics: Diagnostic[] = [];
  for (const rule of rules) {
    diagnostics.push(...rule.apply(definition));
  }
  return diagnostics;
}

export class ValidationError extends ConfigurationError {
  constructor(
    message: string,
    public diagnostics: Diagnostic[],
  ) {
    super(message);
    this.name = "ValidationError";
  }
}

/** Validate a definition; throw if any ERROR-level diagnostics */
export function validateOrRaise(
  definition: PipelineDefinition,
  extraRules?: LintRule[],
): Diagnostic[] {
  const diagnostics = validate(definition, extraRules);
  const errors = diagnostics.filter((d) => d.severity === Severity.ERROR);
  if (errors.length > 0) {
    const messages = errors.map((e) => `[${e.rule}] ${e.message}`).join("\n");
    throw new ValidationError(
      `Pipeline validation failed with ${errors.length} error(s):\n${messages}`,
      errors,
    );
  }
  return diagnostics;
}

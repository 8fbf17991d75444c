import type { ConditionExpr, Operand, ParsedCondition } from "./ast.js";
import { parseCondition } from "./parser.js";

/** Anything that can answer variable lookups (PipelineContext satisfies this) */
export interface VariableSource {
  get(name: string): string | undefined;
}

const SLASHED_PATTERN = /^\/(.*)\/([a-z]*)$/s;

function operandValue(operand: Operand, vars: VariableSource): string | null {
  switch (operand.kind) {
    case "variable":
      return vars.get(operand.name) ?? null;
    case "string":
      return operand.value;
    case "null":
      return null;
    case "regex":
      return `/${operand.pattern}/${operand.flags}`;
  }
}

/** Build the pattern for the right side of =~ / !~; null when it cannot compile */
function operandPattern(operand: Operand, vars: VariableSource): RegExp | null {
  if (operand.kind === "regex") return new RegExp(operand.pattern, operand.flags);

  const raw = operandValue(operand, vars);
  if (raw === null) return null;
  const slashed = SLASHED_PATTERN.exec(raw);
  try {
    return slashed ? new RegExp(slashed[1], slashed[2]) : new RegExp(raw);
  } catch {
    return null;
  }
}

function matches(operand: Operand, pattern: Operand, vars: VariableSource): boolean {
  const value = operandValue(operand, vars);
  if (value === null) return false;
  const regex = operandPattern(pattern, vars);
  return regex !== null && regex.test(value);
}

function evaluateExpr(expr: ConditionExpr, vars: VariableSource): boolean {
  switch (expr.kind) {
    case "truthy": {
      const value = operandValue(expr.operand, vars);
      return value !== null && value !== "";
    }
    case "not":
      return !evaluateExpr(expr.expr, vars);
    case "and":
      return evaluateExpr(expr.left, vars) && evaluateExpr(expr.right, vars);
    case "or":
      return evaluateExpr(expr.left, vars) || evaluateExpr(expr.right, vars);
    case "compare":
      switch (expr.operator) {
        case "==":
          return operandValue(expr.left, vars) === operandValue(expr.right, vars);
        case "!=":
          return operandValue(expr.left, vars) !== operandValue(expr.right, vars);
        case "=~":
          return matches(expr.left, expr.right, vars);
        case "!~":
          return !matches(expr.left, expr.right, vars);
      }
  }
}

/**
 * Evaluate a parsed (or raw) condition against a variable source.
 * Pure: the same condition and variables always give the same answer.
 */
export function evaluateCondition(
  condition: ParsedCondition | string,
  vars: VariableSource,
): boolean {
  const parsed = typeof condition === "string" ? parseCondition(condition) : condition;
  return evaluateExpr(parsed.expr, vars);
}

/**
 * Validate that a condition string parses without error.
 * Returns null if valid, error message if invalid.
 */
export function validateConditionSyntax(condition: string): string | null {
  try {
    parseCondition(condition);
    return null;
  } catch (err) {
    return err instanceof Error ? err.message : String(err);
  }
}

/** Variable names referenced anywhere in a condition */
export function referencedVariables(condition: ParsedCondition): string[] {
  const names = new Set<string>();
  const visitOperand = (operand: Operand) => {
    if (operand.kind === "variable") names.add(operand.name);
  };
  const visit = (expr: ConditionExpr): void => {
    switch (expr.kind) {
      case "truthy":
        visitOperand(expr.operand);
        break;
      case "compare":
        visitOperand(expr.left);
        visitOperand(expr.right);
        break;
      case "not":
        visit(expr.expr);
        break;
      case "and":
      case "or":
        visit(expr.left);
        visit(expr.right);
        break;
    }
  };
  visit(condition.expr);
  return [...names];
}

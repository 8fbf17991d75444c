/** Value position in a rule expression */
export type Operand =
  | { kind: "variable"; name: string }
  | { kind: "string"; value: string }
  | { kind: "regex"; pattern: string; flags: string }
  | { kind: "null" };

export type CompareOperator = "==" | "!=" | "=~" | "!~";

/** Boolean expression tree evaluated against a pipeline context */
export type ConditionExpr =
  | { kind: "truthy"; operand: Operand }
  | { kind: "compare"; operator: CompareOperator; left: Operand; right: Operand }
  | { kind: "not"; expr: ConditionExpr }
  | { kind: "and"; left: ConditionExpr; right: ConditionExpr }
  | { kind: "or"; left: ConditionExpr; right: ConditionExpr };

export interface ParsedCondition {
  source: string;
  expr: ConditionExpr;
}

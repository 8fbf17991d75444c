export type { Operand, CompareOperator, ConditionExpr, ParsedCondition } from "./ast.js";
export { Lexer, TokenType, ConditionSyntaxError } from "./lexer.js";
export type { Token } from "./lexer.js";
export { Parser, parseCondition } from "./parser.js";
export {
  evaluateCondition,
  validateConditionSyntax,
  referencedVariables,
} from "./evaluate.js";
export type { VariableSource } from "./evaluate.js";

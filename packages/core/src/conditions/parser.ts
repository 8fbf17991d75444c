import type { CompareOperator, ConditionExpr, Operand, ParsedCondition } from "./ast.js";
import { ConditionSyntaxError, Lexer, type Token, TokenType } from "./lexer.js";

const COMPARE_OPERATORS = new Map<TokenType, CompareOperator>([
  [TokenType.Equals, "=="],
  [TokenType.NotEquals, "!="],
  [TokenType.Matches, "=~"],
  [TokenType.NotMatches, "!~"],
]);

/**
 * Recursive-descent parser for rule expressions.
 *
 *   Expression = AndExpr ( '||' AndExpr )*
 *   AndExpr    = Unary ( '&&' Unary )*
 *   Unary      = '!' Unary | Primary
 *   Primary    = '(' Expression ')' | Operand ( CompareOp Operand )?
 */
export class Parser {
  private tokens: Token[] = [];
  private pos = 0;

  parse(source: string): ParsedCondition {
    this.tokens = new Lexer(source).tokenize();
    this.pos = 0;

    if (this.check(TokenType.EOF)) {
      throw new ConditionSyntaxError("Empty expression", 1);
    }
    const expr = this.parseOr();
    if (!this.check(TokenType.EOF)) {
      const tok = this.current();
      throw new ConditionSyntaxError(`Unexpected token '${tok.value}'`, tok.column);
    }
    return { source, expr };
  }

  private parseOr(): ConditionExpr {
    let left = this.parseAnd();
    while (this.check(TokenType.Or)) {
      this.advance();
      left = { kind: "or", left, right: this.parseAnd() };
    }
    return left;
  }

  private parseAnd(): ConditionExpr {
    let left = this.parseUnary();
    while (this.check(TokenType.And)) {
      this.advance();
      left = { kind: "and", left, right: this.parseUnary() };
    }
    return left;
  }

  private parseUnary(): ConditionExpr {
    if (this.check(TokenType.Not)) {
      this.advance();
      return { kind: "not", expr: this.parseUnary() };
    }
    return this.parsePrimary();
  }

  private parsePrimary(): ConditionExpr {
    if (this.check(TokenType.LParen)) {
      const open = this.advance();
      const expr = this.parseOr();
      if (!this.check(TokenType.RParen)) {
        throw new ConditionSyntaxError("Expected ')'", open.column);
      }
      this.advance();
      return expr;
    }

    const leftTok = this.current();
    const left = this.parseOperand();
    const operator = COMPARE_OPERATORS.get(this.current().type);

    if (operator === undefined) {
      if (left.kind === "regex") {
        throw new ConditionSyntaxError("A regex must follow '=~' or '!~'", leftTok.column);
      }
      return { kind: "truthy", operand: left };
    }

    const opTok = this.advance();
    const rightTok = this.current();
    const right = this.parseOperand();

    if (left.kind === "regex") {
      throw new ConditionSyntaxError("A regex must be on the right of the operator", leftTok.column);
    }
    if (right.kind === "regex" && (operator === "==" || operator === "!=")) {
      throw new ConditionSyntaxError(
        `Regex cannot be compared with '${opTok.value}'; use '=~' or '!~'`,
        rightTok.column,
      );
    }
    if (right.kind === "null" && (operator === "=~" || operator === "!~")) {
      throw new ConditionSyntaxError(`'${opTok.value}' requires a pattern`, rightTok.column);
    }

    return { kind: "compare", operator, left, right };
  }

  private parseOperand(): Operand {
    const tok = this.current();
    switch (tok.type) {
      case TokenType.Variable:
        this.advance();
        return { kind: "variable", name: tok.value };
      case TokenType.String:
        this.advance();
        return { kind: "string", value: tok.value };
      case TokenType.Null:
        this.advance();
        return { kind: "null" };
      case TokenType.Regex: {
        this.advance();
        const flags = tok.flags ?? "";
        try {
          new RegExp(tok.value, flags);
        } catch {
          throw new ConditionSyntaxError(`Invalid regex /${tok.value}/${flags}`, tok.column);
        }
        return { kind: "regex", pattern: tok.value, flags };
      }
      case TokenType.EOF:
        throw new ConditionSyntaxError("Unexpected end of expression", tok.column);
      default:
        throw new ConditionSyntaxError(`Unexpected token '${tok.value}'`, tok.column);
    }
  }

  private current(): Token {
    // tokenize() always ends with EOF
    return this.tokens[Math.min(this.pos, this.tokens.length - 1)];
  }

  private check(type: TokenType): boolean {
    return this.current().type === type;
  }

  private advance(): Token {
    const tok = this.current();
    if (this.pos < this.tokens.length - 1) this.pos++;
    return tok;
  }
}

export function parseCondition(source: string): ParsedCondition {
  return new Parser().parse(source);
}

export enum TokenType {
  Variable = "variable",
  String = "string",
  Regex = "regex",
  Null = "null",

  Equals = "==",
  NotEquals = "!=",
  Matches = "=~",
  NotMatches = "!~",
  And = "&&",
  Or = "||",
  Not = "!",
  LParen = "(",
  RParen = ")",

  EOF = "eof",
}

export interface Token {
  type: TokenType;
  value: string;
  /** Regex flags, only set on Regex tokens */
  flags?: string;
  column: number;
}

export class ConditionSyntaxError extends Error {
  constructor(
    message: string,
    public column: number,
  ) {
    super(`${message} at column ${column}`);
    this.name = "ConditionSyntaxError";
  }
}

const REGEX_FLAGS = new Set(["i", "m", "s"]);

export class Lexer {
  private pos = 0;
  private tokens: Token[] = [];

  constructor(private source: string) {}

  tokenize(): Token[] {
    this.tokens = [];
    this.pos = 0;

    while (this.pos < this.source.length) {
      this.skipWhitespace();
      if (this.pos >= this.source.length) break;

      const ch = this.source[this.pos];
      const next = this.source[this.pos + 1];
      const column = this.pos + 1;

      if (ch === "$") {
        this.tokens.push(this.readVariable());
      } else if (ch === '"' || ch === "'") {
        this.tokens.push(this.readString(ch));
      } else if (ch === "/") {
        this.tokens.push(this.readRegex());
      } else if (ch === "=" && next === "=") {
        this.push(TokenType.Equals, column, 2);
      } else if (ch === "=" && next === "~") {
        this.push(TokenType.Matches, column, 2);
      } else if (ch === "!" && next === "=") {
        this.push(TokenType.NotEquals, column, 2);
      } else if (ch === "!" && next === "~") {
        this.push(TokenType.NotMatches, column, 2);
      } else if (ch === "&" && next === "&") {
        this.push(TokenType.And, column, 2);
      } else if (ch === "|" && next === "|") {
        this.push(TokenType.Or, column, 2);
      } else if (ch === "!") {
        this.push(TokenType.Not, column, 1);
      } else if (ch === "(") {
        this.push(TokenType.LParen, column, 1);
      } else if (ch === ")") {
        this.push(TokenType.RParen, column, 1);
      } else if (this.source.startsWith("null", this.pos) && !this.isIdentChar(this.source[this.pos + 4])) {
        this.push(TokenType.Null, column, 4);
      } else {
        throw new ConditionSyntaxError(`Unexpected character '${ch}'`, column);
      }
    }

    this.tokens.push({ type: TokenType.EOF, value: "", column: this.source.length + 1 });
    return this.tokens;
  }

  private push(type: TokenType, column: number, length: number): void {
    this.tokens.push({ type, value: this.source.slice(this.pos, this.pos + length), column });
    this.pos += length;
  }

  private readVariable(): Token {
    const column = this.pos + 1;
    this.pos++; // skip $
    const braced = this.source[this.pos] === "{";
    if (braced) this.pos++;

    let name = "";
    while (this.pos < this.source.length && this.isIdentChar(this.source[this.pos])) {
      name += this.source[this.pos];
      this.pos++;
    }
    if (!name) throw new ConditionSyntaxError("Expected variable name after '$'", column);

    if (braced) {
      if (this.source[this.pos] !== "}") {
        throw new ConditionSyntaxError(`Unterminated variable '\${${name}'`, column);
      }
      this.pos++;
    }
    return { type: TokenType.Variable, value: name, column };
  }

  private readString(quote: string): Token {
    const column = this.pos + 1;
    this.pos++; // skip opening quote
    let value = "";
    while (this.pos < this.source.length) {
      const ch = this.source[this.pos];
      if (ch === "\\" && this.pos + 1 < this.source.length) {
        value += this.source[this.pos + 1];
        this.pos += 2;
        continue;
      }
      if (ch === quote) {
        this.pos++;
        return { type: TokenType.String, value, column };
      }
      value += ch;
      this.pos++;
    }
    throw new ConditionSyntaxError("Unterminated string", column);
  }

  private readRegex(): Token {
    const column = this.pos + 1;
    this.pos++; // skip opening slash
    let pattern = "";
    while (this.pos < this.source.length) {
      const ch = this.source[this.pos];
      if (ch === "\\" && this.pos + 1 < this.source.length) {
        const escaped = this.source[this.pos + 1];
        // `\/` is the slash itself; every other escape stays for the regex engine
        pattern += escaped === "/" ? "/" : `\\${escaped}`;
        this.pos += 2;
        continue;
      }
      if (ch === "/") {
        this.pos++;
        let flags = "";
        while (this.pos < this.source.length && /[a-z]/i.test(this.source[this.pos] ?? "")) {
          const flag = this.source[this.pos] ?? "";
          if (!REGEX_FLAGS.has(flag)) {
            throw new ConditionSyntaxError(`Unsupported regex flag '${flag}'`, this.pos + 1);
          }
          flags += flag;
          this.pos++;
        }
        return { type: TokenType.Regex, value: pattern, flags, column };
      }
      pattern += ch;
      this.pos++;
    }
    throw new ConditionSyntaxError("Unterminated regex", column);
  }

  private skipWhitespace(): void {
    while (this.pos < this.source.length && /\s/.test(this.source[this.pos] ?? "")) {
      this.pos++;
    }
  }

  private isIdentChar(ch: string | undefined): boolean {
    return ch !== undefined && /[A-Za-z0-9_]/.test(ch);
  }
}

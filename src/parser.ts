import type { Expr, Stmt } from "./ast.js";
import { type ErrorReporter, type ParseFailure, reportAt } from "./errors.js";
import { type Err, fail, ok, type Result } from "./result.js";
import { type Token, TokenType } from "./token.js";

type Parsed<T> = Result<T, ParseFailure>;

// tokens that can open a statement; recovery stops in front of them
const statementStarts: ReadonlySet<TokenType> = new Set([
  TokenType.CLASS,
  TokenType.FUN,
  TokenType.VAR,
  TokenType.FOR,
  TokenType.IF,
  TokenType.WHILE,
  TokenType.PRINT,
  TokenType.RETURN,
]);

// nesting past this is reported instead of exhausting the call stack
const MAX_NESTING = 256;

/**Parser */
export class Parser {
  private pos = 0;
  private depth = 0;

  constructor(private tokens: Token[], private reporter: ErrorReporter) {}

  /** Parses every declaration; broken ones are reported and left out. */
  public parse = (): Stmt[] => {
    const statements: Stmt[] = [];
    while (!this.atEnd()) {
      const stmt = this.declaration();
      if (stmt) statements.push(stmt);
    }
    return statements;
  };

  private declaration = (): Stmt | undefined => {
    const result = this.match(TokenType.VAR)
      ? this.varDeclaration()
      : this.statement();
    if (result.t === "err") {
      this.synchronize();
      return undefined;
    }
    return result.v;
  };

  private varDeclaration = (): Parsed<Stmt> => {
    const name = this.consume(TokenType.IDENTIFIER, "Expect variable name.");
    if (name.t === "err") return name;

    let initializer: Expr | undefined;
    if (this.match(TokenType.EQUAL)) {
      const value = this.expression();
      if (value.t === "err") return value;
      initializer = value.v;
    }

    const semi = this.consume(
      TokenType.SEMICOLON,
      "Expect ';' after variable declaration.",
    );
    if (semi.t === "err") return semi;
    return ok(
      initializer
        ? { type: "Var", name: name.v, initializer }
        : { type: "Var", name: name.v },
    );
  };

  private statement = (): Parsed<Stmt> => this.nested(this.simpleStatement);

  private simpleStatement = (): Parsed<Stmt> => {
    if (this.match(TokenType.PRINT)) return this.printStatement();
    if (this.match(TokenType.IF)) return this.ifStatement();
    if (this.match(TokenType.WHILE)) return this.whileStatement();
    if (this.match(TokenType.FOR)) return this.forStatement();
    if (this.match(TokenType.LEFT_BRACE)) {
      const body = this.block();
      if (body.t === "err") return body;
      return ok({ type: "Block", body: body.v });
    }
    return this.expressionStatement();
  };

  private printStatement = (): Parsed<Stmt> => {
    const expr = this.expression();
    if (expr.t === "err") return expr;
    const semi = this.consume(
      TokenType.SEMICOLON,
      "Expect ';' after expression.",
    );
    if (semi.t === "err") return semi;
    return ok({ type: "Print", expr: expr.v });
  };

  private expressionStatement = (): Parsed<Stmt> => {
    const expr = this.expression();
    if (expr.t === "err") return expr;
    const semi = this.consume(
      TokenType.SEMICOLON,
      "Expect ';' after expression.",
    );
    if (semi.t === "err") return semi;
    return ok({ type: "Expression", expr: expr.v });
  };

  private block = (): Parsed<Stmt[]> => {
    const statements: Stmt[] = [];
    while (!this.check(TokenType.RIGHT_BRACE) && !this.atEnd()) {
      const stmt = this.declaration();
      if (stmt) statements.push(stmt);
    }

    const close = this.consume(
      TokenType.RIGHT_BRACE,
      "Expected '}' after a code block.",
    );
    if (close.t === "err") return close;
    return ok(statements);
  };

  private condition = (after: string, closing: string): Parsed<Expr> => {
    const open = this.consume(
      TokenType.LEFT_PAREN,
      `Expect '(' after '${after}'.`,
    );
    if (open.t === "err") return open;
    const cond = this.expression();
    if (cond.t === "err") return cond;
    const close = this.consume(TokenType.RIGHT_PAREN, closing);
    if (close.t === "err") return close;
    return cond;
  };

  private ifStatement = (): Parsed<Stmt> => {
    const cond = this.condition("if", "Expect ')' after if condition.");
    if (cond.t === "err") return cond;

    const body = this.statement();
    if (body.t === "err") return body;

    // a dangling else binds to the nearest if
    if (this.match(TokenType.ELSE)) {
      const elseBody = this.statement();
      if (elseBody.t === "err") return elseBody;
      return ok({ type: "If", cond: cond.v, body: body.v, else: elseBody.v });
    }
    return ok({ type: "If", cond: cond.v, body: body.v });
  };

  private whileStatement = (): Parsed<Stmt> => {
    const cond = this.condition("while", "Expect ')' after condition.");
    if (cond.t === "err") return cond;
    const body = this.statement();
    if (body.t === "err") return body;
    return ok({ type: "While", cond: cond.v, body: body.v });
  };

  /** `for` has no node of its own: it becomes a while loop inside a block. */
  private forStatement = (): Parsed<Stmt> => {
    const open = this.consume(
      TokenType.LEFT_PAREN,
      "Expect '(' after 'for'.",
    );
    if (open.t === "err") return open;

    let init: Stmt | undefined;
    if (!this.match(TokenType.SEMICOLON)) {
      const parsed = this.match(TokenType.VAR)
        ? this.varDeclaration()
        : this.expressionStatement();
      if (parsed.t === "err") return parsed;
      init = parsed.v;
    }

    let cond: Expr = { type: "Literal", value: true };
    if (!this.check(TokenType.SEMICOLON)) {
      const parsed = this.expression();
      if (parsed.t === "err") return parsed;
      cond = parsed.v;
    }
    const semi = this.consume(
      TokenType.SEMICOLON,
      "Expect ';' after loop condition.",
    );
    if (semi.t === "err") return semi;

    let increment: Expr | undefined;
    if (!this.check(TokenType.RIGHT_PAREN)) {
      const parsed = this.expression();
      if (parsed.t === "err") return parsed;
      increment = parsed.v;
    }
    const close = this.consume(
      TokenType.RIGHT_PAREN,
      "Expect ')' after for clauses.",
    );
    if (close.t === "err") return close;

    const body = this.statement();
    if (body.t === "err") return body;

    let loop: Stmt = body.v;
    if (increment) {
      loop = {
        type: "Block",
        body: [loop, { type: "Expression", expr: increment }],
      };
    }
    loop = { type: "While", cond, body: loop };
    if (init) loop = { type: "Block", body: [init, loop] };
    return ok(loop);
  };

  private expression = (): Parsed<Expr> => this.assignment();

  private assignment = (): Parsed<Expr> => this.nested(this.assignOrValue);

  private assignOrValue = (): Parsed<Expr> => {
    const target = this.or();
    if (target.t === "err") return target;

    if (this.match(TokenType.EQUAL)) {
      const equals = this.previous();
      const value = this.assignment();
      if (value.t === "err") return value;

      if (target.v.type === "Variable") {
        return ok({ type: "Assign", name: target.v.name, value: value.v });
      }
      // reported, but the surrounding statement still parses
      reportAt(this.reporter, equals, "Invalid assignment target.");
    }
    return target;
  };

  private or = (): Parsed<Expr> =>
    this.leftAssoc("Logical", this.and, TokenType.OR);

  private and = (): Parsed<Expr> =>
    this.leftAssoc("Logical", this.equality, TokenType.AND);

  private equality = (): Parsed<Expr> =>
    this.leftAssoc(
      "Binary",
      this.comparison,
      TokenType.BANG_EQUAL,
      TokenType.EQUAL_EQUAL,
    );

  private comparison = (): Parsed<Expr> =>
    this.leftAssoc(
      "Binary",
      this.additive,
      TokenType.GREATER,
      TokenType.GREATER_EQUAL,
      TokenType.LESS,
      TokenType.LESS_EQUAL,
    );

  private additive = (): Parsed<Expr> =>
    this.leftAssoc("Binary", this.term, TokenType.MINUS, TokenType.PLUS);

  private term = (): Parsed<Expr> =>
    this.leftAssoc("Binary", this.unary, TokenType.SLASH, TokenType.STAR);

  private leftAssoc = (
    type: "Binary" | "Logical",
    operand: () => Parsed<Expr>,
    ...ops: TokenType[]
  ): Parsed<Expr> => {
    const first = operand();
    if (first.t === "err") return first;

    let left = first.v;
    while (this.match(...ops)) {
      const op = this.previous();
      const right = operand();
      if (right.t === "err") return right;
      left = { type, left, op, right: right.v };
    }
    return ok(left);
  };

  private unary = (): Parsed<Expr> => {
    if (this.match(TokenType.BANG, TokenType.MINUS)) {
      const op = this.previous();
      const argument = this.nested(this.unary);
      if (argument.t === "err") return argument;
      return ok({ type: "Unary", op, argument: argument.v });
    }
    return this.primary();
  };

  private primary = (): Parsed<Expr> => {
    if (this.match(TokenType.FALSE)) {
      return ok({ type: "Literal", value: false });
    }
    if (this.match(TokenType.TRUE)) {
      return ok({ type: "Literal", value: true });
    }
    if (this.match(TokenType.NIL)) {
      return ok({ type: "Literal", value: null });
    }

    if (this.match(TokenType.NUMBER, TokenType.STRING)) {
      return ok({ type: "Literal", value: this.previous().literal ?? null });
    }

    if (this.match(TokenType.IDENTIFIER)) {
      return ok({ type: "Variable", name: this.previous() });
    }

    if (this.match(TokenType.LEFT_PAREN)) {
      const inner = this.expression();
      if (inner.t === "err") return inner;
      const close = this.consume(
        TokenType.RIGHT_PAREN,
        "Expect ')' after expression.",
      );
      if (close.t === "err") return close;
      return ok({ type: "Grouping", inner: inner.v });
    }

    return this.error(this.peek(), "Expect expression.");
  };

  private nested = <T>(parse: () => Parsed<T>): Parsed<T> => {
    if (this.depth >= MAX_NESTING) {
      return this.error(this.peek(), "Too much nesting.");
    }
    this.depth++;
    try {
      return parse();
    } finally {
      this.depth--;
    }
  };

  private peek = (): Token =>
    this.tokens[Math.min(this.pos, this.tokens.length - 1)];

  private previous = (): Token => this.tokens[this.pos - 1];

  private atEnd = (): boolean => this.peek().type === TokenType.EOF;

  private check = (type: TokenType): boolean =>
    !this.atEnd() && this.peek().type === type;

  private advance = (): Token => {
    if (!this.atEnd()) this.pos++;
    return this.previous();
  };

  private match = (...types: TokenType[]): boolean => {
    if (!types.some((type) => this.check(type))) return false;
    this.advance();
    return true;
  };

  private consume = (type: TokenType, message: string): Parsed<Token> =>
    this.check(type) ? ok(this.advance()) : this.error(this.peek(), message);

  private error = (token: Token, message: string): Err<ParseFailure> => {
    reportAt(this.reporter, token, message);
    return fail({ token, message });
  };

  /** Skips to the next statement boundary after a reported error. */
  private synchronize = (): void => {
    this.advance();
    while (!this.atEnd()) {
      if (this.previous().type === TokenType.SEMICOLON) return;
      if (statementStarts.has(this.peek().type)) return;
      this.advance();
    }
  };
}

export const parse = (tokens: Token[], reporter: ErrorReporter): Stmt[] =>
  new Parser(tokens, reporter).parse();

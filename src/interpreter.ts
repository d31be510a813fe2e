import {
  type Binary,
  type Expr,
  type Stmt,
  type Unary,
  UNASSIGNED,
  type Value,
} from "./ast.js";
import { Environment, type Scope } from "./environment.js";
import type { ErrorReporter, LineSink, RuntimeFailure } from "./errors.js";
import { fail, ok, type Result } from "./result.js";
import { type Token, TokenType } from "./token.js";

type Evaluated = Result<Value, RuntimeFailure>;
type Executed = Result<void, RuntimeFailure>;

const done: Executed = ok(undefined);

const failure = (token: Token, message: string) => fail({ token, message });

export const isTruthy = (value: Value): boolean =>
  value === null ? false : typeof value === "boolean" ? value : true;

export const isEqual = (a: Value, b: Value): boolean => {
  if (typeof a === "number" && typeof b === "number") {
    return a === b || (Number.isNaN(a) && Number.isNaN(b));
  }
  return a === b;
};

export const stringify = (value: Value): string => {
  if (value === null || value === UNASSIGNED) return "nil";
  if (typeof value === "number") {
    return Object.is(value, -0) ? "-0" : String(value);
  }
  return String(value);
};

/**Interpreter */
export class Interpreter {
  private scope: Scope;

  constructor(
    private reporter: ErrorReporter,
    private out: LineSink = (line) => process.stdout.write(`${line}\n`),
    public readonly environment: Environment = new Environment(),
  ) {
    this.scope = environment.global;
  }

  /** Runs `statements` in order, stopping at the first runtime error. */
  public interpret = (statements: readonly Stmt[]): Executed => {
    const result = this.executeAll(statements);
    if (result.t === "err") this.reporter.runtimeError(result.e);
    return result;
  };

  private executeAll = (statements: readonly Stmt[]): Executed => {
    for (const stmt of statements) {
      const result = this.execute(stmt);
      if (result.t === "err") return result;
    }
    return done;
  };

  private executeBlock = (statements: readonly Stmt[]): Executed => {
    const previous = this.scope;
    this.scope = this.environment.enterScope(previous);
    try {
      return this.executeAll(statements);
    } finally {
      this.environment.exitScope(this.scope);
      this.scope = previous;
    }
  };

  private execute = (stmt: Stmt): Executed => {
    switch (stmt.type) {
      case "Expression": {
        const value = this.eval(stmt.expr);
        return value.t === "err" ? value : done;
      }
      case "Print": {
        const value = this.eval(stmt.expr);
        if (value.t === "err") return value;
        this.out(stringify(value.v));
        return done;
      }
      case "Var": {
        let value: Value = UNASSIGNED;
        if (stmt.initializer) {
          const init = this.eval(stmt.initializer);
          if (init.t === "err") return init;
          value = init.v;
        }
        this.environment.define(this.scope, stmt.name.lexeme, value);
        return done;
      }
      case "Block":
        return this.executeBlock(stmt.body);
      case "If": {
        const cond = this.eval(stmt.cond);
        if (cond.t === "err") return cond;
        if (isTruthy(cond.v)) return this.execute(stmt.body);
        return stmt.else ? this.execute(stmt.else) : done;
      }
      case "While": {
        while (true) {
          const cond = this.eval(stmt.cond);
          if (cond.t === "err") return cond;
          if (!isTruthy(cond.v)) return done;
          const body = this.execute(stmt.body);
          if (body.t === "err") return body;
        }
      }
    }
  };

  private eval = (expr: Expr): Evaluated => {
    switch (expr.type) {
      case "Literal":
        return ok(expr.value);
      case "Grouping":
        return this.eval(expr.inner);
      case "Variable":
        return this.environment.get(this.scope, expr.name);
      case "Assign": {
        const value = this.eval(expr.value);
        if (value.t === "err") return value;
        return this.environment.assign(this.scope, expr.name, value.v);
      }
      case "Logical": {
        const left = this.eval(expr.left);
        if (left.t === "err") return left;
        if (expr.op.type === TokenType.OR) {
          if (isTruthy(left.v)) return left;
        } else if (!isTruthy(left.v)) return left;
        return this.eval(expr.right);
      }
      case "Unary":
        return this.unary(expr);
      case "Binary":
        return this.binary(expr);
    }
  };

  private unary = (expr: Unary): Evaluated => {
    const value = this.eval(expr.argument);
    if (value.t === "err") return value;

    switch (expr.op.type) {
      case TokenType.BANG:
        return ok(!isTruthy(value.v));
      case TokenType.MINUS:
        if (typeof value.v !== "number") {
          return failure(expr.op, "Operand must be a number.");
        }
        return ok(-value.v);
      default:
        return failure(expr.op, `Unknown unary operator '${expr.op.lexeme}'.`);
    }
  };

  private binary = (expr: Binary): Evaluated => {
    const lhs = this.eval(expr.left);
    if (lhs.t === "err") return lhs;
    const rhs = this.eval(expr.right);
    if (rhs.t === "err") return rhs;
    const left = lhs.v;
    const right = rhs.v;
    const op = expr.op;

    switch (op.type) {
      case TokenType.EQUAL_EQUAL:
        return ok(isEqual(left, right));
      case TokenType.BANG_EQUAL:
        return ok(!isEqual(left, right));
      case TokenType.PLUS: {
        if (typeof left === "string" || typeof right === "string") {
          return ok(stringify(left) + stringify(right));
        }
        if (typeof left === "number" && typeof right === "number") {
          return ok(left + right);
        }
        return failure(
          op,
          "Operands must be two numbers or there must be a string.",
        );
      }
    }

    if (typeof left !== "number" || typeof right !== "number") {
      return failure(op, "Operands must be numbers.");
    }

    switch (op.type) {
      case TokenType.MINUS:
        return ok(left - right);
      case TokenType.STAR:
        return ok(left * right);
      case TokenType.SLASH:
        if (right === 0) return failure(op, "Division by zero.");
        return ok(left / right);
      case TokenType.GREATER:
        return ok(left > right);
      case TokenType.GREATER_EQUAL:
        return ok(left >= right);
      case TokenType.LESS:
        return ok(left < right);
      case TokenType.LESS_EQUAL:
        return ok(left <= right);
      default:
        return failure(op, `Unknown binary operator '${op.lexeme}'.`);
    }
  };
}

export { Lexer, scan } from "./lexer.js";
export { parse, Parser } from "./parser.js";
export { Interpreter, isEqual, isTruthy, stringify } from "./interpreter.js";
export { Environment, type Scope } from "./environment.js";
export { printExpr, printStmt } from "./printer.js";
export {
  type ErrorReporter,
  type LineSink,
  type RuntimeFailure,
  StreamReporter,
} from "./errors.js";
export { exitStatus, run, type RunResult, Session } from "./lox.js";
export { type Token, TokenType } from "./token.js";
export type { Expr, Stmt, Value } from "./ast.js";
export { UNASSIGNED } from "./ast.js";
export { fail, ok, type Result } from "./result.js";

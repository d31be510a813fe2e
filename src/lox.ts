import type { Stmt } from "./ast.js";
import { type LineSink, StreamReporter } from "./errors.js";
import { Interpreter } from "./interpreter.js";
import { scan } from "./lexer.js";
import { parse } from "./parser.js";

export type RunResult = {
  hadError: boolean;
  hadRuntimeError: boolean;
};

export type SessionOptions = {
  /** receives each printed line */
  out?: LineSink;
  /** receives each formatted diagnostic */
  err?: LineSink;
};

/** Exit statuses for a file run. */
export const EXIT_STATIC_ERROR = 65;
export const EXIT_RUNTIME_ERROR = 70;

export const exitStatus = (result: RunResult): number =>
  result.hadError
    ? EXIT_STATIC_ERROR
    : result.hadRuntimeError
    ? EXIT_RUNTIME_ERROR
    : 0;

/**
 * One interpreter with a persistent global scope. Each `run` reports its own
 * error flags; bindings survive from one run to the next.
 */
export class Session {
  private reporter: StreamReporter;
  private interpreter: Interpreter;

  constructor(options: SessionOptions = {}) {
    this.reporter = new StreamReporter(options.err);
    this.interpreter = new Interpreter(this.reporter, options.out);
  }

  /** Lexes and parses without running; static errors are reported. */
  public parse = (src: string): { statements: Stmt[]; hadError: boolean } => {
    this.reporter.reset();
    const statements = parse(scan(src, this.reporter), this.reporter);
    return { statements, hadError: this.reporter.hadError };
  };

  /**
   * Statements that survived parsing run even when others were rejected;
   * the static error still shows in the result.
   */
  public run = (src: string): RunResult => {
    const { statements, hadError } = this.parse(src);
    this.interpreter.interpret(statements);
    return {
      hadError,
      hadRuntimeError: this.reporter.hadRuntimeError,
    };
  };
}

/** Runs `src` in a fresh session. */
export const run = (src: string, options: SessionOptions = {}): RunResult =>
  new Session(options).run(src);

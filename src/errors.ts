import { type Token, TokenType } from "./token.js";

/** Raised by the interpreter; aborts the current run. */
export type RuntimeFailure = {
  readonly token: Token;
  readonly message: string;
};

/** Marker for a declaration the parser has already reported. */
export type ParseFailure = {
  readonly token: Token;
  readonly message: string;
};

export interface ErrorReporter {
  error(line: number, where: string, message: string): void;
  runtimeError(failure: RuntimeFailure): void;
}

export type LineSink = (line: string) => void;

export const tokenWhere = (tok: Token): string =>
  tok.type === TokenType.EOF ? " at end" : ` at '${tok.lexeme}'`;

export const reportAt = (
  reporter: ErrorReporter,
  tok: Token,
  message: string,
): void => reporter.error(tok.line, tokenWhere(tok), message);

/**Reporter that formats diagnostics and remembers which kinds it has seen */
export class StreamReporter implements ErrorReporter {
  public hadError = false;
  public hadRuntimeError = false;

  constructor(
    private sink: LineSink = (line) => process.stderr.write(`${line}\n`),
  ) {}

  public error = (line: number, where: string, message: string): void => {
    this.sink(`[line ${line}] Error${where}: ${message}`);
    this.hadError = true;
  };

  public runtimeError = (failure: RuntimeFailure): void => {
    this.sink(`${failure.message}\n[line ${failure.token.line}]`);
    this.hadRuntimeError = true;
  };

  public reset = (): void => {
    this.hadError = false;
    this.hadRuntimeError = false;
  };
}

import type { ErrorReporter } from "./errors.js";
import { keywords, type Literal, type Token, TokenType } from "./token.js";
import { isalnum, isalpha, isdigit } from "./utils.js";

/**Lexer */
export class Lexer {
  private start = 0;
  private pos = 0;
  private line = 1;
  private tokens: Token[] = [];

  constructor(private src: string, private reporter: ErrorReporter) {}

  private atEnd = (): boolean => this.pos >= this.src.length;

  private current = (): string =>
    this.pos < this.src.length ? this.src[this.pos] : "\0";

  private peekNext = (): string =>
    this.pos + 1 < this.src.length ? this.src[this.pos + 1] : "\0";

  private bump = (): string => this.src[this.pos++];

  private match = (expected: string): boolean => {
    if (this.current() !== expected || this.atEnd()) return false;
    this.pos++;
    return true;
  };

  private push = (type: TokenType, literal?: Literal): void => {
    const lexeme = this.src.slice(this.start, this.pos);
    this.tokens.push(
      literal === undefined
        ? { type, lexeme, line: this.line }
        : { type, lexeme, literal, line: this.line },
    );
  };

  private parseNumber = (): void => {
    while (isdigit(this.current())) this.bump();

    // a trailing '.' stays behind for the next token
    if (this.current() === "." && isdigit(this.peekNext())) {
      this.bump();
      while (isdigit(this.current())) this.bump();
    }

    this.push(
      TokenType.NUMBER,
      Number.parseFloat(this.src.slice(this.start, this.pos)),
    );
  };

  private parseAlpha = (): void => {
    while (isalnum(this.current())) this.bump();
    const ident = this.src.slice(this.start, this.pos);
    this.push(keywords.get(ident) ?? TokenType.IDENTIFIER);
  };

  private parseString = (): void => {
    while (this.current() !== '"' && !this.atEnd()) {
      if (this.current() === "\n") this.line++;
      this.bump();
    }

    if (this.atEnd()) {
      this.reporter.error(
        this.line,
        "",
        "A string was not terminated before the end of the file.",
      );
      return;
    }

    this.bump();
    this.push(TokenType.STRING, this.src.slice(this.start + 1, this.pos - 1));
  };

  private skipBlockComment = (): void => {
    let depth = 1;
    while (depth > 0) {
      if (this.atEnd()) {
        this.reporter.error(
          this.line,
          "",
          "A block comment was not terminated before the end of the file.",
        );
        return;
      }

      const ch = this.current();
      const next = this.peekNext();
      if (ch === "*" && next === "/") {
        this.pos += 2;
        depth--;
      } else if (ch === "/" && next === "*") {
        this.pos += 2;
        depth++;
      } else {
        if (ch === "\n") this.line++;
        this.bump();
      }
    }
  };

  /** Scans one lexeme; whitespace and comments add no token. */
  public nextToken = (): void => {
    const ch = this.bump();
    switch (ch) {
      case "(":
        return this.push(TokenType.LEFT_PAREN);
      case ")":
        return this.push(TokenType.RIGHT_PAREN);
      case "{":
        return this.push(TokenType.LEFT_BRACE);
      case "}":
        return this.push(TokenType.RIGHT_BRACE);
      case ",":
        return this.push(TokenType.COMMA);
      case ".":
        return this.push(TokenType.DOT);
      case "-":
        return this.push(TokenType.MINUS);
      case "+":
        return this.push(TokenType.PLUS);
      case ";":
        return this.push(TokenType.SEMICOLON);
      case "*":
        return this.push(TokenType.STAR);
      case "!":
        return this.push(
          this.match("=") ? TokenType.BANG_EQUAL : TokenType.BANG,
        );
      case "=":
        return this.push(
          this.match("=") ? TokenType.EQUAL_EQUAL : TokenType.EQUAL,
        );
      case "<":
        return this.push(
          this.match("=") ? TokenType.LESS_EQUAL : TokenType.LESS,
        );
      case ">":
        return this.push(
          this.match("=") ? TokenType.GREATER_EQUAL : TokenType.GREATER,
        );
      case "/": {
        if (this.match("/")) {
          while (this.current() !== "\n" && !this.atEnd()) this.bump();
        } else if (this.match("*")) {
          this.skipBlockComment();
        } else {
          this.push(TokenType.SLASH);
        }
        return;
      }
      case " ":
      case "\r":
      case "\t":
        return;
      case "\n": {
        this.line++;
        return;
      }
      case '"':
        return this.parseString();
      default: {
        if (isdigit(ch)) return this.parseNumber();
        if (isalpha(ch)) return this.parseAlpha();
        // consumed anyway so later errors still surface
        this.reporter.error(this.line, "", "Unexpected character.");
      }
    }
  };

  public lex = (): Token[] => {
    while (!this.atEnd()) {
      this.start = this.pos;
      this.nextToken();
    }
    this.tokens.push({ type: TokenType.EOF, lexeme: "", line: this.line });
    return this.tokens;
  };
}

export const scan = (src: string, reporter: ErrorReporter): Token[] =>
  new Lexer(src, reporter).lex();

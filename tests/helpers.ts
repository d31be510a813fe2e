import { StreamReporter } from "../src/errors.js";
import { Session } from "../src/lox.js";
import { type Token, TokenType } from "../src/token.js";

export const collect = () => {
  const lines: string[] = [];
  return { lines, sink: (line: string) => void lines.push(line) };
};

export const reporter = () => {
  const { lines, sink } = collect();
  return { errors: lines, reporter: new StreamReporter(sink) };
};

export const session = () => {
  const out = collect();
  const err = collect();
  return {
    out: out.lines,
    err: err.lines,
    session: new Session({ out: out.sink, err: err.sink }),
  };
};

export const exec = (src: string) => {
  const s = session();
  const result = s.session.run(src);
  return { out: s.out, err: s.err, result };
};

export const ident = (name: string, line = 1): Token => ({
  type: TokenType.IDENTIFIER,
  lexeme: name,
  line,
});

import { Command } from "commander";
import { readFile } from "node:fs/promises";
import { createInterface } from "node:readline";
import { type LineSink, StreamReporter } from "./errors.js";
import { scan } from "./lexer.js";
import { exitStatus, Session, type SessionOptions } from "./lox.js";
import { printStmt } from "./printer.js";
import { tokenToString } from "./token.js";

/** EX_NOINPUT from sysexits. */
export const EXIT_NO_INPUT = 66;

export type Streams = {
  out: LineSink;
  err: LineSink;
};

const stdio: Streams = {
  out: (line) => process.stdout.write(`${line}\n`),
  err: (line) => process.stderr.write(`${line}\n`),
};

const readSource = async (
  file: string,
  err: LineSink,
): Promise<string | undefined> => {
  try {
    return await readFile(file, "utf8");
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    err(`Could not read '${file}': ${reason}`);
    return undefined;
  }
};

export const runFile = async (
  file: string,
  streams: Streams = stdio,
): Promise<number> => {
  const src = await readSource(file, streams.err);
  if (src === undefined) return EXIT_NO_INPUT;
  return exitStatus(new Session(streams).run(src));
};

export const printAST = async (
  file: string,
  streams: Streams = stdio,
): Promise<number> => {
  const src = await readSource(file, streams.err);
  if (src === undefined) return EXIT_NO_INPUT;
  const { statements, hadError } = new Session(streams).parse(src);
  if (hadError) return exitStatus({ hadError, hadRuntimeError: false });
  for (const stmt of statements) streams.out(printStmt(stmt));
  return 0;
};

export const printTokens = async (
  file: string,
  streams: Streams = stdio,
): Promise<number> => {
  const src = await readSource(file, streams.err);
  if (src === undefined) return EXIT_NO_INPUT;
  const reporter = new StreamReporter(streams.err);
  for (const tok of scan(src, reporter)) streams.out(tokenToString(tok));
  return exitStatus(reporter);
};

export type ReplIO = {
  input: NodeJS.ReadableStream;
  /** banner and prompts go here; omit for non-interactive input */
  output?: NodeJS.WritableStream;
};

/** Runs one line at a time until `input` ends. */
export const repl = async (
  options: SessionOptions = stdio,
  io: ReplIO = { input: process.stdin, output: process.stdout },
): Promise<void> => {
  io.output?.write("tslox REPL\n");

  const session = new Session(options);
  const rl = createInterface({
    input: io.input,
    output: io.output,
    prompt: "> ",
  });

  rl.prompt();
  for await (const line of rl) {
    // a failed line is reported and the session goes on
    session.run(line);
    rl.prompt();
  }
};

export const main = async (
  args: string[] = process.argv.slice(2),
): Promise<number> => {
  if (args.length === 0) {
    await repl();
    return 0;
  }

  let status = 0;
  const program = new Command()
    .name("tslox")
    .version("0.1.0")
    .description("Tree-walking interpreter");

  program
    .command("repl")
    .description("Start an interactive session")
    .action(async () => await repl());

  program
    .command("run <file>")
    .description("Run a source file")
    .action(async (file: string) => {
      status = await runFile(file);
    });

  program
    .command("ast <file>")
    .description("Show the syntax tree of a source file")
    .action(async (file: string) => {
      status = await printAST(file);
    });

  program
    .command("tokens <file>")
    .description("Show the tokens of a source file")
    .action(async (file: string) => {
      status = await printTokens(file);
    });

  await program.parseAsync(args, { from: "user" });
  return status;
};

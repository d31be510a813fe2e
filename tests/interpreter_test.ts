import { describe, expect, it } from "vitest";
import { UNASSIGNED, type Value } from "../src/ast.js";
import { Environment } from "../src/environment.js";
import {
  Interpreter,
  isEqual,
  isTruthy,
  stringify,
} from "../src/interpreter.js";
import { scan } from "../src/lexer.js";
import { parse } from "../src/parser.js";
import { collect, exec, reporter } from "./helpers.js";

describe("Interpreter", () => {
  it("follows operator precedence", () => {
    expect(exec("print 1 + 2 * 3;").out).toEqual(["7"]);
    expect(exec("print (1 + 2) * 3;").out).toEqual(["9"]);
  });

  it("shadows outer bindings inside a block", () => {
    const { out } = exec("var a = 1; { var a = 2; print a; } print a;");
    expect(out).toEqual(["2", "1"]);
  });

  it("assigns to the nearest enclosing binding", () => {
    expect(exec("var a = 1; { a = 2; } print a;").out).toEqual(["2"]);
  });

  it("reports division by zero instead of printing", () => {
    const { out, err, result } = exec("print 1 / 0;");
    expect(out).toEqual([]);
    expect(err).toEqual(["Division by zero.\n[line 1]"]);
    expect(result).toEqual({ hadError: false, hadRuntimeError: true });
  });

  it("reports reads and writes of undefined variables", () => {
    expect(exec("print b;").err).toEqual(["Undefined variable 'b'.\n[line 1]"]);
    expect(exec("c = 1;").err).toEqual(["Undefined variable 'c'.\n[line 1]"]);
  });

  it("concatenates when either operand of + is a string", () => {
    const { out } = exec(
      'print "n = " + 5; print 5 + "x"; print nil + "s"; print true + "!";',
    );
    expect(out).toEqual(["n = 5", "5x", "nils", "true!"]);
  });

  it("treats only nil and false as falsy", () => {
    const { out } = exec(`
      if (nil) print "t"; else print "f";
      if (false) print "t"; else print "f";
      if (0) print "t"; else print "f";
      if ("") print "t"; else print "f";
    `);
    expect(out).toEqual(["f", "f", "t", "t"]);
  });

  it("prints integral numbers without a fraction", () => {
    const { out } = exec("print 3.0; print 2.5; print -0; print 10 / 4;");
    expect(out).toEqual(["3", "2.5", "-0", "2.5"]);
  });

  it("type-checks operands", () => {
    expect(exec('print -"a";').err).toEqual([
      "Operand must be a number.\n[line 1]",
    ]);
    expect(exec('print 1 < "2";').err).toEqual([
      "Operands must be numbers.\n[line 1]",
    ]);
    expect(exec("print true + 1;").err).toEqual([
      "Operands must be two numbers or there must be a string.\n[line 1]",
    ]);
  });

  it("compares any two values for equality", () => {
    const { out, err } = exec(`
      print nil == nil;
      print nil == false;
      print 1 == 1;
      print "a" != "a";
      print 1 == "1";
    `);
    expect(err).toEqual([]);
    expect(out).toEqual(["true", "false", "true", "false", "false"]);
  });

  it("short-circuits and yields the deciding operand", () => {
    const { out } = exec(`
      var a = 0;
      false and (a = 1);
      true or (a = 2);
      print a;
      print nil or "x";
      print 1 and 2;
    `);
    expect(out).toEqual(["0", "x", "2"]);
  });

  it("yields the assigned value from an assignment", () => {
    const { out } = exec("var a; var b; a = b = 3; print a; print b;");
    expect(out).toEqual(["3", "3"]);
  });

  it("keeps uninitialized variables distinct from nil", () => {
    expect(exec("var x; print x;").out).toEqual(["nil"]);
    expect(exec("var x; print x == nil;").out).toEqual(["false"]);
  });

  it("runs no branch of an else-less if with a false condition", () => {
    expect(exec("if (false) print 1; print 2;").out).toEqual(["2"]);
    expect(exec("if (nil) { print 1; } print 2;").out).toEqual(["2"]);
  });

  it("skips a while body whose condition is false from the start", () => {
    expect(exec("while (false) print 1; print 2;").out).toEqual(["2"]);
  });

  it("runs while and for loops", () => {
    expect(
      exec("var i = 0; while (i < 3) { print i; i = i + 1; }").out,
    ).toEqual(["0", "1", "2"]);
    expect(
      exec("for (var i = 0; i < 3; i = i + 1) print i * i;").out,
    ).toEqual(["0", "1", "4"]);
  });

  it("scopes a for loop variable to the loop", () => {
    const { out, err } = exec("for (var i = 0; i < 1; i = i + 1) {} print i;");
    expect(out).toEqual([]);
    expect(err).toEqual(["Undefined variable 'i'.\n[line 1]"]);
  });

  it("stops at the first runtime error and keeps earlier effects", () => {
    const { out, err } = exec("print 1; print nil - 1; print 2;");
    expect(out).toEqual(["1"]);
    expect(err).toEqual(["Operands must be numbers.\n[line 1]"]);
  });

  it("reports the line of the offending token", () => {
    const { err } = exec("var a = 1;\n\nprint a + nil;");
    expect(err).toEqual([
      "Operands must be two numbers or there must be a string.\n[line 3]",
    ]);
  });

  it("restores the enclosing scope when a block fails", () => {
    const r = reporter();
    const out = collect();
    const environment = new Environment();
    const interpreter = new Interpreter(r.reporter, out.sink, environment);
    const program = parse(
      scan('var a = "outer"; { var a = "inner"; print a / 2; }', r.reporter),
      r.reporter,
    );

    const result = interpreter.interpret(program);
    expect(result.t).toBe("err");
    expect(environment.depth).toBe(1);

    interpreter.interpret(parse(scan("print a;", r.reporter), r.reporter));
    expect(out.lines).toEqual(["outer"]);
  });
});

describe("values", () => {
  it("isTruthy", () => {
    expect(([null, false, true, 0, "", UNASSIGNED] satisfies Value[]).map(isTruthy)).toEqual([
      false,
      false,
      true,
      true,
      true,
      true,
    ]);
  });

  it("isEqual", () => {
    expect(isEqual(null, null)).toBe(true);
    expect(isEqual(null, UNASSIGNED)).toBe(false);
    expect(isEqual(Number.NaN, Number.NaN)).toBe(true);
    expect(isEqual("1", 1)).toBe(false);
  });

  it("stringify", () => {
    expect(([null, UNASSIGNED, 1, 1.25, -0, true, "s"] satisfies Value[]).map(stringify)).toEqual(
      ["nil", "nil", "1", "1.25", "-0", "true", "s"],
    );
  });
});

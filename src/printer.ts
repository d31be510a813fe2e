import type { Expr, Stmt } from "./ast.js";

const parenthesize = (name: string, ...parts: string[]): string =>
  `(${[name, ...parts].join(" ")})`;

const literal = (value: number | string | boolean | null): string => {
  if (value === null) return "nil";
  if (typeof value === "string") return JSON.stringify(value);
  return String(value);
};

/** Renders an expression in parenthesized prefix form. */
export const printExpr = (expr: Expr): string => {
  switch (expr.type) {
    case "Literal":
      return literal(expr.value);
    case "Variable":
      return expr.name.lexeme;
    case "Assign":
      return parenthesize("=", expr.name.lexeme, printExpr(expr.value));
    case "Unary":
      return parenthesize(expr.op.lexeme, printExpr(expr.argument));
    case "Binary":
    case "Logical":
      return parenthesize(
        expr.op.lexeme,
        printExpr(expr.left),
        printExpr(expr.right),
      );
    case "Grouping":
      return parenthesize("group", printExpr(expr.inner));
  }
};

export const printStmt = (stmt: Stmt): string => {
  switch (stmt.type) {
    case "Expression":
      return parenthesize(";", printExpr(stmt.expr));
    case "Print":
      return parenthesize("print", printExpr(stmt.expr));
    case "Var":
      return stmt.initializer
        ? parenthesize("var", stmt.name.lexeme, printExpr(stmt.initializer))
        : parenthesize("var", stmt.name.lexeme);
    case "Block":
      return parenthesize("block", ...stmt.body.map(printStmt));
    case "If":
      return stmt.else
        ? parenthesize(
          "if",
          printExpr(stmt.cond),
          printStmt(stmt.body),
          printStmt(stmt.else),
        )
        : parenthesize("if", printExpr(stmt.cond), printStmt(stmt.body));
    case "While":
      return parenthesize("while", printExpr(stmt.cond), printStmt(stmt.body));
  }
};

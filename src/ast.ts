import type { BinaryOp } from "./tokens.js";
import type { NumberValue, TextValue } from "./values.js";

export type Expr =
  | { k: "Lit"; v: NumberValue | TextValue }
  | { k: "Var"; n: string }
  | { k: "Assign"; n: string; v: Expr }             // only ever targets a bare name
  | { k: "Binary"; l: Expr; op: BinaryOp; r: Expr }
  ;

/** A body line kept verbatim for the generated code. */
export type RawPassthrough = { k: "Raw"; text: string };

export type Stmt =
  | { k: "VarDecl"; n: string; init?: Expr }
  | { k: "Print"; e: Expr }
  | { k: "Pause"; e?: Expr }
  | { k: "MessageBox"; e: Expr }
  | { k: "If"; c: Expr; then: Stmt[]; else?: Stmt[] }
  | { k: "While"; c: Expr; body: Stmt[] }              // parsed once, re-run per iteration
  | { k: "UIWindow"; title: Expr; width: Expr; height: Expr; body: UIStmt[] }
  | { k: "ExprS"; e: Expr }
  | RawPassthrough
  ;

/** Everything that may appear below the top level. */
export type PlainStmt = Exclude<Stmt, { k: "UIWindow" }>;

export type UIStmt =
  | { k: "SetIcon"; path: string }
  | { k: "Label"; text: Expr; x?: Expr; y?: Expr; w?: Expr; h?: Expr }
  | { k: "Button"; text: Expr; x?: Expr; y?: Expr; onClick?: PlainStmt[] }
  | PlainStmt
  ;

export type Program = Stmt[];

/* Tokens + statement keywords + character helpers */

export enum T {
  // Atoms
  Number, Text, Identifier,

  // Operators (==, !=, <=, >=, + - * / % < > =)
  Operator,

  // Punctuation
  LBrace, RBrace, LParen, RParen,
  Semicolon,
  Comma, // UI form arguments
  Dot,   // only survives inside raw passthrough lines

  // Outside the language; lexed on request, kept only on raw lines
  Stray,
}

export type Tok = {
  t: T;
  lex: string;
  lit?: number | string;
  offset: number;
  line: number;
  col: number;
};

/** Binary operators the expression grammar accepts. `=` is assignment. */
export const BINARY_OPS = ["+", "-", "*", "/", "==", "<", ">"] as const;
export type BinaryOp = (typeof BINARY_OPS)[number];

export const isBinaryOp = (s: string): s is BinaryOp =>
  (BINARY_OPS as readonly string[]).includes(s);

/** Leading identifiers that start an ordinary statement. */
export const STATEMENT_KEYWORDS = new Set([
  "have", "let",
  "print", "put",
  "pause",
  "ui_message",
  "when",
  "while",
]);

export const isDigit = (ch: string) => /[0-9]/.test(ch);
export const isIdStart = (ch: string) => /[A-Za-z_]/.test(ch);
export const isIdPart  = (ch: string) => /[A-Za-z0-9_]/.test(ch);

export const kindName = (t: T) => T[t];

import type { Tok } from "./tokens.js";

export type Position = { offset: number; line: number; col: number };

export class LexError extends SyntaxError {
  constructor(public position: Position, public character: string, detail = `Unexpected character '${character}'`) {
    super(`[LEX] ${detail} at ${position.line}:${position.col}`);
    this.name = "LexError";
  }
}

/** `expected` is a token kind or a short description such as "expression". */
export class ParseError extends SyntaxError {
  constructor(public expected: string, public found: Tok, public position: Position, detail?: string) {
    super(`[PARSE] ${detail ?? `Expected ${expected}`} at token '${found.lex}' (${found.line}:${found.col})`);
    this.name = "ParseError";
  }
}

export class UnexpectedEndOfInput extends SyntaxError {
  constructor(public expected: string) {
    super(`[PARSE] Unexpected end of input, expected ${expected}`);
    this.name = "UnexpectedEndOfInput";
  }
}

export type RuntimeErrorKind = "DivisionByZero" | "UndefinedBehavior";

export class RuntimeError extends Error {
  constructor(public kind: RuntimeErrorKind, message: string) {
    super(`[RUN] ${message}`);
    this.name = "RuntimeError";
  }
}


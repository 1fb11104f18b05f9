import { T, Tok, isDigit, isIdStart, isIdPart } from "./tokens.js";
import { LexError, Position } from "./errors.js";

const WHITESPACE = new Set([" ", "\t", "\r", "\n"]);
const CHAR_LITERAL = /^(?:\\.|[^'\\\n])*'/; // rest of 'x', '\'' or '\\' on one line

export type LexOptions = {
  /**
   * Emit `Stray` tokens for characters outside the language instead of failing.
   * The parser then reports them, except on raw window lines where they are
   * ordinary target-language text.
   */
  strayCharacters?: boolean;
};

export class Lexer {
  private i = 0; private line = 1; private col = 1;
  private start: Position = { offset: 0, line: 1, col: 1 };
  constructor(private src: string, private opts: LexOptions = {}) {}

  lex(): Tok[] {
    const out: Tok[] = [];
    while (!this.eof()) {
      this.skipWS();
      if (this.eof()) break;
      this.start = { offset: this.i, line: this.line, col: this.col };
      const c = this.advance();

      switch (c) {
        case "(": out.push(this.tok(T.LParen, "(")); break;
        case ")": out.push(this.tok(T.RParen, ")")); break;
        case "{": out.push(this.tok(T.LBrace, "{")); break;
        case "}": out.push(this.tok(T.RBrace, "}")); break;
        case ";": out.push(this.tok(T.Semicolon, ";")); break;
        case ",": out.push(this.tok(T.Comma, ",")); break;
        case ".": out.push(this.tok(T.Dot, ".")); break;

        case "/": {
          if (this.peek() === "/") { this.skipLineComment(); break; }
          out.push(this.op("/")); break;
        }
        case "+": case "-": case "*": case "%":
          out.push(this.op(c)); break;

        // two-character forms first
        case "=": case "<": case ">":
          out.push(this.op(this.match("=") ? c + "=" : c)); break;
        case "!":
          if (this.match("=")) { out.push(this.op("!=")); break; }
          out.push(this.stray(c)); break;

        case '"': out.push(this.text()); break;

        default:
          if (isDigit(c)) { out.push(this.number(c)); break; }
          if (isIdStart(c)) { out.push(this.identifier(c)); break; }
          out.push(this.stray(c));
      }
    }
    return out;
  }

  private eof() { return this.i >= this.src.length; }
  private peek() { return this.src[this.i] ?? "\0"; }
  private peekN(n: number) { return this.src[this.i + n] ?? "\0"; }
  private advance() { const ch = this.src[this.i++]; if (ch === "\n"){ this.line++; this.col=1; } else this.col++; return ch; }
  private match(expected: string) { if (this.peek() !== expected) return false; this.i++; this.col++; return true; }
  private tok(t: T, lex: string, lit?: number | string): Tok { return { t, lex, lit, ...this.start }; }
  private op(lex: string): Tok { return this.tok(T.Operator, lex, lex); }

  private skipWS() { this.take(c => WHITESPACE.has(c)); }
  private skipLineComment() { this.take(c => c !== "\n"); }

  // consumes characters while `pred` holds and returns them
  private take(pred: (c: string) => boolean): string {
    let s = "";
    while (!this.eof() && pred(this.peek())) s += this.advance();
    return s;
  }

  // a quoted character such as '{' stays one token so its contents never count as punctuation
  private stray(c: string): Tok {
    if (!this.opts.strayCharacters) throw new LexError(this.start, c);
    const quoted = c === "'" ? CHAR_LITERAL.exec(this.src.slice(this.i)) : null;
    if (!quoted) return this.tok(T.Stray, c);
    for (let n = 0; n < quoted[0].length; n++) this.advance();
    return this.tok(T.Stray, c + quoted[0]);
  }

  // no escapes: a '"' always closes the literal
  private text(): Tok {
    const v = this.take(c => c !== '"');
    if (this.eof()) throw new LexError(this.start, '"', "Unterminated string");
    this.advance();
    return this.tok(T.Text, `"${v}"`, v);
  }
  private number(first: string): Tok {
    let s = first + this.take(isDigit);
    if (this.peek() === "." && isDigit(this.peekN(1))) s += this.advance() + this.take(isDigit);
    return this.tok(T.Number, s, Number(s));
  }
  private identifier(first: string): Tok {
    const s = first + this.take(isIdPart);
    return this.tok(T.Identifier, s, s);
  }
}

export function tokenize(source: string, opts?: LexOptions): Tok[] {
  return new Lexer(source, opts).lex();
}

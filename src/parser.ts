import { T, Tok, STATEMENT_KEYWORDS, isBinaryOp, kindName } from "./tokens.js";
import { Expr, PlainStmt, Program, RawPassthrough, Stmt, UIStmt } from "./ast.js";
import { LexError, ParseError, Position, UnexpectedEndOfInput } from "./errors.js";
import { int, float, text } from "./values.js";

const UI_FORMS = new Set(["set_icon", "label", "button"]);

export class Parser {
  private i = 0;
  private depth = 0; // brace nesting; ui_window lives at 0 only
  /** `src` is the text the tokens came from; raw lines are copied out of it. */
  constructor(private toks: Tok[], private src: string) {}

  parse(): Program {
    const out: Stmt[] = [];
    for (;;) {
      this.skipSemicolons();
      if (this.atEnd()) break;
      out.push(this.stmt());
    }
    return out;
  }

  /* -------- Statements -------- */
  private stmt(): Stmt {
    if (this.isKeyword("ui_window")) return this.windowStmt();
    return this.plainStmt();
  }

  private plainStmt(): PlainStmt {
    const tok = this.need("statement");
    if (tok.t === T.Identifier) {
      switch (tok.lex) {
        case "have": case "let": this.i++; return this.varDecl();
        case "print": case "put": this.i++; return this.terminated({ k: "Print", e: this.expr() });
        case "pause": this.i++; return this.pauseStmt();
        case "ui_message": this.i++; return this.terminated({ k: "MessageBox", e: this.expr() });
        case "when": this.i++; return this.whenStmt();
        case "while": this.i++; return this.whileStmt();
        case "ui_window": throw this.topLevelOnly(tok);
      }
    }
    return this.terminated({ k: "ExprS", e: this.expr() });
  }

  private varDecl(): PlainStmt {
    const n = this.expect(T.Identifier).lex;
    let init: Expr | undefined;
    if (this.isOp("=")) { this.i++; init = this.expr(); }
    return this.terminated({ k: "VarDecl", n, init });
  }

  // pause | pause() | pause(expr)
  private pauseStmt(): PlainStmt {
    let e: Expr | undefined;
    if (this.try(T.LParen)) {
      if (!this.is(T.RParen)) e = this.expr();
      this.expect(T.RParen);
    }
    return this.terminated({ k: "Pause", e });
  }

  private whenStmt(): PlainStmt {
    const c = this.condition();
    const then = this.block();
    let otherwise: Stmt[] | undefined;
    if (this.isKeyword("otherwise")) { this.i++; otherwise = this.block(); }
    return this.terminated({ k: "If", c, then, else: otherwise });
  }

  private whileStmt(): PlainStmt {
    const c = this.condition();
    const body = this.block();
    return this.terminated({ k: "While", c, body });
  }

  private condition(): Expr {
    this.expect(T.LParen);
    const c = this.expr();
    this.expect(T.RParen);
    return c;
  }

  private block(): Stmt[] {
    this.expect(T.LBrace);
    this.depth++;
    const body: Stmt[] = [];
    for (;;) {
      this.skipSemicolons();
      if (this.need("'}'").t === T.RBrace) break;
      body.push(this.stmt());
    }
    this.depth--;
    this.expect(T.RBrace);
    return body;
  }

  /* -------- ui_window and its body -------- */

  // ui_window(title, width, height) { ... }
  private windowStmt(): Stmt {
    const kw = this.advance();
    if (this.depth > 0) throw this.topLevelOnly(kw);
    const args = this.try(T.LParen) ? this.argList(3) : [];
    const title: Expr = args[0] ?? { k: "Lit", v: text("Nova App") };
    const width: Expr = args[1] ?? { k: "Lit", v: int(400) };
    const height: Expr = args[2] ?? { k: "Lit", v: int(300) };
    this.expect(T.LBrace);
    this.depth++;
    const body: UIStmt[] = [];
    for (;;) {
      this.skipSemicolons();
      if (this.need("'}'").t === T.RBrace) break;
      body.push(this.uiStmt());
    }
    this.depth--;
    this.expect(T.RBrace);
    return this.terminated({ k: "UIWindow", title, width, height, body });
  }

  private uiStmt(): UIStmt {
    const tok = this.need("window statement");
    const next = this.toks[this.i + 1];
    if (tok.t !== T.Identifier || !UI_FORMS.has(tok.lex) || next?.t !== T.LParen) return this.looseStmt();
    this.i += 2;
    switch (tok.lex) {
      case "set_icon": {
        const path = this.expect(T.Text).lex.slice(1, -1);
        this.expect(T.RParen);
        return this.terminated({ k: "SetIcon", path });
      }
      // label(text[, x, y[, w[, h]]])
      case "label": {
        const text = this.expr();
        let x: Expr | undefined, y: Expr | undefined, w: Expr | undefined, h: Expr | undefined;
        if (this.try(T.Comma)) {
          x = this.expr(); this.expect(T.Comma); y = this.expr();
          if (this.try(T.Comma)) {
            w = this.expr();
            if (this.try(T.Comma)) h = this.expr();
          }
        }
        this.expect(T.RParen);
        return this.terminated({ k: "Label", text, x, y, w, h });
      }
      // button(text[, x, y]) { handler }
      default: {
        const text = this.expr();
        let x: Expr | undefined, y: Expr | undefined;
        if (this.try(T.Comma)) { x = this.expr(); this.expect(T.Comma); y = this.expr(); }
        this.expect(T.RParen);
        let onClick: PlainStmt[] | undefined;
        if (this.try(T.LBrace)) onClick = this.handlerBody();
        return this.terminated({ k: "Button", text, x, y, onClick });
      }
    }
  }

  // after '{'
  private handlerBody(): PlainStmt[] {
    this.depth++;
    const body: PlainStmt[] = [];
    for (;;) {
      this.skipSemicolons();
      if (this.need("'}'").t === T.RBrace) break;
      body.push(this.looseStmt());
    }
    this.depth--;
    this.expect(T.RBrace);
    return body;
  }

  /**
   * Keyword lines use the ordinary grammar. Other lines are taken as an
   * expression statement when one ends cleanly there, else kept as raw text.
   */
  private looseStmt(): PlainStmt {
    const tok = this.need("statement");
    if (tok.t === T.Identifier && (STATEMENT_KEYWORDS.has(tok.lex) || tok.lex === "ui_window")) return this.plainStmt();
    const mark = this.i;
    try {
      const e = this.expr();
      if (this.endsLine()) return this.terminated({ k: "ExprS", e });
    } catch (err) {
      if (!(err instanceof ParseError || err instanceof LexError)) throw err;
    }
    this.i = mark;
    return this.terminated(this.raw());
  }

  private endsLine(): boolean {
    const next = this.peek();
    if (!next || next.t === T.Semicolon || next.t === T.RBrace) return true;
    return next.line > this.toks[this.i - 1].line;
  }

  // rest of the line, plus following lines while a '{' opened here is unmatched
  private raw(): RawPassthrough {
    const first = this.toks[this.i];
    let last = first;
    let open = 0;
    for (let tok = this.peek(); tok; tok = this.peek()) {
      if (tok !== first && open === 0 && (tok.line !== last.line || tok.t === T.Semicolon)) break;
      if (tok.t === T.RBrace) { if (open === 0) break; open--; }
      if (tok.t === T.LBrace) open++;
      last = tok;
      this.i++;
    }
    const text = this.src.slice(first.offset, last.offset + last.lex.length);
    return { k: "Raw", text: dedent(text, first.col - 1) };
  }

  /* -------- Expressions (flat, strictly left to right) -------- */
  private expr(): Expr {
    let e = this.primary();
    for (let tok = this.peek(); tok && tok.t === T.Operator; tok = this.peek()) {
      this.i++;
      if (tok.lex === "=") {
        if (e.k !== "Var") throw this.err(tok, "assignment target", "Invalid assignment target");
        return { k: "Assign", n: e.n, v: this.expr() };
      }
      if (!isBinaryOp(tok.lex)) throw this.err(tok, "operator", `Unsupported operator '${tok.lex}'`);
      e = { k: "Binary", l: e, op: tok.lex, r: this.primary() };
    }
    return e;
  }

  private primary(): Expr {
    const tok = this.need("expression");
    this.i++;
    switch (tok.t) {
      case T.Number: return { k: "Lit", v: tok.lex.includes(".") ? float(Number(tok.lex)) : int(Number(tok.lex)) };
      case T.Text: return { k: "Lit", v: text(tok.lex.slice(1, -1)) };
      case T.Identifier: {
        const next = this.peek();
        if (next?.t === T.LParen && next.line === tok.line) throw this.err(next, "operator", callMessage(tok.lex));
        return { k: "Var", n: tok.lex };
      }
      case T.LParen: { const e = this.expr(); this.expect(T.RParen); return e; }
    }
    throw this.err(tok, "expression");
  }

  private argList(max: number): Expr[] {
    const args: Expr[] = [];
    if (!this.is(T.RParen)) {
      do { args.push(this.expr()); } while (args.length < max && this.try(T.Comma));
    }
    this.expect(T.RParen);
    return args;
  }

  /* -------- helpers -------- */
  private terminated<S extends Stmt | UIStmt>(s: S): S { this.try(T.Semicolon); return s; }
  private skipSemicolons() { while (this.try(T.Semicolon)); }
  private atEnd() { return this.i >= this.toks.length; }
  private peek(): Tok | undefined { return this.toks[this.i]; }
  private need(expected: string): Tok {
    const tok = this.peek();
    if (!tok) throw new UnexpectedEndOfInput(expected);
    return tok;
  }
  private advance() { return this.toks[this.i++]; }
  private is(t: T) { return this.peek()?.t === t; }
  private isOp(lex: string) { const p = this.peek(); return p?.t === T.Operator && p.lex === lex; }
  private isKeyword(lex: string) { const p = this.peek(); return p?.t === T.Identifier && p.lex === lex; }
  private try(t: T) { if (this.is(t)) { this.i++; return true; } return false; }
  private expect(t: T): Tok {
    const tok = this.need(kindName(t));
    if (tok.t !== t) throw this.err(tok, kindName(t));
    this.i++;
    return tok;
  }
  private err(tok: Tok, expected: string, detail?: string): ParseError | LexError {
    if (tok.t === T.Stray) return new LexError(position(tok), tok.lex.charAt(0));
    return new ParseError(expected, tok, position(tok), detail);
  }
  private topLevelOnly(tok: Tok) {
    return this.err(tok, "statement", "ui_window is only allowed at top level");
  }
}

const position = (tok: Tok): Position => ({ offset: tok.offset, line: tok.line, col: tok.col });

// continuation lines lose the indentation of the line they continue
function dedent(text: string, width: number): string {
  const margin = new RegExp(`^[ \\t]{0,${width}}`);
  return text.split(/\r?\n/).map((l, n) => (n === 0 ? l : l.replace(margin, ""))).join("\n");
}

const callMessage = (name: string) =>
  UI_FORMS.has(name) ? `${name}(...) is only allowed directly inside ui_window` : `Cannot call '${name}'`;

export function parse(tokens: Tok[], source: string): Program {
  return new Parser(tokens, source).parse();
}

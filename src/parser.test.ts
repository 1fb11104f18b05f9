import { describe, it, expect } from "vitest";
import { tokenize } from "./lexer.js";
import { parse } from "./parser.js";
import { LexError, ParseError, UnexpectedEndOfInput } from "./errors.js";
import { int, text } from "./values.js";
import type { Expr } from "./ast.js";

const ast = (src: string) => parse(tokenize(src, { strayCharacters: true }), src);
const num = (v: number): Expr => ({ k: "Lit", v: int(v) });
const str = (v: string): Expr => ({ k: "Lit", v: text(v) });
const ref = (n: string): Expr => ({ k: "Var", n });

function failure(src: string): unknown {
  try { ast(src); } catch (e) { return e; }
  return undefined;
}

describe("Parser: expressions", () => {
  it("groups strictly left to right", () => {
    expect(ast("2 + 3 * 4")).toEqual([{
      k: "ExprS",
      e: { k: "Binary", op: "*", l: { k: "Binary", op: "+", l: num(2), r: num(3) }, r: num(4) },
    }]);
  });

  it("groups by parentheses only", () => {
    expect(ast("2 + (3 * 4)")).toEqual([{
      k: "ExprS",
      e: { k: "Binary", op: "+", l: num(2), r: { k: "Binary", op: "*", l: num(3), r: num(4) } },
    }]);
  });

  it("takes the rest of the expression as the assigned value", () => {
    expect(ast("i = i + 1")).toEqual([{
      k: "ExprS",
      e: { k: "Assign", n: "i", v: { k: "Binary", op: "+", l: ref("i"), r: num(1) } },
    }]);
    expect(ast("x = y = 3")).toEqual([{
      k: "ExprS",
      e: { k: "Assign", n: "x", v: { k: "Assign", n: "y", v: num(3) } },
    }]);
  });

  it("marks float literals", () => {
    expect(ast("put 2.0")).toEqual([{ k: "Print", e: { k: "Lit", v: { k: "Number", v: 2, float: true } } }]);
  });

  it("rejects an assignment to anything but a name", () => {
    expect(() => ast("1 + 2 = 3")).toThrow("[PARSE] Invalid assignment target at token '=' (1:7)");
  });

  it("rejects calls", () => {
    expect(() => ast('put show("x")')).toThrow("[PARSE] Cannot call 'show' at token '(' (1:9)");
  });

  it("reports characters outside the language", () => {
    const err = failure("put a && b");
    expect(err).toBeInstanceOf(LexError);
    expect(err).toMatchObject({ character: "&", message: "[LEX] Unexpected character '&' at 1:7" });
    expect(() => ast("put 'x'")).toThrow("[LEX] Unexpected character ''' at 1:5");
  });

  it("rejects operators outside the binary set", () => {
    expect(() => ast("put 1 <= 2")).toThrow("[PARSE] Unsupported operator '<=' at token '<=' (1:7)");
    expect(() => ast("put 5 % 2")).toThrow(ParseError);
  });
});

describe("Parser: statements", () => {
  it("parses declarations with and without a value", () => {
    expect(ast("have x; let y = 2")).toEqual([
      { k: "VarDecl", n: "x" },
      { k: "VarDecl", n: "y", init: num(2) },
    ]);
  });

  it("accepts print with or without parentheses", () => {
    expect(ast('put("hi"); print 1')).toEqual([
      { k: "Print", e: str("hi") },
      { k: "Print", e: num(1) },
    ]);
  });

  it("accepts every pause form", () => {
    expect(ast('pause; pause(); pause("x")')).toEqual([
      { k: "Pause" },
      { k: "Pause" },
      { k: "Pause", e: str("x") },
    ]);
  });

  it("parses when/otherwise blocks", () => {
    expect(ast('when (1 < 2) { put "yes"; } otherwise { put "no"; }')).toEqual([{
      k: "If",
      c: { k: "Binary", op: "<", l: num(1), r: num(2) },
      then: [{ k: "Print", e: str("yes") }],
      else: [{ k: "Print", e: str("no") }],
    }]);
  });

  it("parses a while loop into its condition and body once", () => {
    expect(ast("while (i < 3) { put i; i = i + 1; }")).toEqual([{
      k: "While",
      c: { k: "Binary", op: "<", l: ref("i"), r: num(3) },
      body: [
        { k: "Print", e: ref("i") },
        { k: "ExprS", e: { k: "Assign", n: "i", v: { k: "Binary", op: "+", l: ref("i"), r: num(1) } } },
      ],
    }]);
  });

  it("parses ui_message as a message box", () => {
    expect(ast('ui_message("hi")')).toEqual([{ k: "MessageBox", e: str("hi") }]);
  });

  it("reports running out of tokens inside a block", () => {
    expect(() => ast("when (1 < 2) { put 1;")).toThrow(UnexpectedEndOfInput);
    expect(() => ast("when (1 < 2) { put 1;")).toThrow("[PARSE] Unexpected end of input, expected '}'");
  });

  it("reports the expected token kind and the token found", () => {
    const err = failure("when 1 { }");
    expect(err).toBeInstanceOf(ParseError);
    expect(err).toMatchObject({ expected: "LParen", found: { lex: "1" }, position: { offset: 5, line: 1, col: 6 } });
  });
});

describe("Parser: ui_window", () => {
  it("only accepts windows at top level", () => {
    expect(() => ast('when (1) { ui_window("x") { } }')).toThrow("ui_window is only allowed at top level");
  });

  it("fills in a default title and size", () => {
    expect(ast("ui_window { }")).toEqual([{
      k: "UIWindow", title: str("Nova App"), width: num(400), height: num(300), body: [],
    }]);
  });

  it("parses icons, labels and buttons", () => {
    const src = [
      'ui_window("Demo", 300, 200) {',
      '  set_icon("app.png")',
      '  label("Hi")',
      '  label("At", 10, 20, 120)',
      '  button("Go", 5, 6) {',
      '    put "clicked"',
      '  }',
      '  button("Idle")',
      '}',
    ].join("\n");
    expect(ast(src)).toEqual([{
      k: "UIWindow",
      title: str("Demo"), width: num(300), height: num(200),
      body: [
        { k: "SetIcon", path: "app.png" },
        { k: "Label", text: str("Hi") },
        { k: "Label", text: str("At"), x: num(10), y: num(20), w: num(120) },
        { k: "Button", text: str("Go"), x: num(5), y: num(6), onClick: [{ k: "Print", e: str("clicked") }] },
        { k: "Button", text: str("Idle") },
      ],
    }]);
  });

  it("needs both coordinates of a label", () => {
    const err = failure('ui_window { label("a", 1) }');
    expect(err).toMatchObject({ expected: "Comma", found: { lex: ")" } });
  });

  it("keeps unrecognised lines as raw text", () => {
    const src = [
      "ui_window {",
      "  form_1.BackColor = Color.Red",
      "  count = count + 1;",
      "  Foo.Bar(); Baz.Qux()",
      "}",
    ].join("\n");
    const [win] = ast(src);
    expect(win).toMatchObject({ k: "UIWindow" });
    expect(win.k === "UIWindow" && win.body).toEqual([
      { k: "Raw", text: "form_1.BackColor = Color.Red" },
      { k: "ExprS", e: { k: "Assign", n: "count", v: { k: "Binary", op: "+", l: ref("count"), r: num(1) } } },
      { k: "Raw", text: "Foo.Bar()" },
      { k: "Raw", text: "Baz.Qux()" },
    ]);
  });

  it("carries a raw block across lines until its braces close", () => {
    const src = [
      "ui_window {",
      '  button("Quit") {',
      "    if (done) {",
      "      Application.Exit();",
      "    }",
      "  }",
      "}",
    ].join("\n");
    const [win] = ast(src);
    expect(win.k === "UIWindow" && win.body).toEqual([{
      k: "Button",
      text: str("Quit"),
      onClick: [{ k: "Raw", text: "if (done) {\n  Application.Exit();\n}" }],
    }]);
  });

  it("keeps target-language operators and literals on raw lines", () => {
    const src = [
      "ui_window {",
      "  if (a && b || !c) { Application.Exit(); }",
      '  form_1.Controls[0].Text = "x"',
      "  var brace = '{'",
      '  Console.WriteLine($"n={n}")  // trailing note',
      "}",
    ].join("\n");
    const [win] = ast(src);
    expect(win.k === "UIWindow" && win.body).toEqual([
      { k: "Raw", text: "if (a && b || !c) { Application.Exit(); }" },
      { k: "Raw", text: 'form_1.Controls[0].Text = "x"' },
      { k: "Raw", text: "var brace = '{'" },
      { k: "Raw", text: 'Console.WriteLine($"n={n}")' },
    ]);
  });

  it("rejects a window form nested in a block", () => {
    expect(() => ast('ui_window { when (1 < 2) { label("a") } }'))
      .toThrow("[PARSE] label(...) is only allowed directly inside ui_window at token '(' (1:33)");
  });

  it("parses keyword lines inside a window strictly", () => {
    expect(() => ast("ui_window { put 1 + }")).toThrow(ParseError);
  });
});

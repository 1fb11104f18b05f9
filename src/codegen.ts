import { win32 } from "node:path";
import { Expr, Program, Stmt, UIStmt } from "./ast.js";
import { CodeWriter, csString, terminate } from "./emit.js";
import { formatNumber } from "./values.js";

export type GeneratorMeta = {
  needsGuiCapability: boolean;
  needsGraphicsCapability: boolean;
  iconSourcePath?: string;
  iconTargetBasename?: string;
  iconNeedsRasterConversion: boolean;
  /** Some names are declared `dynamic`, which needs the C# runtime binder. */
  needsDynamicBinding: boolean;
};

export type Generated = { source: string; meta: GeneratorMeta };

/** Extensions that have to become an .ico before WinForms can use them as a window icon. */
export const RASTER_EXTENSIONS = new Set([".png", ".jpg", ".jpeg", ".bmp", ".gif"]);

type UIWindow = Extract<Stmt, { k: "UIWindow" }>;
type Helper = "Display" | "Divide";

// Support methods appended to the generated class; they give C# the evaluator's division and display rules.
const HELPERS: Record<Helper, string[]> = {
  Display: [
    "static string Display(object value) {",
    "    if (value == null) return \"unset\";",
    "    if (value is bool) return (bool)value ? \"true\" : \"false\";",
    "    if (value is double) {",
    "        double number = (double)value;",
    "        string format = number == Math.Floor(number) && !double.IsInfinity(number) ? \"0.0\" : \"R\";",
    "        return number.ToString(format, System.Globalization.CultureInfo.InvariantCulture);",
    "    }",
    "    return Convert.ToString(value, System.Globalization.CultureInfo.InvariantCulture);",
    "}",
  ],
  Divide: [
    "static double Divide(double left, double right) {",
    "    if (right == 0) throw new DivideByZeroException(\"Division by zero!\");",
    "    return left / right;",
    "}",
  ],
};

/**
 * Lowers a program to a C# console / WinForms program. One instance per
 * generation pass; the capability flags live on the pass, so anything found
 * deep inside a handler or loop still reaches the result.
 */
export class CodeGenerator {
  private out = new CodeWriter(2);
  private meta: GeneratorMeta = {
    needsGuiCapability: false,
    needsGraphicsCapability: false,
    iconNeedsRasterConversion: false,
    needsDynamicBinding: false,
  };
  private declared = new Set<string>(); // one flat scope, like the evaluator's environment
  private helpers = new Set<Helper>();
  private counters = { form: 0, label: 0, button: 0, picture: 0 };
  private used = false;

  generate(program: Program, className: string): Generated {
    if (this.used) throw new Error("CodeGenerator instances are single-use");
    this.used = true;
    this.hoist(program);
    this.stmts(program);
    return { source: this.envelope(safeClassName(className)), meta: { ...this.meta } };
  }

  private envelope(className: string): string {
    const gui = this.meta.needsGuiCapability;
    const parts = ["using System;", "using System.IO;"];
    if (gui) parts.push("using System.Windows.Forms;");
    if (this.meta.needsGraphicsCapability) parts.push("using System.Drawing;");
    parts.push("", `public class ${className} {`, "    [STAThread]", "    public static void Main(string[] args) {");
    if (gui) {
      parts.push("        Application.EnableVisualStyles();");
      parts.push("        Application.SetCompatibleTextRenderingDefault(false);");
    }
    const body = this.out.toString();
    if (body) parts.push(body);
    parts.push("    }");
    for (const h of (["Display", "Divide"] as const)) {
      if (!this.helpers.has(h)) continue;
      parts.push("", ...HELPERS[h].map(l => "    " + l));
    }
    parts.push("}");
    return parts.join("\n");
  }

  /**
   * Names first declared inside a block or handler, and names that are only
   * ever assigned or read, are declared `dynamic` at the top of Main so every
   * statement sees them.
   */
  private hoist(program: Program) {
    const { nested, used, declared } = collectNames(program);
    for (const n of used) {
      if (declared.has(n) && !nested.has(n)) continue;
      this.declared.add(n);
      this.meta.needsDynamicBinding = true;
      this.out.line(`dynamic ${n} = ${nested.has(n) ? "null" : "0"};`);
    }
  }

  private useGui() {
    this.meta.needsGuiCapability = true;
    this.meta.needsGraphicsCapability = true;
  }

  /* -------- Statements -------- */
  private stmts(list: Stmt[]) { for (const s of list) this.stmt(s); }

  private stmt(s: Stmt): void {
    const out = this.out;
    switch (s.k) {
      case "VarDecl": {
        const init = s.init ? this.expr(s.init) : "null";
        if (this.declared.has(s.n)) { out.line(`${s.n} = ${init};`); return; }
        this.declared.add(s.n);
        out.line(s.init ? `var ${s.n} = ${init};` : `object ${s.n} = null;`);
        return;
      }
      case "Print": out.line(`Console.WriteLine(${this.text(s.e)});`); return;
      case "Pause":
        if (s.e) out.line(`_ = ${this.expr(s.e)};`);
        out.line("Console.ReadKey(true);");
        return;
      case "MessageBox":
        this.useGui();
        out.line(`MessageBox.Show(${this.text(s.e)});`);
        return;
      case "If": {
        const then = s.then, otherwise = s.else;
        out.block(`if (${this.expr(s.c)}) {`, () => this.stmts(then), otherwise ? "} else {" : "}");
        if (otherwise) out.indented(() => this.stmts(otherwise)).line("}");
        return;
      }
      case "While": {
        const body = s.body;
        out.block(`while (${this.expr(s.c)}) {`, () => this.stmts(body));
        return;
      }
      case "UIWindow": this.window(s); return;
      case "ExprS": out.line(`${this.expr(s.e)};`); return;
      case "Raw": out.verbatim(terminate(s.text)); return;
    }
  }

  /* -------- ui_window -------- */
  private window(s: UIWindow) {
    this.useGui();
    const form = `form_${++this.counters.form}`;
    this.out
      .line(`Form ${form} = new Form();`)
      .line(`${form}.Text = ${this.expr(s.title)};`)
      .line(`${form}.ClientSize = new System.Drawing.Size(${this.expr(s.width)}, ${this.expr(s.height)});`);
    for (const u of s.body) this.uiStmt(u, form);
    this.out.line(`Application.Run(${form});`);
  }

  private uiStmt(u: UIStmt, form: string): void {
    const out = this.out;
    switch (u.k) {
      case "SetIcon": {
        const file = this.resolveIcon(u.path);
        const pic = `pic_${++this.counters.picture}`;
        out.block("try {", () => {
          out.line(`${form}.Icon = new System.Drawing.Icon(System.IO.Path.Combine(AppDomain.CurrentDomain.BaseDirectory, ${csString(file)}));`);
        }, "} catch (Exception iconError) {");
        out.indented(() => {
          out.line(`Console.WriteLine("Icon load error: " + iconError.Message);`)
            .line(`PictureBox ${pic} = new PictureBox();`)
            .line(`${pic}.SizeMode = PictureBoxSizeMode.Zoom;`)
            .line(`${pic}.SetBounds(8, 8, 64, 64);`)
            .line(`${form}.Controls.Add(${pic});`);
        }).line("}");
        return;
      }
      case "Label": {
        this.useGui();
        const lbl = `lbl_${++this.counters.label}`;
        out.line(`Label ${lbl} = new Label() { Text = ${this.expr(u.text)}, AutoSize = true };`);
        if (u.x && u.y) {
          const w = u.w ? this.expr(u.w) : "200";
          const h = u.h ? this.expr(u.h) : "24";
          out.line(`${lbl}.SetBounds(${this.expr(u.x)}, ${this.expr(u.y)}, ${w}, ${h});`);
        } else {
          out.line(`${lbl}.Location = new System.Drawing.Point(80, 20);`);
        }
        out.line(`${form}.Controls.Add(${lbl});`);
        return;
      }
      case "Button": {
        this.useGui();
        const btn = `btn_${++this.counters.button}`;
        const onClick = u.onClick;
        out.line(`Button ${btn} = new Button() { Text = ${this.expr(u.text)} };`);
        if (u.x && u.y) out.line(`${btn}.SetBounds(${this.expr(u.x)}, ${this.expr(u.y)}, 100, 30);`);
        else out.line(`${btn}.SetBounds(80, 100, 100, 30);`);
        if (onClick) out.block(`${btn}.Click += (sender, eventArgs) => {`, () => this.stmts(onClick), "};");
        out.line(`${form}.Controls.Add(${btn});`);
        return;
      }
      default: this.stmt(u);
    }
  }

  // Decides the file name the generated program loads; the host converts or copies it.
  private resolveIcon(path: string): string {
    const base = win32.basename(path);
    const ext = win32.extname(base).toLowerCase();
    const raster = RASTER_EXTENSIONS.has(ext);
    const target = raster ? base.slice(0, base.length - ext.length) + ".ico" : base;
    this.meta.iconSourcePath = path;
    this.meta.iconTargetBasename = target;
    this.meta.iconNeedsRasterConversion = raster;
    return target;
  }

  /* -------- Expressions -------- */

  // Nested operands are always parenthesised so C# precedence cannot regroup them.
  private expr(e: Expr): string {
    switch (e.k) {
      case "Lit": return e.v.k === "Text" ? csString(e.v.v) : formatNumber(e.v);
      case "Var": return e.n;
      case "Assign": return `${e.n} = ${this.expr(e.v)}`;
      case "Binary":
        if (e.op === "/") { this.helpers.add("Divide"); return `Divide(${this.expr(e.l)}, ${this.expr(e.r)})`; }
        if (e.op === "+" && isText(e)) return `${this.textOperand(e.l)} + ${this.textOperand(e.r)}`;
        return `${this.operand(e.l)} ${e.op} ${this.operand(e.r)}`;
    }
  }

  // an expression as a C# string rendered the way the evaluator prints it
  private text(e: Expr): string {
    if (isText(e)) return this.expr(e);
    this.helpers.add("Display");
    return `Display(${this.expr(e)})`;
  }

  private textOperand(e: Expr): string {
    return isText(e) ? this.operand(e) : this.text(e);
  }

  private operand(e: Expr): string {
    return e.k === "Binary" || e.k === "Assign" ? `(${this.expr(e)})` : this.expr(e);
  }
}

// statically known to be text: a text literal, or a '+' with text on either side
function isText(e: Expr): boolean {
  switch (e.k) {
    case "Lit": return e.v.k === "Text";
    case "Assign": return isText(e.v);
    case "Binary": return e.op === "+" && (isText(e.l) || isText(e.r));
    case "Var": return false;
  }
}

type Names = { nested: Set<string>; used: Set<string>; declared: Set<string> };

function collectNames(program: Program): Names {
  const names: Names = { nested: new Set(), used: new Set(), declared: new Set() };
  const expr = (e: Expr): void => {
    switch (e.k) {
      case "Var": names.used.add(e.n); return;
      case "Assign": names.used.add(e.n); expr(e.v); return;
      case "Binary": expr(e.l); expr(e.r); return;
      case "Lit": return;
    }
  };
  const visit = (list: readonly (Stmt | UIStmt)[], nested: boolean): void => {
    for (const s of list) {
      switch (s.k) {
        case "VarDecl":
          names.used.add(s.n);
          names.declared.add(s.n);
          if (nested) names.nested.add(s.n);
          if (s.init) expr(s.init);
          break;
        case "Print": case "MessageBox": case "ExprS": expr(s.e); break;
        case "Pause": if (s.e) expr(s.e); break;
        case "If": expr(s.c); visit(s.then, true); if (s.else) visit(s.else, true); break;
        case "While": expr(s.c); visit(s.body, true); break;
        case "UIWindow": [s.title, s.width, s.height].forEach(expr); visit(s.body, nested); break;
        case "Label": [s.text, s.x, s.y, s.w, s.h].forEach(e => { if (e) expr(e); }); break;
        case "Button":
          [s.text, s.x, s.y].forEach(e => { if (e) expr(e); });
          if (s.onClick) visit(s.onClick, true);
          break;
      }
    }
  };
  visit(program, false);
  return names;
}

function safeClassName(name: string): string {
  const cleaned = name.replace(/[^A-Za-z0-9_]/g, "_");
  if (!cleaned) return "NovaProgram";
  return /^[0-9]/.test(cleaned) ? "_" + cleaned : cleaned;
}

export function generate(program: Program, className = "NovaProgram"): Generated {
  return new CodeGenerator().generate(program, className);
}

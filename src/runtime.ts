import { Expr, Program, Stmt } from "./ast.js";
import { RuntimeError } from "./errors.js";
import { BinaryOp } from "./tokens.js";
import {
  Value, NumberValue, UNSET,
  int, float, text, bool,
  display, truthy, equals,
} from "./values.js";

/* Environment: one flat scope per run */
export class Environment {
  private m = new Map<string, Value>();
  def(n: string, v: Value): void { this.m.set(n, v); }
  set(n: string, v: Value): void { this.m.set(n, v); }
  /** Undeclared names read as integer 0. */
  get(n: string): Value { return this.m.get(n) ?? int(0); }
  has(n: string): boolean { return this.m.has(n); }
  names(): string[] { return [...this.m.keys()]; }
}

/** Whatever delivers the "continue" after a pause (a key press, Enter, a test stub). */
export interface AcknowledgmentSource {
  waitForAck(): void | Promise<void>;
}

/* Capabilities: the only ways a run touches the outside world */
export type Capabilities = {
  writeLine: (line: string) => void;
  ack: AcknowledgmentSource;
  /** Without it `ui_message` is rejected like the other UI statements. */
  messageBox?: (text: string) => void | Promise<void>;
};

export const consoleCapabilities = (ack: AcknowledgmentSource): Capabilities => ({
  writeLine: (line) => console.log(line),
  ack,
});

/* ---------------- Interpreter (ASYNC) ---------------- */
export class Interpreter {
  constructor(private caps: Capabilities) {}

  async run(program: Program, env: Environment = new Environment()): Promise<Environment> {
    await this.block(program, env);
    return env;
  }

  async block(stmts: Stmt[], env: Environment) { for (const s of stmts) await this.exec(s, env); }

  private async exec(s: Stmt, env: Environment): Promise<void> {
    switch (s.k) {
      case "ExprS": await this.eval(s.e, env); return;
      case "VarDecl": env.def(s.n, s.init ? await this.eval(s.init, env) : UNSET); return;
      case "Print": this.caps.writeLine(display(await this.eval(s.e, env))); return;
      case "Pause": {
        if (s.e) await this.eval(s.e, env);
        await this.caps.ack.waitForAck();
        return;
      }
      case "MessageBox": {
        const msg = display(await this.eval(s.e, env));
        if (!this.caps.messageBox) throw unsupported("ui_message");
        await this.caps.messageBox(msg);
        return;
      }
      case "If": {
        const branch = truthy(await this.eval(s.c, env)) ? s.then : s.else;
        if (branch) await this.block(branch, env);
        return;
      }
      case "While": {
        while (truthy(await this.eval(s.c, env))) await this.block(s.body, env);
        return;
      }
      case "UIWindow": throw unsupported("ui_window");
      case "Raw": throw unsupported(`'${s.text}'`);
    }
  }

  async eval(e: Expr, env: Environment): Promise<Value> {
    switch (e.k) {
      case "Lit": return e.v;
      case "Var": return env.get(e.n);
      case "Assign": { const v = await this.eval(e.v, env); env.set(e.n, v); return v; }
      case "Binary": {
        const l = await this.eval(e.l, env);
        const r = await this.eval(e.r, env);
        return binary(e.op, l, r);
      }
    }
  }
}

const unsupported = (what: string) =>
  new RuntimeError("UndefinedBehavior", `${what} cannot be executed directly; translate the program instead`);

export function binary(op: BinaryOp, l: Value, r: Value): Value {
  switch (op) {
    case "+":
      if (l.k === "Text" || r.k === "Text") return text(display(l) + display(r));
      return arith(op, l, r, (a, b) => a + b);
    case "-": return arith(op, l, r, (a, b) => a - b);
    case "*": return arith(op, l, r, (a, b) => a * b);
    case "/": {
      const [a, b] = numbers(op, l, r);
      if (b.v === 0) throw new RuntimeError("DivisionByZero", "Division by zero!");
      return float(a.v / b.v);
    }
    case "==": return bool(equals(l, r));
    case "<": return bool(compare(op, l, r) < 0);
    case ">": return bool(compare(op, l, r) > 0);
  }
}

function numbers(op: BinaryOp, l: Value, r: Value): [NumberValue, NumberValue] {
  if (l.k === "Number" && r.k === "Number") return [l, r];
  throw new RuntimeError("UndefinedBehavior", `Operator '${op}' needs numbers, got ${l.k} and ${r.k}`);
}

// integer op integer stays integer, a float on either side wins
function arith(op: BinaryOp, l: Value, r: Value, f: (a: number, b: number) => number): NumberValue {
  const [a, b] = numbers(op, l, r);
  const v = f(a.v, b.v);
  return a.float || b.float ? float(v) : int(v);
}

function compare(op: BinaryOp, l: Value, r: Value): number {
  if (l.k === "Text" && r.k === "Text") return l.v < r.v ? -1 : l.v > r.v ? 1 : 0;
  const [a, b] = numbers(op, l, r);
  return a.v - b.v;
}

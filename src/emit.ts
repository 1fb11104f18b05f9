/* Output layer of the code generator: indentation and C# literal escaping */

const INDENT = "    ";

export class CodeWriter {
  private lines: string[] = [];
  constructor(private level = 0) {}

  line(code: string): this {
    this.lines.push(INDENT.repeat(this.level) + code);
    return this;
  }

  /** Multi-line text keeps its own relative indentation. */
  verbatim(code: string): this {
    for (const l of code.split("\n")) this.line(l);
    return this;
  }

  indented(body: () => void): this {
    this.level++;
    try { body(); } finally { this.level--; }
    return this;
  }

  /** `open` line, body one level deeper, `close` line. */
  block(open: string, body: () => void, close = "}"): this {
    return this.line(open).indented(body).line(close);
  }

  toString(): string { return this.lines.join("\n"); }
}

const ESCAPES: Record<string, string> = {
  "\\": "\\\\",
  "\"": "\\\"",
  "\n": "\\n",
  "\r": "\\r",
  "\t": "\\t",
};

export function csString(value: string): string {
  return `"${value.replace(/[\\"\n\r\t]/g, (ch) => ESCAPES[ch] ?? ch)}"`;
}

/** Adds the `;` a statement needs unless the line already ends one or opens/closes a block. */
export function terminate(code: string): string {
  const t = code.trimEnd();
  return /[;{}]$/.test(t) ? t : t + ";";
}

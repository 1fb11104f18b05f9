#!/usr/bin/env node
import * as fs from "fs";
import * as path from "path";
import * as readline from "readline";
import { runSource } from "./compile.js";
import { AcknowledgmentSource, Capabilities, Environment, consoleCapabilities } from "./runtime.js";
import { IconAssets, OutputKind, buildProgram } from "./build.js";

const USAGE = `usage:
  nova                      interactive session
  nova [run] <file.nova>    run a program
  nova build <file.nova> [--class Name] [--out file.cs] [--target exe|library] [--ref a.dll,b.dll]`;

/* --- stdin helpers --- */
function ask(rl: readline.Interface, prompt: string): Promise<string | null> {
  return new Promise(resolve => {
    const onClose = () => resolve(null);
    rl.once("close", onClose);
    rl.question(prompt, answer => { rl.off("close", onClose); resolve(answer); });
  });
}

// pause waits for Enter; the REPL shares its own readline so input is not split
const enterAck = (shared?: readline.Interface): AcknowledgmentSource => ({
  async waitForAck() {
    if (shared) { await ask(shared, "Paused. Press Enter to continue..."); return; }
    const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
    try { await ask(rl, "Paused. Press Enter to continue..."); }
    finally { rl.close(); }
  },
});

const consoleCaps = (ack: AcknowledgmentSource): Capabilities => ({
  ...consoleCapabilities(ack),
  messageBox: text => console.log(`[message] ${text}`),
});

/* --- icon files for 'build' --- */
const diskAssets: IconAssets = {
  exists: async p => fs.existsSync(p),
  copy: (from, to) => fs.promises.copyFile(from, to),
};

async function runFile(file: string) {
  const src = fs.readFileSync(file, "utf8");
  await runSource(src, consoleCaps(enterAck()));
}

async function buildFile(file: string, flags: Map<string, string>) {
  const target = flags.get("--target") ?? "exe";
  if (target !== "exe" && target !== "library") throw new Error(`Unknown target '${target}' (exe or library)`);
  const outputKind: OutputKind = target;
  const src = fs.readFileSync(file, "utf8");
  const extraReferences = (flags.get("--ref") ?? "").split(",").map(r => r.trim()).filter(Boolean);
  const report = await buildProgram(
    { sourcePath: file, source: src, className: flags.get("--class"), outputKind, extraReferences },
    { assets: diskAssets },
  );
  for (const w of report.warnings) console.error(`[BUILD] ${w}`);
  const parsed = path.parse(file);
  const out = flags.get("--out") ?? path.join(parsed.dir, parsed.name + ".cs");
  fs.writeFileSync(out, report.generated.source);
  console.log(`Wrote ${out}`);
  console.log(`  target:     ${report.target}`);
  console.log(`  references: ${report.references.join(";") || "(none)"}`);
  console.log(`  output:     ${report.outputPath}`);
}

// braces outside string literals are balanced
const complete = (buf: string) => {
  const bare = buf.replace(/"[^"]*"/g, "");
  return (bare.match(/\{/g) ?? []).length <= (bare.match(/\}/g) ?? []).length;
};

async function repl() {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  const env = new Environment();
  const caps = consoleCaps(enterAck(rl));
  let buf = "";
  for (;;) {
    const line = await ask(rl, buf ? "...> " : "nova> ");
    if (line === null) break;
    buf += line + "\n";
    if (!complete(buf)) continue;
    try { await runSource(buf, caps, env); }
    catch (e) { report(e); }
    buf = "";
  }
  rl.close();
}

function report(e: unknown) {
  console.error(e instanceof Error ? e.message : String(e));
}

/* --- argv & start --- */
function parseArgs(argv: string[]) {
  const flags = new Map<string, string>();
  const positional: string[] = [];
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (!a.startsWith("--")) { positional.push(a); continue; }
    const eq = a.indexOf("=");
    if (eq > 0) flags.set(a.slice(0, eq), a.slice(eq + 1));
    else flags.set(a, argv[++i] ?? "");
  }
  return { flags, positional };
}

const { flags, positional } = parseArgs(process.argv.slice(2));
const [cmd, file] = positional;

try {
  if (flags.has("--help")) console.log(USAGE);
  else if (cmd === "build" || cmd === "run") {
    if (!file) { console.error(USAGE); process.exitCode = 2; }
    else if (cmd === "build") await buildFile(file, flags);
    else await runFile(file);
  }
  else if (cmd) await runFile(cmd);
  else await repl();
} catch (e) {
  report(e);
  process.exitCode = 1;
}

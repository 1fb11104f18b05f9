import { Lexer } from "./lexer.js";
import { Parser } from "./parser.js";
import { Capabilities, Environment, Interpreter } from "./runtime.js";
import { Generated, generate } from "./codegen.js";
import type { Program } from "./ast.js";

/**
 * compileSource: text → AST
 * No optimisation passes, just lex + parse. Characters outside the language
 * only pass on raw window lines; anywhere else the parser reports a LexError.
 */
export function compileSource(source: string): Program {
  const toks = new Lexer(source, { strayCharacters: true }).lex();
  return new Parser(toks, source).parse();
}

/** Runs a program directly. Pass `env` to keep variables between calls (REPL). */
export async function runSource(source: string, caps: Capabilities, env?: Environment): Promise<Environment> {
  const program = compileSource(source);
  return await new Interpreter(caps).run(program, env);
}

export function translateSource(source: string, className = "NovaProgram"): Generated {
  return generate(compileSource(source), className);
}

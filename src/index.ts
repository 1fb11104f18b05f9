// Barrel: lexer → parser → { interpreter | code generator }

export { Lexer, tokenize } from "./lexer.js";
export type { LexOptions } from "./lexer.js";
export { Parser, parse } from "./parser.js";
export { Interpreter, Environment, consoleCapabilities, binary } from "./runtime.js";
export type { Capabilities, AcknowledgmentSource } from "./runtime.js";
export { CodeGenerator, generate, RASTER_EXTENSIONS } from "./codegen.js";
export type { Generated, GeneratorMeta } from "./codegen.js";
export { compileSource, runSource, translateSource } from "./compile.js";
export * from "./build.js";
export * from "./errors.js";
export * from "./tokens.js";
export * from "./values.js";
export * from "./ast.js";

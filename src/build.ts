import * as path from "path";
import { translateSource } from "./compile.js";
import type { Generated, GeneratorMeta } from "./codegen.js";

/* Collaborators the host plugs in; nothing here touches the disk or a compiler itself. */

export interface ImageConverter {
  /** Writes an icon-format file at `targetPath`; false when the image could not be converted. */
  convert(sourcePath: string, targetPath: string): Promise<boolean>;
}

export interface IconAssets {
  exists(filePath: string): Promise<boolean>;
  copy(from: string, to: string): Promise<void>;
}

export type OutputKind = "exe" | "library";
export type TargetKind = "exe" | "winexe" | "library";

export type ToolchainRequest = {
  source: string;
  references: string[];
  target: TargetKind;
  outputPath: string;
};

export type ToolchainResult = { success: boolean; diagnostics: string };

export interface ToolchainInvoker {
  build(req: ToolchainRequest): Promise<ToolchainResult>;
}

export type BuildRequest = {
  sourcePath: string;
  source: string;
  className?: string;
  outputKind?: OutputKind;
  /** Assemblies the program's raw lines need beyond the ones the generator asks for. */
  extraReferences?: string[];
};

export type BuildCollaborators = {
  assets: IconAssets;
  images?: ImageConverter;
  toolchain?: ToolchainInvoker;
};

export type BuildReport = {
  generated: Generated;
  references: string[];
  target: TargetKind;
  outputPath: string;
  /**
   * Icon problems; the generated program falls back at run time, so these
   * never fail a build. Showing them is up to the host.
   */
  warnings: string[];
  toolchain?: ToolchainResult;
};

export function requiredReferences(meta: GeneratorMeta): string[] {
  const refs: string[] = [];
  if (meta.needsGuiCapability) refs.push("System.Windows.Forms.dll");
  if (meta.needsGraphicsCapability) refs.push("System.Drawing.dll");
  if (meta.needsDynamicBinding) refs.push("Microsoft.CSharp.dll", "System.Core.dll");
  return refs;
}

export function targetKind(meta: GeneratorMeta, kind: OutputKind = "exe"): TargetKind {
  if (kind === "library") return "library";
  return meta.needsGuiCapability ? "winexe" : "exe";
}

export function outputPathFor(sourcePath: string, kind: OutputKind = "exe"): string {
  const parsed = path.parse(sourcePath);
  return path.join(parsed.dir, parsed.name + (kind === "library" ? ".dll" : ".exe"));
}

async function placeIcon(meta: GeneratorMeta, dir: string, deps: BuildCollaborators, warnings: string[]) {
  if (!meta.iconSourcePath || !meta.iconTargetBasename) return;
  const from = path.resolve(dir, meta.iconSourcePath);
  const to = path.join(dir, meta.iconTargetBasename);
  if (!(await deps.assets.exists(from))) {
    warnings.push(`Icon not found: ${from}`);
    return;
  }
  if (meta.iconNeedsRasterConversion) {
    if (!deps.images) warnings.push(`No image converter configured, ${to} has to be created from ${from}`);
    else if (!(await deps.images.convert(from, to))) warnings.push(`Could not convert ${from} to ${to}`);
    return;
  }
  if (path.resolve(to) !== from) await deps.assets.copy(from, to);
}

export async function buildProgram(req: BuildRequest, deps: BuildCollaborators): Promise<BuildReport> {
  const kind = req.outputKind ?? "exe";
  const generated = translateSource(req.source, req.className);
  const warnings: string[] = [];
  await placeIcon(generated.meta, path.dirname(req.sourcePath), deps, warnings);

  const references = [...new Set([...requiredReferences(generated.meta), ...(req.extraReferences ?? [])])];
  const target = targetKind(generated.meta, kind);
  const outputPath = outputPathFor(req.sourcePath, kind);
  const toolchain = deps.toolchain
    ? await deps.toolchain.build({ source: generated.source, references, target, outputPath })
    : undefined;
  return { generated, references, target, outputPath, warnings, toolchain };
}

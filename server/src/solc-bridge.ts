/**
 * solc bridge: drives `solc --standard-json` and converts its output into
 * an `AnalysisSnapshot`.
 *
 * solc reports UTF-8 byte offsets as `"start:length:fileIndex"`. They are
 * turned into UTF-16 spans here, so nothing past this module sees bytes.
 */
import { execFileSync } from "child_process";
import * as path from "path";

import { lineLength, toLineColumn, byteToUtf16Mapper } from "./position";
import { isRecord, formatRemapping } from "./settings";
import type {
  AnalysisEngine,
  AnalysisInput,
  AnalysisSnapshot,
  AnalysisStage,
  Declaration,
  SyntaxNode,
} from "./syntax";
import type { CompilerOptions, EngineDiagnostic, RevertStrings, SourceReference, SourceSpan } from "./types";
import { loadTextCached } from "./utils";

/** Text of a source solc loaded itself, by source unit name. */
export type SourceReader = (sourceName: string) => string | undefined;

export type CompileFunction = (input: string) => string;

export type StandardJsonInput = {
  language: "Solidity";
  sources: Record<string, { content: string }>;
  settings: {
    evmVersion?: string;
    debug: { revertStrings: RevertStrings };
    remappings: string[];
    modelChecker: {
      engine: string;
      contracts?: Record<string, string[]>;
      targets?: string[];
      timeout?: number;
    };
    outputSelection: Record<string, Record<string, string[]>>;
  };
};

const DECLARATION_NODE_TYPES = new Set([
  "ContractDefinition",
  "FunctionDefinition",
  "ModifierDefinition",
  "EventDefinition",
  "ErrorDefinition",
  "VariableDeclaration",
  "StructDefinition",
  "EnumDefinition",
  "EnumValue",
  "UserDefinedValueTypeDefinition",
]);

// ---- Input ----

export function buildStandardJsonInput(
  sources: ReadonlyMap<string, string>,
  options: CompilerOptions,
): StandardJsonInput {
  const input: StandardJsonInput = {
    language: "Solidity",
    sources: {},
    settings: {
      debug: { revertStrings: options.revertStrings },
      remappings: options.remappings.map(formatRemapping),
      modelChecker: { engine: options.modelChecker.engine },
      outputSelection: { "*": { "": ["ast"] } },
    },
  };

  for (const [name, content] of sources) input.sources[name] = { content };
  if (options.evmVersion !== undefined) input.settings.evmVersion = options.evmVersion;

  const mc = options.modelChecker;
  if (Object.keys(mc.contracts).length > 0) input.settings.modelChecker.contracts = mc.contracts;
  if (mc.targets.length > 0) input.settings.modelChecker.targets = [...mc.targets];
  if (mc.timeout !== undefined) input.settings.modelChecker.timeout = mc.timeout;

  return input;
}

// ---- Output ----

function str(v: unknown): string | undefined {
  return typeof v === "string" ? v : undefined;
}

function num(v: unknown): number | undefined {
  return typeof v === "number" && Number.isFinite(v) ? v : undefined;
}

function numbers(v: unknown): number[] {
  return Array.isArray(v) ? v.filter((x): x is number => typeof x === "number") : [];
}

class ConversionContext {
  readonly sources = new Map<string, string>();
  readonly declarations = new Map<number, Declaration>();
  private readonly names = new Map<number, string>();
  private readonly mappers = new Map<string, (byteOff: number) => number>();

  constructor(
    requested: ReadonlyMap<string, string>,
    private readonly readSource: SourceReader,
  ) {
    for (const [name, text] of requested) this.sources.set(name, text);
  }

  registerSource(name: string, fileIndex: number | undefined): void {
    if (fileIndex !== undefined) this.names.set(fileIndex, name);
  }

  text(name: string): string | undefined {
    const known = this.sources.get(name);
    if (known !== undefined) return known;
    const loaded = this.readSource(name);
    if (loaded !== undefined) this.sources.set(name, loaded);
    return loaded;
  }

  /** UTF-16 index of byte `byteOff` in `name`, or -1 when the text is unknown. */
  toIndex(name: string, byteOff: number): number {
    let mapper = this.mappers.get(name);
    if (!mapper) {
      const text = this.text(name);
      if (text === undefined) return -1;
      mapper = byteToUtf16Mapper(text);
      this.mappers.set(name, mapper);
    }
    return mapper(byteOff);
  }

  /** `"start:length:fileIndex"`; unknown files give an empty path and -1 offsets. */
  span(src: unknown): SourceSpan {
    const parts = (str(src) ?? "").split(":").map((p) => Number.parseInt(p, 10));
    const [start, length, fileIndex] = parts;
    const name = fileIndex === undefined ? undefined : this.names.get(fileIndex);
    if (name === undefined || !(start >= 0) || !(length >= 0)) return { path: "", start: -1, end: -1 };

    const s = this.toIndex(name, start);
    const e = this.toIndex(name, start + length);
    if (s < 0 || e < 0) return { path: "", start: -1, end: -1 };
    return { path: name, start: s, end: e };
  }
}

function documentationOf(v: unknown): string | undefined {
  if (typeof v === "string") return v;
  if (isRecord(v)) return str(v.text);
  return undefined;
}

function typeStringOf(raw: Record<string, unknown>): string | undefined {
  const td = raw.typeDescriptions;
  return isRecord(td) ? str(td.typeString) : undefined;
}

function collectChildren(v: unknown, ctx: ConversionContext, out: SyntaxNode[]): void {
  if (Array.isArray(v)) {
    for (const item of v) collectChildren(item, ctx, out);
    return;
  }
  if (!isRecord(v)) return;

  const node = convertNode(v, ctx);
  if (node) {
    out.push(node);
    return;
  }
  for (const [key, value] of Object.entries(v)) {
    if (key !== "typeDescriptions") collectChildren(value, ctx, out);
  }
}

function convertNode(raw: Record<string, unknown>, ctx: ConversionContext): SyntaxNode | undefined {
  const nodeType = str(raw.nodeType);
  const id = num(raw.id);
  if (nodeType === undefined || id === undefined || str(raw.src) === undefined) return undefined;

  const span = ctx.span(raw.src);
  const children: SyntaxNode[] = [];
  for (const [key, value] of Object.entries(raw)) {
    if (key !== "typeDescriptions") collectChildren(value, ctx, children);
  }
  children.sort((a, b) => a.span.start - b.span.start);

  const base = { id, span, children };
  const referenced = num(raw.referencedDeclaration);

  switch (nodeType) {
    case "Identifier":
      return {
        ...base,
        kind: "identifier",
        name: str(raw.name) ?? "",
        referencedDeclaration: referenced,
        candidateDeclarations: numbers(raw.overloadedDeclarations).filter((d) => d !== referenced),
        type: typeStringOf(raw),
      };
    case "IdentifierPath":
      return {
        ...base,
        kind: "qualifiedPath",
        path: (str(raw.name) ?? "").split(".").filter((s) => s !== ""),
        referencedDeclaration: referenced,
      };
    case "MemberAccess":
      return {
        ...base,
        kind: "memberAccess",
        memberName: str(raw.memberName) ?? "",
        memberSpan: raw.memberLocation === undefined ? undefined : ctx.span(raw.memberLocation),
        referencedDeclaration: referenced,
        type: typeStringOf(raw),
      };
    case "ImportDirective":
      return { ...base, kind: "importDirective", absolutePath: str(raw.absolutePath) };
  }

  if (DECLARATION_NODE_TYPES.has(nodeType)) {
    ctx.declarations.set(id, {
      id,
      name: str(raw.name) ?? "",
      nameSpan: raw.nameLocation === undefined ? undefined : ctx.span(raw.nameLocation),
      span,
      type: typeStringOf(raw),
      documentation: documentationOf(raw.documentation),
    });
    return { ...base, kind: "declaration", declaration: id };
  }

  return { ...base, kind: "other", nodeType };
}

const NO_LOCATION = { sourcePath: "", line: -1, startColumn: -1, endColumn: -1 };

/** Byte range `{file, start, end}` as a single-line reference; multi-line ranges end at the end of their first line. */
function toReference(message: string, loc: unknown, ctx: ConversionContext): SourceReference {
  if (!isRecord(loc)) return { message, ...NO_LOCATION };

  const file = str(loc.file) ?? "";
  const start = num(loc.start) ?? -1;
  const end = num(loc.end) ?? -1;
  const text = file ? ctx.text(file) : undefined;
  if (text === undefined || start < 0 || end < 0) return { message, ...NO_LOCATION, sourcePath: file };

  const from = toLineColumn(text, ctx.toIndex(file, start));
  const to = toLineColumn(text, ctx.toIndex(file, end));
  return {
    message,
    sourcePath: file,
    line: from.line,
    startColumn: from.column,
    endColumn: to.line === from.line ? to.column : lineLength(text, from.line),
  };
}

function parseErrorCode(v: unknown): number | undefined {
  if (typeof v === "number") return v;
  if (typeof v === "string" && /^\d+$/.test(v)) return Number.parseInt(v, 10);
  return undefined;
}

function convertError(raw: Record<string, unknown>, ctx: ConversionContext): EngineDiagnostic {
  const secondary: SourceReference[] = [];
  const locations = raw.secondarySourceLocations;
  if (Array.isArray(locations)) {
    for (const loc of locations) {
      if (isRecord(loc)) secondary.push(toReference(str(loc.message) ?? "", loc, ctx));
    }
  }

  const diag: EngineDiagnostic = {
    category: str(raw.type) ?? "Error",
    primary: toReference(str(raw.message) ?? "", raw.sourceLocation, ctx),
    secondary,
  };
  const code = parseErrorCode(raw.errorCode);
  if (code !== undefined) diag.code = code;
  return diag;
}

export function failureSnapshot(message: string, sources: ReadonlyMap<string, string>): AnalysisSnapshot {
  return {
    stage: "none",
    sources: new Map(sources),
    units: new Map(),
    declarations: new Map(),
    diagnostics: [{ category: "FatalError", primary: { message, ...NO_LOCATION }, secondary: [] }],
  };
}

/**
 * `"annotated"` when every requested source has an AST and no error has
 * error severity, `"parsed"` when some AST exists, `"none"` otherwise.
 */
export function convertStandardJsonOutput(
  raw: unknown,
  requested: ReadonlyMap<string, string>,
  readSource: SourceReader,
): AnalysisSnapshot {
  if (!isRecord(raw)) return failureSnapshot("solc produced no JSON object", requested);

  const ctx = new ConversionContext(requested, readSource);
  const outputSources = isRecord(raw.sources) ? raw.sources : {};
  const asts = new Map<string, Record<string, unknown>>();

  for (const [name, entry] of Object.entries(outputSources)) {
    if (!isRecord(entry)) continue;
    ctx.registerSource(name, num(entry.id));
    if (isRecord(entry.ast)) asts.set(name, entry.ast);
  }

  const units = new Map<string, SyntaxNode>();
  for (const [name, ast] of asts) {
    if (ctx.text(name) === undefined) continue;
    const unit = convertNode(ast, ctx);
    if (unit) units.set(name, unit);
  }

  const diagnostics: EngineDiagnostic[] = [];
  let hasError = false;
  if (Array.isArray(raw.errors)) {
    for (const err of raw.errors) {
      if (!isRecord(err)) continue;
      diagnostics.push(convertError(err, ctx));
      if (str(err.severity) !== "warning" && str(err.severity) !== "info") hasError = true;
    }
  }

  const allParsed = Array.from(requested.keys()).every((name) => units.has(name));
  let stage: AnalysisStage = "none";
  if (allParsed && !hasError) stage = "annotated";
  else if (units.size > 0) stage = "parsed";

  return { stage, sources: ctx.sources, units, declarations: ctx.declarations, diagnostics };
}

// ---- Engine ----

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class SolcEngine implements AnalysisEngine {
  constructor(
    private readonly compile: CompileFunction,
    private readonly readSource: SourceReader,
  ) {}

  analyze(input: AnalysisInput): AnalysisSnapshot {
    let raw: unknown;
    try {
      const json = JSON.stringify(buildStandardJsonInput(input.sources, input.options));
      raw = JSON.parse(this.compile(json));
    } catch (err) {
      return failureSnapshot(`solc failed: ${errorMessage(err)}`, input.sources);
    }
    return convertStandardJsonOutput(raw, input.sources, this.readSource);
  }
}

/** Runs `binary --standard-json` once per call, with the session base path as `--base-path`. */
export function spawnSolc(binary: string, getBasePath: () => string): CompileFunction {
  return (input) => {
    const basePath = getBasePath();
    const args = ["--standard-json"];
    if (basePath) args.push("--base-path", basePath);
    return execFileSync(binary, args, { input, encoding: "utf8", maxBuffer: 256 * 1024 * 1024 });
  };
}

/** Reads sources solc imported from disk, relative to the session base path. */
export function diskSourceReader(getBasePath: () => string): SourceReader {
  return (sourceName) => {
    const full = path.isAbsolute(sourceName) ? sourceName : path.join(getBasePath() || process.cwd(), sourceName);
    return loadTextCached(full);
  };
}

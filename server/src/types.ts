/**
 * Shared type definitions for the Solidity Language Server.
 */
import { DocumentHighlightKind } from "vscode-languageserver/node";

// ---- Positions ----

/** Zero-based line and UTF-16 column. */
export type LineColumn = { line: number; column: number };
export type LineColumnRange = { start: LineColumn; end: LineColumn };

export type DocumentPosition = { path: string; position: LineColumn };

/** Half-open UTF-16 offsets into the text of `path`. */
export type SourceSpan = { path: string; start: number; end: number };

// ---- Settings ----

export type Trace = "off" | "messages" | "verbose";

export const EVM_VERSIONS = [
  "homestead",
  "tangerineWhistle",
  "spuriousDragon",
  "byzantium",
  "constantinople",
  "petersburg",
  "istanbul",
  "berlin",
  "london",
  "paris",
  "shanghai",
  "cancun",
  "prague",
] as const;
export type EvmVersion = (typeof EVM_VERSIONS)[number];

export const REVERT_STRINGS = ["default", "strip", "debug", "verboseDebug"] as const;
export type RevertStrings = (typeof REVERT_STRINGS)[number];

export type Remapping = { context: string; prefix: string; target: string };

export const MODEL_CHECKER_ENGINES = ["all", "bmc", "chc", "none"] as const;
export type ModelCheckerEngine = (typeof MODEL_CHECKER_ENGINES)[number];

export const MODEL_CHECKER_TARGETS = [
  "constantCondition",
  "underflow",
  "overflow",
  "divByZero",
  "balance",
  "assert",
  "popEmptyArray",
  "outOfBounds",
] as const;
export type ModelCheckerTarget = (typeof MODEL_CHECKER_TARGETS)[number];

export type ModelCheckerSettings = {
  /** source unit name -> contract names; empty means every contract. */
  contracts: Record<string, string[]>;
  engine: ModelCheckerEngine;
  /** Empty means the solc default target set. */
  targets: ModelCheckerTarget[];
  timeout?: number;
};

export type CompilerOptions = {
  evmVersion?: EvmVersion;
  revertStrings: RevertStrings;
  remappings: Remapping[];
  modelChecker: ModelCheckerSettings;
};

export const DEFAULT_OPTIONS: CompilerOptions = {
  revertStrings: "default",
  remappings: [],
  modelChecker: {
    contracts: {},
    engine: "none",
    targets: [],
  },
};

// ---- Engine diagnostics ----

export type ErrorCategory =
  | "ParserError"
  | "DeclarationError"
  | "TypeError"
  | "SyntaxError"
  | "DocstringParsingError"
  | "CodeGenerationError"
  | "Warning"
  | (string & {});

/** `line`/`startColumn`/`endColumn` are -1 when the engine gave no location. */
export type SourceReference = {
  message: string;
  sourcePath: string;
  line: number;
  startColumn: number;
  endColumn: number;
};

export type EngineDiagnostic = {
  category: ErrorCategory;
  primary: SourceReference;
  code?: number;
  secondary: SourceReference[];
};

// ---- Highlights ----

export type HighlightEntry = {
  span: SourceSpan;
  /** `undefined` is the Unspecified kind. */
  kind: DocumentHighlightKind | undefined;
};

/**
 * Translation of engine errors into LSP diagnostics.
 */
import {
  Diagnostic,
  DiagnosticRelatedInformation,
  DiagnosticSeverity,
  Location,
} from "vscode-languageserver/node";

import type { AnalysisSnapshot } from "./syntax";
import type { EngineDiagnostic, ErrorCategory, SourceReference } from "./types";
import { lspRange, uriFromWorkspacePath } from "./utils";

export const DIAGNOSTIC_SOURCE = "solc";

const SEVERITY_BY_CATEGORY: ReadonlyMap<ErrorCategory, DiagnosticSeverity> = new Map<ErrorCategory, DiagnosticSeverity>([
  ["CodeGenerationError", DiagnosticSeverity.Error],
  ["DeclarationError", DiagnosticSeverity.Error],
  ["DocstringParsingError", DiagnosticSeverity.Error],
  ["ParserError", DiagnosticSeverity.Error],
  ["SyntaxError", DiagnosticSeverity.Error],
  ["TypeError", DiagnosticSeverity.Error],
  ["Warning", DiagnosticSeverity.Warning],
]);

export function toDiagnosticSeverity(category: ErrorCategory): DiagnosticSeverity {
  return SEVERITY_BY_CATEGORY.get(category) ?? DiagnosticSeverity.Error;
}

/** Single-line range as reported by the engine; missing locations clamp to 0:0. */
function referenceRange(ref: SourceReference) {
  return lspRange(ref.line, ref.startColumn, ref.line, ref.endColumn);
}

export function toDiagnostic(basePath: string, d: EngineDiagnostic): Diagnostic {
  const diag: Diagnostic = {
    source: DIAGNOSTIC_SOURCE,
    severity: toDiagnosticSeverity(d.category),
    message: d.primary.message,
    range: referenceRange(d.primary),
  };
  if (d.code !== undefined) diag.code = d.code;

  if (d.secondary.length > 0) {
    diag.relatedInformation = d.secondary.map((secondary) =>
      DiagnosticRelatedInformation.create(
        Location.create(uriFromWorkspacePath(basePath, secondary.sourcePath), referenceRange(secondary)),
        secondary.message,
      ),
    );
  }

  return diag;
}

/**
 * Groups the snapshot's diagnostics by the source of their primary
 * location. `compiledPath` comes first and every path in `trackedPaths`
 * gets an entry, so a publish for each key replaces stale results.
 * Diagnostics without a source land on `compiledPath`.
 */
export function diagnosticsByPath(
  basePath: string,
  compiledPath: string,
  trackedPaths: string[],
  snapshot: AnalysisSnapshot,
): Map<string, Diagnostic[]> {
  const out = new Map<string, Diagnostic[]>([[compiledPath, []]]);
  for (const p of trackedPaths) if (!out.has(p)) out.set(p, []);

  for (const d of snapshot.diagnostics) {
    const target = d.primary.sourcePath || compiledPath;
    const list = out.get(target);
    const diag = toDiagnostic(basePath, d);
    if (list) list.push(diag);
    else out.set(target, [diag]);
  }

  return out;
}

/**
 * Go-to-Definition for Solidity.
 *
 * Also hosts `locate`, the cursor -> syntax node lookup shared by hover,
 * highlights and references.
 *
 * Supports:
 *  - Identifiers       → the referenced declaration plus every overload candidate
 *  - Member accesses   → the referenced member declaration
 *  - Qualified paths   → the declaration the full path resolves to
 *  - Declarations      → their own name
 *  - Import directives → start of the imported file, when it is open
 */
import { Location } from "vscode-languageserver/node";

import type { SessionState } from "./context";
import { toOffset } from "./position";
import {
  type AnalysisSnapshot,
  type Declaration,
  type QualifiedPathNode,
  type SyntaxNode,
  annotatedDeclarations,
  assertNever,
  locateNode,
  referencedDeclaration,
} from "./syntax";
import type { DocumentPosition, SourceSpan } from "./types";
import { spanToLocation } from "./utils";

// ---- Locate ----

/** Valid only for the dispatch cycle that produced it. */
export type LocatedNode = {
  node: SyntaxNode;
  unit: SyntaxNode;
  snapshot: AnalysisSnapshot;
  path: string;
};

export function locate(state: SessionState, pos: DocumentPosition): LocatedNode | undefined {
  if (!state.compiler.hasSnapshot) state.compiler.compile(pos.path);

  if (!state.documents.has(pos.path)) return undefined;

  const snapshot = state.compiler.snapshot;
  if (!snapshot || snapshot.stage !== "annotated") return undefined;

  const unit = snapshot.units.get(pos.path);
  const text = snapshot.sources.get(pos.path);
  if (!unit || text === undefined) return undefined;

  const offset = toOffset(text, pos.position.line, pos.position.column);
  if (offset === undefined) return undefined;

  const node = locateNode(unit, offset);
  if (!node) return undefined;

  return { node, unit, snapshot, path: pos.path };
}

export function lastSegment(node: QualifiedPathNode): string {
  if (node.path.length === 0) throw new Error(`Qualified path node ${node.id} has no segments`);
  return node.path[node.path.length - 1];
}

// ---- Declaration locations ----

function isValidSpan(span: SourceSpan | undefined): span is SourceSpan {
  return !!span && span.path !== "" && span.start >= 0 && span.end >= span.start;
}

/** Name range if known, else the whole declaration; none for built-ins. */
export function declarationLocation(decl: Declaration | undefined): SourceSpan | undefined {
  if (!decl) return undefined;
  if (isValidSpan(decl.nameSpan)) return decl.nameSpan;
  if (isValidSpan(decl.span)) return decl.span;
  return undefined;
}

export function definitionSpans(state: SessionState, located: LocatedNode): SourceSpan[] {
  const { node, snapshot } = located;
  const out: SourceSpan[] = [];
  const push = (decl: Declaration | undefined) => {
    const span = declarationLocation(decl);
    if (span) out.push(span);
  };

  switch (node.kind) {
    case "importDirective":
      if (node.absolutePath !== undefined && state.documents.has(node.absolutePath)) {
        out.push({ path: node.absolutePath, start: 0, end: 0 });
      }
      break;
    case "identifier":
      for (const decl of annotatedDeclarations(node, snapshot)) push(decl);
      break;
    case "memberAccess":
      push(referencedDeclaration(node, snapshot));
      break;
    case "qualifiedPath":
      push(referencedDeclaration(node, snapshot));
      break;
    case "declaration":
      push(snapshot.declarations.get(node.declaration));
      break;
    case "other":
      break;
    default:
      assertNever(node);
  }

  return out;
}

export function sourceText(state: SessionState, snapshot: AnalysisSnapshot, path: string): string | undefined {
  return snapshot.sources.get(path) ?? state.documents.getText(path);
}

export function buildDefinition(state: SessionState, located: LocatedNode): Location[] {
  return definitionSpans(state, located).map((span) =>
    spanToLocation(state.basePath, span, sourceText(state, located.snapshot, span.path)),
  );
}

/**
 * Document highlights and Find All References for Solidity.
 *
 * Both resolve the node under the cursor to a list of declarations, each
 * paired with the name its occurrences are spelled with, and hand every
 * pair to the occurrence finder. Results are concatenated in candidate
 * order without de-duplication.
 */
import { DocumentHighlight, Location } from "vscode-languageserver/node";

import type { SessionState } from "./context";
import { type LocatedNode, lastSegment, sourceText } from "./definition";
import { type Declaration, annotatedDeclarations, assertNever, referencedDeclaration } from "./syntax";
import { spanToLocation, spanToRange } from "./utils";

export type KeyedDeclaration = { declaration: Declaration; name: string };

function single(decl: Declaration | undefined, name: string): KeyedDeclaration[] {
  return decl ? [{ declaration: decl, name }] : [];
}

/**
 * Identifiers are keyed by their own spelling, so an import alias
 * highlights the alias and not the original name.
 */
export function highlightTargets(located: LocatedNode): KeyedDeclaration[] {
  const { node, snapshot } = located;

  switch (node.kind) {
    case "declaration": {
      const decl = snapshot.declarations.get(node.declaration);
      return decl ? [{ declaration: decl, name: decl.name }] : [];
    }
    case "identifier":
      return annotatedDeclarations(node, snapshot).map((declaration) => ({ declaration, name: node.name }));
    case "qualifiedPath":
      return single(referencedDeclaration(node, snapshot), lastSegment(node));
    case "memberAccess":
      return single(referencedDeclaration(node, snapshot), node.memberName);
    case "importDirective":
    case "other":
      return [];
    default:
      return assertNever(node);
  }
}

/** Like `highlightTargets`, but identifiers are keyed by each declaration's own name. */
export function referenceTargets(located: LocatedNode): KeyedDeclaration[] {
  const { node, snapshot } = located;

  switch (node.kind) {
    case "declaration": {
      const decl = snapshot.declarations.get(node.declaration);
      return decl ? [{ declaration: decl, name: decl.name }] : [];
    }
    case "identifier":
      return annotatedDeclarations(node, snapshot).map((declaration) => ({ declaration, name: declaration.name }));
    case "qualifiedPath":
      return single(referencedDeclaration(node, snapshot), lastSegment(node));
    case "memberAccess":
      return single(referencedDeclaration(node, snapshot), node.memberName);
    case "importDirective":
    case "other":
      return [];
    default:
      return assertNever(node);
  }
}

export function buildDocumentHighlights(state: SessionState, located: LocatedNode): DocumentHighlight[] {
  const text = sourceText(state, located.snapshot, located.path);
  const out: DocumentHighlight[] = [];

  for (const { declaration, name } of highlightTargets(located)) {
    for (const hl of state.occurrences.collect(declaration, located.unit, name)) {
      const item: DocumentHighlight = { range: spanToRange(hl.span, text) };
      if (hl.kind !== undefined) item.kind = hl.kind;
      out.push(item);
    }
  }

  return out;
}

/**
 * Searches the current source unit first, then every other unit of the
 * snapshot in path order.
 */
export function buildReferences(state: SessionState, located: LocatedNode): Location[] {
  const { snapshot } = located;
  const others = Array.from(snapshot.units.keys())
    .filter((p) => p !== located.path)
    .sort();
  const unitPaths = [located.path, ...others];

  const out: Location[] = [];
  for (const { declaration, name } of referenceTargets(located)) {
    for (const unitPath of unitPaths) {
      const unit = snapshot.units.get(unitPath);
      if (!unit) continue;
      for (const hl of state.occurrences.collect(declaration, unit, name)) {
        out.push(spanToLocation(state.basePath, hl.span, sourceText(state, snapshot, hl.span.path)));
      }
    }
  }

  return out;
}

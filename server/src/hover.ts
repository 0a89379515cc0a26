/**
 * Hover provider for Solidity.
 *
 * Authored NatSpec documentation wins over the type; an empty string means
 * there is nothing to show.
 */
import { Hover, MarkupContent, MarkupKind } from "vscode-languageserver/node";

import { type LocatedNode, sourceText } from "./definition";
import type { SessionState } from "./context";
import { type AnalysisSnapshot, type SyntaxNode, assertNever, referencedDeclaration } from "./syntax";
import { spanToRange } from "./utils";

export function hoverText(snapshot: AnalysisSnapshot, node: SyntaxNode): string {
  switch (node.kind) {
    case "declaration": {
      const decl = snapshot.declarations.get(node.declaration);
      if (decl?.documentation) return decl.documentation;
      return decl?.type ?? "";
    }
    case "identifier":
    case "memberAccess":
      return node.type ?? "";
    case "qualifiedPath":
      return referencedDeclaration(node, snapshot)?.type ?? "";
    case "importDirective":
    case "other":
      return "";
    default:
      return assertNever(node);
  }
}

export function buildHover(state: SessionState, located: LocatedNode): Hover | undefined {
  const text = hoverText(located.snapshot, located.node);
  if (!text) return undefined;

  const content: MarkupContent = {
    kind: MarkupKind.Markdown,
    value: text,
  };
  return {
    contents: content,
    range: spanToRange(located.node.span, sourceText(state, located.snapshot, located.path)),
  };
}

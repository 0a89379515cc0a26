/**
 * Occurrence search: every place in one source unit where a declaration is
 * mentioned under a given name.
 */
import { DocumentHighlightKind } from "vscode-languageserver/node";

import { type Declaration, type SyntaxNode, walk } from "./syntax";
import type { HighlightEntry } from "./types";

export interface OccurrenceFinder {
  collect(declaration: Declaration, unit: SyntaxNode, name: string): HighlightEntry[];
}

/**
 * Walks the unit in source order. The defining name counts as a Text
 * highlight, identifiers and qualified paths as Read, member accesses as
 * Text on the member token.
 */
export const treeOccurrenceFinder: OccurrenceFinder = {
  collect(declaration, unit, name) {
    const out: HighlightEntry[] = [];

    for (const node of walk(unit)) {
      switch (node.kind) {
        case "declaration":
          if (node.declaration === declaration.id && declaration.name === name) {
            out.push({ span: declaration.nameSpan ?? node.span, kind: DocumentHighlightKind.Text });
          }
          break;
        case "identifier":
          if (node.referencedDeclaration === declaration.id && node.name === name) {
            out.push({ span: node.span, kind: DocumentHighlightKind.Read });
          }
          break;
        case "qualifiedPath":
          if (node.referencedDeclaration === declaration.id && node.path[node.path.length - 1] === name) {
            out.push({ span: node.span, kind: DocumentHighlightKind.Read });
          }
          break;
        case "memberAccess":
          if (node.referencedDeclaration === declaration.id && node.memberName === name) {
            out.push({ span: node.memberSpan ?? node.span, kind: DocumentHighlightKind.Text });
          }
          break;
        case "importDirective":
        case "other":
          break;
      }
    }

    return out;
  },
};

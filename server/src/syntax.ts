/**
 * Syntax model handed over by the analysis engine.
 *
 * Nodes form a closed union over the shapes the resolver distinguishes.
 * Declarations live in an arena owned by the snapshot and are referenced
 * by id, so nothing taken out of a snapshot outlives it except copied
 * spans and strings.
 */
import type { CompilerOptions, EngineDiagnostic, SourceSpan } from "./types";

type NodeBase = {
  id: number;
  span: SourceSpan;
  children: SyntaxNode[];
};

export type IdentifierNode = NodeBase & {
  kind: "identifier";
  name: string;
  referencedDeclaration?: number;
  /** Overload set when resolution is ambiguous, in engine order. */
  candidateDeclarations: number[];
  type?: string;
};

export type QualifiedPathNode = NodeBase & {
  kind: "qualifiedPath";
  path: string[];
  referencedDeclaration?: number;
};

export type MemberAccessNode = NodeBase & {
  kind: "memberAccess";
  memberName: string;
  memberSpan?: SourceSpan;
  referencedDeclaration?: number;
  type?: string;
};

export type ImportDirectiveNode = NodeBase & {
  kind: "importDirective";
  absolutePath?: string;
};

export type DeclarationNode = NodeBase & {
  kind: "declaration";
  declaration: number;
};

export type OtherNode = NodeBase & {
  kind: "other";
  nodeType: string;
};

export type SyntaxNode =
  | IdentifierNode
  | QualifiedPathNode
  | MemberAccessNode
  | ImportDirectiveNode
  | DeclarationNode
  | OtherNode;

export type Declaration = {
  id: number;
  name: string;
  nameSpan?: SourceSpan;
  span?: SourceSpan;
  type?: string;
  documentation?: string;
};

/** How far the engine got: resolver queries need `"annotated"`. */
export type AnalysisStage = "none" | "parsed" | "annotated";

export type AnalysisSnapshot = {
  readonly stage: AnalysisStage;
  /** Exact text of every source the engine saw, including imported files it read itself. */
  readonly sources: ReadonlyMap<string, string>;
  /** Source path -> root node of that source unit. */
  readonly units: ReadonlyMap<string, SyntaxNode>;
  readonly declarations: ReadonlyMap<number, Declaration>;
  readonly diagnostics: readonly EngineDiagnostic[];
};

export type AnalysisInput = {
  sources: ReadonlyMap<string, string>;
  options: CompilerOptions;
};

export interface AnalysisEngine {
  analyze(input: AnalysisInput): AnalysisSnapshot;
}

// ---- Tree helpers ----

export function containsOffset(span: SourceSpan, offset: number): boolean {
  return span.start <= offset && offset < span.end;
}

/**
 * Innermost node under `root` whose span contains `offset`. When a child
 * has the same span as its parent the child wins.
 */
export function locateNode(root: SyntaxNode, offset: number): SyntaxNode | undefined {
  if (!containsOffset(root.span, offset)) return undefined;

  let current = root;
  for (;;) {
    const next = current.children.find(
      (c) => c.span.path === root.span.path && containsOffset(c.span, offset),
    );
    if (!next) return current;
    current = next;
  }
}

export function* walk(root: SyntaxNode): Generator<SyntaxNode> {
  const stack: SyntaxNode[] = [root];
  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) break;
    yield node;
    for (let i = node.children.length - 1; i >= 0; i--) stack.push(node.children[i]);
  }
}

/** Primary referenced declaration followed by the ambiguous candidates. */
export function annotatedDeclarations(node: IdentifierNode, snapshot: AnalysisSnapshot): Declaration[] {
  const ids =
    node.referencedDeclaration === undefined
      ? node.candidateDeclarations
      : [node.referencedDeclaration, ...node.candidateDeclarations];

  const out: Declaration[] = [];
  for (const id of ids) {
    const decl = snapshot.declarations.get(id);
    if (decl) out.push(decl);
  }
  return out;
}

export function referencedDeclaration(
  node: { referencedDeclaration?: number },
  snapshot: AnalysisSnapshot,
): Declaration | undefined {
  if (node.referencedDeclaration === undefined) return undefined;
  return snapshot.declarations.get(node.referencedDeclaration);
}

export function assertNever(value: never): never {
  throw new Error(`Unhandled syntax node: ${JSON.stringify(value)}`);
}

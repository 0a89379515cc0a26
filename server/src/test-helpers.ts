/**
 * In-process stand-ins shared by the tests: a recording transport, a
 * scripted analysis engine and syntax tree builders.
 */
import { Message, type NotificationMessage, type RequestMessage } from "vscode-languageserver/node";

import { type SessionState, createSessionState } from "./context";
import type {
  AnalysisEngine,
  AnalysisInput,
  AnalysisSnapshot,
  AnalysisStage,
  Declaration,
  DeclarationNode,
  IdentifierNode,
  MemberAccessNode,
  OtherNode,
  QualifiedPathNode,
  SyntaxNode,
} from "./syntax";
import type { MessageId, NotificationParams, ResultValue, Transport } from "./transport";
import type { EngineDiagnostic, SourceSpan } from "./types";

// ---- Transport ----

export type SentReply = { id: MessageId; result: ResultValue };
export type SentError = { id: MessageId; code: number; message: string };
export type SentNotification = { method: string; params: NotificationParams };

export class MemoryTransport implements Transport {
  readonly replies: SentReply[] = [];
  readonly errors: SentError[] = [];
  readonly notifications: SentNotification[] = [];
  private readonly inbox: Message[] = [];

  constructor(messages: Message[] = []) {
    this.inbox.push(...messages);
  }

  push(...messages: Message[]): void {
    this.inbox.push(...messages);
  }

  receive(): Promise<Message | undefined> {
    return Promise.resolve(this.inbox.shift());
  }

  reply(id: MessageId, result: ResultValue): void {
    this.replies.push({ id, result });
  }

  notify(method: string, params: NotificationParams): void {
    this.notifications.push({ method, params });
  }

  error(id: MessageId, code: number, message: string): void {
    this.errors.push({ id, code, message });
  }

  closed(): boolean {
    return this.inbox.length === 0;
  }

  published(): SentNotification[] {
    return this.notifications.filter((n) => n.method === "textDocument/publishDiagnostics");
  }

  /** `[uri, diagnostic count]` for each publish, in order. */
  publishedCounts(): [string, number][] {
    const out: [string, number][] = [];
    for (const { params } of this.published()) {
      if (!params || Array.isArray(params) || !("uri" in params) || !("diagnostics" in params)) continue;
      const { uri, diagnostics } = params;
      if (typeof uri === "string" && Array.isArray(diagnostics)) out.push([uri, diagnostics.length]);
    }
    return out;
  }

  logged(): SentNotification[] {
    return this.notifications.filter((n) => n.method === "window/logMessage");
  }
}

export function request(id: number, method: string, params?: object): RequestMessage {
  return { jsonrpc: "2.0", id, method, params };
}

export function notification(method: string, params?: object): NotificationMessage {
  return { jsonrpc: "2.0", method, params };
}

// ---- Engine ----

/** Records every input and answers with `script(input)`. */
export class ScriptedEngine implements AnalysisEngine {
  readonly calls: AnalysisInput[] = [];

  constructor(private readonly script: (input: AnalysisInput) => AnalysisSnapshot) {}

  analyze(input: AnalysisInput): AnalysisSnapshot {
    this.calls.push(input);
    return this.script(input);
  }
}

export function testSession(engine: AnalysisEngine, transport = new MemoryTransport()): {
  state: SessionState;
  transport: MemoryTransport;
} {
  return { state: createSessionState({ transport, engine }), transport };
}

// ---- Syntax trees ----

/** Span of the `occurrence`-th match of `needle` in `text`. */
export function spanOf(path: string, text: string, needle: string, occurrence = 0): SourceSpan {
  let at = -1;
  for (let i = 0; i <= occurrence; i++) {
    at = text.indexOf(needle, at + 1);
    if (at < 0) throw new Error(`'${needle}' #${occurrence} not found`);
  }
  return { path, start: at, end: at + needle.length };
}

let nextNodeId = 10_000;

function nodeId(): number {
  return nextNodeId++;
}

export function identifier(
  span: SourceSpan,
  name: string,
  referencedDeclaration?: number,
  extra: { candidates?: number[]; type?: string } = {},
): IdentifierNode {
  return {
    id: nodeId(),
    kind: "identifier",
    span,
    children: [],
    name,
    referencedDeclaration,
    candidateDeclarations: extra.candidates ?? [],
    type: extra.type,
  };
}

export function qualifiedPath(span: SourceSpan, path: string[], referencedDeclaration?: number): QualifiedPathNode {
  return { id: nodeId(), kind: "qualifiedPath", span, children: [], path, referencedDeclaration };
}

export function memberAccess(
  span: SourceSpan,
  memberName: string,
  referencedDeclaration: number | undefined,
  children: SyntaxNode[],
  memberSpan?: SourceSpan,
): MemberAccessNode {
  return { id: nodeId(), kind: "memberAccess", span, children, memberName, memberSpan, referencedDeclaration };
}

export function declarationNode(span: SourceSpan, declaration: number, children: SyntaxNode[] = []): DeclarationNode {
  return { id: nodeId(), kind: "declaration", span, children, declaration };
}

export function otherNode(span: SourceSpan, children: SyntaxNode[], nodeType = "Block"): OtherNode {
  return { id: nodeId(), kind: "other", span, children, nodeType };
}

export function snapshotOf(parts: {
  stage?: AnalysisStage;
  sources?: Record<string, string>;
  units?: Record<string, SyntaxNode>;
  declarations?: Declaration[];
  diagnostics?: EngineDiagnostic[];
}): AnalysisSnapshot {
  return {
    stage: parts.stage ?? "annotated",
    sources: new Map(Object.entries(parts.sources ?? {})),
    units: new Map(Object.entries(parts.units ?? {})),
    declarations: new Map((parts.declarations ?? []).map((d) => [d.id, d])),
    diagnostics: parts.diagnostics ?? [],
  };
}

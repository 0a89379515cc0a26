/**
 * Session dispatcher: routes JSON-RPC messages to their handlers and owns
 * the receive loop.
 *
 * Handlers run one at a time, to completion, against the single
 * `SessionState`. Requests are answered through the transport; a handler
 * that throws never ends the loop.
 */
import {
  type Diagnostic,
  ErrorCodes,
  type InitializeResult,
  Message,
  type PublishDiagnosticsParams,
  ResponseError,
  TextDocumentSyncKind,
} from "vscode-languageserver/node";

import type { SessionState } from "./context";
import { buildDefinition, locate } from "./definition";
import { diagnosticsByPath } from "./diagnostics";
import type { ContentChange } from "./documents";
import { buildHover } from "./hover";
import { buildDocumentHighlights, buildReferences } from "./references";
import { applySettings, isRecord } from "./settings";
import type { MessageId, ResultValue } from "./transport";
import type { DocumentPosition, LineColumn, LineColumnRange, Trace } from "./types";
import { fsPathFromUri, toWorkspacePath, uriFromWorkspacePath } from "./utils";

export const SERVER_NAME = "solidity-session-server";
export const SERVER_VERSION = "0.1.0";

/** Malformed request or notification parameters. */
export class ProtocolError extends ResponseError<void> {
  constructor(message: string) {
    super(ErrorCodes.InvalidParams, message);
  }
}

/** `id` is undefined for notifications. */
type Handler = (state: SessionState, params: unknown, id: MessageId | undefined) => void;

// ---- Parameter extraction ----

function record(v: unknown, what: string): Record<string, unknown> {
  if (!isRecord(v)) throw new ProtocolError(`Expected an object for ${what}`);
  return v;
}

function stringField(obj: Record<string, unknown>, key: string): string {
  const v = obj[key];
  if (typeof v !== "string") throw new ProtocolError(`Expected a string for ${key}`);
  return v;
}

function numberField(obj: Record<string, unknown>, key: string): number {
  const v = obj[key];
  if (typeof v !== "number" || !Number.isInteger(v)) throw new ProtocolError(`Expected an integer for ${key}`);
  return v;
}

function parseTrace(v: unknown): Trace | undefined {
  return v === "off" || v === "messages" || v === "verbose" ? v : undefined;
}

function lineColumn(v: unknown, what: string): LineColumn {
  const obj = record(v, what);
  return { line: numberField(obj, "line"), column: numberField(obj, "character") };
}

function lineColumnRange(v: unknown): LineColumnRange {
  const obj = record(v, "range");
  return { start: lineColumn(obj.start, "range.start"), end: lineColumn(obj.end, "range.end") };
}

/** Workspace-relative path of a `file://` URI. */
export function documentPath(state: SessionState, uri: string): string {
  const fsPath = fsPathFromUri(uri);
  if (fsPath === undefined) throw new ProtocolError(`Not a file URI: ${uri}`);
  return toWorkspacePath(state.basePath, fsPath);
}

function textDocument(params: unknown): Record<string, unknown> {
  return record(record(params, "params").textDocument, "textDocument");
}

export function extractDocumentPosition(state: SessionState, params: unknown): DocumentPosition {
  const path = documentPath(state, stringField(textDocument(params), "uri"));
  return { path, position: lineColumn(record(params, "params").position, "position") };
}

// ---- Shared actions ----

function respond(state: SessionState, id: MessageId | undefined, result: ResultValue): void {
  if (id !== undefined) state.transport.reply(id, result);
}

function publish(state: SessionState, uri: string, diagnostics: Diagnostic[]): void {
  const params: PublishDiagnosticsParams = { uri, diagnostics };
  state.transport.notify("textDocument/publishDiagnostics", params);
}

/**
 * Compiles with every tracked source and publishes one diagnostics set per
 * document. A URI published last round that has nothing this round gets an
 * empty set.
 */
export function compileAndPublish(state: SessionState, path: string): void {
  if (!state.compiler.compile(path)) return;
  const snapshot = state.compiler.snapshot;
  if (!snapshot) return;

  const current = new Set<string>();
  for (const [p, diagnostics] of diagnosticsByPath(state.basePath, path, state.documents.paths(), snapshot)) {
    const uri = uriFromWorkspacePath(state.basePath, p);
    current.add(uri);
    publish(state, uri, diagnostics);
  }

  for (const uri of state.publishedUris) {
    if (!current.has(uri)) publish(state, uri, []);
  }
  state.publishedUris.clear();
  for (const uri of current) state.publishedUris.add(uri);
}

export function applyConfiguration(state: SessionState, settings: unknown): void {
  state.compiler.options = applySettings(state.compiler.options, settings, (m) => state.logger.trace(m));
}

// ---- Lifecycle ----

function onInitialize(state: SessionState, params: unknown, id: MessageId | undefined): void {
  const p = record(params, "params");

  let rootPath: string | undefined;
  if (typeof p.rootUri === "string") rootPath = fsPathFromUri(p.rootUri);
  if (rootPath === undefined && typeof p.rootPath === "string") rootPath = p.rootPath;
  state.basePath = rootPath ?? "";

  const trace = parseTrace(p.trace);
  if (trace) state.trace = trace;

  if (p.initializationOptions !== undefined) applyConfiguration(state, p.initializationOptions);

  state.initialized = true;
  state.logger.log(`Initialized with base path '${state.basePath}'`);

  const result: InitializeResult = {
    capabilities: {
      textDocumentSync: { openClose: true, change: TextDocumentSyncKind.Incremental },
      hoverProvider: true,
      definitionProvider: true,
      implementationProvider: true,
      documentHighlightProvider: true,
      referencesProvider: true,
    },
    serverInfo: { name: SERVER_NAME, version: SERVER_VERSION },
  };
  respond(state, id, result);
}

function onSetTrace(state: SessionState, params: unknown): void {
  const value = parseTrace(record(params, "params").value);
  if (!value) throw new ProtocolError("Invalid trace value");
  state.trace = value;
}

function onShutdown(state: SessionState, _params: unknown, id: MessageId | undefined): void {
  state.shutdownRequested = true;
  respond(state, id, null);
}

function onExit(state: SessionState): void {
  state.exitRequested = true;
}

// ---- Documents ----

function onDidOpen(state: SessionState, params: unknown): void {
  const doc = textDocument(params);
  const path = documentPath(state, stringField(doc, "uri"));
  state.documents.open(path, stringField(doc, "text"));
  compileAndPublish(state, path);
}

function onDidChange(state: SessionState, params: unknown): void {
  const path = documentPath(state, stringField(textDocument(params), "uri"));
  const raw = record(params, "params").contentChanges;
  if (!Array.isArray(raw)) throw new ProtocolError("Expected an array for contentChanges");

  const changes: ContentChange[] = raw.map((entry: unknown) => {
    const obj = record(entry, "contentChanges entry");
    const text = stringField(obj, "text");
    return obj.range === undefined ? { text } : { range: lineColumnRange(obj.range), text };
  });
  if (changes.length === 0) return;

  const results = state.documents.applyChanges(path, changes);
  results.forEach((result, i) => {
    if (result === "out-of-range") state.logger.log(`Ignoring out-of-range edit #${i} to ${path}`);
    else if (result === "untracked") state.logger.log(`Ignoring edit to untracked document ${path}`);
  });
  if (results.length < changes.length) {
    state.logger.log(`Dropped ${changes.length - results.length} later edit(s) to ${path}`);
  }
  compileAndPublish(state, path);
}

function onDidChangeConfiguration(state: SessionState, params: unknown): void {
  applyConfiguration(state, record(params, "params").settings);

  const [first] = state.documents.paths();
  if (first !== undefined) compileAndPublish(state, first);
}

// ---- Language features ----

function onDefinition(state: SessionState, params: unknown, id: MessageId | undefined): void {
  const located = locate(state, extractDocumentPosition(state, params));
  respond(state, id, located ? buildDefinition(state, located) : []);
}

function onHover(state: SessionState, params: unknown, id: MessageId | undefined): void {
  const located = locate(state, extractDocumentPosition(state, params));
  if (!located) {
    respond(state, id, []);
    return;
  }
  const hover = buildHover(state, located);
  if (hover) respond(state, id, hover);
}

function onDocumentHighlight(state: SessionState, params: unknown, id: MessageId | undefined): void {
  const located = locate(state, extractDocumentPosition(state, params));
  respond(state, id, located ? buildDocumentHighlights(state, located) : []);
}

function onReferences(state: SessionState, params: unknown, id: MessageId | undefined): void {
  const located = locate(state, extractDocumentPosition(state, params));
  respond(state, id, located ? buildReferences(state, located) : []);
}

const noop: Handler = () => undefined;

const HANDLERS: ReadonlyMap<string, Handler> = new Map<string, Handler>([
  ["initialize", onInitialize],
  ["initialized", noop],
  ["shutdown", onShutdown],
  ["exit", onExit],
  ["$/setTrace", onSetTrace],
  ["$/cancelRequest", noop],
  ["cancelRequest", noop],
  ["textDocument/didOpen", onDidOpen],
  ["textDocument/didChange", onDidChange],
  ["textDocument/didClose", noop],
  ["textDocument/definition", onDefinition],
  ["textDocument/implementation", onDefinition],
  ["textDocument/hover", onHover],
  ["textDocument/documentHighlight", onDocumentHighlight],
  ["textDocument/references", onReferences],
  ["workspace/didChangeConfiguration", onDidChangeConfiguration],
]);

// ---- Dispatch ----

export function handleMessage(state: SessionState, msg: Message): void {
  let method: string;
  let params: unknown;
  let id: MessageId | undefined;

  if (Message.isRequest(msg)) {
    ({ method, params, id } = msg);
  } else if (Message.isNotification(msg)) {
    ({ method, params } = msg);
  } else if ("method" in msg && typeof msg.method === "string") {
    // A method with an id that is neither a string nor a number.
    state.logger.error(`Invalid request id for ${msg.method}`);
    state.transport.error(null, ErrorCodes.InvalidRequest, `Invalid request id for ${msg.method}`);
    return;
  } else {
    state.logger.trace("Ignoring message without a method");
    return;
  }

  state.logger.trace(`Received ${method}`);

  const handler = HANDLERS.get(method);
  if (!handler) {
    state.transport.error(id ?? null, ErrorCodes.MethodNotFound, `Unknown method ${method}`);
    return;
  }

  try {
    handler(state, params, id);
  } catch (err) {
    if (err instanceof ResponseError) {
      state.logger.error(`${method}: ${err.message}`);
      if (id !== undefined) state.transport.error(id, err.code, err.message);
      return;
    }

    const detail = err instanceof Error ? err.stack ?? err.message : String(err);
    state.logger.error(`Unhandled exception in ${method}: ${detail}`);
    if (id !== undefined) {
      state.transport.error(id, ErrorCodes.InternalError, err instanceof Error ? err.message : String(err));
    }
  }
}

/**
 * Handles messages until `exit` arrives or the input is drained. Resolves
 * to whether `shutdown` was requested first.
 */
export async function run(state: SessionState): Promise<boolean> {
  while (!state.exitRequested && !state.transport.closed()) {
    const msg = await state.transport.receive();
    if (!msg) break;
    handleMessage(state, msg);
  }
  return state.shutdownRequested;
}

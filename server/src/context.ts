/**
 * Session state passed to every handler. There is no module-level state:
 * one `SessionState` is one client session.
 */
import { type LogMessageParams, MessageType } from "vscode-languageserver/node";

import { CompilerFacade } from "./compiler";
import { DocumentStore } from "./documents";
import { type OccurrenceFinder, treeOccurrenceFinder } from "./occurrences";
import type { AnalysisEngine } from "./syntax";
import type { Transport } from "./transport";
import type { Trace } from "./types";

export interface Logger {
  /** Sent when tracing is `messages` or `verbose`. */
  log(message: string): void;
  /** Sent when tracing is `verbose`. */
  trace(message: string): void;
  /** Always sent. */
  error(message: string): void;
}

export interface SessionState {
  readonly transport: Transport;
  readonly logger: Logger;
  readonly documents: DocumentStore;
  readonly compiler: CompilerFacade;
  readonly occurrences: OccurrenceFinder;
  /** URIs that received diagnostics in the last publish round. */
  readonly publishedUris: Set<string>;

  /** Filesystem path stripped from incoming URIs; "" until initialize. */
  basePath: string;
  trace: Trace;

  initialized: boolean;
  shutdownRequested: boolean;
  exitRequested: boolean;
}

export type SessionStateInit = {
  transport: Transport;
  engine: AnalysisEngine;
  occurrences?: OccurrenceFinder;
  trace?: Trace;
};

export function createLogger(transport: Transport, getTrace: () => Trace): Logger {
  const send = (type: MessageType, message: string) => {
    const params: LogMessageParams = { type, message };
    transport.notify("window/logMessage", params);
  };

  return {
    log(message) {
      if (getTrace() !== "off") send(MessageType.Log, message);
    },
    trace(message) {
      if (getTrace() === "verbose") send(MessageType.Log, message);
    },
    error(message) {
      send(MessageType.Error, message);
    },
  };
}

export function createSessionState(init: SessionStateInit): SessionState {
  const documents = new DocumentStore();

  const state: SessionState = {
    transport: init.transport,
    logger: createLogger(init.transport, () => state.trace),
    documents,
    compiler: new CompilerFacade(init.engine, documents, (message) => state.logger.log(message)),
    occurrences: init.occurrences ?? treeOccurrenceFinder,
    publishedUris: new Set(),
    basePath: "",
    trace: init.trace ?? "off",
    initialized: false,
    shutdownRequested: false,
    exitRequested: false,
  };

  return state;
}

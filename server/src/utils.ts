/**
 * Utility functions: URI handling, workspace-relative paths and LSP range
 * conversion.
 */
import { Location, Range } from "vscode-languageserver/node";

import * as fs from "fs";
import * as path from "path";
import { fileURLToPath, pathToFileURL } from "url";

import { toLineColumn } from "./position";
import type { SourceSpan } from "./types";

// ---- URI / path helpers ----

export function fsPathFromUri(uri: string): string | undefined {
  try {
    const u = new URL(uri);
    if (u.protocol !== "file:") return undefined;
    return fileURLToPath(u);
  } catch {
    return undefined;
  }
}

export function uriFromFsPath(p: string): string {
  return pathToFileURL(p).href;
}

/** Strips `basePath` (and the separator after it) from `fsPath`. */
export function toWorkspacePath(basePath: string, fsPath: string): string {
  if (!basePath) return fsPath;
  const base = basePath.endsWith(path.sep) ? basePath : basePath + path.sep;
  return fsPath.startsWith(base) ? fsPath.slice(base.length) : fsPath;
}

export function uriFromWorkspacePath(basePath: string, workspacePath: string): string {
  if (path.isAbsolute(workspacePath) || !basePath) return uriFromFsPath(path.resolve("/", workspacePath));
  return uriFromFsPath(path.join(basePath, workspacePath));
}

// ---- File I/O ----

type FileCacheEntry = { mtimeMs: number; text: string };

export const fileCache = new Map<string, FileCacheEntry>();

export function loadTextCached(fullPath: string): string | undefined {
  try {
    const st = fs.statSync(fullPath);
    const prev = fileCache.get(fullPath);
    if (prev && prev.mtimeMs === st.mtimeMs) return prev.text;

    const text = fs.readFileSync(fullPath, "utf8");
    fileCache.set(fullPath, { mtimeMs: st.mtimeMs, text });
    return text;
  } catch {
    return undefined;
  }
}

// ---- Ranges ----

/** LSP range; negative lines or columns are clamped to 0. */
export function lspRange(startLine: number, startColumn: number, endLine: number, endColumn: number): Range {
  return Range.create(
    Math.max(startLine, 0),
    Math.max(startColumn, 0),
    Math.max(endLine, 0),
    Math.max(endColumn, 0),
  );
}

/**
 * Converts a span to an LSP range against `text`, the current content of
 * the span's source. A source without text maps to an empty range at 0:0.
 */
export function spanToRange(span: SourceSpan, text: string | undefined): Range {
  if (text === undefined) return lspRange(0, 0, 0, 0);
  const start = toLineColumn(text, span.start);
  const end = toLineColumn(text, span.end);
  return lspRange(start.line, start.column, end.line, end.column);
}

export function spanToLocation(basePath: string, span: SourceSpan, text: string | undefined): Location {
  return Location.create(uriFromWorkspacePath(basePath, span.path), spanToRange(span, text));
}

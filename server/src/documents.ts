/**
 * Document store: the authoritative text of every tracked source, keyed by
 * workspace-relative path.
 */
import { TextDocument } from "vscode-languageserver-textdocument";

import { offsetsOf } from "./position";
import type { LineColumnRange } from "./types";

export const LANGUAGE_ID = "solidity";

export type ContentChange = { range?: LineColumnRange; text: string };

export type ChangeResult = "applied" | "untracked" | "out-of-range";

export class DocumentStore {
  private readonly docs = new Map<string, TextDocument>();

  open(path: string, text: string): void {
    const prev = this.docs.get(path);
    this.docs.set(path, TextDocument.create(path, LANGUAGE_ID, prev ? prev.version + 1 : 1, text));
  }

  has(path: string): boolean {
    return this.docs.has(path);
  }

  get(path: string): TextDocument | undefined {
    return this.docs.get(path);
  }

  getText(path: string): string | undefined {
    return this.docs.get(path)?.getText();
  }

  paths(): string[] {
    return Array.from(this.docs.keys());
  }

  /** Snapshot of every tracked source, in the order the documents were opened. */
  sources(): Map<string, string> {
    const out = new Map<string, string>();
    for (const [path, doc] of this.docs) out.set(path, doc.getText());
    return out;
  }

  applyFullReplace(path: string, text: string): ChangeResult {
    const doc = this.docs.get(path);
    if (!doc) return "untracked";
    this.docs.set(path, TextDocument.update(doc, [{ text }], doc.version + 1));
    return "applied";
  }

  applyRangeSplice(path: string, range: LineColumnRange, text: string): ChangeResult {
    const doc = this.docs.get(path);
    if (!doc) return "untracked";

    const buffer = doc.getText();
    const offsets = offsetsOf(buffer, range);
    if (!offsets) return "out-of-range";

    const [start, end] = offsets;
    const next = buffer.slice(0, start) + text + buffer.slice(end);
    this.docs.set(path, TextDocument.update(doc, [{ text: next }], doc.version + 1));
    return "applied";
  }

  /**
   * Applies one edit batch in received order. Each range is relative to the
   * text produced by the previous entry of the same batch.
   *
   * Stops at the first out-of-range entry: later ranges refer to a text this
   * store no longer shares with the client. The result has one entry per
   * change attempted.
   */
  applyChanges(path: string, changes: ContentChange[]): ChangeResult[] {
    const results: ChangeResult[] = [];
    for (const change of changes) {
      const result = change.range
        ? this.applyRangeSplice(path, change.range, change.text)
        : this.applyFullReplace(path, change.text);
      results.push(result);
      if (result === "out-of-range") break;
    }
    return results;
  }
}

/**
 * Tests for hover.ts — hover text and markdown content.
 */
import { describe, it, expect } from "vitest";
import { MarkupKind } from "vscode-languageserver/node";

import { locate } from "./definition";
import { buildHover, hoverText } from "./hover";
import {
  ScriptedEngine,
  declarationNode,
  identifier,
  memberAccess,
  otherNode,
  qualifiedPath,
  snapshotOf,
  spanOf,
  testSession,
} from "./test-helpers";

const TEXT = "uint x = 1;";
const at = (needle: string) => spanOf("a.sol", TEXT, needle);

function fixture() {
  const literal = otherNode(at("1"), [], "Literal");
  const typeName = otherNode(at("uint"), [], "ElementaryTypeName");
  const decl = declarationNode(at("uint x = 1"), 5, [typeName, literal]);
  return snapshotOf({
    sources: { "a.sol": TEXT },
    units: { "a.sol": otherNode(at(TEXT), [decl], "SourceUnit") },
    declarations: [{ id: 5, name: "x", nameSpan: at("x"), span: at("uint x = 1"), type: "uint256" }],
  });
}

describe("hoverText", () => {
  const snapshot = snapshotOf({
    declarations: [
      { id: 1, name: "documented", type: "uint256", documentation: "The balance." },
      { id: 2, name: "S", type: "type(struct L.S storage pointer)" },
    ],
  });
  const span = { path: "a.sol", start: 0, end: 1 };

  it("prefers a declaration's documentation over its type", () => {
    expect(hoverText(snapshot, declarationNode(span, 1))).toBe("The balance.");
  });

  it("uses the type of an identifier or member access itself", () => {
    expect(hoverText(snapshot, identifier(span, "documented", 1, { type: "uint8" }))).toBe("uint8");
    expect(hoverText(snapshot, memberAccess(span, "length", undefined, [], undefined))).toBe("");
  });

  it("uses the referenced declaration's type for a qualified path", () => {
    expect(hoverText(snapshot, qualifiedPath(span, ["L", "S"], 2))).toBe("type(struct L.S storage pointer)");
  });

  it("is empty for other syntax", () => {
    expect(hoverText(snapshot, otherNode(span, []))).toBe("");
    expect(hoverText(snapshot, declarationNode(span, 99))).toBe("");
  });
});

describe("buildHover", () => {
  it("shows the type of a declared variable as markdown", () => {
    const { state } = testSession(new ScriptedEngine(fixture));
    state.documents.open("a.sol", TEXT);

    const located = locate(state, { path: "a.sol", position: { line: 0, column: 5 } });
    if (!located) throw new Error("node not found");

    expect(buildHover(state, located)).toEqual({
      contents: { kind: MarkupKind.Markdown, value: "uint256" },
      range: { start: { line: 0, character: 0 }, end: { line: 0, character: 10 } },
    });
  });

  it("returns undefined when there is nothing to show", () => {
    const { state } = testSession(new ScriptedEngine(fixture));
    state.documents.open("a.sol", TEXT);

    const located = locate(state, { path: "a.sol", position: { line: 0, column: 9 } });
    if (!located) throw new Error("node not found");

    expect(located.node.kind).toBe("other");
    expect(buildHover(state, located)).toBeUndefined();
  });
});

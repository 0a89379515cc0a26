/**
 * Tests for definition.ts — node lookup and Go-to-Definition.
 */
import { describe, it, expect } from "vitest";
import { Location } from "vscode-languageserver/node";

import { buildDefinition, declarationLocation, lastSegment, locate } from "./definition";
import type { Declaration } from "./syntax";
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

const OVERLOADS = [
  "contract O {",
  "  function g(uint a) public {}",
  "  function g(bool b) public {}",
  "  function h() public { g; O.g; }",
  "}",
].join("\n");

const at = (needle: string, occurrence = 0) => spanOf("o.sol", OVERLOADS, needle, occurrence);

function overloadFixture() {
  const declarations: Declaration[] = [
    { id: 1, name: "O", nameSpan: at("O"), span: { path: "o.sol", start: 0, end: OVERLOADS.length } },
    { id: 11, name: "g", nameSpan: at("g", 0), span: at("function g(uint a) public {}") },
    { id: 12, name: "g", nameSpan: at("g", 1), span: at("function g(bool b) public {}") },
    { id: 13, name: "h", nameSpan: at("h", 0) },
    { id: 50, name: "builtin" },
  ];

  const callG = identifier(at("g", 2), "g", 12, { candidates: [11] });
  const base = identifier(at("O", 1), "O", 1);
  const member = memberAccess(at("O.g"), "g", 11, [base], at("g", 3));
  const h = declarationNode(at("function h() public { g; O.g; }"), 13, [callG, member]);
  const contract = declarationNode(
    { path: "o.sol", start: 0, end: OVERLOADS.length },
    1,
    [declarationNode(at("function g(uint a) public {}"), 11), declarationNode(at("function g(bool b) public {}"), 12), h],
  );

  return snapshotOf({
    sources: { "o.sol": OVERLOADS },
    units: { "o.sol": otherNode({ path: "o.sol", start: 0, end: OVERLOADS.length }, [contract], "SourceUnit") },
    declarations,
  });
}

function session(snapshot = overloadFixture()) {
  const engine = new ScriptedEngine(() => snapshot);
  const { state } = testSession(engine);
  state.basePath = "/work";
  state.documents.open("o.sol", OVERLOADS);
  return { state, engine };
}

function range(l1: number, c1: number, l2: number, c2: number) {
  return { start: { line: l1, character: c1 }, end: { line: l2, character: c2 } };
}

const URI = "file:///work/o.sol";

describe("locate", () => {
  it("compiles on first use and finds the innermost node", () => {
    const { state, engine } = session();
    const located = locate(state, { path: "o.sol", position: { line: 3, column: 24 } });

    expect(engine.calls).toHaveLength(1);
    expect(located?.node.kind).toBe("identifier");
  });

  it("reuses an existing snapshot", () => {
    const { state, engine } = session();
    state.compiler.compile("o.sol");
    locate(state, { path: "o.sol", position: { line: 3, column: 24 } });
    expect(engine.calls).toHaveLength(1);
  });

  it("returns undefined for untracked paths and unmappable positions", () => {
    const { state } = session();
    expect(locate(state, { path: "missing.sol", position: { line: 0, column: 0 } })).toBeUndefined();
    expect(locate(state, { path: "o.sol", position: { line: 9, column: 0 } })).toBeUndefined();
    expect(locate(state, { path: "o.sol", position: { line: 0, column: 40 } })).toBeUndefined();
  });

  it("returns undefined unless the snapshot is annotated", () => {
    const snapshot = { ...overloadFixture(), stage: "parsed" as const };
    const { state } = session(snapshot);
    expect(locate(state, { path: "o.sol", position: { line: 3, column: 24 } })).toBeUndefined();
  });
});

describe("buildDefinition", () => {
  it("lists the referenced declaration then the overload candidates", () => {
    const { state } = session();
    const located = locate(state, { path: "o.sol", position: { line: 3, column: 24 } });
    if (!located) throw new Error("node not found");

    expect(buildDefinition(state, located)).toEqual<Location[]>([
      { uri: URI, range: range(2, 11, 2, 12) },
      { uri: URI, range: range(1, 11, 1, 12) },
    ]);
  });

  it("resolves a declaration to its own name", () => {
    const { state } = session();
    const located = locate(state, { path: "o.sol", position: { line: 1, column: 4 } });
    if (!located) throw new Error("node not found");

    expect(located.node.kind).toBe("declaration");
    expect(buildDefinition(state, located)).toEqual([{ uri: URI, range: range(1, 11, 1, 12) }]);
  });

  it("resolves a member access to the member declaration", () => {
    const { state } = session();
    const located = locate(state, { path: "o.sol", position: { line: 3, column: 29 } });
    if (!located) throw new Error("node not found");

    expect(located.node.kind).toBe("memberAccess");
    expect(buildDefinition(state, located)).toEqual([{ uri: URI, range: range(1, 11, 1, 12) }]);
  });

  it("resolves the base of a member access on its own", () => {
    const { state } = session();
    const located = locate(state, { path: "o.sol", position: { line: 3, column: 27 } });
    if (!located) throw new Error("node not found");

    expect(located.node.kind).toBe("identifier");
    expect(buildDefinition(state, located)).toEqual([{ uri: URI, range: range(0, 9, 0, 10) }]);
  });

  it("resolves a position inside a contract body to the contract", () => {
    const { state } = session();
    const located = locate(state, { path: "o.sol", position: { line: 0, column: 11 } });
    if (!located) throw new Error("node not found");

    expect(located.node.kind).toBe("declaration");
    expect(buildDefinition(state, located)).toEqual([{ uri: URI, range: range(0, 9, 0, 10) }]);
  });

  it("points an import at the start of the imported file when it is open", () => {
    const text = 'import "./lib.sol";';
    const unit = otherNode({ path: "main.sol", start: 0, end: text.length }, [
      {
        id: 2,
        kind: "importDirective",
        span: { path: "main.sol", start: 0, end: text.length },
        children: [],
        absolutePath: "lib.sol",
      },
    ]);
    const snapshot = snapshotOf({ sources: { "main.sol": text, "lib.sol": "" }, units: { "main.sol": unit } });
    const { state } = testSession(new ScriptedEngine(() => snapshot));
    state.basePath = "/work";
    state.documents.open("main.sol", text);

    const pos = { path: "main.sol", position: { line: 0, column: 3 } };
    const located = locate(state, pos);
    if (!located) throw new Error("node not found");
    expect(buildDefinition(state, located)).toEqual([]);

    state.documents.open("lib.sol", "");
    expect(buildDefinition(state, located)).toEqual([{ uri: "file:///work/lib.sol", range: range(0, 0, 0, 0) }]);
  });
});

describe("declarationLocation", () => {
  it("prefers the name span, then the full span", () => {
    const span = { path: "a.sol", start: 0, end: 10 };
    const nameSpan = { path: "a.sol", start: 4, end: 5 };
    expect(declarationLocation({ id: 1, name: "a", span, nameSpan })).toEqual(nameSpan);
    expect(declarationLocation({ id: 1, name: "a", span })).toEqual(span);
  });

  it("has no location for built-ins", () => {
    expect(declarationLocation({ id: 1, name: "msg" })).toBeUndefined();
    expect(declarationLocation({ id: 1, name: "msg", span: { path: "", start: -1, end: -1 } })).toBeUndefined();
    expect(declarationLocation(undefined)).toBeUndefined();
  });
});

describe("lastSegment", () => {
  it("returns the final path segment", () => {
    expect(lastSegment(qualifiedPath({ path: "a.sol", start: 0, end: 5 }, ["Lib", "S"], 3))).toBe("S");
  });

  it("throws on an empty path", () => {
    expect(() => lastSegment(qualifiedPath({ path: "a.sol", start: 0, end: 0 }, []))).toThrow(/no segments/);
  });
});

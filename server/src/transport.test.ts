/**
 * Tests for transport.ts — JSON-RPC framing over in-memory streams.
 */
import { describe, it, expect } from "vitest";
import { PassThrough } from "stream";

import { StreamTransport } from "./transport";

function frame(body: object): string {
  const json = JSON.stringify(body);
  return `Content-Length: ${Buffer.byteLength(json, "utf8")}\r\n\r\n${json}`;
}

function streams() {
  const input = new PassThrough();
  const output = new PassThrough();
  const written: Buffer[] = [];
  output.on("data", (chunk: Buffer) => written.push(chunk));
  const failures: unknown[] = [];
  const transport = new StreamTransport(input, output, (err) => failures.push(err));
  return { input, transport, written, failures };
}

describe("StreamTransport", () => {
  it("delivers framed messages in order and reports the end of input", async () => {
    const { input, transport } = streams();
    input.write(frame({ jsonrpc: "2.0", id: 1, method: "initialize", params: {} }));
    input.write(frame({ jsonrpc: "2.0", method: "initialized", params: {} }));

    await expect(transport.receive()).resolves.toMatchObject({ id: 1, method: "initialize" });
    await expect(transport.receive()).resolves.toMatchObject({ method: "initialized" });

    input.end();
    await expect(transport.receive()).resolves.toBeUndefined();
    expect(transport.closed()).toBe(true);
    transport.dispose();
  });

  it("writes replies, notifications and errors with headers", async () => {
    const { transport, written, failures } = streams();
    transport.reply(1, null);
    transport.notify("window/logMessage", { type: 4, message: "hello" });
    transport.error(2, -32601, "Unknown method foo/bar");
    await transport.flush();

    const out = Buffer.concat(written).toString("utf8");
    const bodies = out
      .split(/Content-Length: \d+\r\n\r\n/)
      .filter((s) => s !== "")
      .map((s): unknown => JSON.parse(s));

    expect(bodies).toEqual([
      { jsonrpc: "2.0", id: 1, result: null },
      { jsonrpc: "2.0", method: "window/logMessage", params: { type: 4, message: "hello" } },
      { jsonrpc: "2.0", id: 2, error: { code: -32601, message: "Unknown method foo/bar" } },
    ]);
    expect(failures).toEqual([]);
    transport.dispose();
  });
});

#!/usr/bin/env node
/**
 * Solidity Language Server entry point.
 *
 * Speaks LSP over stdin/stdout and analyzes sources with `solc
 * --standard-json`. Set SOLC_LS_SOLC_PATH to use a solc binary other than
 * the one on PATH.
 */
import { createSessionState } from "./context";
import { run } from "./session";
import { SolcEngine, diskSourceReader, spawnSolc } from "./solc-bridge";
import { StreamTransport } from "./transport";

const solcPath = process.env.SOLC_LS_SOLC_PATH || "solc";

async function main(): Promise<number> {
  const transport = new StreamTransport(process.stdin, process.stdout, (err) => {
    process.stderr.write(`transport failure: ${err instanceof Error ? err.message : String(err)}\n`);
  });

  // solc resolves imports against the base path sent with initialize.
  const basePath = () => state.basePath;
  const state = createSessionState({
    transport,
    engine: new SolcEngine(spawnSolc(solcPath, basePath), diskSourceReader(basePath)),
  });

  const shutdownRequested = await run(state);

  await transport.flush();
  transport.dispose();
  return shutdownRequested ? 0 : 1;
}

main().then(
  (code) => process.exit(code),
  (err: unknown) => {
    process.stderr.write(`${err instanceof Error ? err.stack ?? err.message : String(err)}\n`);
    process.exit(1);
  },
);

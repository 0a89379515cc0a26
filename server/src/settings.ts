/**
 * Compiler option parsing for `initializationOptions` and
 * `workspace/didChangeConfiguration`.
 *
 * Every key is validated on its own. An invalid value is reported through
 * `log` and the previous value is kept.
 */
import {
  type CompilerOptions,
  EVM_VERSIONS,
  type EvmVersion,
  MODEL_CHECKER_ENGINES,
  MODEL_CHECKER_TARGETS,
  type ModelCheckerEngine,
  type ModelCheckerTarget,
  REVERT_STRINGS,
  type Remapping,
  type RevertStrings,
} from "./types";

export const KEY_EVM = "evm";
export const KEY_REVERT_STRINGS = "revertStrings";
export const KEY_REMAPPING = "remapping";
export const KEY_MC_CONTRACTS = "model-checker-contracts";
export const KEY_MC_ENGINE = "model-checker-engine";
export const KEY_MC_TARGETS = "model-checker-targets";
export const KEY_MC_TIMEOUT = "model-checker-timeout";

export type SettingsLog = (message: string) => void;

export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function oneOf<T extends string>(values: readonly T[], v: string): v is T {
  return values.some((x) => x === v);
}

// ---- Individual parsers ----

export function parseEvmVersion(s: string): EvmVersion | undefined {
  return oneOf(EVM_VERSIONS, s) ? s : undefined;
}

export function parseRevertStrings(s: string): RevertStrings | undefined {
  return oneOf(REVERT_STRINGS, s) ? s : undefined;
}

/** `[context:]prefix=target`; the prefix must not be empty. */
export function parseRemapping(s: string): Remapping | undefined {
  const eq = s.indexOf("=");
  if (eq < 0) return undefined;

  const head = s.slice(0, eq);
  const colon = head.indexOf(":");
  const remapping: Remapping = {
    context: colon < 0 ? "" : head.slice(0, colon),
    prefix: colon < 0 ? head : head.slice(colon + 1),
    target: s.slice(eq + 1),
  };
  if (!remapping.prefix) return undefined;
  return remapping;
}

export function formatRemapping(r: Remapping): string {
  return r.context ? `${r.context}:${r.prefix}=${r.target}` : `${r.prefix}=${r.target}`;
}

/** `source.sol:Contract,other.sol:Other`; `default` (or empty) selects every contract. */
export function parseModelCheckerContracts(s: string): Record<string, string[]> | undefined {
  if (s === "default" || s === "") return {};

  const chosen: Record<string, string[]> = {};
  for (const entry of s.split(",")) {
    const colon = entry.lastIndexOf(":");
    if (colon <= 0 || colon === entry.length - 1) return undefined;
    const source = entry.slice(0, colon);
    const contract = entry.slice(colon + 1);
    const list = chosen[source] ?? (chosen[source] = []);
    if (!list.includes(contract)) list.push(contract);
  }
  return chosen;
}

export function parseModelCheckerEngine(s: string): ModelCheckerEngine | undefined {
  return oneOf(MODEL_CHECKER_ENGINES, s) ? s : undefined;
}

/** `default` selects the solc default set, represented as an empty list. */
export function parseModelCheckerTargets(s: string): ModelCheckerTarget[] | undefined {
  if (s === "default") return [];

  const out: ModelCheckerTarget[] = [];
  for (const t of s.split(",")) {
    if (!oneOf(MODEL_CHECKER_TARGETS, t) || out.includes(t)) return undefined;
    out.push(t);
  }
  return out;
}

// ---- Apply ----

export function applySettings(prev: CompilerOptions, raw: unknown, log: SettingsLog): CompilerOptions {
  if (!isRecord(raw)) return prev;

  const next: CompilerOptions = {
    ...prev,
    remappings: [...prev.remappings],
    modelChecker: { ...prev.modelChecker },
  };

  const evm = raw[KEY_EVM];
  if (typeof evm === "string") {
    const v = parseEvmVersion(evm);
    if (v) next.evmVersion = v;
    else log(`Invalid EVM version: ${evm}`);
  }

  const revertStrings = raw[KEY_REVERT_STRINGS];
  if (typeof revertStrings === "string") {
    const v = parseRevertStrings(revertStrings);
    if (v) next.revertStrings = v;
    else log(`Invalid option for ${KEY_REVERT_STRINGS}: ${revertStrings}`);
  }

  const remapping = raw[KEY_REMAPPING];
  if (Array.isArray(remapping)) {
    next.remappings = [];
    for (const element of remapping) {
      if (typeof element !== "string") continue;
      const parsed = parseRemapping(element);
      if (parsed) next.remappings.push(parsed);
      else log(`Failed to parse remapping: '${element}'`);
    }
  }

  const contracts = raw[KEY_MC_CONTRACTS];
  if (typeof contracts === "string") {
    const v = parseModelCheckerContracts(contracts);
    if (v) next.modelChecker.contracts = v;
    else log(`Invalid option for ${KEY_MC_CONTRACTS}: ${contracts}`);
  }

  const engine = raw[KEY_MC_ENGINE];
  if (typeof engine === "string") {
    const v = parseModelCheckerEngine(engine);
    if (v) next.modelChecker.engine = v;
    else log(`Invalid option for ${KEY_MC_ENGINE}: ${engine}`);
  }

  const targets = raw[KEY_MC_TARGETS];
  if (typeof targets === "string") {
    const v = parseModelCheckerTargets(targets);
    if (v) next.modelChecker.targets = v;
    else log(`Invalid option for ${KEY_MC_TARGETS}: ${targets}`);
  }

  const timeout = raw[KEY_MC_TIMEOUT];
  if (timeout !== undefined) {
    if (typeof timeout === "number" && Number.isInteger(timeout) && timeout >= 0) next.modelChecker.timeout = timeout;
    else log(`Invalid option for ${KEY_MC_TIMEOUT}: ${String(timeout)}`);
  }

  return next;
}

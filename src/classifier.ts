import debugFactory from "debug";

import {
  RPCError,
  ScriptCommandError,
  type ProviderError,
} from "./errors/script-command-error";
import { starknetErrorFromCode } from "./errors/starknet-error";
import type { JsonRpcErrorObject } from "./response-decoder";
import type { TransportFailure } from "./transport";

const debug = debugFactory("invoke:classifier");

// "Method not found": the node does not serve this method at its RPC version
export const VERSION_MISMATCH_CODES: ReadonlySet<number> = new Set([-32601]);

export type ClassifierInput =
  | { kind: "Transport"; failure: TransportFailure }
  | { kind: "JsonRpc"; error: JsonRpcErrorObject }
  | { kind: "Validation"; message: string }
  | { kind: "Unexpected"; message: string };

function toProviderError(failure: TransportFailure): ProviderError {
  switch (failure.kind) {
    case "ConnectionError":
      return { kind: "ConnectionError", message: failure.message };
    case "Timeout":
      return { kind: "Timeout", message: failure.message };
    case "MalformedResponse":
      return { kind: "MalformedResponse", message: failure.message };
  }
}

export function classifyJsonRpcError(error: JsonRpcErrorObject): RPCError {
  if (VERSION_MISMATCH_CODES.has(error.code)) {
    return RPCError.versionNotSupported();
  }
  const starknetError = starknetErrorFromCode(error.code, error.data);
  if (starknetError.kind === "Unknown") {
    debug(`No Starknet error for code ${error.code}, keeping it as unknown`);
    return RPCError.unknown(error.code, error.message);
  }
  return RPCError.starknet(starknetError);
}

/**
 * Total over its input: transport failures first, then the version range,
 * then the known code table, then the unknown fallback.
 */
export function classify(input: ClassifierInput): ScriptCommandError {
  switch (input.kind) {
    case "Transport":
      return ScriptCommandError.provider(toProviderError(input.failure));
    case "Validation":
      return ScriptCommandError.validation(input.message);
    case "Unexpected":
      return ScriptCommandError.unknown(input.message);
    case "JsonRpc":
      return ScriptCommandError.rpc(classifyJsonRpcError(input.error));
  }
}

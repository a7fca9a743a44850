import {
  type StarknetError,
  starknetErrorCode,
  starknetErrorMessage,
} from "./starknet-error";

export type RPCError =
  | { kind: "StarknetError"; error: StarknetError }
  | { kind: "RPCVersionNotSupported" }
  // Preserves whatever the node sent so newer catalogs stay readable
  | { kind: "UnknownError"; code: number; message: string };

export type ProviderError =
  | { kind: "ConnectionError"; message: string }
  | { kind: "Timeout"; message: string }
  | { kind: "MalformedResponse"; message: string };

export type ScriptCommandError =
  | { kind: "RPCError"; error: RPCError }
  | { kind: "ProviderError"; error: ProviderError }
  | { kind: "ValidationError"; message: string }
  | { kind: "UnknownError"; message: string };

export const RPCError = {
  starknet: (error: StarknetError): RPCError => ({
    kind: "StarknetError",
    error,
  }),
  versionNotSupported: (): RPCError => ({ kind: "RPCVersionNotSupported" }),
  unknown: (code: number, message: string): RPCError => ({
    kind: "UnknownError",
    code,
    message,
  }),
};

export const ScriptCommandError = {
  rpc: (error: RPCError): ScriptCommandError => ({ kind: "RPCError", error }),
  provider: (error: ProviderError): ScriptCommandError => ({
    kind: "ProviderError",
    error,
  }),
  validation: (message: string): ScriptCommandError => ({
    kind: "ValidationError",
    message,
  }),
  unknown: (message: string): ScriptCommandError => ({
    kind: "UnknownError",
    message,
  }),
};

function describeRpcError(error: RPCError): string {
  switch (error.kind) {
    case "StarknetError":
      return `${starknetErrorCode(error.error)}: ${starknetErrorMessage(error.error)}`;
    case "RPCVersionNotSupported":
      return "RPC version not supported";
    case "UnknownError":
      return `${error.code}: ${error.message}`;
  }
}

// One line summary, used for log output
export function describeScriptCommandError(error: ScriptCommandError): string {
  switch (error.kind) {
    case "RPCError":
      return `RPC error ${describeRpcError(error.error)}`;
    case "ProviderError":
      return `Provider error (${error.error.kind}): ${error.error.message}`;
    case "ValidationError":
      return `Validation error: ${error.message}`;
    case "UnknownError":
      return `Unknown error: ${error.message}`;
  }
}

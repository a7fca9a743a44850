import { hash, num } from "starknet";

// Body of a JSON-RPC error response as a node sends it
export function rpcErrorBody(
  code: number,
  message: string,
  data?: unknown,
  id: number | null = 1,
): string {
  const error = data === undefined ? { code, message } : { code, message, data };
  return JSON.stringify({ jsonrpc: "2.0", id, error });
}

export function rpcResultBody(result: unknown, id = 1): string {
  return JSON.stringify({ jsonrpc: "2.0", id, result });
}

// Hex selector of a function name, as found in the execute calldata
export function selectorHex(name: string): string {
  return num.toHex(hash.getSelectorFromName(name));
}

// Parse the JSON-RPC request a transport received
export function parseRequest(body: string | undefined): unknown {
  if (body === undefined) {
    throw new Error("No request was sent");
  }
  return JSON.parse(body);
}

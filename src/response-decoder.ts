import { z } from "zod";

import { isFeltHex } from "./felt";

const jsonRpcId = z.union([z.number(), z.string(), z.null()]);

const jsonRpcErrorObject = z.object({
  code: z.number().int(),
  message: z.string(),
  data: z.unknown().optional(),
});

const errorEnvelope = z.object({
  jsonrpc: z.literal("2.0"),
  id: jsonRpcId,
  error: jsonRpcErrorObject,
});

const resultEnvelope = z.object({
  jsonrpc: z.literal("2.0"),
  id: jsonRpcId,
  result: z.unknown(),
});

// major.minor with an optional patch, as returned by starknet_specVersion
export const RPC_VERSION_PATTERN = /^\d+\.\d+(\.\d+)?$/;

const invokeResult = z.object({ transaction_hash: z.string() });
const callResult = z.array(z.string());

export interface JsonRpcErrorObject {
  code: number;
  message: string;
  data?: unknown;
}

export type DecodedResponse =
  | { kind: "Success"; result: unknown }
  | { kind: "RpcError"; error: JsonRpcErrorObject }
  | { kind: "Malformed"; reason: string };

function parseJson(body: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(body) };
  } catch {
    return { ok: false };
  }
}

/**
 * Decode a raw JSON-RPC 2.0 response. Error `data` is carried over untouched,
 * it is what tells sibling Starknet errors apart.
 */
export function decodeResponse(body: string, expectedId: number): DecodedResponse {
  const json = parseJson(body);
  if (!json.ok) {
    return { kind: "Malformed", reason: "Response body is not valid JSON" };
  }

  const failed = errorEnvelope.safeParse(json.value);
  if (failed.success) {
    const { id, error } = failed.data;
    if (id !== null && id !== expectedId) {
      return {
        kind: "Malformed",
        reason: `Response id ${id} does not match request id ${expectedId}`,
      };
    }
    return {
      kind: "RpcError",
      error:
        error.data === undefined
          ? { code: error.code, message: error.message }
          : { code: error.code, message: error.message, data: error.data },
    };
  }

  const succeeded = resultEnvelope.safeParse(json.value);
  if (!succeeded.success) {
    return {
      kind: "Malformed",
      reason: "Response is not a JSON-RPC 2.0 envelope",
    };
  }
  const { id, result } = succeeded.data;
  if (id !== expectedId) {
    return {
      kind: "Malformed",
      reason: `Response id ${id} does not match request id ${expectedId}`,
    };
  }
  if (result === undefined) {
    return {
      kind: "Malformed",
      reason: "Response carries neither result nor error",
    };
  }
  return { kind: "Success", result };
}

export function decodeTransactionHash(result: unknown): string | undefined {
  const parsed = invokeResult.safeParse(result);
  if (!parsed.success || !isFeltHex(parsed.data.transaction_hash)) {
    return undefined;
  }
  return parsed.data.transaction_hash;
}

export function decodeCallResult(result: unknown): string[] | undefined {
  const parsed = callResult.safeParse(result);
  if (!parsed.success || !parsed.data.every(isFeltHex)) {
    return undefined;
  }
  return parsed.data;
}

export function decodeSpecVersion(result: unknown): string | undefined {
  const parsed = z.string().regex(RPC_VERSION_PATTERN).safeParse(result);
  return parsed.success ? parsed.data : undefined;
}

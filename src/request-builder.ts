import type { BigNumberish } from "starknet";

import {
  InvalidInputError,
  parseContractAddress,
  parseFelt,
  resolveSelector,
  toFeltHex,
} from "./felt";
import {
  DEFAULT_FEE_SETTINGS,
  type FeeArgs,
  type FeeDefaults,
  type ResolvedFee,
  parseFeeSettings,
  resolveFee,
} from "./fee";

export const JSON_RPC_REQUEST_ID = 1;

export const ADD_INVOKE_METHOD = "starknet_addInvokeTransaction";
export const CALL_METHOD = "starknet_call";
export const SPEC_VERSION_METHOD = "starknet_specVersion";

export interface InvokeArgs {
  contractAddress: BigNumberish;
  // Function name or hex selector
  entryPoint: string;
  calldata?: readonly BigNumberish[];
  fee?: FeeArgs;
  nonce?: BigNumberish;
}

export interface CallArgs {
  contractAddress: BigNumberish;
  entryPoint: string;
  calldata?: readonly BigNumberish[];
}

export interface ContractCall {
  readonly contractAddress: bigint;
  readonly entryPointSelector: bigint;
  readonly calldata: readonly bigint[];
}

export interface InvokeRequest extends ContractCall {
  readonly fee: ResolvedFee;
  readonly nonce?: bigint;
}

export type BuildResult<T> =
  | { kind: "Ok"; request: T }
  | { kind: "Err"; message: string };

export type BlockId =
  | "latest"
  | "pending"
  | { block_number: number }
  | { block_hash: string };

// Produced by the account once it has signed the invoke
export interface SignedInvoke {
  senderAddress: bigint;
  signature: readonly bigint[];
  nonce: bigint;
}

function parseCall(args: CallArgs): ContractCall {
  return {
    contractAddress: parseContractAddress(args.contractAddress),
    entryPointSelector: resolveSelector(args.entryPoint),
    calldata: Object.freeze(
      (args.calldata ?? []).map((value, index) =>
        parseFelt(value, `Calldata[${index}]`),
      ),
    ),
  };
}

function build<T>(parse: () => T): BuildResult<T> {
  try {
    const request = parse();
    Object.freeze(request);
    return { kind: "Ok", request };
  } catch (error) {
    if (error instanceof InvalidInputError) {
      return { kind: "Err", message: error.message };
    }
    throw error;
  }
}

export function buildCallRequest(args: CallArgs): BuildResult<ContractCall> {
  return build(() => parseCall(args));
}

export function buildInvokeRequest(
  args: InvokeArgs,
  feeDefaults: FeeDefaults,
): BuildResult<InvokeRequest> {
  return build((): InvokeRequest => {
    const call = parseCall(args);
    const settings =
      args.fee === undefined ? DEFAULT_FEE_SETTINGS : parseFeeSettings(args.fee);
    const fee = resolveFee(settings, feeDefaults);
    if (args.nonce === undefined) {
      return { ...call, fee };
    }
    return { ...call, fee, nonce: parseFelt(args.nonce, "Nonce") };
  });
}

// Account __execute__ calldata for a single call, Cairo 1 layout
export function executeCalldata(call: ContractCall): bigint[] {
  return [
    1n,
    call.contractAddress,
    call.entryPointSelector,
    BigInt(call.calldata.length),
    ...call.calldata,
  ];
}

export function transactionVersion(fee: ResolvedFee): "0x1" | "0x3" {
  return fee.kind === "Eth" ? "0x1" : "0x3";
}

export function encodeJsonRpcRequest(
  method: string,
  params: unknown,
  id: number = JSON_RPC_REQUEST_ID,
): string {
  return JSON.stringify({ id, jsonrpc: "2.0", method, params });
}

function invokeTransaction(request: InvokeRequest, signed: SignedInvoke) {
  const common = {
    type: "INVOKE",
    sender_address: toFeltHex(signed.senderAddress),
    calldata: executeCalldata(request).map(toFeltHex),
    version: transactionVersion(request.fee),
    signature: signed.signature.map(toFeltHex),
    nonce: toFeltHex(signed.nonce),
  };
  if (request.fee.kind === "Eth") {
    return { ...common, max_fee: toFeltHex(request.fee.maxFee) };
  }
  return {
    ...common,
    resource_bounds: {
      l1_gas: {
        max_amount: toFeltHex(request.fee.maxGas),
        max_price_per_unit: toFeltHex(request.fee.maxGasUnitPrice),
      },
      l2_gas: { max_amount: "0x0", max_price_per_unit: "0x0" },
    },
    tip: "0x0",
    paymaster_data: [],
    account_deployment_data: [],
    nonce_data_availability_mode: "L1",
    fee_data_availability_mode: "L1",
  };
}

export function encodeInvokeRequest(
  request: InvokeRequest,
  signed: SignedInvoke,
  id: number = JSON_RPC_REQUEST_ID,
): string {
  return encodeJsonRpcRequest(
    ADD_INVOKE_METHOD,
    { invoke_transaction: invokeTransaction(request, signed) },
    id,
  );
}

export function encodeCallRequest(
  call: ContractCall,
  blockId: BlockId = "latest",
  id: number = JSON_RPC_REQUEST_ID,
): string {
  return encodeJsonRpcRequest(
    CALL_METHOD,
    {
      request: {
        contract_address: toFeltHex(call.contractAddress),
        entry_point_selector: toFeltHex(call.entryPointSelector),
        calldata: call.calldata.map(toFeltHex),
      },
      block_id: blockId,
    },
    id,
  );
}

export function encodeSpecVersionRequest(id: number = JSON_RPC_REQUEST_ID): string {
  return encodeJsonRpcRequest(SPEC_VERSION_METHOD, [], id);
}

import debugFactory from "debug";
import type { BigNumberish } from "starknet";

import { classify } from "./classifier";
import { DEFAULT_FEE_DEFAULTS, EXPECTED_RPC_VERSION } from "./config";
import {
  RPCError,
  ScriptCommandError,
  describeScriptCommandError,
} from "./errors/script-command-error";
import { InvalidInputError, parseContractAddress, parseFelt } from "./felt";
import { type FeeArgs, type FeeDefaults, checkFeeDefaults } from "./fee";
import {
  ADD_INVOKE_METHOD,
  type BlockId,
  CALL_METHOD,
  type InvokeRequest,
  JSON_RPC_REQUEST_ID,
  SPEC_VERSION_METHOD,
  type SignedInvoke,
  buildCallRequest,
  buildInvokeRequest,
  encodeCallRequest,
  encodeInvokeRequest,
  encodeSpecVersionRequest,
  executeCalldata,
  transactionVersion,
} from "./request-builder";
import {
  RPC_VERSION_PATTERN,
  decodeCallResult,
  decodeResponse,
  decodeSpecVersion,
  decodeTransactionHash,
} from "./response-decoder";
import type { Transport, TransportResult } from "./transport";

const debug = debugFactory("invoke:client");

export type Failure = { kind: "Failure"; error: ScriptCommandError };

export type InvokeOutcome = { kind: "Success"; transactionHash: string } | Failure;

export type CallOutcome = { kind: "Success"; result: string[] } | Failure;

export type VersionOutcome = { kind: "Success"; version: string } | Failure;

// What the account signs
export interface InvokePayload {
  request: InvokeRequest;
  senderAddress: bigint;
  executeCalldata: readonly bigint[];
  version: "0x1" | "0x3";
  // Present when the caller overrides the nonce, the account must sign with it
  nonce?: bigint;
}

export interface AccountSignature {
  signature: readonly BigNumberish[];
  nonce: BigNumberish;
}

/**
 * Signing collaborator. Key handling lives outside this package, the core
 * only needs a signature and the nonce it was produced for.
 */
export interface Account {
  readonly address: BigNumberish;
  sign(payload: InvokePayload): Promise<AccountSignature>;
}

export interface InvokeClientOptions {
  transport: Transport;
  account?: Account;
  feeDefaults?: FeeDefaults;
  expectedRpcVersion?: string;
}

export interface InvokeClient {
  invoke(
    contractAddress: BigNumberish,
    entryPoint: string,
    calldata?: readonly BigNumberish[],
    fee?: FeeArgs,
    nonce?: BigNumberish,
  ): Promise<InvokeOutcome>;
  call(
    contractAddress: BigNumberish,
    entryPoint: string,
    calldata?: readonly BigNumberish[],
    blockId?: BlockId,
  ): Promise<CallOutcome>;
  checkRpcVersion(): Promise<VersionOutcome>;
}

type Exchange = { kind: "Success"; result: unknown } | Failure;

function failure(error: ScriptCommandError): Failure {
  debug(`failed: ${describeScriptCommandError(error)}`);
  return { kind: "Failure", error };
}

function malformed(message: string): Failure {
  return failure(
    classify({
      kind: "Transport",
      failure: { kind: "MalformedResponse", message },
    }),
  );
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function majorMinor(version: string): string {
  return version.split(".").slice(0, 2).join(".");
}

export class DefaultInvokeClient implements InvokeClient {
  private readonly transport: Transport;
  private readonly account: { address: bigint; signer: Account } | undefined;
  private readonly feeDefaults: FeeDefaults;
  private readonly expectedRpcVersion: string;

  constructor(options: InvokeClientOptions) {
    this.transport = options.transport;
    // Bad defaults or a bad account address are setup mistakes, not
    // classifiable outcomes
    this.feeDefaults = checkFeeDefaults(options.feeDefaults ?? DEFAULT_FEE_DEFAULTS);
    this.expectedRpcVersion = options.expectedRpcVersion ?? EXPECTED_RPC_VERSION;
    if (!RPC_VERSION_PATTERN.test(this.expectedRpcVersion)) {
      throw new InvalidInputError(
        `Expected RPC version is not a version string: ${this.expectedRpcVersion}`,
      );
    }
    this.account =
      options.account === undefined
        ? undefined
        : {
            address: parseContractAddress(options.account.address, "Account address"),
            signer: options.account,
          };
  }

  async invoke(
    contractAddress: BigNumberish,
    entryPoint: string,
    calldata: readonly BigNumberish[] = [],
    fee?: FeeArgs,
    nonce?: BigNumberish,
  ): Promise<InvokeOutcome> {
    debug(`invoke ${entryPoint} on ${contractAddress}`);
    const built = buildInvokeRequest(
      { contractAddress, entryPoint, calldata, fee, nonce },
      this.feeDefaults,
    );
    if (built.kind === "Err") {
      return failure(classify({ kind: "Validation", message: built.message }));
    }
    if (this.account === undefined) {
      return failure(
        classify({ kind: "Validation", message: "No account configured to sign the invoke" }),
      );
    }

    const signed = await this.sign(built.request, this.account);
    if (signed.kind === "Failure") {
      return signed;
    }

    const exchange = await this.exchange(
      ADD_INVOKE_METHOD,
      encodeInvokeRequest(built.request, signed.signed),
    );
    if (exchange.kind === "Failure") {
      return exchange;
    }
    const transactionHash = decodeTransactionHash(exchange.result);
    if (transactionHash === undefined) {
      return malformed("Invoke result does not carry a transaction hash");
    }
    debug(`invoke accepted: ${transactionHash}`);
    return { kind: "Success", transactionHash };
  }

  async call(
    contractAddress: BigNumberish,
    entryPoint: string,
    calldata: readonly BigNumberish[] = [],
    blockId: BlockId = "latest",
  ): Promise<CallOutcome> {
    debug(`call ${entryPoint} on ${contractAddress}`);
    const built = buildCallRequest({ contractAddress, entryPoint, calldata });
    if (built.kind === "Err") {
      return failure(classify({ kind: "Validation", message: built.message }));
    }
    const exchange = await this.exchange(CALL_METHOD, encodeCallRequest(built.request, blockId));
    if (exchange.kind === "Failure") {
      return exchange;
    }
    const result = decodeCallResult(exchange.result);
    if (result === undefined) {
      return malformed("Call result is not a list of field elements");
    }
    return { kind: "Success", result };
  }

  async checkRpcVersion(): Promise<VersionOutcome> {
    const exchange = await this.exchange(SPEC_VERSION_METHOD, encodeSpecVersionRequest());
    if (exchange.kind === "Failure") {
      return exchange;
    }
    const version = decodeSpecVersion(exchange.result);
    if (version === undefined) {
      return malformed("Spec version is not a version string");
    }
    if (majorMinor(version) !== majorMinor(this.expectedRpcVersion)) {
      debug(`node speaks RPC ${version}, expected ${this.expectedRpcVersion}`);
      return failure(ScriptCommandError.rpc(RPCError.versionNotSupported()));
    }
    return { kind: "Success", version };
  }

  private async sign(
    request: InvokeRequest,
    account: { address: bigint; signer: Account },
  ): Promise<{ kind: "Signed"; signed: SignedInvoke } | Failure> {
    const payload: InvokePayload = {
      request,
      senderAddress: account.address,
      executeCalldata: executeCalldata(request),
      version: transactionVersion(request.fee),
    };
    if (request.nonce !== undefined) {
      payload.nonce = request.nonce;
    }

    try {
      const signature = await account.signer.sign(payload);
      return {
        kind: "Signed",
        signed: {
          senderAddress: account.address,
          signature: signature.signature.map((value, index) =>
            parseFelt(value, `Signature[${index}]`),
          ),
          nonce: request.nonce ?? parseFelt(signature.nonce, "Nonce"),
        },
      };
    } catch (error) {
      const reason =
        error instanceof InvalidInputError
          ? `Account returned an invalid signature: ${error.message}`
          : `Account failed to sign the invoke: ${errorMessage(error)}`;
      return failure(classify({ kind: "Unexpected", message: reason }));
    }
  }

  private async exchange(method: string, body: string): Promise<Exchange> {
    const exchange = await this.roundTrip(body);
    const outcome = exchange.kind === "Success" ? "Success" : exchange.error.kind;
    debug(`${method} id=${JSON_RPC_REQUEST_ID} -> ${outcome}`);
    return exchange;
  }

  // Exactly one transport round trip, no retries
  private async roundTrip(body: string): Promise<Exchange> {
    let response: TransportResult;
    try {
      response = await this.transport.send(body);
    } catch (error) {
      return failure(
        classify({ kind: "Unexpected", message: `Transport raised: ${errorMessage(error)}` }),
      );
    }
    if (response.kind === "Failure") {
      return failure(classify({ kind: "Transport", failure: response.failure }));
    }

    const decoded = decodeResponse(response.body, JSON_RPC_REQUEST_ID);
    switch (decoded.kind) {
      case "Malformed":
        return malformed(decoded.reason);
      case "RpcError":
        return failure(classify({ kind: "JsonRpc", error: decoded.error }));
      case "Success":
        return { kind: "Success", result: decoded.result };
    }
  }
}

export function createInvokeClient(options: InvokeClientOptions): InvokeClient {
  return new DefaultInvokeClient(options);
}

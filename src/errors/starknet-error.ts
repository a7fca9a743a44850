/**
 * Error codes published in the Starknet JSON-RPC specification (v0.7).
 * This table must follow the node's catalog: a code missing here is reported
 * as an unknown RPC error rather than a Starknet error.
 */
export const STARKNET_ERRORS = [
  { kind: "FailedToReceiveTransaction", code: 1, message: "Failed to write transaction" },
  { kind: "NoTraceAvailable", code: 10, message: "No trace available for transaction" },
  { kind: "ContractNotFound", code: 20, message: "Contract not found" },
  { kind: "EntryPointNotFound", code: 21, message: "Requested entrypoint does not exist in the contract" },
  { kind: "BlockNotFound", code: 24, message: "Block not found" },
  { kind: "InvalidTransactionIndex", code: 27, message: "Invalid transaction index in a block" },
  { kind: "ClassHashNotFound", code: 28, message: "Class hash not found" },
  { kind: "TransactionHashNotFound", code: 29, message: "Transaction hash not found" },
  { kind: "PageSizeTooBig", code: 31, message: "Requested page size is too big" },
  { kind: "NoBlocks", code: 32, message: "There are no blocks" },
  { kind: "InvalidContinuationToken", code: 33, message: "The supplied continuation token is invalid or unknown" },
  { kind: "TooManyKeysInFilter", code: 34, message: "Too many keys provided in a filter" },
  { kind: "ContractError", code: 40, message: "Contract error" },
  { kind: "TransactionExecutionError", code: 41, message: "Transaction execution error" },
  { kind: "ClassAlreadyDeclared", code: 51, message: "Class already declared" },
  { kind: "InvalidTransactionNonce", code: 52, message: "Invalid transaction nonce" },
  { kind: "InsufficientMaxFee", code: 53, message: "Max fee is smaller than the minimal transaction cost (validation plus fee transfer)" },
  { kind: "InsufficientAccountBalance", code: 54, message: "Account balance is smaller than the transaction's max_fee" },
  { kind: "ValidationFailure", code: 55, message: "Account validation failed" },
  { kind: "CompilationFailed", code: 56, message: "Compilation failed" },
  { kind: "ContractClassSizeIsTooLarge", code: 57, message: "Contract class size it too large" },
  { kind: "NonAccount", code: 58, message: "Sender address in not an account contract" },
  { kind: "DuplicateTx", code: 59, message: "A transaction with the same hash already exists in the mempool" },
  { kind: "CompiledClassHashMismatch", code: 60, message: "the compiled class hash did not match the one supplied in the transaction" },
  { kind: "UnsupportedTxVersion", code: 61, message: "the transaction version is not supported" },
  { kind: "UnsupportedContractClassVersion", code: 62, message: "the contract class version is not supported" },
  { kind: "UnexpectedError", code: 63, message: "An unexpected error occurred" },
] as const;

export type KnownStarknetErrorKind = (typeof STARKNET_ERRORS)[number]["kind"];

interface KnownStarknetError {
  kind: KnownStarknetErrorKind;
  // Structured payload exactly as the node sent it
  data?: unknown;
}

export type StarknetError = KnownStarknetError | { kind: "Unknown"; code: number };

const BY_CODE = new Map<number, (typeof STARKNET_ERRORS)[number]>(
  STARKNET_ERRORS.map((entry) => [entry.code, entry]),
);

const BY_KIND = new Map<string, (typeof STARKNET_ERRORS)[number]>(
  STARKNET_ERRORS.map((entry) => [entry.kind, entry]),
);

export function starknetErrorFromCode(code: number, data?: unknown): StarknetError {
  const entry = BY_CODE.get(code);
  if (entry === undefined) {
    return { kind: "Unknown", code };
  }
  return data === undefined ? { kind: entry.kind } : { kind: entry.kind, data };
}

export function starknetErrorCode(error: StarknetError): number {
  if (error.kind === "Unknown") {
    return error.code;
  }
  const entry = BY_KIND.get(error.kind);
  if (entry === undefined) {
    throw new Error(`Starknet error ${error.kind} is missing from the code table`);
  }
  return entry.code;
}

export function starknetErrorMessage(error: StarknetError): string {
  if (error.kind === "Unknown") {
    return `Unknown Starknet error code ${error.code}`;
  }
  return BY_KIND.get(error.kind)?.message ?? error.kind;
}

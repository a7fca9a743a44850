import * as dotenv from "dotenv";

import { FIELD_PRIME, MAX_U128, MAX_U64 } from "./felt";
import type { FeeDefaults } from "./fee";
import { RPC_VERSION_PATTERN } from "./response-decoder";
import { DEFAULT_TIMEOUT_MS } from "./transport";

export const EXPECTED_RPC_VERSION = "0.7.0";

// Node clamps longer timer delays to 1 ms
export const MAX_TIMEOUT_MS = 2_147_483_647;

export const DEFAULT_FEE_DEFAULTS: FeeDefaults = {
  maxFee: 0xfffffffffffffn,
  maxGas: 100_000n,
  maxGasUnitPrice: 100_000_000_000_000n,
};

export class ConfigError extends Error {
  readonly variable: string;

  constructor(variable: string, message: string) {
    super(message);
    this.name = "ConfigError";
    this.variable = variable;
  }
}

export interface InvokeConfig {
  rpcUrl: URL;
  timeoutMs: number;
  feeDefaults: FeeDefaults;
  expectedRpcVersion: string;
}

type Env = Record<string, string | undefined>;

function readRpcUrl(env: Env): URL {
  const rpcUrl = env.RPC_URL;
  if (rpcUrl === undefined || rpcUrl === "") {
    throw new ConfigError(
      "RPC_URL",
      "The required environmental variable `RPC_URL` is not set. Please set it manually or in a .env file, e.g. RPC_URL=https://example.com/rpc/v0_7",
    );
  }
  try {
    return new URL(rpcUrl);
  } catch {
    throw new ConfigError(
      "RPC_URL",
      `Failed to parse the URL from the \`RPC_URL\` environmental variable: ${rpcUrl}`,
    );
  }
}

function readPositive(
  env: Env,
  variable: string,
  fallback: bigint,
  max: bigint,
): bigint {
  const raw = env[variable];
  if (raw === undefined || raw === "") {
    return fallback;
  }
  if (!/^(0x[0-9a-fA-F]+|[0-9]+)$/.test(raw) || BigInt(raw) === 0n) {
    throw new ConfigError(
      variable,
      `\`${variable}\` must be a positive integer, got: ${raw}`,
    );
  }
  const value = BigInt(raw);
  if (value > max) {
    throw new ConfigError(
      variable,
      `\`${variable}\` must not exceed ${max}, got: ${raw}`,
    );
  }
  return value;
}

function readRpcVersion(env: Env): string {
  const version = env.EXPECTED_RPC_VERSION;
  if (version === undefined || version === "") {
    return EXPECTED_RPC_VERSION;
  }
  if (!RPC_VERSION_PATTERN.test(version)) {
    throw new ConfigError(
      "EXPECTED_RPC_VERSION",
      `\`EXPECTED_RPC_VERSION\` must be a version such as 0.7.0, got: ${version}`,
    );
  }
  return version;
}

/**
 * Read the client settings from the environment. Without an explicit env the
 * process environment is used, after loading a local .env file.
 */
export function loadConfig(env?: Env): InvokeConfig {
  if (env === undefined) {
    dotenv.config();
  }
  const source = env ?? process.env;

  return {
    rpcUrl: readRpcUrl(source),
    timeoutMs: Number(
      readPositive(
        source,
        "RPC_TIMEOUT_MS",
        BigInt(DEFAULT_TIMEOUT_MS),
        BigInt(MAX_TIMEOUT_MS),
      ),
    ),
    feeDefaults: {
      maxFee: readPositive(
        source,
        "DEFAULT_MAX_FEE",
        DEFAULT_FEE_DEFAULTS.maxFee,
        FIELD_PRIME - 1n,
      ),
      maxGas: readPositive(
        source,
        "DEFAULT_MAX_GAS",
        DEFAULT_FEE_DEFAULTS.maxGas,
        MAX_U64,
      ),
      maxGasUnitPrice: readPositive(
        source,
        "DEFAULT_MAX_GAS_UNIT_PRICE",
        DEFAULT_FEE_DEFAULTS.maxGasUnitPrice,
        MAX_U128,
      ),
    },
    expectedRpcVersion: readRpcVersion(source),
  };
}

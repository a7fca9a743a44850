import type { BigNumberish } from "starknet";

import { InvalidInputError, MAX_U128, MAX_U64, parseFelt } from "./felt";

export type FeeToken = "eth" | "strk";

export interface FeeArgs {
  // Token that transaction fee will be paid in
  feeToken?: FeeToken;
  // Max fee for the transaction, falls back to the configured default
  maxFee?: BigNumberish;
  // Max gas amount, STRK only
  maxGas?: BigNumberish;
  // Max gas price in STRK, STRK only
  maxGasUnitPrice?: BigNumberish;
}

export interface EthFeeSettings {
  kind: "Eth";
  maxFee?: bigint;
}

export interface StrkFeeSettings {
  kind: "Strk";
  maxFee?: bigint;
  maxGas?: bigint;
  maxGasUnitPrice?: bigint;
}

export type FeeSettings = EthFeeSettings | StrkFeeSettings;

// Eth pays through a v1 transaction, Strk through v3 resource bounds
export type ResolvedFee =
  | { kind: "Eth"; maxFee: bigint }
  | { kind: "Strk"; maxGas: bigint; maxGasUnitPrice: bigint };

export interface FeeDefaults {
  maxFee: bigint;
  maxGas: bigint;
  maxGasUnitPrice: bigint;
}

export const DEFAULT_FEE_SETTINGS: FeeSettings = { kind: "Eth" };

function optionalFelt(
  value: BigNumberish | undefined,
  label: string,
): bigint | undefined {
  return value === undefined ? undefined : parseFelt(value, label);
}

function checkedBound(value: bigint, max: bigint, label: string): bigint {
  if (value > max) {
    throw new InvalidInputError(`Failed to convert ${label}: ${value} does not fit`);
  }
  return value;
}

export function parseFeeSettings(args: FeeArgs): FeeSettings {
  const maxFee = optionalFelt(args.maxFee, "Max fee");
  const maxGas = optionalFelt(args.maxGas, "Max gas");
  const maxGasUnitPrice = optionalFelt(args.maxGasUnitPrice, "Max gas unit price");

  switch (args.feeToken) {
    case undefined:
      throw new InvalidInputError("Fee token is not provided");
    case "eth":
      if (maxGas !== undefined) {
        throw new InvalidInputError("Max gas is not supported for ETH fee payment");
      }
      if (maxGasUnitPrice !== undefined) {
        throw new InvalidInputError(
          "Max gas unit price is not supported for ETH fee payment",
        );
      }
      return maxFee === undefined ? { kind: "Eth" } : { kind: "Eth", maxFee };
    case "strk": {
      if (maxFee !== undefined) {
        if (
          maxGas !== undefined &&
          maxGasUnitPrice !== undefined &&
          maxFee !== maxGas * maxGasUnitPrice
        ) {
          throw new InvalidInputError(
            "Max fee should be equal to max gas amount multiplied by max gas unit price",
          );
        }
        if (maxGas !== undefined && maxGasUnitPrice === undefined && maxFee < maxGas) {
          throw new InvalidInputError(
            "Max fee should be greater than or equal to max gas amount",
          );
        }
        if (maxGas === undefined && maxGasUnitPrice !== undefined && maxFee < maxGasUnitPrice) {
          throw new InvalidInputError(
            "Max fee should be greater than or equal to max gas unit price",
          );
        }
      }
      const settings: StrkFeeSettings = { kind: "Strk" };
      if (maxFee !== undefined) {
        settings.maxFee = maxFee;
      }
      if (maxGas !== undefined) {
        settings.maxGas = checkedBound(maxGas, MAX_U64, "max gas amount");
      }
      if (maxGasUnitPrice !== undefined) {
        settings.maxGasUnitPrice = checkedBound(
          maxGasUnitPrice,
          MAX_U128,
          "max gas unit price",
        );
      }
      return settings;
    }
  }
}

// Configured defaults obey the same bounds as overrides
export function checkFeeDefaults(defaults: FeeDefaults): FeeDefaults {
  return {
    maxFee: parseFelt(defaults.maxFee, "Default max fee"),
    maxGas: checkedBound(
      parseFelt(defaults.maxGas, "Default max gas"),
      MAX_U64,
      "default max gas amount",
    ),
    maxGasUnitPrice: checkedBound(
      parseFelt(defaults.maxGasUnitPrice, "Default max gas unit price"),
      MAX_U128,
      "default max gas unit price",
    ),
  };
}

function floorDiv(dividend: bigint, divisor: bigint, label: string): bigint {
  if (divisor === 0n) {
    throw new InvalidInputError(`Cannot derive ${label} from a zero divisor`);
  }
  return dividend / divisor;
}

/**
 * Fill in whatever the settings leave open. There is no fee estimation here,
 * missing bounds come from the configured defaults or are derived from the
 * max fee.
 */
export function resolveFee(settings: FeeSettings, defaults: FeeDefaults): ResolvedFee {
  if (settings.kind === "Eth") {
    return { kind: "Eth", maxFee: settings.maxFee ?? defaults.maxFee };
  }

  const { maxFee, maxGas, maxGasUnitPrice } = settings;
  if (maxFee === undefined || (maxGas !== undefined && maxGasUnitPrice !== undefined)) {
    return {
      kind: "Strk",
      maxGas: maxGas ?? defaults.maxGas,
      maxGasUnitPrice: maxGasUnitPrice ?? defaults.maxGasUnitPrice,
    };
  }
  if (maxGas === undefined) {
    const price = maxGasUnitPrice ?? defaults.maxGasUnitPrice;
    return {
      kind: "Strk",
      maxGas: checkedBound(floorDiv(maxFee, price, "max gas amount"), MAX_U64, "max gas amount"),
      maxGasUnitPrice: price,
    };
  }
  return {
    kind: "Strk",
    maxGas,
    maxGasUnitPrice: checkedBound(
      floorDiv(maxFee, maxGas, "max gas unit price"),
      MAX_U128,
      "max gas unit price",
    ),
  };
}

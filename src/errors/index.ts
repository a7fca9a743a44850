export * from "./script-command-error";
export * from "./starknet-error";

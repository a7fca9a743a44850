import { type InvokeConfig } from "./config";
import { type Account, type InvokeClient, createInvokeClient } from "./invoke";
import { HttpTransport } from "./transport";

export * from "./classifier";
export * from "./config";
export * from "./errors";
export * from "./fee";
export * from "./felt";
export * from "./invoke";
export * from "./request-builder";
export * from "./response-decoder";
export * from "./transport";

// Client talking to the node named in the configuration
export function createHttpInvokeClient(
  config: InvokeConfig,
  account?: Account,
): InvokeClient {
  return createInvokeClient({
    transport: new HttpTransport({
      nodeUrl: config.rpcUrl.toString(),
      timeoutMs: config.timeoutMs,
    }),
    account,
    feeDefaults: config.feeDefaults,
    expectedRpcVersion: config.expectedRpcVersion,
  });
}

import axios, { AxiosError, type AxiosInstance } from "axios";
import debugFactory from "debug";

const debug = debugFactory("invoke:transport");

export const DEFAULT_TIMEOUT_MS = 30_000;

export type TransportFailure =
  | { kind: "ConnectionError"; message: string }
  | { kind: "Timeout"; message: string }
  | { kind: "MalformedResponse"; message: string };

export type TransportResult =
  | { kind: "Response"; body: string }
  | { kind: "Failure"; failure: TransportFailure };

/**
 * A single request/response exchange with a JSON-RPC endpoint. Network
 * conditions are reported through the result, never thrown.
 */
export interface Transport {
  send(body: string): Promise<TransportResult>;
}

export interface HttpTransportOptions {
  nodeUrl: string;
  timeoutMs?: number;
  headers?: Record<string, string>;
  // Preconfigured axios instance, e.g. with a custom adapter
  client?: AxiosInstance;
}

export function toTransportFailure(error: AxiosError): TransportFailure {
  switch (error.code) {
    case AxiosError.ECONNABORTED:
    case AxiosError.ETIMEDOUT:
      return { kind: "Timeout", message: error.message };
    case AxiosError.ERR_BAD_RESPONSE:
      return { kind: "MalformedResponse", message: error.message };
    default:
      return { kind: "ConnectionError", message: error.message };
  }
}

export class HttpTransport implements Transport {
  readonly nodeUrl: string;
  readonly timeoutMs: number;

  private readonly client: AxiosInstance;
  private readonly headers: Record<string, string>;

  constructor(options: HttpTransportOptions) {
    this.nodeUrl = options.nodeUrl;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.headers = options.headers ?? {};
    this.client = options.client ?? axios.create();
  }

  async send(body: string): Promise<TransportResult> {
    try {
      const response = await this.client.post<unknown>(this.nodeUrl, body, {
        timeout: this.timeoutMs,
        headers: { "Content-Type": "application/json", ...this.headers },
        responseType: "text",
        // Keep the raw body, the decoder owns parsing
        transformResponse: [(data: unknown) => data],
        // JSON-RPC errors may come back with any HTTP status
        validateStatus: () => true,
      });
      debug(`POST ${this.nodeUrl} -> HTTP ${response.status}`);
      if (typeof response.data !== "string") {
        return {
          kind: "Failure",
          failure: {
            kind: "MalformedResponse",
            message: `Response body from ${this.nodeUrl} is not text`,
          },
        };
      }
      return { kind: "Response", body: response.data };
    } catch (error) {
      if (!axios.isAxiosError(error)) {
        throw error;
      }
      const failure = toTransportFailure(error);
      debug(`POST ${this.nodeUrl} failed: ${failure.kind} (${failure.message})`);
      return { kind: "Failure", failure };
    }
  }
}

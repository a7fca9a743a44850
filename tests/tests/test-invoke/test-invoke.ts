import { expect } from "chai";
import debugFactory from "debug";

import { ADDRESS_BOUND, InvalidInputError } from "../../../src/felt";
import { createInvokeClient } from "../../../src/invoke";
import { CONTRACT_ADDRESS, FEE_DEFAULTS } from "../../util/constants";
import { MockTransport } from "../../util/mock-transport";
import { describeInvoke } from "../../util/setup-invoke-tests";
import { StubAccount } from "../../util/stub-account";
import {
  parseRequest,
  rpcErrorBody,
  rpcResultBody,
  selectorHex,
} from "../../util/utils";

describeInvoke("Invoke orchestrator", (context) => {
  describe("invoke", () => {
    it("should report a contract error from the node", async function () {
      context.transport.respondWith(rpcErrorBody(40, "Contract error"));

      const outcome = await context.client.invoke(CONTRACT_ADDRESS, "put", ["0x10"]);

      expect(outcome).to.deep.equal({
        kind: "Failure",
        error: {
          kind: "RPCError",
          error: { kind: "StarknetError", error: { kind: "ContractError" } },
        },
      });
      expect(context.transport.callCount).to.be.equal(1);
    });

    it("should keep the revert reason of a contract error", async function () {
      context.transport.respondWith(
        rpcErrorBody(40, "Contract error", {
          revert_error: "Error in the called contract",
        }),
      );

      const outcome = await context.client.invoke(CONTRACT_ADDRESS, "put", ["0x10"]);

      expect(outcome).to.deep.equal({
        kind: "Failure",
        error: {
          kind: "RPCError",
          error: {
            kind: "StarknetError",
            error: {
              kind: "ContractError",
              data: { revert_error: "Error in the called contract" },
            },
          },
        },
      });
    });

    it("should send a signed starknet_addInvokeTransaction", async function () {
      context.transport.respondWith(rpcResultBody({ transaction_hash: "0x1234" }));

      const outcome = await context.client.invoke(CONTRACT_ADDRESS, "put", ["0x10"]);

      expect(outcome).to.deep.equal({ kind: "Success", transactionHash: "0x1234" });
      expect(parseRequest(context.transport.requests[0])).to.deep.equal({
        id: 1,
        jsonrpc: "2.0",
        method: "starknet_addInvokeTransaction",
        params: {
          invoke_transaction: {
            type: "INVOKE",
            sender_address: "0x3",
            calldata: ["0x1", CONTRACT_ADDRESS, selectorHex("put"), "0x1", "0x10"],
            version: "0x1",
            signature: ["0x1", "0x2"],
            nonce: "0x5",
            max_fee: "0xfffffffffffff",
          },
        },
      });
    });

    it("should hand the account what it signs", async function () {
      context.transport.respondWith(rpcResultBody({ transaction_hash: "0x1234" }));

      await context.client.invoke(CONTRACT_ADDRESS, "put", ["0x10"]);

      expect(context.account.payloads).to.have.length(1);
      const [payload] = context.account.payloads;
      expect(payload?.senderAddress).to.be.equal(3n);
      expect(payload?.version).to.be.equal("0x1");
      expect(payload?.executeCalldata).to.deep.equal([
        1n,
        BigInt(CONTRACT_ADDRESS),
        BigInt(selectorHex("put")),
        1n,
        16n,
      ]);
      expect(payload).to.not.have.property("nonce");
    });

    it("should sign and send an overridden nonce", async function () {
      context.transport.respondWith(rpcResultBody({ transaction_hash: "0x1234" }));

      await context.client.invoke(CONTRACT_ADDRESS, "put", ["0x10"], undefined, 9);

      expect(context.account.payloads[0]?.nonce).to.be.equal(9n);
      expect(parseRequest(context.transport.requests[0]))
        .to.have.nested.property("params.invoke_transaction.nonce")
        .that.equals("0x9");
    });

    it("should send a v3 invoke for STRK fees", async function () {
      context.transport.respondWith(rpcResultBody({ transaction_hash: "0x1234" }));

      await context.client.invoke(CONTRACT_ADDRESS, "put", ["0x10"], {
        feeToken: "strk",
        maxGas: 100,
        maxGasUnitPrice: 10,
      });

      const request = parseRequest(context.transport.requests[0]);
      expect(request)
        .to.have.nested.property("params.invoke_transaction.version")
        .that.equals("0x3");
      expect(request)
        .to.have.nested.property("params.invoke_transaction.resource_bounds.l1_gas")
        .that.deep.equals({ max_amount: "0x64", max_price_per_unit: "0xa" });
      expect(context.account.payloads[0]?.version).to.be.equal("0x3");
    });

    it("should reject a zero contract address without any network call", async function () {
      const outcome = await context.client.invoke("0x0", "put", ["0x10"]);

      expect(outcome).to.deep.equal({
        kind: "Failure",
        error: {
          kind: "ValidationError",
          message: "Contract address must not be zero",
        },
      });
      expect(context.transport.callCount).to.be.equal(0);
      expect(context.account.payloads).to.have.length(0);
    });

    it("should reject addresses that do not decode to an address", async function () {
      const notHex = await context.client.invoke("0xnope", "put", ["0x10"]);
      const tooLarge = await context.client.invoke(ADDRESS_BOUND, "put", ["0x10"]);

      expect(notHex).to.deep.equal({
        kind: "Failure",
        error: {
          kind: "ValidationError",
          message: "Contract address is not a valid field element: 0xnope",
        },
      });
      expect(tooLarge).to.deep.equal({
        kind: "Failure",
        error: {
          kind: "ValidationError",
          message: `Contract address is not a valid contract address: ${ADDRESS_BOUND}`,
        },
      });
      expect(context.transport.callCount).to.be.equal(0);
    });

    it("should report a refused connection as a provider error", async function () {
      context.transport.failWith({
        kind: "ConnectionError",
        message: "connect ECONNREFUSED 127.0.0.1:9944",
      });

      const outcome = await context.client.invoke(CONTRACT_ADDRESS, "put", ["0x10"]);

      expect(outcome).to.deep.equal({
        kind: "Failure",
        error: {
          kind: "ProviderError",
          error: {
            kind: "ConnectionError",
            message: "connect ECONNREFUSED 127.0.0.1:9944",
          },
        },
      });
    });

    it("should report a timeout as a provider error", async function () {
      context.transport.failWith({
        kind: "Timeout",
        message: "timeout of 30000ms exceeded",
      });

      const outcome = await context.client.invoke(CONTRACT_ADDRESS, "put", ["0x10"]);

      expect(outcome).to.deep.equal({
        kind: "Failure",
        error: {
          kind: "ProviderError",
          error: { kind: "Timeout", message: "timeout of 30000ms exceeded" },
        },
      });
      expect(context.transport.callCount).to.be.equal(1);
    });

    it("should report an unparsable body as a malformed response", async function () {
      context.transport.respondWith("<html>502 Bad Gateway</html>");

      const outcome = await context.client.invoke(CONTRACT_ADDRESS, "put", ["0x10"]);

      expect(outcome).to.deep.equal({
        kind: "Failure",
        error: {
          kind: "ProviderError",
          error: {
            kind: "MalformedResponse",
            message: "Response body is not valid JSON",
          },
        },
      });
    });

    it("should report a result without transaction hash as malformed", async function () {
      context.transport.respondWith(rpcResultBody({}));

      const outcome = await context.client.invoke(CONTRACT_ADDRESS, "put", ["0x10"]);

      expect(outcome).to.deep.equal({
        kind: "Failure",
        error: {
          kind: "ProviderError",
          error: {
            kind: "MalformedResponse",
            message: "Invoke result does not carry a transaction hash",
          },
        },
      });
    });

    it("should keep codes it does not know", async function () {
      context.transport.respondWith(rpcErrorBody(12345, "Sequencer is busy"));

      const outcome = await context.client.invoke(CONTRACT_ADDRESS, "put", ["0x10"]);

      expect(outcome).to.deep.equal({
        kind: "Failure",
        error: {
          kind: "RPCError",
          error: { kind: "UnknownError", code: 12345, message: "Sequencer is busy" },
        },
      });
    });

    it("should not retry after a failure", async function () {
      context.transport
        .respondWith(rpcErrorBody(52, "Invalid transaction nonce"))
        .respondWith(rpcResultBody({ transaction_hash: "0x1234" }));

      const outcome = await context.client.invoke(CONTRACT_ADDRESS, "put", ["0x10"]);

      expect(outcome).to.deep.equal({
        kind: "Failure",
        error: {
          kind: "RPCError",
          error: {
            kind: "StarknetError",
            error: { kind: "InvalidTransactionNonce" },
          },
        },
      });
      expect(context.transport.callCount).to.be.equal(1);
    });

    it("should turn a throwing transport into an unknown error", async function () {
      context.transport.throwOnSend(new Error("socket hang up"));

      const outcome = await context.client.invoke(CONTRACT_ADDRESS, "put", ["0x10"]);

      expect(outcome).to.deep.equal({
        kind: "Failure",
        error: { kind: "UnknownError", message: "Transport raised: socket hang up" },
      });
    });

    it("should turn a signing failure into an unknown error", async function () {
      context.account.rejectWith(new Error("device locked"));

      const outcome = await context.client.invoke(CONTRACT_ADDRESS, "put", ["0x10"]);

      expect(outcome).to.deep.equal({
        kind: "Failure",
        error: {
          kind: "UnknownError",
          message: "Account failed to sign the invoke: device locked",
        },
      });
      expect(context.transport.callCount).to.be.equal(0);
    });

    it("should refuse a signature that is not made of felts", async function () {
      context.account.signWith(["0x1", "0xzz"]);

      const outcome = await context.client.invoke(CONTRACT_ADDRESS, "put", ["0x10"]);

      expect(outcome).to.deep.equal({
        kind: "Failure",
        error: {
          kind: "UnknownError",
          message:
            "Account returned an invalid signature: Signature[1] is not a valid field element: 0xzz",
        },
      });
      expect(context.transport.callCount).to.be.equal(0);
    });

    it("should run concurrent invokes independently", async function () {
      context.transport
        .respondWith(rpcResultBody({ transaction_hash: "0x1" }))
        .respondWith(rpcResultBody({ transaction_hash: "0x2" }));

      const outcomes = await Promise.all([
        context.client.invoke(CONTRACT_ADDRESS, "put", ["0x10"]),
        context.client.invoke(CONTRACT_ADDRESS, "put", ["0x20"]),
      ]);

      const hashes = outcomes.map((outcome) =>
        outcome.kind === "Success" ? outcome.transactionHash : outcome.kind,
      );
      expect(hashes.sort()).to.deep.equal(["0x1", "0x2"]);
      expect(context.transport.callCount).to.be.equal(2);
    });
  });

  describe("call", () => {
    it("should return the call result", async function () {
      context.transport.respondWith(rpcResultBody(["0x10", "0x0"]));

      const outcome = await context.client.call(CONTRACT_ADDRESS, "get", ["0x1"]);

      expect(outcome).to.deep.equal({ kind: "Success", result: ["0x10", "0x0"] });
      expect(parseRequest(context.transport.requests[0])).to.deep.equal({
        id: 1,
        jsonrpc: "2.0",
        method: "starknet_call",
        params: {
          request: {
            contract_address: CONTRACT_ADDRESS,
            entry_point_selector: selectorHex("get"),
            calldata: ["0x1"],
          },
          block_id: "latest",
        },
      });
    });

    it("should report a missing contract", async function () {
      context.transport.respondWith(rpcErrorBody(20, "Contract not found"));

      const outcome = await context.client.call("0x1", "doesnotmatter");

      expect(outcome).to.deep.equal({
        kind: "Failure",
        error: {
          kind: "RPCError",
          error: { kind: "StarknetError", error: { kind: "ContractNotFound" } },
        },
      });
    });

    it("should reject a zero address locally", async function () {
      const outcome = await context.client.call("0x0", "doesnotmatter");

      expect(outcome).to.deep.equal({
        kind: "Failure",
        error: {
          kind: "ValidationError",
          message: "Contract address must not be zero",
        },
      });
      expect(context.transport.callCount).to.be.equal(0);
    });

    it("should report a result that is not a felt list", async function () {
      context.transport.respondWith(rpcResultBody({ value: "0x1" }));

      const outcome = await context.client.call(CONTRACT_ADDRESS, "get");

      expect(outcome).to.deep.equal({
        kind: "Failure",
        error: {
          kind: "ProviderError",
          error: {
            kind: "MalformedResponse",
            message: "Call result is not a list of field elements",
          },
        },
      });
    });
  });

  describe("logging", () => {
    const writeLog = debugFactory.log;
    let namespaces = "";
    let lines: string[] = [];

    beforeEach(function () {
      lines = [];
      namespaces = debugFactory.disable();
      debugFactory.enable("invoke:client");
      debugFactory.log = (...args: unknown[]) => {
        lines.push(String(args[0]));
      };
    });

    afterEach(function () {
      debugFactory.log = writeLog;
      debugFactory.enable(namespaces);
    });

    function logged(line: string): string[] {
      return lines.filter((entry) => entry.endsWith(line));
    }

    it("should log the method, id and outcome of an invoke", async function () {
      context.transport.respondWith(rpcResultBody({ transaction_hash: "0x1234" }));

      await context.client.invoke(CONTRACT_ADDRESS, "put", ["0x10"]);

      expect(logged("starknet_addInvokeTransaction id=1 -> Success")).to.have.length(1);
    });

    it("should log the classified kind of a failure", async function () {
      context.transport.respondWith(rpcErrorBody(40, "Contract error"));

      await context.client.invoke(CONTRACT_ADDRESS, "put", ["0x10"]);

      expect(logged("starknet_addInvokeTransaction id=1 -> RPCError")).to.have.length(1);
    });

    it("should log calls and version checks", async function () {
      context.transport
        .respondWith(rpcResultBody(["0x10"]))
        .respondWith(rpcResultBody("0.7.1"));

      await context.client.call(CONTRACT_ADDRESS, "get");
      await context.client.checkRpcVersion();

      expect(logged("starknet_call id=1 -> Success")).to.have.length(1);
      expect(logged("starknet_specVersion id=1 -> Success")).to.have.length(1);
    });
  });

  describe("checkRpcVersion", () => {
    it("should accept a patch release of the expected version", async function () {
      context.transport.respondWith(rpcResultBody("0.7.1"));

      expect(await context.client.checkRpcVersion()).to.deep.equal({
        kind: "Success",
        version: "0.7.1",
      });
      expect(parseRequest(context.transport.requests[0]))
        .to.have.property("method")
        .that.equals("starknet_specVersion");
    });

    it("should refuse another minor version", async function () {
      context.transport.respondWith(rpcResultBody("0.6.0"));

      expect(await context.client.checkRpcVersion()).to.deep.equal({
        kind: "Failure",
        error: { kind: "RPCError", error: { kind: "RPCVersionNotSupported" } },
      });
    });

    it("should refuse a node that does not know the method", async function () {
      context.transport.respondWith(rpcErrorBody(-32601, "Method not found"));

      expect(await context.client.checkRpcVersion()).to.deep.equal({
        kind: "Failure",
        error: { kind: "RPCError", error: { kind: "RPCVersionNotSupported" } },
      });
    });
  });
});

describe("Invoke client setup", () => {
  it("should require an account to invoke", async function () {
    const transport = new MockTransport();
    const client = createInvokeClient({ transport });

    const outcome = await client.invoke(CONTRACT_ADDRESS, "put", ["0x10"]);

    expect(outcome).to.deep.equal({
      kind: "Failure",
      error: {
        kind: "ValidationError",
        message: "No account configured to sign the invoke",
      },
    });
    expect(transport.callCount).to.be.equal(0);
  });

  it("should refuse fee defaults outside their range", function () {
    expect(() =>
      createInvokeClient({
        transport: new MockTransport(),
        account: new StubAccount(),
        feeDefaults: {
          maxFee: 2n ** 256n,
          maxGas: 2n ** 64n,
          maxGasUnitPrice: 2n ** 130n,
        },
      }),
    ).to.throw(
      InvalidInputError,
      `Default max fee is out of the field element range: ${2n ** 256n}`,
    );
  });

  it("should refuse a default max gas that does not fit in u64", function () {
    expect(() =>
      createInvokeClient({
        transport: new MockTransport(),
        account: new StubAccount(),
        feeDefaults: { ...FEE_DEFAULTS, maxGas: 2n ** 64n },
      }),
    ).to.throw(
      InvalidInputError,
      `Failed to convert default max gas amount: ${2n ** 64n} does not fit`,
    );
  });

  it("should refuse an expected RPC version that is not a version", function () {
    expect(() =>
      createInvokeClient({
        transport: new MockTransport(),
        expectedRpcVersion: "latest",
      }),
    ).to.throw(
      InvalidInputError,
      "Expected RPC version is not a version string: latest",
    );
  });

  it("should refuse an account with an invalid address", function () {
    expect(() =>
      createInvokeClient({
        transport: new MockTransport(),
        account: new StubAccount("0x0"),
      }),
    ).to.throw(InvalidInputError, "Account address must not be zero");
  });
});

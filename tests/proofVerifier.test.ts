import { expect } from "chai";
import { Commitment } from "@solana/web3.js";
import { JsonRpcTransport } from "../src/api";
import { ChainStateReader } from "../src/chain";
import { encodeNode } from "../src/crypto";
import { NullAccountError, ResponseFieldError } from "../src/errors";
import { parseJson } from "../src/json";
import { ProofVerifier, extractLeafIndex, extractProofFields } from "../src/proofVerifier";
import {
  appendLeaves,
  buildAccount,
  leafOf,
  proofFor,
} from "./helpers/treeFixture";

const REFERENCE_HOST = "http://reference.test";
const TREE_ID = encodeNode(leafOf(200));
const LEAVES = [leafOf(1), leafOf(2), leafOf(3)];

class FakeAssetHost implements JsonRpcTransport {
  calls: { url: string; body: string }[] = [];
  constructor(private leafIndex: unknown) {}

  async makeRequest(url: string, body: string): Promise<unknown> {
    this.calls.push({ url, body });
    return { jsonrpc: "2.0", id: 0, result: { compression: { leaf_id: this.leafIndex } } };
  }
}

class FakeChain implements ChainStateReader {
  calls: { address: string; commitment: Commitment }[] = [];
  constructor(private data: Uint8Array | null) {}

  async getAccountData(address: string, commitment: Commitment): Promise<Uint8Array | null> {
    this.calls.push({ address, commitment });
    return this.data;
  }
}

function treeAccount(): Uint8Array {
  const { states, changeLogs } = appendLeaves(LEAVES);
  return buildAccount({
    changeLogs,
    levels: states[3],
    rightmostIndex: 3,
    canopyDepth: 1,
    zeroEmptyCanopy: true,
  });
}

// Proof as the API returns it: canopy levels left out
function proofResponse(leaf: Uint8Array, leafIndex: number): unknown {
  const { states } = appendLeaves(LEAVES);
  return {
    jsonrpc: "2.0",
    id: 0,
    result: {
      root: "ignored",
      tree_id: TREE_ID,
      leaf: encodeNode(leaf),
      node_index: 8 + leafIndex,
      proof: proofFor(states[3], leafIndex).slice(0, 2).map(encodeNode),
    },
  };
}

async function rejection(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error("expected a rejection");
}

describe("ProofVerifier", () => {
  it("accepts a proof completed from the canopy", async () => {
    const api = new FakeAssetHost(1);
    const chain = new FakeChain(treeAccount());
    const verifier = new ProofVerifier(api, REFERENCE_HOST, chain);

    expect(await verifier.validate("asset-1", proofResponse(LEAVES[1], 1))).to.equal(true);
    expect(api.calls).to.deep.equal([
      {
        url: REFERENCE_HOST,
        body: '{"jsonrpc":"2.0","id":0,"method":"getAsset","params":{"id":"asset-1"}}',
      },
    ]);
    expect(chain.calls).to.deep.equal([{ address: TREE_ID, commitment: "processed" }]);
  });

  it("rejects a leaf with one flipped byte, every time", async () => {
    const verifier = new ProofVerifier(
      new FakeAssetHost(2),
      REFERENCE_HOST,
      new FakeChain(treeAccount()),
    );
    const leaf = new Uint8Array(LEAVES[2]);
    leaf[31] ^= 0xff;

    expect(await verifier.validate("asset-2", proofResponse(LEAVES[2], 2))).to.equal(true);
    expect(await verifier.validate("asset-2", proofResponse(leaf, 2))).to.equal(false);
    expect(await verifier.validate("asset-2", proofResponse(leaf, 2))).to.equal(false);
  });

  it("fails when the tree account does not exist", async () => {
    const verifier = new ProofVerifier(new FakeAssetHost(1), REFERENCE_HOST, new FakeChain(null));
    const error = await rejection(verifier.validate("asset-1", proofResponse(LEAVES[1], 1)));
    expect(error).to.be.instanceOf(NullAccountError);
  });

  it("fails when the reference host has no leaf index", async () => {
    const verifier = new ProofVerifier(
      new FakeAssetHost(undefined),
      REFERENCE_HOST,
      new FakeChain(treeAccount()),
    );
    const error = await rejection(verifier.validate("asset-1", proofResponse(LEAVES[1], 1)));
    expect(error).to.be.instanceOf(ResponseFieldError);
    expect(error).to.have.property("message", "Cannot get response field leaf_id");
  });

  describe("field extraction", () => {
    it("reads tree id, leaf and proof nodes", () => {
      const fields = extractProofFields(proofResponse(LEAVES[0], 0));
      expect(fields.treeId).to.equal(TREE_ID);
      expect(fields.leaf).to.deep.equal(LEAVES[0]);
      expect(fields.proof).to.have.length(2);
    });

    it("names the first missing field", () => {
      expect(() => extractProofFields({ result: {} })).to.throw(
        ResponseFieldError,
        "Cannot get response field tree_id",
      );
      expect(() =>
        extractProofFields({ result: { tree_id: TREE_ID, leaf: encodeNode(LEAVES[0]) } }),
      ).to.throw(ResponseFieldError, "Cannot get response field proof");
    });

    it("rejects proof nodes that are not 32-byte base58", () => {
      expect(() =>
        extractProofFields({
          result: { tree_id: TREE_ID, leaf: encodeNode(LEAVES[0]), proof: ["0OIl"] },
        }),
      ).to.throw(ResponseFieldError, "Cannot get response field proof");
    });

    it("reads the leaf index from an asset response", () => {
      expect(extractLeafIndex({ result: { compression: { leaf_id: 7 } } })).to.equal(7);
      expect(() => extractLeafIndex({ result: { compression: { leaf_id: -1 } } })).to.throw(
        ResponseFieldError,
      );
    });

    it("reads a leaf index decoded from the wire", () => {
      expect(
        extractLeafIndex(parseJson('{"result":{"compression":{"leaf_id":12}}}')),
      ).to.equal(12);
      expect(() =>
        extractLeafIndex(parseJson('{"result":{"compression":{"leaf_id":1.5}}}')),
      ).to.throw(ResponseFieldError, "Cannot get response field leaf_id");
    });
  });
});

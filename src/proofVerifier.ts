/**
 * Validates getAssetProof responses against live on-chain tree state.
 *
 * The API may drop the upper proof levels that the tree account caches in
 * its canopy; they are filled back in from the account before the root is
 * recomputed.
 */

import { JsonRpcTransport } from "./api";
import { ChainStateReader } from "./chain";
import { decodeNode } from "./crypto";
import { NullAccountError, ResponseFieldError } from "./errors";
import { toIndex } from "./json";
import {
  fillInProofFromCanopy,
  parseTree,
  proveLeaf,
  splitAccount,
} from "./merkle";
import { createBody, getAssetParams, serializeBody } from "./requestBuilder";
import { GET_ASSET_METHOD } from "./types";

export interface AssetProofFields {
  treeId: string;
  leaf: Uint8Array;
  proof: Uint8Array[];
}

function field(value: unknown, key: string): unknown {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return undefined;
  }
  const entry: unknown = Reflect.get(value, key);
  return entry;
}

/**
 * Pull tree id, leaf and proof out of a getAssetProof response
 *
 * @throws ResponseFieldError naming the first missing or malformed field
 */
export function extractProofFields(response: unknown): AssetProofFields {
  const result = field(response, "result");

  const treeId = field(result, "tree_id");
  if (typeof treeId !== "string" || decodeNode(treeId) === null) {
    throw new ResponseFieldError("tree_id");
  }

  const leafValue = field(result, "leaf");
  const leaf = typeof leafValue === "string" ? decodeNode(leafValue) : null;
  if (!leaf) {
    throw new ResponseFieldError("leaf");
  }

  const proofValue = field(result, "proof");
  if (!Array.isArray(proofValue)) {
    throw new ResponseFieldError("proof");
  }
  const proof: Uint8Array[] = [];
  for (const entry of proofValue) {
    const node = typeof entry === "string" ? decodeNode(entry) : null;
    if (!node) {
      throw new ResponseFieldError("proof");
    }
    proof.push(node);
  }

  return { treeId, leaf, proof };
}

/**
 * Read the leaf index from a getAsset response
 *
 * @throws ResponseFieldError when `result.compression.leaf_id` is absent
 */
export function extractLeafIndex(response: unknown): number {
  const compression = field(field(response, "result"), "compression");
  const leafId = toIndex(field(compression, "leaf_id"));
  if (leafId === undefined) {
    throw new ResponseFieldError("leaf_id");
  }
  return leafId;
}

/** Anything that can judge a getAssetProof response for an asset */
export interface AssetProofValidator {
  validate(assetId: string, response: unknown): Promise<boolean>;
}

export class ProofVerifier implements AssetProofValidator {
  private api: JsonRpcTransport;
  private referenceHost: string;
  private chain: ChainStateReader;

  constructor(
    api: JsonRpcTransport,
    referenceHost: string,
    chain: ChainStateReader,
  ) {
    this.api = api;
    this.referenceHost = referenceHost;
    this.chain = chain;
  }

  /**
   * Check the proof in a getAssetProof response.
   *
   * Resolves to false when the proof does not lead to the tree's current
   * root. Rejects when fields are missing, the account is absent or its
   * bytes cannot be interpreted.
   */
  async validate(assetId: string, response: unknown): Promise<boolean> {
    const { treeId, leaf, proof } = extractProofFields(response);

    // Leaf index from the reference host and the freshest tree state,
    // fetched together; account state is never cached between checks
    const request = serializeBody(
      createBody(GET_ASSET_METHOD, getAssetParams(assetId)),
    );
    const [asset, accountData] = await Promise.all([
      this.api.makeRequest(this.referenceHost, request),
      this.chain.getAccountData(treeId, "processed"),
    ]);

    const leafIndex = extractLeafIndex(asset);
    if (!accountData) {
      throw new NullAccountError(treeId);
    }

    const { header, treeBytes, canopyBytes } = splitAccount(accountData);
    const fullProof = fillInProofFromCanopy(
      canopyBytes,
      header.maxDepth,
      leafIndex,
      proof,
    );
    const tree = parseTree(treeBytes, header);

    return proveLeaf(tree, header, { leaf, leafIndex, proof: fullProof });
  }
}

import { expect } from "chai";
import { emptyNode, hashNodes } from "../src/crypto";
import {
  CanopyError,
  LeafIndexOutOfBoundsError,
  ProofLengthError,
  TreeLayoutError,
} from "../src/errors";
import {
  computeRoot,
  fillInProofFromCanopy,
  findRootInChangelog,
  getCachedPathLength,
  getCurrentRoot,
  merkleTreeGetSize,
  parseHeader,
  parseTree,
  proveLeaf,
  splitAccount,
} from "../src/merkle";
import {
  appendLeaves,
  buildAccount,
  leafOf,
  proofFor,
  rootOf,
} from "./helpers/treeFixture";

const LEAVES = [leafOf(1), leafOf(2), leafOf(3)];

function currentAccount(canopyDepth = 0, zeroEmptyCanopy = false): Uint8Array {
  const { states, changeLogs } = appendLeaves(LEAVES);
  return buildAccount({
    changeLogs,
    levels: states[states.length - 1],
    rightmostIndex: LEAVES.length,
    canopyDepth,
    zeroEmptyCanopy,
  });
}

describe("Concurrent merkle tree", () => {
  describe("empty nodes", () => {
    it("chains keccak hashes of the level below", () => {
      expect(emptyNode(0)).to.deep.equal(new Uint8Array(32));
      expect(emptyNode(1)).to.deep.equal(hashNodes(emptyNode(0), emptyNode(0)));
      expect(emptyNode(2)).to.deep.equal(hashNodes(emptyNode(1), emptyNode(1)));
    });

    it("rejects levels outside the supported depth", () => {
      expect(() => emptyNode(31)).to.throw(RangeError);
      expect(() => emptyNode(-1)).to.throw(RangeError);
    });
  });

  describe("layout", () => {
    it("parses the header fields", () => {
      const header = parseHeader(currentAccount());
      expect(header.maxDepth).to.equal(3);
      expect(header.maxBufferSize).to.equal(8);
      expect(header.creationSlot).to.equal(42n);
      expect(header.isBatchInitialized).to.equal(false);
    });

    it("sizes the active tree from depth and buffer", () => {
      const header = parseHeader(currentAccount());
      // 24 + 8 * (32 + 96 + 8) + (96 + 32 + 8)
      expect(merkleTreeGetSize(header)).to.equal(1248);
    });

    it("rejects unsupported depth and buffer pairs", () => {
      const header = { ...parseHeader(currentAccount()), maxBufferSize: 9 };
      expect(() => merkleTreeGetSize(header)).to.throw(
        TreeLayoutError,
        "Unsupported tree size: depth [3], buffer [9]",
      );
    });

    it("rejects accounts that are not trees", () => {
      const { states, changeLogs } = appendLeaves(LEAVES);
      const data = buildAccount({
        changeLogs,
        levels: states[3],
        rightmostIndex: 3,
        accountType: 0,
      });
      expect(() => parseHeader(data)).to.throw(TreeLayoutError);
    });

    it("rejects truncated account data", () => {
      expect(() => splitAccount(currentAccount().subarray(0, 100))).to.throw(
        TreeLayoutError,
      );
    });

    it("reads counters and the newest root", () => {
      const { header, treeBytes, canopyBytes } = splitAccount(currentAccount(1));
      const tree = parseTree(treeBytes, header);
      const { states } = appendLeaves(LEAVES);

      expect(tree.sequenceNumber).to.equal(3n);
      expect(tree.activeIndex).to.equal(3);
      expect(tree.bufferSize).to.equal(4);
      expect(tree.rightmostProof.index).to.equal(3);
      expect(getCurrentRoot(tree)).to.deep.equal(rootOf(states[3]));
      expect(canopyBytes.length).to.equal(64);
    });

    it("finds older roots in the change log", () => {
      const { header, treeBytes } = splitAccount(currentAccount());
      const tree = parseTree(treeBytes, header);
      const { states } = appendLeaves(LEAVES);

      expect(findRootInChangelog(tree, rootOf(states[1]))).to.equal(1);
      expect(findRootInChangelog(tree, leafOf(9))).to.equal(null);
    });
  });

  describe("canopy", () => {
    it("derives the cached path length from the node count", () => {
      expect(getCachedPathLength(0, 3)).to.equal(0);
      expect(getCachedPathLength(2, 3)).to.equal(1);
      expect(getCachedPathLength(6, 3)).to.equal(2);
    });

    it("rejects node counts that are not a full tree", () => {
      expect(() => getCachedPathLength(1, 3)).to.throw(CanopyError);
      expect(() => getCachedPathLength(30, 3)).to.throw(CanopyError);
    });

    it("rejects canopy bytes that are not whole nodes", () => {
      expect(() =>
        fillInProofFromCanopy(new Uint8Array(33), 3, 0, []),
      ).to.throw(CanopyError);
    });

    it("appends the cached upper nodes to a truncated proof", () => {
      const { states } = appendLeaves(LEAVES);
      const levels = states[3];
      const { canopyBytes } = splitAccount(currentAccount(1));
      const truncated = proofFor(levels, 1).slice(0, 2);

      const full = fillInProofFromCanopy(canopyBytes, 3, 1, truncated);

      expect(full).to.have.length(3);
      expect(full).to.deep.equal(proofFor(levels, 1));
      expect(truncated).to.have.length(2);
    });

    it("replaces zeroed canopy nodes with the empty node of their level", () => {
      const { states } = appendLeaves(LEAVES);
      const { canopyBytes } = splitAccount(currentAccount(1, true));
      const truncated = proofFor(states[3], 0).slice(0, 2);

      const full = fillInProofFromCanopy(canopyBytes, 3, 0, truncated);

      expect(canopyBytes.subarray(32, 64).every((b) => b === 0)).to.equal(true);
      expect(full[2]).to.deep.equal(emptyNode(2));
    });

    it("keeps a full-length proof as is", () => {
      const { states } = appendLeaves(LEAVES);
      const { canopyBytes } = splitAccount(currentAccount(1));
      const proof = proofFor(states[3], 2);

      expect(fillInProofFromCanopy(canopyBytes, 3, 2, proof)).to.deep.equal(proof);
    });

    it("rejects leaf indices beyond the tree", () => {
      expect(() => fillInProofFromCanopy(new Uint8Array(64), 3, 8, [])).to.throw(
        LeafIndexOutOfBoundsError,
      );
    });
  });

  describe("proveLeaf", () => {
    function currentTree() {
      const { header, treeBytes } = splitAccount(currentAccount());
      return { header, tree: parseTree(treeBytes, header) };
    }

    it("accepts a proof for the current root", () => {
      const { header, tree } = currentTree();
      const { states } = appendLeaves(LEAVES);
      const proof = proofFor(states[3], 1);

      expect(computeRoot(LEAVES[1], proof, 1)).to.deep.equal(rootOf(states[3]));
      expect(proveLeaf(tree, header, { leaf: LEAVES[1], leafIndex: 1, proof })).to.equal(true);
    });

    it("fast-forwards a proof built against an older root", () => {
      const { header, tree } = currentTree();
      const { states } = appendLeaves(LEAVES);
      const stale = proofFor(states[2], 0);

      expect(stale).to.not.deep.equal(proofFor(states[3], 0));
      expect(proveLeaf(tree, header, { leaf: LEAVES[0], leafIndex: 0, proof: stale })).to.equal(true);
    });

    it("rejects a stale proof for a leaf modified since", () => {
      const { header, tree } = currentTree();
      const { states } = appendLeaves(LEAVES);
      const stale = proofFor(states[2], 2);

      expect(
        proveLeaf(tree, header, { leaf: new Uint8Array(32), leafIndex: 2, proof: stale }),
      ).to.equal(false);
    });

    it("rejects a proof for a different leaf value", () => {
      const { header, tree } = currentTree();
      const { states } = appendLeaves(LEAVES);
      const leaf = new Uint8Array(LEAVES[1]);
      leaf[0] ^= 1;

      expect(
        proveLeaf(tree, header, { leaf, leafIndex: 1, proof: proofFor(states[3], 1) }),
      ).to.equal(false);
    });

    it("requires a full-length proof", () => {
      const { header, tree } = currentTree();
      const { states } = appendLeaves(LEAVES);

      expect(() =>
        proveLeaf(tree, header, {
          leaf: LEAVES[1],
          leafIndex: 1,
          proof: proofFor(states[3], 1).slice(0, 2),
        }),
      ).to.throw(ProofLengthError, "Proof has 2 nodes after canopy fill, tree depth is 3");
    });

    it("rejects leaves past the rightmost appended index", () => {
      const { header, tree } = currentTree();
      const { states } = appendLeaves(LEAVES);

      expect(() =>
        proveLeaf(tree, header, {
          leaf: new Uint8Array(32),
          leafIndex: 5,
          proof: proofFor(states[3], 5),
        }),
      ).to.throw(LeafIndexOutOfBoundsError);
    });

    it("rejects an uninitialized tree", () => {
      const { states, changeLogs } = appendLeaves(LEAVES);
      const { header, treeBytes } = splitAccount(
        buildAccount({ changeLogs, levels: states[3], rightmostIndex: 3, uninitialized: true }),
      );
      const tree = parseTree(treeBytes, header);

      expect(() =>
        proveLeaf(tree, header, { leaf: LEAVES[0], leafIndex: 0, proof: proofFor(states[3], 0) }),
      ).to.throw(TreeLayoutError, "Tree is not initialized");
    });
  });
});

/**
 * Concurrent Merkle tree account parsing and proof verification
 *
 * Reads the raw bytes of an account owned by the SPL account compression
 * program: a fixed header, the active tree (change log ring buffer plus the
 * rightmost proof), and the canopy of cached upper-level nodes.
 */

import {
  CONCURRENT_MERKLE_TREE_HEADER_SIZE_V1,
  ChangeLog,
  CompressionAccountType,
  ConcurrentMerkleTree,
  LeafProof,
  MerkleTreeAccount,
  MerkleTreeHeader,
  NODE_SIZE,
  RightmostPath,
} from "./types";
import { arraysEqual, emptyNode, hashNodes, isEmptyNode } from "./crypto";
import {
  CanopyError,
  LeafIndexOutOfBoundsError,
  ProofLengthError,
  TreeLayoutError,
} from "./errors";

/**
 * (maxDepth, maxBufferSize) pairs the account compression program can
 * allocate. Any other pair in a header means the bytes are not a tree.
 */
const VALID_TREE_SIZES: ReadonlyArray<readonly [number, number]> = [
  [3, 8],
  [5, 8],
  [6, 16],
  [7, 16],
  [8, 16],
  [9, 16],
  [10, 32],
  [11, 32],
  [12, 32],
  [13, 32],
  [14, 64],
  [14, 256],
  [14, 1024],
  [14, 2048],
  [15, 64],
  [16, 64],
  [17, 64],
  [18, 64],
  [19, 64],
  [20, 64],
  [20, 256],
  [20, 1024],
  [20, 2048],
  [24, 64],
  [24, 256],
  [24, 512],
  [24, 1024],
  [24, 2048],
  [26, 512],
  [26, 1024],
  [26, 2048],
  [30, 512],
  [30, 1024],
  [30, 2048],
];

function asBuffer(bytes: Uint8Array): Buffer {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

// ─── Layout ──────────────────────────────────────────────────────

/**
 * Parse the fixed-size header at the start of a tree account
 */
export function parseHeader(data: Uint8Array): MerkleTreeHeader {
  if (data.length < CONCURRENT_MERKLE_TREE_HEADER_SIZE_V1) {
    throw new TreeLayoutError(
      `Account data is ${data.length} bytes, header needs ${CONCURRENT_MERKLE_TREE_HEADER_SIZE_V1}`,
    );
  }
  const buf = asBuffer(data);

  // Layout: account_type(u8) version(u8) max_buffer_size(u32) max_depth(u32)
  // authority(32) creation_slot(u64) is_batch_initialized(bool) padding(5)
  const accountType = buf.readUInt8(0);
  if (accountType !== CompressionAccountType.ConcurrentMerkleTree) {
    throw new TreeLayoutError(
      `Account type ${accountType} is not a concurrent merkle tree`,
    );
  }
  const version = buf.readUInt8(1);
  if (version !== 0) {
    throw new TreeLayoutError(`Unsupported header version ${version}`);
  }

  return {
    accountType,
    version,
    maxBufferSize: buf.readUInt32LE(2),
    maxDepth: buf.readUInt32LE(6),
    authority: new Uint8Array(buf.subarray(10, 42)),
    creationSlot: buf.readBigUInt64LE(42),
    isBatchInitialized: buf.readUInt8(50) !== 0,
  };
}

/**
 * Byte size of the active tree region for a header's depth and buffer size
 */
export function merkleTreeGetSize(header: MerkleTreeHeader): number {
  const { maxDepth, maxBufferSize } = header;
  const supported = VALID_TREE_SIZES.some(
    ([depth, buffer]) => depth === maxDepth && buffer === maxBufferSize,
  );
  if (!supported) {
    throw new TreeLayoutError(
      `Unsupported tree size: depth [${maxDepth}], buffer [${maxBufferSize}]`,
    );
  }

  const changeLogSize = NODE_SIZE + NODE_SIZE * maxDepth + 8;
  const pathSize = NODE_SIZE * maxDepth + NODE_SIZE + 8;
  return 3 * 8 + maxBufferSize * changeLogSize + pathSize;
}

/**
 * Split account data into header, active tree and canopy regions
 */
export function splitAccount(data: Uint8Array): MerkleTreeAccount {
  const header = parseHeader(data);
  const treeSize = merkleTreeGetSize(header);
  const treeStart = CONCURRENT_MERKLE_TREE_HEADER_SIZE_V1;
  const treeEnd = treeStart + treeSize;
  if (data.length < treeEnd) {
    throw new TreeLayoutError(
      `Account data is ${data.length} bytes, tree needs ${treeEnd}`,
    );
  }

  return {
    header,
    treeBytes: data.subarray(treeStart, treeEnd),
    canopyBytes: data.subarray(treeEnd),
  };
}

function readNodes(buf: Buffer, offset: number, count: number): Uint8Array[] {
  const nodes: Uint8Array[] = [];
  for (let i = 0; i < count; i++) {
    const start = offset + i * NODE_SIZE;
    nodes.push(new Uint8Array(buf.subarray(start, start + NODE_SIZE)));
  }
  return nodes;
}

/**
 * Decode the active tree region
 */
export function parseTree(
  treeBytes: Uint8Array,
  header: MerkleTreeHeader,
): ConcurrentMerkleTree {
  const { maxDepth, maxBufferSize } = header;
  if (treeBytes.length !== merkleTreeGetSize(header)) {
    throw new TreeLayoutError(
      `Tree region is ${treeBytes.length} bytes, expected ${merkleTreeGetSize(header)}`,
    );
  }
  const buf = asBuffer(treeBytes);

  const sequenceNumber = buf.readBigUInt64LE(0);
  const activeIndex = buf.readBigUInt64LE(8);
  const bufferSize = buf.readBigUInt64LE(16);
  if (activeIndex >= BigInt(maxBufferSize)) {
    throw new TreeLayoutError(
      `Active index ${activeIndex} exceeds buffer capacity ${maxBufferSize}`,
    );
  }
  if (bufferSize > BigInt(maxBufferSize)) {
    throw new TreeLayoutError(
      `Buffer size ${bufferSize} exceeds buffer capacity ${maxBufferSize}`,
    );
  }

  let cursor = 24;
  const changeLogs: ChangeLog[] = [];
  for (let i = 0; i < maxBufferSize; i++) {
    const root = readNodes(buf, cursor, 1)[0];
    const path = readNodes(buf, cursor + NODE_SIZE, maxDepth);
    cursor += NODE_SIZE + NODE_SIZE * maxDepth;
    const index = buf.readUInt32LE(cursor);
    cursor += 8; // index + padding
    changeLogs.push({ root, path, index });
  }

  const proof = readNodes(buf, cursor, maxDepth);
  cursor += NODE_SIZE * maxDepth;
  const leaf = readNodes(buf, cursor, 1)[0];
  cursor += NODE_SIZE;
  const rightmostProof: RightmostPath = {
    proof,
    leaf,
    index: buf.readUInt32LE(cursor),
  };

  return {
    sequenceNumber,
    activeIndex: Number(activeIndex),
    bufferSize: Number(bufferSize),
    changeLogs,
    rightmostProof,
  };
}

/**
 * A tree whose counters are all zero was allocated but never initialized
 */
export function isInitialized(tree: ConcurrentMerkleTree): boolean {
  return !(
    tree.sequenceNumber === 0n &&
    tree.activeIndex === 0 &&
    tree.bufferSize === 0
  );
}

/**
 * Root recorded by the newest change log
 */
export function getCurrentRoot(tree: ConcurrentMerkleTree): Uint8Array {
  return tree.changeLogs[tree.activeIndex].root;
}

// ─── Canopy ──────────────────────────────────────────────────────

/**
 * Number of tree levels cached in the canopy.
 * The canopy is a full binary tree without its root, so `nodes + 2` must
 * be a power of two no larger than the whole tree.
 */
export function getCachedPathLength(
  canopyNodeCount: number,
  maxDepth: number,
): number {
  const closestPowerOf2 = canopyNodeCount + 2;
  if ((closestPowerOf2 & (closestPowerOf2 - 1)) !== 0) {
    throw new CanopyError(
      `Canopy has ${canopyNodeCount} nodes, expected 2^n - 2`,
    );
  }
  if (canopyNodeCount > 2 ** (maxDepth + 1) - 2) {
    throw new CanopyError(
      `Canopy has ${canopyNodeCount} nodes, more than a depth ${maxDepth} tree holds`,
    );
  }
  return Math.log2(closestPowerOf2) - 1;
}

/**
 * Complete a truncated proof with the canopy nodes above it.
 *
 * Returns a new array; the input proof is not modified. Zeroed canopy
 * slots stand for empty subtrees and are replaced with the empty node of
 * their level.
 */
export function fillInProofFromCanopy(
  canopyBytes: Uint8Array,
  maxDepth: number,
  leafIndex: number,
  proof: Uint8Array[],
): Uint8Array[] {
  if (canopyBytes.length % NODE_SIZE !== 0) {
    throw new CanopyError(
      `Canopy byte length ${canopyBytes.length} is not a multiple of ${NODE_SIZE}`,
    );
  }
  const canopy = readNodes(
    asBuffer(canopyBytes),
    0,
    canopyBytes.length / NODE_SIZE,
  );
  const pathLen = getCachedPathLength(canopy.length, maxDepth);
  const capacity = 2 ** maxDepth;
  if (!Number.isInteger(leafIndex) || leafIndex < 0 || leafIndex >= capacity) {
    throw new LeafIndexOutOfBoundsError(leafIndex, capacity - 1);
  }

  // Heap index (root = 1) where the leaf's path meets the canopy's bottom row
  let nodeIdx = Math.floor((capacity + leafIndex) / 2 ** (maxDepth - pathLen));

  const inferred: Uint8Array[] = [];
  while (nodeIdx > 1) {
    // heap index k lives at canopy[k - 2]; the sibling is k ^ 1
    const cachedIdx = (nodeIdx - 2) ^ 1;
    const cached = canopy[cachedIdx];
    if (isEmptyNode(cached)) {
      const level = maxDepth - (31 - Math.clz32(nodeIdx));
      inferred.push(emptyNode(level));
    } else {
      inferred.push(cached);
    }
    nodeIdx = Math.floor(nodeIdx / 2);
  }

  const overlap = Math.max(0, proof.length + inferred.length - maxDepth);
  return [...proof, ...inferred.slice(overlap)];
}

// ─── Proof math ──────────────────────────────────────────────────

/**
 * Hash a leaf up through its proof
 */
export function computeRoot(
  leaf: Uint8Array,
  proof: Uint8Array[],
  leafIndex: number,
): Uint8Array {
  let current = leaf;
  let index = leafIndex;
  for (const sibling of proof) {
    current =
      index % 2 === 0 ? hashNodes(current, sibling) : hashNodes(sibling, current);
    index = Math.floor(index / 2);
  }
  return current;
}

/**
 * Find the ring buffer slot whose root matches, searching newest first
 */
export function findRootInChangelog(
  tree: ConcurrentMerkleTree,
  root: Uint8Array,
): number | null {
  const capacity = tree.changeLogs.length;
  for (let i = 0; i < tree.bufferSize; i++) {
    const slot = (((tree.activeIndex - i) % capacity) + capacity) % capacity;
    if (arraysEqual(tree.changeLogs[slot].root, root)) {
      return slot;
    }
  }
  return null;
}

/**
 * Replace the proof node that a change to another leaf invalidated: the
 * node at the level where the two leaves' paths diverge.
 */
export function updateProof(
  changeLog: ChangeLog,
  leafIndex: number,
  proof: Uint8Array[],
): void {
  const critbit = 31 - Math.clz32(leafIndex ^ changeLog.index);
  proof[critbit] = changeLog.path[critbit];
}

/**
 * Bring a proof valid for the root at `fromSlot` up to the current root.
 * Returns null if a newer change log modified the leaf itself.
 */
export function fastForwardProof(
  tree: ConcurrentMerkleTree,
  leafIndex: number,
  proof: Uint8Array[],
  fromSlot: number,
): Uint8Array[] | null {
  const capacity = tree.changeLogs.length;
  const updated = [...proof];
  let slot = fromSlot;
  while (slot !== tree.activeIndex) {
    slot = (slot + 1) % capacity;
    const changeLog = tree.changeLogs[slot];
    if (changeLog.index === leafIndex) {
      return null;
    }
    updateProof(changeLog, leafIndex, updated);
  }
  return updated;
}

/**
 * Check a full-length proof against the tree's current root.
 *
 * A proof built against an older root that is still in the change log is
 * fast-forwarded through the newer changes first.
 */
export function proveLeaf(
  tree: ConcurrentMerkleTree,
  header: MerkleTreeHeader,
  { leaf, leafIndex, proof }: LeafProof,
): boolean {
  if (!isInitialized(tree)) {
    throw new TreeLayoutError("Tree is not initialized");
  }
  if (proof.length !== header.maxDepth) {
    throw new ProofLengthError(proof.length, header.maxDepth);
  }
  const capacity = 2 ** header.maxDepth;
  if (leafIndex >= capacity) {
    throw new LeafIndexOutOfBoundsError(leafIndex, capacity - 1);
  }
  if (leafIndex > tree.rightmostProof.index) {
    throw new LeafIndexOutOfBoundsError(leafIndex, tree.rightmostProof.index);
  }

  const currentRoot = getCurrentRoot(tree);
  const recomputed = computeRoot(leaf, proof, leafIndex);
  if (arraysEqual(recomputed, currentRoot)) {
    return true;
  }

  const slot = findRootInChangelog(tree, recomputed);
  if (slot === null) {
    return false;
  }
  const forwarded = fastForwardProof(tree, leafIndex, proof, slot);
  if (!forwarded) {
    return false;
  }
  return arraysEqual(computeRoot(leaf, forwarded, leafIndex), currentRoot);
}

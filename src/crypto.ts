/**
 * Hashing and byte utilities for Merkle proof verification
 */

import { keccak_256 } from "@noble/hashes/sha3";
import bs58 from "bs58";
import { MAX_SUPPORTED_DEPTH, NODE_SIZE } from "./types";

/**
 * Hash two tree nodes: keccak256(left || right), matching the on-chain
 * account compression program
 */
export function hashNodes(left: Uint8Array, right: Uint8Array): Uint8Array {
  const hasher = keccak_256.create();
  hasher.update(left);
  hasher.update(right);
  return hasher.digest();
}

/**
 * Compare two byte arrays
 */
export function arraysEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

/** True when every byte of the node is zero */
export function isEmptyNode(node: Uint8Array): boolean {
  return node.every((byte) => byte === 0);
}

/**
 * Empty-subtree hashes by level: level 0 is the zero node, level i is
 * hash(empty[i-1], empty[i-1]). Computed once for the deepest supported tree.
 */
const EMPTY_NODES: Uint8Array[] = (() => {
  const nodes: Uint8Array[] = [new Uint8Array(NODE_SIZE)];
  for (let level = 1; level <= MAX_SUPPORTED_DEPTH; level++) {
    const prev = nodes[level - 1];
    nodes.push(hashNodes(prev, prev));
  }
  return nodes;
})();

/**
 * Root of an empty subtree of the given height
 */
export function emptyNode(level: number): Uint8Array {
  if (!Number.isInteger(level) || level < 0 || level > MAX_SUPPORTED_DEPTH) {
    throw new RangeError(`Empty node level ${level} is out of range`);
  }
  return EMPTY_NODES[level];
}

/**
 * Decode a base58 string into a 32-byte node, or null when it is not one
 */
export function decodeNode(value: string): Uint8Array | null {
  let bytes: Uint8Array;
  try {
    bytes = bs58.decode(value);
  } catch {
    return null;
  }
  return bytes.length === NODE_SIZE ? bytes : null;
}

/**
 * Encode a node as base58, the representation DAS-API responses use
 */
export function encodeNode(node: Uint8Array): string {
  return bs58.encode(node);
}

export function toHex(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString("hex");
}

/**
 * Shared types and constants for the DAS-API integrity verifier
 */

// ─── RPC method categories ───────────────────────────────────────

export const GET_ASSET_METHOD = "getAsset";
export const GET_ASSET_PROOF_METHOD = "getAssetProof";
export const GET_ASSETS_BY_OWNER_METHOD = "getAssetsByOwner";
export const GET_ASSETS_BY_AUTHORITY_METHOD = "getAssetsByAuthority";
export const GET_ASSETS_BY_GROUP_METHOD = "getAssetsByGroup";
export const GET_ASSETS_BY_CREATOR_METHOD = "getAssetsByCreator";
export const GET_TOKEN_ACCOUNTS_BY_OWNER_METHOD = "getTokenAccountsByOwner";
export const GET_TOKEN_ACCOUNTS_BY_MINT_METHOD = "getTokenAccountsByMint";
export const GET_TOKEN_ACCOUNTS_BY_OWNER_AND_MINT_METHOD =
  "getTokenAccountsByOwnerAndMint";
export const GET_SIGNATURES_FOR_ASSET_METHOD = "getSignaturesForAsset";

/** Every category the verifier knows how to test, in launch order */
export const ALL_METHODS = [
  GET_ASSET_METHOD,
  GET_ASSET_PROOF_METHOD,
  GET_ASSETS_BY_OWNER_METHOD,
  GET_ASSETS_BY_AUTHORITY_METHOD,
  GET_ASSETS_BY_CREATOR_METHOD,
  GET_ASSETS_BY_GROUP_METHOD,
  GET_TOKEN_ACCOUNTS_BY_OWNER_METHOD,
  GET_TOKEN_ACCOUNTS_BY_MINT_METHOD,
  GET_TOKEN_ACCOUNTS_BY_OWNER_AND_MINT_METHOD,
  GET_SIGNATURES_FOR_ASSET_METHOD,
] as const;

export type MethodName = (typeof ALL_METHODS)[number];

/** Pause between host calls to stay under upstream rate limits */
export const REQUESTS_INTERVAL_MS = 1_500;

// ─── JSON-RPC wire types ─────────────────────────────────────────

/**
 * A JSON-RPC request body. Instances are frozen by `createBody` and
 * never mutated afterwards.
 */
export interface Body<P extends object = object> {
  readonly jsonrpc: "2.0";
  readonly id: number;
  readonly method: string;
  readonly params: Readonly<P>;
}

// ─── Result aggregation ──────────────────────────────────────────

/** Per-category counters; `failedTests <= totalTests` always holds */
export interface TestingResult {
  totalTests: number;
  failedTests: number;
}

// ─── Concurrent Merkle tree account layout ───────────────────────

/** Size of a tree node (keccak256 digest) in bytes */
export const NODE_SIZE = 32;

/** Size of the V1 account header: account type + version + 54-byte body */
export const CONCURRENT_MERKLE_TREE_HEADER_SIZE_V1 = 2 + 54;

/** Deepest tree the account compression program supports */
export const MAX_SUPPORTED_DEPTH = 30;

export enum CompressionAccountType {
  Uninitialized = 0,
  ConcurrentMerkleTree = 1,
}

export interface MerkleTreeHeader {
  accountType: CompressionAccountType;
  /** Layout version of the header body; only V1 (0) exists */
  version: number;
  maxBufferSize: number;
  maxDepth: number;
  authority: Uint8Array;
  creationSlot: bigint;
  isBatchInitialized: boolean;
}

/** One entry of the tree's ring buffer of recent modifications */
export interface ChangeLog {
  root: Uint8Array;
  /** Nodes on the modified path, leaf first */
  path: Uint8Array[];
  index: number;
}

/** Proof of the most recently appended leaf */
export interface RightmostPath {
  proof: Uint8Array[];
  leaf: Uint8Array;
  /** Number of leaves appended so far */
  index: number;
}

export interface ConcurrentMerkleTree {
  sequenceNumber: bigint;
  activeIndex: number;
  bufferSize: number;
  changeLogs: ChangeLog[];
  rightmostProof: RightmostPath;
}

/**
 * Account data split into its three regions. The regions partition the
 * buffer with no gap and no overlap.
 */
export interface MerkleTreeAccount {
  header: MerkleTreeHeader;
  treeBytes: Uint8Array;
  canopyBytes: Uint8Array;
}

/** A leaf with the proof claimed for it by the API */
export interface LeafProof {
  leaf: Uint8Array;
  leafIndex: number;
  proof: Uint8Array[];
}

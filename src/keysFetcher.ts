/**
 * Sources of the identifiers each method category is tested with.
 *
 * Key file format:
 *   getAsset:
 *   assetA,assetB
 *   assetC
 *   getTokenAccountsByOwnerAndMint:
 *   (ownerA;mintA),(ownerB;mintB)
 *
 * A line ending in ":" opens a block for that method; following non-empty
 * lines are comma-separated keys appended to it. Empty tokens are skipped.
 */

import * as fs from "fs";
import {
  GET_ASSET_METHOD,
  GET_ASSET_PROOF_METHOD,
  GET_ASSETS_BY_AUTHORITY_METHOD,
  GET_ASSETS_BY_CREATOR_METHOD,
  GET_ASSETS_BY_GROUP_METHOD,
  GET_ASSETS_BY_OWNER_METHOD,
  GET_SIGNATURES_FOR_ASSET_METHOD,
  GET_TOKEN_ACCOUNTS_BY_MINT_METHOD,
  GET_TOKEN_ACCOUNTS_BY_OWNER_AND_MINT_METHOD,
  GET_TOKEN_ACCOUNTS_BY_OWNER_METHOD,
} from "./types";
import { getLogger } from "./logger";

export type KeyPair = [string, string];

/**
 * Supplies the keys to test, one accessor per category. Implementations
 * reject with an Error whose message explains why keys are unavailable.
 */
export interface KeysFetcher {
  getAssetsKeys(): Promise<string[]>;
  getAssetsProofKeys(): Promise<string[]>;
  getOwnersKeys(): Promise<string[]>;
  getAuthoritiesKeys(): Promise<string[]>;
  getCreatorsKeys(): Promise<string[]>;
  getGroupsKeys(): Promise<string[]>;
  getTokenAccountsByOwnerKeys(): Promise<string[]>;
  getTokenAccountsByMintKeys(): Promise<string[]>;
  getTokenAccountsByOwnerAndMintKeys(): Promise<KeyPair[]>;
  getSignaturesForAssetKeys(): Promise<string[]>;
}

// ─── Parsing ─────────────────────────────────────────────────────

/**
 * Parse key file contents into method → keys, preserving file order
 */
export function parseKeysFile(contents: string): Map<string, string[]> {
  const keys = new Map<string, string[]>();
  let current: string | null = null;

  for (const rawLine of contents.split("\n")) {
    const line = rawLine.trimEnd();
    if (line.endsWith(":")) {
      current = line.slice(0, -1).trim();
      continue;
    }
    if (current === null || line.length === 0) continue;

    for (const token of line.split(",")) {
      const key = token.trim();
      if (key.length === 0) continue;
      const list = keys.get(current);
      if (list) {
        list.push(key);
      } else {
        keys.set(current, [key]);
      }
    }
  }

  return keys;
}

/**
 * Parse an `(a;b)` pair token
 *
 * @throws Error when the token is not a pair
 */
export function parseKeyPair(token: string): KeyPair {
  const match = /^\(\s*([^;()\s]+)\s*;\s*([^;()\s]+)\s*\)$/.exec(token);
  if (!match) {
    throw new Error(`Malformed key pair "${token}", expected (first;second)`);
  }
  return [match[1], match[2]];
}

// ─── FileKeysFetcher ─────────────────────────────────────────────

/** Random integer source in [0, max); injectable for deterministic tests */
export type RandomIndex = (max: number) => number;

const defaultRandomIndex: RandomIndex = (max) =>
  Math.floor(Math.random() * max);

/**
 * KeysFetcher backed by a key file read once at construction
 */
export class FileKeysFetcher implements KeysFetcher {
  private keysMap: Map<string, string[]>;

  constructor(keysMap: Map<string, string[]>) {
    this.keysMap = keysMap;
  }

  /**
   * Read and parse a key file
   */
  static async fromFile(filePath: string): Promise<FileKeysFetcher> {
    const contents = await fs.promises.readFile(filePath, "utf8");
    const keysMap = parseKeysFile(contents);
    getLogger().debug("FileKeysFetcher: loaded", {
      filePath,
      methods: keysMap.size,
    });
    return new FileKeysFetcher(keysMap);
  }

  private readKeys(method: string): string[] {
    return [...(this.keysMap.get(method) ?? [])];
  }

  async getAssetsKeys(): Promise<string[]> {
    return this.readKeys(GET_ASSET_METHOD);
  }

  async getAssetsProofKeys(): Promise<string[]> {
    return this.readKeys(GET_ASSET_PROOF_METHOD);
  }

  async getOwnersKeys(): Promise<string[]> {
    return this.readKeys(GET_ASSETS_BY_OWNER_METHOD);
  }

  async getAuthoritiesKeys(): Promise<string[]> {
    return this.readKeys(GET_ASSETS_BY_AUTHORITY_METHOD);
  }

  async getCreatorsKeys(): Promise<string[]> {
    return this.readKeys(GET_ASSETS_BY_CREATOR_METHOD);
  }

  async getGroupsKeys(): Promise<string[]> {
    return this.readKeys(GET_ASSETS_BY_GROUP_METHOD);
  }

  async getTokenAccountsByOwnerKeys(): Promise<string[]> {
    return this.readKeys(GET_TOKEN_ACCOUNTS_BY_OWNER_METHOD);
  }

  async getTokenAccountsByMintKeys(): Promise<string[]> {
    return this.readKeys(GET_TOKEN_ACCOUNTS_BY_MINT_METHOD);
  }

  async getTokenAccountsByOwnerAndMintKeys(): Promise<KeyPair[]> {
    return this.readKeys(GET_TOKEN_ACCOUNTS_BY_OWNER_AND_MINT_METHOD).map(
      parseKeyPair,
    );
  }

  async getSignaturesForAssetKeys(): Promise<string[]> {
    return this.readKeys(GET_SIGNATURES_FOR_ASSET_METHOD);
  }

  /**
   * Pick a random method from the file and a random key for it
   *
   * @throws Error when the file holds no keys
   */
  getRandomCommand(randomIndex: RandomIndex = defaultRandomIndex): [string, string] {
    const methods = [...this.keysMap.keys()].filter(
      (method) => this.readKeys(method).length > 0,
    );
    if (methods.length === 0) {
      throw new Error("Key file contains no keys");
    }
    const method = methods[randomIndex(methods.length)];
    const keys = this.readKeys(method);
    return [method, keys[randomIndex(keys.length)]];
  }
}

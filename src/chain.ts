/**
 * Raw account reads from a Solana RPC node
 */

import { Commitment, Connection, PublicKey } from "@solana/web3.js";

export interface ChainStateReader {
  /**
   * Fetch an account's data at the given commitment.
   * Resolves to null when the account does not exist.
   */
  getAccountData(
    address: string,
    commitment: Commitment,
  ): Promise<Uint8Array | null>;
}

export class SolanaChainStateReader implements ChainStateReader {
  private connection: Connection;

  constructor(connectionOrEndpoint: Connection | string) {
    this.connection =
      typeof connectionOrEndpoint === "string"
        ? new Connection(connectionOrEndpoint)
        : connectionOrEndpoint;
  }

  async getAccountData(
    address: string,
    commitment: Commitment,
  ): Promise<Uint8Array | null> {
    const info = await this.connection.getAccountInfo(
      new PublicKey(address),
      commitment,
    );
    return info ? new Uint8Array(info.data) : null;
  }
}

/**
 * JSON-RPC request bodies and per-method parameter objects
 */

import { Body } from "./types";

/** Page size requested from list methods (the DAS-API maximum) */
export const DEFAULT_PAGE_LIMIT = 1000;
export const DEFAULT_PAGE = 1;

export type AssetSortBy = "created" | "updated" | "recent_action" | "none";
export type AssetSortDirection = "asc" | "desc";

export interface AssetSorting {
  sortBy: AssetSortBy;
  sortDirection?: AssetSortDirection;
}

/**
 * Both hosts must page through results in the same order for the
 * responses to be comparable
 */
export const DEFAULT_SORTING: AssetSorting = {
  sortBy: "created",
  sortDirection: "desc",
};

interface PageOptions {
  sortBy?: AssetSorting;
  limit?: number;
  page?: number;
  before?: string;
  after?: string;
}

export interface GetAssetParams {
  id: string;
}

export type GetAssetProofParams = GetAssetParams;

export interface GetAssetsByOwnerParams extends PageOptions {
  ownerAddress: string;
}

export interface GetAssetsByAuthorityParams extends PageOptions {
  authorityAddress: string;
}

export interface GetAssetsByCreatorParams extends PageOptions {
  creatorAddress: string;
  onlyVerified?: boolean;
}

export interface GetAssetsByGroupParams extends PageOptions {
  groupKey: string;
  groupValue: string;
}

export interface GetTokenAccountsParams {
  ownerAddress?: string;
  mintAddress?: string;
  limit?: number;
  page?: number;
}

export interface GetSignaturesForAssetParams {
  id: string;
  limit?: number;
  page?: number;
}

// ─── Bodies ──────────────────────────────────────────────────────

/**
 * Build an immutable JSON-RPC body. The id is fixed so both hosts echo
 * the same value back.
 */
export function createBody<P extends object>(
  method: string,
  params: P,
): Body<P> {
  return Object.freeze({
    jsonrpc: "2.0" as const,
    id: 0,
    method,
    params: Object.freeze({ ...params }),
  });
}

export function serializeBody<P extends object>(body: Body<P>): string {
  return JSON.stringify(body);
}

// ─── Parameter builders ──────────────────────────────────────────

export function getAssetParams(id: string): GetAssetParams {
  return { id };
}

export function getAssetProofParams(id: string): GetAssetProofParams {
  return { id };
}

const firstPage = (): Required<Pick<PageOptions, "sortBy" | "limit" | "page">> => ({
  sortBy: DEFAULT_SORTING,
  limit: DEFAULT_PAGE_LIMIT,
  page: DEFAULT_PAGE,
});

export function getAssetsByOwnerParams(
  ownerAddress: string,
): GetAssetsByOwnerParams {
  return { ownerAddress, ...firstPage() };
}

export function getAssetsByAuthorityParams(
  authorityAddress: string,
): GetAssetsByAuthorityParams {
  return { authorityAddress, ...firstPage() };
}

export function getAssetsByCreatorParams(
  creatorAddress: string,
  onlyVerified = false,
): GetAssetsByCreatorParams {
  return { creatorAddress, onlyVerified, ...firstPage() };
}

/** Groups are looked up by collection address */
export function getAssetsByGroupParams(
  groupValue: string,
): GetAssetsByGroupParams {
  return { groupKey: "collection", groupValue, ...firstPage() };
}

export function getTokenAccountsParams(
  ownerAddress: string | undefined,
  mintAddress: string | undefined,
): GetTokenAccountsParams {
  const params: GetTokenAccountsParams = {
    limit: DEFAULT_PAGE_LIMIT,
    page: DEFAULT_PAGE,
  };
  if (ownerAddress !== undefined) params.ownerAddress = ownerAddress;
  if (mintAddress !== undefined) params.mintAddress = mintAddress;
  return params;
}

export function getSignaturesForAssetParams(
  id: string,
): GetSignaturesForAssetParams {
  return { id, limit: DEFAULT_PAGE_LIMIT, page: DEFAULT_PAGE };
}

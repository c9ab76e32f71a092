/**
 * DiffChecker - differential testing of a DAS-API deployment
 *
 * For every key of every method category the same request goes to the
 * reference host and the testing host; responses must match structurally
 * once the configured difference filters have been applied. Proof
 * responses are additionally checked against on-chain tree state.
 *
 * Requests within a category run one after another with a fixed pause
 * after every attempt; the upstream hosts rate-limit aggressively.
 */

import { DasApiClient, JsonRpcTransport } from "./api";
import { SolanaChainStateReader } from "./chain";
import { VerifierConfig } from "./config";
import { KeysFetchError } from "./errors";
import { compareResponses } from "./jsonDiff";
import { KeysFetcher } from "./keysFetcher";
import { getLogger } from "./logger";
import { AssetProofValidator, ProofVerifier } from "./proofVerifier";
import {
  createBody,
  getAssetParams,
  getAssetProofParams,
  getAssetsByAuthorityParams,
  getAssetsByCreatorParams,
  getAssetsByGroupParams,
  getAssetsByOwnerParams,
  getSignaturesForAssetParams,
  getTokenAccountsParams,
  serializeBody,
} from "./requestBuilder";
import { TestingResults } from "./testingResults";
import {
  Body,
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
  MethodName,
  REQUESTS_INTERVAL_MS,
  TestingResult,
} from "./types";
import { errorMessage, sleep } from "./utils";

export interface DiffCheckerOptions {
  referenceHost: string;
  testingHost: string;
  /** Maximum paired calls per request; at least 1 */
  testRetries: number;
  logDifferences: boolean;
  /** Compiled difference filters, applied in order */
  filters: RegExp[];
  /** Pause after every attempt (default REQUESTS_INTERVAL_MS) */
  requestIntervalMs?: number;
}

/**
 * Outcome of one paired call. Both fields are absent when either host
 * failed at the transport level: the attempt is skipped, not judged.
 */
interface DiffWithResponses {
  diff?: string;
  testingResponse?: unknown;
}

export class DiffChecker {
  private options: DiffCheckerOptions;
  private keysFetcher: KeysFetcher;
  private api: JsonRpcTransport;
  private proofVerifier: AssetProofValidator;
  private requestIntervalMs: number;
  private testResults = new TestingResults();

  constructor(
    options: DiffCheckerOptions,
    keysFetcher: KeysFetcher,
    api: JsonRpcTransport,
    proofVerifier: AssetProofValidator,
  ) {
    if (!Number.isInteger(options.testRetries) || options.testRetries < 1) {
      throw new RangeError(
        `testRetries must be a positive integer, got ${options.testRetries}`,
      );
    }
    this.options = options;
    this.keysFetcher = keysFetcher;
    this.api = api;
    this.proofVerifier = proofVerifier;
    this.requestIntervalMs = options.requestIntervalMs ?? REQUESTS_INTERVAL_MS;
  }

  /**
   * Wire up the production HTTP client and chain reader from a loaded config
   */
  static fromConfig(config: VerifierConfig, keysFetcher: KeysFetcher): DiffChecker {
    const api = new DasApiClient();
    const proofVerifier = new ProofVerifier(
      api,
      config.referenceHost,
      new SolanaChainStateReader(config.rpcEndpoint),
    );
    return new DiffChecker(
      {
        referenceHost: config.referenceHost,
        testingHost: config.testingHost,
        testRetries: config.testRetries,
        logDifferences: config.logDifferences,
        filters: config.filters,
      },
      keysFetcher,
      api,
      proofVerifier,
    );
  }

  // ─── Results ───────────────────────────────────────────────────

  /** Counters per method, copied */
  getResults(): Map<string, TestingResult> {
    return this.testResults.snapshot();
  }

  showResults(): void {
    for (const [method, result] of this.testResults.snapshot()) {
      getLogger().info(
        `Results of ${method} method test: tested keys total: ${result.totalTests}, failed tests: ${result.failedTests}`,
      );
    }
  }

  // ─── Comparison ────────────────────────────────────────────────

  compareResponses(
    referenceResponse: unknown,
    testingResponse: unknown,
  ): string | undefined {
    return compareResponses(
      referenceResponse,
      testingResponse,
      this.options.filters,
    );
  }

  private async checkRequest<P extends object>(
    body: Body<P>,
  ): Promise<DiffWithResponses> {
    const request = serializeBody(body);
    const [reference, testing] = await Promise.allSettled([
      this.api.makeRequest(this.options.referenceHost, request),
      this.api.makeRequest(this.options.testingHost, request),
    ]);

    if (reference.status === "rejected") {
      getLogger().error(
        `Reference host network error: ${errorMessage(reference.reason)}`,
      );
      return {};
    }
    if (testing.status === "rejected") {
      getLogger().error(
        `Testing host network error: ${errorMessage(testing.reason)}`,
      );
      return {};
    }

    return {
      diff: this.compareResponses(reference.value, testing.value),
      testingResponse: testing.value,
    };
  }

  /**
   * Run a batch strictly in order. Stops before the next request once
   * `signal` aborts; a request already started runs to completion.
   *
   * With `proofAssetId`, the last testing response of every request is
   * also checked as a proof for the asset it names.
   */
  private async checkRequests<P extends object>(
    requests: Body<P>[],
    signal?: AbortSignal,
    proofAssetId?: (params: Readonly<P>) => string,
  ): Promise<void> {
    for (const req of requests) {
      if (signal?.aborted) return;
      this.testResults.incTotalTests(req.method);

      let outcome: DiffWithResponses = {};
      for (let attempt = 0; attempt < this.options.testRetries; attempt++) {
        outcome = await this.checkRequest(req);
        if (outcome.diff === undefined) break;
        // Prevent rate-limit errors
        await sleep(this.requestIntervalMs, signal);
        // No unpaced retries after an abort
        if (signal?.aborted) break;
      }

      let testFailed = false;
      if (outcome.diff !== undefined) {
        testFailed = true;
        if (this.options.logDifferences) {
          getLogger().error(
            `${req.method}: mismatch responses: req: ${serializeBody(req)}, diff: ${outcome.diff}`,
          );
        }
      }

      if (proofAssetId && outcome.testingResponse !== undefined) {
        const proofValid = await this.checkProofValid(
          proofAssetId(req.params),
          outcome.testingResponse,
        );
        testFailed = testFailed || !proofValid;
      }

      if (testFailed) {
        this.testResults.incFailedTests(req.method);
      }

      await sleep(this.requestIntervalMs, signal);
    }
  }

  /**
   * Proof validation for one request; any error counts as invalid
   */
  private async checkProofValid(
    assetId: string,
    testingResponse: unknown,
  ): Promise<boolean> {
    try {
      const proofValid = await this.proofVerifier.validate(
        assetId,
        testingResponse,
      );
      if (!proofValid) {
        getLogger().error(`Invalid proof for ${assetId} asset`);
      }
      return proofValid;
    } catch (error) {
      getLogger().error(
        `Check proof valid for ${assetId} asset: ${errorMessage(error)}`,
      );
      return false;
    }
  }

  private async fetchKeys<K>(
    method: string,
    fetch: () => Promise<K[]>,
  ): Promise<K[]> {
    try {
      return await fetch();
    } catch (error) {
      throw new KeysFetchError(method, errorMessage(error));
    }
  }

  // ─── Method categories ─────────────────────────────────────────

  async checkGetAsset(signal?: AbortSignal): Promise<void> {
    const keys = await this.fetchKeys(GET_ASSET_METHOD, () =>
      this.keysFetcher.getAssetsKeys(),
    );
    const requests = keys.map((key) =>
      createBody(GET_ASSET_METHOD, getAssetParams(key)),
    );
    await this.checkRequests(requests, signal);
  }

  async checkGetAssetProof(signal?: AbortSignal): Promise<void> {
    const keys = await this.fetchKeys(GET_ASSET_PROOF_METHOD, () =>
      this.keysFetcher.getAssetsProofKeys(),
    );
    const requests = keys.map((key) =>
      createBody(GET_ASSET_PROOF_METHOD, getAssetProofParams(key)),
    );
    await this.checkRequests(requests, signal, (params) => params.id);
  }

  async checkGetAssetsByOwner(signal?: AbortSignal): Promise<void> {
    const keys = await this.fetchKeys(GET_ASSETS_BY_OWNER_METHOD, () =>
      this.keysFetcher.getOwnersKeys(),
    );
    const requests = keys.map((key) =>
      createBody(GET_ASSETS_BY_OWNER_METHOD, getAssetsByOwnerParams(key)),
    );
    await this.checkRequests(requests, signal);
  }

  async checkGetAssetsByAuthority(signal?: AbortSignal): Promise<void> {
    const keys = await this.fetchKeys(GET_ASSETS_BY_AUTHORITY_METHOD, () =>
      this.keysFetcher.getAuthoritiesKeys(),
    );
    const requests = keys.map((key) =>
      createBody(
        GET_ASSETS_BY_AUTHORITY_METHOD,
        getAssetsByAuthorityParams(key),
      ),
    );
    await this.checkRequests(requests, signal);
  }

  async checkGetAssetsByCreator(signal?: AbortSignal): Promise<void> {
    const keys = await this.fetchKeys(GET_ASSETS_BY_CREATOR_METHOD, () =>
      this.keysFetcher.getCreatorsKeys(),
    );
    const requests = keys.map((key) =>
      createBody(GET_ASSETS_BY_CREATOR_METHOD, getAssetsByCreatorParams(key)),
    );
    await this.checkRequests(requests, signal);
  }

  async checkGetAssetsByGroup(signal?: AbortSignal): Promise<void> {
    const keys = await this.fetchKeys(GET_ASSETS_BY_GROUP_METHOD, () =>
      this.keysFetcher.getGroupsKeys(),
    );
    const requests = keys.map((key) =>
      createBody(GET_ASSETS_BY_GROUP_METHOD, getAssetsByGroupParams(key)),
    );
    await this.checkRequests(requests, signal);
  }

  async checkGetTokenAccountsByOwner(signal?: AbortSignal): Promise<void> {
    const keys = await this.fetchKeys(GET_TOKEN_ACCOUNTS_BY_OWNER_METHOD, () =>
      this.keysFetcher.getTokenAccountsByOwnerKeys(),
    );
    const requests = keys.map((owner) =>
      createBody(
        GET_TOKEN_ACCOUNTS_BY_OWNER_METHOD,
        getTokenAccountsParams(owner, undefined),
      ),
    );
    await this.checkRequests(requests, signal);
  }

  async checkGetTokenAccountsByMint(signal?: AbortSignal): Promise<void> {
    const keys = await this.fetchKeys(GET_TOKEN_ACCOUNTS_BY_MINT_METHOD, () =>
      this.keysFetcher.getTokenAccountsByMintKeys(),
    );
    const requests = keys.map((mint) =>
      createBody(
        GET_TOKEN_ACCOUNTS_BY_MINT_METHOD,
        getTokenAccountsParams(undefined, mint),
      ),
    );
    await this.checkRequests(requests, signal);
  }

  async checkGetTokenAccountsByOwnerAndMint(
    signal?: AbortSignal,
  ): Promise<void> {
    const pairs = await this.fetchKeys(
      GET_TOKEN_ACCOUNTS_BY_OWNER_AND_MINT_METHOD,
      () => this.keysFetcher.getTokenAccountsByOwnerAndMintKeys(),
    );
    const requests = pairs.map(([owner, mint]) =>
      createBody(
        GET_TOKEN_ACCOUNTS_BY_OWNER_AND_MINT_METHOD,
        getTokenAccountsParams(owner, mint),
      ),
    );
    await this.checkRequests(requests, signal);
  }

  async checkGetSignaturesForAsset(signal?: AbortSignal): Promise<void> {
    const keys = await this.fetchKeys(GET_SIGNATURES_FOR_ASSET_METHOD, () =>
      this.keysFetcher.getSignaturesForAssetKeys(),
    );
    const requests = keys.map((key) =>
      createBody(
        GET_SIGNATURES_FOR_ASSET_METHOD,
        getSignaturesForAssetParams(key),
      ),
    );
    await this.checkRequests(requests, signal);
  }

  /**
   * Run the check for one category by method name
   */
  check(method: MethodName, signal?: AbortSignal): Promise<void> {
    switch (method) {
      case GET_ASSET_METHOD:
        return this.checkGetAsset(signal);
      case GET_ASSET_PROOF_METHOD:
        return this.checkGetAssetProof(signal);
      case GET_ASSETS_BY_OWNER_METHOD:
        return this.checkGetAssetsByOwner(signal);
      case GET_ASSETS_BY_AUTHORITY_METHOD:
        return this.checkGetAssetsByAuthority(signal);
      case GET_ASSETS_BY_CREATOR_METHOD:
        return this.checkGetAssetsByCreator(signal);
      case GET_ASSETS_BY_GROUP_METHOD:
        return this.checkGetAssetsByGroup(signal);
      case GET_TOKEN_ACCOUNTS_BY_OWNER_METHOD:
        return this.checkGetTokenAccountsByOwner(signal);
      case GET_TOKEN_ACCOUNTS_BY_MINT_METHOD:
        return this.checkGetTokenAccountsByMint(signal);
      case GET_TOKEN_ACCOUNTS_BY_OWNER_AND_MINT_METHOD:
        return this.checkGetTokenAccountsByOwnerAndMint(signal);
      case GET_SIGNATURES_FOR_ASSET_METHOD:
        return this.checkGetSignaturesForAsset(signal);
    }
  }
}

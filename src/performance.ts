/**
 * Load generation against the testing host.
 *
 * A pool of virtual users listens on one broadcast command channel. The
 * producer sends `init`, then `start` for every id, waits out the test
 * duration and sends `stop`. Started users loop: pick a random command from
 * the key file, post it, record latency or error, pause.
 */

import { EventEmitter } from "events";
import { JsonRpcTransport } from "./api";
import { parseKeyPair } from "./keysFetcher";
import { getLogger } from "./logger";
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
} from "./types";
import { errorMessage, sleep } from "./utils";

export const DEFAULT_REQUEST_PAUSE_MS = 100;

export type WorkerCommand =
  | { kind: "init" }
  | { kind: "start"; ids: number[] }
  | { kind: "stop"; ids: number[] };

/** Random `[method, key]` picks; implemented by FileKeysFetcher */
export interface RandomCommandSource {
  getRandomCommand(): [string, string];
}

export interface PerformanceReport {
  requestsSent: number;
  errors: number;
  avgLatencyMs: number;
  p50LatencyMs: number;
  p95LatencyMs: number;
  maxLatencyMs: number;
}

export interface PerformanceOptions {
  virtualUsers: number;
  durationSeconds: number;
  keysFetcher: RandomCommandSource;
  api: JsonRpcTransport;
  testingHost: string;
  signal?: AbortSignal;
  /** Pause between one user's requests (default DEFAULT_REQUEST_PAUSE_MS) */
  requestPauseMs?: number;
}

/**
 * Build the request body for one key of a method, the same way the
 * integrity run does
 *
 * @throws Error for a method the verifier does not know
 */
export function bodyForKey(method: string, key: string): Body {
  switch (method) {
    case GET_ASSET_METHOD:
      return createBody(method, getAssetParams(key));
    case GET_ASSET_PROOF_METHOD:
      return createBody(method, getAssetProofParams(key));
    case GET_ASSETS_BY_OWNER_METHOD:
      return createBody(method, getAssetsByOwnerParams(key));
    case GET_ASSETS_BY_AUTHORITY_METHOD:
      return createBody(method, getAssetsByAuthorityParams(key));
    case GET_ASSETS_BY_CREATOR_METHOD:
      return createBody(method, getAssetsByCreatorParams(key));
    case GET_ASSETS_BY_GROUP_METHOD:
      return createBody(method, getAssetsByGroupParams(key));
    case GET_TOKEN_ACCOUNTS_BY_OWNER_METHOD:
      return createBody(method, getTokenAccountsParams(key, undefined));
    case GET_TOKEN_ACCOUNTS_BY_MINT_METHOD:
      return createBody(method, getTokenAccountsParams(undefined, key));
    case GET_TOKEN_ACCOUNTS_BY_OWNER_AND_MINT_METHOD: {
      const [owner, mint] = parseKeyPair(key);
      return createBody(method, getTokenAccountsParams(owner, mint));
    }
    case GET_SIGNATURES_FOR_ASSET_METHOD:
      return createBody(method, getSignaturesForAssetParams(key));
    default:
      throw new Error(`Unknown method ${method}`);
  }
}

// Nearest-rank percentile
function percentile(sorted: number[], p: number): number {
  if (sorted.length === 0) return 0;
  const index = Math.ceil((p / 100) * sorted.length) - 1;
  return sorted[Math.max(0, index)];
}

export class PerformanceStats {
  private latencies: number[] = [];
  private errors = 0;

  recordLatency(ms: number): void {
    this.latencies.push(ms);
  }

  recordError(): void {
    this.errors += 1;
  }

  report(): PerformanceReport {
    const sorted = [...this.latencies].sort((a, b) => a - b);
    const total = sorted.reduce((sum, value) => sum + value, 0);
    return {
      requestsSent: sorted.length + this.errors,
      errors: this.errors,
      avgLatencyMs: sorted.length === 0 ? 0 : total / sorted.length,
      p50LatencyMs: percentile(sorted, 50),
      p95LatencyMs: percentile(sorted, 95),
      maxLatencyMs: sorted.length === 0 ? 0 : sorted[sorted.length - 1],
    };
  }
}

const COMMAND_EVENT = "command";

/** Broadcast channel: every subscriber sees every command */
export class CommandChannel {
  private emitter = new EventEmitter();

  constructor() {
    this.emitter.setMaxListeners(0);
  }

  broadcast(command: WorkerCommand): void {
    this.emitter.emit(COMMAND_EVENT, command);
  }

  subscribe(listener: (command: WorkerCommand) => void): () => void {
    this.emitter.on(COMMAND_EVENT, listener);
    return () => {
      this.emitter.off(COMMAND_EVENT, listener);
    };
  }
}

type WorkerState = "idle" | "active" | "stopped";

export class VirtualUser {
  readonly id: number;
  private state: WorkerState = "idle";
  private stopController = new AbortController();
  private startWaiters: Array<() => void> = [];
  private unsubscribe: () => void;

  constructor(
    id: number,
    channel: CommandChannel,
    private source: RandomCommandSource,
    private api: JsonRpcTransport,
    private testingHost: string,
    private stats: PerformanceStats,
    private pauseMs: number,
  ) {
    this.id = id;
    this.unsubscribe = channel.subscribe((command) => this.onCommand(command));
  }

  private onCommand(command: WorkerCommand): void {
    switch (command.kind) {
      case "init":
        getLogger().debug(`Worker #${this.id} is initialised and ready to start`);
        return;
      case "start":
        if (this.state === "idle" && command.ids.includes(this.id)) {
          getLogger().debug(`Worker #${this.id} is starting its job`);
          this.state = "active";
          this.releaseWaiters();
        }
        return;
      case "stop":
        if (command.ids.includes(this.id)) {
          this.state = "stopped";
          this.unsubscribe();
          this.stopController.abort();
          this.releaseWaiters();
        }
        return;
    }
  }

  private releaseWaiters(): void {
    const waiters = this.startWaiters;
    this.startWaiters = [];
    for (const resolve of waiters) resolve();
  }

  private waitForStart(): Promise<void> {
    if (this.state !== "idle") return Promise.resolve();
    return new Promise((resolve) => {
      this.startWaiters.push(resolve);
    });
  }

  /**
   * Resolves once a `stop` naming this user has been received
   */
  async run(): Promise<void> {
    await this.waitForStart();
    while (this.state === "active") {
      await this.sendRequest();
      // At least one timer tick so the producer's timers can fire
      await sleep(Math.max(1, this.pauseMs), this.stopController.signal);
    }
  }

  private async sendRequest(): Promise<void> {
    const started = performance.now();
    try {
      const [method, key] = this.source.getRandomCommand();
      await this.api.makeRequest(
        this.testingHost,
        serializeBody(bodyForKey(method, key)),
      );
      this.stats.recordLatency(performance.now() - started);
    } catch (error) {
      this.stats.recordError();
      getLogger().debug(`Worker #${this.id} request failed: ${errorMessage(error)}`);
    }
  }
}

/**
 * Drive random requests against the testing host for the configured
 * duration, or until `signal` aborts
 */
export async function runPerformanceTests(
  options: PerformanceOptions,
): Promise<PerformanceReport> {
  if (!Number.isInteger(options.virtualUsers) || options.virtualUsers < 1) {
    throw new RangeError(
      `virtualUsers must be a positive integer, got ${options.virtualUsers}`,
    );
  }

  const channel = new CommandChannel();
  const stats = new PerformanceStats();
  const pauseMs = options.requestPauseMs ?? DEFAULT_REQUEST_PAUSE_MS;

  const users: VirtualUser[] = [];
  for (let id = 0; id < options.virtualUsers; id++) {
    users.push(
      new VirtualUser(
        id,
        channel,
        options.keysFetcher,
        options.api,
        options.testingHost,
        stats,
        pauseMs,
      ),
    );
  }
  const runs = users.map((user) => user.run());
  const ids = users.map((user) => user.id);

  channel.broadcast({ kind: "init" });
  channel.broadcast({ kind: "start", ids });
  getLogger().info(
    `Performance test started: ${ids.length} virtual users for ${options.durationSeconds}s`,
  );

  await sleep(options.durationSeconds * 1000, options.signal);

  channel.broadcast({ kind: "stop", ids });
  const outcomes = await Promise.allSettled(runs);
  for (const outcome of outcomes) {
    if (outcome.status === "rejected") {
      getLogger().error(`Worker task error: ${errorMessage(outcome.reason)}`);
    }
  }

  return stats.report();
}

// In-process stand-ins for hosts, key sources and the proof validator
import { JsonRpcTransport } from "../../src/api";
import { KeyPair, KeysFetcher } from "../../src/keysFetcher";
import { Logger } from "../../src/logger";
import { AssetProofValidator } from "../../src/proofVerifier";

export const REFERENCE_HOST = "http://reference.test";
export const TESTING_HOST = "http://testing.test";

export interface RecordedCall {
  url: string;
  method: string;
  params: unknown;
}

type Handler = (call: RecordedCall, attempt: number) => unknown;

/**
 * Answers each call through `handler`; `attempt` counts calls to the same
 * host with the same body, starting at 0. A thrown error becomes a rejection.
 */
export class ScriptedTransport implements JsonRpcTransport {
  calls: RecordedCall[] = [];
  private attempts = new Map<string, number>();
  onRequest?: () => void;

  constructor(private handler: Handler) {}

  async makeRequest(url: string, body: string): Promise<unknown> {
    const parsed: unknown = JSON.parse(body);
    const method =
      typeof parsed === "object" && parsed !== null && "method" in parsed
        ? String(parsed.method)
        : "";
    const params =
      typeof parsed === "object" && parsed !== null && "params" in parsed
        ? parsed.params
        : undefined;
    const call = { url, method, params };
    this.calls.push(call);
    this.onRequest?.();

    const key = `${url} ${body}`;
    const attempt = this.attempts.get(key) ?? 0;
    this.attempts.set(key, attempt + 1);
    return this.handler(call, attempt);
  }
}

export class StaticKeysFetcher implements KeysFetcher {
  constructor(
    private keys: Partial<Record<string, string[]>> = {},
    private pairs: KeyPair[] = [],
    private failures: Partial<Record<string, string>> = {},
  ) {}

  private read(method: string): Promise<string[]> {
    const failure = this.failures[method];
    if (failure !== undefined) {
      return Promise.reject(new Error(failure));
    }
    return Promise.resolve([...(this.keys[method] ?? [])]);
  }

  getAssetsKeys(): Promise<string[]> {
    return this.read("getAsset");
  }
  getAssetsProofKeys(): Promise<string[]> {
    return this.read("getAssetProof");
  }
  getOwnersKeys(): Promise<string[]> {
    return this.read("getAssetsByOwner");
  }
  getAuthoritiesKeys(): Promise<string[]> {
    return this.read("getAssetsByAuthority");
  }
  getCreatorsKeys(): Promise<string[]> {
    return this.read("getAssetsByCreator");
  }
  getGroupsKeys(): Promise<string[]> {
    return this.read("getAssetsByGroup");
  }
  getTokenAccountsByOwnerKeys(): Promise<string[]> {
    return this.read("getTokenAccountsByOwner");
  }
  getTokenAccountsByMintKeys(): Promise<string[]> {
    return this.read("getTokenAccountsByMint");
  }
  async getTokenAccountsByOwnerAndMintKeys(): Promise<KeyPair[]> {
    await this.read("getTokenAccountsByOwnerAndMint");
    return this.pairs.map(([owner, mint]) => [owner, mint]);
  }
  getSignaturesForAssetKeys(): Promise<string[]> {
    return this.read("getSignaturesForAsset");
  }
}

export class StubProofValidator implements AssetProofValidator {
  calls: { assetId: string; response: unknown }[] = [];

  constructor(private outcome: boolean | Error = true) {}

  async validate(assetId: string, response: unknown): Promise<boolean> {
    this.calls.push({ assetId, response });
    if (this.outcome instanceof Error) throw this.outcome;
    return this.outcome;
  }
}

export class CapturingLogger implements Logger {
  lines: { level: string; msg: string }[] = [];

  debug(msg: string): void {
    this.lines.push({ level: "debug", msg });
  }
  info(msg: string): void {
    this.lines.push({ level: "info", msg });
  }
  warn(msg: string): void {
    this.lines.push({ level: "warn", msg });
  }
  error(msg: string): void {
    this.lines.push({ level: "error", msg });
  }
}

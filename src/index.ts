/**
 * Main library export
 */

export { DiffChecker } from "./diffChecker";
export type { DiffCheckerOptions } from "./diffChecker";
export { ProofVerifier, extractProofFields, extractLeafIndex } from "./proofVerifier";
export type { AssetProofValidator } from "./proofVerifier";
export { DasApiClient } from "./api";
export type { JsonRpcTransport } from "./api";
export { SolanaChainStateReader } from "./chain";
export type { ChainStateReader } from "./chain";
export { FileKeysFetcher, parseKeysFile, parseKeyPair } from "./keysFetcher";
export type { KeysFetcher, KeyPair } from "./keysFetcher";
export { TestingResults } from "./testingResults";
export { runIntegrityTests, listenShutdown } from "./runner";
export { runPerformanceTests, PerformanceStats } from "./performance";
export type { PerformanceOptions, PerformanceReport } from "./performance";
export { loadConfig, validateConfig } from "./config";
export type { VerifierConfig } from "./config";
export { NoopLogger, ConsoleLogger, getLogger, setLogger } from "./logger";
export type { Logger, LogLevel } from "./logger";
export * from "./errors";
export * from "./jsonDiff";
export * from "./requestBuilder";
export * from "./merkle";
export * from "./types";
export * from "./crypto";
export { parseJson, stringifyJson } from "./json";

#!/usr/bin/env node

import { Command, Option } from "commander";
import { VerifierConfig, loadConfig } from "./config";
import { DasApiClient } from "./api";
import { DiffChecker } from "./diffChecker";
import { ConfigValidationError } from "./errors";
import { FileKeysFetcher } from "./keysFetcher";
import { ConsoleLogger, getLogger, parseLogLevel, setLogger } from "./logger";
import { runPerformanceTests } from "./performance";
import { listenShutdown, runIntegrityTests } from "./runner";
import { errorMessage } from "./utils";

export type TestType = "integrity" | "performance";

type CliOptions = {
  configPath: string;
  testType: TestType;
};

async function runIntegrity(
  config: VerifierConfig,
  keysFetcher: FileKeysFetcher,
): Promise<void> {
  const controller = new AbortController();
  const dispose = listenShutdown(controller);
  try {
    const checker = DiffChecker.fromConfig(config, keysFetcher);
    await runIntegrityTests(checker, controller.signal);
  } finally {
    dispose();
  }
}

async function runPerformance(
  config: VerifierConfig,
  keysFetcher: FileKeysFetcher,
): Promise<void> {
  const controller = new AbortController();
  const dispose = listenShutdown(controller);
  try {
    const report = await runPerformanceTests({
      virtualUsers: config.numOfVirtualUsers,
      durationSeconds: config.testDurationTime,
      keysFetcher,
      api: new DasApiClient(),
      testingHost: config.testingHost,
      signal: controller.signal,
    });
    getLogger().info(
      `Performance results: requests sent: ${report.requestsSent}, errors: ${report.errors}, ` +
        `avg latency: ${report.avgLatencyMs.toFixed(1)}ms, p50: ${report.p50LatencyMs.toFixed(1)}ms, ` +
        `p95: ${report.p95LatencyMs.toFixed(1)}ms, max: ${report.maxLatencyMs.toFixed(1)}ms`,
    );
  } finally {
    dispose();
  }
}

export async function main(argv: string[] = process.argv): Promise<void> {
  setLogger(new ConsoleLogger("[das-verify]", parseLogLevel(process.env.LOG_LEVEL)));

  const program = new Command();
  program
    .name("das-verify")
    .description("Differential integrity and load tests for DAS-API deployments")
    .version("0.1.0")
    .requiredOption("-c, --config-path <path>", "Path to the JSON config file")
    .addOption(
      new Option("-t, --test-type <type>", "Which test suite to run")
        .choices(["integrity", "performance"])
        .makeOptionMandatory(),
    );
  program.parse(argv);
  const options = program.opts<CliOptions>();

  getLogger().info("DAS-API tests start");

  let config: VerifierConfig;
  try {
    config = await loadConfig(options.configPath);
  } catch (error) {
    if (error instanceof ConfigValidationError) {
      getLogger().error(error.message);
      process.exitCode = 1;
      return;
    }
    throw error;
  }

  const keysFetcher = await FileKeysFetcher.fromFile(config.testingFilePath);

  if (options.testType === "integrity") {
    await runIntegrity(config, keysFetcher);
  } else {
    await runPerformance(config, keysFetcher);
  }
}

if (require.main === module) {
  main().catch((error: unknown) => {
    getLogger().error(`Fatal: ${errorMessage(error)}`);
    process.exitCode = 1;
  });
}

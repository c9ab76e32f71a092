// Run configuration: JSON file with snake_case keys, validated with zod
import * as fs from "fs";
import { z } from "zod";
import { ConfigValidationError } from "./errors";
import { compileFilters } from "./jsonDiff";
import { getLogger } from "./logger";
import { errorMessage } from "./utils";

export const DEFAULT_TEST_RETRIES = 20;
export const DEFAULT_VIRTUAL_USERS = 1;
/** Seconds */
export const DEFAULT_TEST_DURATION = 60;

// Environment variables that take precedence over the file
export const CONFIG_ENV_OVERRIDES = {
  DAS_REFERENCE_HOST: "reference_host",
  DAS_TESTING_HOST: "testing_host",
  DAS_RPC_ENDPOINT: "rpc_endpoint",
} as const;

const NonEmptyString = z.string().min(1, "Must not be empty");
const PositiveInt = z.number().int().positive();

export const ConfigFileSchema = z.object({
  reference_host: NonEmptyString,
  testing_host: NonEmptyString,
  rpc_endpoint: NonEmptyString,
  testing_file_path: NonEmptyString,
  test_retries: PositiveInt.default(DEFAULT_TEST_RETRIES),
  log_differences: z.boolean().default(false),
  difference_filter_regexes: z.array(z.string()).default([]),
  num_of_virtual_users: PositiveInt.default(DEFAULT_VIRTUAL_USERS),
  test_duration_time: PositiveInt.default(DEFAULT_TEST_DURATION),
});

export interface VerifierConfig {
  referenceHost: string;
  testingHost: string;
  rpcEndpoint: string;
  testingFilePath: string;
  testRetries: number;
  logDifferences: boolean;
  differenceFilterRegexes: string[];
  /** `differenceFilterRegexes`, compiled with the global flag */
  filters: RegExp[];
  numOfVirtualUsers: number;
  /** Seconds */
  testDurationTime: number;
}

/**
 * Validate a parsed config object and compile its filters
 *
 * @throws ConfigValidationError listing every offending field
 */
export function validateConfig(raw: unknown): VerifierConfig {
  const result = ConfigFileSchema.safeParse(raw);
  if (!result.success) {
    const errors = result.error.issues
      .map((issue) => {
        const path = issue.path.length > 0 ? issue.path.join(".") : "root";
        return `${path}: ${issue.message}`;
      })
      .join(", ");
    throw new ConfigValidationError(`Invalid config: ${errors}`);
  }
  const file = result.data;

  let filters: RegExp[];
  try {
    filters = compileFilters(file.difference_filter_regexes);
  } catch (error) {
    throw new ConfigValidationError(
      `Invalid config: difference_filter_regexes: ${errorMessage(error)}`,
    );
  }

  return {
    referenceHost: file.reference_host,
    testingHost: file.testing_host,
    rpcEndpoint: file.rpc_endpoint,
    testingFilePath: file.testing_file_path,
    testRetries: file.test_retries,
    logDifferences: file.log_differences,
    differenceFilterRegexes: file.difference_filter_regexes,
    filters,
    numOfVirtualUsers: file.num_of_virtual_users,
    testDurationTime: file.test_duration_time,
  };
}

/**
 * Copy `raw` with host overrides from `env` applied. Non-object input is
 * returned unchanged for the schema to reject.
 */
export function applyEnvOverrides(
  raw: unknown,
  env: NodeJS.ProcessEnv = process.env,
): unknown {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    return raw;
  }
  const merged: Record<string, unknown> = { ...raw };
  for (const [variable, key] of Object.entries(CONFIG_ENV_OVERRIDES)) {
    const value = env[variable];
    if (value !== undefined && value.length > 0) {
      merged[key] = value;
    }
  }
  return merged;
}

/**
 * Read, parse and validate the config file at `configPath`
 */
export async function loadConfig(
  configPath: string,
  env: NodeJS.ProcessEnv = process.env,
): Promise<VerifierConfig> {
  let contents: string;
  try {
    contents = await fs.promises.readFile(configPath, "utf8");
  } catch (error) {
    throw new ConfigValidationError(
      `Cannot read config ${configPath}: ${errorMessage(error)}`,
    );
  }

  let raw: unknown;
  try {
    raw = JSON.parse(contents);
  } catch (error) {
    throw new ConfigValidationError(
      `Config ${configPath} is not valid JSON: ${errorMessage(error)}`,
    );
  }

  const config = validateConfig(applyEnvOverrides(raw, env));
  getLogger().debug("Config loaded", {
    configPath,
    testRetries: config.testRetries,
    filters: config.filters.length,
  });
  return config;
}

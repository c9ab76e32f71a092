/**
 * Integrity run orchestration: one task per method category, joined once
 */

import { EventEmitter } from "events";
import { DiffChecker } from "./diffChecker";
import { KeysFetchError } from "./errors";
import { getLogger } from "./logger";
import { ALL_METHODS, MethodName, TestingResult } from "./types";
import { errorMessage } from "./utils";

/**
 * Run every category concurrently and log the per-category results.
 *
 * A category that rejects is logged and leaves the others running. Once
 * `signal` aborts, categories stop at their next request boundary.
 *
 * @returns the result counters after all categories settled
 */
export async function runIntegrityTests(
  checker: DiffChecker,
  signal?: AbortSignal,
  methods: readonly MethodName[] = ALL_METHODS,
): Promise<Map<string, TestingResult>> {
  const outcomes = await Promise.allSettled(
    methods.map((method) => checker.check(method, signal)),
  );

  outcomes.forEach((outcome, i) => {
    if (outcome.status === "fulfilled") return;
    const reason = outcome.reason;
    if (reason instanceof KeysFetchError) {
      getLogger().error(`Keys fetch failed: ${reason.message}`);
    } else {
      getLogger().error(`Task ${methods[i]} failed: ${errorMessage(reason)}`);
    }
  });

  checker.showResults();
  return checker.getResults();
}

const SHUTDOWN_SIGNALS: NodeJS.Signals[] = ["SIGINT", "SIGTERM"];

/**
 * Abort `controller` on the first SIGINT or SIGTERM delivered to `target`.
 *
 * @returns a function that removes the handlers
 */
export function listenShutdown(
  controller: AbortController,
  target: EventEmitter = process,
): () => void {
  const onSignal = (signal: NodeJS.Signals): void => {
    getLogger().info(`Received ${signal}, stopping after in-flight requests`);
    dispose();
    controller.abort();
  };
  const dispose = (): void => {
    for (const signal of SHUTDOWN_SIGNALS) target.off(signal, onSignal);
  };
  for (const signal of SHUTDOWN_SIGNALS) target.once(signal, onSignal);
  return dispose;
}

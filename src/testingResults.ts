/**
 * Per-method pass/fail counters shared by all category tasks
 */

import { TestingResult } from "./types";

/**
 * Counters keyed by method name, created on first use.
 *
 * Every update is a synchronous read-modify-write, so concurrent category
 * tasks on the event loop cannot interleave inside one; no await ever
 * happens while an entry is being modified.
 */
export class TestingResults {
  private results: Map<string, TestingResult> = new Map();

  incTotalTests(method: string): void {
    this.modifyResult(method, (result) => {
      result.totalTests += 1;
    });
  }

  /**
   * Record a failure for a request already counted by `incTotalTests`
   */
  incFailedTests(method: string): void {
    this.modifyResult(method, (result) => {
      if (result.failedTests >= result.totalTests) {
        throw new Error(
          `Failure recorded for ${method} without a matching attempt`,
        );
      }
      result.failedTests += 1;
    });
  }

  private modifyResult(
    method: string,
    update: (result: TestingResult) => void,
  ): void {
    let result = this.results.get(method);
    if (!result) {
      result = { totalTests: 0, failedTests: 0 };
      this.results.set(method, result);
    }
    update(result);
  }

  /**
   * Copy of the counters in first-seen order
   */
  snapshot(): Map<string, TestingResult> {
    const copy = new Map<string, TestingResult>();
    for (const [method, result] of this.results) {
      copy.set(method, { ...result });
    }
    return copy;
  }
}

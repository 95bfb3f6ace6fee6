import { parseTestCaseOutcomesFile } from "../adapter/junit-xml.js";
import { MutableBaselineFile } from "./baseline-file.js";
import type { TestCaseOutcome } from "../types/baseline.js";

export type BaselineUpdateSummary = {
  added: number;
  removed: number;
  expectedFailures: number;
};

/** Apply test case outcomes: failures become expected, passes stop being expected. */
export function applyOutcomes(
  baseline: MutableBaselineFile,
  outcomes: TestCaseOutcome[],
): Pick<BaselineUpdateSummary, "added" | "removed"> {
  let added = 0;
  let removed = 0;
  for (const { className, testName, result } of outcomes) {
    const wasExpected = baseline.isExpectedFailure(className, testName);
    switch (result) {
      case "failed":
        baseline.addExpectedFailure(className, testName);
        if (!wasExpected) added++;
        break;
      case "passed":
        baseline.removeExpectedFailure(className, testName);
        if (wasExpected) removed++;
        break;
      case "skipped":
        break;
    }
  }
  return { added, removed };
}

/**
 * Update the baseline at `baselineFile` from JUnit XML reports, starting from
 * whatever expected failures it already lists. Every report is parsed before
 * anything is written.
 */
export function updateBaselineFromReports(reportFiles: string[], baselineFile: string): BaselineUpdateSummary {
  const baseline = MutableBaselineFile.forFile(baselineFile);
  const outcomes = reportFiles.flatMap((file) => parseTestCaseOutcomesFile(file));
  const { added, removed } = applyOutcomes(baseline, outcomes);
  baseline.write();
  return { added, removed, expectedFailures: baseline.size() };
}

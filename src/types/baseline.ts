/** A project that has a baseline file to refresh. */
export type BaselineProject = Readonly<{
  name: string;
  baselineFile: string;
}>;

export type TestCaseResult = "passed" | "failed" | "skipped";

/** Outcome of a single `<testcase>` in a JUnit XML report. */
export type TestCaseOutcome = {
  className: string;
  testName: string;
  result: TestCaseResult;
};

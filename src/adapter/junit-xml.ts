import { XMLParser, XMLValidator } from "fast-xml-parser";
import fs from "node:fs";
import type { TestCaseOutcome, TestCaseResult } from "../types/baseline.js";

type XmlNode = Record<string, unknown>;

function isNode(value: unknown): value is XmlNode {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function asList(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [value];
}

export class JunitReportError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "JunitReportError";
  }
}

/**
 * Parse JUnit XML and return the outcome of every test case, in document order.
 *
 * Test cases are found at any depth, so both a bare `<testsuite>` and a
 * `<testsuites>` wrapper work.
 *
 * @param location - report path used in error messages.
 */
export function parseTestCaseOutcomes(xmlContent: string, location: string): TestCaseOutcome[] {
  const validation = XMLValidator.validate(xmlContent);
  if (validation !== true) {
    const { msg, line } = validation.err;
    throw new JunitReportError(`Could not parse file ${location}: ${msg} (line ${line})`);
  }

  const parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: "@_",
    // Attribute values are kept verbatim; test names may carry whitespace.
    trimValues: false,
    isArray: (name) => name === "testsuite" || name === "testcase",
  });
  const parsed: unknown = parser.parse(xmlContent);

  const outcomes: TestCaseOutcome[] = [];
  collectTestCases(parsed, location, outcomes);
  return outcomes;
}

function collectTestCases(node: unknown, location: string, out: TestCaseOutcome[]): void {
  if (Array.isArray(node)) {
    for (const item of node) collectTestCases(item, location, out);
    return;
  }
  if (!isNode(node)) return;

  for (const [key, value] of Object.entries(node)) {
    if (key.startsWith("@_")) continue;
    if (key === "testcase") {
      for (const tc of asList(value)) out.push(toOutcome(tc, location));
    } else {
      collectTestCases(value, location, out);
    }
  }
}

function toOutcome(tc: unknown, location: string): TestCaseOutcome {
  const testCase = isNode(tc) ? tc : {};
  const testName = requiredAttribute(testCase, "name", location);
  const className = requiredAttribute(testCase, "classname", location);
  return { className, testName, result: resultOf(testCase) };
}

function requiredAttribute(testCase: XmlNode, name: string, location: string): string {
  const value = testCase[`@_${name}`];
  if (typeof value !== "string") {
    throw new JunitReportError(`${location}: attribute '${name}' is missing`);
  }
  return value;
}

function resultOf(testCase: XmlNode): TestCaseResult {
  if ("failure" in testCase) return "failed";
  if ("skipped" in testCase) return "skipped";
  return "passed";
}

/** Read a JUnit XML report file and return its test case outcomes. */
export function parseTestCaseOutcomesFile(filePath: string): TestCaseOutcome[] {
  return parseTestCaseOutcomes(fs.readFileSync(filePath, "utf8"), filePath);
}

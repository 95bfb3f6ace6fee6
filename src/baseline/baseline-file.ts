import fs from "node:fs";
import path from "node:path";

function byCodeUnit(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Expected test failures, grouped by class.
 *
 * On disk each group is a class name followed by its test names indented by two
 * spaces; groups are separated by an empty line.
 */
export class MutableBaselineFile {
  private readonly expectedFailures = new Map<string, Set<string>>();

  constructor(private readonly filePath: string | null = null) {}

  /** Load the baseline at `filePath`; an absent file gives an empty baseline. */
  static forFile(filePath: string): MutableBaselineFile {
    const baseline = new MutableBaselineFile(filePath);
    if (fs.existsSync(filePath)) {
      baseline.read(fs.readFileSync(filePath, "utf8"), filePath);
    }
    return baseline;
  }

  /**
   * Parse baseline text into this baseline.
   *
   * @param location - file path or url used in error messages.
   */
  read(content: string, location: string): void {
    let currentClassName: string | null = null;
    const lines = content.split(/\r?\n/);
    for (const [index, line] of lines.entries()) {
      if (line.length === 0) {
        currentClassName = null;
      } else if (line.startsWith("  ")) {
        if (currentClassName === null) {
          throw new Error(
            `${location}:${index + 1}: test name found but no preceding class name was found`,
          );
        }
        this.addExpectedFailure(currentClassName, line.substring(2).trimEnd());
      } else {
        currentClassName = line.trimEnd();
      }
    }
  }

  isExpectedFailure(className: string, testName: string): boolean {
    return this.expectedFailures.get(className)?.has(testName) ?? false;
  }

  addExpectedFailure(className: string, testName: string): void {
    let classFailures = this.expectedFailures.get(className);
    if (!classFailures) {
      classFailures = new Set();
      this.expectedFailures.set(className, classFailures);
    }
    classFailures.add(testName);
  }

  removeExpectedFailure(className: string, testName: string): void {
    const classFailures = this.expectedFailures.get(className);
    if (!classFailures) return;
    classFailures.delete(testName);
    if (classFailures.size === 0) {
      this.expectedFailures.delete(className);
    }
  }

  /** Total number of expected failures across all classes. */
  size(): number {
    let total = 0;
    for (const testNames of this.expectedFailures.values()) total += testNames.size;
    return total;
  }

  /** Render the baseline in its on-disk format, classes and tests sorted. */
  render(): string {
    let out = "";
    let separator = "";
    for (const className of [...this.expectedFailures.keys()].sort(byCodeUnit)) {
      const testNames = this.expectedFailures.get(className);
      if (!testNames || testNames.size === 0) continue;
      out += separator;
      separator = "\n";
      out += `${className}\n`;
      for (const testName of [...testNames].sort(byCodeUnit)) {
        out += `  ${testName}\n`;
      }
    }
    return out;
  }

  /**
   * Write the baseline back to its file. An empty baseline deletes the file
   * instead.
   */
  write(): void {
    if (this.filePath === null) {
      throw new Error("Cannot write a baseline that was not read from a file");
    }

    if (this.size() === 0) {
      fs.rmSync(this.filePath, { force: true });
      return;
    }

    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    fs.writeFileSync(this.filePath, this.render(), "utf8");
  }
}

import { ResultGroupType } from "azure-devops-node-api/interfaces/TestInterfaces";
import type { TestCaseResult } from "azure-devops-node-api/interfaces/TestInterfaces";
import type { ResultRecord } from "./interfaces/ITestResultFormat";
import type { GroupedResults, OrderingIndex } from "./interfaces/ITestResultPublisher";
import type { ResultConverter } from "./resultConverter";

// Parameterized tests report as "Base(args)".
export function isDataDrivenTest(name: string): boolean {
  return name.endsWith(")");
}

export function getDataDrivenBaseName(name: string): string {
  return name.split("(", 1)[0];
}

/**
 * Folds a flat run of records into publishable results. Variants sharing a
 * data-driven base name become sub-results of one parent; everything else
 * is published as is. Records can be fed one at a time with {@link add} so
 * a streamed report never has to be held in full.
 */
export class ResultGrouper {
  private readonly dataDriven = new Map<string, TestCaseResult>();
  private readonly standalone: TestCaseResult[] = [];
  private readonly ordering: OrderingIndex = new Map();

  constructor(private converter: ResultConverter) { }

  static group(records: Iterable<ResultRecord | null | undefined>, converter: ResultConverter): GroupedResults {
    const grouper = new ResultGrouper(converter);
    for (const record of records) {
      grouper.add(record);
    }
    return grouper.build();
  }

  add(record: ResultRecord | null | undefined): void {
    if (!record) return;

    if (!isDataDrivenTest(record.name)) {
      const result = this.converter.toTestCaseResult(record);
      if (!result) return;
      this.standalone.push(result);
      this.ordering.set(record.name, []);
      return;
    }

    const baseName = getDataDrivenBaseName(record.name);
    const parent = this.dataDriven.get(baseName);

    if (parent) {
      const subResult = this.converter.toSubResult(record);
      if (!subResult) return;

      if (!parent.subResults) parent.subResults = [];
      parent.subResults.push(subResult);
      this.ordering.get(baseName)?.push(record.name);

      // Once failed, a parent stays failed for the rest of the batch.
      if (subResult.outcome === "Failed") {
        parent.outcome = "Failed";
      }
      return;
    }

    const seed = this.converter.toTestCaseResult(record);
    const firstSubResult = this.converter.toSubResult(record);
    if (!seed || !firstSubResult) return;

    seed.automatedTestName = baseName;
    seed.resultGroupType = ResultGroupType.DataDriven;
    seed.subResults = [firstSubResult];
    this.dataDriven.set(baseName, seed);
    this.ordering.set(baseName, [record.name]);
  }

  /** Grouped parents first, in first-seen order, then standalone results. */
  build(): GroupedResults {
    const ordering: OrderingIndex = new Map();
    for (const [name, names] of this.ordering) {
      ordering.set(name, [...names]);
    }
    return {
      results: [...this.dataDriven.values(), ...this.standalone],
      ordering,
    };
  }
}

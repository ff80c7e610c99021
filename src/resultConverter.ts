import type { TestCaseResult, TestSubResult } from "azure-devops-node-api/interfaces/TestInterfaces";
import type { ILogger } from "./interfaces/ILogger";
import type { ResultOutcome, ResultRecord } from "./interfaces/ITestResultFormat";

export type CorrelationInfo = {
  jobId: string;
  workItemName: string;
};

const OUTCOMES: Record<ResultOutcome, string> = {
  Pass: "Passed",
  Fail: "Failed",
  Skip: "NotExecuted",
};

function isResultOutcome(value: string): value is ResultOutcome {
  return Object.prototype.hasOwnProperty.call(OUTCOMES, value);
}

/**
 * Turns reader records into the result models the Test API accepts. Every
 * converted row carries the same comment so results can be traced back to
 * the job and workitem that produced them.
 */
export class ResultConverter {
  readonly comment: string;

  constructor(private correlation: CorrelationInfo, private logger: ILogger) {
    this.comment = `{ "JobId": ${JSON.stringify(correlation.jobId)}, "WorkItemName": ${JSON.stringify(correlation.workItemName)} }`;
  }

  toTestCaseResult(record: ResultRecord): TestCaseResult | undefined {
    const outcome = this.mapOutcome(record);
    if (!outcome) return undefined;

    const result: TestCaseResult = {
      testCaseTitle: record.name,
      automatedTestName: record.name,
      automatedTestType: record.kind,
      automatedTestStorage: this.correlation.workItemName,
      priority: 1,
      durationInMs: record.durationSeconds * 1000,
      outcome: OUTCOMES[outcome],
      state: "Completed",
      comment: this.comment,
    };

    if (outcome === "Fail") {
      result.errorMessage = record.failureMessage;
      if (record.stackTrace != null) result.stackTrace = record.stackTrace;
    } else if (outcome === "Skip") {
      result.errorMessage = record.skipReason;
    }
    return result;
  }

  // Skipped variants do not carry their reason on the sub-result.
  toSubResult(record: ResultRecord): TestSubResult | undefined {
    const outcome = this.mapOutcome(record);
    if (!outcome) return undefined;

    const subResult: TestSubResult = {
      comment: this.comment,
      displayName: record.name,
      durationInMs: record.durationSeconds * 1000,
      outcome: OUTCOMES[outcome],
    };

    if (outcome === "Fail") {
      subResult.errorMessage = record.failureMessage;
      if (record.stackTrace != null) subResult.stackTrace = record.stackTrace;
    }
    return subResult;
  }

  private mapOutcome(record: ResultRecord): ResultOutcome | undefined {
    if (isResultOutcome(record.outcome)) return record.outcome;
    this.logger.warn(`⚠️ Unexpected result value ${record.outcome} for ${record.name}; skipping.`);
    return undefined;
  }
}

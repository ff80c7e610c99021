import type { ITestApi } from "azure-devops-node-api/TestApi";
import type { TestCaseResult } from "azure-devops-node-api/interfaces/TestInterfaces";
import type { ResultAttachment } from "./ITestResultFormat";

/** Node name -> original record names folded into it, in first-seen order. */
export type OrderingIndex = Map<string, string[]>;

export type GroupedResults = {
    results: TestCaseResult[];
    ordering: OrderingIndex;
};

export type TestResultsClient = Pick<
    ITestApi,
    "addTestResultsToTestRun" | "createTestResultAttachment" | "createTestSubResultAttachment"
>;

export type SubResultMismatch = {
    resultName: string;
    expected: number;
    returned: number;
};

export type PublishSummary = {
    submitted: number;
    published: number;
    rejected: number;
    attachmentsUploaded: number;
    mismatches: SubResultMismatch[];
};

export interface ITestResultPublisher {
    publish(
        results: TestCaseResult[],
        ordering: OrderingIndex,
        attachmentsByName: ReadonlyMap<string, ResultAttachment[]>
    ): Promise<PublishSummary>;
}

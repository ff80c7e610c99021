import type {
  TestAttachmentRequestModel,
  TestCaseResult,
  TestSubResult,
} from "azure-devops-node-api/interfaces/TestInterfaces";
import type { ILogger } from "./interfaces/ILogger";
import type { ResultAttachment } from "./interfaces/ITestResultFormat";
import type {
  ITestResultPublisher,
  OrderingIndex,
  PublishSummary,
  TestResultsClient,
} from "./interfaces/ITestResultPublisher";
import { RemoteServiceError } from "./RemoteServiceError";

/** Id the service assigns to a row it declined to store. */
export const REJECTED_RESULT_ID = -1;

export function encodeAttachment(text: string | Buffer): string {
  const bytes = typeof text === "string" ? Buffer.from(text, "utf-8") : text;
  return bytes.toString("base64");
}

export class TestResultPublisher implements ITestResultPublisher {
  constructor(
    private testApi: TestResultsClient,
    private project: string,
    private testRunId: number,
    private logger: ILogger
  ) { }

  async publish(
    results: TestCaseResult[],
    ordering: OrderingIndex,
    attachmentsByName: ReadonlyMap<string, ResultAttachment[]>
  ): Promise<PublishSummary> {
    const summary: PublishSummary = {
      submitted: results.length,
      published: 0,
      rejected: 0,
      attachmentsUploaded: 0,
      mismatches: [],
    };

    if (results.length === 0) {
      this.logger.log("ℹ️ No results to publish; skipping submission.");
      return summary;
    }

    let published: TestCaseResult[];
    try {
      published = await this.testApi.addTestResultsToTestRun(results, this.project, this.testRunId);
    } catch (err) {
      throw new RemoteServiceError(
        `❌ Failed to add ${results.length} results to test run ${this.testRunId}.`,
        err
      );
    }
    this.logger.log(`📊 Published ${published.length} results to run ${this.testRunId}.`);

    if (published.length !== results.length) {
      this.logger.warn(
        `⚠️ Service returned ${published.length} results for ${results.length} submitted; attachments are matched by position.`
      );
    }

    for (const [index, result] of published.entries()) {
      const resultId = result.id;
      // Rows the service declined carry no attachments.
      if (resultId === undefined || resultId === REJECTED_RESULT_ID) {
        summary.rejected++;
        continue;
      }
      summary.published++;

      // The response may echo only ids; fall back to what was sent at this position.
      const name = result.automatedTestName ?? results[index]?.automatedTestName;
      if (name === undefined) continue;

      const attachments = attachmentsByName.get(name);
      if (attachments) {
        for (const attachment of attachments) {
          await this.sendAttachment(attachment, resultId);
          summary.attachmentsUploaded++;
        }
      } else if (result.subResults) {
        await this.sendSubResultAttachments(
          name,
          resultId,
          result.subResults,
          ordering,
          attachmentsByName,
          summary
        );
      }
    }

    return summary;
  }

  /**
   * Sub-results come back without names, only in the order they were sent.
   * The ordering index recorded at grouping time is zipped against them to
   * recover which variant each one belongs to.
   */
  private async sendSubResultAttachments(
    name: string,
    resultId: number,
    subResults: TestSubResult[],
    ordering: OrderingIndex,
    attachmentsByName: ReadonlyMap<string, ResultAttachment[]>,
    summary: PublishSummary
  ): Promise<void> {
    const expectedNames = ordering.get(name) ?? [];

    if (expectedNames.length !== subResults.length) {
      this.logger.warn(
        `⚠️ Returned sub-results for ${name} (${subResults.length}) do not match the ${expectedNames.length} submitted. Attachments may not pair correctly.`
      );
      summary.mismatches.push({
        resultName: name,
        expected: expectedNames.length,
        returned: subResults.length,
      });
    }

    const pairs = Math.min(expectedNames.length, subResults.length);
    for (let i = 0; i < pairs; i++) {
      const attachments = attachmentsByName.get(expectedNames[i]);
      if (!attachments) continue;

      const subResultId = subResults[i].id;
      if (subResultId === undefined) {
        this.logger.warn(`⚠️ Sub-result for ${expectedNames[i]} came back without an id; skipping its attachments.`);
        continue;
      }

      for (const attachment of attachments) {
        await this.sendAttachment(attachment, resultId, subResultId);
        summary.attachmentsUploaded++;
      }
    }
  }

  private async sendAttachment(attachment: ResultAttachment, resultId: number, subResultId?: number): Promise<void> {
    const request: TestAttachmentRequestModel = {
      fileName: attachment.name,
      stream: encodeAttachment(attachment.text),
    };

    if (subResultId === undefined) {
      await this.testApi.createTestResultAttachment(request, this.project, this.testRunId, resultId);
    } else {
      await this.testApi.createTestSubResultAttachment(request, this.project, this.testRunId, resultId, subResultId);
    }
  }
}

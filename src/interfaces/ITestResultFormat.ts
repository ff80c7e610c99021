export type ResultOutcome = "Pass" | "Fail" | "Skip";

export type ResultAttachment = {
    name: string;
    text: string | Buffer;
};

/**
 * One test outcome as read from a report. `outcome` is kept as a plain
 * string because readers may hand over values outside {@link ResultOutcome};
 * those are dropped during conversion.
 */
export type ResultRecord = {
    name: string;
    kind: string;
    typeName: string;
    method: string;
    durationSeconds: number;
    outcome: string;
    exceptionType?: string;
    failureMessage?: string;
    stackTrace?: string | null;
    skipReason?: string;
    attachments: ResultAttachment[];
};

export interface IResultFormat {
    readonly name: string;
    readonly acceptableFileSuffixes: readonly string[];
    readResults(filePath: string): AsyncIterable<ResultRecord>;
}

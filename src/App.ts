import * as fs from "fs";
import * as path from "path";
import * as glob from "glob";
import type { ILogger } from "./interfaces/ILogger";
import type { IResultFormat, ResultAttachment } from "./interfaces/ITestResultFormat";
import type { ITestResultPublisher, PublishSummary } from "./interfaces/ITestResultPublisher";
import type { RunOptions } from "./interfaces/RunOptions";
import type { ResultConverter } from "./resultConverter";
import { ResultGrouper } from "./ResultGrouper";
import { hasAcceptedSuffix, isSafePath } from "./utils/PathUtils";

export type FileSummary = {
    file: string;
    format: string;
    records: number;
    publish: PublishSummary;
};

export class App {
    constructor(
        private formats: IResultFormat[],
        private converter: ResultConverter,
        private publisher: ITestResultPublisher,
        private logger: ILogger
    ) { }

    async run(options: RunOptions): Promise<FileSummary[]> {
        const format = this.findFormat(options.format);
        const files = options.resultsFile
            ? [path.resolve(options.resultsFile)]
            : this.findResultFiles(options.resultsDir, format);

        if (!files.length) {
            this.logger.log("No result files found; nothing to publish.");
            return [];
        }

        // Each file is one batch; a failing batch stops the rest.
        const summaries: FileSummary[] = [];
        for (const file of files) {
            summaries.push(await this.uploadFile(file, format));
        }
        return summaries;
    }

    async uploadFile(filePath: string, format: IResultFormat): Promise<FileSummary> {
        this.logger.log(`📄 Reading ${format.name} results from ${filePath}`);

        const grouper = new ResultGrouper(this.converter);
        const attachmentsByName = new Map<string, ResultAttachment[]>();
        let records = 0;

        for await (const record of format.readResults(filePath)) {
            records++;
            grouper.add(record);
            if (record.attachments.length > 0) {
                attachmentsByName.set(record.name, record.attachments);
            }
        }
        this.logger.log(`🧪 Parsed ${records} test results (${attachmentsByName.size} with attachments).`);

        const { results, ordering } = grouper.build();
        const publish = await this.publisher.publish(results, ordering, attachmentsByName);

        if (publish.rejected > 0) {
            this.logger.warn(`⚠️ ${publish.rejected} of ${publish.submitted} results were rejected by the service.`);
        }
        this.logger.log(`📎 Uploaded ${publish.attachmentsUploaded} attachments.`);

        return { file: filePath, format: format.name, records, publish };
    }

    private findFormat(name: string): IResultFormat {
        const format = this.formats.find((f) => f.name === name.toLowerCase());
        if (!format) {
            throw new Error(
                `Unknown result format "${name}". Supported: ${this.formats.map((f) => f.name).join(", ")}.`
            );
        }
        return format;
    }

    private findResultFiles(resultsDir: string, format: IResultFormat): string[] {
        const root = path.resolve(resultsDir);
        if (!fs.existsSync(root)) {
            this.logger.warn(`⚠️ Results directory not found: ${root}`);
            return [];
        }

        this.logger.log(`📂 Scanning ${root} for ${format.acceptableFileSuffixes.join(", ")}`);
        const files: string[] = [];
        for (const file of glob.sync("**/*", { cwd: root, absolute: true, nodir: true }).sort()) {
            if (!hasAcceptedSuffix(file, format.acceptableFileSuffixes)) continue;
            if (!isSafePath(file, root)) {
                this.logger.warn(`⚠️ Unsafe result path detected and skipped: ${file}`);
                continue;
            }
            files.push(file);
        }
        return files;
    }
}

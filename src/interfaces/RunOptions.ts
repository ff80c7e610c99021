export interface RunOptions {
    resultsFile?: string;
    resultsDir: string;
    format: string;
}

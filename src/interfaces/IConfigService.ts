import type { CorrelationInfo } from "../resultConverter";

export type ReporterEnv = {
    collectionUri: string;
    accessToken?: string;
    personalAccessToken?: string;
    project: string;
    testRunId: number;
    correlation: CorrelationInfo;
};

export type ReporterArgs = {
    resultsFile?: string;
    resultsDir: string;
    format: string;
    runId?: number;
};

export interface IConfigService {
    loadEnvironment(runIdOverride?: number): ReporterEnv;
    loadArgs(argv: Record<string, unknown>, defaultResultsDir: string): ReporterArgs;
}

import * as path from "path";
import * as fs from "fs";
import * as dotenv from "dotenv";
import type { ReporterArgs, ReporterEnv, IConfigService } from "./interfaces/IConfigService";

export class ConfigService implements IConfigService {
  constructor(private env: NodeJS.ProcessEnv = process.env) { }

  loadEnvironment(runIdOverride?: number): ReporterEnv {
    // Allow local .env (gitignored) for secrets when running outside pipelines.
    const envPath = this.env.RESULT_PUBLISHER_ENV || path.resolve(".env");
    if (fs.existsSync(envPath)) {
      const parsed = dotenv.parse(fs.readFileSync(envPath));
      for (const [key, value] of Object.entries(parsed)) {
        if (this.env[key] === undefined) this.env[key] = value;
      }
    }

    const collectionUri =
      this.env.SYSTEM_TEAMFOUNDATIONCOLLECTIONURI || this.env.ADO_ORG_URL || "";
    const accessToken = this.env.SYSTEM_ACCESSTOKEN || this.env.ADO_TOKEN || undefined;
    const personalAccessToken = this.env.VSTS_PAT || undefined;
    const project = this.env.SYSTEM_TEAMPROJECT || this.env.ADO_PROJECT || "";

    if (!collectionUri || !project) {
      throw new Error(
        "Missing required environment variables (collection URI/project). Provide SYSTEM_* values in pipeline or set ADO_ORG_URL, ADO_PROJECT locally."
      );
    }
    if (!accessToken && !personalAccessToken) {
      throw new Error(
        "No usable credentials: set SYSTEM_ACCESSTOKEN (or ADO_TOKEN), or VSTS_PAT as a fallback."
      );
    }

    const testRunId = runIdOverride ?? this.parseRunId(this.env.TEST_RUN_ID);

    return {
      collectionUri,
      accessToken,
      personalAccessToken,
      project,
      testRunId,
      correlation: {
        jobId: this.env.JOB_CORRELATION_ID || "",
        workItemName: this.env.WORKITEM_FRIENDLYNAME || "",
      },
    };
  }

  loadArgs(argv: Record<string, unknown>, defaultResultsDir: string): ReporterArgs {
    const resultsFile = this.stringArg(argv, "results-file");
    const runId = argv["run-id"];
    return {
      resultsFile: resultsFile ? path.resolve(resultsFile) : undefined,
      resultsDir: path.resolve(this.stringArg(argv, "results-dir") || defaultResultsDir),
      format: this.stringArg(argv, "format") || "junit",
      runId: runId === undefined ? undefined : this.parseRunId(String(runId)),
    };
  }

  private stringArg(argv: Record<string, unknown>, key: string): string | undefined {
    const value = argv[key];
    return typeof value === "string" ? value : undefined;
  }

  private parseRunId(value: string | undefined): number {
    const runId = value ? Number(value) : NaN;
    if (!Number.isInteger(runId) || runId <= 0) {
      throw new Error(
        `Invalid or missing test run id "${value ?? ""}". Pass --run-id or set TEST_RUN_ID to a positive integer.`
      );
    }
    return runId;
  }
}

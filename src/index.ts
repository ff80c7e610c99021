#!/usr/bin/env node
import yargsFactory from "yargs/yargs";
import { hideBin } from "yargs/helpers";
import { App } from "./App";
import { AzureClientProvider } from "./AzureClientProvider";
import { ConfigService } from "./config";
import { ConsoleLogger } from "./ConsoleLogger";
import { JUnitParser } from "./junitParser";
import { ResultConverter } from "./resultConverter";
import { TestResultPublisher } from "./testResultPublisher";

async function run(logger: ConsoleLogger): Promise<void> {
  const defaultResultsDir = process.cwd();
  const argv = yargsFactory(hideBin(process.argv))
    .options({
      "results-file": {
        type: "string",
        describe: "Publish a single result file instead of scanning a directory",
      },
      "results-dir": {
        type: "string",
        default: defaultResultsDir,
        describe: `Directory scanned for result files (default: ${defaultResultsDir})`,
      },
      format: {
        type: "string",
        default: "junit",
        describe: "Result file format",
      },
      "run-id": {
        type: "number",
        describe: "Test run to publish into (default: TEST_RUN_ID)",
      },
    })
    .strict()
    .parseSync();

  const config = new ConfigService();
  const args = config.loadArgs(argv, defaultResultsDir);
  const env = config.loadEnvironment(args.runId);

  logger.registerSecret(env.accessToken);
  logger.registerSecret(env.personalAccessToken);
  const secrets = [env.accessToken, env.personalAccessToken].filter((value): value is string => !!value);

  const testApi = await new AzureClientProvider().createTestApi(env);
  const converter = new ResultConverter(env.correlation, logger);
  const publisher = new TestResultPublisher(testApi, env.project, env.testRunId, logger);
  const app = new App([new JUnitParser(secrets)], converter, publisher, logger);

  const summaries = await app.run({
    resultsFile: args.resultsFile,
    resultsDir: args.resultsDir,
    format: args.format,
  });
  logger.log(`🏁 Published ${summaries.length} result file(s) to run ${env.testRunId}.`);
}

const logger = new ConsoleLogger();
run(logger).catch((err: unknown) => {
  logger.error("💥 Error during execution:", err);
  process.exit(1);
});

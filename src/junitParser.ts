import * as fs from "fs";
import * as sax from "sax";
import type { IResultFormat, ResultAttachment, ResultRecord } from "./interfaces/ITestResultFormat";
import { SecretRedactor } from "./utils/SecretRedactor";

type ChildCapture = {
  attributes: Record<string, string>;
  text: string;
};

type OpenTestCase = {
  depth: number;
  attributes: Record<string, string>;
  children: Map<string, ChildCapture>;
};

const CAPTURED_CHILDREN = new Set(["failure", "error", "skipped", "system-out", "system-err"]);

function readAttributes(tag: sax.Tag | sax.QualifiedTag): Record<string, string> {
  const attributes: Record<string, string> = {};
  for (const [key, value] of Object.entries(tag.attributes)) {
    attributes[key] = typeof value === "string" ? value : value.value;
  }
  return attributes;
}

/**
 * Streams `testcase` elements out of a JUnit report. Only the test case
 * currently being read is kept in memory; each record is handed out as
 * soon as its closing tag has been parsed.
 */
export class JUnitParser implements IResultFormat {
  readonly name = "junit";
  readonly acceptableFileSuffixes = ["junit-results.xml", "junitresults.xml"];

  /**
   * @param knownSecrets values masked in failure text, such as the access
   *   token the process was configured with
   */
  constructor(private readonly knownSecrets: readonly string[] = []) {}

  async *readResults(filePath: string): AsyncGenerator<ResultRecord> {
    const stats = fs.statSync(filePath);
    if (!stats.isFile()) {
      throw new Error(`JUnit XML path is not a file: ${filePath}`);
    }

    const pending: ResultRecord[] = [];
    const parser = this.createParser(filePath, (record) => pending.push(record));
    const stream = fs.createReadStream(filePath, { encoding: "utf-8" });

    try {
      for await (const chunk of stream) {
        parser.write(String(chunk));
        yield* pending.splice(0);
      }
      parser.close();
      yield* pending.splice(0);
    } finally {
      stream.destroy();
    }
  }

  private createParser(filePath: string, emit: (record: ResultRecord) => void): sax.SAXParser {
    const parser = sax.parser(true);
    let depth = 0;
    let current: OpenTestCase | undefined;
    // `open` drops once a nested element starts: only the leading text counts.
    let capture: { depth: number; target: ChildCapture; open: boolean } | undefined;

    parser.onerror = (err: Error) => {
      throw new Error(`Malformed JUnit XML in ${filePath}: ${err.message}`);
    };

    parser.onopentag = (tag: sax.Tag | sax.QualifiedTag) => {
      depth++;
      if (capture) {
        capture.open = false;
        return;
      }
      if (!current) {
        if (tag.name === "testcase") {
          current = { depth, attributes: readAttributes(tag), children: new Map() };
        }
        return;
      }
      // Only direct children of the test case count, and only the first of each kind.
      if (depth === current.depth + 1 && CAPTURED_CHILDREN.has(tag.name) && !current.children.has(tag.name)) {
        const target: ChildCapture = { attributes: readAttributes(tag), text: "" };
        current.children.set(tag.name, target);
        capture = { depth, target, open: true };
      }
    };

    const appendText = (text: string) => {
      if (capture?.open) capture.target.text += text;
    };
    parser.ontext = appendText;
    parser.oncdata = appendText;

    parser.onclosetag = () => {
      if (capture && capture.depth === depth) {
        capture = undefined;
      } else if (current && current.depth === depth) {
        emit(toRecord(current, this.knownSecrets));
        // Drop the finished element so nothing accumulates behind the cursor.
        current = undefined;
      }
      depth--;
    };

    return parser;
  }
}

function toRecord(testCase: OpenTestCase, knownSecrets: readonly string[]): ResultRecord {
  const testName = testCase.attributes["name"] ?? "";
  const classname = testCase.attributes["classname"] ?? "";
  const duration = parseFloat(testCase.attributes["time"] ?? "0");

  const record: ResultRecord = {
    name: classname ? `${classname}.${testName}` : testName,
    kind: "junit",
    typeName: classname,
    method: testName,
    durationSeconds: Number.isFinite(duration) ? Math.max(0, duration) : 0,
    outcome: "Pass",
    attachments: [],
  };

  const failure = testCase.children.get("failure") ?? testCase.children.get("error");
  if (failure) {
    record.outcome = "Fail";
    record.exceptionType = failure.attributes["type"];
    const message = failure.attributes["message"];
    record.failureMessage = message === undefined ? undefined : SecretRedactor.maskTokens(message, knownSecrets);
    record.stackTrace = failure.text ? SecretRedactor.maskTokens(failure.text, knownSecrets) : null;
    record.attachments = collectOutput(testCase);
  }

  const skipped = testCase.children.get("skipped");
  if (skipped) {
    record.outcome = "Skip";
    record.skipReason = skipped.text;
  }

  return record;
}

// Console output is only worth uploading next to a failure.
function collectOutput(testCase: OpenTestCase): ResultAttachment[] {
  const attachments: ResultAttachment[] = [];
  const stdout = testCase.children.get("system-out");
  if (stdout) {
    attachments.push({ name: "Console_Output.log", text: stdout.text });
  }
  const stderr = testCase.children.get("system-err");
  if (stderr) {
    attachments.push({ name: "Error_Output.log", text: stderr.text });
  }
  return attachments;
}

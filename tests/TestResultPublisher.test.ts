import { describe, it } from 'node:test';
import * as assert from 'assert';
import type { ResultAttachment, ResultRecord } from '../src/interfaces/ITestResultFormat';
import type { GroupedResults } from '../src/interfaces/ITestResultPublisher';
import { RemoteServiceError } from '../src/RemoteServiceError';
import { ResultConverter } from '../src/resultConverter';
import { ResultGrouper } from '../src/ResultGrouper';
import { encodeAttachment, TestResultPublisher } from '../src/testResultPublisher';
import { FakeTestApi, makeRecord, RecordingLogger } from './TestDoubles';

const RUN_ID = 7;

function log(text: string): ResultAttachment[] {
    return [{ name: 'Console_Output.log', text }];
}

function prepare(records: ResultRecord[]): GroupedResults & { attachmentsByName: Map<string, ResultAttachment[]> } {
    const converter = new ResultConverter({ jobId: 'job-1', workItemName: 'workitem-1' }, new RecordingLogger());
    const attachmentsByName = new Map<string, ResultAttachment[]>();
    for (const record of records) {
        if (record.attachments.length > 0) attachmentsByName.set(record.name, record.attachments);
    }
    return { ...ResultGrouper.group(records, converter), attachmentsByName };
}

function createPublisher(api: FakeTestApi, logger = new RecordingLogger()): TestResultPublisher {
    return new TestResultPublisher(api, 'Project', RUN_ID, logger);
}

describe('TestResultPublisher', () => {
    it('submits the whole batch in one call', async () => {
        const api = new FakeTestApi();
        const { results, ordering, attachmentsByName } = prepare([
            makeRecord('A(1)', 'Pass'),
            makeRecord('B', 'Pass'),
        ]);

        await createPublisher(api).publish(results, ordering, attachmentsByName);

        assert.strictEqual(api.submitted.length, 1);
        assert.strictEqual(api.submitted[0], results);
    });

    it('uploads attachments of a result whose name matches exactly', async () => {
        const api = new FakeTestApi();
        const { results, ordering, attachmentsByName } = prepare([
            makeRecord('B', 'Fail', 0.1, { attachments: log('hello') }),
        ]);

        const summary = await createPublisher(api).publish(results, ordering, attachmentsByName);

        assert.deepStrictEqual(api.uploads, [
            { resultId: 100, fileName: 'Console_Output.log', stream: 'aGVsbG8=' },
        ]);
        assert.deepStrictEqual(summary, {
            submitted: 1,
            published: 1,
            rejected: 0,
            attachmentsUploaded: 1,
            mismatches: [],
        });
    });

    it('pairs variant attachments with sub-results by submission order', async () => {
        const api = new FakeTestApi();
        const { results, ordering, attachmentsByName } = prepare([
            makeRecord('A(1)', 'Pass'),
            makeRecord('A(2)', 'Fail', 0.1, { attachments: log('two') }),
            makeRecord('A(3)', 'Fail', 0.1, { attachments: log('three') }),
        ]);

        const summary = await createPublisher(api).publish(results, ordering, attachmentsByName);

        assert.deepStrictEqual(api.uploads, [
            { resultId: 100, subResultId: 11, fileName: 'Console_Output.log', stream: 'dHdv' },
            { resultId: 100, subResultId: 12, fileName: 'Console_Output.log', stream: 'dGhyZWU=' },
        ]);
        assert.strictEqual(summary.attachmentsUploaded, 2);
    });

    it('skips rejected rows without failing the batch', async () => {
        const api = new FakeTestApi();
        api.respond = (results) =>
            results.map((r, i) => ({ id: i === 1 ? -1 : 100 + i, automatedTestName: r.automatedTestName }));
        const { results, ordering, attachmentsByName } = prepare([
            makeRecord('X', 'Fail', 0, { attachments: log('x') }),
            makeRecord('Y', 'Fail', 0, { attachments: log('y') }),
            makeRecord('Z', 'Fail', 0, { attachments: log('z') }),
        ]);

        const summary = await createPublisher(api).publish(results, ordering, attachmentsByName);

        assert.deepStrictEqual(api.uploads.map((u) => u.resultId), [100, 102]);
        assert.strictEqual(summary.published, 2);
        assert.strictEqual(summary.rejected, 1);
    });

    it('warns and pairs what it can when sub-result counts differ', async () => {
        const api = new FakeTestApi();
        api.respond = (results) => results.map((r) => ({ id: 100, automatedTestName: r.automatedTestName, subResults: [{ id: 10 }] }));
        const logger = new RecordingLogger();
        const { results, ordering, attachmentsByName } = prepare([
            makeRecord('A(1)', 'Fail', 0, { attachments: log('one') }),
            makeRecord('A(2)', 'Fail', 0, { attachments: log('two') }),
        ]);

        const summary = await createPublisher(api, logger).publish(results, ordering, attachmentsByName);

        assert.deepStrictEqual(logger.warnings, [
            '⚠️ Returned sub-results for A (1) do not match the 2 submitted. Attachments may not pair correctly.',
        ]);
        assert.deepStrictEqual(summary.mismatches, [{ resultName: 'A', expected: 2, returned: 1 }]);
        assert.deepStrictEqual(api.uploads, [
            { resultId: 100, subResultId: 10, fileName: 'Console_Output.log', stream: encodeAttachment('one') },
        ]);
    });

    it('falls back to the submitted name when the response carries only ids', async () => {
        const api = new FakeTestApi();
        api.respond = (results) => results.map((_, i) => ({ id: 200 + i }));
        const { results, ordering, attachmentsByName } = prepare([
            makeRecord('Quiet', 'Pass'),
            makeRecord('Loud', 'Fail', 0, { attachments: log('loud') }),
        ]);

        await createPublisher(api).publish(results, ordering, attachmentsByName);

        assert.deepStrictEqual(api.uploads.map((u) => [u.resultId, u.subResultId]), [[201, undefined]]);
    });

    it('wraps a failed submission in RemoteServiceError', async () => {
        const api = new FakeTestApi();
        const cause = new Error('401 Unauthorized');
        api.submissionError = cause;
        const { results, ordering, attachmentsByName } = prepare([makeRecord('B', 'Pass')]);

        await assert.rejects(
            createPublisher(api).publish(results, ordering, attachmentsByName),
            (err: unknown) => {
                assert.ok(err instanceof RemoteServiceError);
                assert.strictEqual(err.message, '❌ Failed to add 1 results to test run 7.');
                assert.strictEqual(err.cause, cause);
                return true;
            }
        );
    });

    it('lets attachment upload failures propagate', async () => {
        const api = new FakeTestApi();
        const uploadError = new Error('413 Payload Too Large');
        api.uploadError = uploadError;
        const { results, ordering, attachmentsByName } = prepare([
            makeRecord('B', 'Fail', 0, { attachments: log('big') }),
        ]);

        await assert.rejects(createPublisher(api).publish(results, ordering, attachmentsByName), uploadError);
    });

    it('does not call the service for an empty batch', async () => {
        const api = new FakeTestApi();

        const summary = await createPublisher(api).publish([], new Map(), new Map());

        assert.strictEqual(api.submitted.length, 0);
        assert.strictEqual(summary.submitted, 0);
    });
});

describe('encodeAttachment', () => {
    it('encodes text as UTF-8 before base64', () => {
        assert.strictEqual(encodeAttachment('héllo'), 'aMOpbGxv');
    });

    it('encodes raw bytes as they are', () => {
        assert.strictEqual(encodeAttachment(Buffer.from([0xff, 0x00])), '/wA=');
    });
});
